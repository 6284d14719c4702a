/**
 * Transcript types for @groundtruth/messages.
 *
 * Messages follow the chat-completion wire shape recorded by evaluation
 * harnesses: snake_case keys and tool arguments kept as the raw JSON string
 * the model produced.
 */

// ---------------------------------------------------------------------------
// Tool calls
// ---------------------------------------------------------------------------

/** The function half of a recorded tool call. */
export interface ToolCallFunction {
  /** The name of the invoked tool. */
  name: string;
  /** Serialized JSON object with the call's arguments. May be malformed. */
  arguments: string;
}

/** A tool call recorded on an assistant message. */
export interface ToolCall {
  /** Provider-assigned call ID, when the harness kept it. */
  id?: string;
  type?: "function";
  function: ToolCallFunction;
}

// ---------------------------------------------------------------------------
// Messages
// ---------------------------------------------------------------------------

export interface SystemMessage {
  role: "system";
  content: string;
}

export interface UserMessage {
  role: "user";
  content: string;
}

/** Assistant message, optionally carrying tool calls. */
export interface AssistantMessage {
  role: "assistant";
  content: string | null;
  tool_calls?: ToolCall[];
}

/** The output of a tool call, fed back to the model. */
export interface ToolMessage {
  role: "tool";
  /** ID of the tool call this result answers. */
  tool_call_id: string;
  content: string;
}

export type Message = SystemMessage | UserMessage | AssistantMessage | ToolMessage;

export type MessageRole = Message["role"];

/** A complete conversation, oldest message first. */
export type Messages = Message[];

// ---------------------------------------------------------------------------
// Episode state
// ---------------------------------------------------------------------------

/**
 * Accumulated key/value state for one evaluation episode. The harness owns
 * its shape; consumers read it defensively.
 */
export type State = Record<string, unknown>;
