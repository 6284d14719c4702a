/**
 * @groundtruth/messages — Transcript types and helpers.
 *
 * Shared message shapes, runtime guards for recorded transcripts, tool
 * argument decoding, and the base error hierarchy.
 *
 * @packageDocumentation
 */

// --- Core types ---
export type {
  ToolCallFunction,
  ToolCall,
  SystemMessage,
  UserMessage,
  AssistantMessage,
  ToolMessage,
  Message,
  MessageRole,
  Messages,
  State,
} from "./types.js";

// --- Errors ---
export type { MessagesErrorCode } from "./errors.js";
export { BaseError, TranscriptError, ToolArgumentsError } from "./errors.js";

// --- Guards ---
export {
  isRecord,
  assertTranscript,
  hasToolCalls,
  getToolCallName,
  getToolCallArguments,
} from "./guards.js";

// --- Arguments ---
export { parseToolArguments } from "./arguments.js";
