/**
 * Runtime narrowing for transcripts of unknown provenance.
 */

import { TranscriptError } from "./errors.js";

/** True for non-null, non-array objects. */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Check that a transcript is a sequence before walking it.
 *
 * @throws TranscriptError when the value is not an array.
 */
export function assertTranscript(value: unknown): asserts value is unknown[] {
  if (!Array.isArray(value)) {
    const got = value === null ? "null" : typeof value;
    throw new TranscriptError(`Transcript must be a list of messages, got ${got}.`);
  }
}

/** An assistant message whose `tool_calls` is a list. */
export function hasToolCalls(
  message: unknown,
): message is { role: "assistant"; tool_calls: unknown[] } {
  return (
    isRecord(message) &&
    message.role === "assistant" &&
    Array.isArray(message.tool_calls)
  );
}

/**
 * Read the tool name from a recorded tool call. Returns "" when the entry
 * has no usable name.
 */
export function getToolCallName(toolCall: unknown): string {
  if (!isRecord(toolCall) || !isRecord(toolCall.function)) return "";
  const name = toolCall.function.name;
  return typeof name === "string" ? name : "";
}

/**
 * Read the serialized arguments from a recorded tool call, defaulting to
 * an empty JSON object.
 */
export function getToolCallArguments(toolCall: unknown): unknown {
  if (!isRecord(toolCall) || !isRecord(toolCall.function)) return "{}";
  return toolCall.function.arguments ?? "{}";
}

