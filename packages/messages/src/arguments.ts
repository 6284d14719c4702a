/**
 * Tool-call argument decoding.
 */

import { ToolArgumentsError } from "./errors.js";
import { isRecord } from "./guards.js";

/**
 * Decode a tool call's serialized arguments into a key/value object.
 *
 * @param raw - The `function.arguments` payload as recorded.
 * @param toolName - Used in the error message only.
 * @throws ToolArgumentsError when the payload is not a string holding a JSON object.
 */
export function parseToolArguments(raw: unknown, toolName?: string): Record<string, unknown> {
  if (typeof raw !== "string") {
    throw new ToolArgumentsError(
      `Tool arguments must be a JSON string, got ${raw === null ? "null" : typeof raw}.`,
      { toolName },
    );
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new ToolArgumentsError(`Tool arguments are not valid JSON: ${raw}`, {
      toolName,
      cause: err,
    });
  }

  if (!isRecord(parsed)) {
    throw new ToolArgumentsError(`Tool arguments must decode to an object: ${raw}`, { toolName });
  }
  return parsed;
}
