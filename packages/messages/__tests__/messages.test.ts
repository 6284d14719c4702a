/**
 * Tests for @groundtruth/messages guards, argument decoding, and errors.
 */

import { describe, it, expect } from "vitest";
import {
  BaseError,
  TranscriptError,
  ToolArgumentsError,
} from "../src/errors.js";
import {
  isRecord,
  assertTranscript,
  hasToolCalls,
  getToolCallName,
  getToolCallArguments,
} from "../src/guards.js";
import { parseToolArguments } from "../src/arguments.js";
import type { Messages } from "../src/types.js";

// ---------------------------------------------------------------------------
// Errors
// ---------------------------------------------------------------------------

describe("BaseError", () => {
  it("stores code and message", () => {
    const err = new BaseError("INVALID_TRANSCRIPT", "boom");
    expect(err.code).toBe("INVALID_TRANSCRIPT");
    expect(err.message).toBe("boom");
  });

  it("sets name to the constructor name", () => {
    expect(new BaseError("X", "boom").name).toBe("BaseError");
    expect(new TranscriptError("boom").name).toBe("TranscriptError");
  });

  it("preserves cause via ErrorOptions", () => {
    const cause = new Error("root cause");
    const err = new BaseError("X", "boom", { cause });
    expect(err.cause).toBe(cause);
  });
});

describe("ToolArgumentsError", () => {
  it("has code INVALID_TOOL_ARGUMENTS and keeps the tool name", () => {
    const err = new ToolArgumentsError("bad", { toolName: "read_section" });
    expect(err.code).toBe("INVALID_TOOL_ARGUMENTS");
    expect(err.toolName).toBe("read_section");
    expect(err).toBeInstanceOf(BaseError);
  });
});

// ---------------------------------------------------------------------------
// Guards
// ---------------------------------------------------------------------------

describe("isRecord", () => {
  it("accepts plain objects only", () => {
    expect(isRecord({})).toBe(true);
    expect(isRecord([])).toBe(false);
    expect(isRecord(null)).toBe(false);
    expect(isRecord("x")).toBe(false);
  });
});

describe("assertTranscript", () => {
  it("accepts arrays", () => {
    expect(() => assertTranscript([])).not.toThrow();
  });

  it("throws TranscriptError for non-arrays", () => {
    expect(() => assertTranscript("hello")).toThrow(TranscriptError);
    expect(() => assertTranscript(null)).toThrow(
      "Transcript must be a list of messages, got null.",
    );
    expect(() => assertTranscript({ role: "assistant" })).toThrow(
      "Transcript must be a list of messages, got object.",
    );
  });
});

describe("hasToolCalls", () => {
  it("matches assistant messages with a tool call list", () => {
    const messages: Messages = [
      { role: "user", content: "find it" },
      {
        role: "assistant",
        content: null,
        tool_calls: [{ id: "c1", type: "function", function: { name: "search", arguments: "{}" } }],
      },
      { role: "assistant", content: "done" },
    ];
    expect(messages.map(hasToolCalls)).toEqual([false, true, false]);
  });

  it("rejects non-list tool_calls and other roles", () => {
    expect(hasToolCalls({ role: "assistant", tool_calls: "nope" })).toBe(false);
    expect(hasToolCalls({ role: "tool", tool_calls: [] })).toBe(false);
    expect(hasToolCalls(42)).toBe(false);
  });
});

describe("getToolCallName / getToolCallArguments", () => {
  it("reads name and arguments from a well-formed call", () => {
    const call = { function: { name: "search", arguments: '{"q":"x"}' } };
    expect(getToolCallName(call)).toBe("search");
    expect(getToolCallArguments(call)).toBe('{"q":"x"}');
  });

  it("falls back for malformed calls", () => {
    expect(getToolCallName({})).toBe("");
    expect(getToolCallName({ function: { name: 7 } })).toBe("");
    expect(getToolCallName(null)).toBe("");
    expect(getToolCallArguments({ function: { name: "search" } })).toBe("{}");
    expect(getToolCallArguments("junk")).toBe("{}");
  });
});

// ---------------------------------------------------------------------------
// parseToolArguments
// ---------------------------------------------------------------------------

describe("parseToolArguments", () => {
  it("decodes a JSON object", () => {
    expect(parseToolArguments('{"section_id":"doc1:intro","limit":3}')).toEqual({
      section_id: "doc1:intro",
      limit: 3,
    });
  });

  it("throws on invalid JSON and keeps the cause", () => {
    let caught: unknown;
    try {
      parseToolArguments("{not json", "read_section");
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(ToolArgumentsError);
    if (caught instanceof ToolArgumentsError) {
      expect(caught.toolName).toBe("read_section");
      expect(caught.cause).toBeInstanceOf(SyntaxError);
    }
  });

  it("throws when the payload is not an object", () => {
    expect(() => parseToolArguments("[1,2]")).toThrow(
      "Tool arguments must decode to an object: [1,2]",
    );
    expect(() => parseToolArguments('"doc1"')).toThrow(ToolArgumentsError);
  });

  it("throws when the payload is not a string", () => {
    expect(() => parseToolArguments({ section_id: "doc1" })).toThrow(
      "Tool arguments must be a JSON string, got object.",
    );
  });
});
