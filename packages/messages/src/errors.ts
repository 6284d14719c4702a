/**
 * Typed error hierarchy for @groundtruth/messages.
 *
 * Every error carries a machine-readable `code` field so consumers can
 * branch on error type without resorting to string matching.
 */

// ---------------------------------------------------------------------------
// Error codes
// ---------------------------------------------------------------------------

export type MessagesErrorCode =
  | "INVALID_TRANSCRIPT"
  | "INVALID_TOOL_ARGUMENTS";

// ---------------------------------------------------------------------------
// Base error
// ---------------------------------------------------------------------------

/**
 * Base error class for all @groundtruth errors.
 */
export class BaseError extends Error {
  readonly code: string;

  constructor(code: string, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = this.constructor.name;
    this.code = code;
  }
}

// ---------------------------------------------------------------------------
// Transcript error
// ---------------------------------------------------------------------------

/**
 * A transcript was not a message sequence.
 */
export class TranscriptError extends BaseError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("INVALID_TRANSCRIPT", message, options?.cause ? { cause: options.cause } : undefined);
  }
}

// ---------------------------------------------------------------------------
// Tool arguments error
// ---------------------------------------------------------------------------

/**
 * A tool call's serialized arguments could not be decoded into an object.
 */
export class ToolArgumentsError extends BaseError {
  readonly toolName?: string;

  constructor(
    message: string,
    options?: { toolName?: string; cause?: unknown },
  ) {
    super("INVALID_TOOL_ARGUMENTS", message, options?.cause ? { cause: options.cause } : undefined);
    this.toolName = options?.toolName;
  }
}
