/**
 * Typed error hierarchy for @groundtruth/eval.
 *
 * Re-exports shared errors from @groundtruth/messages and defines
 * rubric-specific error types.
 */

import { BaseError } from "@groundtruth/messages";

// Re-export errors that apply at the rubric layer
export {
  BaseError,
  TranscriptError,
  ToolArgumentsError,
} from "@groundtruth/messages";

// ---------------------------------------------------------------------------
// Error codes
// ---------------------------------------------------------------------------

export type EvalErrorCode =
  | "INVALID_DOCUMENT_ID"
  | "INVALID_CONFIG";

// ---------------------------------------------------------------------------
// Document ID error
// ---------------------------------------------------------------------------

/**
 * A raw value could not be turned into a document identifier.
 */
export class DocumentIdError extends BaseError {
  readonly value?: unknown;

  constructor(message: string, options?: { value?: unknown; cause?: unknown }) {
    super("INVALID_DOCUMENT_ID", message, options?.cause ? { cause: options.cause } : undefined);
    this.value = options?.value;
  }
}

// ---------------------------------------------------------------------------
// Rubric config error
// ---------------------------------------------------------------------------

/**
 * A rubric was constructed with invalid options.
 */
export class RubricConfigError extends BaseError {
  readonly option?: string;

  constructor(message: string, options?: { option?: string; cause?: unknown }) {
    super("INVALID_CONFIG", message, options?.cause ? { cause: options.cause } : undefined);
    this.option = options?.option;
  }
}
