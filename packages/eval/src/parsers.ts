/**
 * Document ID parsers.
 *
 * Retrieved and target references go through the same parser, so two
 * references that normalize to the same token count as one document.
 */

import type { DocumentId, DocumentIdParser, DocumentIdParserLike } from "./types.js";
import { DocumentIdError, RubricConfigError } from "./errors.js";

/**
 * Create a parser that keeps the text before the first separator.
 * "doc7:para2" becomes "doc7"; a reference without the separator is kept whole.
 */
export function createPrefixParser(separator = ":"): DocumentIdParser {
  if (separator.length === 0) {
    throw new RubricConfigError("Prefix parser separator must not be empty.", {
      option: "documentIdParser",
    });
  }

  return {
    name: `prefix(${separator})`,

    parse(raw: string): DocumentId {
      const end = raw.indexOf(separator);
      return end === -1 ? raw : raw.slice(0, end);
    },
  };
}

/** Create a parser that uses references as identifiers unchanged. */
export function createIdentityParser(): DocumentIdParser {
  return {
    name: "identity",
    parse: (raw: string): DocumentId => raw,
  };
}

/**
 * Accept either a parser object or a plain function.
 */
export function toDocumentIdParser(parser: DocumentIdParserLike): DocumentIdParser {
  if (typeof parser !== "function") return parser;
  const normalize = parser;
  return {
    name: normalize.name || "custom",
    parse: (raw: string): DocumentId => normalize(raw),
  };
}

/**
 * Turn a value read from tool arguments or state into a raw reference.
 * Strings pass through and finite numbers are stringified.
 *
 * @throws DocumentIdError for any other value.
 */
export function toRawDocumentId(value: unknown): string {
  if (typeof value === "string") return value;
  if (typeof value === "number" && Number.isFinite(value)) return String(value);
  throw new DocumentIdError(
    `Document reference must be a string, got ${describeValue(value)}.`,
    { value },
  );
}

/** Short type description used in diagnostics. */
export function describeValue(value: unknown): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "array";
  return typeof value;
}
