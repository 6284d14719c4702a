/**
 * Target document resolution.
 */

import { isRecord } from "@groundtruth/messages";
import type { DocumentId, DocumentIdParser, Logger, TargetLocation } from "../types.js";
import { findTargetValue } from "../locations.js";
import { describeValue, toRawDocumentId } from "../parsers.js";

/** Where and how to read target documents. */
export interface TargetDocumentsOptions {
  /** State key holding the target documents. */
  targetKey: string;
  parser: DocumentIdParser;
  /** Lookup order; the first non-empty value wins. */
  locations: readonly TargetLocation[];
  /** Receives coercion and drop warnings. */
  log: Logger;
}

/**
 * Resolve the documents an episode expects the agent to retrieve.
 *
 * A single non-list value is wrapped in a list with a warning. Entries that
 * are not strings or numbers, or that the parser rejects, are dropped with a
 * warning. Missing targets resolve to an empty list.
 */
export function resolveTargetDocuments(
  state: unknown,
  options: TargetDocumentsOptions,
): DocumentId[] {
  if (!isRecord(state)) return [];

  const match = findTargetValue(state, options.targetKey, options.locations);
  if (!match) return [];

  let values: unknown[];
  if (Array.isArray(match.value)) {
    values = match.value;
  } else {
    options.log(
      `Target documents must be a list, got ${describeValue(match.value)}. Converting to list.`,
    );
    values = [match.value];
  }

  const targets: DocumentId[] = [];
  for (const value of values) {
    try {
      targets.push(options.parser.parse(toRawDocumentId(value)));
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      options.log(`Dropping target document from ${match.location.name}: ${reason}`);
    }
  }
  return targets;
}
