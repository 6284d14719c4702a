/**
 * Set-based retrieval metrics.
 *
 * Identifiers are deduplicated first, so retrieving a document twice counts
 * once.
 */

import type { DocumentId } from "./types.js";

function overlap(a: ReadonlySet<DocumentId>, b: ReadonlySet<DocumentId>): number {
  let count = 0;
  for (const id of a) {
    if (b.has(id)) count++;
  }
  return count;
}

/** Number of distinct identifiers. */
export function countUnique(ids: readonly DocumentId[]): number {
  return new Set(ids).size;
}

/**
 * Fraction of target documents that were retrieved. 1 when there are no
 * targets: nothing could be missed.
 */
export function computeRecall(
  retrieved: readonly DocumentId[],
  target: readonly DocumentId[],
): number {
  const targetSet = new Set(target);
  if (targetSet.size === 0) return 1.0;
  return overlap(new Set(retrieved), targetSet) / targetSet.size;
}

/**
 * Fraction of retrieved documents that were targets. 0 when nothing was
 * retrieved.
 */
export function computePrecision(
  retrieved: readonly DocumentId[],
  target: readonly DocumentId[],
): number {
  const retrievedSet = new Set(retrieved);
  if (retrievedSet.size === 0) return 0.0;
  return overlap(retrievedSet, new Set(target)) / retrievedSet.size;
}
