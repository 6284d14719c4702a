/**
 * Target document locations in the episode state.
 *
 * Harnesses store dataset columns in different places, so targets are looked
 * up through an ordered list of locations. The first location holding a
 * non-empty value wins.
 */

import { isRecord } from "@groundtruth/messages";
import type { State } from "@groundtruth/messages";
import type { TargetLocation } from "./types.js";

/** Read `state[container][targetKey]` when the container is an object. */
function readNested(state: State, container: string, targetKey: string): unknown {
  const nested = state[container];
  return isRecord(nested) ? nested[targetKey] : undefined;
}

/** `state.input[targetKey]`, where harnesses keep dataset columns. */
export const INPUT_LOCATION: TargetLocation = {
  name: "input",
  read: (state, targetKey) => readNested(state, "input", targetKey),
};

/** `state[targetKey]`. */
export const TOP_LEVEL_LOCATION: TargetLocation = {
  name: "top-level",
  read: (state, targetKey) => state[targetKey],
};

/** `state.info[targetKey]`. */
export const INFO_LOCATION: TargetLocation = {
  name: "info",
  read: (state, targetKey) => readNested(state, "info", targetKey),
};

/** Default lookup order: input, top level, info. */
export const DEFAULT_TARGET_LOCATIONS: readonly TargetLocation[] = Object.freeze([
  INPUT_LOCATION,
  TOP_LEVEL_LOCATION,
  INFO_LOCATION,
]);

/** For harnesses that treat `info` as authoritative. */
export const INFO_FIRST_TARGET_LOCATIONS: readonly TargetLocation[] = Object.freeze([
  INFO_LOCATION,
  INPUT_LOCATION,
  TOP_LEVEL_LOCATION,
]);

/**
 * Whether a stored target value counts as absent. null, undefined, false, 0,
 * "", [] and {} are empty.
 */
export function isEmptyTargetValue(value: unknown): boolean {
  if (value === undefined || value === null || value === false) return true;
  if (value === 0 || value === "") return true;
  if (Array.isArray(value)) return value.length === 0;
  if (isRecord(value)) return Object.keys(value).length === 0;
  return false;
}

/** A non-empty target value and where it was found. */
export interface TargetMatch {
  location: TargetLocation;
  value: unknown;
}

/**
 * Walk `locations` in order and return the first non-empty value.
 */
export function findTargetValue(
  state: State,
  targetKey: string,
  locations: readonly TargetLocation[],
): TargetMatch | undefined {
  for (const location of locations) {
    const value = location.read(state, targetKey);
    if (!isEmptyTargetValue(value)) {
      return { location, value };
    }
  }
  return undefined;
}
