/**
 * @groundtruth/eval — Retrieval rubrics for tool-using agents.
 *
 * Scores whether an agent's tool calls retrieved the documents an episode
 * expects, with recall and precision over normalized document identifiers.
 *
 * @packageDocumentation
 */

// --- Core types ---
export type {
  DocumentId,
  DocumentIdParser,
  DocumentIdParserLike,
  ToolReference,
  TargetLocation,
  Logger,
  MetricName,
  RewardInput,
  RewardFunc,
  RubricScore,
  DocumentRetrievalRubricOptions,
  DocumentRetrievalRubricConfig,
  DocumentRetrievalRubric,
} from "./types.js";

// --- Errors ---
export type { EvalErrorCode } from "./errors.js";
export {
  BaseError,
  TranscriptError,
  ToolArgumentsError,
  DocumentIdError,
  RubricConfigError,
} from "./errors.js";

// --- Parsers ---
export {
  createPrefixParser,
  createIdentityParser,
  toDocumentIdParser,
  toRawDocumentId,
} from "./parsers.js";

// --- Target locations ---
export {
  INPUT_LOCATION,
  TOP_LEVEL_LOCATION,
  INFO_LOCATION,
  DEFAULT_TARGET_LOCATIONS,
  INFO_FIRST_TARGET_LOCATIONS,
  isEmptyTargetValue,
  findTargetValue,
} from "./locations.js";
export type { TargetMatch } from "./locations.js";

// --- Extraction ---
export { extractRetrievedDocuments } from "./extract/retrieved.js";
export type { RetrievedDocumentsOptions } from "./extract/retrieved.js";
export { resolveTargetDocuments } from "./extract/targets.js";
export type { TargetDocumentsOptions } from "./extract/targets.js";

// --- Metrics ---
export { countUnique, computeRecall, computePrecision } from "./metrics.js";

// --- Rubrics ---
export {
  createDocumentRetrievalRubric,
  resolveToolName,
  METRIC_NAMES,
} from "./rubrics/document-retrieval.js";
