/**
 * Core types for the @groundtruth/eval package.
 *
 * Defines document identifiers and their parsers, target locations in the
 * episode state, reward functions, and the document retrieval rubric.
 */

import type { Messages, State } from "@groundtruth/messages";

// ---------------------------------------------------------------------------
// Document identifiers
// ---------------------------------------------------------------------------

/** A normalized token naming one logical document. */
export type DocumentId = string;

/**
 * Maps a raw document reference (e.g. "doc7:para2") to its identifier.
 * Implementations must be pure: rubrics call them concurrently.
 */
export interface DocumentIdParser {
  /** A name for this parser, used in diagnostics. */
  readonly name: string;

  /** Normalize a raw reference into a document identifier. */
  parse(raw: string): DocumentId;
}

/** A parser object or a bare normalization function. */
export type DocumentIdParserLike = DocumentIdParser | ((raw: string) => DocumentId);

// ---------------------------------------------------------------------------
// Tools
// ---------------------------------------------------------------------------

/**
 * The tool whose calls count as retrievals: its name, or anything carrying
 * one (a tool definition, a named function).
 */
export type ToolReference = string | { readonly name: string };

// ---------------------------------------------------------------------------
// Target locations
// ---------------------------------------------------------------------------

/** One place in the episode state where target documents may be stored. */
export interface TargetLocation {
  /** A name for this location, used in diagnostics. */
  readonly name: string;

  /** Read the value stored under `targetKey`, or undefined when absent. */
  read(state: State, targetKey: string): unknown;
}

// ---------------------------------------------------------------------------
// Logging
// ---------------------------------------------------------------------------

export type Logger = (message: string) => void;

// ---------------------------------------------------------------------------
// Reward functions
// ---------------------------------------------------------------------------

export type MetricName = "retrievedCount" | "targetCount" | "recall" | "precision";

/** What a harness passes to a reward function for one episode. */
export interface RewardInput {
  /** The completed conversation. */
  completion: Messages;
  /** Accumulated episode state holding the target documents. */
  state: State;
}

/** A named metric computed from a finished episode. */
export interface RewardFunc {
  readonly name: MetricName;
  evaluate(input: RewardInput): Promise<number>;
}

/** All metrics for one episode plus their weighted sum. */
export interface RubricScore {
  metrics: Record<MetricName, number>;
  reward: number;
}

// ---------------------------------------------------------------------------
// Rubric
// ---------------------------------------------------------------------------

/** Options for {@link createDocumentRetrievalRubric}. */
export interface DocumentRetrievalRubricOptions {
  /** The retrieval tool whose calls are scanned. */
  tool: ToolReference;
  /** Tool argument holding the document reference. Default: "section_id". */
  argName?: string;
  /** State key holding the target documents. Default: "target_documents". */
  targetKey?: string;
  /** Normalizer applied to retrieved and target references. Default: text before the first ":". */
  documentIdParser?: DocumentIdParserLike;
  /** Where to look for targets, first non-empty wins. Default: input, top level, info. */
  locations?: readonly TargetLocation[];
  /** Weight per metric for {@link DocumentRetrievalRubric.score}. Default: 0 for every metric. */
  weights?: Partial<Record<MetricName, number>>;
  /** Receives warnings. Defaults to `console.warn`. */
  logger?: Logger;
  /** Prefix for every log line. Default: "[document-retrieval]". */
  prefix?: string;
}

/** Options after defaults have been applied. */
export interface DocumentRetrievalRubricConfig {
  toolName: string;
  argName: string;
  targetKey: string;
  parser: DocumentIdParser;
  locations: readonly TargetLocation[];
  weights: Record<MetricName, number>;
}

/**
 * Scores whether an agent retrieved the expected documents.
 *
 * Each metric can be called on its own; none depends on another.
 */
export interface DocumentRetrievalRubric {
  readonly name: string;
  readonly config: DocumentRetrievalRubricConfig;
  /** The four metrics in fixed order: retrievedCount, targetCount, recall, precision. */
  readonly funcs: readonly RewardFunc[];
  /** Weights aligned with `funcs`. */
  readonly weights: readonly number[];

  /** Number of distinct documents the agent retrieved. */
  retrievedCount(input: Pick<RewardInput, "completion">): Promise<number>;
  /** Number of distinct documents the agent should have retrieved. */
  targetCount(input: Pick<RewardInput, "state">): Promise<number>;
  /** Fraction of target documents that were retrieved. */
  recall(input: RewardInput): Promise<number>;
  /** Fraction of retrieved documents that were targets. */
  precision(input: RewardInput): Promise<number>;
  /** Evaluate every metric and the weighted reward. */
  score(input: RewardInput): Promise<RubricScore>;
}
