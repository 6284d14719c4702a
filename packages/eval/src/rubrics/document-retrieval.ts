/**
 * Document retrieval rubric.
 *
 * Checks whether an agent's retrieval tool calls fetched the documents an
 * episode expects. Targets are read from the episode state; retrievals are
 * read from the transcript. Both sides go through the same parser.
 */

import type { State } from "@groundtruth/messages";
import type {
  DocumentId,
  DocumentRetrievalRubric,
  DocumentRetrievalRubricConfig,
  DocumentRetrievalRubricOptions,
  MetricName,
  RewardFunc,
  RewardInput,
  RubricScore,
  ToolReference,
} from "../types.js";
import { RubricConfigError } from "../errors.js";
import { createPrefixParser, toDocumentIdParser } from "../parsers.js";
import { DEFAULT_TARGET_LOCATIONS } from "../locations.js";
import { extractRetrievedDocuments } from "../extract/retrieved.js";
import { resolveTargetDocuments } from "../extract/targets.js";
import { computePrecision, computeRecall, countUnique } from "../metrics.js";

/** Metric order shared by `funcs` and `weights`. */
export const METRIC_NAMES: readonly MetricName[] = [
  "retrievedCount",
  "targetCount",
  "recall",
  "precision",
];

// ---------------------------------------------------------------------------
// Configuration
// ---------------------------------------------------------------------------

/**
 * Get the name a tool reference is called by.
 *
 * @throws RubricConfigError when the name is empty.
 */
export function resolveToolName(tool: ToolReference): string {
  const name = typeof tool === "string" ? tool : tool.name;
  if (typeof name !== "string" || name.length === 0) {
    throw new RubricConfigError("Tool reference must have a non-empty name.", { option: "tool" });
  }
  return name;
}

function requireNonEmpty(value: string, option: string): string {
  if (value.length === 0) {
    throw new RubricConfigError(`Option "${option}" must not be empty.`, { option });
  }
  return value;
}

function resolveWeights(
  weights: Partial<Record<MetricName, number>> | undefined,
): Record<MetricName, number> {
  const resolved: Record<MetricName, number> = {
    retrievedCount: 0,
    targetCount: 0,
    recall: 0,
    precision: 0,
  };
  for (const metric of METRIC_NAMES) {
    const weight = weights?.[metric];
    if (weight === undefined) continue;
    if (!Number.isFinite(weight)) {
      throw new RubricConfigError(`Weight for "${metric}" must be a finite number.`, {
        option: "weights",
      });
    }
    resolved[metric] = weight;
  }
  return resolved;
}

// ---------------------------------------------------------------------------
// Rubric
// ---------------------------------------------------------------------------

/**
 * Create a document retrieval rubric.
 *
 * All metric weights default to 0, so the metrics are reported without
 * shaping the reward unless the caller assigns weights.
 *
 * @example
 * ```ts
 * const rubric = createDocumentRetrievalRubric({ tool: "read_section" });
 * const recall = await rubric.recall({ completion, state });
 * ```
 */
export function createDocumentRetrievalRubric(
  options: DocumentRetrievalRubricOptions,
): DocumentRetrievalRubric {
  const {
    logger = console.warn,
    prefix = "[document-retrieval]",
  } = options;

  const config: DocumentRetrievalRubricConfig = {
    toolName: resolveToolName(options.tool),
    argName: requireNonEmpty(options.argName ?? "section_id", "argName"),
    targetKey: requireNonEmpty(options.targetKey ?? "target_documents", "targetKey"),
    parser: toDocumentIdParser(options.documentIdParser ?? createPrefixParser(":")),
    locations: options.locations ?? DEFAULT_TARGET_LOCATIONS,
    weights: resolveWeights(options.weights),
  };

  function log(msg: string): void {
    logger(`${prefix} ${msg}`);
  }

  function retrieved(completion: unknown): DocumentId[] {
    return extractRetrievedDocuments(completion, config);
  }

  function targets(state: State): DocumentId[] {
    return resolveTargetDocuments(state, { ...config, log });
  }

  const metrics: Record<MetricName, (input: RewardInput) => number> = {
    retrievedCount: ({ completion }) => countUnique(retrieved(completion)),
    targetCount: ({ state }) => countUnique(targets(state)),
    recall: ({ completion, state }) => computeRecall(retrieved(completion), targets(state)),
    precision: ({ completion, state }) => computePrecision(retrieved(completion), targets(state)),
  };

  const funcs: RewardFunc[] = METRIC_NAMES.map((name) => ({
    name,
    evaluate: async (input: RewardInput) => metrics[name](input),
  }));

  return {
    name: "document-retrieval",
    config,
    funcs,
    weights: METRIC_NAMES.map((name) => config.weights[name]),

    async retrievedCount({ completion }: Pick<RewardInput, "completion">): Promise<number> {
      return countUnique(retrieved(completion));
    },

    async targetCount({ state }: Pick<RewardInput, "state">): Promise<number> {
      return countUnique(targets(state));
    },

    async recall(input: RewardInput): Promise<number> {
      return metrics.recall(input);
    },

    async precision(input: RewardInput): Promise<number> {
      return metrics.precision(input);
    },

    async score(input: RewardInput): Promise<RubricScore> {
      const values = await Promise.all(funcs.map((func) => func.evaluate(input)));
      const scored: Record<MetricName, number> = {
        retrievedCount: 0,
        targetCount: 0,
        recall: 0,
        precision: 0,
      };
      let reward = 0;
      funcs.forEach((func, i) => {
        scored[func.name] = values[i];
        reward += values[i] * config.weights[func.name];
      });
      return { metrics: scored, reward };
    },
  };
}
