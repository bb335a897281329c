/**
 * Quality Gate: evaluator first, local heuristic second, fixed low score last.
 * The fixed score is rejected at construction if it would pass `passThreshold`.
 */

import {
  QualityEvaluationError,
  nowIso,
  toErrorMessage,
  withTimeout,
} from "../../stage-0-runtime/src/index.js";
import { clampScore, heuristicScore } from "./heuristic.js";
import type {
  CorrectionPolicy,
  QualityGate,
  QualityGateConfig,
  QualityVerdict,
} from "./types.js";

export const DEFAULT_TEXT_KEYS: readonly string[] = [
  "draft",
  "revised_draft",
  "final_draft",
  "text",
];

/** The text artifact inside a tool result, or "" when there is none. */
export function extractArtifactText(
  value: unknown,
  keys: readonly string[] = DEFAULT_TEXT_KEYS
): string {
  if (typeof value === "string") {
    return value.trim() ? value : "";
  }
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    return "";
  }
  for (const key of keys) {
    const candidate: unknown = Object.hasOwn(value, key)
      ? Reflect.get(value, key)
      : undefined;
    if (typeof candidate === "string" && candidate.trim()) {
      return candidate;
    }
  }
  return "";
}

/** True when a corrective step should be enqueued for this score. */
export function shouldCorrect(score: number, policy: CorrectionPolicy): boolean {
  return (
    score < policy.minQualityScore &&
    policy.qualityStepsTaken < policy.maxQualitySteps
  );
}

export function createQualityGate(config: QualityGateConfig = {}): QualityGate {
  const { evaluator, logger } = config;
  const timeoutMs = config.timeoutMs ?? 15000;
  const fallbackScore = clampScore(config.fallbackScore ?? 0);
  const { passThreshold } = config;
  if (passThreshold !== undefined && passThreshold > 0 && fallbackScore >= passThreshold) {
    throw new Error(
      `Quality gate fallbackScore ${fallbackScore} must be below the pass threshold ${passThreshold}`
    );
  }
  const heuristic =
    config.heuristic ??
    ((text: string) => heuristicScore(text, { minWords: config.minWords }));

  async function fromEvaluator(text: string): Promise<number> {
    if (!evaluator) {
      throw new QualityEvaluationError("No evaluator configured");
    }
    const score = await withTimeout(
      async (signal) => evaluator.score(text, { signal }),
      timeoutMs,
      "quality evaluation"
    );
    if (typeof score !== "number" || !Number.isFinite(score) || score < 0 || score > 10) {
      throw new QualityEvaluationError(
        `Evaluator returned an invalid score: ${String(score)}`
      );
    }
    return score;
  }

  return {
    async score(text: string, runId?: string): Promise<QualityVerdict> {
      let reason: string | undefined;

      if (evaluator) {
        try {
          return { score: await fromEvaluator(text), source: "evaluator" };
        } catch (err) {
          const error =
            err instanceof QualityEvaluationError
              ? err
              : new QualityEvaluationError(toErrorMessage(err), { cause: err });
          reason = error.message;
          logger?.logWarning({
            timestamp: nowIso(),
            runId,
            message: "Quality evaluator failed; using heuristic",
            details: { error: error.message },
          });
        }
      }

      try {
        const score = heuristic(text);
        if (!Number.isFinite(score)) {
          throw new QualityEvaluationError(`Heuristic returned ${String(score)}`);
        }
        return { score: clampScore(score), source: "heuristic", error: reason };
      } catch (err) {
        const message = toErrorMessage(err);
        logger?.logError({
          timestamp: nowIso(),
          runId,
          error: { name: "QualityEvaluationError", kind: "quality_evaluation", message },
        });
        return { score: fallbackScore, source: "fallback", error: message };
      }
    },
  };
}
