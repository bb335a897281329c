/**
 * Stage 4 Quality Gate types.
 */

import type { EngineLogger } from "../../stage-0-runtime/src/index.js";

/** External scoring collaborator; may throw or hang. */
export interface QualityEvaluator {
  score(text: string, options: { signal: AbortSignal }): Promise<number> | number;
}

export interface QualityVerdict {
  /** In [0, 10]. */
  score: number;
  source: "evaluator" | "heuristic" | "fallback";
  /** Why the evaluator (or heuristic) was not used, if it was not. */
  error?: string;
}

export interface QualityGateConfig {
  evaluator?: QualityEvaluator;
  /** Per evaluation call; non-positive disables the timer. */
  timeoutMs?: number;
  /** Local scorer used when the evaluator is missing or fails. */
  heuristic?: (text: string) => number;
  /**
   * Returned when both evaluator and heuristic fail. Default 0. Must stay
   * below `passThreshold` when that is set.
   */
  fallbackScore?: number;
  /** Lowest passing score; the orchestrator sets it to its minQualityScore. */
  passThreshold?: number;
  /** Word count below which the default heuristic penalizes length. */
  minWords?: number;
  logger?: EngineLogger;
}

export interface QualityGate {
  /** Never rejects. */
  score(text: string, runId?: string): Promise<QualityVerdict>;
}

export interface CorrectionPolicy {
  minQualityScore: number;
  maxQualitySteps: number;
  /** Corrective steps already enqueued in this run. */
  qualityStepsTaken: number;
}
