/**
 * Stage 3 Plan Translator types.
 * Oracle output is untrusted: it is parsed into a tagged decision before use.
 */

import type { EngineLogger } from "../../stage-0-runtime/src/index.js";
import type { ToolCatalog } from "../../stage-1-tool-catalog/src/index.js";

/** Why a step is in the queue. */
export type StepOrigin =
  | "plan"
  | "fallback"
  | "clarification"
  | "quality"
  | "replan";

/** One proposed tool invocation. */
export interface PlanStep {
  toolName: string;
  suppliedArgs: Record<string, unknown>;
  rationale: string;
  /** In [0, 1]. */
  confidence: number;
  origin: StepOrigin;
}

export type ReasoningDecision =
  | {
      kind: "execute_one";
      toolName: string;
      args?: Record<string, unknown>;
      rationale?: string;
      confidence?: number;
    }
  | {
      kind: "run_sequence";
      sequence: string[];
      args?: Record<string, unknown>;
      rationale?: string;
      confidence?: number;
    }
  | {
      kind: "conversational_fallback";
      reply?: string;
      rationale?: string;
    }
  | {
      /** Anything that could not be read as one of the kinds above. */
      kind: "unparseable";
      raw: string;
      errors: string[];
    };

export type DecisionKind = ReasoningDecision["kind"];

export interface TranslateOptions {
  /**
   * When given, tool names the catalog does not know are dropped, and so are
   * tools whose declared dependencies are unmet.
   */
  catalog?: ToolCatalog;
  /** Tools already run; they satisfy dependencies. */
  completed?: Iterable<string>;
  logger?: EngineLogger;
  runId?: string;
  /** Origin stamped on the produced steps (default "plan"). */
  origin?: StepOrigin;
}
