/**
 * Stage 5 Orchestrator types.
 * One run: queue of plan steps -> append-only History, driven by a small state machine.
 */

import type {
  EngineLogger,
  ErrorKind,
  RunStatus,
  TransitionLog,
} from "../../stage-0-runtime/src/index.js";
import type {
  ToolCatalog,
  ToolInvoker,
} from "../../stage-1-tool-catalog/src/index.js";
import type {
  ArgResolver,
  MemoryStore,
  ResolutionTables,
  ResolvedArgs,
} from "../../stage-2-arg-resolver/src/index.js";
import type { StepOrigin } from "../../stage-3-plan-translator/src/index.js";
import type {
  QualityEvaluator,
  QualityGate,
  QualityVerdict,
} from "../../stage-4-quality-gate/src/index.js";

/** Immutable per-run input context. */
export type ContextSnapshot = Readonly<Record<string, unknown>>;

/** Decision-making collaborator consulted after each step; output is untrusted. */
export interface ReplanningOracle {
  decideNext(userInput: string, context: ContextSnapshot): Promise<unknown> | unknown;
}

export type StepResult =
  | { ok: true; value: unknown }
  | {
      ok: false;
      error: {
        kind: ErrorKind;
        message: string;
        /** Set when the step could not be resolved. */
        missing?: string[];
      };
    };

/** One entry of the History returned by `run`. Frozen once appended. */
export interface ExecutionRecord {
  readonly index: number;
  readonly toolName: string;
  readonly origin: StepOrigin;
  readonly resolvedArgs: Readonly<ResolvedArgs>;
  readonly result: StepResult;
  /** 0 for a step that never reached the tool. */
  readonly attempts: number;
  readonly durationMs: number;
  readonly qualityScore?: QualityVerdict;
}

export type StopReason =
  | "queue_exhausted"
  | "duplicate_tool"
  | "step_budget"
  | "replan_error"
  | "unresolvable_arguments"
  | "deadline";

export interface OrchestratorOptions {
  /** Executed steps per run. Default 5. */
  maxSteps?: number;
  /** Corrective steps per run. Default 3. */
  maxQualitySteps?: number;
  /** Scores below this enqueue a corrective step. Default 8.5. */
  minQualityScore?: number;
  /** Extra attempts after a failed tool call. Default 2. */
  maxToolRetries?: number;
  retryBackoffMs?: number;
  retryMaxBackoffMs?: number;
  toolTimeoutMs?: number;
  qualityTimeoutMs?: number;
  /** Runs when the plan is empty. Default "chat_response". */
  conversationTool?: string;
  /** Inserted once per run when arguments cannot be resolved. Default "clarify". */
  clarificationTool?: string;
  /** Corrective tool when the oracle names none. Default "revise_for_clarity". */
  improvementTool?: string;
  /** Utterance sent to the oracle to pick a corrective tool. Default "Improve quality". */
  qualityIntent?: string;
  /** Seeded into the working context as `user_id`. */
  userId?: string;
}

export interface OrchestratorDeps {
  catalog: ToolCatalog;
  tools: ToolInvoker;
  oracle: ReplanningOracle;
  /** Ignored when `qualityGate` is given. */
  evaluator?: QualityEvaluator;
  qualityGate?: QualityGate;
  /** Ignored when `resolver` is given. */
  memory?: MemoryStore;
  /** Ignored when `resolver` is given. */
  tables?: ResolutionTables;
  resolver?: ArgResolver;
  logger?: EngineLogger;
  runStore?: RunStore;
}

export interface RunOptions {
  /** Epoch milliseconds; checked between steps. */
  deadline?: number;
  /** Checked between steps, like `deadline`. */
  signal?: AbortSignal;
  runId?: string;
}

export interface RunResult {
  runId: string;
  status: "DONE" | "ABORTED";
  stopReason: StopReason;
  /** History; never empty. */
  steps: readonly ExecutionRecord[];
  stepsExecuted: number;
  qualityStepsTaken: number;
  clarificationInserted: boolean;
  /** Final working context. */
  context: ContextSnapshot;
}

/** Persisted view of a run, for audit and inspection. */
export interface RunSnapshot {
  runId: string;
  userInput: string;
  status: RunStatus;
  startedAt: string;
  finishedAt?: string;
  stopReason?: StopReason;
  stepsExecuted: number;
  qualityStepsTaken: number;
  /** In order, starting from PENDING. */
  transitions: readonly TransitionLog[];
}

export interface RunStore {
  get(runId: string): RunSnapshot | undefined;
  set(snapshot: RunSnapshot): void;
  /** Oldest first. */
  list(): RunSnapshot[];
  delete(runId: string): boolean;
}

export interface Orchestrator {
  /**
   * Execute a plan to completion. `planHint` is a reasoning decision in any
   * accepted shape; `undefined` asks the oracle for the first decision.
   * Never rejects for tool, quality or oracle failures.
   */
  run(
    planHint: unknown,
    userInput: string,
    context: ContextSnapshot,
    options?: RunOptions
  ): Promise<RunResult>;
}
