/**
 * Stage 5 Orchestrator: run a plan step by step, re-planning after each step.
 *
 * PENDING -> RUNNING -> AWAITING_REPLAN -> (RUNNING | DONE); an argument
 * failure that survives one clarification step ends the run in ABORTED.
 * Tool, quality and oracle failures are recorded and never end a run early.
 */

import {
  RePlanningError,
  ToolExecutionError,
  createSilentLogger,
  errorKindOf,
  nowIso,
  toErrorMessage,
  withRetry,
  withTimeout,
} from "../../stage-0-runtime/src/index.js";
import type {
  MissingRequiredArgumentError,
  RunStatus,
  TransitionLog,
} from "../../stage-0-runtime/src/index.js";
import { createArgResolver } from "../../stage-2-arg-resolver/src/index.js";
import type { ResolvedArgs } from "../../stage-2-arg-resolver/src/index.js";
import { planFromDecision } from "../../stage-3-plan-translator/src/index.js";
import type {
  PlanStep,
  StepOrigin,
} from "../../stage-3-plan-translator/src/index.js";
import {
  createQualityGate,
  extractArtifactText,
  shouldCorrect,
} from "../../stage-4-quality-gate/src/index.js";
import type { QualityVerdict } from "../../stage-4-quality-gate/src/index.js";
import type {
  ContextSnapshot,
  ExecutionRecord,
  Orchestrator,
  OrchestratorDeps,
  OrchestratorOptions,
  RunOptions,
  RunResult,
  StepResult,
  StopReason,
} from "./types.js";

export const DEFAULT_ORCHESTRATOR_OPTIONS = Object.freeze({
  maxSteps: 5,
  maxQualitySteps: 3,
  minQualityScore: 8.5,
  maxToolRetries: 2,
  retryBackoffMs: 200,
  retryMaxBackoffMs: 2000,
  toolTimeoutMs: 30000,
  qualityTimeoutMs: 15000,
  conversationTool: "chat_response",
  clarificationTool: "clarify",
  improvementTool: "revise_for_clarity",
  qualityIntent: "Improve quality",
});

type NumericOption =
  | "maxSteps"
  | "maxQualitySteps"
  | "maxToolRetries"
  | "retryBackoffMs"
  | "retryMaxBackoffMs"
  | "toolTimeoutMs"
  | "qualityTimeoutMs";

const WHOLE_NUMBER_OPTIONS: ReadonlyArray<readonly [NumericOption, number]> = [
  ["maxSteps", 1],
  ["maxQualitySteps", 0],
  ["maxToolRetries", 0],
];

const DURATION_OPTIONS: readonly NumericOption[] = [
  "retryBackoffMs",
  "retryMaxBackoffMs",
  "toolTimeoutMs",
  "qualityTimeoutMs",
];

const NAME_OPTIONS = [
  "conversationTool",
  "clarificationTool",
  "improvementTool",
  "qualityIntent",
] as const;

function invalidOption(name: string, value: unknown, expected: string): Error {
  return new Error(
    `Invalid orchestrator option ${name}: ${String(value)} (expected ${expected})`
  );
}

/** Throws on options that would leave a run without a usable budget. */
export function assertValidOrchestratorOptions(
  opts: Required<Omit<OrchestratorOptions, "userId">>
): void {
  for (const [name, min] of WHOLE_NUMBER_OPTIONS) {
    const value = opts[name];
    if (!Number.isInteger(value) || value < min) {
      throw invalidOption(name, value, `an integer >= ${min}`);
    }
  }
  for (const name of DURATION_OPTIONS) {
    const value = opts[name];
    if (!Number.isFinite(value) || value < 0) {
      throw invalidOption(name, value, "a finite number >= 0");
    }
  }
  const score = opts.minQualityScore;
  if (!Number.isFinite(score) || score < 0 || score > 10) {
    throw invalidOption("minQualityScore", score, "a number in [0, 10]");
  }
  for (const name of NAME_OPTIONS) {
    const value = opts[name];
    if (typeof value !== "string" || !value.trim()) {
      throw invalidOption(name, value, "a non-empty string");
    }
  }
}

function generateRunId(): string {
  return `run_${Date.now().toString(36)}_${Math.random()
    .toString(36)
    .slice(2, 10)}`;
}

type Replan =
  | { ok: true; plan: PlanStep[] }
  | { ok: false; error: RePlanningError };

export function createOrchestrator(
  deps: OrchestratorDeps,
  options: OrchestratorOptions = {}
): Orchestrator {
  const opts = { ...DEFAULT_ORCHESTRATOR_OPTIONS, ...options };
  assertValidOrchestratorOptions(opts);
  const { catalog, tools, oracle, runStore } = deps;
  const logger = deps.logger ?? createSilentLogger();
  const resolver =
    deps.resolver ??
    createArgResolver({
      catalog,
      tables: deps.tables,
      memory: deps.memory,
      logger,
    });
  const qualityGate =
    deps.qualityGate ??
    createQualityGate({
      evaluator: deps.evaluator,
      timeoutMs: opts.qualityTimeoutMs,
      passThreshold: opts.minQualityScore,
      logger,
    });

  /** Ask the oracle what to do next; failures become "no further work". */
  async function consultOracle(
    intent: string,
    context: Record<string, unknown>,
    runId: string,
    completed: ReadonlySet<string>,
    origin: StepOrigin = "replan"
  ): Promise<Replan> {
    try {
      const raw = await oracle.decideNext(intent, Object.freeze({ ...context }));
      const { decision, plan } = planFromDecision(raw, {
        catalog,
        logger,
        runId,
        origin,
        completed,
      });
      if (decision.kind === "unparseable") {
        logger.logWarning({
          timestamp: nowIso(),
          runId,
          message: "Unparseable oracle decision; treating as conversation",
          details: { errors: decision.errors, raw: decision.raw },
        });
      }
      return { ok: true, plan };
    } catch (err) {
      const error = new RePlanningError(toErrorMessage(err), { cause: err });
      logger.logWarning({
        timestamp: nowIso(),
        runId,
        message: "Re-planning oracle failed; no further work",
        details: { intent, error: error.message },
      });
      return { ok: false, error };
    }
  }

  async function initialPlan(
    planHint: unknown,
    userInput: string,
    context: Record<string, unknown>,
    runId: string
  ): Promise<PlanStep[]> {
    if (planHint === undefined) {
      const replan = await consultOracle(userInput, context, runId, new Set(), "plan");
      return replan.ok ? replan.plan : [];
    }
    const { decision, plan } = planFromDecision(planHint, {
      catalog,
      logger,
      runId,
    });
    if (decision.kind === "unparseable") {
      logger.logWarning({
        timestamp: nowIso(),
        runId,
        message: "Unparseable plan hint; falling back to conversation",
        details: { errors: decision.errors, raw: decision.raw },
      });
    }
    return plan;
  }

  function conversationStep(userInput: string): PlanStep {
    return {
      toolName: opts.conversationTool,
      suppliedArgs: { prompt: userInput },
      rationale: "Plan is empty; answering conversationally",
      confidence: 0,
      origin: "fallback",
    };
  }

  function clarificationStep(
    error: MissingRequiredArgumentError,
    userInput: string
  ): PlanStep {
    return {
      toolName: opts.clarificationTool,
      suppliedArgs: {
        question: `I need these details for ${error.toolName}: ${error.missing.join(", ")}`,
        user_input: userInput,
      },
      rationale: "Ask the user for the missing parameters",
      confidence: 0,
      origin: "clarification",
    };
  }

  async function correctiveStep(
    context: Record<string, unknown>,
    runId: string,
    completed: ReadonlySet<string>
  ): Promise<PlanStep> {
    const replan = await consultOracle(opts.qualityIntent, context, runId, completed);
    const proposed = replan.ok ? replan.plan[0]?.toolName : undefined;
    return {
      toolName: proposed ?? opts.improvementTool,
      suppliedArgs: { target_quality: opts.minQualityScore },
      rationale: "Score below the quality threshold",
      confidence: 0.9,
      origin: "quality",
    };
  }

  async function executeStep(
    step: PlanStep,
    args: ResolvedArgs,
    runId: string
  ): Promise<{ result: StepResult; attempts: number }> {
    let attempts = 0;
    const maxAttempts = opts.maxToolRetries + 1;
    try {
      const value = await withRetry(
        async (attempt) => {
          attempts = attempt;
          const outcome = await withTimeout(
            (signal) => tools.execute(step.toolName, args, { signal, attempt }),
            opts.toolTimeoutMs,
            step.toolName
          );
          if (!outcome.success) {
            throw new ToolExecutionError(step.toolName, outcome.error);
          }
          return outcome.value;
        },
        {
          maxRetries: opts.maxToolRetries,
          backoffMs: opts.retryBackoffMs,
          maxBackoffMs: opts.retryMaxBackoffMs,
          onRetry: (error, attempt) =>
            logger.logWarning({
              timestamp: nowIso(),
              runId,
              message: `Tool ${step.toolName} failed (attempt ${attempt}/${maxAttempts}); retrying`,
              details: { error: toErrorMessage(error) },
            }),
        }
      );
      return { result: { ok: true, value }, attempts };
    } catch (err) {
      return {
        result: {
          ok: false,
          error: { kind: errorKindOf(err), message: toErrorMessage(err) },
        },
        attempts,
      };
    }
  }

  return {
    async run(
      planHint: unknown,
      userInput: string,
      contextSnapshot: ContextSnapshot,
      runOptions: RunOptions = {}
    ): Promise<RunResult> {
      const runId = runOptions.runId ?? generateRunId();
      const context: Record<string, unknown> = { ...contextSnapshot };
      if (opts.userId !== undefined && !Object.hasOwn(context, "user_id")) {
        context.user_id = opts.userId;
      }

      const steps: ExecutionRecord[] = [];
      const executed = new Set<string>();
      let stepsExecuted = 0;
      let qualityStepsTaken = 0;
      let clarificationInserted = false;
      let status: RunStatus = "PENDING";
      let stopReason: StopReason = "queue_exhausted";
      let finishedAt: string | undefined;
      const startedAt = nowIso();
      const transitions: TransitionLog[] = [];

      function persist(): void {
        runStore?.set({
          runId,
          userInput,
          status,
          startedAt,
          finishedAt,
          stopReason: finishedAt ? stopReason : undefined,
          stepsExecuted,
          qualityStepsTaken,
          transitions,
        });
      }

      function transition(to: RunStatus, reason?: string): void {
        if (status === to) {
          return;
        }
        const entry: TransitionLog = {
          timestamp: nowIso(),
          runId,
          from: status,
          to,
          reason,
        };
        transitions.push(entry);
        logger.logTransition(entry);
        status = to;
        persist();
      }

      function interrupted(): boolean {
        if (runOptions.signal?.aborted) {
          return true;
        }
        return runOptions.deadline !== undefined && Date.now() >= runOptions.deadline;
      }

      persist();

      const queue = await initialPlan(planHint, userInput, context, runId);
      if (queue.length === 0) {
        queue.push(conversationStep(userInput));
      }

      while (queue.length > 0 && stepsExecuted < opts.maxSteps) {
        if (stepsExecuted > 0 && interrupted()) {
          stopReason = "deadline";
          break;
        }
        const step = queue.shift();
        if (!step) {
          break;
        }
        transition("RUNNING");

        const resolution = resolver.tryResolve({
          toolName: step.toolName,
          explicitArgs: step.suppliedArgs,
          context,
          userInput,
          runId,
        });

        if (!resolution.ok) {
          const { error } = resolution;
          if (!clarificationInserted) {
            clarificationInserted = true;
            logger.logWarning({
              timestamp: nowIso(),
              runId,
              message: "Missing arguments; asking for clarification",
              details: { tool: step.toolName, missing: [...error.missing] },
            });
            queue.unshift(clarificationStep(error, userInput), step);
            continue;
          }
          const failure: ExecutionRecord = {
            index: steps.length,
            toolName: step.toolName,
            origin: step.origin,
            resolvedArgs: Object.freeze({}),
            result: {
              ok: false,
              error: {
                kind: error.kind,
                message: error.message,
                missing: [...error.missing],
              },
            },
            attempts: 0,
            durationMs: 0,
          };
          steps.push(Object.freeze(failure));
          logger.logError({
            timestamp: nowIso(),
            runId,
            error: { name: error.name, kind: error.kind, message: error.message },
            details: { tool: step.toolName },
          });
          stopReason = "unresolvable_arguments";
          break;
        }

        const args = resolution.args;
        const stepStartedAt = Date.now();
        const { result, attempts } = await executeStep(step, args, runId);
        const durationMs = Date.now() - stepStartedAt;

        stepsExecuted += 1;
        executed.add(step.toolName);
        // args of engine-inserted steps stay out of the context
        if (step.origin !== "clarification" && step.origin !== "fallback") {
          Object.assign(context, args);
        }
        context[step.toolName] = result.ok ? result.value : null;

        let verdict: QualityVerdict | undefined;
        if (
          result.ok &&
          step.origin !== "fallback" &&
          step.origin !== "clarification"
        ) {
          const text = extractArtifactText(result.value);
          if (text) {
            verdict = await qualityGate.score(text, runId);
            context.quality_score = verdict.score;
          }
        }

        const record: ExecutionRecord = {
          index: steps.length,
          toolName: step.toolName,
          origin: step.origin,
          resolvedArgs: Object.freeze({ ...args }),
          result,
          attempts,
          durationMs,
          ...(verdict ? { qualityScore: verdict } : {}),
        };
        steps.push(Object.freeze(record));
        logger.logStep({
          timestamp: nowIso(),
          runId,
          stepIndex: steps.length - 1,
          toolName: step.toolName,
          origin: step.origin,
          attempts,
          durationMs,
          ok: result.ok,
          error: result.ok ? undefined : result.error.message,
          qualityScore: verdict?.score,
        });
        transition("AWAITING_REPLAN");

        if (
          verdict &&
          // a fallback verdict never passes, whatever score the gate attached
          shouldCorrect(verdict.source === "fallback" ? 0 : verdict.score, {
            minQualityScore: opts.minQualityScore,
            maxQualitySteps: opts.maxQualitySteps,
            qualityStepsTaken,
          })
        ) {
          queue.push(await correctiveStep(context, runId, executed));
          qualityStepsTaken += 1;
        }

        if (stepsExecuted >= opts.maxSteps) {
          stopReason = "step_budget";
          break;
        }

        const replan = await consultOracle(userInput, context, runId, executed);
        if (!replan.ok) {
          if (queue.length === 0) {
            stopReason = "replan_error";
            break;
          }
          continue;
        }

        const repeated = replan.plan.filter((next) => executed.has(next.toolName));
        if (repeated.length > 0) {
          logger.logWarning({
            timestamp: nowIso(),
            runId,
            message: "Oracle re-proposed an executed tool; stopping",
            details: { tools: repeated.map((next) => next.toolName) },
          });
          stopReason = "duplicate_tool";
          break;
        }
        for (const next of replan.plan) {
          if (!queue.some((queued) => queued.toolName === next.toolName)) {
            queue.push(next);
          }
        }
        if (queue.length === 0) {
          stopReason = "queue_exhausted";
          break;
        }
      }

      const finalStatus =
        stopReason === "unresolvable_arguments" || stopReason === "deadline"
          ? "ABORTED"
          : "DONE";
      finishedAt = nowIso();
      transition(finalStatus, stopReason);

      return {
        runId,
        status: finalStatus,
        stopReason,
        steps: Object.freeze([...steps]),
        stepsExecuted,
        qualityStepsTaken,
        clarificationInserted,
        context: Object.freeze({ ...context }),
      };
    },
  };
}
