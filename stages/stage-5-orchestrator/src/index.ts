export {
  DEFAULT_ORCHESTRATOR_OPTIONS,
  assertValidOrchestratorOptions,
  createOrchestrator,
} from "./orchestrator.js";
export { createRunStore } from "./state.js";
export type {
  ContextSnapshot,
  ExecutionRecord,
  Orchestrator,
  OrchestratorDeps,
  OrchestratorOptions,
  ReplanningOracle,
  RunOptions,
  RunResult,
  RunSnapshot,
  RunStore,
  StepResult,
  StopReason,
} from "./types.js";
