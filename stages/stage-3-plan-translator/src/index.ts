export { parseDecision, DECISION_SCHEMAS } from "./decision.js";
export { extractJsonObject } from "./parse.js";
export {
  clampConfidence,
  planFromDecision,
  proposedTools,
  translateDecision,
} from "./translator.js";
export type { ExtractResult } from "./parse.js";
export type {
  DecisionKind,
  PlanStep,
  ReasoningDecision,
  StepOrigin,
  TranslateOptions,
} from "./types.js";
