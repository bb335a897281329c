export {
  DEFAULT_TEXT_KEYS,
  createQualityGate,
  extractArtifactText,
  shouldCorrect,
} from "./gate.js";
export {
  DEFAULT_MIN_WORDS,
  clampScore,
  heuristicScore,
  tokenize,
} from "./heuristic.js";
export type {
  CorrectionPolicy,
  QualityEvaluator,
  QualityGate,
  QualityGateConfig,
  QualityVerdict,
} from "./types.js";
