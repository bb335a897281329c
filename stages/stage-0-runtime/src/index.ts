export {
  createConsoleLogger,
  createSilentLogger,
  isLogLevel,
  nowIso,
} from "./logger.js";
export { computeBackoff, withRetry, withTimeout } from "./retry.js";
export {
  EngineError,
  MissingRequiredArgumentError,
  QualityEvaluationError,
  RePlanningError,
  ToolExecutionError,
  ToolTimeoutError,
  errorKindOf,
  toErrorMessage,
} from "./errors.js";
export type { ErrorKind } from "./errors.js";
export type {
  EngineLogger,
  ErrorLog,
  LogLevel,
  ResolutionLog,
  RetryOptions,
  RunStatus,
  StepLog,
  TransitionLog,
  WarningLog,
} from "./types.js";
