/**
 * Stage 0 Runtime types.
 * Structured log entries and retry policy shared by every later stage.
 */

export type LogLevel = "silent" | "error" | "warn" | "info" | "debug";

/** Lifecycle states of one orchestration run. */
export type RunStatus =
  | "PENDING"
  | "RUNNING"
  | "AWAITING_REPLAN"
  | "DONE"
  | "ABORTED";

export interface StepLog {
  timestamp: string;
  runId: string;
  stepIndex: number;
  toolName: string;
  origin: string;
  attempts: number;
  durationMs: number;
  ok: boolean;
  error?: string;
  qualityScore?: number;
}

export interface TransitionLog {
  timestamp: string;
  runId: string;
  from: RunStatus;
  to: RunStatus;
  reason?: string;
}

export interface ResolutionLog {
  timestamp: string;
  runId?: string;
  toolName: string;
  /** Parameter name -> source that satisfied it. */
  sources: Record<string, string>;
  resolved: Record<string, unknown>;
}

export interface WarningLog {
  timestamp: string;
  runId?: string;
  message: string;
  details?: Record<string, unknown>;
}

export interface ErrorLog {
  timestamp: string;
  runId?: string;
  error: {
    name: string;
    kind?: string;
    message: string;
  };
  details?: Record<string, unknown>;
}

/** Sink for engine diagnostics; every method must be safe to call at any time. */
export interface EngineLogger {
  logStep(entry: StepLog): void;
  logTransition(entry: TransitionLog): void;
  /** Only emitted at debug level: which source satisfied each parameter. */
  logResolution(entry: ResolutionLog): void;
  logWarning(entry: WarningLog): void;
  logError(entry: ErrorLog): void;
}

export interface RetryOptions {
  /** Additional attempts after the first one. */
  maxRetries: number;
  backoffMs: number;
  maxBackoffMs?: number;
  /** Fraction of the delay used as +/- random spread. */
  jitter?: number;
  /** Called after each failed attempt that will be retried. */
  onRetry?: (error: unknown, attempt: number) => void;
}
