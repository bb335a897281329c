import type {
  EngineLogger,
  ErrorLog,
  LogLevel,
  ResolutionLog,
  StepLog,
  TransitionLog,
  WarningLog,
} from "./types.js";

const LEVEL_RANK: Record<LogLevel, number> = {
  silent: 0,
  error: 1,
  warn: 2,
  info: 3,
  debug: 4,
};

function toJson(entry: object): string {
  return JSON.stringify(entry, (_key, value: unknown) =>
    typeof value === "bigint" ? value.toString() : value
  );
}

export function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_RANK;
}

export function createConsoleLogger(level: LogLevel = "info"): EngineLogger {
  const rank = LEVEL_RANK[level];

  return {
    logStep(entry: StepLog) {
      if (rank >= LEVEL_RANK.info) {
        console.log(toJson({ event: "step", ...entry }));
      }
    },
    logTransition(entry: TransitionLog) {
      if (rank >= LEVEL_RANK.info) {
        console.log(toJson({ event: "transition", ...entry }));
      }
    },
    logResolution(entry: ResolutionLog) {
      if (rank >= LEVEL_RANK.debug) {
        console.log(toJson({ event: "resolution", ...entry }));
      }
    },
    logWarning(entry: WarningLog) {
      if (rank >= LEVEL_RANK.warn) {
        console.error(toJson({ event: "warning", ...entry }));
      }
    },
    logError(entry: ErrorLog) {
      if (rank >= LEVEL_RANK.error) {
        console.error(toJson({ event: "error", ...entry }));
      }
    },
  };
}

export function createSilentLogger(): EngineLogger {
  return createConsoleLogger("silent");
}

export function nowIso(): string {
  return new Date().toISOString();
}
