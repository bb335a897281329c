/**
 * Error taxonomy of the engine. Only a repeated MissingRequiredArgumentError
 * is fatal to a run; every other kind is recorded and the run continues.
 */

export type ErrorKind =
  | "missing_required_argument"
  | "tool_execution"
  | "tool_timeout"
  | "quality_evaluation"
  | "replanning";

export abstract class EngineError extends Error {
  abstract readonly kind: ErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class MissingRequiredArgumentError extends EngineError {
  readonly kind = "missing_required_argument";
  readonly toolName: string;
  readonly missing: readonly string[];

  constructor(toolName: string, missing: readonly string[]) {
    super(`Missing required args for ${toolName}: ${missing.join(", ")}`);
    this.toolName = toolName;
    this.missing = Object.freeze([...missing]);
  }
}

export class ToolExecutionError extends EngineError {
  readonly kind: ErrorKind = "tool_execution";
  readonly toolName: string;

  constructor(toolName: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.toolName = toolName;
  }
}

export class ToolTimeoutError extends ToolExecutionError {
  override readonly kind: ErrorKind = "tool_timeout";
  readonly timeoutMs: number;

  constructor(label: string, timeoutMs: number) {
    super(label, `${label} timed out after ${timeoutMs}ms`);
    this.timeoutMs = timeoutMs;
  }
}

export class QualityEvaluationError extends EngineError {
  readonly kind = "quality_evaluation";
}

export class RePlanningError extends EngineError {
  readonly kind = "replanning";
}

export function toErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === "string") {
    return error;
  }
  try {
    return JSON.stringify(error) ?? String(error);
  } catch {
    return String(error);
  }
}

export function errorKindOf(error: unknown): ErrorKind {
  return error instanceof EngineError ? error.kind : "tool_execution";
}
