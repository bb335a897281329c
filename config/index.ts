import "dotenv/config";

import {
  createConsoleLogger,
  isLogLevel,
  type EngineLogger,
  type LogLevel,
} from "../stages/stage-0-runtime/src/index.js";
import {
  createAjv,
  formatAjvErrors,
  type JsonSchema,
} from "../stages/stage-1-tool-catalog/src/index.js";
import type { OrchestratorOptions } from "../stages/stage-5-orchestrator/src/index.js";

export interface EngineConfig {
  maxSteps: number;
  maxQualitySteps: number;
  minQualityScore: number;
  maxToolRetries: number;
  retryBackoffMs: number;
  toolTimeoutMs: number;
  qualityTimeoutMs: number;
  logLevel: LogLevel;
  /** Print every resolved argument set (debug resolution logs). */
  showArgs: boolean;
}

export type EngineEnv = Readonly<Record<string, string | undefined>>;

// 环境变量 schema：ajv 负责类型转换与默认值
export const ENGINE_ENV_SCHEMA: JsonSchema = {
  type: "object",
  properties: {
    MAX_STEPS: { type: "integer", minimum: 1, default: 5 },
    MAX_QUALITY_STEPS: { type: "integer", minimum: 0, default: 3 },
    MIN_QUALITY_SCORE: { type: "number", minimum: 0, maximum: 10, default: 8.5 },
    MAX_TOOL_RETRIES: { type: "integer", minimum: 0, default: 2 },
    RETRY_BACKOFF_MS: { type: "integer", minimum: 0, default: 200 },
    TOOL_TIMEOUT_MS: { type: "integer", minimum: 0, default: 30000 },
    QUALITY_TIMEOUT_MS: { type: "integer", minimum: 0, default: 15000 },
    LOG_LEVEL: {
      type: "string",
      enum: ["silent", "error", "warn", "info", "debug"],
      default: "info",
    },
    AGENT_SHOW_ARGS: {
      type: "string",
      enum: ["0", "1", "true", "false"],
      default: "0",
    },
  },
};

const ENV_KEYS = [
  "MAX_STEPS",
  "MAX_QUALITY_STEPS",
  "MIN_QUALITY_SCORE",
  "MAX_TOOL_RETRIES",
  "RETRY_BACKOFF_MS",
  "TOOL_TIMEOUT_MS",
  "QUALITY_TIMEOUT_MS",
  "LOG_LEVEL",
  "AGENT_SHOW_ARGS",
] as const;

const envAjv = createAjv({ coerceTypes: true, useDefaults: true });

function readNumber(data: Record<string, unknown>, key: string): number {
  const value = data[key];
  if (typeof value !== "number") {
    throw new Error(`Invalid engine configuration: ${key} is not a number`);
  }
  return value;
}

function readString(data: Record<string, unknown>, key: string): string {
  const value = data[key];
  if (typeof value !== "string") {
    throw new Error(`Invalid engine configuration: ${key} is not a string`);
  }
  return value;
}

// 从 .env / process.env 读取引擎配置，避免在调用处直接读取环境变量
export function loadEngineConfig(env: EngineEnv = process.env): Readonly<EngineConfig> {
  const data: Record<string, unknown> = {};
  for (const key of ENV_KEYS) {
    const value = env[key]?.trim();
    if (value) {
      data[key] = value;
    }
  }

  if (!envAjv.validate(ENGINE_ENV_SCHEMA, data)) {
    throw new Error(
      `Invalid engine configuration: ${formatAjvErrors(envAjv.errors).join("; ")}`
    );
  }

  const logLevel = readString(data, "LOG_LEVEL");
  if (!isLogLevel(logLevel)) {
    throw new Error(`Invalid engine configuration: unknown LOG_LEVEL ${logLevel}`);
  }
  const showArgs = readString(data, "AGENT_SHOW_ARGS");

  return Object.freeze({
    maxSteps: readNumber(data, "MAX_STEPS"),
    maxQualitySteps: readNumber(data, "MAX_QUALITY_STEPS"),
    minQualityScore: readNumber(data, "MIN_QUALITY_SCORE"),
    maxToolRetries: readNumber(data, "MAX_TOOL_RETRIES"),
    retryBackoffMs: readNumber(data, "RETRY_BACKOFF_MS"),
    toolTimeoutMs: readNumber(data, "TOOL_TIMEOUT_MS"),
    qualityTimeoutMs: readNumber(data, "QUALITY_TIMEOUT_MS"),
    logLevel,
    showArgs: showArgs === "1" || showArgs === "true",
  });
}

export function toOrchestratorOptions(config: EngineConfig): OrchestratorOptions {
  return {
    maxSteps: config.maxSteps,
    maxQualitySteps: config.maxQualitySteps,
    minQualityScore: config.minQualityScore,
    maxToolRetries: config.maxToolRetries,
    retryBackoffMs: config.retryBackoffMs,
    toolTimeoutMs: config.toolTimeoutMs,
    qualityTimeoutMs: config.qualityTimeoutMs,
  };
}

/** Level the console logger should run at; `showArgs` lifts it to debug. */
export function effectiveLogLevel(config: EngineConfig): LogLevel {
  if (config.showArgs && config.logLevel !== "silent") {
    return "debug";
  }
  return config.logLevel;
}

export function createEngineLogger(config: EngineConfig): EngineLogger {
  return createConsoleLogger(effectiveLogLevel(config));
}
