import { describe, expect, it } from "vitest";
import {
  effectiveLogLevel,
  loadEngineConfig,
  toOrchestratorOptions,
} from "./index.js";

describe("loadEngineConfig", () => {
  it("applies defaults for unset variables", () => {
    expect(loadEngineConfig({})).toEqual({
      maxSteps: 5,
      maxQualitySteps: 3,
      minQualityScore: 8.5,
      maxToolRetries: 2,
      retryBackoffMs: 200,
      toolTimeoutMs: 30000,
      qualityTimeoutMs: 15000,
      logLevel: "info",
      showArgs: false,
    });
  });

  it("coerces values from strings", () => {
    const config = loadEngineConfig({
      MAX_STEPS: "7",
      MIN_QUALITY_SCORE: " 9.25 ",
      LOG_LEVEL: "debug",
      AGENT_SHOW_ARGS: "1",
      TOOL_TIMEOUT_MS: "",
    });
    expect(config.maxSteps).toBe(7);
    expect(config.minQualityScore).toBe(9.25);
    expect(config.logLevel).toBe("debug");
    expect(config.showArgs).toBe(true);
    expect(config.toolTimeoutMs).toBe(30000);
    expect(Object.isFrozen(config)).toBe(true);
  });

  it("rejects invalid values", () => {
    expect(() => loadEngineConfig({ MAX_STEPS: "0" })).toThrow(
      "Invalid engine configuration: /MAX_STEPS must be >= 1"
    );
    expect(() => loadEngineConfig({ MAX_TOOL_RETRIES: "many" })).toThrow(
      "/MAX_TOOL_RETRIES must be integer"
    );
    expect(() => loadEngineConfig({ LOG_LEVEL: "loud" })).toThrow(
      "/LOG_LEVEL must be equal to one of the allowed values"
    );
  });
});

describe("toOrchestratorOptions", () => {
  it("maps limits onto orchestrator options", () => {
    const config = loadEngineConfig({ MAX_QUALITY_STEPS: "1", RETRY_BACKOFF_MS: "0" });
    expect(toOrchestratorOptions(config)).toEqual({
      maxSteps: 5,
      maxQualitySteps: 1,
      minQualityScore: 8.5,
      maxToolRetries: 2,
      retryBackoffMs: 0,
      toolTimeoutMs: 30000,
      qualityTimeoutMs: 15000,
    });
  });
});

describe("effectiveLogLevel", () => {
  it("raises the level to debug when arguments should be shown", () => {
    expect(effectiveLogLevel(loadEngineConfig({ AGENT_SHOW_ARGS: "true" }))).toBe("debug");
    expect(effectiveLogLevel(loadEngineConfig({ LOG_LEVEL: "warn" }))).toBe("warn");
    expect(
      effectiveLogLevel(loadEngineConfig({ LOG_LEVEL: "silent", AGENT_SHOW_ARGS: "1" }))
    ).toBe("silent");
  });
});
