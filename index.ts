/**
 * Public entry: every stage, leaves first, plus environment configuration.
 */

export * from "./stages/stage-0-runtime/src/index.js";
export * from "./stages/stage-1-tool-catalog/src/index.js";
export * from "./stages/stage-2-arg-resolver/src/index.js";
export * from "./stages/stage-3-plan-translator/src/index.js";
export * from "./stages/stage-4-quality-gate/src/index.js";
export * from "./stages/stage-5-orchestrator/src/index.js";
export * from "./config/index.js";
