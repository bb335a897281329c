export { createToolRegistry } from "./registry.js";
export {
  buildToolCatalog,
  createToolCatalog,
  introspectParameters,
} from "./catalog.js";
export {
  createAjv,
  formatAjvErrors,
  validateAgainstSchema,
  validateToolArgs,
} from "./validate.js";
export type {
  JsonSchema,
  Tool,
  ToolCallContext,
  ToolCatalog,
  ToolInvoker,
  ToolOutcome,
  ToolRegistry,
  ToolSpec,
  ValidationResult,
} from "./types.js";
