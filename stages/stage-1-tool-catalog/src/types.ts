/**
 * Stage 1 Tool Catalog types.
 * Tools are opaque content generators; the catalog only knows their parameter names.
 */

/** JSON Schema (draft-07 style) describing a tool's arguments. */
export type JsonSchema = Record<string, unknown>;

/** Per-call information handed to a tool. */
export interface ToolCallContext {
  /** Aborted when the call times out. */
  signal: AbortSignal;
  /** 1-based attempt number within the current step. */
  attempt: number;
}

/** Single tool: name, description, parameters schema, and execute function. */
export interface Tool<TArgs = unknown, TResult = unknown> {
  /** Unique tool name (used by plans and the re-planning oracle). */
  name: string;
  description: string;
  /**
   * JSON Schema for tool arguments. Properties listed in `required` without a
   * `default` are required parameters; every other property is optional.
   */
  parameters?: JsonSchema;
  /** Tools that must run before this one within a plan. */
  dependencies?: readonly string[];
  execute(args: TArgs, context: ToolCallContext): Promise<TResult>;
}

/** Outcome of invoking a tool; recoverable failures never throw. */
export type ToolOutcome =
  | { success: true; value: unknown }
  | { success: false; error: string };

/** What the orchestrator needs from the tool layer. */
export interface ToolInvoker {
  execute(
    name: string,
    args: Record<string, unknown>,
    context?: Partial<ToolCallContext>
  ): Promise<ToolOutcome>;
}

/** Tool registry: register tools by name, list them, execute by name. */
export interface ToolRegistry extends ToolInvoker {
  /** Register a tool; overwrites if name already exists. */
  register(tool: Tool): void;
  get(name: string): Tool | undefined;
  has(name: string): boolean;
  list(): Tool[];
}

/** Parameter names of one tool, in declaration order. */
export interface ToolSpec {
  readonly name: string;
  readonly requiredParams: readonly string[];
  readonly optionalParams: readonly string[];
  readonly dependencies?: readonly string[];
}

/** Read-only lookup of tool parameter names, shared across runs. */
export interface ToolCatalog {
  /** Required parameter names; empty for an unregistered tool. */
  requiredArgs(name: string): readonly string[];
  /** Optional parameter names; empty for an unregistered tool. */
  optionalArgs(name: string): readonly string[];
  /** Tools that must have run first; empty for an unregistered tool. */
  dependenciesOf(name: string): readonly string[];
  has(name: string): boolean;
  get(name: string): ToolSpec | undefined;
  names(): readonly string[];
}

export interface ValidationResult {
  valid: boolean;
  errors?: string[];
}
