/**
 * Stage 2 Argument Resolver types.
 * Parameters are filled from layered sources; the lookup tables are plain data.
 */

import type { EngineLogger } from "../../stage-0-runtime/src/index.js";
import type { MissingRequiredArgumentError } from "../../stage-0-runtime/src/index.js";
import type { ToolCatalog } from "../../stage-1-tool-catalog/src/index.js";

export type ResolvedArgs = Record<string, unknown>;

/** Where a role candidate value is read from. */
export type RoleSource =
  | { from: "context"; key: string }
  | { from: "user_input" }
  | { from: "memory"; key: string };

/** A semantic role ("the text being edited") and where to look for it. */
export interface RoleDefinition {
  role: string;
  /** Parameter names that play this role. */
  params: readonly string[];
  /** Tried in order; the first present value wins. */
  candidates: readonly RoleSource[];
}

/** Versioned lookup data used by resolution stages 3-7. */
export interface ResolutionTables {
  version: number;
  roles: readonly RoleDefinition[];
  defaults: Readonly<Record<string, unknown>>;
  /** Canonical parameter name -> historically used synonyms. */
  aliases: Readonly<Record<string, readonly string[]>>;
  /**
   * Text-like parameter names. The first required one still missing after
   * aliases takes the raw user input; empty turns this off.
   */
  userInputFallback: readonly string[];
  /** Last-resort values, applied after everything else. */
  fallbacks: Readonly<Record<string, unknown>>;
}

/** Rewrites a resolved value before the tool sees it. */
export type ArgFormatter = (value: unknown) => unknown;

/** Read-only view of the memory/profile store. */
export interface MemoryStore {
  get(key: string, fallback?: unknown): unknown;
}

/** Which stage satisfied a parameter. */
export type ResolutionSource =
  | "explicit"
  | "context"
  | "context_flat"
  | "user_input"
  | "default"
  | `role:${string}`
  | `memory:${string}`
  | `alias:${string}`;

export interface ResolveRequest {
  toolName: string;
  /** Planner/caller supplied arguments; highest priority. */
  explicitArgs?: Readonly<Record<string, unknown>>;
  context?: Readonly<Record<string, unknown>>;
  /** Free-text user utterance. */
  userInput?: string;
  /** Only used to tag diagnostic logs. */
  runId?: string;
}

export interface ResolutionReport {
  args: ResolvedArgs;
  sources: Record<string, ResolutionSource>;
}

export type ResolutionResult =
  | ({ ok: true } & ResolutionReport)
  | { ok: false; error: MissingRequiredArgumentError };

export interface ArgResolver {
  /** Resolve or throw MissingRequiredArgumentError. */
  resolve(request: ResolveRequest): ResolvedArgs;
  /** Same as `resolve`, plus the source of every parameter. */
  resolveWithDiagnostics(request: ResolveRequest): ResolutionReport;
  /** Never throws; a missing required parameter is returned as the error variant. */
  tryResolve(request: ResolveRequest): ResolutionResult;
}

export interface ArgResolverConfig {
  catalog: ToolCatalog;
  tables?: ResolutionTables;
  memory?: MemoryStore;
  /**
   * Per-parameter formatters for values that did not come from explicit args.
   * Defaults to summarizing object-valued `profile`.
   */
  formatters?: Readonly<Record<string, ArgFormatter>>;
  logger?: EngineLogger;
}
