/**
 * Argument Resolver: fills a tool's parameters from layered sources.
 *
 * Per declared parameter, first match wins:
 *   1. explicit args (every explicit arg is passed through, declared or not)
 *   2. direct context key, then flattened context
 *   3. role table candidates
 *   4. static defaults
 *   5. aliases, tried against explicit args, context, flattened context
 *   6. the user input, for the first missing text-like required parameter
 *   7. last-resort fallbacks
 *
 * Values not supplied explicitly then pass through the configured formatters.
 * `undefined` and `null` count as absent at every stage. Output is a pure
 * function of the request, the catalog and the tables.
 */

import {
  MissingRequiredArgumentError,
  nowIso,
} from "../../stage-0-runtime/src/index.js";
import { flattenContext, isPresent, ownValue } from "./flatten.js";
import { formatProfileArg } from "./profile.js";
import { DEFAULT_RESOLUTION_TABLES, indexRoles } from "./tables.js";
import type {
  ArgFormatter,
  ArgResolver,
  ArgResolverConfig,
  MemoryStore,
  ResolutionReport,
  ResolutionResult,
  ResolvedArgs,
  ResolutionSource,
  ResolveRequest,
  RoleSource,
} from "./types.js";

interface LookupScope {
  explicit: Readonly<Record<string, unknown>>;
  context: Readonly<Record<string, unknown>>;
  flat: Readonly<Record<string, unknown>>;
  userInput: string;
  memory?: MemoryStore;
}

function lookupCandidate(
  candidate: RoleSource,
  role: string,
  scope: LookupScope
): { value: unknown; source: ResolutionSource } {
  switch (candidate.from) {
    case "context": {
      const direct = ownValue(scope.context, candidate.key);
      return {
        value: isPresent(direct) ? direct : ownValue(scope.flat, candidate.key),
        source: `role:${role}`,
      };
    }
    case "user_input":
      return {
        value: scope.userInput.trim() ? scope.userInput : undefined,
        source: "user_input",
      };
    case "memory":
      return {
        value: scope.memory?.get(candidate.key, undefined),
        source: `memory:${candidate.key}`,
      };
  }
}

export const DEFAULT_ARG_FORMATTERS: Readonly<Record<string, ArgFormatter>> =
  Object.freeze({ profile: formatProfileArg });

export function createArgResolver(config: ArgResolverConfig): ArgResolver {
  const { catalog, memory, logger } = config;
  const tables = config.tables ?? DEFAULT_RESOLUTION_TABLES;
  const roleIndex = indexRoles(tables.roles);
  const formatters = config.formatters ?? DEFAULT_ARG_FORMATTERS;

  function run(request: ResolveRequest): ResolutionResult {
    const { toolName } = request;
    const explicit = request.explicitArgs ?? {};
    const context = request.context ?? {};
    const scope: LookupScope = {
      explicit,
      context,
      flat: flattenContext(context),
      userInput: request.userInput ?? "",
      memory,
    };

    const required = catalog.requiredArgs(toolName);
    const declared = [...required, ...catalog.optionalArgs(toolName)];

    const args: Record<string, unknown> = {};
    const sources: Record<string, ResolutionSource> = {};
    const has = (key: string) => Object.hasOwn(args, key);
    const set = (key: string, value: unknown, source: ResolutionSource) => {
      if (has(key) || !isPresent(value)) {
        return false;
      }
      args[key] = value;
      sources[key] = source;
      return true;
    };

    // 1) explicit
    for (const [key, value] of Object.entries(explicit)) {
      set(key, value, "explicit");
    }

    // 2) context, then flattened context
    for (const key of declared) {
      if (!set(key, ownValue(scope.context, key), "context")) {
        set(key, ownValue(scope.flat, key), "context_flat");
      }
    }

    // 3) role heuristics
    for (const key of declared) {
      const role = roleIndex.get(key);
      if (has(key) || !role) continue;
      for (const candidate of role.candidates) {
        const { value, source } = lookupCandidate(candidate, role.role, scope);
        if (set(key, value, source)) break;
      }
    }

    // 4) defaults
    for (const key of declared) {
      set(key, ownValue(tables.defaults, key), "default");
    }

    // 5) aliases
    for (const key of declared) {
      if (has(key)) continue;
      for (const alias of tables.aliases[key] ?? []) {
        if (
          set(key, ownValue(scope.explicit, alias), `alias:${alias}`) ||
          set(key, ownValue(scope.context, alias), `alias:${alias}`) ||
          set(key, ownValue(scope.flat, alias), `alias:${alias}`)
        ) {
          break;
        }
      }
    }

    // 6) user input
    const textLike = required.find(
      (key) => !has(key) && tables.userInputFallback.includes(key)
    );
    if (textLike && scope.userInput.trim()) {
      set(textLike, scope.userInput, "user_input");
    }

    // 7) fallbacks
    for (const key of declared) {
      set(key, ownValue(tables.fallbacks, key), "default");
    }

    for (const [key, format] of Object.entries(formatters)) {
      if (has(key) && sources[key] !== "explicit") {
        args[key] = format(args[key]);
      }
    }

    const missing = required.filter((key) => !has(key));
    if (missing.length > 0) {
      return { ok: false, error: new MissingRequiredArgumentError(toolName, missing) };
    }

    logger?.logResolution({
      timestamp: nowIso(),
      runId: request.runId,
      toolName,
      sources: { ...sources },
      resolved: { ...args },
    });
    return { ok: true, args, sources };
  }

  function report(request: ResolveRequest): ResolutionReport {
    const result = run(request);
    if (!result.ok) {
      throw result.error;
    }
    return { args: result.args, sources: result.sources };
  }

  return {
    resolve(request: ResolveRequest): ResolvedArgs {
      return report(request).args;
    },

    resolveWithDiagnostics(request: ResolveRequest): ResolutionReport {
      return report(request);
    },

    tryResolve(request: ResolveRequest): ResolutionResult {
      return run(request);
    },
  };
}
