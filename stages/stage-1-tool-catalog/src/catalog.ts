/**
 * Tool Catalog: built once from tool parameter schemas, read-only afterwards.
 *
 * A property listed in the schema's `required` array is a required parameter
 * unless it also declares a `default`; every other declared property is
 * optional. Declaration order is preserved. Tool dependencies are copied
 * from `Tool.dependencies` as declared. Lookups for an unregistered name
 * return empty lists instead of throwing, so callers that need to tell an
 * unknown tool apart use `has`.
 */

import type { JsonSchema, Tool, ToolCatalog, ToolSpec } from "./types.js";

const EMPTY: readonly string[] = Object.freeze([]);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Split a parameters schema into required and optional names. */
export function introspectParameters(schema: JsonSchema | undefined): {
  requiredParams: string[];
  optionalParams: string[];
} {
  const requiredParams: string[] = [];
  const optionalParams: string[] = [];
  if (!schema) {
    return { requiredParams, optionalParams };
  }

  const properties = isRecord(schema.properties) ? schema.properties : {};
  const requiredList = Array.isArray(schema.required)
    ? schema.required.filter((name): name is string => typeof name === "string")
    : [];
  const requiredSet = new Set(requiredList);

  for (const [name, definition] of Object.entries(properties)) {
    const hasDefault = isRecord(definition) && "default" in definition;
    if (requiredSet.has(name) && !hasDefault) {
      requiredParams.push(name);
    } else {
      optionalParams.push(name);
    }
  }

  // Required names without a property definition are still required.
  for (const name of requiredList) {
    if (!(name in properties) && !requiredParams.includes(name)) {
      requiredParams.push(name);
    }
  }

  return { requiredParams, optionalParams };
}

function freezeSpec(spec: ToolSpec): ToolSpec {
  const required = Array.from(new Set(spec.requiredParams));
  const optional = Array.from(new Set(spec.optionalParams)).filter(
    (name) => !required.includes(name)
  );
  return Object.freeze({
    name: spec.name,
    requiredParams: Object.freeze(required),
    optionalParams: Object.freeze(optional),
    dependencies: Object.freeze(Array.from(new Set(spec.dependencies ?? []))),
  });
}

/** Build a catalog from explicit specs (also used for mock catalogs in tests). */
export function createToolCatalog(specs: Iterable<ToolSpec>): ToolCatalog {
  const byName = new Map<string, ToolSpec>();
  for (const spec of specs) {
    const name = spec.name.trim();
    if (!name) {
      throw new Error("Tool name is required");
    }
    byName.set(name, freezeSpec({ ...spec, name }));
  }
  const names = Object.freeze(Array.from(byName.keys()));

  return Object.freeze({
    requiredArgs(name: string): readonly string[] {
      return byName.get(name)?.requiredParams ?? EMPTY;
    },
    optionalArgs(name: string): readonly string[] {
      return byName.get(name)?.optionalParams ?? EMPTY;
    },
    dependenciesOf(name: string): readonly string[] {
      return byName.get(name)?.dependencies ?? EMPTY;
    },
    has(name: string): boolean {
      return byName.has(name);
    },
    get(name: string): ToolSpec | undefined {
      return byName.get(name);
    },
    names(): readonly string[] {
      return names;
    },
  });
}

/** Introspect every tool's `parameters` schema into a catalog. */
export function buildToolCatalog(tools: Iterable<Tool>): ToolCatalog {
  const specs: ToolSpec[] = [];
  for (const tool of tools) {
    specs.push({
      name: tool.name,
      ...introspectParameters(tool.parameters),
      dependencies: tool.dependencies,
    });
  }
  return createToolCatalog(specs);
}
