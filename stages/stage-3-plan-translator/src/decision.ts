/**
 * Decision parsing: raw oracle output (object or text) -> ReasoningDecision.
 * Never throws; anything unreadable becomes the "unparseable" variant.
 */

import { toErrorMessage } from "../../stage-0-runtime/src/index.js";
import {
  validateAgainstSchema,
  type JsonSchema,
} from "../../stage-1-tool-catalog/src/index.js";
import { isPlainObject, isPresent } from "../../stage-2-arg-resolver/src/index.js";
import { extractJsonObject } from "./parse.js";
import type { DecisionKind, ReasoningDecision } from "./types.js";

type ParsedKind = Exclude<DecisionKind, "unparseable">;

/** Action names older oracle prompts still emit. */
const LEGACY_KINDS: Readonly<Record<string, ParsedKind>> = {
  tool_execution: "execute_one",
  tool_sequence: "run_sequence",
  conversation: "conversational_fallback",
};

/** [legacy field, canonical field] */
const FIELD_ALIASES: ReadonlyArray<readonly [string, string]> = [
  ["action", "kind"],
  ["tool_name", "toolName"],
  ["tool", "toolName"],
  ["tool_args", "args"],
  ["arguments", "args"],
  ["reasoning", "rationale"],
  ["tools", "sequence"],
];

const COMMON_PROPERTIES = {
  args: { type: "object" },
  rationale: { type: "string" },
  confidence: { type: "number" },
};

export const DECISION_SCHEMAS: Readonly<Record<ParsedKind, JsonSchema>> = {
  execute_one: {
    type: "object",
    properties: {
      kind: { const: "execute_one" },
      toolName: { type: "string", minLength: 1 },
      ...COMMON_PROPERTIES,
    },
    required: ["kind", "toolName"],
  },
  run_sequence: {
    type: "object",
    properties: {
      kind: { const: "run_sequence" },
      sequence: { type: "array", items: { type: "string" } },
      ...COMMON_PROPERTIES,
    },
    required: ["kind", "sequence"],
  },
  conversational_fallback: {
    type: "object",
    properties: {
      kind: { const: "conversational_fallback" },
      reply: { type: "string" },
      rationale: { type: "string" },
    },
    required: ["kind"],
  },
};

function isParsedKind(kind: string): kind is ParsedKind {
  return Object.hasOwn(DECISION_SCHEMAS, kind);
}

function preview(input: unknown): string {
  if (typeof input === "string") {
    return input.slice(0, 500);
  }
  try {
    return (JSON.stringify(input) ?? String(input)).slice(0, 500);
  } catch {
    return String(input).slice(0, 500);
  }
}

function unparseable(input: unknown, errors: string[]): ReasoningDecision {
  return { kind: "unparseable", raw: preview(input), errors };
}

/** Rename legacy fields and drop null-valued ones. */
function normalize(source: Record<string, unknown>): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(source)) {
    if (isPresent(value)) {
      out[key] = value;
    }
  }
  for (const [legacy, canonical] of FIELD_ALIASES) {
    if (Object.hasOwn(out, legacy)) {
      if (!Object.hasOwn(out, canonical)) {
        out[canonical] = out[legacy];
      }
      delete out[legacy];
    }
  }
  if (typeof out.kind === "string") {
    out.kind = LEGACY_KINDS[out.kind] ?? out.kind;
  }
  return out;
}

function optionalString(value: unknown): string | undefined {
  return typeof value === "string" ? value : undefined;
}

function optionalNumber(value: unknown): number | undefined {
  return typeof value === "number" ? value : undefined;
}

function optionalArgs(value: unknown): Record<string, unknown> | undefined {
  return isPlainObject(value) ? { ...value } : undefined;
}

function fromValidated(kind: ParsedKind, data: Record<string, unknown>): ReasoningDecision {
  switch (kind) {
    case "execute_one":
      return {
        kind,
        toolName: String(data.toolName),
        args: optionalArgs(data.args),
        rationale: optionalString(data.rationale),
        confidence: optionalNumber(data.confidence),
      };
    case "run_sequence":
      return {
        kind,
        sequence: Array.isArray(data.sequence) ? data.sequence.map(String) : [],
        args: optionalArgs(data.args),
        rationale: optionalString(data.rationale),
        confidence: optionalNumber(data.confidence),
      };
    case "conversational_fallback":
      return {
        kind,
        reply: optionalString(data.reply),
        rationale: optionalString(data.rationale),
      };
  }
}

function fromObject(input: unknown, source: Record<string, unknown>): ReasoningDecision {
  const data = normalize(source);
  const kind = data.kind;

  if (kind === "unparseable") {
    const errors = Array.isArray(data.errors) ? data.errors.map(String) : [];
    return {
      kind,
      raw: typeof data.raw === "string" ? data.raw : preview(input),
      errors,
    };
  }
  if (typeof kind !== "string") {
    return unparseable(input, ["Decision has no kind"]);
  }
  if (!isParsedKind(kind)) {
    return unparseable(input, [`Unknown decision kind: ${kind}`]);
  }

  const validation = validateAgainstSchema(data, DECISION_SCHEMAS[kind]);
  if (!validation.valid) {
    return unparseable(input, validation.errors ?? ["Validation failed"]);
  }
  return fromValidated(kind, data);
}

/**
 * Read oracle output. Accepts a decision object (canonical or legacy field
 * names) or text containing one, optionally inside a markdown fence.
 */
export function parseDecision(input: unknown): ReasoningDecision {
  if (typeof input === "string") {
    const extract = extractJsonObject(input);
    if (!extract.found) {
      return unparseable(input, [extract.reason]);
    }
    let parsed: unknown;
    try {
      parsed = JSON.parse(extract.json);
    } catch (err) {
      return unparseable(input, [toErrorMessage(err)]);
    }
    return isPlainObject(parsed)
      ? fromObject(input, parsed)
      : unparseable(input, ["Decision is not an object"]);
  }

  if (isPlainObject(input)) {
    return fromObject(input, input);
  }
  return unparseable(input, [
    isPresent(input) ? "Decision is not an object" : "Empty decision",
  ]);
}
