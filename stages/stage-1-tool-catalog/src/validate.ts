/**
 * Validate data against JSON Schema (using ajv).
 */

import AjvImport, { type ErrorObject, type Options } from "ajv";
import type { JsonSchema, ValidationResult } from "./types.js";

interface AjvInstance {
  validate(schema: JsonSchema, data: unknown): boolean;
  errors?: ErrorObject[] | null;
}

type AjvCtor = new (opts?: Options) => AjvInstance;

// ajv ships CommonJS; under NodeNext the default import may be the namespace object
const AjvConstructor = (
  typeof AjvImport === "function"
    ? AjvImport
    : (AjvImport as unknown as { default: AjvCtor }).default
) as AjvCtor;

export function createAjv(options: Options = {}): AjvInstance {
  return new AjvConstructor({ allErrors: true, strict: false, ...options });
}

export function formatAjvErrors(errors: ErrorObject[] | null | undefined): string[] {
  if (!errors || errors.length === 0) {
    return [];
  }
  return errors.map(
    (e) => `${e.instancePath || "/"} ${e.message ?? e.keyword}`
  );
}

const sharedAjv = createAjv();

/**
 * Validate data against a JSON Schema. Returns validation result with errors if invalid.
 */
export function validateAgainstSchema(
  data: unknown,
  schema: JsonSchema
): ValidationResult {
  try {
    const valid = sharedAjv.validate(schema, data);
    if (valid) {
      return { valid: true };
    }
    return { valid: false, errors: formatAjvErrors(sharedAjv.errors) };
  } catch (err) {
    const message =
      err instanceof Error ? err.message : "Unknown validation error";
    return { valid: false, errors: [message] };
  }
}

const defaultingAjv = createAjv({ useDefaults: true });

/**
 * Validate tool arguments, filling schema defaults into a top-level copy.
 * A required property that declares a `default` is satisfied by it, matching
 * how the catalog classifies such properties.
 */
export function validateToolArgs(
  args: Readonly<Record<string, unknown>>,
  schema: JsonSchema
): ValidationResult & { args: Record<string, unknown> } {
  const withDefaults: Record<string, unknown> = { ...args };
  try {
    if (defaultingAjv.validate(schema, withDefaults)) {
      return { valid: true, args: withDefaults };
    }
    return {
      valid: false,
      errors: formatAjvErrors(defaultingAjv.errors),
      args: withDefaults,
    };
  } catch (err) {
    const message =
      err instanceof Error ? err.message : "Unknown validation error";
    return { valid: false, errors: [message], args: withDefaults };
  }
}
