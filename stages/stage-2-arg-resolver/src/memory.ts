/**
 * Read-only in-memory store for profile facts; the engine never writes to it.
 */

import type { MemoryStore } from "./types.js";

export function createMemoryStore(
  entries: Readonly<Record<string, unknown>> | Map<string, unknown> = {}
): MemoryStore {
  const data = new Map<string, unknown>(
    entries instanceof Map ? entries : Object.entries(entries)
  );

  return Object.freeze({
    get(key: string, fallback?: unknown): unknown {
      return data.has(key) ? data.get(key) : fallback;
    },
  });
}
