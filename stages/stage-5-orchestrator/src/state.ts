/**
 * In-memory store for run snapshots.
 * Enables audit (which transitions a run went through) and inspection of in-flight runs.
 */

import type { RunSnapshot, RunStore } from "./types.js";

function copySnapshot(snapshot: RunSnapshot): RunSnapshot {
  return { ...snapshot, transitions: [...snapshot.transitions] };
}

/** Create an in-memory run store. */
export function createRunStore(): RunStore {
  const byRunId = new Map<string, RunSnapshot>();

  return {
    get(runId: string): RunSnapshot | undefined {
      const snapshot = byRunId.get(runId);
      return snapshot ? copySnapshot(snapshot) : undefined;
    },

    set(snapshot: RunSnapshot): void {
      byRunId.set(snapshot.runId, copySnapshot(snapshot));
    },

    list(): RunSnapshot[] {
      return Array.from(byRunId.values())
        .map(copySnapshot)
        .sort(
          (a, b) =>
            new Date(a.startedAt).getTime() - new Date(b.startedAt).getTime()
        );
    },

    delete(runId: string): boolean {
      return byRunId.delete(runId);
    },
  };
}
