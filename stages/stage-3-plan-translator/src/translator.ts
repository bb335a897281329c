/**
 * Plan Translator: ReasoningDecision -> ordered PlanStep list.
 * Conversational fallback and unparseable decisions yield an empty plan; the
 * orchestrator runs one conversational step for it.
 *
 * Given a catalog, a proposal is dropped when the catalog does not know the
 * tool, or when one of its dependencies has neither run already (`completed`)
 * nor been kept earlier in the same proposal.
 */

import { nowIso } from "../../stage-0-runtime/src/index.js";
import { parseDecision } from "./decision.js";
import type { PlanStep, ReasoningDecision, TranslateOptions } from "./types.js";

export function clampConfidence(value: number | undefined): number {
  if (typeof value !== "number" || !Number.isFinite(value)) {
    return 0;
  }
  return Math.min(1, Math.max(0, value));
}

/** Tool names a decision proposes, in order; empty for non-tool decisions. */
export function proposedTools(decision: ReasoningDecision): string[] {
  switch (decision.kind) {
    case "execute_one":
      return [decision.toolName.trim()].filter(Boolean);
    case "run_sequence":
      return decision.sequence.map((name) => name.trim()).filter(Boolean);
    default:
      return [];
  }
}

export function translateDecision(
  decision: ReasoningDecision,
  options: TranslateOptions = {}
): PlanStep[] {
  if (decision.kind !== "execute_one" && decision.kind !== "run_sequence") {
    return [];
  }

  let toolNames = proposedTools(decision);
  const { catalog, logger } = options;
  if (catalog) {
    const unknown = toolNames.filter((name) => !catalog.has(name));
    if (unknown.length > 0) {
      logger?.logWarning({
        timestamp: nowIso(),
        runId: options.runId,
        message: "Dropping tools missing from the catalog",
        details: { tools: unknown },
      });
      toolNames = toolNames.filter((name) => catalog.has(name));
    }

    const satisfied = new Set<string>(options.completed ?? []);
    const unmet: string[] = [];
    toolNames = toolNames.filter((name) => {
      const missing = catalog
        .dependenciesOf(name)
        .filter((dependency) => !satisfied.has(dependency));
      if (missing.length > 0) {
        unmet.push(...missing.map((dependency) => `${name} requires ${dependency}`));
        return false;
      }
      satisfied.add(name);
      return true;
    });
    if (unmet.length > 0) {
      logger?.logWarning({
        timestamp: nowIso(),
        runId: options.runId,
        message: "Dropping tools with unmet dependencies",
        details: { missing: unmet },
      });
    }
  }

  return toolNames.map((toolName) => ({
    toolName,
    suppliedArgs: { ...(decision.args ?? {}) },
    rationale: decision.rationale ?? "",
    confidence: clampConfidence(decision.confidence),
    origin: options.origin ?? "plan",
  }));
}

/** Parse raw oracle output and translate it in one go. */
export function planFromDecision(
  input: unknown,
  options: TranslateOptions = {}
): { decision: ReasoningDecision; plan: PlanStep[] } {
  const decision = parseDecision(input);
  return { decision, plan: translateDecision(decision, options) };
}
