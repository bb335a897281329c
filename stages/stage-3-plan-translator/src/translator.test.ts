import { describe, expect, it, vi } from "vitest";
import { createSilentLogger } from "../../stage-0-runtime/src/index.js";
import { createToolCatalog } from "../../stage-1-tool-catalog/src/index.js";
import {
  clampConfidence,
  planFromDecision,
  proposedTools,
  translateDecision,
} from "./translator.js";

const catalog = createToolCatalog([
  { name: "brainstorm", requiredParams: [], optionalParams: [] },
  { name: "outline", requiredParams: [], optionalParams: [] },
]);

describe("translateDecision", () => {
  it("turns a single-tool decision into one step", () => {
    expect(
      translateDecision({
        kind: "execute_one",
        toolName: "outline",
        args: { word_count: 400 },
        rationale: "needs structure",
        confidence: 1.7,
      })
    ).toEqual([
      {
        toolName: "outline",
        suppliedArgs: { word_count: 400 },
        rationale: "needs structure",
        confidence: 1,
        origin: "plan",
      },
    ]);
  });

  it("keeps sequence order and gives every step its own args object", () => {
    const plan = translateDecision({
      kind: "run_sequence",
      sequence: ["brainstorm", " ", "outline"],
      args: { topic: "robots" },
    });
    expect(plan.map((step) => step.toolName)).toEqual(["brainstorm", "outline"]);
    expect(plan[0].suppliedArgs).toEqual({ topic: "robots" });
    expect(plan[0].suppliedArgs).not.toBe(plan[1].suppliedArgs);
    expect(plan[0].confidence).toBe(0);
  });

  it("drops names the catalog does not know and warns", () => {
    const logger = { ...createSilentLogger(), logWarning: vi.fn() };
    const plan = translateDecision(
      { kind: "run_sequence", sequence: ["brainstorm", "outlin", "outline"] },
      { catalog, logger, runId: "run_x" }
    );
    expect(plan.map((step) => step.toolName)).toEqual(["brainstorm", "outline"]);
    expect(logger.logWarning).toHaveBeenCalledTimes(1);
    expect(logger.logWarning.mock.calls[0][0]).toMatchObject({
      runId: "run_x",
      details: { tools: ["outlin"] },
    });
  });

  it("yields an empty plan for fallback, unparseable and fully dropped decisions", () => {
    expect(translateDecision({ kind: "conversational_fallback" })).toEqual([]);
    expect(
      translateDecision({ kind: "unparseable", raw: "??", errors: ["bad"] })
    ).toEqual([]);
    expect(translateDecision({ kind: "run_sequence", sequence: [] })).toEqual([]);
    expect(
      translateDecision({ kind: "execute_one", toolName: "nope" }, { catalog })
    ).toEqual([]);
  });

  it("drops steps whose dependencies have not run earlier", () => {
    const chained = createToolCatalog([
      { name: "brainstorm", requiredParams: [], optionalParams: [] },
      {
        name: "outline",
        requiredParams: [],
        optionalParams: [],
        dependencies: ["brainstorm"],
      },
      { name: "draft", requiredParams: [], optionalParams: [], dependencies: ["outline"] },
    ]);
    const logger = { ...createSilentLogger(), logWarning: vi.fn() };

    const plan = translateDecision(
      { kind: "run_sequence", sequence: ["outline", "brainstorm", "draft"] },
      { catalog: chained, logger, runId: "run_dep" }
    );
    expect(plan.map((step) => step.toolName)).toEqual(["brainstorm"]);
    expect(logger.logWarning).toHaveBeenCalledTimes(1);
    expect(logger.logWarning.mock.calls[0][0]).toMatchObject({
      runId: "run_dep",
      message: "Dropping tools with unmet dependencies",
      details: { missing: ["outline requires brainstorm", "draft requires outline"] },
    });

    const ordered = translateDecision(
      { kind: "run_sequence", sequence: ["brainstorm", "outline", "draft"] },
      { catalog: chained, logger }
    );
    expect(ordered.map((step) => step.toolName)).toEqual(["brainstorm", "outline", "draft"]);

    const afterOutline = translateDecision(
      { kind: "execute_one", toolName: "draft" },
      { catalog: chained, completed: ["brainstorm", "outline"] }
    );
    expect(afterOutline.map((step) => step.toolName)).toEqual(["draft"]);
    expect(logger.logWarning).toHaveBeenCalledTimes(1);
  });

  it("stamps the requested origin", () => {
    const [step] = translateDecision(
      { kind: "execute_one", toolName: "outline" },
      { origin: "replan" }
    );
    expect(step.origin).toBe("replan");
  });
});

describe("helpers", () => {
  it("clampConfidence keeps values in [0, 1]", () => {
    expect(clampConfidence(undefined)).toBe(0);
    expect(clampConfidence(Number.NaN)).toBe(0);
    expect(clampConfidence(-2)).toBe(0);
    expect(clampConfidence(0.42)).toBe(0.42);
  });

  it("proposedTools lists tool names only for tool decisions", () => {
    expect(proposedTools({ kind: "execute_one", toolName: " draft " })).toEqual(["draft"]);
    expect(proposedTools({ kind: "conversational_fallback" })).toEqual([]);
  });

  it("planFromDecision parses and translates raw text", () => {
    const { decision, plan } = planFromDecision(
      '{"action":"tool_execution","tool_name":"brainstorm","confidence":0.9}'
    );
    expect(decision.kind).toBe("execute_one");
    expect(plan).toEqual([
      {
        toolName: "brainstorm",
        suppliedArgs: {},
        rationale: "",
        confidence: 0.9,
        origin: "plan",
      },
    ]);
  });
});
