import { describe, expect, it } from "vitest";
import {
  buildToolCatalog,
  createToolCatalog,
  introspectParameters,
} from "./catalog.js";
import type { Tool } from "./types.js";

const outlineTool: Tool = {
  name: "outline",
  description: "Build an outline",
  parameters: {
    type: "object",
    properties: {
      story: { type: "string" },
      essay_prompt: { type: "string" },
      word_count: { type: "number", default: 650 },
      tone: { type: "string" },
    },
    required: ["story", "essay_prompt", "word_count"],
  },
  async execute() {
    return {};
  },
};

describe("introspectParameters", () => {
  it("treats required names without a default as required, in declaration order", () => {
    expect(introspectParameters(outlineTool.parameters)).toEqual({
      requiredParams: ["story", "essay_prompt"],
      optionalParams: ["word_count", "tone"],
    });
  });

  it("returns empty lists when the tool declares no schema", () => {
    expect(introspectParameters(undefined)).toEqual({
      requiredParams: [],
      optionalParams: [],
    });
  });

  it("keeps required names that have no property definition", () => {
    expect(
      introspectParameters({ type: "object", required: ["question"] })
    ).toEqual({ requiredParams: ["question"], optionalParams: [] });
  });
});

describe("tool catalog", () => {
  it("is built once from tool schemas", () => {
    const catalog = buildToolCatalog([outlineTool]);
    expect(catalog.requiredArgs("outline")).toEqual(["story", "essay_prompt"]);
    expect(catalog.optionalArgs("outline")).toEqual(["word_count", "tone"]);
    expect(catalog.has("outline")).toBe(true);
    expect(catalog.names()).toEqual(["outline"]);
  });

  it("returns empty lists for an unregistered tool", () => {
    const catalog = buildToolCatalog([outlineTool]);
    expect(catalog.requiredArgs("outlien")).toEqual([]);
    expect(catalog.optionalArgs("outlien")).toEqual([]);
    expect(catalog.has("outlien")).toBe(false);
    expect(catalog.get("outlien")).toBeUndefined();
  });

  it("freezes specs so required sets cannot change after construction", () => {
    const catalog = createToolCatalog([
      { name: "draft", requiredParams: ["outline"], optionalParams: ["outline", "tone"] },
    ]);
    const spec = catalog.get("draft");
    expect(spec?.optionalParams).toEqual(["tone"]);
    expect(Object.isFrozen(spec)).toBe(true);
    expect(Object.isFrozen(catalog.requiredArgs("draft"))).toBe(true);
    expect(Object.isFrozen(catalog)).toBe(true);
  });

  it("records declared dependencies, deduplicated", () => {
    const catalog = buildToolCatalog([
      outlineTool,
      { ...outlineTool, name: "draft", dependencies: ["outline", "outline"] },
    ]);
    expect(catalog.dependenciesOf("draft")).toEqual(["outline"]);
    expect(catalog.dependenciesOf("outline")).toEqual([]);
    expect(catalog.dependenciesOf("missing")).toEqual([]);
    expect(Object.isFrozen(catalog.dependenciesOf("draft"))).toBe(true);
  });

  it("rejects a blank tool name", () => {
    expect(() =>
      createToolCatalog([{ name: "  ", requiredParams: [], optionalParams: [] }])
    ).toThrow("Tool name is required");
  });
});
