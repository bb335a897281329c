import { describe, expect, it } from "vitest";
import { createToolRegistry } from "./registry.js";
import type { Tool } from "./types.js";

const wordCountTool: Tool<{ text: string }, number> = {
  name: "word_count",
  description: "Count words",
  parameters: {
    type: "object",
    properties: { text: { type: "string" } },
    required: ["text"],
  },
  async execute(args) {
    return args.text.split(/\s+/).filter(Boolean).length;
  },
};

const failingTool: Tool = {
  name: "flaky",
  description: "Always fails",
  async execute() {
    throw new Error("upstream unavailable");
  },
};

describe("tool registry", () => {
  it("executes a registered tool and wraps the value", async () => {
    const registry = createToolRegistry();
    registry.register(wordCountTool);

    await expect(
      registry.execute("word_count", { text: "one two  three" })
    ).resolves.toEqual({ success: true, value: 3 });
    expect(registry.has("word_count")).toBe(true);
    expect(registry.list().map((t) => t.name)).toEqual(["word_count"]);
  });

  it("reports an unknown tool without throwing", async () => {
    const registry = createToolRegistry();
    await expect(registry.execute("missing", {})).resolves.toEqual({
      success: false,
      error: "Tool not found: missing",
    });
  });

  it("validates arguments against the tool schema", async () => {
    const registry = createToolRegistry();
    registry.register(wordCountTool);

    const outcome = await registry.execute("word_count", { text: 42 });
    expect(outcome.success).toBe(false);
    if (!outcome.success) {
      expect(outcome.error).toBe("Invalid arguments for word_count: /text must be string");
    }
  });

  it("fills schema defaults for required properties the caller left out", async () => {
    const registry = createToolRegistry();
    const seen: Record<string, unknown>[] = [];
    registry.register({
      name: "styled",
      description: "Echoes its arguments",
      parameters: {
        type: "object",
        properties: {
          topic: { type: "string" },
          style: { type: "string", default: "plain" },
        },
        required: ["topic", "style"],
      },
      async execute(args: Record<string, unknown>) {
        seen.push(args);
        return args.style;
      },
    });
    const args = { topic: "tides" };

    await expect(registry.execute("styled", args)).resolves.toEqual({
      success: true,
      value: "plain",
    });
    expect(seen).toEqual([{ topic: "tides", style: "plain" }]);
    expect(args).toEqual({ topic: "tides" });
  });

  it("turns a thrown error into a failed outcome", async () => {
    const registry = createToolRegistry();
    registry.register(failingTool);
    await expect(registry.execute("flaky", {})).resolves.toEqual({
      success: false,
      error: "upstream unavailable",
    });
  });

  it("passes the abort signal and attempt number to the tool", async () => {
    const registry = createToolRegistry();
    const seen: number[] = [];
    registry.register({
      name: "attempt_recorder",
      description: "Records attempts",
      async execute(_args, context) {
        seen.push(context.attempt);
        return context.signal.aborted;
      },
    });

    await expect(registry.execute("attempt_recorder", {}, { attempt: 3 })).resolves.toEqual({
      success: true,
      value: false,
    });
    expect(seen).toEqual([3]);
  });

  it("rejects a blank tool name", () => {
    const registry = createToolRegistry();
    expect(() =>
      registry.register({ ...failingTool, name: " " })
    ).toThrow("Tool name is required");
  });
});
