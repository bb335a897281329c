import { describe, expect, it } from "vitest";
import { parseDecision } from "./decision.js";

describe("parseDecision", () => {
  it("accepts canonical decision objects", () => {
    expect(
      parseDecision({
        kind: "execute_one",
        toolName: "outline",
        args: { word_count: 500 },
        rationale: "user asked for structure",
        confidence: 0.7,
      })
    ).toEqual({
      kind: "execute_one",
      toolName: "outline",
      args: { word_count: 500 },
      rationale: "user asked for structure",
      confidence: 0.7,
    });
  });

  it("maps legacy action and field names", () => {
    expect(
      parseDecision({
        action: "tool_execution",
        tool_name: "outline",
        tool_args: { x: 1 },
        reasoning: "because",
        confidence: 0.8,
      })
    ).toEqual({
      kind: "execute_one",
      toolName: "outline",
      args: { x: 1 },
      rationale: "because",
      confidence: 0.8,
    });
    expect(parseDecision({ action: "conversation" })).toEqual({
      kind: "conversational_fallback",
    });
    expect(parseDecision({ action: "tool_sequence", tools: ["a", "b"] })).toEqual({
      kind: "run_sequence",
      sequence: ["a", "b"],
    });
  });

  it("drops null fields before validation", () => {
    expect(parseDecision({ kind: "execute_one", toolName: "draft", args: null })).toEqual({
      kind: "execute_one",
      toolName: "draft",
    });
  });

  it("reads a decision from fenced oracle text", () => {
    const text =
      'Sure!\n```json\n{"kind":"run_sequence","sequence":["brainstorm","outline"]}\n```';
    expect(parseDecision(text)).toEqual({
      kind: "run_sequence",
      sequence: ["brainstorm", "outline"],
    });
  });

  it("ignores braces inside string literals", () => {
    const text =
      'Decision: {"kind":"conversational_fallback","reply":"use {braces} freely"} done';
    expect(parseDecision(text)).toEqual({
      kind: "conversational_fallback",
      reply: "use {braces} freely",
    });
  });

  it("degrades unknown kinds to unparseable", () => {
    expect(parseDecision({ kind: "dance" })).toEqual({
      kind: "unparseable",
      raw: '{"kind":"dance"}',
      errors: ["Unknown decision kind: dance"],
    });
  });

  it("degrades schema violations to unparseable", () => {
    expect(parseDecision({ kind: "execute_one" })).toEqual({
      kind: "unparseable",
      raw: '{"kind":"execute_one"}',
      errors: ["/ must have required property 'toolName'"],
    });
    const badSequence = parseDecision({ kind: "run_sequence", sequence: ["a", 2] });
    expect(badSequence).toEqual({
      kind: "unparseable",
      raw: '{"kind":"run_sequence","sequence":["a",2]}',
      errors: ["/sequence/1 must be string"],
    });
  });

  it("degrades non-object input to unparseable", () => {
    expect(parseDecision(null)).toEqual({
      kind: "unparseable",
      raw: "null",
      errors: ["Empty decision"],
    });
    expect(parseDecision(42)).toEqual({
      kind: "unparseable",
      raw: "42",
      errors: ["Decision is not an object"],
    });
    expect(parseDecision("not json")).toEqual({
      kind: "unparseable",
      raw: "not json",
      errors: ["No JSON object found in content"],
    });
    expect(parseDecision('{"kind": "execute_one", ')).toEqual({
      kind: "unparseable",
      raw: '{"kind": "execute_one", ',
      errors: ["Unclosed JSON object"],
    });
  });

  it("reports JSON syntax errors without throwing", () => {
    const decision = parseDecision("{bad json}");
    expect(decision.kind).toBe("unparseable");
    if (decision.kind === "unparseable") {
      expect(decision.raw).toBe("{bad json}");
      expect(decision.errors).toHaveLength(1);
    }
  });

  it("passes an existing unparseable decision through", () => {
    expect(parseDecision({ kind: "unparseable", raw: "x", errors: ["e"] })).toEqual({
      kind: "unparseable",
      raw: "x",
      errors: ["e"],
    });
  });
});
