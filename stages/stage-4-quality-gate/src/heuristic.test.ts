import { describe, expect, it } from "vitest";
import { clampScore, heuristicScore, tokenize } from "./heuristic.js";

describe("heuristicScore", () => {
  it("returns 0 for text without words", () => {
    expect(heuristicScore("")).toBe(0);
    expect(heuristicScore("  !!! ... ")).toBe(0);
  });

  it("rewards vocabulary diversity", () => {
    expect(heuristicScore("alpha beta alpha beta", { minWords: 4 })).toBe(7.5);
  });

  it("penalizes short text", () => {
    expect(heuristicScore("One, two!", { minWords: 4 })).toBe(7.5);
  });

  it("gives full marks to long text with no repetition", () => {
    const text = Array.from({ length: 40 }, (_, i) => `word${i}`).join(" ");
    expect(heuristicScore(text)).toBe(10);
  });
});

describe("tokenize", () => {
  it("strips edge punctuation and lower-cases", () => {
    expect(tokenize('"Hello," she said -- WORLD.')).toEqual(["hello", "she", "said", "world"]);
  });
});

describe("clampScore", () => {
  it("keeps scores in [0, 10]", () => {
    expect(clampScore(12)).toBe(10);
    expect(clampScore(-1)).toBe(0);
    expect(clampScore(Number.POSITIVE_INFINITY)).toBe(0);
  });
});
