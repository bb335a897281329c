import { describe, expect, it } from "vitest";
import { createMemoryStore } from "./memory.js";

describe("createMemoryStore", () => {
  it("returns stored values or the fallback", () => {
    const store = createMemoryStore({ tone: "warm" });
    expect(store.get("tone")).toBe("warm");
    expect(store.get("college", "this college")).toBe("this college");
    expect(store.get("college")).toBeUndefined();
  });

  it("copies its input so later mutation does not leak in", () => {
    const entries: Record<string, unknown> = { tone: "warm" };
    const store = createMemoryStore(entries);
    entries.tone = "cold";
    expect(store.get("tone")).toBe("warm");
  });

  it("accepts a Map", () => {
    const store = createMemoryStore(new Map([["essay_prompt", "Why us?"]]));
    expect(store.get("essay_prompt")).toBe("Why us?");
  });
});
