import { describe, expect, it } from "vitest";
import { cosineSimilarity, lexicalSimilarity } from "./similarity";

describe("lexicalSimilarity", () => {
  it("is one minus edit distance over the longer length", () => {
    expect(lexicalSimilarity("kitten", "sitting")).toBeCloseTo(1 - 3 / 7);
    expect(lexicalSimilarity("add client", "add client")).toBe(1);
    expect(lexicalSimilarity("", "")).toBe(1);
    expect(lexicalSimilarity("abc", "")).toBe(0);
  });
});

describe("cosineSimilarity", () => {
  it("compares direction only", () => {
    expect(cosineSimilarity([1, 0, 0, 0], [1, 1, 1, 1])).toBe(0.5);
    expect(cosineSimilarity([2, 0], [5, 0])).toBe(1);
    expect(cosineSimilarity([1, 0], [0, 1])).toBe(0);
  });

  it("treats zero vectors as unrelated", () => {
    expect(cosineSimilarity([0, 0], [1, 1])).toBe(0);
  });

  it("rejects vectors of different lengths", () => {
    expect(() => cosineSimilarity([1], [1, 2])).toThrow("embedding length mismatch: 1 vs 2");
  });
});
