import { describe, expect, it } from "vitest";
import { sampleWithoutReplacement } from "./sample";

const seeded = (values: number[]) => {
  let i = 0;
  return () => values[i++ % values.length];
};

describe("sampleWithoutReplacement", () => {
  const items = ["a", "b", "c", "d", "e"];

  it("draws min(N, population) distinct items", () => {
    const picked = sampleWithoutReplacement(items, 3);
    expect(picked).toHaveLength(3);
    expect(new Set(picked).size).toBe(3);
    for (const item of picked) expect(items).toContain(item);

    expect(sampleWithoutReplacement(items, 10)).toHaveLength(5);
  });

  it("returns an empty sample for non-positive sizes", () => {
    expect(sampleWithoutReplacement(items, 0)).toEqual([]);
    expect(sampleWithoutReplacement(items, -2)).toEqual([]);
  });

  it("follows the random source", () => {
    // j = i + floor(r * (5 - i)): 0.99 → 4, then 0 → 1
    expect(sampleWithoutReplacement(items, 2, seeded([0.99, 0]))).toEqual(["e", "b"]);
  });

  it("does not mutate the input", () => {
    sampleWithoutReplacement(items, 5, seeded([0.5]));
    expect(items).toEqual(["a", "b", "c", "d", "e"]);
  });
});
