import { describe, expect, it } from "vitest";

import { matchesNth, parseNthFormula } from "./nth.js";

describe("parseNthFormula", () => {
  it("parses keywords", () => {
    expect(parseNthFormula("odd")).toEqual({ a: 2, b: 1 });
    expect(parseNthFormula(" EVEN ")).toEqual({ a: 2, b: 0 });
  });

  it("parses an+b forms", () => {
    expect(parseNthFormula("2n+1")).toEqual({ a: 2, b: 1 });
    expect(parseNthFormula("3n - 2")).toEqual({ a: 3, b: -2 });
    expect(parseNthFormula("-n+3")).toEqual({ a: -1, b: 3 });
    expect(parseNthFormula("n")).toEqual({ a: 1, b: 0 });
    expect(parseNthFormula("+5")).toEqual({ a: 0, b: 5 });
    expect(parseNthFormula("-2")).toEqual({ a: 0, b: -2 });
  });

  it("returns null for malformed formulas", () => {
    for (const text of ["", "abc", "2n+", "2n 1", "n+x", "3x"]) {
      expect(parseNthFormula(text)).toBeNull();
    }
  });
});

describe("matchesNth", () => {
  function positions(formula: { a: number; b: number }): number[] {
    return [1, 2, 3, 4, 5, 6, 7].filter((position) => matchesNth(formula, position));
  }

  it("selects every step from the offset", () => {
    expect(positions({ a: 2, b: 1 })).toEqual([1, 3, 5, 7]);
    expect(positions({ a: 3, b: 0 })).toEqual([3, 6]);
  });

  it("handles negative steps as a prefix", () => {
    expect(positions({ a: -1, b: 3 })).toEqual([1, 2, 3]);
  });

  it("matches a single position when a is zero", () => {
    expect(positions({ a: 0, b: 4 })).toEqual([4]);
    expect(positions({ a: 0, b: -1 })).toEqual([]);
  });
});
