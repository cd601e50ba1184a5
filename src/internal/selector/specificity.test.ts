import { describe, expect, it } from "vitest";

import { parseSelectorList } from "./parse.js";
import { compareSpecificity, computeSpecificity, formatSpecificity } from "./specificity.js";

function specificityOf(source: string): string {
  return formatSpecificity(computeSpecificity(parseSelectorList(source)));
}

describe("computeSpecificity", () => {
  it.each([
    ["*", "(0, 0, 0)"],
    ["div", "(0, 0, 1)"],
    ["#a .b c", "(1, 1, 1)"],
    ["a[href]:first-child", "(0, 2, 1)"],
    ["li:nth-child(2n+1)", "(0, 1, 1)"],
    ["p::before", "(0, 0, 2)"],
    ["a, b", "(0, 0, 2)"]
  ])("%s has specificity %s", (source, expected) => {
    expect(specificityOf(source)).toBe(expected);
  });

  it("counts a functional pseudo-class once without reading its arguments", () => {
    expect(specificityOf(":not(#x, #y)")).toBe("(0, 1, 0)");
    expect(specificityOf("div:has(> img.hero)")).toBe("(0, 1, 1)");
  });
});

describe("compareSpecificity", () => {
  it("orders by ids, then classes, then elements", () => {
    expect(compareSpecificity({ ids: 1, classes: 0, elements: 0 }, { ids: 0, classes: 5, elements: 5 })).toBe(1);
    expect(compareSpecificity({ ids: 0, classes: 1, elements: 0 }, { ids: 0, classes: 2, elements: 0 })).toBe(-1);
    expect(compareSpecificity({ ids: 0, classes: 1, elements: 3 }, { ids: 0, classes: 1, elements: 2 })).toBe(1);
    expect(compareSpecificity({ ids: 2, classes: 1, elements: 0 }, { ids: 2, classes: 1, elements: 0 })).toBe(0);
  });
});
