import { describe, expect, it } from "vitest";

import { resolveSoupConfig } from "../config.js";
import { CompiledSelector } from "../selector/compiled.js";
import { buildDocument } from "../tree/build.js";
import { explainSelector, formatExplanation, formatHint } from "./explain.js";

describe("explainSelector", () => {
  it("flags universal selectors", () => {
    const explanation = explainSelector("*");
    expect(explanation.description).toBe("Elements matching '*'");
    expect(explanation.performanceNotes).toEqual(["Contains universal selector - may be slow on large documents"]);
    expect(explanation.hints).toEqual([{ kind: "avoid-universal" }]);
    expect(explanation.estimatedMatches).toBeNull();
  });

  it("finds universal selectors inside nested lists", () => {
    expect(explainSelector("li:not(*)").hints).toEqual([{ kind: "avoid-universal" }]);
  });

  it("marks a lone id as optimal", () => {
    const explanation = explainSelector("#main");
    expect(explanation.description).toBe("Element with ID 'main'");
    expect(explanation.performanceNotes).toEqual(["ID selector - uses fast indexed lookup"]);
    expect(explanation.hints).toEqual([{ kind: "optimal" }]);
  });

  it.each([
    ["div", "<div> elements"],
    [".card", "Elements with class 'card'"],
    [".a.b", "Elements with classes 'a', 'b'"],
    ["h1, h2", "Elements matching any of 2 selectors"],
    ["ul > li", "Elements matching a child selector"],
    ["div > p span", "Elements matching a child selector"],
    ["nav a", "Elements matching a descendant selector"],
    ["h1 + p", "Elements matching an adjacent sibling selector"],
    ["h1 ~ p", "Elements matching a general sibling selector"],
    ["a[href]", "Elements matching 'a[href]'"]
  ])("describes %s", (source, description) => {
    expect(explainSelector(source).description).toBe(description);
  });

  it("suggests an id selector for id attribute equality", () => {
    expect(explainSelector('input[id="email"]').hints).toEqual([
      { kind: "use-id-selector", current: 'input[id="email"]', suggested: "input#email" }
    ]);
  });

  it("suggests child combinators for descendant-only chains", () => {
    const explanation = explainSelector("nav a");
    expect(explanation.performanceNotes).toEqual([
      "Uses descendant combinator - child combinator (>) may be faster for direct children"
    ]);
    expect(explanation.hints).toEqual([{ kind: "prefer-child-combinator", at: "nav a" }]);
  });

  it("reports deep chains and suggests caching", () => {
    const explanation = explainSelector("a b c d");
    expect(explanation.performanceNotes[0]).toBe("Deep descendant chain (4 levels) - consider simplifying");
    expect(explanation.hints).toEqual([
      { kind: "too-broad", reason: "Deep nesting requires traversing many ancestors" },
      { kind: "prefer-child-combinator", at: "a b" },
      { kind: "cache-selector" }
    ]);
  });

  it("suggests caching long selectors", () => {
    expect(explainSelector(".navigation-container > .menu-item-link").hints).toEqual([{ kind: "cache-selector" }]);
  });

  it("honours custom thresholds", () => {
    const explanation = explainSelector("ul > li", { deepChainThreshold: 1, cacheLengthThreshold: 100 });
    expect(explanation.hints).toEqual([{ kind: "too-broad", reason: "Deep nesting requires traversing many ancestors" }]);
  });

  it("counts matches against a document", () => {
    const { document } = buildDocument("<ul><li>a</li><li>b</li></ul>", resolveSoupConfig());
    expect(explainSelector(CompiledSelector.compile("li"), { document }).estimatedMatches).toBe(2);
  });

  it("reports specificity of the whole list", () => {
    expect(explainSelector("#a .b, p").specificity).toEqual({ ids: 1, classes: 1, elements: 1 });
  });
});

describe("formatHint", () => {
  it("renders each hint kind", () => {
    expect(formatHint({ kind: "optimal" })).toBe("Selector is already optimal");
    expect(formatHint({ kind: "use-id-selector", current: "[id=\"x\"]", suggested: "#x" })).toBe(
      "Consider ID selector: '[id=\"x\"]' -> '#x'"
    );
    expect(formatHint({ kind: "too-broad", reason: "why" })).toBe("Too broad: why");
    expect(formatHint({ kind: "prefer-child-combinator", at: "a b" })).toBe("Consider child combinator (>) at: a b");
    expect(formatHint({ kind: "avoid-universal" })).toBe("Avoid universal selector (*) for better performance");
    expect(formatHint({ kind: "cache-selector" })).toBe("Consider caching this compiled selector for reuse");
  });
});

describe("formatExplanation", () => {
  it("renders a report", () => {
    expect(formatExplanation(explainSelector("#main"))).toBe(
      [
        "Selector: #main",
        "Specificity: (1, 0, 0)",
        "Description: Element with ID 'main'",
        "",
        "Performance:",
        "  - ID selector - uses fast indexed lookup",
        "",
        "Optimization hints:",
        "  - Selector is already optimal"
      ].join("\n")
    );
  });

  it("includes the match count and omits empty sections", () => {
    const { document } = buildDocument("<div>x</div>", resolveSoupConfig());
    expect(formatExplanation(explainSelector("div", { document }))).toBe(
      ["Selector: div", "Specificity: (0, 0, 1)", "Description: <div> elements", "Estimated matches: 1"].join("\n")
    );
  });
});
