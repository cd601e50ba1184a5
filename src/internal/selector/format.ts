import type { NthFormula } from "./nth.js";
import type {
  AttributeOperator,
  Combinator,
  ComplexSelector,
  CompoundSelector,
  RelativeSelector,
  SimpleSelector
} from "./types.js";

// Display form for diagnostics. Identifiers are printed as parsed, without re-escaping.

const COMBINATOR_TEXT: Readonly<Record<Combinator, string>> = Object.freeze({
  descendant: " ",
  child: " > ",
  adjacent: " + ",
  sibling: " ~ "
});

const OPERATOR_TEXT: Readonly<Record<Exclude<AttributeOperator, "exists">, string>> = Object.freeze({
  equals: "=",
  includes: "~=",
  "dash-match": "|=",
  prefix: "^=",
  suffix: "$=",
  substring: "*="
});

export function formatNthFormula(formula: NthFormula): string {
  const { a, b } = formula;
  if (a === 0) {
    return String(b);
  }
  const step = a === 1 ? "n" : a === -1 ? "-n" : `${String(a)}n`;
  if (b === 0) {
    return step;
  }
  return b > 0 ? `${step}+${String(b)}` : `${step}${String(b)}`;
}

function formatRelative(relative: RelativeSelector): string {
  const prefix = relative.combinator === "descendant" ? "" : `${COMBINATOR_TEXT[relative.combinator].trim()} `;
  return `${prefix}${formatComplex(relative.selector)}`;
}

export function formatSimple(selector: SimpleSelector): string {
  switch (selector.kind) {
    case "type":
      return selector.name;
    case "universal":
      return "*";
    case "id":
      return `#${selector.name}`;
    case "class":
      return `.${selector.name}`;
    case "attribute": {
      if (selector.operator === "exists") {
        return `[${selector.name}]`;
      }
      const value = selector.value.replace(/\\/g, "\\\\").replace(/"/g, "\\\"");
      const flag = selector.caseInsensitive ? " i" : "";
      return `[${selector.name}${OPERATOR_TEXT[selector.operator]}"${value}"${flag}]`;
    }
    case "pseudo-class":
      return `:${selector.name}`;
    case "nth": {
      const of = selector.of === null ? "" : ` of ${formatSelectorList(selector.of)}`;
      return `:${selector.name}(${formatNthFormula(selector.formula)}${of})`;
    }
    case "logical":
      return `:${selector.name}(${formatSelectorList(selector.selectors)})`;
    case "has":
      return `:has(${selector.selectors.map(formatRelative).join(", ")})`;
    case "pseudo-element":
      return `::${selector.name}`;
  }
}

export function formatCompound(compound: CompoundSelector): string {
  return compound.selectors.map(formatSimple).join("");
}

export function formatComplex(complex: ComplexSelector): string {
  let text = "";
  complex.compounds.forEach((compound, index) => {
    const combinator = index === 0 ? undefined : complex.combinators[index - 1];
    text += `${combinator === undefined ? "" : COMBINATOR_TEXT[combinator]}${formatCompound(compound)}`;
  });
  return text;
}

export function formatSelectorList(selectors: readonly ComplexSelector[]): string {
  return selectors.map(formatComplex).join(", ");
}
