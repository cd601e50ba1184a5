import type { ComplexSelector, SimpleSelector } from "./types.js";

export interface Specificity {
  readonly ids: number;
  readonly classes: number;
  readonly elements: number;
}

export const ZERO_SPECIFICITY: Specificity = Object.freeze({ ids: 0, classes: 0, elements: 0 });

function weightOf(selector: SimpleSelector): Specificity {
  switch (selector.kind) {
    case "id":
      return { ids: 1, classes: 0, elements: 0 };
    case "class":
    case "attribute":
    case "pseudo-class":
    case "nth":
    case "logical":
    case "has":
      return { ids: 0, classes: 1, elements: 0 };
    case "type":
    case "pseudo-element":
      return { ids: 0, classes: 0, elements: 1 };
    case "universal":
      return ZERO_SPECIFICITY;
  }
}

/**
 * Sums every component of every list member. Arguments of `:not()`, `:is()`,
 * `:where()` and `:has()` are not descended into; each counts once as a
 * pseudo-class.
 */
export function computeSpecificity(selectors: readonly ComplexSelector[]): Specificity {
  let ids = 0;
  let classes = 0;
  let elements = 0;
  for (const complex of selectors) {
    for (const compound of complex.compounds) {
      for (const simple of compound.selectors) {
        const weight = weightOf(simple);
        ids += weight.ids;
        classes += weight.classes;
        elements += weight.elements;
      }
    }
  }
  return Object.freeze({ ids, classes, elements });
}

export function compareSpecificity(left: Specificity, right: Specificity): number {
  if (left.ids !== right.ids) {
    return left.ids < right.ids ? -1 : 1;
  }
  if (left.classes !== right.classes) {
    return left.classes < right.classes ? -1 : 1;
  }
  if (left.elements !== right.elements) {
    return left.elements < right.elements ? -1 : 1;
  }
  return 0;
}

export function formatSpecificity(specificity: Specificity): string {
  return `(${String(specificity.ids)}, ${String(specificity.classes)}, ${String(specificity.elements)})`;
}
