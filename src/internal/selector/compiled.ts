import { parseSelectorList } from "./parse.js";
import { computeSpecificity, type Specificity } from "./specificity.js";

import type { ComplexSelector } from "./types.js";

/**
 * A parsed selector list. Holds no reference to any document, so one
 * instance can be reused across every document it is matched against.
 */
export class CompiledSelector {
  readonly source: string;
  readonly selectors: readonly ComplexSelector[];
  readonly specificity: Specificity;

  private constructor(source: string, selectors: readonly ComplexSelector[]) {
    this.source = source;
    this.selectors = selectors;
    this.specificity = computeSpecificity(selectors);
    Object.freeze(this);
  }

  /** @throws QueryError when `source` is not a valid selector list. */
  static compile(source: string): CompiledSelector {
    return new CompiledSelector(source, parseSelectorList(source));
  }

  toString(): string {
    return this.source;
  }
}

export function toCompiled(selector: string | CompiledSelector): CompiledSelector {
  return typeof selector === "string" ? CompiledSelector.compile(selector) : selector;
}
