import type { NthFormula } from "./nth.js";

export type Combinator = "descendant" | "child" | "adjacent" | "sibling";

export type AttributeOperator =
  | "exists"
  | "equals"
  | "includes"
  | "dash-match"
  | "prefix"
  | "suffix"
  | "substring";

export type StatePseudoClassName =
  | "first-child"
  | "last-child"
  | "only-child"
  | "first-of-type"
  | "last-of-type"
  | "only-of-type"
  | "empty"
  | "root"
  | "checked"
  | "disabled"
  | "enabled"
  | "link"
  | "any-link"
  | "hover"
  | "focus"
  | "focus-within"
  | "focus-visible"
  | "active"
  | "visited"
  | "target";

export type NthPseudoClassName = "nth-child" | "nth-last-child" | "nth-of-type" | "nth-last-of-type";

export interface TypeSelector {
  readonly kind: "type";
  /** Lowercased. */
  readonly name: string;
}

export interface UniversalSelector {
  readonly kind: "universal";
}

export interface IdSelector {
  readonly kind: "id";
  readonly name: string;
}

export interface ClassSelector {
  readonly kind: "class";
  readonly name: string;
}

export interface AttributeSelector {
  readonly kind: "attribute";
  /** Lowercased. */
  readonly name: string;
  readonly operator: AttributeOperator;
  readonly value: string;
  readonly caseInsensitive: boolean;
}

export interface PseudoClassSelector {
  readonly kind: "pseudo-class";
  readonly name: StatePseudoClassName;
}

export interface NthSelector {
  readonly kind: "nth";
  readonly name: NthPseudoClassName;
  readonly formula: NthFormula;
  readonly of: readonly ComplexSelector[] | null;
}

export interface LogicalSelector {
  readonly kind: "logical";
  readonly name: "not" | "is" | "where";
  readonly selectors: readonly ComplexSelector[];
}

export interface HasSelector {
  readonly kind: "has";
  readonly selectors: readonly RelativeSelector[];
}

export interface PseudoElementSelector {
  readonly kind: "pseudo-element";
  readonly name: string;
}

export type SimpleSelector =
  | TypeSelector
  | UniversalSelector
  | IdSelector
  | ClassSelector
  | AttributeSelector
  | PseudoClassSelector
  | NthSelector
  | LogicalSelector
  | HasSelector
  | PseudoElementSelector;

export interface CompoundSelector {
  readonly selectors: readonly SimpleSelector[];
}

/** `compounds[i]` and `compounds[i + 1]` are joined by `combinators[i]`. */
export interface ComplexSelector {
  readonly compounds: readonly CompoundSelector[];
  readonly combinators: readonly Combinator[];
}

/** A `:has()` argument; `combinator` relates the anchor to the leftmost compound. */
export interface RelativeSelector {
  readonly combinator: Combinator;
  readonly selector: ComplexSelector;
}
