export { CompiledSelector, toCompiled } from "./compiled.js";
export { matchesNth, parseNthFormula } from "./nth.js";
export { parseSelectorList } from "./parse.js";
export { compareSpecificity, computeSpecificity, formatSpecificity } from "./specificity.js";
export { tokenizeSelector } from "./tokenize.js";

export type { NthFormula } from "./nth.js";
export type { Specificity } from "./specificity.js";
export type { SelectorToken } from "./tokens.js";
export type {
  AttributeOperator,
  AttributeSelector,
  Combinator,
  ComplexSelector,
  CompoundSelector,
  RelativeSelector,
  SimpleSelector
} from "./types.js";
export { formatComplex, formatCompound, formatNthFormula, formatSelectorList, formatSimple } from "./format.js";
