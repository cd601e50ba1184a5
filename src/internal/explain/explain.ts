import { selectAll } from "../query/engine.js";
import { toCompiled, type CompiledSelector } from "../selector/compiled.js";
import { formatCompound } from "../selector/format.js";
import { formatSpecificity, type Specificity } from "../selector/specificity.js";

import type { DocumentArena } from "../tree/arena.js";
import type { Combinator, ComplexSelector, CompoundSelector, SimpleSelector } from "../selector/types.js";

export type OptimizationHint =
  | { readonly kind: "optimal" }
  | { readonly kind: "use-id-selector"; readonly current: string; readonly suggested: string }
  | { readonly kind: "too-broad"; readonly reason: string }
  | { readonly kind: "prefer-child-combinator"; readonly at: string }
  | { readonly kind: "avoid-universal" }
  | { readonly kind: "cache-selector" };

export interface SelectorExplanation {
  readonly source: string;
  readonly specificity: Specificity;
  readonly description: string;
  readonly performanceNotes: readonly string[];
  readonly hints: readonly OptimizationHint[];
  /** Document-scoped match count; null when no document was supplied. */
  readonly estimatedMatches: number | null;
}

export interface ExplainOptions {
  readonly document?: DocumentArena;
  readonly deepChainThreshold?: number;
  readonly cacheLengthThreshold?: number;
}

const DEFAULT_EXPLAIN_OPTIONS = Object.freeze({
  deepChainThreshold: 3,
  cacheLengthThreshold: 30
});

const COMBINATOR_NAMES: readonly (readonly [Combinator, string])[] = [
  ["child", "a child"],
  ["descendant", "a descendant"],
  ["adjacent", "an adjacent sibling"],
  ["sibling", "a general sibling"]
];

const PLAIN_IDENTIFIER = /^-?[A-Za-z_][A-Za-z0-9_-]*$/;

function nestedLists(simple: SimpleSelector): readonly ComplexSelector[] {
  switch (simple.kind) {
    case "logical":
      return simple.selectors;
    case "has":
      return simple.selectors.map((relative) => relative.selector);
    case "nth":
      return simple.of ?? [];
    default:
      return [];
  }
}

function containsUniversal(selectors: readonly ComplexSelector[]): boolean {
  const pending: ComplexSelector[] = [...selectors];
  for (;;) {
    const complex = pending.pop();
    if (complex === undefined) {
      return false;
    }
    for (const compound of complex.compounds) {
      for (const simple of compound.selectors) {
        if (simple.kind === "universal") {
          return true;
        }
        pending.push(...nestedLists(simple));
      }
    }
  }
}

function describeCompound(compound: CompoundSelector, source: string): string {
  const [only] = compound.selectors;
  if (compound.selectors.length === 1 && only?.kind === "id") {
    return `Element with ID '${only.name}'`;
  }
  if (only?.kind === "type" && compound.selectors.length === 1) {
    return `<${only.name}> elements`;
  }

  const classes: string[] = [];
  for (const simple of compound.selectors) {
    if (simple.kind !== "class") {
      return `Elements matching '${source}'`;
    }
    classes.push(`'${simple.name}'`);
  }
  return classes.length === 1 ? `Elements with class ${classes.join("")}` : `Elements with classes ${classes.join(", ")}`;
}

function describe(selectors: readonly ComplexSelector[], source: string): string {
  const [first] = selectors;
  if (first === undefined || selectors.length > 1) {
    return `Elements matching any of ${String(selectors.length)} selectors`;
  }

  for (const [combinator, name] of COMBINATOR_NAMES) {
    if (first.combinators.includes(combinator)) {
      return `Elements matching ${name} selector`;
    }
  }

  const [compound] = first.compounds;
  return compound === undefined ? `Elements matching '${source}'` : describeCompound(compound, source);
}

function isLoneId(selectors: readonly ComplexSelector[]): boolean {
  const [first] = selectors;
  const compound = first?.compounds[0];
  return (
    selectors.length === 1 &&
    first?.compounds.length === 1 &&
    compound?.selectors.length === 1 &&
    compound.selectors[0]?.kind === "id"
  );
}

function idSuggestion(compound: CompoundSelector): OptimizationHint | null {
  const type = compound.selectors.find((simple) => simple.kind === "type");
  for (const simple of compound.selectors) {
    if (
      simple.kind === "attribute" &&
      simple.name === "id" &&
      simple.operator === "equals" &&
      !simple.caseInsensitive &&
      PLAIN_IDENTIFIER.test(simple.value)
    ) {
      const prefix = type?.kind === "type" ? type.name : "";
      return { kind: "use-id-selector", current: formatCompound(compound), suggested: `${prefix}#${simple.value}` };
    }
  }
  return null;
}

function firstDescendantStep(selectors: readonly ComplexSelector[]): string | null {
  for (const complex of selectors) {
    if (complex.combinators.length === 0 || !complex.combinators.every((combinator) => combinator === "descendant")) {
      continue;
    }
    const left = complex.compounds[0];
    const right = complex.compounds[1];
    if (left !== undefined && right !== undefined) {
      return `${formatCompound(left)} ${formatCompound(right)}`;
    }
  }
  return null;
}

export function explainSelector(
  selector: string | CompiledSelector,
  options: ExplainOptions = {}
): SelectorExplanation {
  const compiled = toCompiled(selector);
  const deepChainThreshold = options.deepChainThreshold ?? DEFAULT_EXPLAIN_OPTIONS.deepChainThreshold;
  const cacheLengthThreshold = options.cacheLengthThreshold ?? DEFAULT_EXPLAIN_OPTIONS.cacheLengthThreshold;
  const { selectors, source } = compiled;

  const notes: string[] = [];
  const hints: OptimizationHint[] = [];
  const longestChain = Math.max(0, ...selectors.map((complex) => complex.compounds.length));

  if (containsUniversal(selectors)) {
    notes.push("Contains universal selector - may be slow on large documents");
    hints.push({ kind: "avoid-universal" });
  }

  if (longestChain > deepChainThreshold) {
    notes.push(`Deep descendant chain (${String(longestChain)} levels) - consider simplifying`);
    hints.push({ kind: "too-broad", reason: "Deep nesting requires traversing many ancestors" });
  }

  for (const complex of selectors) {
    for (const compound of complex.compounds) {
      const suggestion = idSuggestion(compound);
      if (suggestion !== null) {
        hints.push(suggestion);
      }
    }
  }

  if (isLoneId(selectors)) {
    notes.push("ID selector - uses fast indexed lookup");
    hints.push({ kind: "optimal" });
  }

  const descendantStep = firstDescendantStep(selectors);
  if (descendantStep !== null) {
    notes.push("Uses descendant combinator - child combinator (>) may be faster for direct children");
    hints.push({ kind: "prefer-child-combinator", at: descendantStep });
  }

  if (source.length > cacheLengthThreshold || longestChain > 2) {
    hints.push({ kind: "cache-selector" });
  }

  return Object.freeze({
    source,
    specificity: compiled.specificity,
    description: describe(selectors, source),
    performanceNotes: Object.freeze(notes),
    hints: Object.freeze(hints),
    estimatedMatches: options.document === undefined ? null : selectAll(options.document, compiled).length
  });
}

export function formatHint(hint: OptimizationHint): string {
  switch (hint.kind) {
    case "optimal":
      return "Selector is already optimal";
    case "use-id-selector":
      return `Consider ID selector: '${hint.current}' -> '${hint.suggested}'`;
    case "too-broad":
      return `Too broad: ${hint.reason}`;
    case "prefer-child-combinator":
      return `Consider child combinator (>) at: ${hint.at}`;
    case "avoid-universal":
      return "Avoid universal selector (*) for better performance";
    case "cache-selector":
      return "Consider caching this compiled selector for reuse";
  }
}

export function formatExplanation(explanation: SelectorExplanation): string {
  const lines = [
    `Selector: ${explanation.source}`,
    `Specificity: ${formatSpecificity(explanation.specificity)}`,
    `Description: ${explanation.description}`
  ];
  if (explanation.estimatedMatches !== null) {
    lines.push(`Estimated matches: ${String(explanation.estimatedMatches)}`);
  }
  if (explanation.performanceNotes.length > 0) {
    lines.push("", "Performance:", ...explanation.performanceNotes.map((note) => `  - ${note}`));
  }
  if (explanation.hints.length > 0) {
    lines.push("", "Optimization hints:", ...explanation.hints.map((hint) => `  - ${formatHint(hint)}`));
  }
  return lines.join("\n");
}
