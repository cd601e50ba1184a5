import {
  iterateDescendantElements,
  iterateNextElementSiblings,
  nextElementSibling,
  parentElement,
  prevElementSibling
} from "../navigation/traverse.js";
import { matchesNth } from "../selector/nth.js";

import type { DocumentArena } from "../tree/arena.js";
import type { ElementNode, NodeId } from "../tree/types.js";
import type {
  AttributeSelector,
  Combinator,
  ComplexSelector,
  CompoundSelector,
  NthSelector,
  RelativeSelector,
  SimpleSelector,
  StatePseudoClassName
} from "../selector/types.js";

interface RelativeAnchor {
  readonly element: NodeId;
  readonly combinator: Combinator;
}

const FORM_CONTROLS = new Set(["button", "input", "select", "textarea", "optgroup", "option", "fieldset"]);
const LINK_ELEMENTS = new Set(["a", "area", "link"]);
const ASCII_WHITESPACE = /[ \t\n\f\r]+/;

function sameName(element: ElementNode, lowerName: string): boolean {
  return element.name === lowerName || element.name.toLowerCase() === lowerName;
}

export function attributeValue(element: ElementNode, lowerName: string): string | undefined {
  for (const attribute of element.attributes) {
    if (attribute.name === lowerName || attribute.name.toLowerCase() === lowerName) {
      return attribute.value;
    }
  }
  return undefined;
}

export function classNames(element: ElementNode): string[] {
  const value = attributeValue(element, "class");
  return value === undefined ? [] : value.split(ASCII_WHITESPACE).filter((name) => name.length > 0);
}

function matchesAttribute(element: ElementNode, selector: AttributeSelector): boolean {
  const actual = attributeValue(element, selector.name);
  if (actual === undefined) {
    return false;
  }
  if (selector.operator === "exists") {
    return true;
  }

  const value = selector.caseInsensitive ? actual.toLowerCase() : actual;
  const expected = selector.caseInsensitive ? selector.value.toLowerCase() : selector.value;

  switch (selector.operator) {
    case "equals":
      return value === expected;
    case "includes":
      return (
        expected.length > 0 &&
        !ASCII_WHITESPACE.test(expected) &&
        value.split(ASCII_WHITESPACE).includes(expected)
      );
    case "dash-match":
      return value === expected || value.startsWith(`${expected}-`);
    case "prefix":
      return expected.length > 0 && value.startsWith(expected);
    case "suffix":
      return expected.length > 0 && value.endsWith(expected);
    case "substring":
      return expected.length > 0 && value.includes(expected);
  }
}

function hasSameName(document: DocumentArena, id: NodeId, element: ElementNode): boolean {
  return document.element(id).name === element.name;
}

function countSiblings(
  document: DocumentArena,
  id: NodeId,
  step: (document: DocumentArena, id: NodeId) => NodeId | null,
  accept: (sibling: NodeId) => boolean
): number {
  let total = 0;
  for (let current = step(document, id); current !== null; current = step(document, current)) {
    if (accept(current)) {
      total += 1;
    }
  }
  return total;
}

function matchesState(document: DocumentArena, id: NodeId, element: ElementNode, name: StatePseudoClassName): boolean {
  const ofType = (sibling: NodeId): boolean => hasSameName(document, sibling, element);
  switch (name) {
    case "first-child":
      return prevElementSibling(document, id) === null;
    case "last-child":
      return nextElementSibling(document, id) === null;
    case "only-child":
      return prevElementSibling(document, id) === null && nextElementSibling(document, id) === null;
    case "first-of-type":
      return countSiblings(document, id, prevElementSibling, ofType) === 0;
    case "last-of-type":
      return countSiblings(document, id, nextElementSibling, ofType) === 0;
    case "only-of-type":
      return (
        countSiblings(document, id, prevElementSibling, ofType) === 0 &&
        countSiblings(document, id, nextElementSibling, ofType) === 0
      );
    case "empty":
      return element.children.every((child) => {
        const node = document.node(child);
        return node.kind === "comment" || (node.kind === "text" && node.value.length === 0);
      });
    case "root":
      return document.root === id;
    case "checked": {
      const lower = element.name.toLowerCase();
      if (lower === "option") {
        return attributeValue(element, "selected") !== undefined;
      }
      const type = attributeValue(element, "type")?.toLowerCase();
      return (
        lower === "input" &&
        (type === "checkbox" || type === "radio") &&
        attributeValue(element, "checked") !== undefined
      );
    }
    case "disabled":
      return FORM_CONTROLS.has(element.name.toLowerCase()) && attributeValue(element, "disabled") !== undefined;
    case "enabled":
      return FORM_CONTROLS.has(element.name.toLowerCase()) && attributeValue(element, "disabled") === undefined;
    case "link":
    case "any-link":
      return LINK_ELEMENTS.has(element.name.toLowerCase()) && attributeValue(element, "href") !== undefined;
    case "hover":
    case "focus":
    case "focus-within":
    case "focus-visible":
    case "active":
    case "visited":
    case "target":
      return false;
  }
}

function matchesNthSelector(document: DocumentArena, id: NodeId, element: ElementNode, selector: NthSelector): boolean {
  const fromEnd = selector.name === "nth-last-child" || selector.name === "nth-last-of-type";
  const step = fromEnd ? nextElementSibling : prevElementSibling;

  let accept: (sibling: NodeId) => boolean;
  if (selector.name === "nth-of-type" || selector.name === "nth-last-of-type") {
    accept = (sibling) => hasSameName(document, sibling, element);
  } else if (selector.of !== null) {
    const of = selector.of;
    if (!matchesSelectorList(document, id, of)) {
      return false;
    }
    accept = (sibling) => matchesSelectorList(document, sibling, of);
  } else {
    accept = () => true;
  }

  return matchesNth(selector.formula, countSiblings(document, id, step, accept) + 1);
}

function matchesRelative(document: DocumentArena, anchor: NodeId, relative: RelativeSelector): boolean {
  const chain = startChain(relative.selector, { element: anchor, combinator: relative.combinator });
  const last = relative.selector.compounds.length - 1;
  const test = (candidate: NodeId): boolean => matchesAt(document, candidate, chain, last);

  switch (relative.combinator) {
    case "descendant":
    case "child":
      for (const candidate of iterateDescendantElements(document, anchor)) {
        if (test(candidate)) {
          return true;
        }
      }
      return false;
    case "adjacent":
    case "sibling":
      for (const sibling of iterateNextElementSiblings(document, anchor)) {
        if (test(sibling)) {
          return true;
        }
        for (const candidate of iterateDescendantElements(document, sibling)) {
          if (test(candidate)) {
            return true;
          }
        }
      }
      return false;
  }
}

function matchesSimple(document: DocumentArena, id: NodeId, element: ElementNode, selector: SimpleSelector): boolean {
  switch (selector.kind) {
    case "type":
      return sameName(element, selector.name);
    case "universal":
      return true;
    case "id":
      return attributeValue(element, "id") === selector.name;
    case "class":
      return classNames(element).includes(selector.name);
    case "attribute":
      return matchesAttribute(element, selector);
    case "pseudo-class":
      return matchesState(document, id, element, selector.name);
    case "nth":
      return matchesNthSelector(document, id, element, selector);
    case "logical":
      return selector.name === "not"
        ? !matchesSelectorList(document, id, selector.selectors)
        : matchesSelectorList(document, id, selector.selectors);
    case "has":
      return selector.selectors.some((relative) => matchesRelative(document, id, relative));
    case "pseudo-element":
      return false;
  }
}

export function matchesCompound(document: DocumentArena, id: NodeId, compound: CompoundSelector): boolean {
  const element = document.element(id);
  return compound.selectors.every((selector) => matchesSimple(document, id, element, selector));
}

function satisfiesAnchor(document: DocumentArena, id: NodeId, anchor: RelativeAnchor): boolean {
  switch (anchor.combinator) {
    case "child":
      return document.node(id).parent === anchor.element;
    case "descendant":
      for (let current = document.node(id).parent; current !== null; current = document.node(current).parent) {
        if (current === anchor.element) {
          return true;
        }
      }
      return false;
    case "adjacent":
      return prevElementSibling(document, id) === anchor.element;
    case "sibling":
      for (let current = prevElementSibling(document, id); current !== null; current = prevElementSibling(document, current)) {
        if (current === anchor.element) {
          return true;
        }
      }
      return false;
  }
}

interface ChainMatch {
  readonly complex: ComplexSelector;
  readonly anchor: RelativeAnchor | null;
  /** `position * document.size + id` pairs already known to fail. */
  readonly failed: Set<number>;
}

function startChain(complex: ComplexSelector, anchor: RelativeAnchor | null): ChainMatch {
  return { complex, anchor, failed: new Set() };
}

// Right-to-left: `position` indexes the compound that `id` must satisfy.
function matchesAt(document: DocumentArena, id: NodeId, chain: ChainMatch, position: number): boolean {
  const key = position * document.size + id;
  if (chain.failed.has(key)) {
    return false;
  }
  const matched = matchesStep(document, id, chain, position);
  if (!matched) {
    chain.failed.add(key);
  }
  return matched;
}

function matchesStep(document: DocumentArena, id: NodeId, chain: ChainMatch, position: number): boolean {
  const { complex, anchor } = chain;
  const compound = complex.compounds[position];
  if (compound === undefined || !matchesCompound(document, id, compound)) {
    return false;
  }

  if (position === 0) {
    return anchor === null || satisfiesAnchor(document, id, anchor);
  }

  const next = position - 1;
  switch (complex.combinators[next]) {
    case "child": {
      const parent = parentElement(document, id);
      return parent !== null && matchesAt(document, parent, chain, next);
    }
    case "descendant":
      for (let current = parentElement(document, id); current !== null; current = parentElement(document, current)) {
        if (matchesAt(document, current, chain, next)) {
          return true;
        }
      }
      return false;
    case "adjacent": {
      const previous = prevElementSibling(document, id);
      return previous !== null && matchesAt(document, previous, chain, next);
    }
    case "sibling":
      for (let current = prevElementSibling(document, id); current !== null; current = prevElementSibling(document, current)) {
        if (matchesAt(document, current, chain, next)) {
          return true;
        }
      }
      return false;
    case undefined:
      return false;
  }
}

export function matchesComplex(document: DocumentArena, id: NodeId, complex: ComplexSelector): boolean {
  return matchesAt(document, id, startChain(complex, null), complex.compounds.length - 1);
}

export function matchesSelectorList(document: DocumentArena, id: NodeId, selectors: readonly ComplexSelector[]): boolean {
  return selectors.some((complex) => matchesComplex(document, id, complex));
}

