import { classNames, matchesSelectorList } from "../query/match.js";
import { Sequence } from "./sequence.js";
import {
  iterateAncestors,
  iterateChildElements,
  iterateDescendantElements,
  iterateNextElementSiblings,
  iteratePrevElementSiblings
} from "./traverse.js";

import type { CompiledSelector } from "../selector/compiled.js";
import type { DocumentArena } from "../tree/arena.js";
import type { NodeId } from "../tree/types.js";

export { Sequence } from "./sequence.js";
export {
  firstElementChild,
  iterateDescendantElements,
  nextElementSibling,
  parentElement,
  prevElementSibling
} from "./traverse.js";

export function childElements(document: DocumentArena, id: NodeId): Sequence<NodeId> {
  return new Sequence(() => iterateChildElements(document, id));
}

export function nextElementSiblings(document: DocumentArena, id: NodeId): Sequence<NodeId> {
  return new Sequence(() => iterateNextElementSiblings(document, id));
}

/** Nearest first, i.e. reverse document order. */
export function prevElementSiblings(document: DocumentArena, id: NodeId): Sequence<NodeId> {
  return new Sequence(() => iteratePrevElementSiblings(document, id));
}

/** Every element sibling except `id` itself, in document order. */
export function elementSiblings(document: DocumentArena, id: NodeId): Sequence<NodeId> {
  return new Sequence(function* () {
    const parent = document.node(id).parent;
    if (parent === null) {
      return;
    }
    for (const sibling of iterateChildElements(document, parent)) {
      if (sibling !== id) {
        yield sibling;
      }
    }
  });
}

/** Nearest first. */
export function ancestors(document: DocumentArena, id: NodeId): Sequence<NodeId> {
  return new Sequence(() => iterateAncestors(document, id));
}

export function descendants(document: DocumentArena, id: NodeId): Sequence<NodeId> {
  return new Sequence(() => iterateDescendantElements(document, id));
}

/** Nearest matching ancestor; `id` itself is never considered. */
export function closest(document: DocumentArena, id: NodeId, selector: CompiledSelector): NodeId | null {
  for (const ancestor of iterateAncestors(document, id)) {
    if (matchesSelectorList(document, ancestor, selector.selectors)) {
      return ancestor;
    }
  }
  return null;
}

export function textNodes(document: DocumentArena, id: NodeId): string[] {
  const values: string[] = [];
  for (const child of document.node(id).children) {
    const node = document.node(child);
    if (node.kind === "text") {
      values.push(node.value);
    }
  }
  return values;
}

export function childrenByName(document: DocumentArena, id: NodeId, name: string): Sequence<NodeId> {
  const lowered = name.toLowerCase();
  return childElements(document, id).filter((child) => document.element(child).name.toLowerCase() === lowered);
}

export function childrenByClass(document: DocumentArena, id: NodeId, className: string): Sequence<NodeId> {
  return childElements(document, id).filter((child) => classNames(document.element(child)).includes(className));
}
