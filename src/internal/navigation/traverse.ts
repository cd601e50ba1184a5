import type { DocumentArena } from "../tree/arena.js";
import type { NodeId } from "../tree/types.js";

/**
 * Parent element, or null at the top. The synthetic context root of a
 * fragment is never returned.
 */
export function parentElement(document: DocumentArena, id: NodeId): NodeId | null {
  const parent = document.node(id).parent;
  if (parent === null || (document.kind === "fragment" && parent === document.root)) {
    return null;
  }
  return parent;
}

export function nextElementSibling(document: DocumentArena, id: NodeId): NodeId | null {
  let current = document.node(id).nextSibling;
  while (current !== null && !document.isElement(current)) {
    current = document.node(current).nextSibling;
  }
  return current;
}

export function prevElementSibling(document: DocumentArena, id: NodeId): NodeId | null {
  let current = document.node(id).prevSibling;
  while (current !== null && !document.isElement(current)) {
    current = document.node(current).prevSibling;
  }
  return current;
}

export function firstElementChild(document: DocumentArena, id: NodeId): NodeId | null {
  const first = document.node(id).children[0];
  if (first === undefined) {
    return null;
  }
  return document.isElement(first) ? first : nextElementSibling(document, first);
}

// Pre-order successor of `id` that stays inside `scope`.
function nextInPreorder(document: DocumentArena, id: NodeId, scope: NodeId): NodeId | null {
  const first = document.node(id).children[0];
  if (first !== undefined) {
    return first;
  }

  let current = id;
  while (current !== scope) {
    const node = document.node(current);
    if (node.nextSibling !== null) {
      return node.nextSibling;
    }
    if (node.parent === null) {
      return null;
    }
    current = node.parent;
  }
  return null;
}

export function* iterateDescendantElements(document: DocumentArena, scope: NodeId): Generator<NodeId> {
  let current = nextInPreorder(document, scope, scope);
  while (current !== null) {
    if (document.isElement(current)) {
      yield current;
    }
    current = nextInPreorder(document, current, scope);
  }
}

export function* iterateChildElements(document: DocumentArena, id: NodeId): Generator<NodeId> {
  for (let current = firstElementChild(document, id); current !== null; current = nextElementSibling(document, current)) {
    yield current;
  }
}

export function* iterateNextElementSiblings(document: DocumentArena, id: NodeId): Generator<NodeId> {
  for (let current = nextElementSibling(document, id); current !== null; current = nextElementSibling(document, current)) {
    yield current;
  }
}

export function* iteratePrevElementSiblings(document: DocumentArena, id: NodeId): Generator<NodeId> {
  for (let current = prevElementSibling(document, id); current !== null; current = prevElementSibling(document, current)) {
    yield current;
  }
}

export function* iterateAncestors(document: DocumentArena, id: NodeId): Generator<NodeId> {
  for (let current = parentElement(document, id); current !== null; current = parentElement(document, current)) {
    yield current;
  }
}
