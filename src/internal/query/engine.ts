import { iterateDescendantElements } from "../navigation/traverse.js";
import { queryIndexFor, type QueryIndex } from "./indices.js";
import { matchesSelectorList } from "./match.js";

import type { CompiledSelector } from "../selector/compiled.js";
import type { CompoundSelector } from "../selector/types.js";
import type { DocumentArena } from "../tree/arena.js";
import type { NodeId } from "../tree/types.js";

interface IndexKey {
  readonly table: "byId" | "byClass" | "byTag";
  readonly key: string;
  /** The key alone decides the match. */
  readonly exact: boolean;
}

type CandidatePlan =
  | { readonly kind: "traverse" }
  | { readonly kind: "indexed"; readonly candidates: readonly NodeId[]; readonly exact: boolean };

function indexKeyOf(compound: CompoundSelector, alone: boolean): IndexKey | null {
  const exact = alone && compound.selectors.length === 1;
  for (const simple of compound.selectors) {
    if (simple.kind === "id") {
      return { table: "byId", key: simple.name, exact };
    }
  }
  for (const simple of compound.selectors) {
    if (simple.kind === "class") {
      return { table: "byClass", key: simple.name, exact };
    }
  }
  for (const simple of compound.selectors) {
    if (simple.kind === "type") {
      return { table: "byTag", key: simple.name, exact };
    }
  }
  return null;
}

function mergeInDocumentOrder(index: QueryIndex, lists: readonly (readonly NodeId[])[]): readonly NodeId[] {
  const [first, ...rest] = lists;
  if (first === undefined) {
    return [];
  }
  if (rest.length === 0) {
    return first;
  }
  const merged = [...new Set(lists.flat())];
  merged.sort((left, right) => index.position(left) - index.position(right));
  return merged;
}

function planCandidates(index: QueryIndex, selector: CompiledSelector): CandidatePlan {
  const lists: (readonly NodeId[])[] = [];
  let exact = true;
  for (const complex of selector.selectors) {
    const rightmost = complex.compounds[complex.compounds.length - 1];
    const key = rightmost === undefined ? null : indexKeyOf(rightmost, complex.compounds.length === 1);
    if (key === null) {
      return { kind: "traverse" };
    }
    lists.push(index[key.table].get(key.key) ?? []);
    exact &&= key.exact;
  }
  return { kind: "indexed", candidates: mergeInDocumentOrder(index, lists), exact };
}

function* iterateByTraversal(
  document: DocumentArena,
  selector: CompiledSelector,
  base: NodeId,
  includeBase: boolean
): Generator<NodeId> {
  if (includeBase && matchesSelectorList(document, base, selector.selectors)) {
    yield base;
  }
  for (const id of iterateDescendantElements(document, base)) {
    if (matchesSelectorList(document, id, selector.selectors)) {
      yield id;
    }
  }
}

function* iterateMatches(document: DocumentArena, selector: CompiledSelector, scope: NodeId | null): Generator<NodeId> {
  const root = document.root;
  if (root === null) {
    return;
  }

  // Document scope covers the root itself, except a fragment's synthetic context root.
  const includeRoot = scope === null && document.kind === "document";
  const base = scope ?? root;
  const index = queryIndexFor(document);

  const plan: CandidatePlan = index.isReachable(base) ? planCandidates(index, selector) : { kind: "traverse" };
  if (plan.kind === "traverse") {
    yield* iterateByTraversal(document, selector, base, includeRoot);
    return;
  }

  for (const id of plan.candidates) {
    const inScope = (includeRoot && id === base) || index.isStrictDescendant(base, id);
    if (inScope && (plan.exact || matchesSelectorList(document, id, selector.selectors))) {
      yield id;
    }
  }
}

/** All matches in document order. `scope` restricts results to its strict descendants. */
export function selectAll(document: DocumentArena, selector: CompiledSelector, scope: NodeId | null = null): NodeId[] {
  return [...iterateMatches(document, selector, scope)];
}

export function selectFirst(
  document: DocumentArena,
  selector: CompiledSelector,
  scope: NodeId | null = null
): NodeId | null {
  for (const id of iterateMatches(document, selector, scope)) {
    return id;
  }
  return null;
}

export function matches(document: DocumentArena, id: NodeId, selector: CompiledSelector): boolean {
  return document.isElement(id) && matchesSelectorList(document, id, selector.selectors);
}

/** Same results as selectAll without consulting any index. */
export function selectAllByTraversal(
  document: DocumentArena,
  selector: CompiledSelector,
  scope: NodeId | null = null
): NodeId[] {
  const root = document.root;
  if (root === null) {
    return [];
  }
  return [...iterateByTraversal(document, selector, scope ?? root, scope === null && document.kind === "document")];
}
