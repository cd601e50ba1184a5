import { attributeValue, classNames } from "./match.js";

import type { DocumentArena } from "../tree/arena.js";
import type { NodeId } from "../tree/types.js";

const UNREACHABLE = -1;

/**
 * Lookup tables over the elements reachable from the root, each list in
 * document order. Built on first use and rebuilt when the arena revision
 * moves.
 */
export class QueryIndex {
  readonly revision: number;
  readonly byId = new Map<string, NodeId[]>();
  readonly byClass = new Map<string, NodeId[]>();
  readonly byTag = new Map<string, NodeId[]>();
  /** Reachable elements in pre-order. */
  readonly order: readonly NodeId[];
  readonly #position: Int32Array;
  readonly #subtreeEnd: Int32Array;

  constructor(document: DocumentArena) {
    this.revision = document.revision;
    this.#position = new Int32Array(document.size).fill(UNREACHABLE);
    this.#subtreeEnd = new Int32Array(document.size).fill(UNREACHABLE);

    const order: NodeId[] = [];
    const root = document.root;
    const stack: NodeId[] = root === null ? [] : [root];
    for (;;) {
      const id = stack.pop();
      if (id === undefined) {
        break;
      }
      const node = document.node(id);
      if (node.kind !== "element") {
        continue;
      }

      this.#position[id] = order.length;
      order.push(id);
      this.#add(this.byTag, node.name.toLowerCase(), id);
      const elementId = attributeValue(node, "id");
      if (elementId !== undefined && elementId.length > 0) {
        this.#add(this.byId, elementId, id);
      }
      for (const name of new Set(classNames(node))) {
        this.#add(this.byClass, name, id);
      }

      for (let index = node.children.length - 1; index >= 0; index -= 1) {
        const child = node.children[index];
        if (child !== undefined) {
          stack.push(child);
        }
      }
    }

    // Reverse pre-order visits every element after all of its descendants.
    const sizes = new Int32Array(document.size).fill(1);
    for (let index = order.length - 1; index >= 0; index -= 1) {
      const id = order[index];
      if (id === undefined) {
        continue;
      }
      const size = sizes[id] ?? 1;
      this.#subtreeEnd[id] = index + size - 1;
      const parent = document.node(id).parent;
      if (parent !== null) {
        sizes[parent] = (sizes[parent] ?? 1) + size;
      }
    }

    this.order = order;
  }

  /** Pre-order position, or -1 for nodes not reachable from the root. */
  position(id: NodeId): number {
    return this.#position[id] ?? UNREACHABLE;
  }

  isReachable(id: NodeId): boolean {
    return this.position(id) !== UNREACHABLE;
  }

  /** True when `id` lies strictly inside the subtree rooted at `ancestor`. */
  isStrictDescendant(ancestor: NodeId, id: NodeId): boolean {
    const start = this.position(ancestor);
    const position = this.position(id);
    if (start === UNREACHABLE || position === UNREACHABLE) {
      return false;
    }
    return position > start && position <= (this.#subtreeEnd[ancestor] ?? UNREACHABLE);
  }

  #add(table: Map<string, NodeId[]>, key: string, id: NodeId): void {
    const list = table.get(key);
    if (list === undefined) {
      table.set(key, [id]);
    } else {
      list.push(id);
    }
  }
}

const cache = new WeakMap<DocumentArena, QueryIndex>();

export function queryIndexFor(document: DocumentArena): QueryIndex {
  const cached = cache.get(document);
  if (cached !== undefined && cached.revision === document.revision) {
    return cached;
  }
  const index = new QueryIndex(document);
  cache.set(document, index);
  return index;
}
