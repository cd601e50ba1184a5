import { invariant } from "../errors.js";

import type { ArenaNode, Attribute, DocumentKind, ElementNode, NodeData, NodeId } from "./types.js";

interface MutableLinks {
  parent: NodeId | null;
  readonly children: NodeId[];
  prevSibling: NodeId | null;
  nextSibling: NodeId | null;
}

type StoredNode = NodeData & MutableLinks;

/**
 * Append-only node store. Nodes are addressed by their insertion index and
 * are never moved, freed or reparented once linked.
 */
export class DocumentArena {
  readonly kind: DocumentKind;
  readonly #nodes: StoredNode[] = [];
  #root: NodeId | null = null;
  #revision = 0;

  constructor(kind: DocumentKind = "document") {
    this.kind = kind;
  }

  get root(): NodeId | null {
    return this.#root;
  }

  get size(): number {
    return this.#nodes.length;
  }

  /** Bumped on every mutation; lazily built indices compare against it. */
  get revision(): number {
    return this.#revision;
  }

  createElement(name: string, attributes: readonly Attribute[] = []): NodeId {
    return this.#push({ kind: "element", name, attributes: Object.freeze([...attributes]) });
  }

  createText(value: string): NodeId {
    return this.#push({ kind: "text", value });
  }

  createComment(value: string): NodeId {
    return this.#push({ kind: "comment", value });
  }

  setRoot(id: NodeId): void {
    const node = this.#stored(id);
    invariant(this.#root === null, "document already has a root");
    invariant(node.kind === "element", `root ${String(id)} is not an element`);
    invariant(node.parent === null, `root ${String(id)} already has a parent`);
    this.#root = id;
    this.#revision += 1;
  }

  appendChild(parent: NodeId, child: NodeId): void {
    const parentNode = this.#stored(parent);
    const childNode = this.#stored(child);
    invariant(parent !== child, `node ${String(child)} cannot be its own child`);
    invariant(parentNode.kind === "element", `parent ${String(parent)} is not an element`);
    invariant(childNode.parent === null, `node ${String(child)} already has a parent`);
    invariant(child !== this.#root, `root ${String(child)} cannot be appended`);

    const previousLast = parentNode.children[parentNode.children.length - 1];
    if (previousLast !== undefined) {
      this.#stored(previousLast).nextSibling = child;
      childNode.prevSibling = previousLast;
    }
    childNode.parent = parent;
    parentNode.children.push(child);
    this.#revision += 1;
  }

  get(id: NodeId): ArenaNode | undefined {
    return Number.isInteger(id) ? this.#nodes[id] : undefined;
  }

  node(id: NodeId): ArenaNode {
    return this.#stored(id);
  }

  element(id: NodeId): ElementNode {
    const node = this.#stored(id);
    invariant(node.kind === "element", `node ${String(id)} is not an element`);
    return node;
  }

  isElement(id: NodeId): boolean {
    return this.get(id)?.kind === "element";
  }

  #push(data: NodeData): NodeId {
    const id = this.#nodes.length;
    this.#nodes.push({ ...data, parent: null, children: [], prevSibling: null, nextSibling: null });
    this.#revision += 1;
    return id;
  }

  #stored(id: NodeId): StoredNode {
    const node = Number.isInteger(id) ? this.#nodes[id] : undefined;
    invariant(node !== undefined, `unknown node id ${String(id)}`);
    return node;
  }
}
