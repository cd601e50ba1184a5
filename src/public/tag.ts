import { AttributeNotFoundError, invariant } from "../internal/errors.js";
import {
  ancestors,
  childElements,
  childrenByClass,
  childrenByName,
  closest,
  descendants,
  elementSiblings,
  nextElementSibling,
  nextElementSiblings,
  parentElement,
  prevElementSibling,
  prevElementSiblings,
  Sequence,
  textNodes
} from "../internal/navigation/mod.js";
import { attributeValue, classNames, matches, selectAll, selectFirst } from "../internal/query/mod.js";
import {
  innerHtml,
  innerHtmlInto,
  outerHtml,
  outerHtmlInto,
  textContent,
  textInto
} from "../internal/serializer/serialize.js";
import { CompiledSelector, toCompiled } from "../internal/selector/compiled.js";

import type { DocumentArena } from "../internal/tree/arena.js";
import type { Attribute, ElementNode, NodeId } from "../internal/tree/types.js";

export function wrapTag(document: DocumentArena, id: NodeId | null): Tag | null {
  return id === null ? null : new Tag(document, id);
}

/** Runs a compiled selector and wraps the hits. `scope` null means the whole document. */
export function selectTags(document: DocumentArena, selector: CompiledSelector, scope: NodeId | null): Tag[] {
  return selectAll(document, selector, scope).map((id) => new Tag(document, id));
}

export function selectTagTexts(document: DocumentArena, selector: CompiledSelector, scope: NodeId | null): string[] {
  return selectAll(document, selector, scope).map((id) => textContent(document, id));
}

export function selectTagAttrs(
  document: DocumentArena,
  selector: CompiledSelector,
  scope: NodeId | null,
  name: string
): string[] {
  const lowered = name.toLowerCase();
  const values: string[] = [];
  for (const id of selectAll(document, selector, scope)) {
    const value = attributeValue(document.element(id), lowered);
    if (value !== undefined) {
      values.push(value);
    }
  }
  return values;
}

/**
 * Handle on one element: the arena plus a node id. Holds no other state, so
 * creating and discarding handles is cheap.
 */
export class Tag {
  readonly id: NodeId;
  readonly #document: DocumentArena;

  constructor(document: DocumentArena, id: NodeId) {
    invariant(document.isElement(id), `node ${String(id)} is not an element`);
    this.#document = document;
    this.id = id;
  }

  get document(): DocumentArena {
    return this.#document;
  }

  get name(): string {
    return this.#element().name;
  }

  get attributes(): readonly Attribute[] {
    return this.#element().attributes;
  }

  /** Number of element children. */
  get length(): number {
    return childElements(this.#document, this.id).count();
  }

  get(name: string): string | null {
    return attributeValue(this.#element(), name.toLowerCase()) ?? null;
  }

  /** @throws AttributeNotFoundError */
  getOrThrow(name: string): string {
    const value = this.get(name);
    if (value === null) {
      throw new AttributeNotFoundError(name);
    }
    return value;
  }

  attr(name: string): string | null {
    return this.get(name);
  }

  hasAttr(name: string): boolean {
    return this.get(name) !== null;
  }

  /** Attribute map; the first occurrence of a name wins. */
  attrs(): Readonly<Record<string, string>> {
    const seen = new Set<string>();
    const entries: [string, string][] = [];
    for (const attribute of this.#element().attributes) {
      if (!seen.has(attribute.name)) {
        seen.add(attribute.name);
        entries.push([attribute.name, attribute.value]);
      }
    }
    // fromEntries defines own properties, so `__proto__` stays an ordinary key.
    return Object.freeze(Object.fromEntries(entries));
  }

  classes(): string[] {
    return classNames(this.#element());
  }

  hasClass(name: string): boolean {
    return this.classes().includes(name);
  }

  text(): string {
    return textContent(this.#document, this.id);
  }

  innerHtml(): string {
    return innerHtml(this.#document, this.id);
  }

  outerHtml(): string {
    return outerHtml(this.#document, this.id);
  }

  textInto(out: string[]): void {
    textInto(this.#document, this.id, out);
  }

  innerHtmlInto(out: string[]): void {
    innerHtmlInto(this.#document, this.id, out);
  }

  outerHtmlInto(out: string[]): void {
    outerHtmlInto(this.#document, this.id, out);
  }

  /** Values of the direct text children, in order. */
  textNodes(): string[] {
    return textNodes(this.#document, this.id);
  }

  parent(): Tag | null {
    return wrapTag(this.#document, parentElement(this.#document, this.id));
  }

  children(): Sequence<Tag> {
    return this.#wrap(childElements(this.#document, this.id));
  }

  childrenByName(name: string): Sequence<Tag> {
    return this.#wrap(childrenByName(this.#document, this.id, name));
  }

  childrenByClass(className: string): Sequence<Tag> {
    return this.#wrap(childrenByClass(this.#document, this.id, className));
  }

  nextSibling(): Tag | null {
    return wrapTag(this.#document, nextElementSibling(this.#document, this.id));
  }

  prevSibling(): Tag | null {
    return wrapTag(this.#document, prevElementSibling(this.#document, this.id));
  }

  nextSiblings(): Sequence<Tag> {
    return this.#wrap(nextElementSiblings(this.#document, this.id));
  }

  /** Nearest first. */
  prevSiblings(): Sequence<Tag> {
    return this.#wrap(prevElementSiblings(this.#document, this.id));
  }

  siblings(): Sequence<Tag> {
    return this.#wrap(elementSiblings(this.#document, this.id));
  }

  /** Nearest first. */
  ancestors(): Sequence<Tag> {
    return this.#wrap(ancestors(this.#document, this.id));
  }

  parents(): Sequence<Tag> {
    return this.ancestors();
  }

  descendants(): Sequence<Tag> {
    return this.#wrap(descendants(this.#document, this.id));
  }

  /** @throws QueryError when `selector` is a string that does not compile. */
  closest(selector: string | CompiledSelector): Tag | null {
    return wrapTag(this.#document, closest(this.#document, this.id, toCompiled(selector)));
  }

  matches(selector: string | CompiledSelector): boolean {
    return matches(this.#document, this.id, toCompiled(selector));
  }

  find(selector: string): Tag | null {
    return this.findCompiled(CompiledSelector.compile(selector));
  }

  findAll(selector: string): Tag[] {
    return this.selectCompiled(CompiledSelector.compile(selector));
  }

  select(selector: string): Tag[] {
    return this.findAll(selector);
  }

  findCompiled(selector: CompiledSelector): Tag | null {
    return wrapTag(this.#document, selectFirst(this.#document, selector, this.id));
  }

  selectCompiled(selector: CompiledSelector): Tag[] {
    return selectTags(this.#document, selector, this.id);
  }

  selectText(selector: string | CompiledSelector): string[] {
    return selectTagTexts(this.#document, toCompiled(selector), this.id);
  }

  selectAttr(selector: string | CompiledSelector, name: string): string[] {
    return selectTagAttrs(this.#document, toCompiled(selector), this.id, name);
  }

  equals(other: Tag): boolean {
    return other.#document === this.#document && other.id === this.id;
  }

  toString(): string {
    return this.outerHtml();
  }

  #element(): ElementNode {
    return this.#document.element(this.id);
  }

  #wrap(ids: Sequence<NodeId>): Sequence<Tag> {
    const document = this.#document;
    return ids.map((id) => new Tag(document, id));
  }
}
