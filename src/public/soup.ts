import { explainSelector, type SelectorExplanation } from "../internal/explain/explain.js";
import { Sequence } from "../internal/navigation/mod.js";
import { attributeValue, queryIndexFor, selectFirst } from "../internal/query/mod.js";
import { CompiledSelector, toCompiled } from "../internal/selector/compiled.js";
import { innerHtml, outerHtml, textContent } from "../internal/serializer/serialize.js";
import { selectTagAttrs, selectTags, selectTagTexts, Tag, wrapTag } from "./tag.js";

import type { ParseWarning } from "../internal/tree/build.js";
import type { DocumentArena } from "../internal/tree/arena.js";
import type { ElementNode, NodeId } from "../internal/tree/types.js";
import type { AttrFilter } from "./types.js";

function matchesFilter(element: ElementNode, filter: AttrFilter): boolean {
  const value = attributeValue(element, filter.name.toLowerCase());
  if (value === undefined) {
    return false;
  }
  switch (filter.kind) {
    case "exists":
      return true;
    case "equals":
      return value === filter.value;
    case "contains":
      return value.includes(filter.value);
    case "starts-with":
      return value.startsWith(filter.value);
    case "ends-with":
      return value.endsWith(filter.value);
  }
}

/**
 * A parsed document with the query surface on top. Soups are read-only once
 * built; the query index is created lazily on the first indexed lookup.
 */
export class Soup {
  readonly document: DocumentArena;
  readonly warnings: readonly ParseWarning[];

  constructor(document: DocumentArena, warnings: readonly ParseWarning[] = []) {
    this.document = document;
    this.warnings = Object.freeze([...warnings]);
  }

  get isFragment(): boolean {
    return this.document.kind === "fragment";
  }

  /** Total number of nodes in the arena, text and comments included. */
  get length(): number {
    return this.document.size;
  }

  /**
   * The `<html>` element of a document. For a fragment this is the context
   * element the fragment was parsed in, whose children are the fragment's
   * top-level nodes.
   */
  root(): Tag | null {
    return wrapTag(this.document, this.document.root);
  }

  title(): string | null {
    const id = selectFirst(this.document, CompiledSelector.compile("title"));
    return id === null ? null : textContent(this.document, id);
  }

  text(): string {
    const root = this.document.root;
    return root === null ? "" : textContent(this.document, root);
  }

  toHtml(): string {
    const root = this.document.root;
    if (root === null) {
      return "";
    }
    return this.isFragment ? innerHtml(this.document, root) : outerHtml(this.document, root);
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
    return wrapTag(this.document, selectFirst(this.document, selector));
  }

  selectCompiled(selector: CompiledSelector): Tag[] {
    return selectTags(this.document, selector, null);
  }

  selectText(selector: string | CompiledSelector): string[] {
    return selectTagTexts(this.document, toCompiled(selector), null);
  }

  selectAttr(selector: string | CompiledSelector, name: string): string[] {
    return selectTagAttrs(this.document, toCompiled(selector), null, name);
  }

  /** Elements with the given tag name (ASCII case-insensitive), in document order. */
  findAllByTagName(name: string): Sequence<Tag> {
    const document = this.document;
    const key = name.toLowerCase();
    return new Sequence(() => this.#queryable(queryIndexFor(document).byTag.get(key) ?? [])[Symbol.iterator]()).map(
      (id) => new Tag(document, id)
    );
  }

  findAllByAttr(filter: AttrFilter): Sequence<Tag> {
    const document = this.document;
    return new Sequence(() => this.#queryable(queryIndexFor(document).order)[Symbol.iterator]())
      .filter((id) => matchesFilter(document.element(id), filter))
      .map((id) => new Tag(document, id));
  }

  /** Explains `selector`, estimating its match count against this document. */
  explain(selector: string | CompiledSelector): SelectorExplanation {
    return explainSelector(selector, { document: this.document });
  }

  // A fragment's context element is never a query result.
  #queryable(ids: readonly NodeId[]): readonly NodeId[] {
    const root = this.document.root;
    return this.isFragment && root !== null ? ids.filter((id) => id !== root) : ids;
  }
}
