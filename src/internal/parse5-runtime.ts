// Typed surface over parse5. Nothing else in the tree imports parse5 directly.
import { defaultTreeAdapter, html, parse as parse5Parse, parseFragment as parse5ParseFragment } from "parse5";
import type { DefaultTreeAdapterMap, ParserError } from "parse5";

export type Parse5Document = DefaultTreeAdapterMap["document"];
export type Parse5DocumentFragment = DefaultTreeAdapterMap["documentFragment"];
export type Parse5ParentNode = DefaultTreeAdapterMap["parentNode"];
export type Parse5ChildNode = DefaultTreeAdapterMap["childNode"];
export type Parse5Element = DefaultTreeAdapterMap["element"];
export type Parse5Template = DefaultTreeAdapterMap["template"];
export type Parse5TextNode = DefaultTreeAdapterMap["textNode"];
export type Parse5CommentNode = DefaultTreeAdapterMap["commentNode"];
export type Parse5ParseError = ParserError;

export interface RuntimeParseOptions {
  readonly onParseError?: (error: Parse5ParseError) => void;
}

export function isElementNode(node: Parse5ChildNode): node is Parse5Element {
  return "tagName" in node;
}

export function isTemplateNode(node: Parse5Element): node is Parse5Template {
  return "content" in node;
}

export function isTextNode(node: Parse5ChildNode): node is Parse5TextNode {
  return node.nodeName === "#text";
}

export function isCommentNode(node: Parse5ChildNode): node is Parse5CommentNode {
  return node.nodeName === "#comment";
}

export function parseDocument(input: string, options: RuntimeParseOptions = {}): Parse5Document {
  return parse5Parse(input, {
    sourceCodeLocationInfo: true,
    scriptingEnabled: true,
    onParseError: options.onParseError ?? null
  });
}

export function parseFragmentInContext(
  contextTagName: string,
  input: string,
  options: RuntimeParseOptions = {}
): Parse5DocumentFragment {
  const context = defaultTreeAdapter.createElement(contextTagName, html.NS.HTML, []);
  return parse5ParseFragment(context, input, {
    sourceCodeLocationInfo: true,
    scriptingEnabled: true,
    onParseError: options.onParseError ?? null
  });
}
