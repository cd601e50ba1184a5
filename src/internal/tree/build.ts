import type { ResolvedSoupConfig } from "../config.js";
import { ParseError, type SourceSpan } from "../errors.js";
import {
  isCommentNode,
  isElementNode,
  isTemplateNode,
  isTextNode,
  parseDocument,
  parseFragmentInContext,
  type Parse5ChildNode,
  type Parse5Element,
  type Parse5ParseError
} from "../parse5-runtime.js";
import { DocumentArena } from "./arena.js";

import type { Attribute, NodeId } from "./types.js";

export interface ParseWarning {
  readonly code: string;
  readonly message: string;
  readonly span?: SourceSpan;
}

export interface BuildResult {
  readonly document: DocumentArena;
  readonly warnings: readonly ParseWarning[];
}

interface LocationLike {
  readonly startLine: number;
  readonly startCol: number;
  readonly startOffset: number;
  readonly endLine: number;
  readonly endCol: number;
  readonly endOffset: number;
}

interface PendingNode {
  readonly source: Parse5ChildNode;
  readonly parent: NodeId;
  readonly depth: number;
  readonly keepWhitespace: boolean;
}

// Whitespace inside these elements is content, not formatting.
const WHITESPACE_SENSITIVE_ELEMENTS = new Set([
  "pre",
  "listing",
  "textarea",
  "script",
  "style",
  "title",
  "xmp",
  "plaintext"
]);

const FORMATTING_WHITESPACE = /^[ \t\f\r]*\n[ \t\n\f\r]*$/;

function toSpan(location: LocationLike | null | undefined): SourceSpan | undefined {
  if (location === null || location === undefined) {
    return undefined;
  }

  return {
    start: { line: location.startLine, column: location.startCol, offset: location.startOffset },
    end: { line: location.endLine, column: location.endCol, offset: location.endOffset }
  };
}

function toWarning(error: Parse5ParseError): ParseWarning {
  const span = toSpan(error);
  return {
    code: error.code,
    message: error.code,
    ...(span ? { span } : {})
  };
}

function toAttributes(element: Parse5Element): readonly Attribute[] {
  return element.attrs.map((attribute) => ({
    name:
      attribute.prefix !== undefined && attribute.prefix.length > 0
        ? `${attribute.prefix}:${attribute.name}`
        : attribute.name,
    value: attribute.value
  }));
}

function childrenOf(element: Parse5Element): readonly Parse5ChildNode[] {
  return isTemplateNode(element) ? element.content.childNodes : element.childNodes;
}

function runParser<T>(work: () => T): T {
  try {
    return work();
  } catch (error) {
    if (error instanceof ParseError) {
      throw error;
    }
    throw new ParseError({
      code: "INTERNAL_ERROR",
      message: error instanceof Error ? error.message : String(error)
    });
  }
}

function recoverOrFail(errors: readonly Parse5ParseError[], config: ResolvedSoupConfig): readonly ParseWarning[] {
  const warnings = errors.map(toWarning);
  const first = warnings[0];
  if (config.strictMode && first !== undefined) {
    throw new ParseError({
      code: "MALFORMED_HTML",
      message: first.message,
      ...(first.span ? { span: first.span } : {})
    });
  }
  return warnings;
}

function pushChildren(
  stack: PendingNode[],
  sources: readonly Parse5ChildNode[],
  parent: NodeId,
  depth: number,
  keepWhitespace: boolean
): void {
  for (let index = sources.length - 1; index >= 0; index -= 1) {
    const source = sources[index];
    if (source !== undefined) {
      stack.push({ source, parent, depth, keepWhitespace });
    }
  }
}

function checkDepth(element: Parse5Element, depth: number, config: ResolvedSoupConfig): void {
  if (depth > config.maxDepth) {
    const span = toSpan(element.sourceCodeLocation);
    throw new ParseError({
      code: "MAX_DEPTH_EXCEEDED",
      maxDepth: config.maxDepth,
      ...(span ? { span } : {})
    });
  }
}

// Iterative so that documents near maxDepth cannot exhaust the call stack.
function appendSubtrees(
  document: DocumentArena,
  parent: NodeId,
  sources: readonly Parse5ChildNode[],
  depth: number,
  keepWhitespace: boolean,
  config: ResolvedSoupConfig
): void {
  const stack: PendingNode[] = [];
  pushChildren(stack, sources, parent, depth, keepWhitespace);

  for (;;) {
    const pending = stack.pop();
    if (pending === undefined) {
      return;
    }

    const { source } = pending;
    if (isElementNode(source)) {
      checkDepth(source, pending.depth, config);
      const id = document.createElement(source.tagName, toAttributes(source));
      document.appendChild(pending.parent, id);
      pushChildren(
        stack,
        childrenOf(source),
        id,
        pending.depth + 1,
        pending.keepWhitespace || WHITESPACE_SENSITIVE_ELEMENTS.has(source.tagName)
      );
      continue;
    }

    if (isTextNode(source)) {
      if (!pending.keepWhitespace && !config.preserveWhitespace && FORMATTING_WHITESPACE.test(source.value)) {
        continue;
      }
      document.appendChild(pending.parent, document.createText(source.value));
      continue;
    }

    if (isCommentNode(source) && config.includeComments) {
      document.appendChild(pending.parent, document.createComment(source.data));
    }
  }
}

export function buildDocument(input: string, config: ResolvedSoupConfig): BuildResult {
  if (input.trim().length === 0) {
    throw new ParseError({ code: "EMPTY_INPUT" });
  }

  const recovered: Parse5ParseError[] = [];
  const parsed = runParser(() =>
    parseDocument(input, {
      onParseError: (error) => {
        recovered.push(error);
      }
    })
  );
  const warnings = recoverOrFail(recovered, config);

  const htmlElement = parsed.childNodes.find(isElementNode);
  if (htmlElement === undefined) {
    throw new ParseError({ code: "INTERNAL_ERROR", message: "parser produced no root element" });
  }

  const document = new DocumentArena("document");
  checkDepth(htmlElement, 1, config);
  const root = document.createElement(htmlElement.tagName, toAttributes(htmlElement));
  document.setRoot(root);
  runParser(() => {
    appendSubtrees(document, root, childrenOf(htmlElement), 2, false, config);
  });

  config.logger.debug("parsed document", { nodes: document.size, recoveredErrors: warnings.length });
  return { document, warnings };
}

export function buildFragment(input: string, context: string, config: ResolvedSoupConfig): BuildResult {
  const contextName = context.trim().toLowerCase();
  if (contextName.length === 0) {
    throw new RangeError("fragment context must name an element");
  }

  const document = new DocumentArena("fragment");
  if (input.trim().length === 0) {
    return { document, warnings: [] };
  }

  const recovered: Parse5ParseError[] = [];
  const parsed = runParser(() =>
    parseFragmentInContext(contextName, input, {
      onParseError: (error) => {
        recovered.push(error);
      }
    })
  );
  const warnings = recoverOrFail(recovered, config);

  const root = document.createElement(contextName);
  document.setRoot(root);
  runParser(() => {
    appendSubtrees(
      document,
      root,
      parsed.childNodes,
      1,
      WHITESPACE_SENSITIVE_ELEMENTS.has(contextName),
      config
    );
  });

  config.logger.debug("parsed fragment", {
    context: contextName,
    nodes: document.size,
    recoveredErrors: warnings.length
  });
  return { document, warnings };
}
