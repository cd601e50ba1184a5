import { readFile } from "node:fs/promises";

import { resolveSoupConfig, type SoupConfig } from "../internal/config.js";
import { decodeHtmlBytes, type EncodingSniffOptions } from "../internal/encoding/mod.js";
import { ParseError } from "../internal/errors.js";
import { explainSelector, type ExplainOptions, type SelectorExplanation } from "../internal/explain/mod.js";
import { CompiledSelector } from "../internal/selector/compiled.js";
import { buildDocument, buildFragment } from "../internal/tree/build.js";
import { Soup } from "./soup.js";

import type { BatchEntry } from "./types.js";

export { Soup } from "./soup.js";
export { Tag } from "./tag.js";
export { CompiledSelector } from "../internal/selector/compiled.js";
export { Sequence } from "../internal/navigation/sequence.js";
export { DocumentArena } from "../internal/tree/arena.js";
export {
  AttributeNotFoundError,
  getSpanContext,
  InvariantError,
  ParseError,
  QueryError
} from "../internal/errors.js";
export { ConsoleLogger, SilentLogger } from "../internal/logger.js";
export { DEFAULT_SOUP_CONFIG, resolveSoupConfig } from "../internal/config.js";
export { compareSpecificity, formatSpecificity } from "../internal/selector/specificity.js";
export { formatExplanation, formatHint } from "../internal/explain/mod.js";
export { sniffHtmlEncoding } from "../internal/encoding/mod.js";

export type {
  AttrFilter,
  Attribute,
  AttributeNotFoundPayload,
  BatchEntry,
  DocumentKind,
  EncodingSniffOptions,
  ExplainOptions,
  Logger,
  NodeId,
  OptimizationHint,
  ParseErrorPayload,
  ParseWarning,
  QueryErrorPayload,
  SelectorExplanation,
  SoupConfig,
  SourcePosition,
  SourceSpan,
  SpanContext,
  Specificity
} from "./types.js";

/**
 * Parses a complete HTML document.
 *
 * @throws ParseError on empty input, on nesting deeper than `maxDepth`, and
 * in strict mode on the first recovered parse error.
 */
export function parse(html: string, config: SoupConfig = {}): Soup {
  const built = buildDocument(html, resolveSoupConfig(config));
  return new Soup(built.document, built.warnings);
}

/**
 * Parses `html` as the children of a `context` element. Empty input gives an
 * empty soup rather than an error.
 */
export function parseFragment(html: string, context = "body", config: SoupConfig = {}): Soup {
  const built = buildFragment(html, context, resolveSoupConfig(config));
  return new Soup(built.document, built.warnings);
}

export function parseBytes(bytes: Uint8Array, config: SoupConfig = {}, encoding: EncodingSniffOptions = {}): Soup {
  const resolved = resolveSoupConfig(config);
  const decoded = decodeHtmlBytes(bytes, encoding);
  resolved.logger.debug("decoded input", {
    bytes: bytes.byteLength,
    encoding: decoded.sniff.encoding,
    source: decoded.sniff.source
  });
  const built = buildDocument(decoded.text, resolved);
  return new Soup(built.document, built.warnings);
}

/** Reads and parses a file. File system errors propagate unchanged. */
export async function parseFile(
  path: string | URL,
  config: SoupConfig = {},
  encoding: EncodingSniffOptions = {}
): Promise<Soup> {
  const bytes = await readFile(path);
  return parseBytes(bytes, config, encoding);
}

/**
 * Parses every input on its own. A failure is recorded in its entry and does
 * not stop the rest; entries keep input order.
 */
export function parseBatch(inputs: readonly string[], config: SoupConfig = {}): BatchEntry[] {
  const resolved = resolveSoupConfig(config);
  return inputs.map((html, index): BatchEntry => {
    try {
      const built = buildDocument(html, resolved);
      return { ok: true, index, soup: new Soup(built.document, built.warnings) };
    } catch (error) {
      if (!(error instanceof ParseError)) {
        throw error;
      }
      resolved.logger.warn("batch entry failed", { index, code: error.payload.code });
      return { ok: false, index, error };
    }
  });
}

/** @throws QueryError when `selector` is not a valid selector list. */
export function compileSelector(selector: string): CompiledSelector {
  return CompiledSelector.compile(selector);
}

export function explain(selector: string | CompiledSelector, options: ExplainOptions = {}): SelectorExplanation {
  return explainSelector(selector, options);
}
