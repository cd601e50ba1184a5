import type { ParseError } from "../internal/errors.js";
import type { Soup } from "./soup.js";

export type {
  AttributeNotFoundPayload,
  ParseErrorPayload,
  QueryErrorPayload,
  SourcePosition,
  SourceSpan,
  SpanContext
} from "../internal/errors.js";
export type { SoupConfig } from "../internal/config.js";
export type { Logger } from "../internal/logger.js";
export type { Attribute, DocumentKind, NodeId } from "../internal/tree/types.js";
export type { ParseWarning } from "../internal/tree/build.js";
export type { Specificity } from "../internal/selector/specificity.js";
export type { ExplainOptions, OptimizationHint, SelectorExplanation } from "../internal/explain/explain.js";
export type { EncodingSniffOptions } from "../internal/encoding/sniff.js";

/** Attribute predicate for `Soup.findAllByAttr`. Names compare case-insensitively. */
export type AttrFilter =
  | { readonly kind: "exists"; readonly name: string }
  | { readonly kind: "equals"; readonly name: string; readonly value: string }
  | { readonly kind: "contains"; readonly name: string; readonly value: string }
  | { readonly kind: "starts-with"; readonly name: string; readonly value: string }
  | { readonly kind: "ends-with"; readonly name: string; readonly value: string };

export type BatchEntry =
  | { readonly ok: true; readonly index: number; readonly soup: Soup }
  | { readonly ok: false; readonly index: number; readonly error: ParseError };
