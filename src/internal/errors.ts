export interface SourcePosition {
  readonly line: number;
  readonly column: number;
  readonly offset: number;
}

export interface SourceSpan {
  readonly start: SourcePosition;
  readonly end: SourcePosition;
}

export interface SpanContext {
  readonly lineNumber: number;
  readonly column: number;
  readonly lineText: string;
}

export interface QueryErrorPayload {
  readonly code: "INVALID_SELECTOR";
  readonly selector: string;
  readonly reason: string;
  readonly span?: SourceSpan;
}

export type ParseErrorPayload =
  | { readonly code: "MAX_DEPTH_EXCEEDED"; readonly maxDepth: number; readonly span?: SourceSpan }
  | { readonly code: "EMPTY_INPUT" }
  | { readonly code: "ENCODING_ERROR"; readonly message: string }
  | { readonly code: "MALFORMED_HTML"; readonly message: string; readonly span?: SourceSpan }
  | { readonly code: "INTERNAL_ERROR"; readonly message: string };

export interface AttributeNotFoundPayload {
  readonly code: "ATTRIBUTE_NOT_FOUND";
  readonly attribute: string;
}

function atLocation(span: SourceSpan | undefined): string {
  return span === undefined
    ? ""
    : ` at line ${String(span.start.line)}, column ${String(span.start.column)}`;
}

function formatParseError(payload: ParseErrorPayload): string {
  switch (payload.code) {
    case "MAX_DEPTH_EXCEEDED":
      return `maximum nesting depth of ${String(payload.maxDepth)} exceeded${atLocation(payload.span)}`;
    case "EMPTY_INPUT":
      return "empty or whitespace-only input";
    case "ENCODING_ERROR":
      return `encoding error: ${payload.message}`;
    case "MALFORMED_HTML":
      return `malformed HTML: ${payload.message}${atLocation(payload.span)}`;
    case "INTERNAL_ERROR":
      return `internal parser error: ${payload.message}`;
  }
}

export class QueryError extends Error {
  readonly payload: QueryErrorPayload;

  constructor(payload: QueryErrorPayload) {
    super(
      payload.span === undefined
        ? `invalid selector: ${payload.reason}`
        : `invalid selector${atLocation(payload.span)}: ${payload.reason}`
    );
    this.name = "QueryError";
    this.payload = payload;
  }

  get line(): number | null {
    return this.payload.span?.start.line ?? null;
  }

  get column(): number | null {
    return this.payload.span?.start.column ?? null;
  }
}

export class ParseError extends Error {
  readonly payload: ParseErrorPayload;

  constructor(payload: ParseErrorPayload) {
    super(formatParseError(payload));
    this.name = "ParseError";
    this.payload = payload;
  }

  get span(): SourceSpan | undefined {
    return "span" in this.payload ? this.payload.span : undefined;
  }
}

export class AttributeNotFoundError extends Error {
  readonly payload: AttributeNotFoundPayload;

  constructor(attribute: string) {
    super(`attribute '${attribute}' not found on element`);
    this.name = "AttributeNotFoundError";
    this.payload = { code: "ATTRIBUTE_NOT_FOUND", attribute };
  }
}

// Programmer errors: dangling ids, broken arena links. Never caught internally.
export class InvariantError extends Error {
  constructor(message: string) {
    super(`invariant violated: ${message}`);
    this.name = "InvariantError";
  }
}

export function invariant(condition: boolean, message: string): asserts condition {
  if (!condition) {
    throw new InvariantError(message);
  }
}

export function positionAt(source: string, offset: number): SourcePosition {
  const clamped = Math.max(0, Math.min(offset, source.length));
  let line = 1;
  let lineStart = 0;
  for (let index = 0; index < clamped; index += 1) {
    if (source.charCodeAt(index) === 0x0a) {
      line += 1;
      lineStart = index + 1;
    }
  }
  return { line, column: clamped - lineStart + 1, offset: clamped };
}

export function spanAt(source: string, start: number, end: number): SourceSpan {
  return { start: positionAt(source, start), end: positionAt(source, end) };
}

export function getSpanContext(source: string, span: SourceSpan): SpanContext {
  const lines = source.split("\n");
  const lineText = lines[span.start.line - 1] ?? "";
  return {
    lineNumber: span.start.line,
    column: span.start.column,
    lineText: lineText.endsWith("\r") ? lineText.slice(0, -1) : lineText
  };
}
