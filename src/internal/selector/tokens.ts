interface TokenBase {
  readonly start: number;
  readonly end: number;
}

export interface IdentToken extends TokenBase {
  readonly type: "Ident";
  readonly value: string;
}

export interface FunctionToken extends TokenBase {
  readonly type: "Function";
  readonly name: string;
}

export interface HashToken extends TokenBase {
  readonly type: "Hash";
  readonly value: string;
  readonly isIdentifier: boolean;
}

export interface StringToken extends TokenBase {
  readonly type: "String";
  readonly value: string;
}

export interface NumberToken extends TokenBase {
  readonly type: "Number";
  readonly value: string;
}

export interface DelimToken extends TokenBase {
  readonly type: "Delim";
  readonly value: string;
}

export interface WhitespaceToken extends TokenBase {
  readonly type: "Whitespace";
}

export interface PunctuationToken extends TokenBase {
  readonly type: "Colon" | "Comma" | "LeftBracket" | "RightBracket" | "LeftParen" | "RightParen";
}

export interface EOFToken extends TokenBase {
  readonly type: "EOF";
}

export type SelectorToken =
  | IdentToken
  | FunctionToken
  | HashToken
  | StringToken
  | NumberToken
  | DelimToken
  | WhitespaceToken
  | PunctuationToken
  | EOFToken;

export type SelectorTokenType = SelectorToken["type"];
