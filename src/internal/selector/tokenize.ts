import { QueryError, spanAt } from "../errors.js";

import type { SelectorToken } from "./tokens.js";

const REPLACEMENT_CHARACTER = "\uFFFD";

export function invalidSelector(source: string, reason: string, start: number, end = start): QueryError {
  return new QueryError({
    code: "INVALID_SELECTOR",
    selector: source,
    reason,
    span: spanAt(source, start, Math.max(start, end))
  });
}

function isWhitespace(code: number): boolean {
  return code === 0x20 || code === 0x09 || code === 0x0a || code === 0x0c || code === 0x0d;
}

function isNewline(code: number): boolean {
  return code === 0x0a || code === 0x0c || code === 0x0d;
}

function isDigit(code: number): boolean {
  return code >= 0x30 && code <= 0x39;
}

function isHexDigit(code: number): boolean {
  return isDigit(code) || (code >= 0x41 && code <= 0x46) || (code >= 0x61 && code <= 0x66);
}

function isNameStart(code: number): boolean {
  return (
    (code >= 0x41 && code <= 0x5a) ||
    (code >= 0x61 && code <= 0x7a) ||
    code === 0x5f ||
    code >= 0x80 ||
    code === 0x00
  );
}

function isNameChar(code: number): boolean {
  return isNameStart(code) || isDigit(code) || code === 0x2d;
}

class SelectorLexer {
  readonly #source: string;
  #position = 0;

  constructor(source: string) {
    this.#source = source;
  }

  tokenize(): SelectorToken[] {
    const tokens: SelectorToken[] = [];
    for (;;) {
      const token = this.#next();
      tokens.push(token);
      if (token.type === "EOF") {
        return tokens;
      }
    }
  }

  #code(offset = 0): number {
    const index = this.#position + offset;
    return index < this.#source.length ? this.#source.charCodeAt(index) : -1;
  }

  #isValidEscape(offset: number): boolean {
    const next = this.#code(offset + 1);
    return this.#code(offset) === 0x5c && next !== -1 && !isNewline(next);
  }

  #startsIdentifier(offset = 0): boolean {
    const code = this.#code(offset);
    if (code === 0x2d) {
      const next = this.#code(offset + 1);
      return (next !== -1 && isNameStart(next)) || next === 0x2d || this.#isValidEscape(offset + 1);
    }
    return (code !== -1 && isNameStart(code)) || this.#isValidEscape(offset);
  }

  #next(): SelectorToken {
    const start = this.#position;
    const code = this.#code();

    if (code === -1) {
      return { type: "EOF", start, end: start };
    }

    if (isWhitespace(code)) {
      while (isWhitespace(this.#code())) {
        this.#position += 1;
      }
      return { type: "Whitespace", start, end: this.#position };
    }

    if (code === 0x22 || code === 0x27) {
      return this.#consumeString(code);
    }

    if (code === 0x23) {
      if (isNameChar(this.#code(1)) || this.#isValidEscape(1)) {
        const isIdentifier = this.#startsIdentifier(1);
        this.#position += 1;
        const value = this.#consumeName();
        return { type: "Hash", value, isIdentifier, start, end: this.#position };
      }
      return this.#delim(start);
    }

    if (isDigit(code) || (code === 0x2d && isDigit(this.#code(1)))) {
      return this.#consumeNumber(start);
    }

    if (this.#startsIdentifier()) {
      const value = this.#consumeName();
      if (this.#code() === 0x28) {
        this.#position += 1;
        return { type: "Function", name: value, start, end: this.#position };
      }
      return { type: "Ident", value, start, end: this.#position };
    }

    if (code === 0x5c) {
      throw invalidSelector(this.#source, "invalid escape sequence", start, start + 1);
    }

    switch (code) {
      case 0x3a:
        return this.#punctuation("Colon", start);
      case 0x2c:
        return this.#punctuation("Comma", start);
      case 0x5b:
        return this.#punctuation("LeftBracket", start);
      case 0x5d:
        return this.#punctuation("RightBracket", start);
      case 0x28:
        return this.#punctuation("LeftParen", start);
      case 0x29:
        return this.#punctuation("RightParen", start);
      default:
        return this.#delim(start);
    }
  }

  #punctuation(
    type: "Colon" | "Comma" | "LeftBracket" | "RightBracket" | "LeftParen" | "RightParen",
    start: number
  ): SelectorToken {
    this.#position += 1;
    return { type, start, end: this.#position };
  }

  #delim(start: number): SelectorToken {
    const codePoint = this.#source.codePointAt(start) ?? 0;
    const value = String.fromCodePoint(codePoint);
    this.#position += value.length;
    return { type: "Delim", value, start, end: this.#position };
  }

  #consumeNumber(start: number): SelectorToken {
    this.#position += 1;
    while (isDigit(this.#code())) {
      this.#position += 1;
    }
    if (this.#code() === 0x2e && isDigit(this.#code(1))) {
      this.#position += 1;
      while (isDigit(this.#code())) {
        this.#position += 1;
      }
    }
    return { type: "Number", value: this.#source.slice(start, this.#position), start, end: this.#position };
  }

  #consumeName(): string {
    let value = "";
    for (;;) {
      const code = this.#code();
      if (code === 0x00) {
        value += REPLACEMENT_CHARACTER;
        this.#position += 1;
      } else if (code !== -1 && isNameChar(code)) {
        const codePoint = this.#source.codePointAt(this.#position) ?? code;
        const char = String.fromCodePoint(codePoint);
        value += char;
        this.#position += char.length;
      } else if (this.#isValidEscape(0)) {
        this.#position += 1;
        value += this.#consumeEscape();
      } else {
        return value;
      }
    }
  }

  // Expects the position just past the backslash.
  #consumeEscape(): string {
    const code = this.#code();
    if (code === -1) {
      return REPLACEMENT_CHARACTER;
    }

    if (isHexDigit(code)) {
      let hex = "";
      while (hex.length < 6 && isHexDigit(this.#code())) {
        hex += String.fromCharCode(this.#code());
        this.#position += 1;
      }
      if (this.#code() === 0x0d && this.#code(1) === 0x0a) {
        this.#position += 2;
      } else if (isWhitespace(this.#code())) {
        this.#position += 1;
      }
      const value = Number.parseInt(hex, 16);
      if (value === 0 || (value >= 0xd800 && value <= 0xdfff) || value > 0x10ffff) {
        return REPLACEMENT_CHARACTER;
      }
      return String.fromCodePoint(value);
    }

    const codePoint = this.#source.codePointAt(this.#position) ?? code;
    const char = String.fromCodePoint(codePoint);
    this.#position += char.length;
    return char;
  }

  #consumeString(quote: number): SelectorToken {
    const start = this.#position;
    this.#position += 1;
    let value = "";
    for (;;) {
      const code = this.#code();
      if (code === -1 || isNewline(code)) {
        throw invalidSelector(this.#source, "unterminated string", start, this.#position);
      }

      if (code === quote) {
        this.#position += 1;
        return { type: "String", value, start, end: this.#position };
      }

      if (code === 0x5c) {
        const next = this.#code(1);
        if (next === -1) {
          this.#position += 1;
          continue;
        }
        if (isNewline(next)) {
          this.#position += next === 0x0d && this.#code(2) === 0x0a ? 3 : 2;
          continue;
        }
        this.#position += 1;
        value += this.#consumeEscape();
        continue;
      }

      value += code === 0x00 ? REPLACEMENT_CHARACTER : String.fromCharCode(code);
      this.#position += 1;
    }
  }
}

export function tokenizeSelector(source: string): SelectorToken[] {
  return new SelectorLexer(source).tokenize();
}
