import type { QueryError } from "../errors.js";
import { parseNthFormula } from "./nth.js";
import { invalidSelector, tokenizeSelector } from "./tokenize.js";

import type { SelectorToken } from "./tokens.js";
import type {
  AttributeOperator,
  AttributeSelector,
  Combinator,
  ComplexSelector,
  CompoundSelector,
  NthPseudoClassName,
  NthSelector,
  RelativeSelector,
  SimpleSelector,
  StatePseudoClassName
} from "./types.js";

const STATE_PSEUDO_CLASSES: ReadonlySet<string> = new Set<StatePseudoClassName>([
  "first-child",
  "last-child",
  "only-child",
  "first-of-type",
  "last-of-type",
  "only-of-type",
  "empty",
  "root",
  "checked",
  "disabled",
  "enabled",
  "link",
  "any-link",
  "hover",
  "focus",
  "focus-within",
  "focus-visible",
  "active",
  "visited",
  "target"
]);

const NTH_PSEUDO_CLASSES: ReadonlySet<string> = new Set<NthPseudoClassName>([
  "nth-child",
  "nth-last-child",
  "nth-of-type",
  "nth-last-of-type"
]);

const LEGACY_PSEUDO_ELEMENTS: ReadonlySet<string> = new Set(["before", "after", "first-line", "first-letter"]);

const PSEUDO_ELEMENTS: ReadonlySet<string> = new Set([
  ...LEGACY_PSEUDO_ELEMENTS,
  "selection",
  "placeholder",
  "marker",
  "backdrop",
  "file-selector-button",
  "cue"
]);

const COMBINATORS: Readonly<Record<string, Combinator>> = Object.freeze({
  ">": "child",
  "+": "adjacent",
  "~": "sibling"
});

const ATTRIBUTE_OPERATORS: Readonly<Record<string, AttributeOperator>> = Object.freeze({
  "~": "includes",
  "|": "dash-match",
  "^": "prefix",
  $: "suffix",
  "*": "substring"
});

function isStatePseudoClass(name: string): name is StatePseudoClassName {
  return STATE_PSEUDO_CLASSES.has(name);
}

function isNthPseudoClass(name: string): name is NthPseudoClassName {
  return NTH_PSEUDO_CLASSES.has(name);
}

function combinatorOf(token: SelectorToken): Combinator | undefined {
  return token.type === "Delim" ? COMBINATORS[token.value] : undefined;
}

function isDelim(token: SelectorToken, value: string): boolean {
  return token.type === "Delim" && token.value === value;
}

function startsCompound(token: SelectorToken): boolean {
  switch (token.type) {
    case "Ident":
    case "Hash":
    case "Colon":
    case "LeftBracket":
      return true;
    case "Delim":
      return token.value === "*" || token.value === ".";
    default:
      return false;
  }
}

function hasPseudoElement(selectors: readonly SimpleSelector[]): boolean {
  return selectors.some((selector) => selector.kind === "pseudo-element");
}

class SelectorParser {
  readonly #source: string;
  readonly #tokens: readonly SelectorToken[];
  readonly #eof: SelectorToken;
  /** Functional pseudo-classes whose argument list is being parsed, innermost last. */
  readonly #enclosing: string[] = [];
  #index = 0;

  constructor(source: string) {
    this.#source = source;
    this.#tokens = tokenizeSelector(source);
    this.#eof = { type: "EOF", start: source.length, end: source.length };
  }

  parse(): readonly ComplexSelector[] {
    return this.#parseSelectorList(false);
  }

  #peek(offset = 0): SelectorToken {
    return this.#tokens[this.#index + offset] ?? this.#eof;
  }

  #advance(): SelectorToken {
    const token = this.#peek();
    if (token.type !== "EOF") {
      this.#index += 1;
    }
    return token;
  }

  #skipWhitespace(): boolean {
    let skipped = false;
    while (this.#peek().type === "Whitespace") {
      this.#advance();
      skipped = true;
    }
    return skipped;
  }

  #error(reason: string, token: SelectorToken, until: SelectorToken = token): QueryError {
    return invalidSelector(this.#source, reason, token.start, until.end);
  }

  #unexpected(token: SelectorToken): QueryError {
    if (token.type === "EOF") {
      return this.#error("unexpected end of input", token);
    }
    return this.#error(`unexpected '${this.#source.slice(token.start, token.end)}'`, token);
  }

  #expectRightParen(): void {
    const token = this.#peek();
    if (token.type === "RightParen") {
      this.#advance();
      return;
    }
    if (token.type === "EOF") {
      throw this.#error("unclosed parenthesis", token);
    }
    throw this.#unexpected(token);
  }

  #within<T>(name: string, parse: () => T): T {
    this.#enclosing.push(name);
    const result = parse();
    this.#enclosing.pop();
    return result;
  }

  #pseudoElement(name: string, token: SelectorToken): SimpleSelector {
    const enclosing = this.#enclosing[this.#enclosing.length - 1];
    if (enclosing !== undefined) {
      throw this.#error(`pseudo-elements are not allowed inside ':${enclosing}()'`, token);
    }
    return { kind: "pseudo-element", name };
  }

  #parseSelectorList(nested: boolean): ComplexSelector[] {
    const selectors: ComplexSelector[] = [];
    for (;;) {
      this.#skipWhitespace();
      selectors.push(this.#parseComplex());
      this.#skipWhitespace();

      const token = this.#peek();
      if (token.type === "Comma") {
        this.#advance();
        continue;
      }
      if (nested ? token.type === "RightParen" : token.type === "EOF") {
        return selectors;
      }
      if (nested && token.type === "EOF") {
        throw this.#error("unclosed parenthesis", token);
      }
      throw this.#unexpected(token);
    }
  }

  #parseRelativeList(): RelativeSelector[] {
    const selectors: RelativeSelector[] = [];
    for (;;) {
      this.#skipWhitespace();
      let combinator: Combinator = "descendant";
      const leading = combinatorOf(this.#peek());
      if (leading !== undefined) {
        this.#advance();
        this.#skipWhitespace();
        combinator = leading;
      }
      selectors.push({ combinator, selector: this.#parseComplex() });
      this.#skipWhitespace();

      const token = this.#peek();
      if (token.type === "Comma") {
        this.#advance();
        continue;
      }
      if (token.type === "RightParen") {
        return selectors;
      }
      if (token.type === "EOF") {
        throw this.#error("unclosed parenthesis", token);
      }
      throw this.#unexpected(token);
    }
  }

  #parseComplex(): ComplexSelector {
    const compounds: CompoundSelector[] = [this.#parseCompoundOrFail()];
    const combinators: Combinator[] = [];

    for (;;) {
      const hadWhitespace = this.#skipWhitespace();
      const token = this.#peek();
      let combinator = combinatorOf(token);

      if (combinator !== undefined) {
        this.#advance();
        this.#skipWhitespace();
      } else if (hadWhitespace && startsCompound(token)) {
        combinator = "descendant";
      } else {
        return { compounds, combinators };
      }

      const previous = compounds[compounds.length - 1];
      if (previous !== undefined && hasPseudoElement(previous.selectors)) {
        throw this.#error("pseudo-elements must be the last component of a selector", token);
      }

      const next = this.#parseCompound();
      if (next === null) {
        const found = this.#peek();
        if (token.type === "Delim") {
          throw this.#error(`expected selector after '${token.value}'`, found);
        }
        throw this.#unexpected(found);
      }
      combinators.push(combinator);
      compounds.push(next);
    }
  }

  #parseCompoundOrFail(): CompoundSelector {
    const compound = this.#parseCompound();
    if (compound !== null) {
      return compound;
    }
    const token = this.#peek();
    if (token.type === "EOF" || token.type === "Comma" || token.type === "RightParen") {
      throw this.#error("expected selector", token);
    }
    throw this.#unexpected(token);
  }

  #parseCompound(): CompoundSelector | null {
    const selectors: SimpleSelector[] = [];
    const first = this.#peek();

    if (first.type === "Ident") {
      this.#advance();
      selectors.push({ kind: "type", name: first.value.toLowerCase() });
    } else if (isDelim(first, "*")) {
      this.#advance();
      selectors.push({ kind: "universal" });
    }

    if (isDelim(this.#peek(), "|")) {
      throw this.#error("namespace prefixes are not supported", this.#peek());
    }

    for (;;) {
      const token = this.#peek();
      const subclass =
        token.type === "Hash" ||
        token.type === "Colon" ||
        token.type === "LeftBracket" ||
        isDelim(token, ".");

      if (subclass && hasPseudoElement(selectors)) {
        throw this.#error("pseudo-elements must be the last component of a selector", token);
      }

      if (token.type === "Hash") {
        this.#advance();
        if (!token.isIdentifier) {
          throw this.#error(`'#${token.value}' is not a valid ID selector`, token);
        }
        selectors.push({ kind: "id", name: token.value });
        continue;
      }

      if (isDelim(token, ".")) {
        this.#advance();
        const name = this.#peek();
        if (name.type !== "Ident") {
          throw this.#error("expected class name after '.'", name);
        }
        this.#advance();
        selectors.push({ kind: "class", name: name.value });
        continue;
      }

      if (token.type === "LeftBracket") {
        selectors.push(this.#parseAttribute());
        continue;
      }

      if (token.type === "Colon") {
        selectors.push(this.#parsePseudo());
        continue;
      }

      if (selectors.length > 0 && (token.type === "Ident" || isDelim(token, "*"))) {
        throw this.#error("type and universal selectors must come first in a compound selector", token);
      }

      return selectors.length > 0 ? { selectors } : null;
    }
  }

  #parseAttribute(): AttributeSelector {
    const open = this.#advance();
    this.#skipWhitespace();

    const nameToken = this.#peek();
    if (nameToken.type === "EOF") {
      throw this.#error("unterminated attribute selector", open, nameToken);
    }
    if (isDelim(nameToken, "|") || isDelim(nameToken, "*")) {
      throw this.#error("namespace prefixes are not supported", nameToken);
    }
    if (nameToken.type !== "Ident") {
      throw this.#error("expected attribute name", nameToken);
    }
    this.#advance();
    const name = nameToken.value.toLowerCase();

    if (isDelim(this.#peek(), "|") && !isDelim(this.#peek(1), "=")) {
      throw this.#error("namespace prefixes are not supported", this.#peek());
    }
    this.#skipWhitespace();

    const token = this.#peek();
    if (token.type === "RightBracket") {
      this.#advance();
      return { kind: "attribute", name, operator: "exists", value: "", caseInsensitive: false };
    }

    let operator: AttributeOperator;
    if (isDelim(token, "=")) {
      this.#advance();
      operator = "equals";
    } else {
      const prefixed = token.type === "Delim" ? ATTRIBUTE_OPERATORS[token.value] : undefined;
      if (prefixed === undefined || !isDelim(this.#peek(1), "=")) {
        if (token.type === "EOF") {
          throw this.#error("unterminated attribute selector", open, token);
        }
        throw this.#error("expected ']' or an attribute operator", token);
      }
      this.#advance();
      this.#advance();
      operator = prefixed;
    }
    this.#skipWhitespace();

    const valueToken = this.#peek();
    if (valueToken.type !== "Ident" && valueToken.type !== "String") {
      if (valueToken.type === "EOF") {
        throw this.#error("unterminated attribute selector", open, valueToken);
      }
      throw this.#error("expected attribute value", valueToken);
    }
    this.#advance();
    this.#skipWhitespace();

    let caseInsensitive = false;
    const flag = this.#peek();
    if (flag.type === "Ident") {
      const lowered = flag.value.toLowerCase();
      if (lowered !== "i" && lowered !== "s") {
        throw this.#error(`unknown attribute selector flag '${flag.value}'`, flag);
      }
      caseInsensitive = lowered === "i";
      this.#advance();
      this.#skipWhitespace();
    }

    const close = this.#peek();
    if (close.type !== "RightBracket") {
      if (close.type === "EOF") {
        throw this.#error("unterminated attribute selector", open, close);
      }
      throw this.#unexpected(close);
    }
    this.#advance();

    return { kind: "attribute", name, operator, value: valueToken.value, caseInsensitive };
  }

  #parsePseudo(): SimpleSelector {
    this.#advance();
    const token = this.#peek();

    if (token.type === "Colon") {
      this.#advance();
      const name = this.#peek();
      if (name.type === "Function") {
        throw this.#error(`unsupported pseudo-element '::${name.name}()'`, name);
      }
      if (name.type !== "Ident") {
        throw this.#error("expected pseudo-element name after '::'", name);
      }
      this.#advance();
      const lowered = name.value.toLowerCase();
      if (!PSEUDO_ELEMENTS.has(lowered)) {
        throw this.#error(`unknown pseudo-element '::${name.value}'`, name);
      }
      return this.#pseudoElement(lowered, name);
    }

    if (token.type === "Ident") {
      this.#advance();
      const lowered = token.value.toLowerCase();
      if (LEGACY_PSEUDO_ELEMENTS.has(lowered)) {
        return this.#pseudoElement(lowered, token);
      }
      if (!isStatePseudoClass(lowered)) {
        throw this.#error(`unknown pseudo-class ':${token.value}'`, token);
      }
      return { kind: "pseudo-class", name: lowered };
    }

    if (token.type === "Function") {
      this.#advance();
      const lowered = token.name.toLowerCase();
      if (lowered === "not" || lowered === "is" || lowered === "where") {
        const selectors = this.#within(lowered, () => this.#parseSelectorList(true));
        this.#expectRightParen();
        return { kind: "logical", name: lowered, selectors };
      }
      if (lowered === "has") {
        const selectors = this.#within(lowered, () => this.#parseRelativeList());
        this.#expectRightParen();
        return { kind: "has", selectors };
      }
      if (isNthPseudoClass(lowered)) {
        return this.#parseNth(lowered, token);
      }
      throw this.#error(`unknown pseudo-class ':${token.name}()'`, token);
    }

    throw this.#error("expected pseudo-class name after ':'", token);
  }

  #parseNth(name: NthPseudoClassName, opener: SelectorToken): NthSelector {
    const first = this.#peek();
    let last: SelectorToken | null = null;

    for (;;) {
      const token = this.#peek();
      if (token.type === "RightParen" || token.type === "EOF") {
        break;
      }
      if (
        token.type === "Ident" &&
        token.value.toLowerCase() === "of" &&
        last !== null &&
        this.#peek(-1).type === "Whitespace"
      ) {
        break;
      }
      last = token;
      this.#advance();
    }

    if (last === null) {
      if (first.type === "EOF") {
        throw this.#error("unclosed parenthesis", opener, first);
      }
      throw this.#error("expected an+b formula", first);
    }

    const raw = this.#source.slice(first.start, last.end);
    const formula = parseNthFormula(raw);
    if (formula === null) {
      throw this.#error(`invalid an+b formula '${raw.trim()}'`, first, last);
    }

    let of: ComplexSelector[] | null = null;
    const keyword = this.#peek();
    if (keyword.type === "Ident" && keyword.value.toLowerCase() === "of") {
      if (name !== "nth-child" && name !== "nth-last-child") {
        throw this.#error(`':${name}()' does not accept an 'of' clause`, keyword);
      }
      this.#advance();
      of = this.#within(name, () => this.#parseSelectorList(true));
    }
    this.#expectRightParen();

    return { kind: "nth", name, formula, of };
  }
}

export function parseSelectorList(source: string): readonly ComplexSelector[] {
  if (source.trim().length === 0) {
    throw invalidSelector(source, "empty selector", 0, source.length);
  }
  return new SelectorParser(source).parse();
}
