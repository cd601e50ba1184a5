export interface NthFormula {
  readonly a: number;
  readonly b: number;
}

const ZERO = 0x30;
const NINE = 0x39;

/**
 * Parses `an+b`, `odd` or `even`. Returns null when the text is not a
 * formula; callers attach the source span to the error.
 */
export function parseNthFormula(text: string): NthFormula | null {
  const formula = text.trim().toLowerCase();

  if (formula === "even") {
    return { a: 2, b: 0 };
  }
  if (formula === "odd") {
    return { a: 2, b: 1 };
  }

  let index = 0;

  const skipWhitespace = (): void => {
    while (index < formula.length && /\s/.test(formula.charAt(index))) {
      index += 1;
    }
  };
  const readSign = (): number => {
    const char = formula.charAt(index);
    if (char === "-" || char === "+") {
      index += 1;
      return char === "-" ? -1 : 1;
    }
    return 1;
  };
  const readInteger = (): number | null => {
    const start = index;
    while (index < formula.length && formula.charCodeAt(index) >= ZERO && formula.charCodeAt(index) <= NINE) {
      index += 1;
    }
    return index === start ? null : Number.parseInt(formula.slice(start, index), 10);
  };

  const leadingSign = readSign();
  const leading = readInteger();

  if (formula.charAt(index) !== "n") {
    return leading === null || index < formula.length ? null : { a: 0, b: leadingSign * leading };
  }

  index += 1;
  const a = leadingSign * (leading ?? 1);
  skipWhitespace();
  if (index === formula.length) {
    return { a, b: 0 };
  }

  const operator = formula.charAt(index);
  if (operator !== "+" && operator !== "-") {
    return null;
  }
  index += 1;
  skipWhitespace();
  const offset = readInteger();
  if (offset === null || index < formula.length) {
    return null;
  }
  return { a, b: operator === "-" ? -offset : offset };
}

/** True when `position` (1-based) equals `a*n + b` for some n >= 0. */
export function matchesNth(formula: NthFormula, position: number): boolean {
  const { a, b } = formula;
  if (a === 0) {
    return position === b;
  }
  const steps = (position - b) / a;
  return Number.isInteger(steps) && steps >= 0;
}
