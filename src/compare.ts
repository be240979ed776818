import { tokenize } from "./lexer";
import type { Token, TokenSequence } from "./tokens";

/**
 * Outcome of comparing two token sequences. Natural order is partial:
 * a number and a run of letters at the same position have no order.
 */
export type Ordering = "less" | "equal" | "greater" | "incomparable";

function compareValues<T extends bigint | number>(a: T, b: T): Ordering {
  if (a < b) return "less";
  if (a > b) return "greater";
  return "equal";
}

// code point order; plain `<` on strings compares UTF-16 units instead
function compareText(a: string, b: string): Ordering {
  const ai = a[Symbol.iterator]();
  const bi = b[Symbol.iterator]();
  for (;;) {
    const x = ai.next();
    const y = bi.next();
    if (x.done || y.done) {
      return compareValues(x.done ? 0 : 1, y.done ? 0 : 1);
    }
    const xc = x.value.codePointAt(0) ?? 0;
    const yc = y.value.codePointAt(0) ?? 0;
    if (xc !== yc) return compareValues(xc, yc);
  }
}

export function compareTokens(a: Token, b: Token): Ordering {
  if (a.kind === "number" && b.kind === "number") {
    return compareValues(a.value, b.value);
  }
  if (a.kind === "letters" && b.kind === "letters") {
    return compareText(a.text, b.text);
  }
  return "incomparable";
}

/**
 * Compares token pairs left to right. The first pair that is not equal
 * decides; if every pair is equal the shorter sequence comes first.
 */
export function compareSequences(a: TokenSequence, b: TokenSequence): Ordering {
  const n = Math.min(a.length, b.length);
  for (let i = 0; i < n; i++) {
    const result = compareTokens(a[i], b[i]);
    if (result !== "equal") return result;
  }
  return compareValues(a.length, b.length);
}

export function compare(a: string, b: string): Ordering {
  return compareSequences(tokenize(a), tokenize(b));
}

export function orderingToSign(ordering: Ordering): -1 | 0 | 1 | undefined {
  switch (ordering) {
    case "less":
      return -1;
    case "equal":
      return 0;
    case "greater":
      return 1;
    case "incomparable":
      return undefined;
  }
}

export function reverseOrdering(ordering: Ordering): Ordering {
  if (ordering === "less") return "greater";
  if (ordering === "greater") return "less";
  return ordering;
}
