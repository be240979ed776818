import { isDecimalDigit, toAsciiDigits } from "./digits";
import { invalidTokenText } from "./errors";

export type TokenKind = "letters" | "number";

export interface LettersToken {
  kind: "letters";
  text: string;
}

export interface NumberToken {
  kind: "number";
  value: bigint;
  // digit run as written, leading zeros included
  text: string;
}

export type Token = LettersToken | NumberToken;

export type TokenSequence = readonly Token[];

/**
 * Builds a letters token. Throws INVALID_TOKEN_TEXT for empty text or text
 * containing a decimal digit.
 */
export function letters(text: string): LettersToken {
  if (text === "" || Array.from(text).some(isDecimalDigit)) {
    throw invalidTokenText("letters", text);
  }
  return Object.freeze({ kind: "letters", text });
}

/**
 * Builds a number token from a run of decimal digits in any script.
 * Throws INVALID_TOKEN_TEXT for empty text or any non-digit.
 */
export function number(text: string): NumberToken {
  const digits = toAsciiDigits(text);
  if (digits === undefined) throw invalidTokenText("number", text);
  return Object.freeze({ kind: "number", value: BigInt(digits), text });
}

export function tokenEquals(a: Token, b: Token): boolean {
  return a.kind === b.kind && a.text === b.text;
}

/**
 * Structural equality: same length and identical tokens at every position.
 * Unlike ordering, "5" and "05" are different sequences here.
 */
export function tokensEqual(a: TokenSequence, b: TokenSequence): boolean {
  if (a.length !== b.length) return false;
  return a.every((tok, i) => tokenEquals(tok, b[i]));
}

export function tokenText(seq: TokenSequence): string {
  return seq.map((t) => t.text).join("");
}
