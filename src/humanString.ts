import { compareSequences, type Ordering } from "./compare";
import { tokenize } from "./lexer";
import { tokensEqual, type TokenSequence } from "./tokens";

/**
 * A string paired with its token sequence, comparable in natural order.
 *
 * ```ts
 * HumanString.from("file2").compare(HumanString.from("file11")); // "less"
 * ```
 */
export class HumanString {
  private constructor(
    readonly source: string,
    readonly tokens: TokenSequence
  ) {
    Object.freeze(this);
  }

  static from(source: string): HumanString {
    return new HumanString(source, tokenize(source));
  }

  static compare(a: HumanString, b: HumanString): Ordering {
    return a.compare(b);
  }

  compare(other: HumanString): Ordering {
    return compareSequences(this.tokens, other.tokens);
  }

  equals(other: HumanString): boolean {
    return tokensEqual(this.tokens, other.tokens);
  }

  toString(): string {
    return this.source;
  }
}
