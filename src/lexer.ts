import { isDecimalDigit } from "./digits";
import { letters, number, type Token, type TokenSequence } from "./tokens";

/**
 * Splits a string into alternating runs of letters and decimal digits.
 * Works on code points, so astral characters are never split.
 */
export class Lexer {
  private i = 0;
  private readonly chars: readonly string[];

  constructor(src: string) {
    this.chars = Array.from(src);
  }

  tokenize(): TokenSequence {
    const tokens: Token[] = [];
    while (!this.isEOF()) {
      if (isDecimalDigit(this.peek())) {
        tokens.push(number(this.readRun(true)));
      } else {
        tokens.push(letters(this.readRun(false)));
      }
    }
    return Object.freeze(tokens);
  }

  private readRun(digits: boolean): string {
    let run = "";
    while (!this.isEOF() && isDecimalDigit(this.peek()) === digits) {
      run += this.advance();
    }
    return run;
  }

  private peek(): string {
    return this.chars[this.i];
  }

  private advance(): string {
    return this.chars[this.i++];
  }

  private isEOF(): boolean {
    return this.i >= this.chars.length;
  }
}

export function tokenize(input: string): TokenSequence {
  return new Lexer(input).tokenize();
}
