import { describe, expect, it } from "vitest";
import { ErrorCode, NaturalSortError } from "../src/errors";
import { tokenize } from "../src/lexer";
import {
  letters,
  number,
  tokenEquals,
  tokensEqual,
  tokenText,
} from "../src/tokens";

describe("tokens", () => {
  it("number parses its run and keeps the original text", () => {
    expect(number("0042")).toEqual({ kind: "number", value: 42n, text: "0042" });
    expect(number("٤٢").value).toBe(42n);
  });

  it("number rejects empty text and non-digits", () => {
    for (const text of ["", "1a", "-1", "1.5"]) {
      expect(() => number(text)).toThrow(NaturalSortError);
    }
    expect(() => number("1a")).toThrow('invalid number token text: "1a"');
  });

  it("letters rejects empty text and digits", () => {
    expect(() => letters("")).toThrow('invalid letters token text: ""');
    expect(() => letters("a1")).toThrow(NaturalSortError);
    try {
      letters("");
    } catch (e) {
      expect(e instanceof NaturalSortError && e.code).toBe(
        ErrorCode.INVALID_TOKEN_TEXT
      );
    }
  });

  it("tokenEquals compares kind and text", () => {
    expect(tokenEquals(letters("a"), letters("a"))).toBe(true);
    expect(tokenEquals(number("5"), number("5"))).toBe(true);
    expect(tokenEquals(number("5"), number("05"))).toBe(false);
    expect(tokenEquals(letters("x"), number("1"))).toBe(false);
  });

  it("tokensEqual is structural, so leading zeros make sequences differ", () => {
    expect(tokensEqual(tokenize("a5"), tokenize("a5"))).toBe(true);
    expect(tokensEqual(tokenize("a5"), tokenize("a05"))).toBe(false);
    expect(tokensEqual(tokenize("a"), tokenize("a5"))).toBe(false);
    expect(tokensEqual(tokenize(""), [])).toBe(true);
  });

  it("tokenText joins original texts", () => {
    expect(tokenText([letters("img"), number("007"), letters(".png")])).toBe(
      "img007.png"
    );
  });
});
