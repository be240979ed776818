export { Lexer, tokenize } from "./lexer";
export {
  letters,
  number,
  tokenEquals,
  tokensEqual,
  tokenText,
  type LettersToken,
  type NumberToken,
  type Token,
  type TokenKind,
  type TokenSequence,
} from "./tokens";
export { digitValue, isDecimalDigit, toAsciiDigits } from "./digits";
export {
  compare,
  compareSequences,
  compareTokens,
  orderingToSign,
  reverseOrdering,
  type Ordering,
} from "./compare";
export { HumanString } from "./humanString";
export {
  naturalCompare,
  naturalSort,
  naturalSorted,
  tryNaturalSort,
  type NaturalSortOptions,
  type SortOrder,
} from "./naturalSort";
export {
  ERROR_CATALOG,
  ErrorCode,
  NaturalSortError,
  type ErrorDefinition,
  type ErrorParams,
} from "./errors";
export { err, isOk, ok, unwrap, type Result } from "./result";
