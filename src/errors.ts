/**
 * Centralized error catalog for natural ordering.
 * Messages are defined once here so every entry point reports the same text.
 */

export enum ErrorCode {
  UNORDERABLE_PAIR = "UNORDERABLE_PAIR",
  INVALID_TOKEN_TEXT = "INVALID_TOKEN_TEXT",
}

export type ErrorParams = Record<string, string | number>;

export interface ErrorDefinition {
  code: ErrorCode;
  format: (params?: ErrorParams) => string;
}

// Helper to create error definition with consistent structure
function makeErrorDef(
  code: ErrorCode,
  format: (params?: ErrorParams) => string
): ErrorDefinition {
  return { code, format };
}

export const ERROR_CATALOG: Record<ErrorCode, ErrorDefinition> = {
  [ErrorCode.UNORDERABLE_PAIR]: makeErrorDef(
    ErrorCode.UNORDERABLE_PAIR,
    ({ left, right } = {}) =>
      `unorderable input pair: ${JSON.stringify(left)} and ${JSON.stringify(right)}`
  ),
  [ErrorCode.INVALID_TOKEN_TEXT]: makeErrorDef(
    ErrorCode.INVALID_TOKEN_TEXT,
    ({ kind, text } = {}) => `invalid ${kind} token text: ${JSON.stringify(text)}`
  ),
};

export class NaturalSortError extends Error {
  readonly code: ErrorCode;
  readonly pair?: readonly [string, string];

  constructor(
    code: ErrorCode,
    params: ErrorParams = {},
    pair?: readonly [string, string]
  ) {
    super(ERROR_CATALOG[code].format(params));
    this.name = "NaturalSortError";
    this.code = code;
    this.pair = pair;
  }
}

export function unorderablePair(left: string, right: string): NaturalSortError {
  return new NaturalSortError(
    ErrorCode.UNORDERABLE_PAIR,
    { left, right },
    [left, right]
  );
}

export function invalidTokenText(kind: string, text: string): NaturalSortError {
  return new NaturalSortError(ErrorCode.INVALID_TOKEN_TEXT, { kind, text });
}
