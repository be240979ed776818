import { assert, expect } from "vitest";
import { compare, type Ordering } from "../src/compare";
import { isOk, type Result } from "../src/result";

export function expectOkEqual<T, E>(result: Result<T, E>, expected: T): void {
  if (isOk(result)) {
    expect(result.value).toEqual(expected);
  } else {
    assert.fail(String(result.error));
  }
}

export function expectErr<T, E>(result: Result<T, E>): E {
  if (isOk(result)) {
    return assert.fail(`expected Err, got Ok(${String(result.value)})`);
  }
  return result.error;
}

export function expectOrdering(a: string, b: string, expected: Ordering) {
  expect(compare(a, b), `${JSON.stringify(a)} vs ${JSON.stringify(b)}`).toBe(
    expected
  );
}
