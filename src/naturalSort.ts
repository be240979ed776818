import { orderingToSign, reverseOrdering } from "./compare";
import { NaturalSortError, unorderablePair } from "./errors";
import { HumanString } from "./humanString";
import { err, ok, unwrap, type Result } from "./result";

export type SortOrder = "asc" | "desc";

export interface NaturalSortOptions {
  order?: SortOrder;
}

function compareKeys(a: HumanString, b: HumanString, order: SortOrder): number {
  const ordering = a.compare(b);
  const sign = orderingToSign(
    order === "desc" ? reverseOrdering(ordering) : ordering
  );
  if (sign === undefined) throw unorderablePair(a.source, b.source);
  return sign;
}

/**
 * Sorts a copy of `strings` in natural order, tokenizing each string once.
 * Returns an Err carrying the first pair the sort could not order instead
 * of throwing.
 */
export function tryNaturalSort(
  strings: readonly string[],
  options: NaturalSortOptions = {}
): Result<string[], NaturalSortError> {
  const order = options.order ?? "asc";
  const keys = strings.map((s) => HumanString.from(s));
  try {
    keys.sort((a, b) => compareKeys(a, b, order));
  } catch (e) {
    if (e instanceof NaturalSortError) return err(e);
    throw e;
  }
  return ok(keys.map((k) => k.source));
}

/**
 * Sorts `strings` in place in natural order and returns the same array.
 *
 * ```ts
 * const files = ["file1.txt", "file11.txt", "file2.txt"];
 * naturalSort(files); // ["file1.txt", "file2.txt", "file11.txt"]
 * ```
 *
 * @throws NaturalSortError with code UNORDERABLE_PAIR when two compared
 * strings put a number and letters at the same position. The array is left
 * unchanged in that case.
 */
export function naturalSort(
  strings: string[],
  options: NaturalSortOptions = {}
): string[] {
  const sorted = unwrap(tryNaturalSort(strings, options));
  sorted.forEach((s, i) => {
    strings[i] = s;
  });
  return strings;
}

export function naturalSorted(
  strings: readonly string[],
  options: NaturalSortOptions = {}
): string[] {
  return unwrap(tryNaturalSort(strings, options));
}

/**
 * `Array.prototype.sort` callback. Tokenizes on every call; prefer
 * `naturalSort` for whole collections.
 */
export function naturalCompare(a: string, b: string): number {
  return compareKeys(HumanString.from(a), HumanString.from(b), "asc");
}
