const DECIMAL_DIGIT = /^\p{Nd}$/u;

// code point -> first code point of its run of Nd digits
const runStarts = new Map<number, number>();

export function isDecimalDigit(ch: string): boolean {
  return DECIMAL_DIGIT.test(ch);
}

function isDecimalDigitCodePoint(cp: number): boolean {
  return isDecimalDigit(String.fromCodePoint(cp));
}

function runStart(cp: number): number {
  const cached = runStarts.get(cp);
  if (cached !== undefined) return cached;

  let start = cp;
  while (start > 0 && isDecimalDigitCodePoint(start - 1)) start--;
  runStarts.set(cp, start);
  return start;
}

/**
 * Value (0-9) of a decimal digit in any script, or undefined when `ch` is
 * not a single decimal digit.
 *
 * Unicode only assigns Nd code points in contiguous ascending runs of ten,
 * so a digit's value is its distance from the start of its run, modulo 10.
 */
export function digitValue(ch: string): number | undefined {
  const cp = ch.codePointAt(0);
  if (cp === undefined || !isDecimalDigit(ch)) return undefined;
  if (cp >= 0x30 && cp <= 0x39) return cp - 0x30;
  return (cp - runStart(cp)) % 10;
}

/**
 * Maps a run of decimal digits to ASCII. Undefined if the run is empty or
 * holds anything other than decimal digits.
 */
export function toAsciiDigits(run: string): string | undefined {
  if (run === "") return undefined;
  let out = "";
  for (const ch of run) {
    const value = digitValue(ch);
    if (value === undefined) return undefined;
    out += String(value);
  }
  return out;
}
