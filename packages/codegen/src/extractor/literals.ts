/**
 * Exact base-10 parsing of numeric literal text as written in source.
 * Anything else (hex, separators, overflow) is rejected.
 */

const INTEGER_PATTERN = /^\d+$/;
const DECIMAL_PATTERN = /^(?:\d+\.\d*|\.\d+|\d+)(?:[eE][+-]?\d+)?$/;

/**
 * Whether the text is written as a plain integer, whatever its magnitude
 */
export function isIntegerLiteral(raw: string): boolean {
  return INTEGER_PATTERN.test(raw);
}

export function parseIntegerLiteral(raw: string, negative = false): number | undefined {
  if (!INTEGER_PATTERN.test(raw)) {
    return undefined;
  }
  const value = Number(raw);
  if (!Number.isSafeInteger(value)) {
    return undefined;
  }
  return negative ? 0 - value : value;
}

export function parseDecimalLiteral(raw: string, negative = false): number | undefined {
  if (!DECIMAL_PATTERN.test(raw)) {
    return undefined;
  }
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    return undefined;
  }
  return negative ? 0 - value : value;
}
