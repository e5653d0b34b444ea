const DECIMAL_LITERAL = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;

/**
 * Parse a cost string as a literal decimal, or 0 when it is anything else
 * (an unevaluated formula, an empty string, ...).
 *
 * This is the single place a formula evaluator would plug in.
 */
export function parseDecimalOrZero(text: string | null | undefined): number {
  if (text == null) return 0;
  const trimmed = text.trim();
  if (!DECIMAL_LITERAL.test(trimmed)) return 0;
  const value = Number(trimmed);
  return Number.isFinite(value) ? value : 0;
}

/** Drop binary floating-point residue (700 * 1.1 reads as 770, not 770.0000000000001). */
export function stripFloatNoise(value: number): number {
  return Math.round(value * 1e9) / 1e9;
}

/** Read a numeric column (returned as text by the driver). */
export function fromNumeric(value: string | null): number {
  return value == null ? 0 : parseFloat(value);
}

/** Write a number into a numeric column. */
export function toNumeric(value: number): string {
  return String(value);
}
