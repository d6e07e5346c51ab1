// Volume Kernel - Fixed-width text helpers
//
// Output must not depend on locale and must never switch to exponent notation,
// otherwise column widths drift.

// Number.prototype.toFixed switches to exponent notation at this magnitude.
const TO_FIXED_LIMIT = 1e21;

/**
 * Formats `value` with exactly `digits` decimals in plain positional notation.
 */
export function formatFixed(value: number, digits: number): string {
  if (!Number.isFinite(value) || Math.abs(value) < TO_FIXED_LIMIT) {
    return value.toFixed(digits);
  }
  // Doubles this large are integers, so BigInt is exact.
  const whole = BigInt(value).toString();
  return digits > 0 ? `${whole}.${"0".repeat(digits)}` : whole;
}

/**
 * Hard truncation to `width` characters; no ellipsis.
 */
export function truncate(text: string, width: number): string {
  return text.length > width ? text.slice(0, width) : text;
}

/**
 * Left-justifies `text` in a cell of `width` characters. Longer text is kept whole.
 */
export function padCell(text: string, width: number): string {
  return text.padEnd(width, " ");
}

export function rule(char: string, width: number): string {
  return char.repeat(width);
}
