const DECIMAL = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

/**
 * Parse a point value reported by the BMS.
 *
 * The gateway sends numbers either as JSON numbers or as text ("72.09").
 * Text must be plain decimal (optionally with an exponent); hex, binary
 * and octal literals are rejected, as are empty strings, booleans, null
 * and anything that isn't a finite number.
 *
 * @returns the value, or null when it can't be stored
 */
export function parseBmsValue(input: unknown): number | null {
  if (typeof input === 'number') {
    return Number.isFinite(input) ? input : null;
  }

  if (typeof input !== 'string') {
    return null;
  }

  const text = input.trim();
  if (!DECIMAL.test(text)) {
    return null;
  }

  const value = Number(text);
  return Number.isFinite(value) ? value : null;
}
