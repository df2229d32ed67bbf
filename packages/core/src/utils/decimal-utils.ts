import { Decimal } from 'decimal.js';

/**
 * Try to parse a decimal string, returning undefined for malformed input
 * (including NaN and infinities).
 */
export function tryParseDecimal(value: string): Decimal | undefined {
  if (value.trim() === '') return undefined;

  try {
    const decimal = new Decimal(value);
    return decimal.isFinite() ? decimal : undefined;
  } catch {
    return undefined;
  }
}

/**
 * Rates (burn rate, send commission rate) are fractions in [0, 1].
 */
export function isValidRate(value: string): boolean {
  const decimal = tryParseDecimal(value);
  return decimal !== undefined && decimal.gte(0) && decimal.lte(1);
}
