import { Decimal } from 'decimal.js';

// Global Decimal configuration: half-up rounding everywhere.
Decimal.set({
  maxE: 9e15,
  minE: -9e15,
  modulo: Decimal.ROUND_HALF_UP,
  precision: 28,
  rounding: Decimal.ROUND_HALF_UP,
  toExpNeg: -7,
  toExpPos: 21,
});

/** Two decimal places: quantities and requirement weights. */
export const QUANTITY_DECIMAL_PLACES = 2;

/** Three decimal places: used/unused weight summaries. */
export const WEIGHT_DECIMAL_PLACES = 3;

/**
 * Try to parse a string or number to a Decimal
 */
export function tryParseDecimal(
  value: string | number | Decimal | undefined | null,
  out?: { value: Decimal }
): boolean {
  if (value === undefined || value === null || value === '') {
    if (out) out.value = new Decimal(0);
    return true;
  }

  try {
    const decimal = new Decimal(value);
    if (out) out.value = decimal;
    return true;
  } catch {
    return false;
  }
}

/**
 * Parse a string or number to a Decimal with fallback to zero
 */
export function parseDecimal(value: string | number | Decimal | undefined | null): Decimal {
  const result = { value: new Decimal(0) };
  tryParseDecimal(value, result);
  return result.value;
}

/**
 * Round half-up to a fixed number of decimal places
 */
export function roundTo(value: Decimal, decimalPlaces: number): Decimal {
  return value.toDecimalPlaces(decimalPlaces, Decimal.ROUND_HALF_UP);
}

/**
 * Floor negative values at zero
 */
export function clampToZero(value: Decimal): Decimal {
  return value.isNegative() ? new Decimal(0) : value;
}

/**
 * Divide, treating a zero, negative or missing divisor as "nothing to divide into".
 */
export function safeDivide(dividend: Decimal, divisor: Decimal | undefined): Decimal {
  if (!divisor || divisor.lte(0)) {
    return new Decimal(0);
  }
  return dividend.dividedBy(divisor);
}

export function sumDecimals(values: Iterable<Decimal>): Decimal {
  let total = new Decimal(0);
  for (const value of values) {
    total = total.plus(value);
  }
  return total;
}

/**
 * Convert Decimal to string with appropriate precision for display
 */
export function formatDecimal(decimal: Decimal, maxDecimalPlaces = 3): string {
  const fixed = decimal.toFixed(maxDecimalPlaces);
  return fixed.includes('.') ? fixed.replace(/\.?0+$/, '') : fixed;
}
