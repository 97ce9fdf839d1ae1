import { Decimal } from 'decimal.js';

/** Decimal constructor used for every balance and quantity computation. */
export const PreciseDecimal = Decimal.clone({ precision: 40, rounding: Decimal.ROUND_HALF_UP });

const DECIMAL_PATTERN = /^[+-]?(\d+(\.\d*)?|\.\d+)$/;

export function toDecimal(value: Decimal.Value): Decimal {
  return new PreciseDecimal(value);
}

/** Plain decimal notation only: no exponent, no hex, no NaN/Infinity. */
export function isDecimalString(value: string): boolean {
  return DECIMAL_PATTERN.test(value);
}

export function assertDecimals(decimals: number): void {
  if (!Number.isInteger(decimals) || decimals < 0) {
    throw new RangeError(`decimals must be a non-negative integer, got ${decimals}`);
  }
}

