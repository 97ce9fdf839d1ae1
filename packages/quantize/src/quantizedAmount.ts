import { Decimal } from 'decimal.js';
import { PreciseDecimal, assertDecimals, toDecimal } from './decimal.js';

/**
 * A decimal that is an exact multiple of `10^-decimals`.
 * Instances only come out of the rounding policies below.
 */
export class QuantizedAmount {
  private constructor(
    readonly value: Decimal,
    readonly decimals: number
  ) {}

  /** Round toward zero onto the `10^-decimals` grid. */
  static floor(amount: Decimal.Value, decimals: number): QuantizedAmount {
    assertDecimals(decimals);
    const floored = toDecimal(amount).toDecimalPlaces(decimals, Decimal.ROUND_DOWN);
    return new QuantizedAmount(floored.isZero() ? new PreciseDecimal(0) : floored, decimals);
  }

  static unitOf(decimals: number): Decimal {
    assertDecimals(decimals);
    return new PreciseDecimal(`1e-${decimals}`);
  }

  get unit(): Decimal {
    return QuantizedAmount.unitOf(this.decimals);
  }

  /** One grid step less, never below zero. */
  minusUnit(): QuantizedAmount {
    const reduced = this.value.minus(this.unit);
    return new QuantizedAmount(reduced.gt(0) ? reduced : new PreciseDecimal(0), this.decimals);
  }

  isPositive(): boolean {
    return this.value.gt(0);
  }

  toWire(): string {
    return this.value.toFixed();
  }

  toString(): string {
    return this.toWire();
  }

  toJSON(): string {
    return this.toWire();
  }
}
