import type { Decimal } from 'decimal.js';
import { QuantizedAmount } from './quantizedAmount.js';

/** Withdrawals are settled by the bridge at this fixed precision, whatever the token listing says. */
export const WITHDRAWAL_DECIMALS = 8;

/**
 * Order size: floor to `sizeDecimals`. A zero result is returned, not raised;
 * the caller decides whether the amount is actionable.
 */
export function quantizeSize(amount: Decimal.Value, sizeDecimals: number): QuantizedAmount {
  return QuantizedAmount.floor(amount, sizeDecimals);
}

/**
 * Transfer amount derived from a balance that was just read: floor to `weiDecimals`,
 * then give up one more unit so a sub-tick drift of the source balance between the
 * read and the submission cannot make the transfer exceed it. Clamped at zero.
 */
export function quantizeWithMargin(amount: Decimal.Value, weiDecimals: number): QuantizedAmount {
  return QuantizedAmount.floor(amount, weiDecimals).minusUnit();
}

/** Explicit withdrawal amount: plain floor, no margin. */
export function quantizeWithdrawal(amount: Decimal.Value): QuantizedAmount {
  return QuantizedAmount.floor(amount, WITHDRAWAL_DECIMALS);
}
