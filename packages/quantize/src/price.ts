import { Decimal } from 'decimal.js';
import { assertDecimals, toDecimal } from './decimal.js';

const BPS_DENOMINATOR = 10_000;
const MAX_SPOT_PRICE_DECIMALS = 8;
const MAX_SIGNIFICANT_FIGURES = 5;
const INTEGER_PRICE_THRESHOLD = 10 ** MAX_SIGNIFICANT_FIGURES;

export function assertSlippageBps(slippageBps: number): void {
  if (!Number.isInteger(slippageBps) || slippageBps < 0 || slippageBps >= BPS_DENOMINATOR) {
    throw new RangeError(`slippageBps must be an integer in [0, ${BPS_DENOMINATOR}), got ${slippageBps}`);
  }
}

/**
 * Limit price for an IOC order emulating a market order: the best opposing price
 * pushed `slippageBps` against us, then cut to the venue's spot price grid
 * (5 significant figures, at most `8 - sizeDecimals` decimals). Rounding keeps the
 * cushion: down for a sell, up for a buy.
 */
export function slippagePrice(
  referencePrice: Decimal.Value,
  slippageBps: number,
  isBuy: boolean,
  sizeDecimals: number
): string {
  assertSlippageBps(slippageBps);
  assertDecimals(sizeDecimals);

  const cushion = toDecimal(slippageBps).dividedBy(BPS_DENOMINATOR);
  const factor = isBuy ? toDecimal(1).plus(cushion) : toDecimal(1).minus(cushion);
  const raw = toDecimal(referencePrice).times(factor);
  const rounding = isBuy ? Decimal.ROUND_UP : Decimal.ROUND_DOWN;

  // integer prices are always accepted, whatever their number of figures
  const significant = raw.gte(INTEGER_PRICE_THRESHOLD)
    ? raw.toDecimalPlaces(0, rounding)
    : raw.toSignificantDigits(MAX_SIGNIFICANT_FIGURES, rounding);

  const maxDecimals = Math.max(MAX_SPOT_PRICE_DECIMALS - sizeDecimals, 0);
  return significant.toDecimalPlaces(maxDecimals, rounding).toFixed();
}
