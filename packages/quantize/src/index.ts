export { PreciseDecimal, toDecimal, isDecimalString, assertDecimals } from './decimal.js';
export { QuantizedAmount } from './quantizedAmount.js';
export { quantizeSize, quantizeWithMargin, quantizeWithdrawal, WITHDRAWAL_DECIMALS } from './quantize.js';
export { slippagePrice, assertSlippageBps } from './price.js';
