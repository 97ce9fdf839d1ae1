import { describe, it, expect } from 'vitest';
import { slippagePrice } from './price.js';

describe('slippagePrice', () => {
  it('pushes a sell below the best bid and rounds down to 5 significant figures', () => {
    // 4.8123 * 0.997 = 4.7978631
    expect(slippagePrice('4.8123', 30, false, 0)).toBe('4.7978');
  });

  it('pushes a buy above the best ask and rounds up', () => {
    // 4.8123 * 1.003 = 4.8267369
    expect(slippagePrice('4.8123', 30, true, 0)).toBe('4.8268');
  });

  it('caps price decimals at 8 minus the size decimals', () => {
    expect(slippagePrice('0.012345678', 0, false, 5)).toBe('0.012');
    expect(slippagePrice('0.012345678', 0, false, 2)).toBe('0.012345');
  });

  it('keeps integer prices above the significant-figure limit', () => {
    expect(slippagePrice('123456.7', 0, false, 2)).toBe('123456');
  });

  it('returns the reference price when no slippage is allowed', () => {
    expect(slippagePrice('25.5', 0, false, 0)).toBe('25.5');
  });

  it('rejects slippage outside [0, 10000)', () => {
    expect(() => slippagePrice('1', -1, false, 0)).toThrow(RangeError);
    expect(() => slippagePrice('1', 10_000, false, 0)).toThrow(RangeError);
    expect(() => slippagePrice('1', 2.5, false, 0)).toThrow(RangeError);
  });
});
