import { describe, it, expect, vi } from 'vitest';
import { createSilentLogger } from '@migrator/logger';
import type { SpotClearinghouseState } from '@migrator/types';
import { BalanceReader } from './balances.js';

const ADDRESS = '0x00000000000000000000000000000000000000aa';

function readerFor(state: SpotClearinghouseState) {
  const info = { spotClearinghouseState: vi.fn(async (_user: string) => state) };
  return { info, reader: new BalanceReader(info, createSilentLogger()) };
}

describe('BalanceReader', () => {
  it('returns total minus hold for the matching coin', async () => {
    const { info, reader } = readerFor({
      balances: [
        { coin: 'USDC', total: '50.5', hold: '0.5' },
        { coin: 'PURR', total: '123.7', hold: '0.0' },
      ],
    });

    const free = await reader.freeBalance(ADDRESS, 'USDC');

    expect(free.toFixed()).toBe('50');
    expect(info.spotClearinghouseState).toHaveBeenCalledWith(ADDRESS);
  });

  it('returns exactly 0 when the token is absent', async () => {
    const { reader } = readerFor({ balances: [{ coin: 'USDC', total: '1', hold: '0' }] });

    const free = await reader.freeBalance(ADDRESS, 'PURR');

    expect(free.isZero()).toBe(true);
    expect(free.toFixed()).toBe('0');
  });

  it('keeps fractional digits exact', async () => {
    const { reader } = readerFor({
      balances: [{ coin: 'USDC', total: '0.30000000', hold: '0.10000001' }],
    });

    expect((await reader.freeBalance(ADDRESS, 'USDC')).toFixed()).toBe('0.19999999');
  });

  it('queries the venue again on every call', async () => {
    const { info, reader } = readerFor({ balances: [] });

    await reader.freeBalance(ADDRESS, 'USDC');
    await reader.freeBalance(ADDRESS, 'USDC');

    expect(info.spotClearinghouseState).toHaveBeenCalledTimes(2);
  });
});
