import { describe, it, expect } from 'vitest';
import { NotFoundError } from '@migrator/errors';
import type { SpotMeta } from '@migrator/types';
import { MetadataTable } from './metadata.js';

const meta: SpotMeta = {
  universe: [
    { name: 'PURR/USDC', index: 0, tokens: [1, 0] },
    { name: '@1', index: 1, tokens: [2, 0] },
    { name: '@7', index: 7, tokens: [3, 0] },
  ],
  tokens: [
    { name: 'USDC', index: 0, szDecimals: 8, weiDecimals: 8 },
    { name: 'PURR', index: 1, szDecimals: 0, weiDecimals: 5 },
    { name: 'HFUN', index: 2, szDecimals: 2, weiDecimals: 8 },
  ],
};

describe('MetadataTable', () => {
  const table = MetadataTable.fromSpotMeta(meta);

  it('offsets the pair index by 10000 for the asset id', () => {
    expect(table.resolvePairAssetId('PURR/USDC')).toBe(10000);
    expect(table.resolvePairAssetId('@7')).toBe(10007);
  });

  it('uses the listed index rather than the position in the listing', () => {
    // '@7' is third in the listing but carries index 7
    expect(table.resolvePairAssetId('@7')).not.toBe(10002);
  });

  it('returns the same id for the same snapshot every time', () => {
    const again = MetadataTable.fromSpotMeta(meta);
    expect(again.resolvePairAssetId('@1')).toBe(table.resolvePairAssetId('@1'));
  });

  it('throws NotFoundError for an unknown pair instead of defaulting', () => {
    expect(() => table.resolvePairAssetId('PURR/USDT')).toThrow(NotFoundError);
    expect(() => table.resolvePairAssetId('purr/usdc')).toThrow("Pair purr/usdc not found in spot meta 'universe'");
  });

  it('resolves size and wei decimals separately', () => {
    expect(table.resolveTokenDecimals('PURR')).toEqual({ sizeDecimals: 0, weiDecimals: 5 });
    expect(table.resolveTokenDecimals('USDC')).toEqual({ sizeDecimals: 8, weiDecimals: 8 });
  });

  it('throws NotFoundError for an unknown token', () => {
    expect(() => table.resolveTokenDecimals('DOGE')).toThrow(NotFoundError);
  });

  it('reports lookups as result values', () => {
    const found = table.lookupToken('HFUN');
    expect(found.ok).toBe(true);

    const missing = table.lookupPair('NOPE/USDC');
    expect(missing.ok).toBe(false);
    if (!missing.ok) {
      expect(missing.error.code).toBe('NOT_FOUND');
      expect(missing.error.details).toEqual({ resource: 'Pair', name: 'NOPE/USDC' });
    }
  });

  it('combines pair and token facts into asset metadata', () => {
    expect(table.assetMetadata('PURR/USDC', 'PURR')).toEqual({
      pairName: 'PURR/USDC',
      pairAssetId: 10000,
      sizeDecimals: 0,
      weiDecimals: 5,
    });
  });

  it('keeps the first listing when names repeat', () => {
    const duplicated = MetadataTable.fromSpotMeta({
      universe: [
        { name: 'PURR/USDC', index: 0, tokens: [1, 0] },
        { name: 'PURR/USDC', index: 9, tokens: [1, 0] },
      ],
      tokens: [],
    });
    expect(duplicated.resolvePairAssetId('PURR/USDC')).toBe(10000);
  });

  it('aligns asset contexts with the universe by position', () => {
    const withContexts = MetadataTable.fromMetaAndContexts([
      meta,
      [
        { coin: 'PURR/USDC', markPx: '0.21', midPx: '0.2105', prevDayPx: '0.2', dayNtlVlm: '1000' },
        { coin: '@1', markPx: '14.2', midPx: null, prevDayPx: '14', dayNtlVlm: '50' },
      ],
    ]);

    expect(withContexts.pairContext('PURR/USDC')).toEqual({
      pairName: 'PURR/USDC',
      markPrice: '0.21',
      midPrice: '0.2105',
    });
    expect(withContexts.pairContext('@1')).toEqual({ pairName: '@1', markPrice: '14.2', midPrice: null });
    expect(withContexts.pairContext('@7')).toBeUndefined();
    expect(table.pairContext('PURR/USDC')).toBeUndefined();
  });
});
