import { NotFoundError } from '@migrator/errors';
import {
  SPOT_ASSET_ID_OFFSET,
  type AssetMetadata,
  type PairContext,
  type SpotAssetContext,
  type SpotMeta,
  type SpotMetaAndAssetCtxs,
  type SpotPairListing,
  type SpotTokenListing,
  type TokenDecimals,
} from '@migrator/types';

export type LookupResult<T> = { ok: true; value: T } | { ok: false; error: NotFoundError };

function unwrap<T>(result: LookupResult<T>): T {
  if (!result.ok) {
    throw result.error;
  }
  return result.value;
}

// the first listing with a given name wins, as a linear scan would
function indexByName<T extends { name: string }>(listings: readonly T[]): Map<string, T> {
  const byName = new Map<string, T>();
  for (const listing of listings) {
    if (!byName.has(listing.name)) {
      byName.set(listing.name, listing);
    }
  }
  return byName;
}

/**
 * Immutable lookup table over one metadata snapshot. Precision does not change
 * within a run, so the snapshot is fetched once and never refreshed.
 */
export class MetadataTable {
  private readonly pairs: ReadonlyMap<string, SpotPairListing>;
  private readonly tokens: ReadonlyMap<string, SpotTokenListing>;
  private readonly contexts: ReadonlyMap<string, SpotAssetContext>;

  private constructor(meta: SpotMeta, contexts: readonly SpotAssetContext[]) {
    this.pairs = indexByName(meta.universe);
    this.tokens = indexByName(meta.tokens);

    // contexts are aligned with the universe listing by position
    const byPair = new Map<string, SpotAssetContext>();
    meta.universe.forEach((pair, position) => {
      const context = contexts[position];
      if (context && !byPair.has(pair.name)) {
        byPair.set(pair.name, context);
      }
    });
    this.contexts = byPair;
  }

  static fromSpotMeta(meta: SpotMeta): MetadataTable {
    return new MetadataTable(meta, []);
  }

  static fromMetaAndContexts([meta, contexts]: SpotMetaAndAssetCtxs): MetadataTable {
    return new MetadataTable(meta, contexts);
  }

  lookupPair(pairName: string): LookupResult<SpotPairListing> {
    const pair = this.pairs.get(pairName);
    return pair
      ? { ok: true, value: pair }
      : { ok: false, error: new NotFoundError('Pair', pairName, "spot meta 'universe'") };
  }

  lookupToken(tokenName: string): LookupResult<SpotTokenListing> {
    const token = this.tokens.get(tokenName);
    return token
      ? { ok: true, value: token }
      : { ok: false, error: new NotFoundError('Token', tokenName, "spot meta 'tokens'") };
  }

  resolvePairAssetId(pairName: string): number {
    return SPOT_ASSET_ID_OFFSET + unwrap(this.lookupPair(pairName)).index;
  }

  resolveTokenDecimals(tokenName: string): TokenDecimals {
    const token = unwrap(this.lookupToken(tokenName));
    return { sizeDecimals: token.szDecimals, weiDecimals: token.weiDecimals };
  }

  assetMetadata(pairName: string, tokenName: string): AssetMetadata {
    return {
      pairName,
      pairAssetId: this.resolvePairAssetId(pairName),
      ...this.resolveTokenDecimals(tokenName),
    };
  }

  pairContext(pairName: string): PairContext | undefined {
    const context = this.contexts.get(pairName);
    if (!context) {
      return undefined;
    }
    return { pairName, markPrice: context.markPx, midPrice: context.midPx };
  }
}
