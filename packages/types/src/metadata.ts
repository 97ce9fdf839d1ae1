export interface SpotPairListing {
  name: string;
  index: number;
  tokens: [number, number];
}

export interface SpotTokenListing {
  name: string;
  index: number;
  szDecimals: number;
  weiDecimals: number;
}

export interface SpotMeta {
  universe: SpotPairListing[];
  tokens: SpotTokenListing[];
}

export interface SpotAssetContext {
  coin: string;
  markPx: string;
  midPx: string | null;
  prevDayPx: string;
  dayNtlVlm: string;
}

export type SpotMetaAndAssetCtxs = [SpotMeta, SpotAssetContext[]];

export interface TokenDecimals {
  sizeDecimals: number;
  weiDecimals: number;
}

export interface AssetMetadata extends TokenDecimals {
  pairName: string;
  pairAssetId: number;
}

export interface PairContext {
  pairName: string;
  markPrice: string;
  midPrice: string | null;
}

/** Spot asset ids are offset from the pair's universe index. */
export const SPOT_ASSET_ID_OFFSET = 10000;
