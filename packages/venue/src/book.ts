import { VenueRequestError } from '@migrator/errors';
import type { BestBidAsk } from '@migrator/types';
import type { InfoApi } from './infoClient.js';

/** levels[0] holds the bids, levels[1] the asks, best first. */
export async function bestBidAsk(info: Pick<InfoApi, 'l2Book'>, pairName: string): Promise<BestBidAsk> {
  const book = await info.l2Book(pairName);
  const [bids, asks] = book.levels;
  const bestBid = bids[0];
  const bestAsk = asks[0];

  if (!bestBid || !bestAsk) {
    throw new VenueRequestError('l2Book', `empty book for ${pairName}`, { pairName });
  }

  return { bid: bestBid.px, ask: bestAsk.px };
}
