import type { Decimal } from 'decimal.js';
import { toDecimal } from '@migrator/quantize';
import { createServiceLogger, type Logger } from '@migrator/logger';
import type { InfoApi } from './infoClient.js';

export class BalanceReader {
  constructor(
    private readonly info: Pick<InfoApi, 'spotClearinghouseState'>,
    private readonly logger: Logger = createServiceLogger('balance-reader')
  ) {}

  /**
   * Spendable spot balance, `total - hold`. Always a fresh query: a sell or transfer
   * in between changes it. A token missing from the response has a free balance of 0.
   */
  async freeBalance(address: string, token: string): Promise<Decimal> {
    const state = await this.info.spotClearinghouseState(address);
    const entry = state.balances.find((balance) => balance.coin === token);

    if (!entry) {
      this.logger.debug({ token }, 'Token absent from spot balances');
      return toDecimal(0);
    }

    const free = toDecimal(entry.total).minus(entry.hold);
    this.logger.debug(
      { token, total: entry.total, hold: entry.hold, free: free.toFixed() },
      'Spot balance read'
    );
    return free;
  }
}
