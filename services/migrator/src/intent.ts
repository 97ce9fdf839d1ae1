import { isAddress } from 'ethers';
import { ConfigurationError, describeError } from '@migrator/errors';
import { assertSlippageBps } from '@migrator/quantize';
import type { Hex, MigrationIntent, MigrationRequest } from '@migrator/types';

function isHexAddress(value: string): value is Hex {
  return /^0x[0-9a-fA-F]{40}$/.test(value) && isAddress(value);
}

/**
 * Validates the operator's request before anything touches the network.
 * Withdrawals never fall back to "everything available": both the destination
 * and the amount must be given.
 */
export function resolveIntent(request: MigrationRequest): MigrationIntent {
  switch (request.mode) {
    case 'sell_and_transfer': {
      const { slippageBps } = request;
      try {
        assertSlippageBps(slippageBps);
      } catch (error) {
        throw new ConfigurationError(`--slippage-bps: ${describeError(error)}`, { slippageBps });
      }
      return {
        mode: 'sell_and_transfer',
        pairName: request.pairName,
        baseToken: request.baseToken,
        quoteToken: request.quoteToken,
        baseAmount: request.baseAmount,
        quoteAmount: request.quoteAmount,
        slippageBps,
      };
    }

    case 'transfer_only':
      return {
        mode: 'transfer_only',
        quoteToken: request.quoteToken,
        quoteAmount: request.quoteAmount,
      };

    case 'withdraw': {
      const { destination, quoteAmount } = request;
      if (!destination) {
        throw new ConfigurationError('--dest is required for withdraw mode (Arbitrum address)');
      }
      if (!quoteAmount) {
        throw new ConfigurationError('--quote-amount is required for withdraw mode');
      }
      if (!isHexAddress(destination)) {
        throw new ConfigurationError(`--dest ${destination} is not a valid address`, { destination });
      }
      return {
        mode: 'withdraw',
        quoteToken: request.quoteToken,
        amount: quoteAmount,
        destination,
      };
    }
  }
}
