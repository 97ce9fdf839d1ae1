import * as hl from '@nktkas/hyperliquid';
import { Wallet } from 'ethers';
import { VenueRequestError, describeError } from '@migrator/errors';
import { createServiceLogger, type Logger } from '@migrator/logger';
import type {
  Hex,
  PerpTransfer,
  SpotSellOrder,
  SubmissionAction,
  SubmissionReceipt,
  Withdrawal,
} from '@migrator/types';
import type { SigningGateway } from './gateway.js';

export interface IocOrderRequest {
  orders: Array<{
    a: number;
    b: boolean;
    p: string;
    s: string;
    r: boolean;
    t: { limit: { tif: 'Ioc' } };
  }>;
  grouping: 'na';
}

/** The subset of the SDK's exchange client the migration needs. */
export interface ExchangeActions {
  order(params: IocOrderRequest): Promise<unknown>;
  usdClassTransfer(params: { amount: string; toPerp: boolean }): Promise<unknown>;
  withdraw3(params: { destination: Hex; amount: string }): Promise<unknown>;
}

export interface HyperliquidGatewayOptions {
  secretKey: string;
  /** Base URL signed actions are posted to; the same one balances are read from. */
  apiUrl: string;
  isTestnet: boolean;
  signatureChainId: Hex;
  timeoutMs: number;
  logger?: Logger;
}

export function createExchangeClient(options: HyperliquidGatewayOptions): ExchangeActions {
  const transport = new hl.HttpTransport({
    isTestnet: options.isTestnet,
    timeout: options.timeoutMs,
    server: {
      mainnet: { api: options.apiUrl },
      testnet: { api: options.apiUrl },
    },
  });
  return new hl.ExchangeClient({
    wallet: new Wallet(options.secretKey),
    transport,
    signatureChainId: options.signatureChainId,
  });
}

export class HyperliquidGateway implements SigningGateway {
  readonly dryRun = false;
  private readonly logger: Logger;

  constructor(
    private readonly exchange: ExchangeActions,
    logger?: Logger
  ) {
    this.logger = logger ?? createServiceLogger('signing-gateway');
  }

  static connect(options: HyperliquidGatewayOptions): HyperliquidGateway {
    return new HyperliquidGateway(createExchangeClient(options), options.logger);
  }

  marketSell(order: SpotSellOrder): Promise<SubmissionReceipt> {
    return this.submit('order', () =>
      this.exchange.order({
        orders: [
          {
            a: order.pairAssetId,
            b: order.isBuy,
            p: order.limitPrice,
            s: order.size,
            r: false,
            t: { limit: { tif: 'Ioc' } },
          },
        ],
        grouping: 'na',
      })
    );
  }

  transferToPerpetuals(transfer: PerpTransfer): Promise<SubmissionReceipt> {
    return this.submit('usdClassTransfer', () =>
      this.exchange.usdClassTransfer({ amount: transfer.amount, toPerp: transfer.toPerpetuals })
    );
  }

  withdraw(withdrawal: Withdrawal): Promise<SubmissionReceipt> {
    return this.submit('withdraw3', () =>
      this.exchange.withdraw3({ destination: withdrawal.destinationAddress, amount: withdrawal.amount })
    );
  }

  private async submit(action: SubmissionAction, send: () => Promise<unknown>): Promise<SubmissionReceipt> {
    const submittedAt = new Date().toISOString();
    try {
      const response = await send();
      this.logger.debug({ action, response }, 'Venue acknowledged');
      return { action, submittedAt, dryRun: false, response };
    } catch (error) {
      throw new VenueRequestError(action, describeError(error));
    }
  }
}
