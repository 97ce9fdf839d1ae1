import { setTimeout as delay } from 'timers/promises';
import type { Decimal } from 'decimal.js';
import { InsufficientBalanceError, NonActionableAmountError } from '@migrator/errors';
import type { SigningGateway } from '@migrator/gateway';
import { createServiceLogger, type Logger } from '@migrator/logger';
import {
  quantizeSize,
  quantizeWithMargin,
  quantizeWithdrawal,
  slippagePrice,
  toDecimal,
  WITHDRAWAL_DECIMALS,
} from '@migrator/quantize';
import type {
  AssetMetadata,
  MigrationIntent,
  MigrationReport,
  MigrationRequest,
  SellAndTransferIntent,
  TokenDecimals,
  WithdrawIntent,
} from '@migrator/types';
import { BalanceReader, MetadataTable, bestBidAsk, type InfoApi } from '@migrator/venue';
import { resolveIntent } from './intent.js';

export interface OrchestratorOptions {
  info: InfoApi;
  gateway: SigningGateway;
  accountAddress: string;
  /** Fixed pause between the sell and the next balance read. Not a poll. */
  settlementDelayMs: number;
  logger?: Logger;
  sleep?: (ms: number) => Promise<void>;
}

function clampTo(desired: Decimal | undefined, available: Decimal): Decimal {
  if (!desired || desired.gt(available)) {
    return available;
  }
  return desired;
}

/**
 * One run, one mode, one step at a time. Nothing already submitted is rolled back
 * when a later step fails; re-running the same mode picks up what is left.
 */
export class MigrationOrchestrator {
  private readonly info: InfoApi;
  private readonly gateway: SigningGateway;
  private readonly balances: BalanceReader;
  private readonly accountAddress: string;
  private readonly settlementDelayMs: number;
  private readonly logger: Logger;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(options: OrchestratorOptions) {
    this.info = options.info;
    this.gateway = options.gateway;
    this.accountAddress = options.accountAddress;
    this.settlementDelayMs = options.settlementDelayMs;
    this.logger = options.logger ?? createServiceLogger('orchestrator');
    this.balances = new BalanceReader(options.info, this.logger);
    this.sleep = options.sleep ?? ((ms) => delay(ms));
  }

  /** Validate, then run. A rejected request never reaches the venue. */
  async migrate(request: MigrationRequest): Promise<MigrationReport> {
    return this.run(resolveIntent(request));
  }

  async run(intent: MigrationIntent): Promise<MigrationReport> {
    const report: MigrationReport = {
      mode: intent.mode,
      startedAt: new Date().toISOString(),
      steps: [],
    };
    this.logger.info({ mode: intent.mode, dryRun: this.gateway.dryRun }, 'Migration started');

    try {
      switch (intent.mode) {
        case 'sell_and_transfer': {
          const table = await this.loadMetadata();
          const base = table.assetMetadata(intent.pairName, intent.baseToken);
          const quote = table.resolveTokenDecimals(intent.quoteToken);

          await this.sell(intent, base, table, report);
          await this.waitForSettlement();
          await this.transfer(intent.quoteToken, intent.quoteAmount, quote, report, true);
          break;
        }
        case 'transfer_only': {
          const table = await this.loadMetadata();
          const quote = table.resolveTokenDecimals(intent.quoteToken);
          await this.transfer(intent.quoteToken, intent.quoteAmount, quote, report, false);
          break;
        }
        case 'withdraw':
          await this.withdraw(intent, report);
          break;
      }
    } catch (error) {
      if (report.steps.length > 0) {
        this.logger.warn(
          { mode: intent.mode, completedSteps: report.steps.map((step) => step.step) },
          'Migration stopped after earlier steps were submitted; they are not rolled back'
        );
      }
      throw error;
    }

    report.finishedAt = new Date().toISOString();
    this.logger.info({ mode: intent.mode, steps: report.steps.length }, 'Migration finished');
    return report;
  }

  private async loadMetadata(): Promise<MetadataTable> {
    const table = MetadataTable.fromMetaAndContexts(await this.info.spotMetaAndAssetCtxs());
    this.logger.debug('Spot metadata loaded');
    return table;
  }

  private async sell(
    intent: SellAndTransferIntent,
    base: AssetMetadata,
    table: MetadataTable,
    report: MigrationReport
  ): Promise<void> {
    const { baseToken, pairName, slippageBps } = intent;

    const free = await this.balances.freeBalance(this.accountAddress, baseToken);
    if (free.lte(0)) {
      throw new InsufficientBalanceError(baseToken, free.toFixed());
    }

    const desired = clampTo(intent.baseAmount, free);
    const size = quantizeSize(desired, base.sizeDecimals);
    if (!size.isPositive()) {
      throw new NonActionableAmountError(baseToken, desired.toFixed(), size.toWire(), base.sizeDecimals);
    }

    const { bid } = await bestBidAsk(this.info, pairName);
    const limitPrice = slippagePrice(bid, slippageBps, false, base.sizeDecimals);

    this.logger.info(
      {
        size: size.toWire(),
        token: baseToken,
        pairName,
        bestBid: bid,
        limitPrice,
        slippageBps,
        markPrice: table.pairContext(pairName)?.markPrice,
        expectedProceeds: toDecimal(bid).times(size.value).toFixed(),
      },
      `Selling ${size.toWire()} ${baseToken} on ${pairName} (IOC market emulation, slippage ${slippageBps} bps)`
    );

    const receipt = await this.gateway.marketSell({
      pairName,
      pairAssetId: base.pairAssetId,
      isBuy: false,
      size: size.toWire(),
      slippageBps,
      limitPrice,
    });
    this.logger.info({ receipt }, 'Order response');

    report.steps.push({
      step: 'sell',
      token: baseToken,
      pairName,
      freeBalance: free.toFixed(),
      size: size.toWire(),
      limitPrice,
      receipt,
    });
  }

  private async waitForSettlement(): Promise<void> {
    this.logger.info({ delayMs: this.settlementDelayMs }, 'Waiting for the sell to settle');
    await this.sleep(this.settlementDelayMs);
  }

  private async transfer(
    token: string,
    explicitAmount: Decimal | undefined,
    decimals: TokenDecimals,
    report: MigrationReport,
    afterSell: boolean
  ): Promise<void> {
    const free = await this.balances.freeBalance(this.accountAddress, token);
    if (free.lte(0)) {
      throw new InsufficientBalanceError(
        token,
        free.toFixed(),
        afterSell ? 'The sell order may not have filled.' : undefined
      );
    }

    const desired = clampTo(explicitAmount, free);
    const amount = quantizeWithMargin(desired, decimals.weiDecimals);
    if (!amount.isPositive()) {
      throw new NonActionableAmountError(token, desired.toFixed(), amount.toWire(), decimals.weiDecimals);
    }

    this.logger.info(
      { amount: amount.toWire(), token, freeBalance: free.toFixed() },
      `Transferring ${amount.toWire()} ${token} from Spot -> Perps`
    );
    const receipt = await this.gateway.transferToPerpetuals({ amount: amount.toWire(), toPerpetuals: true });
    this.logger.info({ receipt }, 'Transfer response');

    report.steps.push({
      step: 'transfer',
      token,
      freeBalance: free.toFixed(),
      amount: amount.toWire(),
      receipt,
    });
  }

  private async withdraw(intent: WithdrawIntent, report: MigrationReport): Promise<void> {
    const amount = quantizeWithdrawal(intent.amount);
    if (!amount.isPositive()) {
      throw new NonActionableAmountError(
        intent.quoteToken,
        intent.amount.toFixed(),
        amount.toWire(),
        WITHDRAWAL_DECIMALS
      );
    }

    this.logger.info(
      { amount: amount.toWire(), token: intent.quoteToken, destination: intent.destination },
      `Withdrawing ${amount.toWire()} ${intent.quoteToken} from Perps to ${intent.destination}`
    );
    const receipt = await this.gateway.withdraw({
      amount: amount.toWire(),
      destinationAddress: intent.destination,
    });
    this.logger.info({ receipt }, 'Withdraw response');

    report.steps.push({
      step: 'withdraw',
      token: intent.quoteToken,
      amount: amount.toWire(),
      destination: intent.destination,
      receipt,
    });
  }
}
