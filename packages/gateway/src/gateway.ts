import type { PerpTransfer, SpotSellOrder, SubmissionReceipt, Withdrawal } from '@migrator/types';

/**
 * Everything that needs the account key goes through here. Implementations sign and
 * submit exactly what they are given; amounts arrive already quantized.
 */
export interface SigningGateway {
  readonly dryRun: boolean;
  marketSell(order: SpotSellOrder): Promise<SubmissionReceipt>;
  transferToPerpetuals(transfer: PerpTransfer): Promise<SubmissionReceipt>;
  withdraw(withdrawal: Withdrawal): Promise<SubmissionReceipt>;
}
