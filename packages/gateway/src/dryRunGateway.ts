import { createServiceLogger, type Logger } from '@migrator/logger';
import type {
  PerpTransfer,
  SpotSellOrder,
  SubmissionAction,
  SubmissionReceipt,
  Withdrawal,
} from '@migrator/types';
import type { SigningGateway } from './gateway.js';

/** Logs every intent and acknowledges it without signing or sending anything. */
export class DryRunGateway implements SigningGateway {
  readonly dryRun = true;
  readonly submitted: Array<{ action: SubmissionAction; payload: unknown }> = [];
  private readonly logger: Logger;

  constructor(logger?: Logger) {
    this.logger = logger ?? createServiceLogger('dry-run-gateway');
  }

  async marketSell(order: SpotSellOrder): Promise<SubmissionReceipt> {
    return this.record('order', order);
  }

  async transferToPerpetuals(transfer: PerpTransfer): Promise<SubmissionReceipt> {
    return this.record('usdClassTransfer', transfer);
  }

  async withdraw(withdrawal: Withdrawal): Promise<SubmissionReceipt> {
    return this.record('withdraw3', withdrawal);
  }

  private record(action: SubmissionAction, payload: unknown): SubmissionReceipt {
    this.submitted.push({ action, payload });
    this.logger.info({ action, payload }, 'Dry run: not submitted');
    return {
      action,
      submittedAt: new Date().toISOString(),
      dryRun: true,
      response: { status: 'dry-run' },
    };
  }
}
