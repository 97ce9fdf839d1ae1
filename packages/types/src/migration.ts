import type { Decimal } from 'decimal.js';
import type { Hex, SubmissionReceipt } from './intents.js';

export const MIGRATION_MODES = ['sell_and_transfer', 'transfer_only', 'withdraw'] as const;

export type MigrationMode = (typeof MIGRATION_MODES)[number];

export interface MigrationRequest {
  mode: MigrationMode;
  pairName: string;
  baseToken: string;
  quoteToken: string;
  baseAmount?: Decimal;
  quoteAmount?: Decimal;
  destination?: string;
  slippageBps: number;
}

export interface SellAndTransferIntent {
  mode: 'sell_and_transfer';
  pairName: string;
  baseToken: string;
  quoteToken: string;
  baseAmount?: Decimal;
  quoteAmount?: Decimal;
  slippageBps: number;
}

export interface TransferOnlyIntent {
  mode: 'transfer_only';
  quoteToken: string;
  quoteAmount?: Decimal;
}

export interface WithdrawIntent {
  mode: 'withdraw';
  quoteToken: string;
  amount: Decimal;
  destination: Hex;
}

export type MigrationIntent = SellAndTransferIntent | TransferOnlyIntent | WithdrawIntent;

export interface SellStep {
  step: 'sell';
  token: string;
  pairName: string;
  freeBalance: string;
  size: string;
  limitPrice: string;
  receipt: SubmissionReceipt;
}

export interface TransferStep {
  step: 'transfer';
  token: string;
  freeBalance: string;
  amount: string;
  receipt: SubmissionReceipt;
}

export interface WithdrawStep {
  step: 'withdraw';
  token: string;
  amount: string;
  destination: Hex;
  receipt: SubmissionReceipt;
}

export type MigrationStep = SellStep | TransferStep | WithdrawStep;

export interface MigrationReport {
  mode: MigrationMode;
  startedAt: string;
  finishedAt?: string;
  steps: MigrationStep[];
}
