export type Hex = `0x${string}`;

export interface SpotSellOrder {
  pairName: string;
  pairAssetId: number;
  isBuy: false;
  size: string;
  slippageBps: number;
  limitPrice: string;
}

export interface PerpTransfer {
  amount: string;
  toPerpetuals: true;
}

export interface Withdrawal {
  amount: string;
  destinationAddress: Hex;
}

export type SubmissionAction = 'order' | 'usdClassTransfer' | 'withdraw3';

export interface SubmissionReceipt {
  action: SubmissionAction;
  submittedAt: string;
  dryRun: boolean;
  response: unknown;
}
