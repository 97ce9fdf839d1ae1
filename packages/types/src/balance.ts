export interface SpotBalance {
  coin: string;
  total: string;
  hold: string;
}

export interface SpotClearinghouseState {
  balances: SpotBalance[];
}
