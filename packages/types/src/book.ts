export interface BookLevel {
  px: string;
  sz: string;
  n: number;
}

export interface L2Book {
  coin: string;
  time: number;
  levels: [BookLevel[], BookLevel[]];
}

export interface BestBidAsk {
  bid: string;
  ask: string;
}
