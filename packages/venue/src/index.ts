export { InfoClient } from './infoClient.js';
export type { InfoApi, InfoClientOptions } from './infoClient.js';
export { MetadataTable } from './metadata.js';
export { BalanceReader } from './balances.js';
export { bestBidAsk } from './book.js';
