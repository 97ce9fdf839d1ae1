export type { SigningGateway } from './gateway.js';
export { HyperliquidGateway, createExchangeClient } from './hyperliquidGateway.js';
export type { ExchangeActions, HyperliquidGatewayOptions, IocOrderRequest } from './hyperliquidGateway.js';
export { DryRunGateway } from './dryRunGateway.js';
