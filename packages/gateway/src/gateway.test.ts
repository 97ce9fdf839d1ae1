import { afterEach, describe, it, expect, vi } from 'vitest';
import { VenueRequestError } from '@migrator/errors';
import { createSilentLogger } from '@migrator/logger';
import type { Hex } from '@migrator/types';
import { HyperliquidGateway, type ExchangeActions, type IocOrderRequest } from './hyperliquidGateway.js';
import { DryRunGateway } from './dryRunGateway.js';

const ok = { status: 'ok', response: { type: 'default' } };

function fakeExchange() {
  return {
    order: vi.fn(async (_params: IocOrderRequest): Promise<unknown> => ok),
    usdClassTransfer: vi.fn(async (_params: { amount: string; toPerp: boolean }): Promise<unknown> => ok),
    withdraw3: vi.fn(async (_params: { destination: Hex; amount: string }): Promise<unknown> => ok),
  } satisfies ExchangeActions;
}

describe('HyperliquidGateway', () => {
  it('submits the sell as a non-reduce-only IOC limit order on the spot asset id', async () => {
    const exchange = fakeExchange();
    const gateway = new HyperliquidGateway(exchange, createSilentLogger());

    const receipt = await gateway.marketSell({
      pairName: 'PURR/USDC',
      pairAssetId: 10000,
      isBuy: false,
      size: '123',
      slippageBps: 30,
      limitPrice: '0.2094',
    });

    expect(exchange.order).toHaveBeenCalledWith({
      orders: [{ a: 10000, b: false, p: '0.2094', s: '123', r: false, t: { limit: { tif: 'Ioc' } } }],
      grouping: 'na',
    });
    expect(receipt.action).toBe('order');
    expect(receipt.dryRun).toBe(false);
    expect(receipt.response).toBe(ok);
  });

  it('moves the amount to the perpetuals ledger', async () => {
    const exchange = fakeExchange();
    const gateway = new HyperliquidGateway(exchange, createSilentLogger());

    await gateway.transferToPerpetuals({ amount: '50.00000002', toPerpetuals: true });

    expect(exchange.usdClassTransfer).toHaveBeenCalledWith({ amount: '50.00000002', toPerp: true });
  });

  it('withdraws to the destination address', async () => {
    const exchange = fakeExchange();
    const gateway = new HyperliquidGateway(exchange, createSilentLogger());

    const receipt = await gateway.withdraw({
      amount: '10',
      destinationAddress: '0x00000000000000000000000000000000000000bb',
    });

    expect(exchange.withdraw3).toHaveBeenCalledWith({
      destination: '0x00000000000000000000000000000000000000bb',
      amount: '10',
    });
    expect(receipt.action).toBe('withdraw3');
  });

  it('wraps submission failures in a VenueRequestError', async () => {
    const exchange = fakeExchange();
    exchange.usdClassTransfer.mockRejectedValueOnce(new Error('Insufficient balance for transfer'));
    const gateway = new HyperliquidGateway(exchange, createSilentLogger());

    const failure = gateway.transferToPerpetuals({ amount: '1', toPerpetuals: true });

    await expect(failure).rejects.toBeInstanceOf(VenueRequestError);
    await expect(failure).rejects.toThrow(
      'Venue request usdClassTransfer failed: Insufficient balance for transfer'
    );
  });
});

describe('HyperliquidGateway.connect', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('posts signed actions to the configured API URL', async () => {
    const fetchMock = vi.fn(
      async (_input: string | URL | Request, _init?: RequestInit): Promise<Response> =>
        new Response(JSON.stringify(ok), { status: 200, headers: { 'Content-Type': 'application/json' } })
    );
    vi.stubGlobal('fetch', fetchMock);

    const gateway = HyperliquidGateway.connect({
      secretKey: `0x${'01'.repeat(32)}`,
      apiUrl: 'http://127.0.0.1:8545',
      isTestnet: false,
      signatureChainId: '0xa4b1',
      timeoutMs: 5_000,
      logger: createSilentLogger(),
    });

    await gateway.transferToPerpetuals({ amount: '1', toPerpetuals: true });

    expect(fetchMock).toHaveBeenCalledTimes(1);
    const input = fetchMock.mock.calls[0]?.[0];
    const url = input instanceof Request ? input.url : String(input);
    expect(url).toBe('http://127.0.0.1:8545/exchange');
  });
});

describe('DryRunGateway', () => {
  it('records intents and acknowledges them without sending', async () => {
    const gateway = new DryRunGateway(createSilentLogger());

    const receipt = await gateway.transferToPerpetuals({ amount: '3', toPerpetuals: true });

    expect(gateway.dryRun).toBe(true);
    expect(receipt).toMatchObject({ action: 'usdClassTransfer', dryRun: true, response: { status: 'dry-run' } });
    expect(gateway.submitted).toEqual([
      { action: 'usdClassTransfer', payload: { amount: '3', toPerpetuals: true } },
    ]);
  });
});
