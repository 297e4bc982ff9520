import { describe, expect, it } from 'vitest';
import {
  InMemoryPriceRepository,
  InvalidPriceError,
  MANUAL_UPDATE_DETAILS,
  PriceUpdateService,
  UnsupportedCurrencyError,
} from '@libs/prices';
import type { QuoteAttempt } from '@libs/quotes';
import { buildStubQuoteStack, fail, succeed } from './support/quote-fixtures';

const T0 = Date.parse('2024-05-10T02:00:00Z');

const buildService = (attempts: QuoteAttempt[], overrides: Record<string, unknown> = {}) => {
  const stack = buildStubQuoteStack({ us_stock: attempts }, overrides);
  const repository = new InMemoryPriceRepository();
  const service = new PriceUpdateService(stack.config, stack.fetcher, repository);
  return { service, repository, stack };
};

const pricedFromMap = (prices: Record<string, number>): QuoteAttempt => ({
  name: 'Yahoo Finance',
  fetch: async (symbol) => {
    const price = prices[symbol];
    return price === undefined ? fail('no data') : succeed(price);
  },
});

describe('price update service', () => {
  it('stores fetched prices and logs the update', async () => {
    const { service, repository } = buildService([pricedFromMap({ AAPL: 189.5 })]);

    const result = await service.updatePrice('aapl', 'usd');

    expect(result.price).toBe(189.5);
    expect(await repository.getLatestPrice('AAPL', 'USD')).toMatchObject({ symbol: 'AAPL', currency: 'USD', price: 189.5 });
    const [log] = await repository.listOperationLogs(10);
    expect(log).toMatchObject({
      operation: 'PRICE_UPDATE',
      symbol: 'AAPL',
      currency: 'USD',
      details: 'price fetched (source: Yahoo Finance)',
      priceFetched: 189.5,
    });
  });

  it('logs failed updates without storing a price', async () => {
    const { service, repository } = buildService([pricedFromMap({})]);

    const result = await service.updatePrice('MSFT', 'USD');

    expect(result.price).toBeNull();
    expect(await repository.getLatestPrice('MSFT', 'USD')).toBeNull();
    const [log] = await repository.listOperationLogs(10);
    expect(log).toMatchObject({
      operation: 'PRICE_UPDATE_FAILED',
      symbol: 'MSFT',
      details: 'price fetch failed: Yahoo Finance: no data',
      priceFetched: null,
    });
  });

  it('rejects unsupported currencies', async () => {
    const { service } = buildService([]);
    await expect(service.updatePrice('AAPL', 'EUR')).rejects.toBeInstanceOf(UnsupportedCurrencyError);
    await expect(service.updateAllPrices('JPY')).rejects.toThrow('unsupported currency: JPY');
  });

  it('stores manual prices', async () => {
    const { service, repository } = buildService([]);

    await service.manualUpdatePrice(' 600519 ', 'CNY', 1700.5);

    expect(await repository.getLatestPrice('600519', 'CNY')).toMatchObject({ price: 1700.5 });
    const [log] = await service.listOperationLogs();
    expect(log).toMatchObject({
      operation: 'MANUAL_PRICE_UPDATE',
      symbol: '600519',
      currency: 'CNY',
      details: MANUAL_UPDATE_DETAILS,
      priceFetched: 1700.5,
    });
  });

  it('refuses manual prices that are not positive', async () => {
    const { service, repository } = buildService([]);
    await expect(service.manualUpdatePrice('AAPL', 'USD', 0)).rejects.toBeInstanceOf(InvalidPriceError);
    await expect(service.manualUpdatePrice('AAPL', 'USD', Number.NaN)).rejects.toBeInstanceOf(InvalidPriceError);
    expect(await repository.listOperationLogs(10)).toEqual([]);
  });

  it('stamps tracked symbols when a price is stored', async () => {
    const { service } = buildService([pricedFromMap({ AAPL: 190 })]);
    await service.trackSymbol({ symbol: 'aapl', currency: 'USD' });

    await service.updatePrice('AAPL', 'USD');

    const [tracked] = await service.listSymbols('USD');
    expect(tracked.symbol).toBe('AAPL');
    expect(tracked.assetType).toBe('stock');
    expect(tracked.autoUpdate).toBe(true);
    expect(tracked.priceUpdatedAt).toBeInstanceOf(Date);
  });

  it('updates only due auto-update symbols of one currency', async () => {
    const { service, repository } = buildService([pricedFromMap({ AAA: 1, CCC: 3, DDD: 4, FFF: 6 })]);
    await service.trackSymbol({ symbol: 'AAA', currency: 'USD' });
    await service.trackSymbol({ symbol: 'BBB', currency: 'USD', autoUpdate: false });
    await service.trackSymbol({ symbol: 'CCC', currency: 'USD' });
    await service.trackSymbol({ symbol: 'DDD', currency: 'USD' });
    await service.trackSymbol({ symbol: 'EEE', currency: 'USD' });
    await service.trackSymbol({ symbol: 'FFF', currency: 'HKD' });
    await repository.saveLatestPrice('CCC', 'USD', 2.9, new Date(T0 - 60_000));
    await repository.saveLatestPrice('DDD', 'USD', 3.9, new Date(T0 - 600_000));

    const result = await service.updateAllPrices('usd', T0);

    expect(result).toEqual({
      updated: 2,
      errors: ['EEE: price fetch failed: Yahoo Finance: no data'],
    });
    expect(await repository.getLatestPrice('AAA', 'USD')).toMatchObject({ price: 1 });
    expect(await repository.getLatestPrice('CCC', 'USD')).toMatchObject({ price: 2.9 });
    expect(await repository.getLatestPrice('DDD', 'USD')).toMatchObject({ price: 4 });
    expect(await repository.getLatestPrice('BBB', 'USD')).toBeNull();
    expect(await repository.getLatestPrice('FFF', 'HKD')).toBeNull();
  });

  it('returns an empty result when nothing is due', async () => {
    const { service } = buildService([pricedFromMap({})]);
    await expect(service.updateAllPrices('CNY')).resolves.toEqual({ updated: 0, errors: [] });
  });

  it('limits concurrent updates', async () => {
    let inFlight = 0;
    let maxInFlight = 0;
    const slow: QuoteAttempt = {
      name: 'Yahoo Finance',
      fetch: async () => {
        inFlight += 1;
        maxInFlight = Math.max(maxInFlight, inFlight);
        await new Promise((resolve) => setTimeout(resolve, 5));
        inFlight -= 1;
        return succeed(10);
      },
    };
    const { service } = buildService([slow], { PRICE_UPDATE_CONCURRENCY: 2 });
    for (const symbol of ['AAA', 'BBB', 'CCC', 'DDD', 'EEE']) {
      await service.trackSymbol({ symbol, currency: 'USD' });
    }

    const result = await service.updateAllPrices('USD');

    expect(result.updated).toBe(5);
    expect(maxInFlight).toBe(2);
  });

  it('returns the newest operation logs first', async () => {
    const { service } = buildService([]);
    await service.manualUpdatePrice('AAA', 'USD', 1);
    await service.manualUpdatePrice('BBB', 'USD', 2);
    await service.manualUpdatePrice('CCC', 'USD', 3);

    const logs = await service.listOperationLogs(2);
    expect(logs.map((log) => log.symbol)).toEqual(['CCC', 'BBB']);
    expect(await service.listOperationLogs(0)).toEqual([]);
  });
});
