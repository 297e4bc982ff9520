import { SchedulerRegistry } from '@nestjs/schedule';
import { afterEach, describe, expect, it, vi } from 'vitest';
import { InMemoryPriceRepository, PriceUpdateService } from '@libs/prices';
import { PRICE_SWEEP_INTERVAL_NAME, PriceSweepCron } from '../apps/api/src/price-sweep.cron';
import { buildStubQuoteStack } from './support/quote-fixtures';

const buildCron = (overrides: Record<string, unknown> = {}) => {
  const stack = buildStubQuoteStack({}, overrides);
  const priceUpdateService = new PriceUpdateService(stack.config, stack.fetcher, new InMemoryPriceRepository());
  const schedulerRegistry = new SchedulerRegistry();
  const cron = new PriceSweepCron(stack.config, priceUpdateService, schedulerRegistry);
  return { cron, priceUpdateService, schedulerRegistry };
};

describe('price sweep', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('stays idle unless enabled', () => {
    const { cron, schedulerRegistry } = buildCron();
    cron.onModuleInit();
    expect(schedulerRegistry.doesExist('interval', PRICE_SWEEP_INTERVAL_NAME)).toBe(false);
  });

  it('registers and removes its interval', () => {
    const { cron, schedulerRegistry } = buildCron({ PRICE_SWEEP_ENABLED: true, PRICE_SWEEP_INTERVAL_SECONDS: 60 });
    cron.onModuleInit();
    expect(schedulerRegistry.doesExist('interval', PRICE_SWEEP_INTERVAL_NAME)).toBe(true);
    cron.onModuleDestroy();
    expect(schedulerRegistry.doesExist('interval', PRICE_SWEEP_INTERVAL_NAME)).toBe(false);
  });

  it('updates every configured currency in turn', async () => {
    const { cron, priceUpdateService } = buildCron({ PRICE_SWEEP_CURRENCIES: 'CNY, HKD' });
    const updateAll = vi.spyOn(priceUpdateService, 'updateAllPrices').mockResolvedValue({ updated: 0, errors: [] });

    await cron.runOnce();

    expect(updateAll.mock.calls.map(([currency]) => currency)).toEqual(['CNY', 'HKD']);
  });

  it('keeps going when one currency fails', async () => {
    const { cron, priceUpdateService } = buildCron({ PRICE_SWEEP_CURRENCIES: ['EUR', 'USD'] });
    const updateAll = vi.spyOn(priceUpdateService, 'updateAllPrices');

    await cron.runOnce();

    expect(updateAll).toHaveBeenCalledTimes(2);
    await expect(updateAll.mock.results[0].value).rejects.toThrow('unsupported currency: EUR');
  });

  it('drops a tick while a sweep is running', async () => {
    const { cron, priceUpdateService } = buildCron({ PRICE_SWEEP_CURRENCIES: ['USD'] });
    let release: () => void = () => undefined;
    const updateAll = vi.spyOn(priceUpdateService, 'updateAllPrices').mockImplementation(
      () =>
        new Promise((resolve) => {
          release = () => resolve({ updated: 0, errors: [] });
        }),
    );

    const first = cron.runOnce();
    await cron.runOnce();
    release();
    await first;

    expect(updateAll).toHaveBeenCalledTimes(1);
  });
});
