import { describe, expect, it } from 'vitest';
import { buildQuoteCacheKey, QuoteCacheService } from '@libs/quotes';
import type { QuoteKey } from '@libs/quotes';
import { buildConfig } from './support/quote-fixtures';

const T0 = 1_700_000_000_000;
const key: QuoteKey = { symbol: 'AAPL', currency: 'USD', instrumentClass: 'us_stock' };

describe('quote cache', () => {
  it('builds keys from symbol, currency and class', () => {
    expect(buildQuoteCacheKey(key)).toBe('AAPL|USD|us_stock');
  });

  it('appends the route when one is given', () => {
    const stockKey: QuoteKey = { symbol: 'SH600519', currency: 'CNY', instrumentClass: 'a_share', route: 'a_share' };
    const fundKey: QuoteKey = { ...stockKey, route: 'a_share_fund_first' };
    expect(buildQuoteCacheKey(stockKey)).toBe('SH600519|CNY|a_share|a_share');
    expect(buildQuoteCacheKey(fundKey)).toBe('SH600519|CNY|a_share|a_share_fund_first');

    const cache = new QuoteCacheService(buildConfig());
    cache.put(fundKey, 1.02, 'Eastmoney Fund', T0);
    expect(cache.get(stockKey, T0)).toBeNull();
    expect(cache.get(fundKey, T0)?.price).toBe(1.02);
  });

  it('serves entries up to the TTL and expires them after', () => {
    const cache = new QuoteCacheService(buildConfig());
    cache.put(key, 189.5, 'Yahoo Finance', T0);

    expect(cache.get(key, T0 + 29_000)).toEqual({ price: 189.5, source: 'Yahoo Finance', fetchedAt: T0 });
    expect(cache.get(key, T0 + 30_000)).not.toBeNull();
    expect(cache.get(key, T0 + 31_000)).toBeNull();
  });

  it('replaces entries wholesale', () => {
    const cache = new QuoteCacheService(buildConfig());
    const first = cache.put(key, 1, 'Sina Finance', T0);
    cache.put(key, 2, 'Tencent Finance', T0 + 10);

    expect(Object.isFrozen(first)).toBe(true);
    expect(cache.get(key, T0 + 10)).toEqual({ price: 2, source: 'Tencent Finance', fetchedAt: T0 + 10 });
    expect(cache.size).toBe(1);
  });

  it('keeps classes apart for the same symbol', () => {
    const cache = new QuoteCacheService(buildConfig());
    cache.put({ symbol: '600519', currency: 'CNY', instrumentClass: 'a_share' }, 1700, 'Eastmoney', T0);
    expect(cache.get({ symbol: '600519', currency: 'CNY', instrumentClass: 'fund' }, T0)).toBeNull();
  });

  it('sweeps only expired entries', () => {
    const cache = new QuoteCacheService(buildConfig());
    cache.put(key, 1, 'Yahoo Finance', T0);
    cache.put({ ...key, symbol: 'MSFT' }, 2, 'Yahoo Finance', T0 + 20_000);

    expect(cache.sweep(T0 + 31_000)).toBe(1);
    expect(cache.size).toBe(1);
    expect(cache.get({ ...key, symbol: 'MSFT' }, T0 + 31_000)).not.toBeNull();
  });

  it('honours a configured TTL', () => {
    const cache = new QuoteCacheService(buildConfig({ QUOTE_CACHE_TTL_SECONDS: 5 }));
    cache.put(key, 1, 'Yahoo Finance', T0);
    expect(cache.get(key, T0 + 5_001)).toBeNull();
  });

  it('does not start a sweep timer when disabled', () => {
    const cache = new QuoteCacheService(buildConfig({ QUOTE_CACHE_SWEEP_SECONDS: 0 }));
    cache.onModuleInit();
    cache.put(key, 1, 'Yahoo Finance', T0);
    cache.onModuleDestroy();
    cache.clear();
    expect(cache.size).toBe(0);
  });
});
