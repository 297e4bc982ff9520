import { Injectable, Logger, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { CacheEntry, QuoteKey } from './models';

export const buildQuoteCacheKey = (key: QuoteKey): string => {
  const base = `${key.symbol}|${key.currency}|${key.instrumentClass}`;
  return key.route ? `${base}|${key.route}` : base;
};

/**
 * Last successful price per quote key. Expiry is checked on read; stale
 * entries stay in the map until overwritten or swept.
 */
@Injectable()
export class QuoteCacheService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(QuoteCacheService.name);
  private readonly entries = new Map<string, CacheEntry>();
  private readonly ttlMs: number;
  private readonly sweepIntervalMs: number;
  private timer?: NodeJS.Timeout;

  constructor(configService: ConfigService) {
    this.ttlMs = configService.get<number>('QUOTE_CACHE_TTL_SECONDS', 30) * 1000;
    this.sweepIntervalMs = configService.get<number>('QUOTE_CACHE_SWEEP_SECONDS', 300) * 1000;
  }

  onModuleInit(): void {
    if (this.sweepIntervalMs <= 0) {
      return;
    }
    this.timer = setInterval(() => {
      const removed = this.sweep();
      if (removed > 0) {
        this.logger.debug(JSON.stringify({ event: 'quote_cache_swept', removed, size: this.entries.size }));
      }
    }, this.sweepIntervalMs);
    this.timer.unref();
  }

  onModuleDestroy(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = undefined;
    }
  }

  get(key: QuoteKey, now = Date.now()): CacheEntry | null {
    const entry = this.entries.get(buildQuoteCacheKey(key));
    if (!entry || now - entry.fetchedAt > this.ttlMs) {
      return null;
    }
    return entry;
  }

  put(key: QuoteKey, price: number, source: string, now = Date.now()): CacheEntry {
    const entry: CacheEntry = Object.freeze({ price, source, fetchedAt: now });
    this.entries.set(buildQuoteCacheKey(key), entry);
    return entry;
  }

  /** Drops expired entries; returns how many were removed. */
  sweep(now = Date.now()): number {
    let removed = 0;
    for (const [key, entry] of this.entries) {
      if (now - entry.fetchedAt > this.ttlMs) {
        this.entries.delete(key);
        removed += 1;
      }
    }
    return removed;
  }

  get size(): number {
    return this.entries.size;
  }

  clear(): void {
    this.entries.clear();
  }
}
