import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { QuoteFetcherService, isCurrency, normalizeAssetType, normalizeCurrency, normalizeSymbol } from '@libs/quotes';
import type { Currency, QuoteResult } from '@libs/quotes';
import { InvalidPriceError, UnsupportedCurrencyError } from './price.models';
import type { OperationLogEntry, TrackedSymbol, UpdateAllResult } from './price.models';
import { PRICE_REPOSITORY } from './price.repository';
import type { PriceRepository } from './price.repository';

export const MANUAL_UPDATE_DETAILS = 'Manual price update';

@Injectable()
export class PriceUpdateService {
  private readonly logger = new Logger(PriceUpdateService.name);
  private readonly concurrency: number;
  private readonly recentThresholdMs: number;

  constructor(
    private readonly configService: ConfigService,
    private readonly quoteFetcher: QuoteFetcherService,
    @Inject(PRICE_REPOSITORY) private readonly repository: PriceRepository,
  ) {
    this.concurrency = Math.max(1, this.configService.get<number>('PRICE_UPDATE_CONCURRENCY', 4));
    this.recentThresholdMs = this.configService.get<number>('PRICE_RECENT_THRESHOLD_SECONDS', 300) * 1000;
  }

  /** Fetches a quote and stores it; every attempt lands in the operation log. */
  async updatePrice(symbol: string, currency: string, assetType?: string | null): Promise<QuoteResult> {
    const ccy = this.requireCurrency(currency);
    const code = normalizeSymbol(symbol);
    const result = await this.quoteFetcher.quote(code, ccy, assetType);

    if (result.price !== null) {
      await this.repository.saveLatestPrice(code, ccy, result.price, new Date());
      await this.repository.addOperationLog({
        operation: 'PRICE_UPDATE',
        symbol: code,
        currency: ccy,
        details: result.message,
        priceFetched: result.price,
      });
      return result;
    }

    await this.repository.addOperationLog({
      operation: 'PRICE_UPDATE_FAILED',
      symbol: code,
      currency: ccy,
      details: result.message,
      priceFetched: null,
    });
    return result;
  }

  async manualUpdatePrice(symbol: string, currency: string, price: number): Promise<void> {
    if (!Number.isFinite(price) || price <= 0) {
      throw new InvalidPriceError(price);
    }
    const code = normalizeSymbol(symbol);
    const ccy = this.requireCurrency(currency);
    await this.repository.saveLatestPrice(code, ccy, price, new Date());
    await this.repository.addOperationLog({
      operation: 'MANUAL_PRICE_UPDATE',
      symbol: code,
      currency: ccy,
      details: MANUAL_UPDATE_DETAILS,
      priceFetched: price,
    });
  }

  /**
   * Refreshes every auto-update symbol of a currency that has not been priced
   * within the recent threshold.
   */
  async updateAllPrices(currency: string, now = Date.now()): Promise<UpdateAllResult> {
    const ccy = this.requireCurrency(currency);
    const symbols = await this.repository.listSymbols(ccy);
    const due = symbols.filter((tracked) => tracked.autoUpdate && !this.isRecent(tracked, now));
    if (!due.length) {
      return { updated: 0, errors: [] };
    }

    let updated = 0;
    const errors: string[] = [];
    await this.runWithConcurrency(due, this.concurrency, async (tracked) => {
      const result = await this.updatePrice(tracked.symbol, ccy, tracked.assetType);
      if (result.price !== null) {
        updated += 1;
      } else {
        errors.push(`${tracked.symbol}: ${result.message}`);
      }
    });

    this.logger.log(
      JSON.stringify({
        event: 'prices_updated',
        currency: ccy,
        updated,
        failed: errors.length,
        skipped: symbols.length - due.length,
      }),
    );
    return { updated, errors };
  }

  async trackSymbol(params: {
    symbol: string;
    currency: string;
    assetType?: string | null;
    autoUpdate?: boolean;
  }): Promise<TrackedSymbol> {
    return this.repository.upsertSymbol({
      symbol: normalizeSymbol(params.symbol),
      currency: this.requireCurrency(params.currency),
      assetType: normalizeAssetType(params.assetType),
      autoUpdate: params.autoUpdate ?? true,
    });
  }

  async listSymbols(currency?: string): Promise<TrackedSymbol[]> {
    return this.repository.listSymbols(currency === undefined ? undefined : this.requireCurrency(currency));
  }

  async listOperationLogs(limit = 50): Promise<OperationLogEntry[]> {
    return this.repository.listOperationLogs(limit);
  }

  private requireCurrency(currency: string): Currency {
    const ccy = normalizeCurrency(currency);
    if (!isCurrency(ccy)) {
      throw new UnsupportedCurrencyError(currency);
    }
    return ccy;
  }

  private isRecent(tracked: TrackedSymbol, now: number): boolean {
    if (!tracked.priceUpdatedAt) return false;
    return now - tracked.priceUpdatedAt.getTime() < this.recentThresholdMs;
  }

  private async runWithConcurrency<T>(
    items: T[],
    concurrency: number,
    worker: (item: T) => Promise<void>,
  ): Promise<void> {
    let index = 0;
    const runners = new Array(Math.min(concurrency, items.length)).fill(null).map(async () => {
      while (index < items.length) {
        const current = items[index++];
        await worker(current);
      }
    });
    await Promise.all(runners);
  }
}
