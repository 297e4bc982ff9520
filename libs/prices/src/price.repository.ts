import { Injectable } from '@nestjs/common';
import type { Currency } from '@libs/quotes';
import type { LatestPrice, OperationLogEntry, TrackedSymbol } from './price.models';

export const PRICE_REPOSITORY = Symbol('PRICE_REPOSITORY');

export interface PriceRepository {
  upsertSymbol(params: {
    symbol: string;
    currency: Currency;
    assetType: string;
    autoUpdate: boolean;
  }): Promise<TrackedSymbol>;
  listSymbols(currency?: Currency): Promise<TrackedSymbol[]>;
  /** Stores the price and stamps the tracked symbol, if any, with the same time. */
  saveLatestPrice(symbol: string, currency: Currency, price: number, updatedAt: Date): Promise<LatestPrice>;
  getLatestPrice(symbol: string, currency: Currency): Promise<LatestPrice | null>;
  addOperationLog(entry: Omit<OperationLogEntry, 'id' | 'createdAt'>): Promise<OperationLogEntry>;
  listOperationLogs(limit: number): Promise<OperationLogEntry[]>;
}

const keyOf = (symbol: string, currency: Currency): string => `${symbol}|${currency}`;

@Injectable()
export class InMemoryPriceRepository implements PriceRepository {
  private readonly symbols = new Map<string, TrackedSymbol>();
  private readonly prices = new Map<string, LatestPrice>();
  private readonly logs: OperationLogEntry[] = [];
  private nextLogId = 1;

  async upsertSymbol(params: {
    symbol: string;
    currency: Currency;
    assetType: string;
    autoUpdate: boolean;
  }): Promise<TrackedSymbol> {
    const key = keyOf(params.symbol, params.currency);
    const existing = this.symbols.get(key);
    const tracked: TrackedSymbol = {
      ...params,
      priceUpdatedAt: existing?.priceUpdatedAt ?? null,
    };
    this.symbols.set(key, tracked);
    return { ...tracked };
  }

  async listSymbols(currency?: Currency): Promise<TrackedSymbol[]> {
    return [...this.symbols.values()]
      .filter((tracked) => !currency || tracked.currency === currency)
      .map((tracked) => ({ ...tracked }));
  }

  async saveLatestPrice(symbol: string, currency: Currency, price: number, updatedAt: Date): Promise<LatestPrice> {
    const key = keyOf(symbol, currency);
    const latest: LatestPrice = { symbol, currency, price, updatedAt };
    this.prices.set(key, latest);
    const tracked = this.symbols.get(key);
    if (tracked) {
      this.symbols.set(key, { ...tracked, priceUpdatedAt: updatedAt });
    }
    return { ...latest };
  }

  async getLatestPrice(symbol: string, currency: Currency): Promise<LatestPrice | null> {
    const latest = this.prices.get(keyOf(symbol, currency));
    return latest ? { ...latest } : null;
  }

  async addOperationLog(entry: Omit<OperationLogEntry, 'id' | 'createdAt'>): Promise<OperationLogEntry> {
    const stored: OperationLogEntry = { ...entry, id: this.nextLogId++, createdAt: new Date() };
    this.logs.push(stored);
    return { ...stored };
  }

  async listOperationLogs(limit: number): Promise<OperationLogEntry[]> {
    if (limit <= 0) return [];
    return this.logs
      .slice(-limit)
      .reverse()
      .map((entry) => ({ ...entry }));
  }
}
