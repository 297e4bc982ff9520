import { Inject, Injectable, Optional } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { AxiosAdapter, AxiosInstance } from 'axios';
import type { FetchOutcome } from '../models';
import { normalizeYahooChart } from '../normalizers';
import { toYahooSymbol } from '../symbol-mapper';
import { BaseQuoteProvider, QUOTE_HTTP_ADAPTER } from './base-quote.provider';

// COMEX gold futures, USD per troy ounce
export const GOLD_FUTURES_SYMBOL = 'GC=F';

@Injectable()
export class YahooQuoteProvider extends BaseQuoteProvider {
  private readonly restClient: AxiosInstance;

  constructor(
    configService: ConfigService,
    @Optional() @Inject(QUOTE_HTTP_ADAPTER) httpAdapter?: AxiosAdapter,
  ) {
    super('yahoo', configService, httpAdapter);
    this.restClient = this.createClient('yahoo');
  }

  async fetchStock(symbol: string, currency: string): Promise<FetchOutcome> {
    const yahooSymbol = toYahooSymbol(symbol, currency);
    if (!yahooSymbol) {
      return this.reject('yahoo_chart', symbol, 'invalid symbol format');
    }
    return this.attempt('yahoo_chart', yahooSymbol, async () =>
      normalizeYahooChart(
        await this.getText(this.restClient, `/v8/finance/chart/${encodeURIComponent(yahooSymbol)}`, {
          params: { interval: '1d', range: '1d' },
          headers: { 'User-Agent': 'Mozilla/5.0' },
        }),
      ),
    );
  }

  async fetchGoldPerOunce(): Promise<FetchOutcome> {
    return this.fetchStock(GOLD_FUTURES_SYMBOL, 'USD');
  }
}
