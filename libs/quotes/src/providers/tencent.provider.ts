import { Inject, Injectable, Optional } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { AxiosAdapter, AxiosInstance } from 'axios';
import type { FetchOutcome } from '../models';
import { normalizeTencentQuote } from '../normalizers';
import { normalizeSymbol, padHkCode, splitExchangePrefix } from '../symbol-mapper';
import { BaseQuoteProvider, QUOTE_HTTP_ADAPTER } from './base-quote.provider';

@Injectable()
export class TencentQuoteProvider extends BaseQuoteProvider {
  private readonly restClient: AxiosInstance;

  constructor(
    configService: ConfigService,
    @Optional() @Inject(QUOTE_HTTP_ADAPTER) httpAdapter?: AxiosAdapter,
  ) {
    super('tencent', configService, httpAdapter);
    this.restClient = this.createClient('tencent');
  }

  async fetchAShare(symbol: string): Promise<FetchOutcome> {
    const { exchange, code } = splitExchangePrefix(symbol);
    return this.fetchQuote('tencent_a_share', symbol, `${exchange}${code}`);
  }

  async fetchHkStock(symbol: string): Promise<FetchOutcome> {
    return this.fetchQuote('tencent_hk_stock', symbol, `hk${padHkCode(symbol)}`);
  }

  async fetchUsStock(symbol: string): Promise<FetchOutcome> {
    return this.fetchQuote('tencent_us_stock', symbol, `us${normalizeSymbol(symbol)}`);
  }

  private fetchQuote(operation: string, symbol: string, quoteCode: string): Promise<FetchOutcome> {
    return this.attempt(operation, symbol, async () =>
      normalizeTencentQuote(await this.getText(this.restClient, `/q=${quoteCode}`)),
    );
  }
}
