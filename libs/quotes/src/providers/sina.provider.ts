import { Inject, Injectable, Optional } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { AxiosAdapter, AxiosInstance } from 'axios';
import type { FetchOutcome } from '../models';
import { normalizeSinaQuote } from '../normalizers';
import { padHkCode, splitExchangePrefix } from '../symbol-mapper';
import { BaseQuoteProvider, QUOTE_HTTP_ADAPTER } from './base-quote.provider';

const HEADERS = { Referer: 'http://finance.sina.com.cn' };

// position of the last traded price in each market's comma list
const A_SHARE_FIELD = 3;
const HK_FIELD = 6;
const US_FIELD = 1;

@Injectable()
export class SinaQuoteProvider extends BaseQuoteProvider {
  private readonly restClient: AxiosInstance;

  constructor(
    configService: ConfigService,
    @Optional() @Inject(QUOTE_HTTP_ADAPTER) httpAdapter?: AxiosAdapter,
  ) {
    super('sina', configService, httpAdapter);
    this.restClient = this.createClient('sina');
  }

  async fetchAShare(symbol: string): Promise<FetchOutcome> {
    const { exchange, code } = splitExchangePrefix(symbol);
    return this.fetchListField('sina_a_share', symbol, `${exchange}${code}`, A_SHARE_FIELD);
  }

  async fetchHkStock(symbol: string): Promise<FetchOutcome> {
    return this.fetchListField('sina_hk_stock', symbol, `hk${padHkCode(symbol)}`, HK_FIELD);
  }

  async fetchUsStock(symbol: string): Promise<FetchOutcome> {
    return this.fetchListField('sina_us_stock', symbol, `gb_${symbol.trim().toLowerCase()}`, US_FIELD);
  }

  private fetchListField(operation: string, symbol: string, listCode: string, field: number): Promise<FetchOutcome> {
    return this.attempt(operation, symbol, async () =>
      normalizeSinaQuote(await this.getText(this.restClient, `/list=${listCode}`, { headers: HEADERS }), field),
    );
  }
}
