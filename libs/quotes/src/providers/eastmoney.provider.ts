import { Inject, Injectable, Optional } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { AxiosAdapter, AxiosInstance } from 'axios';
import type { FetchOutcome } from '../models';
import { normalizeEastmoneyStock } from '../normalizers';
import { isSixDigitCode, splitExchangePrefix } from '../symbol-mapper';
import { BaseQuoteProvider, QUOTE_HTTP_ADAPTER } from './base-quote.provider';

const EASTMONEY_UT = 'fa5fd1943c7b386f172d6893dbfba10b';
const HEADERS = { 'User-Agent': 'Mozilla/5.0', Referer: 'http://quote.eastmoney.com/' };

// secid market ids
const MARKET_SZ = 0;
const MARKET_SH = 1;
const MARKET_HK_CONNECT = 128;

@Injectable()
export class EastmoneyQuoteProvider extends BaseQuoteProvider {
  private readonly restClient: AxiosInstance;

  constructor(
    configService: ConfigService,
    @Optional() @Inject(QUOTE_HTTP_ADAPTER) httpAdapter?: AxiosAdapter,
  ) {
    super('eastmoney', configService, httpAdapter);
    this.restClient = this.createClient('eastmoney');
  }

  async fetchAShare(symbol: string): Promise<FetchOutcome> {
    const { exchange, code } = splitExchangePrefix(symbol);
    if (!isSixDigitCode(code)) {
      return this.reject('eastmoney_a_share', symbol, 'invalid symbol format');
    }
    const market = exchange === 'sh' ? MARKET_SH : MARKET_SZ;
    return this.attempt('eastmoney_a_share', symbol, async () =>
      normalizeEastmoneyStock(await this.fetchStock(`${market}.${code}`), 'a_share'),
    );
  }

  /** Price in HKD for a bare five-digit Hong Kong code. */
  async fetchHkConnect(hkCode: string): Promise<FetchOutcome> {
    return this.attempt('eastmoney_hk_connect', hkCode, async () =>
      normalizeEastmoneyStock(await this.fetchStock(`${MARKET_HK_CONNECT}.${hkCode}`), 'hk_connect'),
    );
  }

  private fetchStock(secid: string): Promise<string> {
    return this.getText(this.restClient, '/api/qt/stock/get', {
      params: { secid, fields: 'f43', ut: EASTMONEY_UT },
      headers: HEADERS,
    });
  }
}
