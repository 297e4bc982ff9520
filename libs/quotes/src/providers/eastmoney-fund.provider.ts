import { Inject, Injectable, Optional } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { AxiosAdapter, AxiosInstance } from 'axios';
import type { FetchOutcome } from '../models';
import { normalizeFundGz, normalizeFundLsjz, normalizePingzhongNetWorth } from '../normalizers';
import { isSixDigitCode, normalizeSymbol } from '../symbol-mapper';
import { BaseQuoteProvider, QUOTE_HTTP_ADAPTER } from './base-quote.provider';

const HEADERS = { 'User-Agent': 'Mozilla/5.0', Referer: 'http://fund.eastmoney.com/' };

/** Mutual fund NAV sources: intraday estimate, net-worth trend script, NAV history table. */
@Injectable()
export class EastmoneyFundQuoteProvider extends BaseQuoteProvider {
  private readonly estimateClient: AxiosInstance;
  private readonly fundClient: AxiosInstance;

  constructor(
    configService: ConfigService,
    @Optional() @Inject(QUOTE_HTTP_ADAPTER) httpAdapter?: AxiosAdapter,
  ) {
    super('eastmoney_fund', configService, httpAdapter);
    this.estimateClient = this.createClient('eastmoney_fund_gz');
    this.fundClient = this.createClient('eastmoney_fund');
  }

  async fetchEstimate(symbol: string): Promise<FetchOutcome> {
    const code = normalizeSymbol(symbol);
    if (!isSixDigitCode(code)) {
      return this.reject('eastmoney_fund_gz', symbol, 'invalid symbol format');
    }
    return this.attempt('eastmoney_fund_gz', code, async () =>
      normalizeFundGz(await this.getText(this.estimateClient, `/js/${code}.js`, { headers: HEADERS })),
    );
  }

  async fetchNetWorthTrend(symbol: string): Promise<FetchOutcome> {
    const code = normalizeSymbol(symbol);
    if (!isSixDigitCode(code)) {
      return this.reject('eastmoney_fund_pz', symbol, 'invalid symbol format');
    }
    return this.attempt('eastmoney_fund_pz', code, async () =>
      normalizePingzhongNetWorth(
        await this.getText(this.fundClient, `/pingzhongdata/${code}.js`, { headers: HEADERS }),
      ),
    );
  }

  async fetchNavHistory(symbol: string): Promise<FetchOutcome> {
    const code = normalizeSymbol(symbol);
    if (!isSixDigitCode(code)) {
      return this.reject('eastmoney_fund_lsjz', symbol, 'invalid symbol format');
    }
    return this.attempt('eastmoney_fund_lsjz', code, async () =>
      normalizeFundLsjz(
        await this.getText(this.fundClient, '/f10/F10DataApi.aspx', {
          params: { type: 'lsjz', code, page: 1, per: 1 },
          headers: HEADERS,
        }),
      ),
    );
  }
}
