import { Inject, Injectable, Optional } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { AxiosAdapter, AxiosInstance } from 'axios';
import type { FetchOutcome, ForeignCurrency } from '../models';
import { normalizeFrankfurterRate, normalizeOpenErApiRate } from '../normalizers';
import { BaseQuoteProvider, QUOTE_HTTP_ADAPTER } from './base-quote.provider';

export const EXCHANGE_RATE_SOURCES = Symbol('EXCHANGE_RATE_SOURCES');

/** An upstream that publishes `from -> CNY` rates. Sources are tried in order. */
export interface ExchangeRateSource {
  readonly provider: string;
  fetchRate(from: ForeignCurrency): Promise<FetchOutcome>;
}

@Injectable()
export class FrankfurterRateProvider extends BaseQuoteProvider implements ExchangeRateSource {
  private readonly restClient: AxiosInstance;

  constructor(
    configService: ConfigService,
    @Optional() @Inject(QUOTE_HTTP_ADAPTER) httpAdapter?: AxiosAdapter,
  ) {
    super('frankfurter', configService, httpAdapter);
    this.restClient = this.createClient('frankfurter');
  }

  async fetchRate(from: ForeignCurrency): Promise<FetchOutcome> {
    return this.attempt('frankfurter_latest', `${from}/CNY`, async () =>
      normalizeFrankfurterRate(
        await this.getText(this.restClient, '/latest', { params: { from, to: 'CNY' } }),
        'CNY',
      ),
    );
  }
}

@Injectable()
export class OpenErApiRateProvider extends BaseQuoteProvider implements ExchangeRateSource {
  private readonly restClient: AxiosInstance;

  constructor(
    configService: ConfigService,
    @Optional() @Inject(QUOTE_HTTP_ADAPTER) httpAdapter?: AxiosAdapter,
  ) {
    super('open_er_api', configService, httpAdapter);
    this.restClient = this.createClient('open_er_api');
  }

  async fetchRate(from: ForeignCurrency): Promise<FetchOutcome> {
    return this.attempt('open_er_api_latest', `${from}/CNY`, async () =>
      normalizeOpenErApiRate(await this.getText(this.restClient, `/v6/latest/${from}`), 'CNY'),
    );
  }
}
