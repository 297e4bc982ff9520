import { Inject, Injectable } from '@nestjs/common';
import type { ProviderTable, QuoteAttempt } from './interfaces';
import type { Currency, FetchOutcome, ProviderSnapshot, QuoteRoute } from './models';
import { pricePerGram } from './normalizers';
import { hkConnectToHkCode } from './symbol-mapper';
import type { ExchangeRateService } from './exchange-rate.service';
import type { BaseQuoteProvider } from './providers/base-quote.provider';
import type { EastmoneyQuoteProvider } from './providers/eastmoney.provider';
import type { EastmoneyFundQuoteProvider } from './providers/eastmoney-fund.provider';
import type { SinaQuoteProvider } from './providers/sina.provider';
import type { TencentQuoteProvider } from './providers/tencent.provider';
import type { YahooQuoteProvider } from './providers/yahoo.provider';

export const QUOTE_PROVIDER_TABLE = Symbol('QUOTE_PROVIDER_TABLE');
export const QUOTE_PROVIDERS = Symbol('QUOTE_PROVIDERS');

export interface QuoteAdapters {
  eastmoney: EastmoneyQuoteProvider;
  eastmoneyFund: EastmoneyFundQuoteProvider;
  sina: SinaQuoteProvider;
  tencent: TencentQuoteProvider;
  yahoo: YahooQuoteProvider;
}

const attempt = (
  name: string,
  fetch: (symbol: string, currency: Currency) => Promise<FetchOutcome>,
): QuoteAttempt => ({ name, fetch });

const convert = async (
  outcome: Promise<FetchOutcome>,
  toTarget: (price: number) => number,
): Promise<FetchOutcome> => {
  const result = await outcome;
  return result.ok ? { ok: true, price: toTarget(result.price) } : result;
};

/**
 * The static routing table. Provider names double as circuit-breaker keys,
 * so "Yahoo Finance" trips for US, HK and A-share lookups alike.
 */
export const buildProviderTable = (adapters: QuoteAdapters, rates: ExchangeRateService): ProviderTable => {
  const { eastmoney, eastmoneyFund, sina, tencent, yahoo } = adapters;
  const hkdToCny = (price: number): number => price * rates.toCny('HKD');

  const eastmoneyAShare = attempt('Eastmoney', (symbol) => eastmoney.fetchAShare(symbol));
  const tencentAShare = attempt('Tencent Finance', (symbol) => tencent.fetchAShare(symbol));
  const sinaAShare = attempt('Sina Finance', (symbol) => sina.fetchAShare(symbol));
  const eastmoneyFundEstimate = attempt('Eastmoney Fund', (symbol) => eastmoneyFund.fetchEstimate(symbol));
  const yahooStock = attempt('Yahoo Finance', (symbol, currency) => yahoo.fetchStock(symbol, currency));

  return {
    a_share: [eastmoneyAShare, tencentAShare, sinaAShare, eastmoneyFundEstimate, yahooStock],
    a_share_fund_first: [eastmoneyFundEstimate, eastmoneyAShare, tencentAShare, sinaAShare, yahooStock],
    fund: [
      attempt('Eastmoney Fund GZ', (symbol) => eastmoneyFund.fetchEstimate(symbol)),
      attempt('Eastmoney Fund PZ', (symbol) => eastmoneyFund.fetchNetWorthTrend(symbol)),
      attempt('Eastmoney Fund LSJZ', (symbol) => eastmoneyFund.fetchNavHistory(symbol)),
      eastmoneyAShare,
    ],
    hk_connect: [
      attempt('Eastmoney HK Connect', (symbol) =>
        convert(eastmoney.fetchHkConnect(hkConnectToHkCode(symbol)), hkdToCny),
      ),
      attempt('Yahoo Finance (HK Connect)', (symbol) =>
        convert(yahoo.fetchStock(hkConnectToHkCode(symbol), 'HKD'), hkdToCny),
      ),
      attempt('Sina Finance (HK Connect)', (symbol) =>
        convert(sina.fetchHkStock(hkConnectToHkCode(symbol)), hkdToCny),
      ),
      attempt('Tencent Finance (HK Connect)', (symbol) =>
        convert(tencent.fetchHkStock(hkConnectToHkCode(symbol)), hkdToCny),
      ),
    ],
    hk_stock: [
      yahooStock,
      attempt('Sina Finance', (symbol) => sina.fetchHkStock(symbol)),
      attempt('Tencent Finance', (symbol) => tencent.fetchHkStock(symbol)),
    ],
    us_stock: [
      yahooStock,
      attempt('Sina Finance', (symbol) => sina.fetchUsStock(symbol)),
      attempt('Tencent Finance', (symbol) => tencent.fetchUsStock(symbol)),
    ],
    metal: [
      attempt('Yahoo Finance', () =>
        convert(yahoo.fetchGoldPerOunce(), (perOunce) => pricePerGram(perOunce, rates.toCny('USD'))),
      ),
    ],
  };
};

@Injectable()
export class ProviderRegistryService {
  constructor(
    @Inject(QUOTE_PROVIDER_TABLE) private readonly table: ProviderTable,
    @Inject(QUOTE_PROVIDERS) private readonly providers: readonly BaseQuoteProvider[] = [],
  ) {}

  providersFor(route: QuoteRoute): readonly QuoteAttempt[] {
    return this.table[route];
  }

  providerNames(): string[] {
    const names = new Set<string>();
    for (const attempts of Object.values(this.table)) {
      attempts.forEach((item) => names.add(item.name));
    }
    return Array.from(names);
  }

  getSnapshots(): ProviderSnapshot[] {
    return this.providers.map((provider) => provider.getSnapshot());
  }
}
