import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { CircuitBreakerService } from './circuit-breaker.service';
import { ExchangeRateService } from './exchange-rate.service';
import {
  buildProviderTable,
  ProviderRegistryService,
  QUOTE_PROVIDER_TABLE,
  QUOTE_PROVIDERS,
} from './provider-registry.service';
import { QuoteCacheService } from './quote-cache.service';
import { QuoteFetcherService } from './quote-fetcher.service';
import { EastmoneyQuoteProvider } from './providers/eastmoney.provider';
import {
  EXCHANGE_RATE_SOURCES,
  FrankfurterRateProvider,
  OpenErApiRateProvider,
} from './providers/exchange-rate.providers';
import { EastmoneyFundQuoteProvider } from './providers/eastmoney-fund.provider';
import { SinaQuoteProvider } from './providers/sina.provider';
import { TencentQuoteProvider } from './providers/tencent.provider';
import { YahooQuoteProvider } from './providers/yahoo.provider';

@Module({
  imports: [ConfigModule],
  providers: [
    EastmoneyQuoteProvider,
    EastmoneyFundQuoteProvider,
    SinaQuoteProvider,
    TencentQuoteProvider,
    YahooQuoteProvider,
    FrankfurterRateProvider,
    OpenErApiRateProvider,
    {
      provide: EXCHANGE_RATE_SOURCES,
      useFactory: (frankfurter: FrankfurterRateProvider, openErApi: OpenErApiRateProvider) => [frankfurter, openErApi],
      inject: [FrankfurterRateProvider, OpenErApiRateProvider],
    },
    ExchangeRateService,
    CircuitBreakerService,
    QuoteCacheService,
    {
      provide: QUOTE_PROVIDERS,
      useFactory: (
        eastmoney: EastmoneyQuoteProvider,
        eastmoneyFund: EastmoneyFundQuoteProvider,
        sina: SinaQuoteProvider,
        tencent: TencentQuoteProvider,
        yahoo: YahooQuoteProvider,
      ) => [eastmoney, eastmoneyFund, sina, tencent, yahoo],
      inject: [
        EastmoneyQuoteProvider,
        EastmoneyFundQuoteProvider,
        SinaQuoteProvider,
        TencentQuoteProvider,
        YahooQuoteProvider,
      ],
    },
    {
      provide: QUOTE_PROVIDER_TABLE,
      useFactory: (
        eastmoney: EastmoneyQuoteProvider,
        eastmoneyFund: EastmoneyFundQuoteProvider,
        sina: SinaQuoteProvider,
        tencent: TencentQuoteProvider,
        yahoo: YahooQuoteProvider,
        rates: ExchangeRateService,
      ) => buildProviderTable({ eastmoney, eastmoneyFund, sina, tencent, yahoo }, rates),
      inject: [
        EastmoneyQuoteProvider,
        EastmoneyFundQuoteProvider,
        SinaQuoteProvider,
        TencentQuoteProvider,
        YahooQuoteProvider,
        ExchangeRateService,
      ],
    },
    ProviderRegistryService,
    QuoteFetcherService,
  ],
  exports: [
    QuoteFetcherService,
    ProviderRegistryService,
    CircuitBreakerService,
    QuoteCacheService,
    ExchangeRateService,
  ],
})
export class QuotesModule {}
