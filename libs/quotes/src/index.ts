export * from './models';
export * from './interfaces';
export * from './symbol-mapper';
export * from './instrument-classifier';
export * from './normalizers';
export * from './utils/http.util';
export * from './exchange-rate.service';
export * from './circuit-breaker.service';
export * from './quote-cache.service';
export * from './provider-registry.service';
export * from './quote-fetcher.service';
export * from './providers/providers.config';
export * from './providers/base-quote.provider';
export * from './providers/eastmoney.provider';
export * from './providers/exchange-rate.providers';
export * from './providers/eastmoney-fund.provider';
export * from './providers/sina.provider';
export * from './providers/tencent.provider';
export * from './providers/yahoo.provider';
export * from './quotes.module';
