export const CURRENCIES = ['CNY', 'USD', 'HKD'] as const;

export type Currency = (typeof CURRENCIES)[number];

export type InstrumentClass =
  | 'a_share'
  | 'fund'
  | 'hk_connect'
  | 'hk_stock'
  | 'metal'
  | 'cash'
  | 'us_stock'
  | 'bond'
  | 'unknown';

// Classes that resolve without any upstream call.
export type TerminalClass = Extract<InstrumentClass, 'cash' | 'bond' | 'unknown'>;

export type QuoteRoute =
  | 'a_share'
  | 'a_share_fund_first'
  | 'fund'
  | 'hk_connect'
  | 'hk_stock'
  | 'us_stock'
  | 'metal';

export interface QuoteKey {
  symbol: string;
  currency: Currency;
  instrumentClass: InstrumentClass;
  /** Chain the price came from; an A-share quoted fund-first caches apart from the stock quote. */
  route?: QuoteRoute;
}

export interface CacheEntry {
  readonly price: number;
  readonly source: string;
  readonly fetchedAt: number;
}

export interface ProviderState {
  failCount: number;
  windowStart: number;
  cooldownUntil: number;
}

export type FetchOutcome = { ok: true; price: number } | { ok: false; reason: string };

export interface QuoteResult {
  symbol: string;
  currency: string;
  instrumentClass: InstrumentClass;
  price: number | null;
  source: string | null;
  cached: boolean;
  message: string;
}

export interface ProviderStateSnapshot extends ProviderState {
  provider: string;
  available: boolean;
}

export interface ProviderSnapshot {
  provider: string;
  requests: number;
  failures: number;
  lastSuccessTs: number | null;
  lastError: string | null;
}

// Currencies with a maintained rate to CNY.
export const FOREIGN_CURRENCIES = ['USD', 'HKD'] as const;

export type ForeignCurrency = (typeof FOREIGN_CURRENCIES)[number];

export type ExchangeRateOrigin = 'default' | 'manual' | 'auto_fetch';

export interface ExchangeRateSetting {
  fromCurrency: ForeignCurrency;
  toCurrency: 'CNY';
  rate: number;
  source: ExchangeRateOrigin;
  updatedAt: Date | null;
}

export interface ExchangeRateRefreshResult {
  updated: number;
  errors: string[];
}

export class InvalidExchangeRateError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidExchangeRateError';
  }
}
