import type { Currency, FetchOutcome, QuoteRoute } from './models';

/** One named upstream call in a provider chain. The name is the circuit-breaker key. */
export interface QuoteAttempt {
  readonly name: string;
  fetch(symbol: string, currency: Currency): Promise<FetchOutcome>;
}

export type ProviderTable = Readonly<Record<QuoteRoute, readonly QuoteAttempt[]>>;
