import { Injectable, Logger } from '@nestjs/common';
import type { QuoteAttempt } from './interfaces';
import type { Currency, FetchOutcome, InstrumentClass, QuoteResult, TerminalClass } from './models';
import { classifyInstrument, isTerminalClass, resolveQuoteRoute } from './instrument-classifier';
import { isCurrency, normalizeCurrency, normalizeSymbol } from './symbol-mapper';
import { describeError } from './utils/http.util';
import { CircuitBreakerService } from './circuit-breaker.service';
import { ProviderRegistryService } from './provider-registry.service';
import { QuoteCacheService } from './quote-cache.service';

export const CASH_PRICE = 1;

/**
 * Resolves a current price for a symbol: cache first, then the class's
 * provider chain in order, skipping providers in cooldown. The first price
 * wins. Failures never throw; they come back as a null price with a
 * diagnostic listing every provider that was tried or skipped.
 */
@Injectable()
export class QuoteFetcherService {
  private readonly logger = new Logger(QuoteFetcherService.name);

  constructor(
    private readonly registry: ProviderRegistryService,
    private readonly cache: QuoteCacheService,
    private readonly breaker: CircuitBreakerService,
  ) {}

  async quote(symbol: string, currency: string, assetHint?: string | null): Promise<QuoteResult> {
    const code = normalizeSymbol(symbol);
    const ccy = normalizeCurrency(currency);

    if (!code) {
      return this.result(code, ccy, 'unknown', null, null, false, 'symbol is required');
    }
    if (!isCurrency(ccy)) {
      return this.result(code, ccy, 'unknown', null, null, false, `unsupported currency: ${currency}`);
    }

    const instrumentClass = classifyInstrument(code, ccy, assetHint);
    if (isTerminalClass(instrumentClass)) {
      return this.resolveTerminal(code, ccy, instrumentClass);
    }

    const route = resolveQuoteRoute(instrumentClass, assetHint);
    const key = { symbol: code, currency: ccy, instrumentClass, route };

    const cached = this.cache.get(key);
    if (cached) {
      return this.result(
        code,
        ccy,
        instrumentClass,
        cached.price,
        cached.source,
        true,
        `price fetched (cached, source: ${cached.source})`,
      );
    }

    this.logger.debug(
      JSON.stringify({ event: 'quote_fetch_started', symbol: code, currency: ccy, instrumentClass, route }),
    );

    const failures: string[] = [];
    for (const attempt of this.registry.providersFor(route)) {
      if (!this.breaker.isAvailable(attempt.name)) {
        failures.push(`${attempt.name}: cooling down`);
        continue;
      }

      const outcome = await this.runAttempt(attempt, code, ccy);
      if (outcome.ok) {
        this.breaker.recordSuccess(attempt.name);
        this.cache.put(key, outcome.price, attempt.name);
        return this.result(
          code,
          ccy,
          instrumentClass,
          outcome.price,
          attempt.name,
          false,
          `price fetched (source: ${attempt.name})`,
        );
      }

      this.breaker.recordFailure(attempt.name);
      failures.push(`${attempt.name}: ${outcome.reason}`);
    }

    if (!failures.length) {
      failures.push('no data source available');
    }
    const message = `price fetch failed: ${failures.join('; ')}`;
    this.logger.warn(JSON.stringify({ event: 'quote_fetch_exhausted', symbol: code, currency: ccy, message }));
    return this.result(code, ccy, instrumentClass, null, null, false, message);
  }

  private async runAttempt(attempt: QuoteAttempt, symbol: string, currency: Currency): Promise<FetchOutcome> {
    let outcome: FetchOutcome;
    try {
      outcome = await attempt.fetch(symbol, currency);
    } catch (error) {
      return { ok: false, reason: describeError(error) };
    }
    if (outcome.ok && !(Number.isFinite(outcome.price) && outcome.price > 0)) {
      return { ok: false, reason: `invalid price ${outcome.price}` };
    }
    return outcome;
  }

  private resolveTerminal(symbol: string, currency: Currency, instrumentClass: TerminalClass): QuoteResult {
    switch (instrumentClass) {
      case 'cash':
        return this.result(symbol, currency, instrumentClass, CASH_PRICE, null, false, 'cash price is fixed at 1.0');
      case 'bond':
        return this.result(
          symbol,
          currency,
          instrumentClass,
          null,
          null,
          false,
          'bond prices are not fetched automatically',
        );
      case 'unknown':
        return this.result(symbol, currency, instrumentClass, null, null, false, `unrecognized symbol: ${symbol}`);
    }
  }

  private result(
    symbol: string,
    currency: string,
    instrumentClass: InstrumentClass,
    price: number | null,
    source: string | null,
    cached: boolean,
    message: string,
  ): QuoteResult {
    return { symbol, currency, instrumentClass, price, source, cached, message };
  }
}
