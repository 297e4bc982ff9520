import { Inject, Injectable, Logger, Optional } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { FOREIGN_CURRENCIES, InvalidExchangeRateError } from './models';
import type {
  Currency,
  ExchangeRateOrigin,
  ExchangeRateRefreshResult,
  ExchangeRateSetting,
  ForeignCurrency,
} from './models';
import { EXCHANGE_RATE_SOURCES } from './providers/exchange-rate.providers';
import type { ExchangeRateSource } from './providers/exchange-rate.providers';
import { normalizeCurrency } from './symbol-mapper';

export const DEFAULT_USD_CNY_RATE = 7.2;
export const DEFAULT_HKD_CNY_RATE = 0.92;

const isForeignCurrency = (value: string): value is ForeignCurrency =>
  FOREIGN_CURRENCIES.some((currency) => currency === value);

/**
 * CNY conversion rates for quotes that upstreams only publish in USD or HKD.
 * Rates start from config and can be set by hand or refreshed from the
 * configured sources; a pair whose sources all fail keeps its current rate.
 */
@Injectable()
export class ExchangeRateService {
  private readonly logger = new Logger(ExchangeRateService.name);
  private readonly settings = new Map<ForeignCurrency, ExchangeRateSetting>();

  constructor(
    configService: ConfigService,
    @Optional() @Inject(EXCHANGE_RATE_SOURCES) private readonly sources: ExchangeRateSource[] = [],
  ) {
    this.store('USD', this.positiveOr(configService.get<number>('FX_USD_CNY'), DEFAULT_USD_CNY_RATE), 'default', null);
    this.store('HKD', this.positiveOr(configService.get<number>('FX_HKD_CNY'), DEFAULT_HKD_CNY_RATE), 'default', null);
  }

  toCny(from: Currency): number {
    if (from === 'CNY') {
      return 1;
    }
    return this.setting(from).rate;
  }

  getRates(): ExchangeRateSetting[] {
    return FOREIGN_CURRENCIES.map((currency) => ({ ...this.setting(currency) }));
  }

  setRate(currency: string, rate: number): ExchangeRateSetting {
    const from = normalizeCurrency(currency);
    if (!isForeignCurrency(from)) {
      throw new InvalidExchangeRateError(`invalid from_currency: ${currency}`);
    }
    if (!Number.isFinite(rate) || rate <= 0) {
      throw new InvalidExchangeRateError('rate must be greater than 0');
    }
    return { ...this.store(from, rate, 'manual', new Date()) };
  }

  /** Fetches every maintained pair, trying sources in order until one answers. */
  async refresh(): Promise<ExchangeRateRefreshResult> {
    let updated = 0;
    const errors: string[] = [];

    for (const from of FOREIGN_CURRENCIES) {
      const failures: string[] = [];
      let fetched: number | null = null;
      for (const source of this.sources) {
        const outcome = await source.fetchRate(from);
        if (outcome.ok) {
          fetched = outcome.price;
          break;
        }
        failures.push(`${source.provider}: ${outcome.reason}`);
      }

      if (fetched === null) {
        const reason = failures.length ? failures.join('; ') : 'no source configured';
        const message = `${from}/CNY: all providers failed (${reason})`;
        errors.push(message);
        this.logger.warn(JSON.stringify({ event: 'exchange_rate_refresh_failed', currency: from, message }));
        continue;
      }

      this.store(from, fetched, 'auto_fetch', new Date());
      updated += 1;
      this.logger.log(JSON.stringify({ event: 'exchange_rate_refreshed', currency: from, rate: fetched }));
    }

    return { updated, errors };
  }

  private setting(currency: ForeignCurrency): ExchangeRateSetting {
    const current = this.settings.get(currency);
    if (!current) {
      throw new InvalidExchangeRateError(`exchange rate not found for ${currency}/CNY`);
    }
    return current;
  }

  private store(
    fromCurrency: ForeignCurrency,
    rate: number,
    source: ExchangeRateOrigin,
    updatedAt: Date | null,
  ): ExchangeRateSetting {
    const setting: ExchangeRateSetting = { fromCurrency, toCurrency: 'CNY', rate, source, updatedAt };
    this.settings.set(fromCurrency, setting);
    return setting;
  }

  private positiveOr(value: unknown, fallback: number): number {
    const n = Number(value);
    return Number.isFinite(n) && n > 0 ? n : fallback;
  }
}
