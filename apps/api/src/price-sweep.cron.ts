import { Injectable, Logger, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { SchedulerRegistry } from '@nestjs/schedule';
import { PriceUpdateService } from '@libs/prices';
import { describeError } from '@libs/quotes';

export const PRICE_SWEEP_INTERVAL_NAME = 'price-sweep';

@Injectable()
export class PriceSweepCron implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(PriceSweepCron.name);
  private running = false;

  constructor(
    private readonly configService: ConfigService,
    private readonly priceUpdateService: PriceUpdateService,
    private readonly schedulerRegistry: SchedulerRegistry,
  ) {}

  onModuleInit(): void {
    if (!this.configService.get<boolean>('PRICE_SWEEP_ENABLED', false)) {
      return;
    }
    const intervalSeconds = this.configService.get<number>('PRICE_SWEEP_INTERVAL_SECONDS', 300);
    if (intervalSeconds <= 0) {
      this.logger.warn('PRICE_SWEEP_INTERVAL_SECONDS must be greater than zero.');
      return;
    }

    this.logger.log(`Price sweep enabled (every ${intervalSeconds}s).`);
    const timer = setInterval(() => {
      void this.runOnce();
    }, intervalSeconds * 1000);
    this.schedulerRegistry.addInterval(PRICE_SWEEP_INTERVAL_NAME, timer);
  }

  onModuleDestroy(): void {
    if (this.schedulerRegistry.doesExist('interval', PRICE_SWEEP_INTERVAL_NAME)) {
      this.schedulerRegistry.deleteInterval(PRICE_SWEEP_INTERVAL_NAME);
    }
  }

  /** One pass over every configured currency; overlapping ticks are dropped. */
  async runOnce(): Promise<void> {
    if (this.running) {
      return;
    }
    this.running = true;
    try {
      for (const currency of this.currencies()) {
        try {
          const { updated, errors } = await this.priceUpdateService.updateAllPrices(currency);
          if (errors.length) {
            this.logger.warn(
              JSON.stringify({ event: 'price_sweep_partial', currency, updated, message: errors.join('; ') }),
            );
          }
        } catch (error) {
          this.logger.warn(
            JSON.stringify({ event: 'price_sweep_failed', currency, message: describeError(error) }),
          );
        }
      }
    } finally {
      this.running = false;
    }
  }

  private currencies(): string[] {
    const value = this.configService.get<string[] | string>('PRICE_SWEEP_CURRENCIES', ['CNY', 'USD', 'HKD']);
    if (Array.isArray(value)) {
      return value.map((x) => x.trim()).filter(Boolean);
    }
    return value.split(',').map((x) => x.trim()).filter(Boolean);
  }
}
