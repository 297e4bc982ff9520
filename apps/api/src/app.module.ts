import { Module } from '@nestjs/common';
import { ScheduleModule } from '@nestjs/schedule';
import { CoreModule } from '@libs/core';
import { PricesModule } from '@libs/prices';
import { QuotesModule } from '@libs/quotes';
import { ExchangeRatesController } from './exchange-rates.controller';
import { HealthController } from './health.controller';
import { PricesController } from './prices.controller';
import { PriceSweepCron } from './price-sweep.cron';
import { QuotesController } from './quotes.controller';

@Module({
  imports: [CoreModule, ScheduleModule.forRoot(), QuotesModule, PricesModule],
  controllers: [HealthController, QuotesController, PricesController, ExchangeRatesController],
  providers: [PriceSweepCron],
})
export class AppModule {}
