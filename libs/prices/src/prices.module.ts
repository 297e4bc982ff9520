import { Module } from '@nestjs/common';
import { QuotesModule } from '@libs/quotes';
import { InMemoryPriceRepository, PRICE_REPOSITORY } from './price.repository';
import { PriceUpdateService } from './price-update.service';

@Module({
  imports: [QuotesModule],
  providers: [
    InMemoryPriceRepository,
    { provide: PRICE_REPOSITORY, useExisting: InMemoryPriceRepository },
    PriceUpdateService,
  ],
  exports: [PriceUpdateService, PRICE_REPOSITORY],
})
export class PricesModule {}
