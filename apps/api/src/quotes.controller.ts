import { Controller, Get, Param, Query } from '@nestjs/common';
import { QuoteFetcherService } from '@libs/quotes';
import type { QuoteResult } from '@libs/quotes';
import { parseRequest, quoteQuerySchema } from './request.schemas';

@Controller('api/quotes')
export class QuotesController {
  constructor(private readonly quoteFetcher: QuoteFetcherService) {}

  @Get(':symbol')
  async quote(@Param('symbol') symbol: string, @Query() query: unknown): Promise<QuoteResult> {
    const { currency, assetType } = parseRequest(quoteQuerySchema, query);
    return this.quoteFetcher.quote(symbol, currency, assetType);
  }
}
