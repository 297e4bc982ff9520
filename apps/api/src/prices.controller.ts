import { BadRequestException, Body, Controller, Get, Post, Put, Query } from '@nestjs/common';
import { PriceUpdateService } from '@libs/prices';
import type { OperationLogEntry, TrackedSymbol, UpdateAllResult } from '@libs/prices';
import type { QuoteResult } from '@libs/quotes';
import { rethrowAsHttp } from './http-errors';
import {
  listSymbolsQuerySchema,
  logsQuerySchema,
  manualPriceSchema,
  parseRequest,
  trackSymbolSchema,
  updateAllSchema,
  updatePriceSchema,
} from './request.schemas';

@Controller('api')
export class PricesController {
  constructor(private readonly priceUpdateService: PriceUpdateService) {}

  @Post('prices/update')
  async updatePrice(@Body() body: unknown): Promise<QuoteResult> {
    const { symbol, currency, assetType } = parseRequest(updatePriceSchema, body);
    const result = await this.priceUpdateService
      .updatePrice(symbol, currency, assetType)
      .catch(rethrowAsHttp);
    if (result.price === null) {
      throw new BadRequestException(result.message);
    }
    return result;
  }

  @Post('prices/manual')
  async manualUpdate(@Body() body: unknown): Promise<{ status: 'updated' }> {
    const { symbol, currency, price } = parseRequest(manualPriceSchema, body);
    await this.priceUpdateService.manualUpdatePrice(symbol, currency, price).catch(rethrowAsHttp);
    return { status: 'updated' };
  }

  @Post('prices/update-all')
  async updateAll(@Body() body: unknown): Promise<UpdateAllResult> {
    const { currency } = parseRequest(updateAllSchema, body);
    return this.priceUpdateService.updateAllPrices(currency).catch(rethrowAsHttp);
  }

  @Get('prices/logs')
  async logs(@Query() query: unknown): Promise<OperationLogEntry[]> {
    const { limit } = parseRequest(logsQuerySchema, query);
    return this.priceUpdateService.listOperationLogs(limit);
  }

  @Put('symbols')
  async trackSymbol(@Body() body: unknown): Promise<TrackedSymbol> {
    const params = parseRequest(trackSymbolSchema, body);
    return this.priceUpdateService.trackSymbol(params).catch(rethrowAsHttp);
  }

  @Get('symbols')
  async listSymbols(@Query() query: unknown): Promise<TrackedSymbol[]> {
    const { currency } = parseRequest(listSymbolsQuerySchema, query);
    return this.priceUpdateService.listSymbols(currency).catch(rethrowAsHttp);
  }
}
