import { Body, Controller, Get, Post, Put } from '@nestjs/common';
import { ExchangeRateService } from '@libs/quotes';
import type { ExchangeRateRefreshResult, ExchangeRateSetting } from '@libs/quotes';
import { rethrowAsHttp } from './http-errors';
import { exchangeRateSchema, parseRequest } from './request.schemas';

@Controller('api/exchange-rates')
export class ExchangeRatesController {
  constructor(private readonly exchangeRates: ExchangeRateService) {}

  @Get()
  list(): ExchangeRateSetting[] {
    return this.exchangeRates.getRates();
  }

  @Put()
  set(@Body() body: unknown): ExchangeRateSetting {
    const { currency, rate } = parseRequest(exchangeRateSchema, body);
    try {
      return this.exchangeRates.setRate(currency, rate);
    } catch (error) {
      return rethrowAsHttp(error);
    }
  }

  @Post('refresh')
  refresh(): Promise<ExchangeRateRefreshResult> {
    return this.exchangeRates.refresh();
  }
}
