import { BadRequestException } from '@nestjs/common';
import { InvalidPriceError, UnsupportedCurrencyError } from '@libs/prices';
import { InvalidExchangeRateError } from '@libs/quotes';

/** Maps domain validation errors onto 400s; everything else propagates. */
export const rethrowAsHttp = (error: unknown): never => {
  if (
    error instanceof UnsupportedCurrencyError ||
    error instanceof InvalidPriceError ||
    error instanceof InvalidExchangeRateError
  ) {
    throw new BadRequestException(error.message);
  }
  throw error;
};
