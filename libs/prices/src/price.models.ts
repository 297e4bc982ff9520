import type { Currency } from '@libs/quotes';

export const PRICE_OPERATIONS = ['PRICE_UPDATE', 'PRICE_UPDATE_FAILED', 'MANUAL_PRICE_UPDATE'] as const;
export type PriceOperation = (typeof PRICE_OPERATIONS)[number];

export interface TrackedSymbol {
  symbol: string;
  currency: Currency;
  assetType: string;
  autoUpdate: boolean;
  priceUpdatedAt: Date | null;
}

export interface LatestPrice {
  symbol: string;
  currency: Currency;
  price: number;
  updatedAt: Date;
}

export interface OperationLogEntry {
  id: number;
  operation: PriceOperation;
  symbol: string;
  currency: Currency;
  details: string;
  priceFetched: number | null;
  createdAt: Date;
}

export interface UpdateAllResult {
  updated: number;
  errors: string[];
}

export class UnsupportedCurrencyError extends Error {
  constructor(readonly currency: string) {
    super(`unsupported currency: ${currency}`);
    this.name = 'UnsupportedCurrencyError';
  }
}

export class InvalidPriceError extends Error {
  constructor(readonly price: number) {
    super(`price must be a positive number, got ${price}`);
    this.name = 'InvalidPriceError';
  }
}
