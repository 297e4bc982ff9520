import { BadRequestException } from '@nestjs/common';
import { z } from 'zod';

const symbolField = z.string().trim().min(1).max(32);
const currencyField = z.string().trim().min(1).max(8);
const assetTypeField = z.string().trim().max(32).optional();

export const quoteQuerySchema = z.object({
  currency: currencyField,
  assetType: assetTypeField,
});

export const updatePriceSchema = z.object({
  symbol: symbolField,
  currency: currencyField,
  assetType: assetTypeField,
});

export const manualPriceSchema = z.object({
  symbol: symbolField,
  currency: currencyField,
  price: z.number().finite().positive(),
});

export const updateAllSchema = z.object({
  currency: currencyField,
});

export const trackSymbolSchema = z.object({
  symbol: symbolField,
  currency: currencyField,
  assetType: assetTypeField,
  autoUpdate: z.boolean().optional(),
});

export const logsQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(500).default(50),
});

// `?currency=` with no value lists every currency.
export const listSymbolsQuerySchema = z.object({
  currency: z.preprocess((value) => (value === '' ? undefined : value), currencyField.optional()),
});

export const exchangeRateSchema = z.object({
  currency: currencyField,
  rate: z.number().finite().positive(),
});

export const parseRequest = <T extends z.ZodTypeAny>(schema: T, input: unknown): z.infer<T> => {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    const message = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || 'body'}: ${issue.message}`)
      .join('; ');
    throw new BadRequestException(message);
  }
  return parsed.data;
};
