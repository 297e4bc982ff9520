import { CURRENCIES } from './models';
import type { Currency } from './models';

const SIX_DIGIT = /^\d{6}$/;

export const normalizeSymbol = (symbol: string): string => symbol.trim().toUpperCase();

export const normalizeCurrency = (currency: string): string => currency.trim().toUpperCase();

export const normalizeAssetType = (assetType?: string | null): string => {
  const value = (assetType ?? '').trim().toLowerCase();
  return value || 'stock';
};

export const isCurrency = (value: string): value is Currency =>
  CURRENCIES.some((currency) => currency === value);

export const isSixDigitCode = (code: string): boolean => SIX_DIGIT.test(code);

/**
 * Splits an SH/SZ-prefixed code into its exchange and bare code. Bare codes
 * starting with 6 are Shanghai listings; everything else defaults to Shenzhen.
 */
export const splitExchangePrefix = (symbol: string): { exchange: 'sh' | 'sz'; code: string } => {
  const code = normalizeSymbol(symbol);
  if (code.startsWith('SH')) return { exchange: 'sh', code: code.slice(2) };
  if (code.startsWith('SZ')) return { exchange: 'sz', code: code.slice(2) };
  return { exchange: code.startsWith('6') ? 'sh' : 'sz', code };
};

export const padHkCode = (code: string, width = 5): string => {
  const normalized = normalizeSymbol(code);
  return normalized.length < width ? normalized.padStart(width, '0') : normalized;
};

// "H00700" -> "00700"
export const hkConnectToHkCode = (symbol: string): string => {
  const normalized = normalizeSymbol(symbol);
  return normalized.length > 1 && normalized.startsWith('H') ? normalized.slice(1) : normalized;
};

export const toYahooSymbol = (symbol: string, currency: string): string => {
  let code = normalizeSymbol(symbol);
  const ccy = normalizeCurrency(currency);

  if (ccy === 'CNY') {
    if (code.startsWith('SH') || code.startsWith('SZ')) {
      code = code.slice(2);
    }
    if (code.startsWith('6')) return `${code}.SS`;
    if (isSixDigitCode(code)) return `${code}.SZ`;
  }

  if (ccy === 'HKD') {
    if (code.startsWith('HK')) code = code.slice(2);
    // Yahoo wants four digits: 00700 -> 0700.HK
    const trimmed = code.replace(/^0+(?=\d{4})/, '');
    return `${trimmed.padStart(4, '0')}.HK`;
  }

  return code;
};
