import type { InstrumentClass, QuoteRoute, TerminalClass } from './models';
import { isSixDigitCode, normalizeAssetType, normalizeCurrency, normalizeSymbol } from './symbol-mapper';

// Shenzhen main board & SME, ChiNext, Shanghai main board, STAR market.
export const A_SHARE_PREFIXES = [
  '000', '001', '002', '003',
  '300', '301',
  '600', '601', '603', '605',
  '688', '689',
];

// Shanghai ETF/LOF (510, 513, 588, 501, 502), Shenzhen ETF/LOF (159, 160-166).
export const ETF_LOF_PREFIXES = [
  '510', '513', '588', '501', '502',
  '159', '160', '161', '162', '163', '164', '165', '166',
];

const HK_CONNECT = /^H\d{5}$/;
const HK_STOCK = /^0\d{4}$/;
const ALPHABETIC = /^[A-Z]+$/;

const hasAnyPrefix = (value: string, prefixes: string[]): boolean =>
  prefixes.some((prefix) => value.startsWith(prefix));

/**
 * Maps a symbol to the instrument class that decides its provider chain.
 * First matching rule wins: "GOLD" is alphabetic but resolves to metal, and
 * 6-digit CNY codes never reach the Hong Kong rule.
 */
export const classifyInstrument = (
  symbol: string,
  currency: string,
  assetHint?: string | null,
): InstrumentClass => {
  const code = normalizeSymbol(symbol);
  const ccy = normalizeCurrency(currency);
  const hint = normalizeAssetType(assetHint);

  if (code.startsWith('SH') || code.startsWith('SZ')) {
    return 'a_share';
  }

  if (ccy === 'CNY' && isSixDigitCode(code)) {
    if (hint === 'etf' || hint === 'fund') return 'fund';
    if (hasAnyPrefix(code, ETF_LOF_PREFIXES)) return 'fund';
    if (hasAnyPrefix(code, A_SHARE_PREFIXES)) return 'a_share';
    // unlisted 6-digit CNY codes are almost always OTC mutual funds
    return 'fund';
  }

  if (HK_CONNECT.test(code)) {
    return 'hk_connect';
  }

  if (ccy === 'HKD' || HK_STOCK.test(code)) {
    return 'hk_stock';
  }

  if (code.includes('AU') || code.includes('GOLD')) {
    return 'metal';
  }

  if (code === 'CASH') {
    return 'cash';
  }

  if (ccy === 'USD' || ALPHABETIC.test(code)) {
    return 'us_stock';
  }

  if (code.includes('BOND')) {
    return 'bond';
  }

  return 'unknown';
};

export const isTerminalClass = (instrumentClass: InstrumentClass): instrumentClass is TerminalClass =>
  instrumentClass === 'cash' || instrumentClass === 'bond' || instrumentClass === 'unknown';

/**
 * Picks the provider chain for a routable class. A-shares held as anything
 * other than a plain stock try the fund NAV source first.
 */
export const resolveQuoteRoute = (
  instrumentClass: Exclude<InstrumentClass, TerminalClass>,
  assetHint?: string | null,
): QuoteRoute => {
  if (instrumentClass === 'a_share' && normalizeAssetType(assetHint) !== 'stock') {
    return 'a_share_fund_first';
  }
  return instrumentClass;
};
