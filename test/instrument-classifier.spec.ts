import { describe, expect, it } from 'vitest';
import { classifyInstrument, isTerminalClass, resolveQuoteRoute } from '@libs/quotes';
import type { InstrumentClass } from '@libs/quotes';

const ALL_CLASSES: InstrumentClass[] = [
  'a_share',
  'fund',
  'hk_connect',
  'hk_stock',
  'metal',
  'cash',
  'us_stock',
  'bond',
  'unknown',
];

describe('instrument classifier', () => {
  it('treats exchange-prefixed codes as A-shares regardless of currency', () => {
    expect(classifyInstrument('SH600519', 'CNY')).toBe('a_share');
    expect(classifyInstrument(' sz000001 ', 'cny')).toBe('a_share');
    expect(classifyInstrument('SH510300', 'USD', 'fund')).toBe('a_share');
  });

  it('splits six-digit CNY codes into funds and A-shares', () => {
    expect(classifyInstrument('600519', 'CNY')).toBe('a_share');
    expect(classifyInstrument('300750', 'CNY')).toBe('a_share');
    expect(classifyInstrument('510300', 'CNY')).toBe('fund');
    expect(classifyInstrument('159915', 'CNY')).toBe('fund');
    expect(classifyInstrument('110022', 'CNY')).toBe('fund');
  });

  it('lets an etf or fund hint override the A-share prefix', () => {
    expect(classifyInstrument('600519', 'CNY', 'ETF')).toBe('fund');
    expect(classifyInstrument('000001', 'CNY', ' fund ')).toBe('fund');
    expect(classifyInstrument('000001', 'CNY', 'stock')).toBe('a_share');
  });

  it('recognizes Stock Connect and Hong Kong codes', () => {
    expect(classifyInstrument('H00700', 'CNY')).toBe('hk_connect');
    expect(classifyInstrument('00700', 'HKD')).toBe('hk_stock');
    expect(classifyInstrument('00700', 'USD')).toBe('hk_stock');
    expect(classifyInstrument('600519', 'HKD')).toBe('hk_stock');
  });

  it('checks metals before the alphabetic US rule', () => {
    expect(classifyInstrument('GOLD', 'USD')).toBe('metal');
    expect(classifyInstrument('AU9999', 'CNY')).toBe('metal');
  });

  it('checks cash before the US rule', () => {
    expect(classifyInstrument('CASH', 'USD')).toBe('cash');
    expect(classifyInstrument('cash', 'CNY')).toBe('cash');
  });

  it('classifies US tickers by currency or by letters only', () => {
    expect(classifyInstrument('AAPL', 'USD')).toBe('us_stock');
    expect(classifyInstrument('MSFT', 'CNY')).toBe('us_stock');
    expect(classifyInstrument('BRK.B', 'USD')).toBe('us_stock');
  });

  it('only reaches the bond rule for non-alphabetic symbols', () => {
    expect(classifyInstrument('BOND2030', 'CNY')).toBe('bond');
    expect(classifyInstrument('BOND', 'CNY')).toBe('us_stock');
  });

  it('falls back to unknown', () => {
    expect(classifyInstrument('12345', 'CNY')).toBe('unknown');
    expect(classifyInstrument('', 'CNY')).toBe('unknown');
    expect(classifyInstrument('X-1', 'HKX')).toBe('unknown');
  });

  it('is total over arbitrary input', () => {
    const inputs = ['', ' ', '0', 'H1', '1234567', 'sh', '$$$', 'GOLD2', 'h00700', '00700x', 'été'];
    const currencies = ['', 'CNY', 'USD', 'HKD', 'EUR', 'cny'];
    for (const symbol of inputs) {
      for (const currency of currencies) {
        for (const hint of [undefined, null, '', 'etf', 'fund', 'stock']) {
          expect(ALL_CLASSES).toContain(classifyInstrument(symbol, currency, hint));
        }
      }
    }
  });

  it('is deterministic', () => {
    expect(classifyInstrument('600519', 'CNY')).toBe(classifyInstrument('600519', 'CNY'));
  });

  it('flags terminal classes', () => {
    expect(ALL_CLASSES.filter(isTerminalClass)).toEqual(['cash', 'bond', 'unknown']);
  });
});

describe('quote route resolution', () => {
  it('tries the fund source first for A-shares held as funds', () => {
    expect(resolveQuoteRoute('a_share')).toBe('a_share');
    expect(resolveQuoteRoute('a_share', 'stock')).toBe('a_share');
    expect(resolveQuoteRoute('a_share', 'etf')).toBe('a_share_fund_first');
    expect(resolveQuoteRoute('a_share', 'fund')).toBe('a_share_fund_first');
  });

  it('keeps the class for every other route', () => {
    expect(resolveQuoteRoute('fund', 'etf')).toBe('fund');
    expect(resolveQuoteRoute('metal')).toBe('metal');
    expect(resolveQuoteRoute('hk_connect', 'fund')).toBe('hk_connect');
  });
});
