import { z } from 'zod';

// Eastmoney reports A-share prices in fen once they pass this level.
const FEN_THRESHOLD = 1000;
const FEN_PER_YUAN = 100;
// Eastmoney HK Connect f43 is price * 1000.
const HK_CONNECT_SCALE = 1000;

export const TROY_OUNCE_GRAMS = 31.1035;

const FUND_LSJZ_ROW = /<td[^>]*>\d{4}-\d{2}-\d{2}<\/td>\s*<td[^>]*>([\d.]+)<\/td>/;
const NET_WORTH_MARKER = 'var Data_netWorthTrend =';

const eastmoneyStockSchema = z.object({
  data: z.object({ f43: z.unknown() }).passthrough().nullable(),
});

const fundGzSchema = z
  .object({
    gsz: z.unknown().optional(),
    dwjz: z.unknown().optional(),
  })
  .passthrough();

const netWorthPointSchema = z.union([
  z.object({ y: z.unknown() }).passthrough(),
  z.array(z.unknown()).min(2),
]);

const yahooChartSchema = z.object({
  chart: z
    .object({
      result: z
        .array(
          z
            .object({
              meta: z.object({ regularMarketPrice: z.unknown().optional() }).passthrough().optional(),
              indicators: z
                .object({
                  quote: z
                    .array(z.object({ close: z.array(z.unknown()).optional() }).passthrough())
                    .optional(),
                })
                .passthrough()
                .optional(),
            })
            .passthrough(),
        )
        .nullable()
        .optional(),
    })
    .passthrough(),
});

const frankfurterRateSchema = z.object({ rates: z.record(z.unknown()) }).passthrough();

const openErApiRateSchema = z
  .object({
    result: z.string().optional(),
    rates: z.record(z.unknown()),
  })
  .passthrough();

/** Accepts finite positive numbers and numeric strings; everything else is `null`. */
export const parsePrice = (value: unknown): number | null => {
  let n: number;
  if (typeof value === 'number') {
    n = value;
  } else if (typeof value === 'string' && value.trim() !== '') {
    n = Number(value.trim());
  } else {
    return null;
  }
  return Number.isFinite(n) && n > 0 ? n : null;
};

const parseJson = (text: string): unknown => {
  try {
    return JSON.parse(text);
  } catch (error) {
    return undefined;
  }
};

export const normalizeEastmoneyStock = (body: string, scale: 'a_share' | 'hk_connect'): number | null => {
  const parsed = eastmoneyStockSchema.safeParse(parseJson(body));
  if (!parsed.success || !parsed.data.data) return null;
  const raw = parsePrice(parsed.data.data.f43);
  if (raw === null) return null;
  if (scale === 'hk_connect') return raw / HK_CONNECT_SCALE;
  return raw > FEN_THRESHOLD ? raw / FEN_PER_YUAN : raw;
};

/** `jsonpgz({...});` -> estimated NAV (`gsz`), falling back to the last published NAV (`dwjz`). */
export const normalizeFundGz = (body: string): number | null => {
  const start = body.indexOf('(');
  const end = body.lastIndexOf(')');
  if (start === -1 || end === -1 || end <= start) return null;
  const parsed = fundGzSchema.safeParse(parseJson(body.slice(start + 1, end)));
  if (!parsed.success) return null;
  return parsePrice(parsed.data.gsz ?? parsed.data.dwjz);
};

export const normalizePingzhongNetWorth = (body: string): number | null => {
  const idx = body.indexOf(NET_WORTH_MARKER);
  if (idx === -1) return null;
  const tail = body.slice(idx);
  const open = tail.indexOf('[');
  const close = tail.indexOf('];');
  if (open === -1 || close === -1 || close < open) return null;
  const points = parseJson(tail.slice(open, close + 1));
  if (!Array.isArray(points) || points.length === 0) return null;
  const last = netWorthPointSchema.safeParse(points[points.length - 1]);
  if (!last.success) return null;
  return Array.isArray(last.data) ? parsePrice(last.data[1]) : parsePrice(last.data.y);
};

export const normalizeFundLsjz = (body: string): number | null => {
  const match = FUND_LSJZ_ROW.exec(body);
  return match ? parsePrice(match[1]) : null;
};

export const normalizeYahooChart = (body: string): number | null => {
  const parsed = yahooChartSchema.safeParse(parseJson(body));
  if (!parsed.success) return null;
  const [result] = parsed.data.chart.result ?? [];
  if (!result) return null;

  const marketPrice = parsePrice(result.meta?.regularMarketPrice);
  if (marketPrice !== null) return marketPrice;

  const closes = result.indicators?.quote?.[0]?.close ?? [];
  for (let i = closes.length - 1; i >= 0; i -= 1) {
    const close = parsePrice(closes[i]);
    if (close !== null) return close;
  }
  return null;
};

/** `var hq_str_sh600000="name,open,prev,last,...";` -> the requested comma field. */
export const normalizeSinaQuote = (body: string, field: number): number | null => {
  const start = body.indexOf('="');
  if (start === -1) return null;
  const fields = body.slice(start + 2).split(',');
  return fields.length > field ? parsePrice(fields[field]) : null;
};

/** `v_sh600000="1~name~600000~last~...";` -> the last price. */
export const normalizeTencentQuote = (body: string): number | null => {
  const fields = body.split('~');
  return fields.length > 3 ? parsePrice(fields[3]) : null;
};

/** `{"base":"USD","rates":{"CNY":7.1}}` -> the target rate. */
export const normalizeFrankfurterRate = (body: string, to: string): number | null => {
  const parsed = frankfurterRateSchema.safeParse(parseJson(body));
  return parsed.success ? parsePrice(parsed.data.rates[to]) : null;
};

/** `{"result":"success","rates":{...}}`; any other result string means no rate. */
export const normalizeOpenErApiRate = (body: string, to: string): number | null => {
  const parsed = openErApiRateSchema.safeParse(parseJson(body));
  if (!parsed.success) return null;
  const { result, rates } = parsed.data;
  if (result && result.toLowerCase() !== 'success') return null;
  return parsePrice(rates[to]);
};

export const pricePerGram = (pricePerOunce: number, rate: number): number =>
  Math.round((pricePerOunce / TROY_OUNCE_GRAMS) * rate * 100) / 100;
