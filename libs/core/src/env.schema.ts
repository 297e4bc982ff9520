import { z } from "zod";

const toInt = (def?: number) =>
  z.preprocess((v) => {
    if (v === undefined || v === null || v === "") return def;
    const n = typeof v === "number" ? v : Number(String(v).trim());
    return Number.isFinite(n) ? n : v;
  }, z.number().int());

const toFloat = (def?: number) =>
  z.preprocess((v) => {
    if (v === undefined || v === null || v === "") return def;
    const n = typeof v === "number" ? v : Number(String(v).trim());
    return Number.isFinite(n) ? n : v;
  }, z.number());

const toBool = (def?: boolean) =>
  z.preprocess((v) => {
    if (v === undefined || v === null || v === "") return def;
    if (typeof v === "boolean") return v;
    const s = String(v).trim().toLowerCase();
    if (["true", "1", "yes", "y", "on"].includes(s)) return true;
    if (["false", "0", "no", "n", "off"].includes(s)) return false;
    return v;
  }, z.boolean());

const csv = (def: string[] = []) =>
  z.preprocess((v) => {
    if (v === undefined || v === null) return def;
    if (Array.isArray(v)) return v.map(String);
    const s = String(v).trim();
    if (!s) return def;
    return s.split(",").map((x) => x.trim()).filter(Boolean);
  }, z.array(z.string()));

const optionalUrl = z.preprocess(
  (v) => (typeof v === "string" && v.trim() === "" ? undefined : v),
  z.string().trim().url().optional(),
);

const envObject = z
  .object({
    NODE_ENV: z.enum(["development", "test", "production"]).default("production"),
    APP_NAME: z.string().trim().default("invest-quotes"),
    LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace"]).default("info"),

    PORT: toInt(3000).pipe(z.number().int().min(1).max(65535)),

    QUOTE_CACHE_TTL_SECONDS: toInt(30).pipe(z.number().int().min(1).max(3600)),
    QUOTE_CACHE_SWEEP_SECONDS: toInt(300).pipe(z.number().int().min(0).max(86400)),
    QUOTE_FAIL_THRESHOLD: toInt(3).pipe(z.number().int().min(1).max(100)),
    QUOTE_FAIL_WINDOW_SECONDS: toInt(60).pipe(z.number().int().min(1).max(3600)),
    QUOTE_COOLDOWN_SECONDS: toInt(120).pipe(z.number().int().min(1).max(86400)),
    QUOTE_HTTP_TIMEOUT_MS: toInt(10000).pipe(z.number().int().min(500).max(120_000)),

    FX_USD_CNY: toFloat(7.2).pipe(z.number().positive()),
    FX_HKD_CNY: toFloat(0.92).pipe(z.number().positive()),

    EASTMONEY_REST_URL: optionalUrl,
    EASTMONEY_FUND_GZ_REST_URL: optionalUrl,
    EASTMONEY_FUND_REST_URL: optionalUrl,
    SINA_REST_URL: optionalUrl,
    TENCENT_REST_URL: optionalUrl,
    YAHOO_REST_URL: optionalUrl,
    FRANKFURTER_REST_URL: optionalUrl,
    OPEN_ER_API_REST_URL: optionalUrl,

    PRICE_UPDATE_CONCURRENCY: toInt(4).pipe(z.number().int().min(1).max(32)),
    PRICE_RECENT_THRESHOLD_SECONDS: toInt(300).pipe(z.number().int().min(0).max(86400)),
    PRICE_SWEEP_ENABLED: toBool(false).default(false),
    PRICE_SWEEP_INTERVAL_SECONDS: toInt(300).pipe(z.number().int().min(10).max(86400)),
    PRICE_SWEEP_CURRENCIES: csv(["CNY", "USD", "HKD"]).default(["CNY", "USD", "HKD"]),
  })
  .passthrough();

export const envSchema = envObject;

export const envSchemaWithRefinements = envObject.superRefine((env, ctx) => {
  const unsupported = env.PRICE_SWEEP_CURRENCIES.filter(
    (currency) => !["CNY", "USD", "HKD"].includes(currency.toUpperCase()),
  );
  if (unsupported.length) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ["PRICE_SWEEP_CURRENCIES"],
      message: `Unsupported currencies: ${unsupported.join(", ")}`,
    });
  }
});

export type Env = z.infer<typeof envSchemaWithRefinements>;
