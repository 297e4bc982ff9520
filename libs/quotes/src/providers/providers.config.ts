import { ConfigService } from '@nestjs/config';

export type QuoteUpstream =
  | 'eastmoney'
  | 'eastmoney_fund_gz'
  | 'eastmoney_fund'
  | 'sina'
  | 'tencent'
  | 'yahoo'
  | 'frankfurter'
  | 'open_er_api';

const DEFAULT_ENDPOINTS: Record<QuoteUpstream, string> = {
  eastmoney: 'http://push2.eastmoney.com',
  eastmoney_fund_gz: 'http://fundgz.1234567.com.cn',
  eastmoney_fund: 'http://fund.eastmoney.com',
  sina: 'http://hq.sinajs.cn',
  tencent: 'http://qt.gtimg.cn',
  yahoo: 'https://query1.finance.yahoo.com',
  frankfurter: 'https://api.frankfurter.app',
  open_er_api: 'https://open.er-api.com',
};

/** Base URL for an upstream; `<UPSTREAM>_REST_URL` overrides the default. */
export const getUpstreamEndpoint = (configService: ConfigService, upstream: QuoteUpstream): string => {
  const override = configService.get<string>(`${upstream.toUpperCase()}_REST_URL`);
  return override?.trim() || DEFAULT_ENDPOINTS[upstream];
};

export const getQuoteTimeoutMs = (configService: ConfigService): number =>
  configService.get<number>('QUOTE_HTTP_TIMEOUT_MS', 10_000);
