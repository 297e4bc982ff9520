import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { isCancel } from 'axios';
import type { AxiosAdapter, AxiosInstance, RawAxiosRequestHeaders } from 'axios';
import type { FetchOutcome, ProviderSnapshot } from '../models';
import { createHttpClient, describeError } from '../utils/http.util';
import { getQuoteTimeoutMs, getUpstreamEndpoint } from './providers.config';
import type { QuoteUpstream } from './providers.config';

export const QUOTE_HTTP_ADAPTER = Symbol('QUOTE_HTTP_ADAPTER');

export abstract class BaseQuoteProvider {
  readonly provider: string;
  protected readonly logger: Logger;
  protected readonly timeoutMs: number;
  private requests = 0;
  private failures = 0;
  private lastSuccessTs: number | null = null;
  private lastError: string | null = null;

  protected constructor(
    provider: string,
    protected readonly configService: ConfigService,
    private readonly httpAdapter?: AxiosAdapter,
  ) {
    this.provider = provider;
    this.logger = new Logger(`${provider}-provider`);
    this.timeoutMs = getQuoteTimeoutMs(configService);
  }

  getSnapshot(): ProviderSnapshot {
    return {
      provider: this.provider,
      requests: this.requests,
      failures: this.failures,
      lastSuccessTs: this.lastSuccessTs,
      lastError: this.lastError,
    };
  }

  protected createClient(upstream: QuoteUpstream): AxiosInstance {
    return createHttpClient(getUpstreamEndpoint(this.configService, upstream), this.timeoutMs, this.httpAdapter);
  }

  /**
   * GETs a body as text; any non-2xx status is an error. The axios `timeout`
   * only covers an idle socket, so the whole exchange is also bounded by an
   * abort signal.
   */
  protected async getText(
    client: AxiosInstance,
    url: string,
    options: { params?: Record<string, string | number>; headers?: RawAxiosRequestHeaders } = {},
  ): Promise<string> {
    const response = await client
      .get<unknown>(url, { ...options, signal: AbortSignal.timeout(this.timeoutMs) })
      .catch((error: unknown) => {
        if (isCancel(error)) {
          throw new Error(`timeout of ${this.timeoutMs}ms exceeded`);
        }
        throw error;
      });
    if (response.status < 200 || response.status >= 300) {
      throw new Error(`http status ${response.status}`);
    }
    const { data } = response;
    if (typeof data === 'string') return data;
    return data === undefined || data === null ? '' : JSON.stringify(data);
  }

  /**
   * Runs one upstream call and folds every failure (transport, status,
   * payload shape, missing value) into a failed outcome.
   */
  protected async attempt(
    operation: string,
    symbol: string,
    fetchPrice: () => Promise<number | null>,
  ): Promise<FetchOutcome> {
    this.requests += 1;
    try {
      const price = await fetchPrice();
      if (price === null) {
        return this.fail(operation, symbol, 'no data');
      }
      this.lastSuccessTs = Date.now();
      this.lastError = null;
      return { ok: true, price };
    } catch (error) {
      return this.fail(operation, symbol, describeError(error));
    }
  }

  protected reject(operation: string, symbol: string, reason: string): FetchOutcome {
    this.requests += 1;
    return this.fail(operation, symbol, reason);
  }

  private fail(operation: string, symbol: string, reason: string): FetchOutcome {
    this.failures += 1;
    this.lastError = reason;
    this.logger.warn(
      JSON.stringify({
        event: `${operation}_failed`,
        provider: this.provider,
        symbol,
        message: reason,
      }),
    );
    return { ok: false, reason };
  }
}
