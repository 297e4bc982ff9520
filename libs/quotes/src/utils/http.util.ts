import axios from 'axios';
import type { AxiosAdapter, AxiosInstance } from 'axios';

// Bodies above 1 MiB are rejected by axios before parsing.
export const MAX_RESPONSE_BYTES = 1 << 20;

export const createHttpClient = (
  baseURL: string,
  timeoutMs: number,
  adapter?: AxiosAdapter,
): AxiosInstance =>
  axios.create({
    baseURL,
    timeout: timeoutMs,
    adapter,
    responseType: 'text',
    maxContentLength: MAX_RESPONSE_BYTES,
    // status codes are checked by BaseQuoteProvider
    validateStatus: () => true,
    headers: { 'User-Agent': 'Mozilla/5.0 (compatible; quote-orchestrator/1.0)' },
  });

export const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : 'Unknown error';
