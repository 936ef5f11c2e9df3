/**
 * lightFetcher.ts: Browser-grade HTTP transport for the quiz endpoints.
 *
 * The quiz flow is plain server-rendered HTML behind form POSTs, so no browser
 * is needed: got-scraping sends a realistic Chrome header set and TLS
 * handshake, and we read the raw body bytes back.
 *
 * This layer does exactly one attempt.  Status handling, retries, throttling
 * and caching all belong to the Fetcher that wraps it, so got's own retry is
 * disabled and HTTP errors come back as ordinary responses.
 */

import { Logger } from '../core/logger';
import type { HttpMethod } from '../core/types';

const logger = new Logger('LightFetcher');

// Loaded on first use: header-generator data is heavy and tests never need it.
let gotScrapingModule: typeof import('got-scraping') | null = null;

async function getGotScraping(): Promise<typeof import('got-scraping')> {
  if (!gotScrapingModule) {
    gotScrapingModule = await import('got-scraping');
  }
  return gotScrapingModule;
}

export interface TransportRequest {
  /** Absolute URL including any query string. */
  url: string;
  method: HttpMethod;
  headers: Record<string, string>;
  body?: string;
  timeoutMs: number;
}

export interface TransportResponse {
  statusCode: number;
  body: Buffer;
  headers: Record<string, string | string[] | undefined>;
}

/**
 * One network attempt.  Resolves for every HTTP status; rejects only when no
 * response arrived (timeout, connection refused, reset).
 */
export type HttpTransport = (request: TransportRequest) => Promise<TransportResponse>;

/** Default transport backed by got-scraping. */
export const lightFetch: HttpTransport = async (request) => {
  logger.debug(`${request.method} ${request.url}`);

  const { gotScraping } = await getGotScraping();

  const response = await gotScraping({
    url: request.url,
    method: request.method,
    headers: request.headers,
    body: request.body,
    responseType: 'buffer',
    throwHttpErrors: false,
    retry: { limit: 0 },
    timeout: { request: request.timeoutMs },
  });

  logger.debug(`HTTP ${response.statusCode} for ${request.url}`);

  return {
    statusCode: response.statusCode,
    body: response.body,
    headers: { ...response.headers },
  };
};
