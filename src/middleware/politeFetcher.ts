/**
 * politeFetcher.ts: Throttled, retrying, caching front door to the network.
 *
 * Every request the harvester makes goes through one Fetcher:
 *
 *   1. CACHE    → a hit returns immediately: no network, no throttle wait.
 *   2. THROTTLE → one Bottleneck limiter per Fetcher, so all calls share a
 *                 single clock (minTime = throttleMs, one call in flight).
 *   3. RETRY    → 429, 5xx and transport failures back off exponentially
 *                 (base, 2×base, 4×base…) up to maxRetries attempts in total.
 *   4. STORE    → successful bodies are written to the cache as raw bytes.
 *   5. DECODE   → JSON content types are parsed, everything else is text.
 */

import Bottleneck from 'bottleneck';
import { DecodeError, HttpStatusError, TransportError } from '../core/errors';
import { isFormPairs, requestFingerprint } from '../core/identity';
import { Logger } from '../core/logger';
import { sleep as realSleep, type SleepFn } from '../core/sleep';
import type {
  CrawlerConfig,
  DecodedBody,
  FetchRequest,
  JsonValue,
  RawFetchResult,
} from '../core/types';
import {
  lightFetch,
  type HttpTransport,
  type TransportRequest,
  type TransportResponse,
} from './lightFetcher';
import { ResponseCache } from './responseCache';

const logger = new Logger('Fetcher');

export interface FetcherOptions {
  cacheEnabled?: boolean;
  cacheDir?: string;
  /** Minimum spacing between the starts of two network calls. */
  throttleMs?: number;
  /** Total attempts per request, the first one included. */
  maxRetries?: number;
  /** Backoff before the second attempt; doubles after each failure. */
  baseDelayMs?: number;
  timeoutMs?: number;
  userAgent?: string;
  transport?: HttpTransport;
  sleep?: SleepFn;
}

export class Fetcher {
  private readonly cache: ResponseCache | null;
  private readonly limiter: Bottleneck;
  private readonly maxRetries: number;
  private readonly baseDelayMs: number;
  private readonly timeoutMs: number;
  private readonly userAgent?: string;
  private readonly transport: HttpTransport;
  private readonly sleep: SleepFn;

  constructor(options: FetcherOptions = {}) {
    const cacheEnabled = options.cacheEnabled ?? true;
    this.cache = cacheEnabled
      ? new ResponseCache(options.cacheDir ?? '.cache/http')
      : null;
    this.limiter = new Bottleneck({
      maxConcurrent: 1,
      minTime: Math.max(0, options.throttleMs ?? 1000),
    });
    this.maxRetries = Math.max(1, options.maxRetries ?? 5);
    this.baseDelayMs = Math.max(0, options.baseDelayMs ?? 1000);
    this.timeoutMs = options.timeoutMs ?? 20_000;
    this.userAgent = options.userAgent;
    this.transport = options.transport ?? lightFetch;
    this.sleep = options.sleep ?? realSleep;
  }

  static fromConfig(
    config: CrawlerConfig,
    overrides: Partial<FetcherOptions> = {},
  ): Fetcher {
    return new Fetcher({
      cacheEnabled: config.cacheEnabled,
      cacheDir: config.cacheDir,
      throttleMs: config.throttleMs,
      maxRetries: config.maxRetries,
      baseDelayMs: config.backoffBaseMs,
      timeoutMs: config.requestTimeoutMs,
      userAgent: config.botUserAgent,
      ...overrides,
    });
  }

  // ── Public API ─────────────────────────────────────────

  fetch(request: FetchRequest & { returnResponse: true }): Promise<RawFetchResult>;
  fetch(request: FetchRequest): Promise<DecodedBody>;
  async fetch(request: FetchRequest): Promise<DecodedBody | RawFetchResult> {
    const cache = request.noCache ? null : this.cache;
    const fingerprint = requestFingerprint(request);

    if (cache) {
      const cached = await cache.read(fingerprint);
      if (cached) {
        logger.debug(`Cache hit ${fingerprint} for ${request.url}`);
        const content = decodeCached(cached);
        return request.returnResponse
          ? { status: 200, content, requestBody: null }
          : content;
      }
    }

    const prepared = this.prepare(request);
    const response = await this.requestWithRetry(prepared);

    const content = decodeResponse(response, prepared.url);

    // Only bodies that decoded cleanly are worth replaying.
    if (cache) {
      await cache.write(fingerprint, response.body);
    }
    return request.returnResponse
      ? {
          status: response.statusCode,
          content,
          requestBody: prepared.body ?? null,
        }
      : content;
  }

  /** Drop the limiter's queue; call once the run is over. */
  async close(): Promise<void> {
    await this.limiter.disconnect();
  }

  // ── Internals ──────────────────────────────────────────

  private prepare(request: FetchRequest): TransportRequest {
    const url = new URL(request.url);
    for (const [key, value] of Object.entries(request.query ?? {})) {
      url.searchParams.append(key, String(value));
    }

    const headers: Record<string, string> = {};
    if (this.userAgent) headers['user-agent'] = this.userAgent;

    let body: string | undefined;
    if (request.form) {
      body = new URLSearchParams(
        isFormPairs(request.form)
          ? request.form.map(([name, value]): [string, string] => [name, value])
          : request.form,
      ).toString();
      headers['content-type'] = 'application/x-www-form-urlencoded';
    } else if (request.json) {
      body = JSON.stringify(request.json);
      headers['content-type'] = 'application/json';
    }

    return {
      url: url.toString(),
      method: request.method ?? (body === undefined ? 'GET' : 'POST'),
      headers: { ...headers, ...request.headers },
      body,
      timeoutMs: this.timeoutMs,
    };
  }

  /**
   * Attempt the request until it succeeds, fails fatally, or the attempt cap
   * is reached.  Every attempt queues on the shared limiter.
   */
  private async requestWithRetry(
    request: TransportRequest,
  ): Promise<TransportResponse> {
    let delay = this.baseDelayMs;

    for (let attempt = 1; ; attempt++) {
      const outcome = await this.attemptOnce(request);
      let failure: HttpStatusError | TransportError;

      if (outcome instanceof TransportError) {
        failure = outcome;
      } else if (outcome.statusCode >= 200 && outcome.statusCode < 300) {
        return outcome;
      } else {
        const statusError = new HttpStatusError(outcome.statusCode, request.url);
        failure = statusError;
        if (!statusError.retryable) {
          logger.error(`${statusError.message} — not retryable`);
          throw statusError;
        }
      }

      if (attempt >= this.maxRetries) {
        logger.error(
          `Giving up on ${request.method} ${request.url} after ${attempt} attempt(s): ${failure.message}`,
        );
        throw failure;
      }

      logger.warn(
        `${failure.message} — retrying in ${delay} ms (attempt ${attempt}/${this.maxRetries})`,
      );
      await this.sleep(delay);
      delay *= 2;
    }
  }

  private async attemptOnce(
    request: TransportRequest,
  ): Promise<TransportResponse | TransportError> {
    try {
      return await this.limiter.schedule(() => this.transport(request));
    } catch (err) {
      return new TransportError(request.url, err);
    }
  }
}

// ─── Decoding ──────────────────────────────────────────────

/** Cached bytes carry no content type: JSON if it parses, text otherwise. */
function decodeCached(body: Buffer): DecodedBody {
  const text = body.toString('utf8');
  try {
    const parsed: JsonValue = JSON.parse(text);
    return parsed;
  } catch {
    return text;
  }
}

function decodeResponse(response: TransportResponse, url: string): DecodedBody {
  const header = response.headers['content-type'];
  const contentType = Array.isArray(header) ? header.join(';') : header ?? '';
  const text = response.body.toString('utf8');
  if (contentType.toLowerCase().includes('application/json')) {
    try {
      const parsed: JsonValue = JSON.parse(text);
      return parsed;
    } catch (err) {
      throw new DecodeError(url, err);
    }
  }
  return text;
}
