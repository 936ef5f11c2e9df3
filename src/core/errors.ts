/**
 * errors.ts: Typed failures raised across the pipeline.
 *
 * Callers branch on the class, not on message text:
 *   • HttpStatusError / TransportError come out of the Fetcher once its
 *     retry budget is spent (or immediately for a non-retryable status).
 *   • DecodeError means a response arrived but its body did not parse as
 *     the content type it declared.
 *   • SessionError is a precondition failure that aborts one session.
 *   • ValidationError guards the corpus: it rejects a single record on add and
 *     aborts any write that would persist invalid data.
 */

/** A record or corpus broke one of the data-model invariants. */
export class ValidationError extends Error {
  /** Id of the offending record, when it had one. */
  readonly recordId?: string;

  constructor(message: string, recordId?: string) {
    super(message);
    this.name = 'ValidationError';
    this.recordId = recordId;
  }
}

/** The origin answered with a non-2xx status. */
export class HttpStatusError extends Error {
  readonly statusCode: number;
  readonly url: string;

  constructor(statusCode: number, url: string) {
    super(`HTTP ${statusCode} for ${url}`);
    this.name = 'HttpStatusError';
    this.statusCode = statusCode;
    this.url = url;
  }

  /** 429 and every 5xx are worth another attempt; anything else is final. */
  get retryable(): boolean {
    return isRetryableStatus(this.statusCode);
  }
}

/** The request never produced a response: timeout, reset, DNS failure. */
export class TransportError extends Error {
  readonly url: string;

  constructor(url: string, cause?: unknown) {
    super(`Request to ${url} failed: ${describeError(cause)}`, { cause });
    this.name = 'TransportError';
    this.url = url;
  }
}

/** A response body did not match its declared content type. */
export class DecodeError extends Error {
  readonly url: string;

  constructor(url: string, cause?: unknown) {
    super(`Malformed response body from ${url}: ${describeError(cause)}`, { cause });
    this.name = 'DecodeError';
    this.url = url;
  }
}

/** The quiz flow cannot start or the requested session does not exist. */
export class SessionError extends Error {
  readonly sessionLabel?: string;

  constructor(message: string, sessionLabel?: string) {
    super(message);
    this.name = 'SessionError';
    this.sessionLabel = sessionLabel;
  }
}

export function isRetryableStatus(statusCode: number): boolean {
  return statusCode === 429 || (statusCode >= 500 && statusCode < 600);
}

/** Best-effort message for logging an unknown thrown value. */
export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
