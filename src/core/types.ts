/**
 * types.ts: Shared type definitions for the entire harvesting pipeline.
 *
 * Fetcher, walker, extractor and store all agree on the shapes below.
 * Record and corpus shapes are inferred from the zod schemas in `schema.ts`
 * so the type and the runtime gate can never drift apart.
 */

import type { QuestionRecord } from './schema';

export type { QuestionRecord, Corpus } from './schema';

// ─── Records ───────────────────────────────────────────────

/**
 * What an extractor returns for one page.  Identical to a QuestionRecord
 * except the id may be unknown; the walker fills it from the store's
 * per-partition sequence before the record is offered to the store.
 */
export type CandidateRecord = Omit<QuestionRecord, 'id'> & { id: string | null };

// ─── Sessions ──────────────────────────────────────────────

/** One exam sitting as advertised on the quiz site's landing page. */
export interface SessionMeta {
  /** Human label exactly as shown on the site (e.g. "令和6年春期"). */
  label: string;
  /** Grouping key for ids and sequence numbers: the Gregorian year. */
  partitionKey: number;
  /** Value of the session's `times[]` checkbox. */
  timesCode: string;
  /** Endpoint that serves the landing page and accepts step POSTs. */
  baseUrl: string;
}

/**
 * Hidden tokens relayed from one step's response into the next request.
 *
 * Always replaced wholesale, never patched: a failed or stalled step leaves
 * the previous carry set untouched.
 */
export interface CarrySet {
  readonly q: string;
  readonly r: string;
  readonly c: string;
  readonly result: string;
}

export type StepStatus = 'advanced' | 'abandoned';

export interface StepOutcome {
  stepIndex: number;
  status: StepStatus;
  /** Requests issued for this step, including stalled ones. */
  attempts: number;
  /** Candidates the extractor produced on the advancing response. */
  recordsYielded: number;
  /** Candidates the store accepted. */
  recordsAccepted: number;
}

/** What SessionWalker.walk() resolves with. */
export interface WalkResult {
  label: string;
  sessionId: string;
  steps: StepOutcome[];
  recordsAccepted: number;
}

// ─── Fetch layer ───────────────────────────────────────────

export type HttpMethod = 'GET' | 'POST';

/** Form fields as ordered pairs so repeated names (`categories[]`) survive. */
export type FormPairs = ReadonlyArray<readonly [string, string]>;

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

/** Decoded body: parsed JSON for JSON responses, text for everything else. */
export type DecodedBody = JsonValue;

export interface FetchRequest {
  url: string;
  method?: HttpMethod;
  /** Sent as application/x-www-form-urlencoded. */
  form?: FormPairs | Record<string, string>;
  /** Sent as application/json. */
  json?: Record<string, JsonValue>;
  /** Appended to the URL's query string. */
  query?: Record<string, string | number>;
  headers?: Record<string, string>;
  /** Used verbatim as the cache file name instead of a derived fingerprint. */
  cacheKey?: string;
  /** Skip both cache lookup and cache write for this request. */
  noCache?: boolean;
  /** Resolve with status + content + sent body instead of content alone. */
  returnResponse?: boolean;
}

export interface RawFetchResult {
  status: number;
  content: DecodedBody;
  /** The encoded request body, or null for bodiless requests and cache hits. */
  requestBody: string | null;
}

// ─── Crawler configuration ─────────────────────────────────

/**
 * Central configuration for a crawl or merge run.
 * Read from environment variables with sensible defaults; CLI flags override.
 */
export interface CrawlerConfig {
  baseUrl: string;
  botUserAgent: string;

  // Fetcher
  throttleMs: number;
  maxRetries: number;
  backoffBaseMs: number;
  requestTimeoutMs: number;
  cacheEnabled: boolean;
  cacheDir: string;

  // Walker
  maxSteps: number;
  stallRetries: number;
  stallPauseMs: number;

  // Store
  resume: boolean;
  preferNew: boolean;

  // Compliance
  respectRobots: boolean;
}

function envInt(name: string, fallback: number): number {
  const parsed = parseInt(process.env[name] ?? '', 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}

function envBool(name: string, fallback: boolean): boolean {
  const raw = process.env[name]?.trim().toLowerCase();
  if (raw === undefined || raw === '') return fallback;
  return raw === 'true' || raw === '1' || raw === 'yes';
}

/** Build a CrawlerConfig from process.env with defaults. */
export function loadCrawlerConfig(): CrawlerConfig {
  return {
    baseUrl:
      process.env.QUIZ_BASE_URL ?? 'https://www.ap-siken.com/apkakomon.php',
    botUserAgent: process.env.BOT_USER_AGENT ?? 'QuizCorpusHarvester/1.0',
    throttleMs: envInt('THROTTLE_MS', 1000),
    maxRetries: envInt('MAX_RETRIES', 5),
    backoffBaseMs: envInt('BACKOFF_BASE_MS', 1000),
    requestTimeoutMs: envInt('REQUEST_TIMEOUT_MS', 20_000),
    cacheEnabled: envBool('CACHE_ENABLED', true),
    cacheDir: process.env.CACHE_DIR ?? '.cache/http',
    maxSteps: envInt('MAX_STEPS', 80),
    stallRetries: envInt('STALL_RETRIES', 3),
    stallPauseMs: envInt('STALL_PAUSE_MS', 1000),
    resume: envBool('RESUME', false),
    preferNew: envBool('PREFER_NEW', false),
    respectRobots: envBool('RESPECT_ROBOTS', true),
  };
}
