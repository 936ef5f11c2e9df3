/**
 * corpusCrawler.ts: The orchestrator that ties every layer together.
 *
 * PIPELINE
 * ────────
 *   1. POLICY   → robots.txt check for the configured user agent (optional)
 *   2. RESUME   → seed the QuestionStore from the output file, repairing it
 *   3. DISCOVER → read the session list off the landing page
 *   4. WALK     → one SessionWalker pass per selected session, in order
 *   5. PERSIST  → atomic write after every session, stamped with the
 *                 generation time and the labels walked so far
 *
 * Sessions run one after another on a single Fetcher: the throttle is a
 * per-site budget, and a session's steps cannot be parallelised anyway.
 * A session that fails to start (no session id, or a landing page the
 * Fetcher could not get) is logged and skipped; the rest still run.
 */

import 'dotenv/config';
import { parseArgs } from 'util';
import { DateTime } from 'luxon';
import {
  discoverSessions,
  resolveSessions,
  SessionWalker,
  type StepFetcher,
} from './agents';
import { generationTimestamp } from './core/eraCalendar';
import {
  DecodeError,
  describeError,
  HttpStatusError,
  SessionError,
  TransportError,
} from './core/errors';
import { Logger } from './core/logger';
import type { SleepFn } from './core/sleep';
import {
  loadCrawlerConfig,
  type Corpus,
  type CrawlerConfig,
  type SessionMeta,
  type WalkResult,
} from './core/types';
import { Fetcher, isAllowedByRobots } from './middleware';
import { QuizPageExtractor, type RecordExtractor } from './scrapers';
import { loadCorpusForUpdate } from './services/corpusFile';
import { QuestionStore, type StoreStats } from './services/questionStore';

const logger = new Logger('CorpusCrawler');

/** Failures that end one session but not the crawl. */
function isSessionFailure(err: unknown): boolean {
  return (
    err instanceof SessionError ||
    err instanceof HttpStatusError ||
    err instanceof TransportError ||
    err instanceof DecodeError
  );
}

/** The Fetcher surface the crawler drives; `close` is called once at the end. */
export interface CrawlFetcher extends StepFetcher {
  close(): Promise<void>;
}

export interface CorpusCrawlerDeps {
  fetcher?: CrawlFetcher;
  extractor?: RecordExtractor;
  sleep?: SleepFn;
  clock?: () => DateTime;
}

export interface CrawlOptions {
  outPath: string;
  /** "all" or a comma-separated list of session labels. */
  sessions: string;
}

export interface CrawlReport {
  outPath: string;
  walks: WalkResult[];
  /** Labels of sessions that could not be started. */
  failedSessions: string[];
  stats: StoreStats;
  corpus: Corpus;
}

export class CorpusCrawler {
  private readonly config: CrawlerConfig;
  private readonly fetcher: CrawlFetcher;
  private readonly extractor: RecordExtractor;
  private readonly sleep?: SleepFn;
  private readonly clock: () => DateTime;

  /**
   * @param deps - Inject a fetcher/extractor/clock (useful for tests).
   *   If omitted, a Fetcher is built from `config`.
   */
  constructor(config: CrawlerConfig, deps: CorpusCrawlerDeps = {}) {
    this.config = config;
    this.fetcher = deps.fetcher ?? Fetcher.fromConfig(config);
    this.extractor = deps.extractor ?? new QuizPageExtractor();
    this.sleep = deps.sleep;
    this.clock = deps.clock ?? (() => DateTime.now());
  }

  /** Sessions the site currently offers, in page order. */
  async listSessions(): Promise<SessionMeta[]> {
    const discovered = await discoverSessions(this.fetcher, this.config.baseUrl);
    return [...discovered.values()];
  }

  async run(options: CrawlOptions): Promise<CrawlReport> {
    const { outPath } = options;
    logger.info(`Starting crawl of ${this.config.baseUrl} into ${outPath}`);

    // ── Stage 1: POLICY ────────────────────────────────────
    if (this.config.respectRobots) {
      const allowed = await isAllowedByRobots(
        this.config.baseUrl,
        this.config.botUserAgent,
        this.fetcher,
      );
      if (!allowed) {
        throw new SessionError(`robots.txt disallows crawling ${this.config.baseUrl}`);
      }
    }

    // ── Stage 2: RESUME ────────────────────────────────────
    const store = new QuestionStore({ preferNew: this.config.preferNew });
    let sourceSessions: string[] = [];
    if (this.config.resume) {
      const { corpus } = await loadCorpusForUpdate(outPath);
      store.loadExisting(corpus);
      sourceSessions = [...(corpus.sourceSessions ?? [])];
    }

    // ── Stage 3: DISCOVER ──────────────────────────────────
    const discovered = await discoverSessions(this.fetcher, this.config.baseUrl);
    const selected = resolveSessions(options.sessions, discovered);
    logger.info(
      `Selected ${selected.length} session(s): ${selected.map((s) => s.label).join(', ')}`,
    );

    // ── Stage 4 + 5: WALK, PERSIST ─────────────────────────
    const walker = new SessionWalker({
      fetcher: this.fetcher,
      store,
      extractor: this.extractor,
      stallRetries: this.config.stallRetries,
      stallPauseMs: this.config.stallPauseMs,
      sleep: this.sleep,
      clock: this.clock,
    });

    const walks: WalkResult[] = [];
    const failedSessions: string[] = [];
    let corpus = store.toCorpus();

    for (const session of selected) {
      try {
        walks.push(await walker.walk(session, this.config.maxSteps));
      } catch (err) {
        if (!isSessionFailure(err)) throw err;
        logger.error(`Session ${session.label} aborted: ${describeError(err)}`);
        failedSessions.push(session.label);
        continue;
      }

      if (!sourceSessions.includes(session.label)) sourceSessions.push(session.label);
      corpus = await store.save(outPath, {
        generatedAt: generationTimestamp(this.clock()),
        sourceSessions: [...sourceSessions],
      });
    }

    if (walks.length === 0) {
      corpus = await store.save(outPath, {
        generatedAt: generationTimestamp(this.clock()),
      });
    }

    const stats = store.stats();
    logger.info(
      `Crawl finished — ${stats.total} record(s) in ${outPath} ` +
        `(${stats.added} added, ${stats.replaced} replaced, ${stats.skipped} skipped, ` +
        `${stats.rejected} rejected)`,
    );
    return { outPath, walks, failedSessions, stats, corpus };
  }

  async close(): Promise<void> {
    await this.fetcher.close();
  }
}

// ─── CLI ─────────────────────────────────────────────────────

const USAGE =
  'Usage: tsx src/corpusCrawler.ts --out <file> --sessions <all|label,label…>\n' +
  '       [--list-sessions] [--resume] [--no-cache] [--throttle <ms>] [--max-steps <n>]';

function parsePositiveInt(flag: string, raw: string | undefined, fallback: number): number {
  if (raw === undefined) return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 0) {
    throw new Error(`${flag} expects a non-negative integer, got "${raw}"`);
  }
  return value;
}

async function main(argv: string[]): Promise<void> {
  const { values } = parseArgs({
    args: argv,
    options: {
      out: { type: 'string' },
      sessions: { type: 'string' },
      'list-sessions': { type: 'boolean', default: false },
      resume: { type: 'boolean' },
      'no-cache': { type: 'boolean', default: false },
      throttle: { type: 'string' },
      'max-steps': { type: 'string' },
    },
  });

  const base = loadCrawlerConfig();
  const config: CrawlerConfig = {
    ...base,
    cacheEnabled: values['no-cache'] ? false : base.cacheEnabled,
    throttleMs: parsePositiveInt('--throttle', values.throttle, base.throttleMs),
    maxSteps: parsePositiveInt('--max-steps', values['max-steps'], base.maxSteps),
    resume: values.resume ?? base.resume,
  };

  const crawler = new CorpusCrawler(config);
  try {
    if (values['list-sessions']) {
      for (const session of await crawler.listSessions()) {
        console.log(`${session.label}\t${session.partitionKey}\t${session.timesCode}`);
      }
      return;
    }

    if (!values.out || !values.sessions) {
      console.error(USAGE);
      process.exitCode = 1;
      return;
    }

    const report = await crawler.run({ outPath: values.out, sessions: values.sessions });
    console.log('\n✓ Crawl summary:', JSON.stringify(report.stats, null, 2));
    if (report.failedSessions.length > 0) {
      console.error(`✗ Sessions that could not start: ${report.failedSessions.join(', ')}`);
      process.exitCode = 1;
    }
  } finally {
    await crawler.close();
  }
}

if (require.main === module) {
  main(process.argv.slice(2)).catch((err) => {
    console.error('\n✗ Crawl failed:', err);
    process.exit(1);
  });
}
