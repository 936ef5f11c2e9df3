/**
 * logger.ts: Natural-language progress logger for the harvesting pipeline.
 *
 * Every module owns one `Logger` labelled with its name, so a crawl log reads
 * as a narrative: which session is running, which step stalled, how many
 * records the store accepted.  Lines carry an ISO timestamp and a level tag
 * and can be piped to a file unchanged.
 *
 * `LOG_LEVEL` (debug | info | warn | error) sets the minimum level printed.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_RANK;
}

function thresholdFromEnv(): LogLevel {
  const raw = (process.env.LOG_LEVEL ?? '').trim().toLowerCase();
  return isLogLevel(raw) ? raw : 'info';
}

/**
 * Lightweight logger that emits human-readable, timestamped messages.
 *
 * Usage:
 *   const logger = new Logger('SessionWalker');
 *   logger.info('Step 3 advanced: 1 record accepted');
 */
export class Logger {
  /** A label prepended to every message so you can tell *which* module is talking. */
  private readonly context: string;

  constructor(context: string) {
    this.context = context;
  }

  // ── Public API ─────────────────────────────────────────

  /** Request and token-level chatter; hidden unless LOG_LEVEL=debug. */
  debug(message: string): void {
    this.emit('debug', message);
  }

  /** Routine progress: page fetched, step advanced, corpus written. */
  info(message: string): void {
    this.emit('info', message);
  }

  /** Something unexpected but non-fatal: a stalled step, a record rejected. */
  warn(message: string): void {
    this.emit('warn', message);
  }

  /** A hard failure: retries exhausted, session aborted, corpus invalid. */
  error(message: string, err?: unknown): void {
    this.emit('error', message);
    if (err && LEVEL_RANK[thresholdFromEnv()] <= LEVEL_RANK.error) {
      console.error(err);
    }
  }

  // ── Internals ──────────────────────────────────────────

  /**
   * Formats and writes a single log line:
   * `[2026-02-10T18:30:00.000Z] [WARN ] [SessionWalker] Step 4 stalled…`
   */
  private emit(level: LogLevel, message: string): void {
    if (LEVEL_RANK[level] < LEVEL_RANK[thresholdFromEnv()]) return;

    const timestamp = new Date().toISOString();
    const tag = level.toUpperCase().padEnd(5); // "INFO " / "WARN " / "ERROR"
    const line = `[${timestamp}] [${tag}] [${this.context}] ${message}`;

    switch (level) {
      case 'error':
        console.error(line);
        break;
      case 'warn':
        console.warn(line);
        break;
      default:
        console.log(line);
    }
  }
}
