/**
 * sessionWalker.ts: Per-session state machine over the quiz's step flow.
 *
 *   STARTING ──► STEPPING ──► ADVANCING ──► STEPPING (next index) … ──► DONE
 *                    │
 *                    └──────► STALLED ──► STEPPING (same index, same tokens)
 *
 * STARTING  fetch the landing page, read the session id (fatal if absent),
 *           pin the start-time token for the whole session.
 * STEPPING  POST step `i` with the current carry set.
 * ADVANCING the response names question i+1: extract records, hand them to
 *           the store, replace the carry set with the page's tokens.
 * STALLED   anything else (or a fetch failure): retry the same step up to
 *           `stallRetries` attempts, then abandon it and move on with the
 *           carry set from before the stall.
 * DONE      after `maxSteps` step indices; the site never signals the end.
 *
 * Step N+1 reads the tokens step N produced, so steps are strictly
 * sequential.  All session state is local to one `walk()` call.
 */

import { DateTime } from 'luxon';
import { describeError, SessionError } from '../core/errors';
import { startTimeToken } from '../core/eraCalendar';
import { Logger } from '../core/logger';
import { UNKNOWN_ANSWER } from '../core/schema';
import { sleep as realSleep, type SleepFn } from '../core/sleep';
import type {
  CandidateRecord,
  CarrySet,
  DecodedBody,
  FetchRequest,
  SessionMeta,
  StepOutcome,
  WalkResult,
} from '../core/types';
import type { RecordExtractor } from '../scrapers/baseExtractor';
import {
  buildStepForm,
  INITIAL_CARRY,
  parseCarrySet,
  readSessionId,
  showsStep,
  stepMarker,
} from './carryTokens';

const logger = new Logger('SessionWalker');

/** The slice of the Fetcher the walker needs. */
export interface StepFetcher {
  fetch(request: FetchRequest): Promise<DecodedBody>;
}

/** The slice of the QuestionStore the walker needs. */
export interface RecordSink {
  /** `provisional` marks an id the walker synthesized. */
  add(record: CandidateRecord, options?: { provisional?: boolean }): boolean;
  /** A `p{pk}-q{nnn}` id from the partition's sequence that no record holds. */
  nextFreeId(partitionKey: number): string;
}

export interface SessionWalkerOptions {
  fetcher: StepFetcher;
  store: RecordSink;
  extractor: RecordExtractor;
  /** Attempts per step before it is abandoned. */
  stallRetries?: number;
  /** Pause between two attempts at the same step. */
  stallPauseMs?: number;
  sleep?: SleepFn;
  clock?: () => DateTime;
}

/** Session state for the duration of one walk. */
interface ActiveSession {
  readonly meta: SessionMeta;
  readonly sessionId: string;
  readonly startTime: string;
}

interface StepResult {
  outcome: StepOutcome;
  carry: CarrySet;
}

export class SessionWalker {
  private readonly fetcher: StepFetcher;
  private readonly store: RecordSink;
  private readonly extractor: RecordExtractor;
  private readonly stallRetries: number;
  private readonly stallPauseMs: number;
  private readonly sleep: SleepFn;
  private readonly clock: () => DateTime;

  constructor(options: SessionWalkerOptions) {
    this.fetcher = options.fetcher;
    this.store = options.store;
    this.extractor = options.extractor;
    this.stallRetries = Math.max(1, options.stallRetries ?? 3);
    this.stallPauseMs = options.stallPauseMs ?? 1000;
    this.sleep = options.sleep ?? realSleep;
    this.clock = options.clock ?? (() => DateTime.now());
  }

  /**
   * Walk `session` for exactly `maxSteps` step indices.
   *
   * @throws SessionError when the landing page carries no session id.
   */
  async walk(session: SessionMeta, maxSteps: number): Promise<WalkResult> {
    logger.info(
      `==> Session ${session.label} (partition ${session.partitionKey}), ${maxSteps} step(s)`,
    );

    const active = await this.start(session);
    let carry = INITIAL_CARRY;
    const steps: StepOutcome[] = [];

    for (let stepIndex = 0; stepIndex < maxSteps; stepIndex++) {
      const result = await this.runStep(active, stepIndex, carry);
      carry = result.carry;
      steps.push(result.outcome);
    }

    const recordsAccepted = steps.reduce((sum, s) => sum + s.recordsAccepted, 0);
    const abandoned = steps.filter((s) => s.status === 'abandoned').length;
    logger.info(
      `Session ${session.label} done — ${recordsAccepted} record(s) accepted, ` +
        `${abandoned} of ${steps.length} step(s) abandoned`,
    );

    return {
      label: session.label,
      sessionId: active.sessionId,
      steps,
      recordsAccepted,
    };
  }

  // ── STARTING ───────────────────────────────────────────

  private async start(session: SessionMeta): Promise<ActiveSession> {
    // A cached landing page would replay a stale session id.
    const landing = await this.fetcher.fetch({
      url: session.baseUrl,
      noCache: true,
    });
    const sessionId = typeof landing === 'string' ? readSessionId(landing) : null;

    if (!sessionId) {
      logger.error(`No session id on the landing page for ${session.label}`);
      throw new SessionError(
        `Session id not found on landing page for ${session.label}`,
        session.label,
      );
    }

    const startTime = startTimeToken(this.clock());
    logger.info(`Session id ${sessionId}, start time ${startTime}`);
    return { meta: session, sessionId, startTime };
  }

  // ── STEPPING / ADVANCING / STALLED ─────────────────────

  private async runStep(
    active: ActiveSession,
    stepIndex: number,
    carry: CarrySet,
  ): Promise<StepResult> {
    const { meta } = active;
    const marker = stepMarker(stepIndex);

    for (let attempt = 1; attempt <= this.stallRetries; attempt++) {
      const content = await this.submitStep(active, stepIndex, carry, attempt);

      if (typeof content === 'string' && showsStep(content, stepIndex)) {
        const { yielded, accepted } = await this.harvest(content, meta, stepIndex);
        logger.info(
          `Step ${stepIndex} advanced on attempt ${attempt} — ` +
            `${accepted}/${yielded} record(s) accepted`,
        );
        return {
          outcome: {
            stepIndex,
            status: 'advanced',
            attempts: attempt,
            recordsYielded: yielded,
            recordsAccepted: accepted,
          },
          carry: parseCarrySet(content),
        };
      }

      if (content !== undefined) {
        logger.info(
          `Step ${stepIndex} stalled — "${marker}" not in response ` +
            `(attempt ${attempt}/${this.stallRetries})`,
        );
      }

      if (attempt < this.stallRetries) {
        await this.sleep(this.stallPauseMs);
      }
    }

    logger.warn(
      `Abandoning step ${stepIndex} of ${meta.label} after ${this.stallRetries} attempt(s); ` +
        `continuing with the previous tokens`,
    );
    return {
      outcome: {
        stepIndex,
        status: 'abandoned',
        attempts: this.stallRetries,
        recordsYielded: 0,
        recordsAccepted: 0,
      },
      carry,
    };
  }

  /** One POST for a step; undefined when the fetch itself failed. */
  private async submitStep(
    active: ActiveSession,
    stepIndex: number,
    carry: CarrySet,
    attempt: number,
  ): Promise<DecodedBody | undefined> {
    const { meta, sessionId, startTime } = active;
    try {
      return await this.fetcher.fetch({
        url: meta.baseUrl,
        method: 'POST',
        form: buildStepForm({
          timesCode: meta.timesCode,
          sessionId,
          stepIndex,
          startTime,
          carry,
        }),
        headers: { Referer: meta.baseUrl },
        cacheKey: `${sessionId}-${stepIndex}-${attempt}`,
      });
    } catch (err) {
      logger.warn(
        `Step ${stepIndex} request failed (attempt ${attempt}/${this.stallRetries}): ${describeError(err)}`,
      );
      return undefined;
    }
  }

  /** Run the extractor on an advancing page and offer its records to the store. */
  private async harvest(
    html: string,
    session: SessionMeta,
    stepIndex: number,
  ): Promise<{ yielded: number; accepted: number }> {
    let candidates: CandidateRecord[];
    try {
      candidates = await this.extractor.extract(html, session);
    } catch (err) {
      logger.error(`Extractor failed on step ${stepIndex} of ${session.label}`, err);
      candidates = [];
    }

    if (candidates.length === 0) {
      logger.warn(`Step ${stepIndex} of ${session.label} advanced but yielded no records`);
      return { yielded: 0, accepted: 0 };
    }

    let accepted = 0;
    for (const candidate of candidates) {
      const provisional = !candidate.id;
      const record: CandidateRecord = provisional
        ? { ...candidate, id: this.store.nextFreeId(session.partitionKey) }
        : candidate;

      if (record.answerIndex === UNKNOWN_ANSWER) {
        logger.warn(`Missing answer for step ${stepIndex} (${record.id}); kept as -1`);
      }

      if (this.store.add(record, { provisional })) accepted++;
    }

    return { yielded: candidates.length, accepted };
  }
}
