/**
 * questionStore.ts: In-memory working set of accepted records for one run.
 *
 * Two independent duplicate guards:
 *   1. **By id**: re-walking a step yields the same id; the second copy is
 *      skipped (or replaces the first when `preferNew` is set).
 *   2. **By content**: the same question reached under a different id
 *      (e.g. a synthesized id on one run, a page-derived id on another) is
 *      caught by a fingerprint over its normalised text and choices.
 *
 * Synthesized ids share the `p{pk}-q{nnn}` space with ids read off the page.
 * They are handed out past every id the store holds, and a synthesized record
 * whose id is later claimed by a page-derived record with other content moves
 * to the next free number.
 *
 * Output order is stable across reruns: records loaded from an existing
 * corpus keep their file order, newly accepted records follow in insertion
 * order.  Sequence counters are per Store instance, never module state.
 */

import { describeError } from '../core/errors';
import { contentFingerprint, stableRecordId } from '../core/identity';
import { Logger } from '../core/logger';
import { validateRecord } from '../core/schema';
import type { CandidateRecord, Corpus, QuestionRecord } from '../core/types';
import { persistCorpus, summarizeRecords, type CorpusSummary } from './corpusFile';

const logger = new Logger('QuestionStore');

const SEQUENTIAL_ID = /^p(-?\d+)-q(\d+)$/;

export interface QuestionStoreOptions {
  /** On an id collision, replace the stored record instead of skipping. */
  preferNew?: boolean;
}

export interface AddOptions {
  /** The id was synthesized by the caller, not read from the page. */
  provisional?: boolean;
}

export interface StoreStats extends CorpusSummary {
  added: number;
  replaced: number;
  /** Duplicates by id or by content. */
  skipped: number;
  /** Candidates that failed validation. */
  rejected: number;
}

export interface CorpusMeta {
  generatedAt?: string;
  sourceSessions?: string[];
}

export class QuestionStore {
  private readonly preferNew: boolean;

  private readonly byId = new Map<string, QuestionRecord>();
  private loadedOrder: string[] = [];
  private addedOrder: string[] = [];
  /** Content fingerprint → id of the record that owns it. */
  private readonly fingerprintOwner = new Map<string, string>();
  private readonly sequences = new Map<number, number>();
  private readonly provisionalIds = new Set<string>();

  private version = 1;
  private meta: CorpusMeta = {};

  private added = 0;
  private replaced = 0;
  private skipped = 0;
  private rejected = 0;

  constructor(options: QuestionStoreOptions = {}) {
    this.preferNew = options.preferNew ?? false;
  }

  // ── Public API ─────────────────────────────────────────

  /**
   * Offer a candidate to the store.
   *
   * @returns true when the record was appended or replaced an existing one.
   */
  add(candidate: CandidateRecord | QuestionRecord, options: AddOptions = {}): boolean {
    const provisional = options.provisional ?? false;
    let record: QuestionRecord;
    try {
      record = validateRecord(candidate);
    } catch (err) {
      this.rejected++;
      logger.warn(`Rejected record: ${describeError(err)}`);
      return false;
    }

    const fingerprint = contentFingerprint(record);
    if (!provisional) this.yieldProvisional(record.id, fingerprint);

    const existing = this.byId.has(record.id);
    if (existing && !this.preferNew) {
      this.skipped++;
      logger.debug(`Duplicate id ${record.id} — skipped`);
      return false;
    }

    const owner = this.fingerprintOwner.get(fingerprint);
    if (owner !== undefined && owner !== record.id) {
      this.skipped++;
      logger.info(`Record ${record.id} duplicates the content of ${owner} — skipped`);
      return false;
    }

    if (existing) {
      this.releaseFingerprint(record.id);
      this.byId.set(record.id, record);
      this.fingerprintOwner.set(fingerprint, record.id);
      if (!provisional) this.provisionalIds.delete(record.id);
      this.replaced++;
      logger.debug(`Replaced ${record.id} with the incoming record`);
      return true;
    }

    this.byId.set(record.id, record);
    this.addedOrder.push(record.id);
    this.fingerprintOwner.set(fingerprint, record.id);
    if (provisional) this.provisionalIds.add(record.id);
    this.reserveSequence(record);
    this.added++;
    return true;
  }

  /**
   * Seed the working set from a persisted corpus, replacing whatever was
   * there.  Loaded records are not deduplicated by content against each
   * other; their fingerprints only guard later `add` calls.  Each partition's
   * sequence counter moves past the highest `p{pk}-q{nnn}` id loaded.
   */
  loadExisting(corpus: Corpus): void {
    this.byId.clear();
    this.fingerprintOwner.clear();
    this.provisionalIds.clear();
    this.loadedOrder = [];
    this.addedOrder = [];

    for (const record of corpus.questions) {
      if (this.byId.has(record.id)) {
        logger.warn(`Existing corpus repeats id ${record.id}; keeping the first`);
        continue;
      }
      this.byId.set(record.id, record);
      this.loadedOrder.push(record.id);
      const fingerprint = contentFingerprint(record);
      if (!this.fingerprintOwner.has(fingerprint)) {
        this.fingerprintOwner.set(fingerprint, record.id);
      }
      this.reserveSequence(record);
    }

    this.version = corpus.version;
    this.meta = {
      generatedAt: corpus.generatedAt,
      sourceSessions: corpus.sourceSessions,
    };
    logger.info(`Loaded ${this.loadedOrder.length} existing record(s)`);
  }

  /** Loaded records in file order, then added records in insertion order. */
  allRecords(): QuestionRecord[] {
    return [...this.loadedOrder, ...this.addedOrder].flatMap((id) => {
      const record = this.byId.get(id);
      return record ? [record] : [];
    });
  }

  /** 1, 2, 3… independently per partition key. */
  nextSequence(partitionKey: number): number {
    const next = (this.sequences.get(partitionKey) ?? 0) + 1;
    this.sequences.set(partitionKey, next);
    return next;
  }

  has(id: string): boolean {
    return this.byId.has(id);
  }

  /** The next `p{pk}-q{nnn}` id no held record uses; advances the counter. */
  nextFreeId(partitionKey: number): string {
    let id = stableRecordId(partitionKey, this.nextSequence(partitionKey));
    while (this.byId.has(id)) {
      id = stableRecordId(partitionKey, this.nextSequence(partitionKey));
    }
    return id;
  }

  stats(): StoreStats {
    return {
      ...summarizeRecords(this.allRecords()),
      added: this.added,
      replaced: this.replaced,
      skipped: this.skipped,
      rejected: this.rejected,
    };
  }

  /** The working set as a corpus; `meta` overrides the loaded metadata. */
  toCorpus(meta: CorpusMeta = {}): Corpus {
    const corpus: Corpus = {
      version: this.version,
      questions: this.allRecords(),
    };
    const generatedAt = meta.generatedAt ?? this.meta.generatedAt;
    const sourceSessions = meta.sourceSessions ?? this.meta.sourceSessions;
    if (generatedAt !== undefined) corpus.generatedAt = generatedAt;
    if (sourceSessions !== undefined) corpus.sourceSessions = sourceSessions;
    return corpus;
  }

  /** Validate and atomically write the working set to `path`. */
  async save(path: string, meta: CorpusMeta = {}): Promise<Corpus> {
    const corpus = this.toCorpus(meta);
    await persistCorpus(path, corpus);
    return corpus;
  }

  // ── Internals ──────────────────────────────────────────

  /** Keep synthesized ids from landing on a held `p{pk}-q{nnn}` id. */
  private reserveSequence(record: QuestionRecord): void {
    const match = SEQUENTIAL_ID.exec(record.id);
    if (!match || Number(match[1]) !== record.partitionKey) return;
    const sequence = Number(match[2]);
    if (sequence > (this.sequences.get(record.partitionKey) ?? 0)) {
      this.sequences.set(record.partitionKey, sequence);
    }
  }

  /**
   * A page-derived id names a slot a synthesized record is sitting in.  Unless
   * both hold the same question, renumber the synthesized one.
   */
  private yieldProvisional(id: string, fingerprint: string): void {
    if (!this.provisionalIds.has(id)) return;
    const held = this.byId.get(id);
    if (!held) return;
    const heldFingerprint = contentFingerprint(held);
    if (heldFingerprint === fingerprint) return;

    const newId = this.nextFreeId(held.partitionKey);
    this.byId.delete(id);
    this.byId.set(newId, { ...held, id: newId });
    this.addedOrder = this.addedOrder.map((entry) => (entry === id ? newId : entry));
    if (this.fingerprintOwner.get(heldFingerprint) === id) {
      this.fingerprintOwner.set(heldFingerprint, newId);
    }
    this.provisionalIds.delete(id);
    this.provisionalIds.add(newId);
    logger.info(`Synthesized id ${id} is claimed by the page; moved that record to ${newId}`);
  }

  private releaseFingerprint(id: string): void {
    const previous = this.byId.get(id);
    if (!previous) return;
    const fingerprint = contentFingerprint(previous);
    if (this.fingerprintOwner.get(fingerprint) === id) {
      this.fingerprintOwner.delete(fingerprint);
    }
  }
}
