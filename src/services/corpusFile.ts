/**
 * corpusFile.ts: Reading, repairing, merging and writing corpus files.
 *
 * Two trust levels:
 *   - A corpus we are about to *extend* (resume, merge target) is repaired:
 *     bad records are dropped and reported, the rest survive.
 *   - A corpus we are about to *import* (merge source) is validated strictly;
 *     any defect aborts before anything is written.
 *
 * Every write goes through `persistCorpus`: validate, write a temp file beside
 * the target, rename into place.  A crash mid-write leaves the old file intact.
 */

import { randomBytes } from 'crypto';
import { mkdir, readFile, rename, rm, writeFile } from 'fs/promises';
import { basename, dirname, join } from 'path';
import { ValidationError } from '../core/errors';
import { Logger } from '../core/logger';
import { validateCorpus, validateRecord, peekRecordId } from '../core/schema';
import type { Corpus, QuestionRecord } from '../core/types';

const logger = new Logger('CorpusFile');

export const CORPUS_VERSION = 1;

export const MISSING_ID = '<missing id>';
export const INVALID_CORPUS = '<invalid corpus>';

export interface CorpusSummary {
  total: number;
  /** Record count per partition key (stringified, as in JSON). */
  perPartition: Record<string, number>;
  perCategory: Record<string, number>;
}

export interface RepairResult {
  corpus: Corpus;
  /** Ids of dropped records, `<missing id>` when a record had none. */
  droppedIds: string[];
}

export interface MergeResult {
  added: number;
  replaced: number;
  corpus: Corpus;
  /** Records dropped while repairing the existing corpus. */
  droppedIds: string[];
}

export function emptyCorpus(): Corpus {
  return { version: CORPUS_VERSION, questions: [] };
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isErrnoCode(err: unknown, code: string): boolean {
  return err instanceof Error && 'code' in err && err.code === code;
}

// ── Reading ────────────────────────────────────────────────

/**
 * Parse a corpus file without checking its shape.
 *
 * @throws ValidationError when the file is not JSON.  Filesystem errors
 *   (including ENOENT) propagate unchanged.
 */
export async function readCorpus(path: string): Promise<unknown> {
  const text = await readFile(path, 'utf8');
  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch (err) {
    throw new ValidationError(
      `Corpus file ${path} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`,
    );
  }
}

/** Like readCorpus, but a missing file resolves to undefined. */
export async function readCorpusIfExists(path: string): Promise<unknown> {
  try {
    return await readCorpus(path);
  } catch (err) {
    if (isErrnoCode(err, 'ENOENT')) return undefined;
    throw err;
  }
}

/**
 * Salvage what can be salvaged from a parsed corpus.
 *
 * Invalid records and later repeats of an id are dropped; metadata of the
 * wrong type is discarded.  Never throws.
 */
export function repairCorpus(raw: unknown): RepairResult {
  if (!isPlainObject(raw)) {
    return { corpus: emptyCorpus(), droppedIds: [INVALID_CORPUS] };
  }

  const droppedIds: string[] = [];
  const questions: QuestionRecord[] = [];
  const seen = new Set<string>();

  const rawQuestions = Array.isArray(raw.questions) ? raw.questions : [];
  for (const candidate of rawQuestions) {
    let record: QuestionRecord;
    try {
      record = validateRecord(candidate);
    } catch (err) {
      if (!(err instanceof ValidationError)) throw err;
      droppedIds.push(peekRecordId(candidate) ?? MISSING_ID);
      continue;
    }
    if (seen.has(record.id)) {
      droppedIds.push(record.id);
      continue;
    }
    seen.add(record.id);
    questions.push(record);
  }

  const corpus: Corpus = {
    version:
      typeof raw.version === 'number' && Number.isInteger(raw.version)
        ? raw.version
        : CORPUS_VERSION,
    questions,
  };
  if (typeof raw.generatedAt === 'string') {
    corpus.generatedAt = raw.generatedAt;
  }
  if (
    Array.isArray(raw.sourceSessions) &&
    raw.sourceSessions.every((s): s is string => typeof s === 'string')
  ) {
    corpus.sourceSessions = [...raw.sourceSessions];
  }

  return { corpus, droppedIds };
}

/** Read and repair; a missing file is an empty corpus. */
export async function loadCorpusForUpdate(path: string): Promise<RepairResult> {
  const raw = await readCorpusIfExists(path);
  if (raw === undefined) {
    logger.info(`No corpus at ${path}; starting empty`);
    return { corpus: emptyCorpus(), droppedIds: [] };
  }

  const result = repairCorpus(raw);
  if (result.droppedIds.length > 0) {
    logger.warn(
      `Dropped ${result.droppedIds.length} record(s) from ${path}: ${result.droppedIds.join(', ')}`,
    );
  }
  return result;
}

// ── Writing ────────────────────────────────────────────────

/** Two-space JSON with non-ASCII text kept as-is and a trailing newline. */
export function serializeCorpus(corpus: Corpus): string {
  const ordered: Record<string, unknown> = {
    version: corpus.version,
  };
  if (corpus.generatedAt !== undefined) ordered.generatedAt = corpus.generatedAt;
  if (corpus.sourceSessions !== undefined) ordered.sourceSessions = corpus.sourceSessions;
  ordered.questions = corpus.questions;
  return `${JSON.stringify(ordered, null, 2)}\n`;
}

/**
 * Validate `corpus` and write it atomically to `path`.
 *
 * @throws ValidationError before touching the filesystem if any record is
 *   invalid or any id repeats.
 */
export async function persistCorpus(path: string, corpus: Corpus): Promise<void> {
  const checked = validateCorpus(corpus);

  const dir = dirname(path);
  await mkdir(dir, { recursive: true });

  const tmpPath = join(
    dir,
    `.${basename(path)}.${process.pid}.${randomBytes(6).toString('hex')}.tmp`,
  );

  try {
    await writeFile(tmpPath, serializeCorpus(checked), 'utf8');
    await rename(tmpPath, path);
  } catch (err) {
    await rm(tmpPath, { force: true });
    throw err;
  }

  logger.info(`Wrote ${checked.questions.length} record(s) to ${path}`);
}

// ── Merging ────────────────────────────────────────────────

/**
 * Merge by id.  Existing order is kept (a replacement takes the slot of the
 * record it replaces); records new to `existing` follow in `incoming` order.
 */
export function mergeRecords(
  existing: readonly QuestionRecord[],
  incoming: readonly QuestionRecord[],
  preferNew: boolean,
): { questions: QuestionRecord[]; added: number; replaced: number } {
  const byId = new Map<string, QuestionRecord>();
  for (const record of existing) byId.set(record.id, record);

  let added = 0;
  let replaced = 0;
  for (const record of incoming) {
    if (!byId.has(record.id)) {
      byId.set(record.id, record);
      added++;
    } else if (preferNew) {
      byId.set(record.id, record);
      replaced++;
    }
  }

  return { questions: [...byId.values()], added, replaced };
}

function unionSessions(
  first: readonly string[] | undefined,
  second: readonly string[] | undefined,
): string[] | undefined {
  if (first === undefined && second === undefined) return undefined;
  return [...new Set([...(first ?? []), ...(second ?? [])])];
}

/**
 * Fold the corpus at `incomingPath` into the one at `existingPath` and write
 * the result to `outPath`.
 *
 * @throws ValidationError when the incoming corpus is malformed; nothing is
 *   written in that case.
 */
export async function mergeCorpora(
  existingPath: string,
  incomingPath: string,
  preferNew: boolean,
  outPath: string = existingPath,
): Promise<MergeResult> {
  const { corpus: existing, droppedIds } = await loadCorpusForUpdate(existingPath);
  const incoming = validateCorpus(await readCorpus(incomingPath));

  const { questions, added, replaced } = mergeRecords(
    existing.questions,
    incoming.questions,
    preferNew,
  );

  const corpus: Corpus = {
    version: Math.max(existing.version, incoming.version),
    questions,
  };
  const generatedAt = incoming.generatedAt ?? existing.generatedAt;
  if (generatedAt !== undefined) corpus.generatedAt = generatedAt;
  const sourceSessions = unionSessions(existing.sourceSessions, incoming.sourceSessions);
  if (sourceSessions !== undefined) corpus.sourceSessions = sourceSessions;

  await persistCorpus(outPath, corpus);
  logger.info(
    `Merged ${incomingPath} into ${outPath}: ${added} added, ${replaced} replaced, ` +
      `${corpus.questions.length} total`,
  );

  return { added, replaced, corpus, droppedIds };
}

// ── Summaries ──────────────────────────────────────────────

export function summarizeRecords(records: readonly QuestionRecord[]): CorpusSummary {
  const perPartition: Record<string, number> = {};
  const perCategory: Record<string, number> = {};
  for (const record of records) {
    const partition = String(record.partitionKey);
    perPartition[partition] = (perPartition[partition] ?? 0) + 1;
    perCategory[record.category] = (perCategory[record.category] ?? 0) + 1;
  }
  return { total: records.length, perPartition, perCategory };
}

export function summarizeCorpus(corpus: Corpus): CorpusSummary {
  return summarizeRecords(corpus.questions);
}
