/**
 * schema.ts: The single gate between "candidate" and "accepted" records.
 *
 * Extractors hand back loosely-shaped candidates; nothing enters the store or
 * a corpus file without passing `validateRecord`.  Defaults on the optional
 * text fields let corpora written by older runs (which omitted
 * `categoryPath`, `explanation` or `sourceUrl`) load without loss.
 */

import { z } from 'zod';
import { ValidationError } from './errors';

/** Sentinel `answerIndex` meaning "the page did not reveal the answer". */
export const UNKNOWN_ANSWER = -1;

const nonBlank = (label: string) =>
  z.string().refine((value) => value.trim().length > 0, {
    message: `${label} must not be blank`,
  });

export const QuestionRecordSchema = z
  .object({
    id: nonBlank('id'),
    partitionKey: z.number().int(),
    category: z.string(),
    categoryPath: z.array(z.string()).default([]),
    text: z.string().nullable(),
    choices: z.array(nonBlank('choice')).min(1, 'choices must not be empty'),
    answerIndex: z.number().int().min(UNKNOWN_ANSWER),
    explanation: z.string().default(''),
    sourceUrl: z.string().default(''),
  })
  .superRefine((record, ctx) => {
    if (record.answerIndex >= record.choices.length) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['answerIndex'],
        message: `answerIndex ${record.answerIndex} is out of range for ${record.choices.length} choice(s)`,
      });
    }
  });

export type QuestionRecord = z.infer<typeof QuestionRecordSchema>;

export const CorpusSchema = z.object({
  version: z.number().int().default(1),
  questions: z.array(QuestionRecordSchema),
  generatedAt: z
    .string()
    .nullish()
    .transform((value) => value ?? undefined),
  sourceSessions: z
    .array(z.string())
    .nullish()
    .transform((value) => value ?? undefined),
});

export type Corpus = z.infer<typeof CorpusSchema>;

// ── Validation helpers ─────────────────────────────────────

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const where = issue.path.length > 0 ? issue.path.join('.') : 'record';
      return `${where}: ${issue.message}`;
    })
    .join('; ');
}

/** Pull a printable id out of an arbitrary value for error context. */
export function peekRecordId(value: unknown): string | undefined {
  if (typeof value === 'object' && value !== null && 'id' in value) {
    const { id } = value;
    if (typeof id === 'string' && id.trim().length > 0) return id;
  }
  return undefined;
}

/**
 * Check a candidate against every record invariant.
 *
 * @returns A fresh, normalised record (unknown keys stripped, defaults filled).
 * @throws ValidationError naming the record id when any invariant fails.
 */
export function validateRecord(candidate: unknown): QuestionRecord {
  const result = QuestionRecordSchema.safeParse(candidate);
  if (!result.success) {
    const id = peekRecordId(candidate);
    throw new ValidationError(
      `Invalid record ${id ?? '<missing id>'}: ${formatIssues(result.error)}`,
      id,
    );
  }
  return result.data;
}

/**
 * Strict corpus check: every record valid and every id unique.
 *
 * Used on incoming merge input and before every write.
 */
export function validateCorpus(raw: unknown): Corpus {
  const result = CorpusSchema.safeParse(raw);
  if (!result.success) {
    throw new ValidationError(`Invalid corpus: ${formatIssues(result.error)}`);
  }

  const seen = new Set<string>();
  for (const record of result.data.questions) {
    if (seen.has(record.id)) {
      throw new ValidationError(
        `Invalid corpus: duplicate record id ${record.id}`,
        record.id,
      );
    }
    seen.add(record.id);
  }

  return result.data;
}
