/**
 * identity.ts: Deterministic names for requests and records.
 *
 * Three kinds of identity live here:
 *   • request fingerprints  → cache file names
 *   • content fingerprints  → catch the same question arriving under two ids
 *   • synthesized record ids → `p2024-q001` when the page carries no number
 */

import { createHash } from 'crypto';
import type { FetchRequest, FormPairs } from './types';

// ─── Record ids ────────────────────────────────────────────

export function stableRecordId(partitionKey: number, sequence: number): string {
  return `p${partitionKey}-q${String(sequence).padStart(3, '0')}`;
}

// ─── Canonical serialisation ───────────────────────────────

/** JSON with object keys sorted at every depth, so key order never matters. */
export function canonicalJson(value: unknown): string {
  return JSON.stringify(sortKeys(value));
}

function sortKeys(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(sortKeys);
  if (value !== null && typeof value === 'object') {
    const sorted: Record<string, unknown> = {};
    const entries = Object.entries(value).sort(([a], [b]) => compare(a, b));
    for (const [key, child] of entries) {
      sorted[key] = sortKeys(child);
    }
    return sorted;
  }
  return value;
}

function compare(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

export function isFormPairs(form: FetchRequest['form']): form is FormPairs {
  return Array.isArray(form);
}

function canonicalForm(form: NonNullable<FetchRequest['form']>): string {
  if (!isFormPairs(form)) return canonicalJson(form);
  const pairs = form.map(([name, value]) => [name, value]);
  pairs.sort((a, b) => compare(a[0], b[0]) || compare(a[1], b[1]));
  return JSON.stringify(pairs);
}

// ─── Fingerprints ──────────────────────────────────────────

/**
 * Cache key for a request: the caller's explicit key, or a SHA-256 over the
 * URL plus sorted serialisations of query, form and JSON parameters.
 */
export function requestFingerprint(request: FetchRequest): string {
  if (request.cacheKey) return request.cacheKey;

  const hash = createHash('sha256');
  hash.update(request.url);
  if (request.query) hash.update(`\nquery:${canonicalJson(request.query)}`);
  if (request.form) hash.update(`\nform:${canonicalForm(request.form)}`);
  if (request.json) hash.update(`\njson:${canonicalJson(request.json)}`);
  return hash.digest('hex');
}

function normalizeText(value: string | null): string {
  return (value ?? '').replace(/\s+/g, ' ').trim();
}

/**
 * Content identity of a question: whitespace-insensitive text + choices.
 * Two records with different ids but the same fingerprint are one question.
 */
export function contentFingerprint(record: {
  text: string | null;
  choices: readonly string[];
}): string {
  const hash = createHash('sha256');
  hash.update(normalizeText(record.text));
  for (const choice of record.choices) {
    hash.update('\u0000');
    hash.update(normalizeText(choice));
  }
  return hash.digest('hex');
}
