/**
 * eraCalendar.ts: Session labels → partition years, and the run's time tokens.
 *
 * Exam sessions are advertised with Japanese era labels ("令和6年春期",
 * "平成31年春期", "令和元年秋期") or plain Gregorian years ("2025春").  The
 * partition key of every record is the Gregorian year, so the label must be
 * converted before any record can get an id.
 *
 * Luxon supplies the clock for the session start-time token and the corpus
 * `generatedAt` stamp so both can be pinned in tests.
 */

import { DateTime } from 'luxon';

// ── Era table ──────────────────────────────────────────────

/** Gregorian year of "era year 0": 令和1年 = 2018 + 1 = 2019. */
const ERA_OFFSETS: ReadonlyArray<readonly [string, number]> = [
  ['令和', 2018],
  ['平成', 1988],
  ['昭和', 1925],
];

/** "元年" is how the first year of an era is written. */
const FIRST_YEAR = '元';

// ── Public API ─────────────────────────────────────────────

/**
 * Convert a session label to its Gregorian year.
 *
 * @throws If the label names neither a known era year nor a four-digit year.
 */
export function eraToGregorian(label: string): number {
  // NFKC folds full-width digits ("６") into ASCII.
  const normalized = label.normalize('NFKC');

  for (const [era, offset] of ERA_OFFSETS) {
    const at = normalized.indexOf(era);
    if (at === -1) continue;

    const rest = normalized.slice(at + era.length);
    if (rest.startsWith(FIRST_YEAR)) return checkedYear(offset + 1, label);

    const digits = rest.match(/\d+/);
    if (digits) return checkedYear(offset + parseInt(digits[0], 10), label);
  }

  const gregorian = normalized.match(/\d{4}/);
  if (gregorian) return checkedYear(parseInt(gregorian[0], 10), label);

  throw new Error(`Unable to parse year from label: ${label}`);
}

/** Unix seconds as a string: the fixed `startTime` token for one session. */
export function startTimeToken(now: DateTime = DateTime.now()): string {
  return String(Math.floor(now.toSeconds()));
}

/** UTC timestamp without milliseconds, e.g. "2026-10-19T06:00:00Z". */
export function generationTimestamp(now: DateTime = DateTime.now()): string {
  return now.toUTC().toFormat("yyyy-MM-dd'T'HH:mm:ss'Z'");
}

// ── Internals ──────────────────────────────────────────────

function checkedYear(year: number, label: string): number {
  if (!DateTime.fromObject({ year }).isValid) {
    throw new Error(`Label "${label}" resolves to an invalid year ${year}`);
  }
  return year;
}
