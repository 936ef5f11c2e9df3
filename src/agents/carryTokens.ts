/**
 * carryTokens.ts: The hidden-token relay that threads one quiz session.
 *
 * The site keeps no server-side cursor we can address directly.  Instead each
 * question page embeds three opaque echo tokens (`_q`, `_r`, `_c`) and a
 * `result` flag; the next POST must send them back verbatim together with the
 * session id and the fixed start-time token, or the site answers with the
 * configuration page again (a "stall").
 *
 * Everything here is pure: parse a page, build a form.  Sequencing lives in
 * SessionWalker.
 */

import * as cheerio from 'cheerio';
import type { CarrySet, FormPairs } from '../core/types';

/** The `result` value that asks the site to move on to the next question. */
export const CONTINUE_RESULT = '0';

export const INITIAL_CARRY: CarrySet = Object.freeze({
  q: '',
  r: '',
  c: '',
  result: CONTINUE_RESULT,
});

/**
 * Subject selectors sent with every step: each field group followed by the
 * category numbers it spans, in the order the site's own form posts them.
 */
const FIELD_GROUPS: ReadonlyArray<readonly [field: string, from: number, to: number]> = [
  ['te_all', 1, 13],
  ['ma_all', 14, 16],
  ['st_all', 17, 23],
];

/** Heading the page shows once question `stepIndex` has been served. */
export function stepMarker(stepIndex: number): string {
  return `第${stepIndex + 1}問`;
}

const QUESTION_HEADING = /第(\d+)問/g;

/** Whether `content` shows the heading of question `stepIndex + 1` exactly. */
export function showsStep(content: string, stepIndex: number): boolean {
  for (const match of content.matchAll(QUESTION_HEADING)) {
    if (Number(match[1]) === stepIndex + 1) return true;
  }
  return false;
}

/** The site-assigned session id from the landing page, or null. */
export function readSessionId(html: string): string | null {
  const $ = cheerio.load(html);
  const value = $('input[name="sid"]').first().attr('value')?.trim();
  return value ? value : null;
}

/**
 * The carry set for the next step, parsed from an advancing response.
 * Missing tokens become empty strings; `result` is always forced to
 * CONTINUE_RESULT regardless of what the page holds.
 */
export function parseCarrySet(html: string): CarrySet {
  const $ = cheerio.load(html);
  const read = (name: string) =>
    $(`input[name="${name}"]`).first().attr('value') ?? '';

  return Object.freeze({
    q: read('_q'),
    r: read('_r'),
    c: read('_c'),
    result: CONTINUE_RESULT,
  });
}

export interface StepFormInput {
  timesCode: string;
  sessionId: string;
  stepIndex: number;
  startTime: string;
  carry: CarrySet;
}

/** Form pairs for one step request. */
export function buildStepForm(input: StepFormInput): FormPairs {
  const pairs: Array<readonly [string, string]> = [['times[]', input.timesCode]];

  for (const [field, from, to] of FIELD_GROUPS) {
    pairs.push(['fields[]', field]);
    for (let category = from; category <= to; category++) {
      pairs.push(['categories[]', String(category)]);
    }
  }

  pairs.push(
    ['options[]', 'timesFilter'],
    ['moshi', 'mix_all'],
    ['moshi_cnt', '40'],
    ['addition', '0'],
    ['mode', '1'],
    ['qno', String(input.stepIndex)],
    ['sid', input.sessionId],
    ['result', input.carry.result || CONTINUE_RESULT],
    ['checkflag', '-1'],
    ['startTime', input.startTime],
    ['_q', input.carry.q],
    ['_r', input.carry.r],
    ['_c', input.carry.c],
  );

  return pairs;
}
