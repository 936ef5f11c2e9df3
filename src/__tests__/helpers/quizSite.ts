/**
 * In-process stand-ins for the quiz site: page builders, a scripted
 * StepFetcher and a transport for the real Fetcher.
 */

import { readFileSync } from 'fs';
import { join } from 'path';
import { isFormPairs } from '../../core/identity';
import type { DecodedBody, FetchRequest, SessionMeta } from '../../core/types';
import type { HttpTransport, TransportRequest } from '../../middleware';

export const BASE_URL = 'https://quiz.example.test/kakomon.php';

export const SESSION: SessionMeta = {
  label: '令和6年春期',
  partitionKey: 2024,
  timesCode: '06_haru',
  baseUrl: BASE_URL,
};

export function fixture(name: string): string {
  return readFileSync(join(__dirname, '..', 'fixtures', name), 'utf8');
}

// ── Pages ──────────────────────────────────────────────────

const SLOTS = [
  ['ア', 'select_a'],
  ['イ', 'select_i'],
  ['ウ', 'select_u'],
  ['エ', 'select_e'],
] as const;

export interface Tokens {
  q: string;
  r: string;
  c: string;
}

export function tokensFor(stepIndex: number): Tokens {
  return { q: `q${stepIndex}`, r: `r${stepIndex}`, c: `c${stepIndex}` };
}

export interface QuestionPageOptions {
  stepIndex: number;
  text?: string;
  choices?: string[];
  answer?: string;
  tokens?: Tokens;
}

/** A question page that advances to `stepIndex` (shows 第{stepIndex+1}問). */
export function questionPage(options: QuestionPageOptions): string {
  const { stepIndex } = options;
  const text = options.text ?? `Question ${stepIndex}`;
  const choices = options.choices ?? SLOTS.map(([label]) => `${label}-${stepIndex}`);
  const tokens = options.tokens ?? tokensFor(stepIndex);
  const answer = options.answer ?? 'ア';

  const items = choices
    .map((choice, i) => {
      const [label, id] = SLOTS[i] ?? ['?', `select_${i}`];
      return `<li><button>${label}</button><span id="${id}">${choice}</span></li>`;
    })
    .join('\n');

  return `<html><body><form>
<h3 class="qno">第${stepIndex + 1}問</h3>
<div>${text}</div>
<ul class="selectList">
${items}
</ul>
<span id="answerChar">${answer}</span>
<div id="kaisetsu">Explanation ${stepIndex}</div>
<h3>分類</h3>
<div>テクノロジ系 » 基礎理論</div>
<input type="hidden" name="_q" value="${tokens.q}">
<input type="hidden" name="_r" value="${tokens.r}">
<input type="hidden" name="_c" value="${tokens.c}">
<input type="hidden" name="result" value="1">
</form></body></html>`;
}

/** The configuration page: what the site serves on entry and on a stall. */
export function landingPage(sid: string | null = 'sid-test'): string {
  const sidInput = sid === null ? '' : `<input type="hidden" name="sid" value="${sid}">`;
  return `<html><body><form>
${sidInput}
<label><input type="checkbox" name="times[]" value="06_haru">令和6年春期</label>
<label><input type="checkbox" name="times[]" value="05_aki">令和5年秋期</label>
<button type="submit">出題開始</button>
</form></body></html>`;
}

// ── Fetchers ───────────────────────────────────────────────

export type Responder = (request: FetchRequest) => DecodedBody | Error;

/** StepFetcher double that records every request and answers from a script. */
export class ScriptedFetcher {
  readonly requests: FetchRequest[] = [];
  private readonly respond: Responder;

  constructor(respond: Responder) {
    this.respond = respond;
  }

  async fetch(request: FetchRequest): Promise<DecodedBody> {
    this.requests.push(request);
    const response = this.respond(request);
    if (response instanceof Error) throw response;
    return response;
  }

  /** POSTs issued for one step index, in order. */
  stepRequests(stepIndex: number): FetchRequest[] {
    return this.requests.filter(
      (request) => request.method === 'POST' && formValue(request, 'qno') === String(stepIndex),
    );
  }
}

export function formValue(request: FetchRequest, name: string): string | undefined {
  const { form } = request;
  if (!form) return undefined;
  if (isFormPairs(form)) return form.find(([key]) => key === name)?.[1];
  return form[name];
}

/**
 * Counts attempts per step index and asks `page(stepIndex, attempt)` for the
 * response; GETs get the landing page.
 */
export function quizResponder(
  page: (stepIndex: number, attempt: number) => DecodedBody | Error,
  landing: string = landingPage(),
): Responder {
  const attempts = new Map<number, number>();
  return (request) => {
    if (request.method !== 'POST') return landing;
    const stepIndex = Number(formValue(request, 'qno'));
    const attempt = (attempts.get(stepIndex) ?? 0) + 1;
    attempts.set(stepIndex, attempt);
    return page(stepIndex, attempt);
  };
}

/** Transport for the real Fetcher: HTML responses to `handler`'s strings. */
export function htmlTransport(
  handler: (request: TransportRequest) => string,
  calls: TransportRequest[] = [],
): HttpTransport {
  return async (request) => {
    calls.push(request);
    return {
      statusCode: 200,
      body: Buffer.from(handler(request), 'utf8'),
      headers: { 'content-type': 'text/html; charset=UTF-8' },
    };
  };
}
