/**
 * sessionDiscovery.ts: Which exam sessions does the site offer?
 *
 * The landing page lists every past sitting as a `times[]` checkbox whose
 * label names the session ("令和6年春期").  Each becomes a SessionMeta with
 * its Gregorian year as partition key; labels we cannot date are skipped.
 */

import * as cheerio from 'cheerio';
import { eraToGregorian } from '../core/eraCalendar';
import { SessionError } from '../core/errors';
import { Logger } from '../core/logger';
import type { DecodedBody, FetchRequest, SessionMeta } from '../core/types';

const logger = new Logger('SessionDiscovery');

export interface LandingFetcher {
  fetch(request: FetchRequest): Promise<DecodedBody>;
}

/** Sessions advertised on the landing page, keyed by label in page order. */
export function parseSessionList(
  html: string,
  baseUrl: string,
): Map<string, SessionMeta> {
  const $ = cheerio.load(html);
  const sessions = new Map<string, SessionMeta>();

  $('input[name="times[]"]').each((_, input) => {
    const timesCode = $(input).attr('value')?.trim();
    if (!timesCode) return;

    const parent = $(input).parent();
    let label = '';
    if (parent.is('label')) {
      label = parent.text().trim();
    } else {
      const sibling = input.nextSibling;
      if (sibling && 'data' in sibling && typeof sibling.data === 'string') {
        label = sibling.data.trim();
      }
    }
    if (!label) return;

    let partitionKey: number;
    try {
      partitionKey = eraToGregorian(label);
    } catch {
      logger.debug(`Skipping session "${label}" — no year in label`);
      return;
    }

    sessions.set(label, { label, partitionKey, timesCode, baseUrl });
  });

  return sessions;
}

export async function discoverSessions(
  fetcher: LandingFetcher,
  baseUrl: string,
): Promise<Map<string, SessionMeta>> {
  const html = await fetcher.fetch({ url: baseUrl });
  if (typeof html !== 'string') {
    throw new SessionError(`Landing page at ${baseUrl} is not HTML`);
  }

  const sessions = parseSessionList(html, baseUrl);
  logger.info(`Discovered ${sessions.size} session(s) at ${baseUrl}`);
  return sessions;
}

/**
 * Turn a user selection ("all" or "令和6年春期,令和5年秋期") into sessions.
 *
 * @throws SessionError listing every label the site does not offer.
 */
export function resolveSessions(
  selection: string,
  discovered: Map<string, SessionMeta>,
): SessionMeta[] {
  if (selection.trim().toLowerCase() === 'all') {
    return [...discovered.values()];
  }

  const labels = selection
    .split(',')
    .map((label) => label.trim())
    .filter((label) => label.length > 0);

  const missing = labels.filter((label) => !discovered.has(label));
  if (missing.length > 0) {
    throw new SessionError(`Unknown sessions: ${missing.join(', ')}`);
  }

  return labels.flatMap((label) => {
    const session = discovered.get(label);
    return session ? [session] : [];
  });
}
