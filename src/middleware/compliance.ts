/**
 * compliance.ts: robots.txt policy check before a crawl starts.
 *
 * The harvester identifies itself with a plain User-Agent and asks the
 * site's robots.txt whether that agent may fetch the quiz endpoint.  A
 * missing or unreachable robots.txt means "no restrictions" (RFC 9309).
 * Rate limiting lives in the Fetcher's Bottleneck limiter, not here.
 */

import robotsParser from 'robots-parser';
import { describeError } from '../core/errors';
import { Logger } from '../core/logger';
import type { DecodedBody, FetchRequest } from '../core/types';

const logger = new Logger('Compliance');

/** The slice of the Fetcher this module needs. */
export interface RobotsFetcher {
  fetch(request: FetchRequest): Promise<DecodedBody>;
}

// One parsed robots.txt per origin for the lifetime of the process.
const robotsCache = new Map<string, ReturnType<typeof robotsParser>>();

/**
 * Check if `userAgent` may crawl `url` per the origin's robots.txt.
 *
 * @returns `true` if allowed (or if robots.txt is unavailable), `false` if disallowed.
 */
export async function isAllowedByRobots(
  url: string,
  userAgent: string,
  fetcher: RobotsFetcher,
): Promise<boolean> {
  let origin: string;
  try {
    origin = new URL(url).origin;
  } catch {
    // Unparseable URL: let it through and let the fetch layer report it.
    return true;
  }

  let robots = robotsCache.get(origin);
  if (!robots) {
    const robotsUrl = `${origin}/robots.txt`;
    try {
      const body = await fetcher.fetch({ url: robotsUrl });
      robots = robotsParser(robotsUrl, typeof body === 'string' ? body : '');
      robotsCache.set(origin, robots);
    } catch (err) {
      logger.warn(
        `Could not fetch robots.txt for ${origin} (${describeError(err)}) — assuming allowed`,
      );
      return true;
    }
  }

  const allowed = robots.isAllowed(url, userAgent) ?? true;
  if (!allowed) {
    logger.warn(`robots.txt disallows ${url} for UA "${userAgent}"`);
  }
  return allowed;
}

/** Forget parsed robots files (useful between runs and in tests). */
export function clearRobotsCache(): void {
  robotsCache.clear();
}
