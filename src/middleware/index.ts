/**
 * middleware/index.ts: Barrel export for the request layer.
 *
 * The rest of the codebase imports from `middleware` (one path) rather than
 * reaching into individual files.
 */

// ── Fetch layer ─────────────────────────────────────────────
export { Fetcher } from './politeFetcher';
export type { FetcherOptions } from './politeFetcher';
export { lightFetch } from './lightFetcher';
export type {
  HttpTransport,
  TransportRequest,
  TransportResponse,
} from './lightFetcher';
export { ResponseCache } from './responseCache';

// ── Compliance ──────────────────────────────────────────────
export { isAllowedByRobots, clearRobotsCache } from './compliance';
export type { RobotsFetcher } from './compliance';
