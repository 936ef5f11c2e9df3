import { beforeEach, describe, it } from 'node:test';
import assert from 'node:assert';
import { clearRobotsCache, isAllowedByRobots } from '../middleware';
import type { FetchRequest } from '../core/types';

process.env.LOG_LEVEL = 'error';

const ROBOTS = ['User-agent: *', 'Disallow: /private/', '', 'User-agent: blocked-bot', 'Disallow: /'].join('\n');

function robotsFetcher(body: string) {
  const requested: string[] = [];
  return {
    requested,
    async fetch(request: FetchRequest) {
      requested.push(request.url);
      return body;
    },
  };
}

describe('isAllowedByRobots', () => {
  beforeEach(() => clearRobotsCache());

  it('follows the origin robots.txt', async () => {
    const fetcher = robotsFetcher(ROBOTS);
    assert.strictEqual(
      await isAllowedByRobots('https://quiz.example.test/kakomon.php', 'test-agent/1.0', fetcher),
      true,
    );
    assert.strictEqual(
      await isAllowedByRobots('https://quiz.example.test/private/a.php', 'test-agent/1.0', fetcher),
      false,
    );
    assert.strictEqual(
      await isAllowedByRobots('https://quiz.example.test/kakomon.php', 'blocked-bot', fetcher),
      false,
    );
    assert.deepStrictEqual(fetcher.requested, ['https://quiz.example.test/robots.txt']);
  });

  it('allows everything when robots.txt cannot be fetched', async () => {
    const fetcher = {
      async fetch(): Promise<string> {
        throw new Error('HTTP 404');
      },
    };
    assert.strictEqual(
      await isAllowedByRobots('https://quiz.example.test/private/a.php', 'test-agent/1.0', fetcher),
      true,
    );
  });

  it('treats an empty robots.txt as no restrictions', async () => {
    const fetcher = robotsFetcher('');
    assert.strictEqual(
      await isAllowedByRobots('https://quiz.example.test/private/a.php', 'test-agent/1.0', fetcher),
      true,
    );
  });
});
