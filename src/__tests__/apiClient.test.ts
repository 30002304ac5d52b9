/**
 * GitHub Client Tests
 *
 * Tests quota waits, status handling and network retries.
 */

import { describe, it, expect, beforeEach, afterEach, jest } from '@jest/globals';
import { parseLastPage } from '../apiClient';
import { QuotaExhaustedError, TransientNetworkError } from '../errors';
import { FakeClock, FakeGitHub, NETWORK_ERROR, createTestClient, lastPageLink, silenceConsole } from './helpers/fakeGitHub';

describe('GitHubClient', () => {
  let fake: FakeGitHub;
  let clock: FakeClock;

  beforeEach(() => {
    fake = new FakeGitHub();
    clock = new FakeClock();
    silenceConsole();
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('request', () => {
    it('sends the bearer token', async () => {
      fake.on('/rate_limit', () => ({ data: {} }));
      const client = createTestClient(fake, clock);

      await client.request('/rate_limit');

      expect(fake.requests[0].authorization).toBe('Bearer test-token');
    });

    it('waits until the quota resets plus the margin, then retries', async () => {
      const reset = clock.nowSeconds + 5;
      let calls = 0;
      fake.on('/repos/o/r/commits', () => {
        calls++;
        if (calls === 1) {
          return {
            status: 403,
            data: { message: 'API rate limit exceeded' },
            headers: { 'x-ratelimit-remaining': '0', 'x-ratelimit-reset': String(reset) },
          };
        }
        return { data: [], headers: { 'x-ratelimit-remaining': '4999', 'x-ratelimit-reset': String(reset + 3600) } };
      });
      const client = createTestClient(fake, clock);

      const response = await client.request('/repos/o/r/commits');

      expect(response.status).toBe(200);
      expect(clock.sleeps).toEqual([15_000]);
      expect(fake.requests).toHaveLength(2);
      expect(client.rateBudget.get('core')?.remaining).toBe(4999);
    });

    it('sleeps in one-minute slices for waits longer than five minutes', async () => {
      const reset = clock.nowSeconds + 600;
      let calls = 0;
      fake.on('/search/repositories', () => {
        calls++;
        return calls === 1
          ? { status: 403, headers: { 'x-ratelimit-remaining': '0', 'x-ratelimit-reset': String(reset) } }
          : { data: { total_count: 0, items: [] } };
      });
      const client = createTestClient(fake, clock);

      await client.request('/search/repositories', { q: 'x' }, 'search');

      expect(clock.sleeps).toHaveLength(11);
      expect(clock.sleeps.slice(0, 10).every((ms) => ms === 60_000)).toBe(true);
      expect(clock.sleeps[10]).toBe(10_000);
    });

    it('gives up after the configured number of quota waits', async () => {
      const reset = clock.nowSeconds + 1;
      fake.on('/repos/o/r/commits', () => ({
        status: 403,
        headers: { 'x-ratelimit-remaining': '0', 'x-ratelimit-reset': String(reset) },
      }));
      const client = createTestClient(fake, clock, { maxQuotaWaits: 2 });

      await expect(client.request('/repos/o/r/commits')).rejects.toBeInstanceOf(QuotaExhaustedError);
      expect(fake.requests).toHaveLength(3);
      expect(clock.sleeps).toEqual([11_000, 10_000]);
    });

    it('returns a forbidden response without retrying', async () => {
      fake.on('/repos/o/private', () => ({
        status: 403,
        data: { message: 'Must have admin rights' },
        headers: { 'x-ratelimit-remaining': '4000' },
      }));
      const client = createTestClient(fake, clock);

      const response = await client.request('/repos/o/private');

      expect(response.status).toBe(403);
      expect(fake.requests).toHaveLength(1);
      expect(clock.sleeps).toEqual([]);
    });

    it('does not wait on a 403 with zero remaining but no reset time', async () => {
      fake.on('/repos/o/r', () => ({ status: 403, headers: { 'x-ratelimit-remaining': '0' } }));
      const client = createTestClient(fake, clock);

      const response = await client.request('/repos/o/r');

      expect(response.status).toBe(403);
      expect(fake.requests).toHaveLength(1);
      expect(clock.sleeps).toEqual([]);
    });

    it('returns 422 and other error statuses to the caller', async () => {
      fake.on('/search/repositories', () => ({ status: 422, data: { message: 'Validation Failed' } }));
      fake.on('/repos/o/r', () => ({ status: 500, data: 'boom' }));
      const client = createTestClient(fake, clock);

      expect((await client.request('/search/repositories', {}, 'search')).status).toBe(422);
      expect((await client.request('/repos/o/r')).status).toBe(500);
      expect(fake.requests).toHaveLength(2);
    });

    it('retries network failures with exponential backoff', async () => {
      let calls = 0;
      fake.on('/repos/o/r', () => {
        calls++;
        return calls < 3 ? NETWORK_ERROR : { data: { id: 1 } };
      });
      const client = createTestClient(fake, clock, { maxNetworkRetries: 3 });

      const response = await client.request('/repos/o/r');

      expect(response.status).toBe(200);
      expect(clock.sleeps).toEqual([100, 200]);
    });

    it('raises a transient network error once retries are spent', async () => {
      fake.on('/repos/o/r', () => NETWORK_ERROR);
      const client = createTestClient(fake, clock, { maxNetworkRetries: 2 });

      await expect(client.request('/repos/o/r')).rejects.toBeInstanceOf(TransientNetworkError);
      expect(fake.requests).toHaveLength(3);
      expect(clock.sleeps).toEqual([100, 200]);
    });

    it('records the budget under the request limit class only', async () => {
      fake.on('/search/repositories', () => ({
        data: { total_count: 0, items: [] },
        headers: { 'x-ratelimit-remaining': '29', 'x-ratelimit-reset': '1700000060' },
      }));
      const client = createTestClient(fake, clock);

      await client.request('/search/repositories', { q: 'x' }, 'search');

      expect(client.rateBudget.get('search')).toEqual({
        remaining: 29,
        resetAt: 1_700_000_060,
        observedAt: clock.now,
      });
      expect(client.rateBudget.get('core')).toBeUndefined();
    });

    it('waits before sending when the recorded budget is already spent', async () => {
      const reset = clock.nowSeconds + 30;
      fake.on('/repos/o/r', () => ({
        data: {},
        headers: { 'x-ratelimit-remaining': '0', 'x-ratelimit-reset': String(reset) },
      }));
      const client = createTestClient(fake, clock);

      await client.request('/repos/o/r');
      expect(clock.sleeps).toEqual([]);

      await client.request('/repos/o/r');
      expect(clock.sleeps).toEqual([40_000]);
      expect(fake.requests).toHaveLength(2);
    });
  });

  describe('getCommitCount', () => {
    it('reads the total from the last-page link', async () => {
      fake.on('/repos/o/r/commits', () => ({
        data: [{ sha: 'a' }],
        headers: lastPageLink('/repositories/1/commits', 1542),
      }));
      const client = createTestClient(fake, clock);

      expect(await client.getCommitCount('o', 'r')).toBe(1542);
      expect(fake.requests[0].params).toEqual({ per_page: 1 });
    });

    it('falls back to the page length without a link header', async () => {
      fake.on('/repos/o/r/commits', () => ({ data: [{ sha: 'a' }] }));
      const client = createTestClient(fake, clock);

      expect(await client.getCommitCount('o', 'r')).toBe(1);
    });

    it('returns zero for an empty repository', async () => {
      fake.on('/repos/o/r/commits', () => ({ status: 409, data: { message: 'Git Repository is empty.' } }));
      const client = createTestClient(fake, clock);

      expect(await client.getCommitCount('o', 'r')).toBe(0);
    });
  });

  describe('getUserLocation', () => {
    it('returns the trimmed profile location', async () => {
      fake.on('/users/alice', () => ({ data: { login: 'alice', location: '  Berlin ' } }));
      const client = createTestClient(fake, clock);

      expect(await client.getUserLocation('alice')).toBe('Berlin');
    });

    it('returns null for an empty or missing location', async () => {
      fake.on('/users/bob', () => ({ data: { login: 'bob', location: null } }));
      fake.on('/users/carol', () => ({ data: { login: 'carol', location: '   ' } }));
      const client = createTestClient(fake, clock);

      expect(await client.getUserLocation('bob')).toBeNull();
      expect(await client.getUserLocation('carol')).toBeNull();
    });

    it('returns Unknown when the profile cannot be fetched', async () => {
      const client = createTestClient(fake, clock);

      expect(await client.getUserLocation('ghost')).toBe('Unknown');
    });
  });
});

describe('parseLastPage', () => {
  it('extracts the last page number', () => {
    expect(parseLastPage('<https://api.github.com/x?page=2>; rel="next", <https://api.github.com/x?page=7>; rel="last"')).toBe(7);
  });

  it('returns null without a last relation', () => {
    expect(parseLastPage('<https://api.github.com/x?page=2>; rel="next"')).toBeNull();
    expect(parseLastPage(undefined)).toBeNull();
  });
});
