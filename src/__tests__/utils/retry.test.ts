/**
 * Retry Tests
 *
 * Tests exponential backoff.
 */

import { describe, it, expect, beforeEach, afterEach, jest } from '@jest/globals';
import { withRetry } from '../../utils';
import { silenceConsole } from '../helpers/fakeGitHub';

describe('withRetry', () => {
  let delays: number[];
  const recordSleep = async (ms: number): Promise<void> => {
    delays.push(ms);
  };

  beforeEach(() => {
    delays = [];
    silenceConsole();
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('retries with exponential backoff until the call succeeds', async () => {
    let calls = 0;
    const result = await withRetry(
      async () => {
        calls++;
        if (calls < 3) throw new Error('flaky');
        return 'ok';
      },
      5,
      10,
      { sleep: recordSleep }
    );

    expect(result).toBe('ok');
    expect(calls).toBe(3);
    expect(delays).toEqual([10, 20]);
  });

  it('rethrows at once when the error is not retryable', async () => {
    let calls = 0;
    const fatal = new Error('fatal');

    await expect(
      withRetry(
        async () => {
          calls++;
          throw fatal;
        },
        5,
        10,
        { sleep: recordSleep, shouldRetry: () => false }
      )
    ).rejects.toBe(fatal);
    expect(calls).toBe(1);
    expect(delays).toEqual([]);
  });

  it('throws the last error once retries are spent', async () => {
    let calls = 0;

    await expect(
      withRetry(
        async () => {
          calls++;
          throw new Error(`failure ${calls}`);
        },
        2,
        10,
        { sleep: recordSleep }
      )
    ).rejects.toThrow('failure 3');
    expect(calls).toBe(3);
    expect(delays).toEqual([10, 20]);
  });
});
