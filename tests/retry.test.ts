/**
 * Tests for retry with exponential backoff
 */

import { withRetry, DEFAULT_RETRY_CONFIG, isRetryableError, RetryLog } from '../src/utils/retry.js';

const FAST = {
  ...DEFAULT_RETRY_CONFIG,
  initialDelayMs: 10,
  maxDelayMs: 20,
};

describe('Retry Logic', () => {
  describe('withRetry - Success Cases', () => {
    it('should succeed on first attempt', async () => {
      const fn = jest.fn().mockResolvedValue('success');
      const result = await withRetry(fn);

      expect(result).toBe('success');
      expect(fn).toHaveBeenCalledTimes(1);
    });

    it('should retry on failure and eventually succeed', async () => {
      let attempts = 0;
      const fn = jest.fn().mockImplementation(() => {
        attempts++;
        if (attempts < 3) {
          return Promise.reject(new Error('Temporary failure'));
        }
        return Promise.resolve('success');
      });

      const result = await withRetry(fn, FAST);
      expect(result).toBe('success');
      expect(attempts).toBe(3);
    });
  });

  describe('withRetry - Failure Cases', () => {
    it('should throw after max attempts', async () => {
      const fn = jest.fn().mockRejectedValue(new Error('Always fails'));

      await expect(withRetry(fn, { ...FAST, maxAttempts: 3 })).rejects.toThrow(
        'Failed after 3 attempts. Last error: Always fails'
      );

      expect(fn).toHaveBeenCalledTimes(3);
    });

    it('should rethrow non-retryable errors without another attempt', async () => {
      const fn = jest.fn().mockRejectedValue(new Error('UNIQUE constraint failed'));

      await expect(withRetry(fn, FAST, { shouldRetry: isRetryableError })).rejects.toThrow(
        'UNIQUE constraint failed'
      );
      expect(fn).toHaveBeenCalledTimes(1);
    });

    it('should log retry attempts', async () => {
      const logs: RetryLog[] = [];
      const fn = jest
        .fn()
        .mockRejectedValueOnce(new Error('Fail 1'))
        .mockRejectedValueOnce(new Error('Fail 2'))
        .mockResolvedValueOnce('success');

      await withRetry(fn, FAST, { onLog: (log) => logs.push(log) });

      expect(logs.map((log) => [log.attempt, log.success, log.error, log.nextRetryInMs])).toEqual([
        [1, false, 'Fail 1', 10],
        [2, false, 'Fail 2', 20],
        [3, true, undefined, undefined],
      ]);
    });
  });

  describe('Exponential Backoff', () => {
    it('should wait between attempts', async () => {
      const startTime = Date.now();
      const fn = jest
        .fn()
        .mockRejectedValueOnce(new Error('Fail'))
        .mockResolvedValueOnce('success');

      await withRetry(fn, {
        maxAttempts: 2,
        initialDelayMs: 100,
        maxDelayMs: 1000,
        multiplier: 2,
        timeoutMs: 30000,
      });

      const duration = Date.now() - startTime;
      // Should have at least 100ms delay
      expect(duration).toBeGreaterThanOrEqual(90);
    });
  });

  describe('Timeout Handling', () => {
    it('should timeout if function takes too long', async () => {
      const fn = jest.fn(
        () =>
          new Promise((resolve) => {
            setTimeout(() => resolve('slow'), 300);
          })
      );

      await expect(
        withRetry(fn, {
          maxAttempts: 1,
          initialDelayMs: 100,
          maxDelayMs: 100,
          multiplier: 1,
          timeoutMs: 50,
        })
      ).rejects.toThrow('Timeout after 50ms');
    });
  });
});

describe('isRetryableError', () => {
  it('should retry busy databases and dropped connections', () => {
    expect(isRetryableError(new Error('database is locked'))).toBe(true);
    expect(isRetryableError(Object.assign(new Error('busy'), { code: 'SQLITE_BUSY' }))).toBe(true);
    expect(isRetryableError(new Error('connect ECONNREFUSED 127.0.0.1:5432'))).toBe(true);
    expect(isRetryableError('socket hang up')).toBe(true);
  });

  it('should not retry other errors', () => {
    expect(isRetryableError(new Error('no such table: eval_results'))).toBe(false);
    expect(isRetryableError(new Error('UNIQUE constraint failed'))).toBe(false);
  });
});
