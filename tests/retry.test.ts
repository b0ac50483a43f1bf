/**
 * Tests for Retry and Circuit Breaker logic
 */

import { TransientCommunicationError, isTransientError } from '../src/core/errors.js';
import { CircuitBreaker, CircuitOpenError, DEFAULT_RETRY_CONFIG, withRetry, type RetryLog } from '../src/utils/retry.js';

describe('Retry Logic', () => {
  let sleeps: number[];
  const sleep = async (ms: number) => {
    sleeps.push(ms);
  };

  beforeEach(() => {
    sleeps = [];
  });

  describe('withRetry - Success Cases', () => {
    it('should succeed on first attempt', async () => {
      const fn = jest.fn().mockResolvedValue('success');

      const result = await withRetry(fn, DEFAULT_RETRY_CONFIG, { sleep });

      expect(result).toBe('success');
      expect(fn).toHaveBeenCalledTimes(1);
      expect(sleeps).toEqual([]);
    });

    it('should retry on failure and eventually succeed', async () => {
      const fn = jest
        .fn()
        .mockRejectedValueOnce(new Error('Temporary failure'))
        .mockRejectedValueOnce(new Error('Temporary failure'))
        .mockResolvedValue('success');

      const result = await withRetry(fn, DEFAULT_RETRY_CONFIG, { sleep });

      expect(result).toBe('success');
      expect(fn).toHaveBeenCalledTimes(3);
      expect(fn.mock.calls.map((call) => call[0])).toEqual([1, 2, 3]);
    });
  });

  describe('withRetry - Failure Cases', () => {
    it('should rethrow the last error unchanged after max attempts', async () => {
      const failure = new Error('Always fails');
      const fn = jest.fn().mockRejectedValue(failure);

      await expect(withRetry(fn, { ...DEFAULT_RETRY_CONFIG, maxAttempts: 3 }, { sleep })).rejects.toBe(failure);
      expect(fn).toHaveBeenCalledTimes(3);
    });

    it('should not retry errors rejected by shouldRetry', async () => {
      const fn = jest.fn().mockRejectedValue(new Error('HTTP 401'));

      await expect(withRetry(fn, DEFAULT_RETRY_CONFIG, { sleep, shouldRetry: isTransientError })).rejects.toThrow(
        'HTTP 401'
      );
      expect(fn).toHaveBeenCalledTimes(1);
      expect(sleeps).toEqual([]);
    });

    it('should log retry attempts', async () => {
      const logs: RetryLog[] = [];
      const fn = jest.fn().mockRejectedValueOnce(new Error('Fail once')).mockResolvedValue('ok');

      await withRetry(fn, DEFAULT_RETRY_CONFIG, { sleep, onLog: (log) => logs.push(log) });

      expect(logs).toHaveLength(2);
      expect(logs[0]).toMatchObject({ attempt: 1, success: false, error: 'Fail once', nextRetryInMs: 1000 });
      expect(logs[1]).toMatchObject({ attempt: 2, success: true });
    });
  });

  describe('Exponential Backoff', () => {
    it('should double the delay up to the cap', async () => {
      const fn = jest.fn().mockRejectedValue(new TransientCommunicationError('HTTP 503'));
      const config = { maxAttempts: 5, initialDelayMs: 1000, maxDelayMs: 3000, multiplier: 2 };

      await expect(withRetry(fn, config, { sleep })).rejects.toBeInstanceOf(TransientCommunicationError);
      expect(sleeps).toEqual([1000, 2000, 3000, 3000]);
    });

    it('should keep a fixed interval with multiplier 1', async () => {
      const fn = jest.fn().mockRejectedValue(new Error('Fail'));
      const config = { maxAttempts: 3, initialDelayMs: 500, maxDelayMs: 5000, multiplier: 1 };

      await expect(withRetry(fn, config, { sleep })).rejects.toThrow('Fail');
      expect(sleeps).toEqual([500, 500]);
    });
  });
});

describe('Circuit Breaker', () => {
  let now: number;
  let breaker: CircuitBreaker;
  const fail = () => Promise.reject(new TransientCommunicationError('HTTP 503'));
  const succeed = () => Promise.resolve('ok');

  beforeEach(() => {
    now = 0;
    breaker = new CircuitBreaker(3, 1000, isTransientError, () => now);
  });

  async function trip() {
    for (let i = 0; i < 3; i++) {
      await expect(breaker.execute(fail)).rejects.toBeInstanceOf(TransientCommunicationError);
    }
  }

  describe('States', () => {
    it('should start in closed state', () => {
      expect(breaker.getState()).toBe('closed');
    });

    it('should open after failure threshold', async () => {
      await trip();

      expect(breaker.getState()).toBe('open');
    });

    it('should reject without calling through while open', async () => {
      await trip();
      now = 400;
      const fn = jest.fn().mockResolvedValue('ok');

      const error = await breaker.execute(fn).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(CircuitOpenError);
      expect(error).toMatchObject({ retryInMs: 600 });
      expect(fn).not.toHaveBeenCalled();
    });

    it('should transition to half-open after timeout', async () => {
      await trip();
      now = 1001;

      await breaker.execute(succeed);

      expect(breaker.getState()).toBe('half-open');
    });

    it('should close after two successes in half-open', async () => {
      await trip();
      now = 1001;

      await breaker.execute(succeed);
      await breaker.execute(succeed);

      expect(breaker.getState()).toBe('closed');
      expect(breaker.getStats().failureCount).toBe(0);
    });

    it('should reopen if it fails during half-open', async () => {
      await trip();
      now = 1001;

      await expect(breaker.execute(fail)).rejects.toBeInstanceOf(TransientCommunicationError);

      expect(breaker.getState()).toBe('open');
    });

    it('should ignore errors that do not count as failures', async () => {
      for (let i = 0; i < 5; i++) {
        await expect(breaker.execute(() => Promise.reject(new Error('HTTP 404')))).rejects.toThrow('HTTP 404');
      }

      expect(breaker.getState()).toBe('closed');
      expect(breaker.getStats().failureCount).toBe(0);
    });
  });

  describe('Statistics', () => {
    it('should track failures and the last failure time', async () => {
      now = 250;
      await trip();

      expect(breaker.getStats()).toEqual({
        state: 'open',
        failureCount: 3,
        lastFailureTime: new Date(250),
      });
    });

    it('should report no failure on a fresh breaker', () => {
      expect(breaker.getStats()).toEqual({ state: 'closed', failureCount: 0, lastFailureTime: null });
    });
  });
});
