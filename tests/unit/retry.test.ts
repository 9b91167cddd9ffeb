import { describe, it, expect, vi } from 'vitest';
import { RetryError, isAuthError, isRetryable, withRetry } from '../../src/core/cluster/retry.js';
import { captureLogger } from '../fixtures/logger.js';

const transient = (): Error =>
  Object.assign(new Error('Connection error: connect ECONNREFUSED'), { name: 'KafkaJSConnectionError', retriable: true });

describe('isRetryable', () => {
  it('follows the kafkajs retriable flag', () => {
    expect(isRetryable(transient())).toBe(true);
    expect(isRetryable(Object.assign(new Error('bad request'), { retriable: false }))).toBe(false);
  });

  it('looks through the wrapper kafkajs puts around its last attempt', () => {
    const wrapped = Object.assign(new Error('Number of retries exceeded'), {
      name: 'KafkaJSNumberOfRetriesExceeded',
      retriable: false,
      originalError: transient(),
    });
    expect(isRetryable(wrapped)).toBe(true);
  });

  it('retries transient socket errors', () => {
    expect(isRetryable(Object.assign(new Error('socket hang up'), { code: 'ECONNRESET' }))).toBe(true);
    expect(isRetryable(new Error('boom'))).toBe(false);
  });

  it('never retries auth failures', () => {
    const denied = Object.assign(new Error('denied'), { type: 'TOPIC_AUTHORIZATION_FAILED', retriable: true });
    expect(isAuthError(denied)).toBe(true);
    expect(isRetryable(denied)).toBe(false);
  });
});

describe('withRetry', () => {
  it('returns once an attempt succeeds', async () => {
    const sleep = vi.fn<(ms: number) => Promise<void>>().mockResolvedValue(undefined);
    const fn = vi.fn<() => Promise<string>>()
      .mockRejectedValueOnce(transient())
      .mockRejectedValueOnce(transient())
      .mockResolvedValue('ok');

    await expect(withRetry('list topics', fn, { sleep })).resolves.toBe('ok');
    expect(fn).toHaveBeenCalledTimes(3);
    expect(sleep.mock.calls.map((call) => call[0])).toEqual([500, 1000]);
  });

  it('rethrows a non-retryable error untouched', async () => {
    const failure = new Error('invalid request');
    const fn = vi.fn<() => Promise<void>>().mockRejectedValue(failure);

    await expect(withRetry('list topics', fn, { sleep: async () => {} })).rejects.toBe(failure);
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('gives up after the last attempt', async () => {
    const fn = vi.fn<() => Promise<void>>().mockRejectedValue(transient());

    const attempt = withRetry('connect', fn, { maxRetries: 2, sleep: async () => {} });

    await expect(attempt).rejects.toBeInstanceOf(RetryError);
    await expect(attempt).rejects.toThrow('connect: 3 attempts exhausted: Connection error: connect ECONNREFUSED');
    expect(fn).toHaveBeenCalledTimes(3);
  });

  it('doubles the backoff up to the cap', async () => {
    const delays: number[] = [];
    const fn = vi.fn<() => Promise<void>>().mockRejectedValue(transient());

    await expect(
      withRetry('connect', fn, {
        maxRetries: 4,
        initialBackoffMs: 500,
        maxBackoffMs: 1500,
        sleep: async (ms) => {
          delays.push(ms);
        },
      }),
    ).rejects.toBeInstanceOf(RetryError);
    expect(delays).toEqual([500, 1000, 1500, 1500]);
  });

  it('stops when the signal is already aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    const fn = vi.fn<() => Promise<void>>().mockRejectedValue(transient());

    await expect(withRetry('connect', fn, { signal: controller.signal, sleep: async () => {} })).rejects.toThrow(
      'connect: aborted (last error: Connection error: connect ECONNREFUSED)',
    );
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('stops when the wait is interrupted', async () => {
    const fn = vi.fn<() => Promise<void>>().mockRejectedValue(transient());
    const sleep = async (): Promise<void> => {
      throw new Error('interrupted');
    };

    await expect(withRetry('connect', fn, { sleep })).rejects.toThrow(
      'connect: aborted (last error: Connection error: connect ECONNREFUSED)',
    );
  });

  it('logs each retry at warn', async () => {
    const log = captureLogger();
    const fn = vi.fn<() => Promise<number>>().mockRejectedValueOnce(transient()).mockResolvedValue(1);

    await withRetry('describe cluster', fn, { logger: log.logger, sleep: async () => {} });

    expect(log.entries()).toEqual([
      expect.objectContaining({
        level: 40,
        msg: 'retrying after transient error',
        operation: 'describe cluster',
        attempt: 1,
        maxAttempts: 4,
        backoffMs: 500,
        err: 'Connection error: connect ECONNREFUSED',
      }),
    ]);
  });
});
