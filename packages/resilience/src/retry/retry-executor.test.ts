import { describe, it, expect, vi } from 'vitest';
import type { Logger } from '@workspace/logger';
import { FatalError, RetryableProviderError } from '../errors/errors.js';
import { createRetryPolicy } from './backoff-policy.js';
import { RetryExecutor } from './retry-executor.js';
import type { RetryEvent, SleepFn } from './types.js';

function makeLogger(): Logger {
  const logger: Logger = {
    fatal: vi.fn(),
    error: vi.fn(),
    warn: vi.fn(),
    info: vi.fn(),
    debug: vi.fn(),
    trace: vi.fn(),
    child: () => logger,
  };
  return logger;
}

function makeExecutor(options?: { random?: () => number }) {
  const delays: number[] = [];
  const sleep: SleepFn = async (ms) => {
    delays.push(ms);
  };
  const events: RetryEvent[] = [];
  const logger = makeLogger();
  const executor = new RetryExecutor({
    sleep,
    logger,
    random: options?.random,
    onRetry: (event) => events.push(event),
  });

  return { executor, delays, events, logger };
}

describe('RetryExecutor', () => {
  const policy = createRetryPolicy({
    maxRetries: 3,
    baseDelayMs: 1000,
    jitter: false,
  });

  it('returns the first success without sleeping', async () => {
    const { executor, delays } = makeExecutor();
    const operation = vi.fn().mockResolvedValue('ok');

    await expect(executor.execute(operation, policy)).resolves.toBe('ok');
    expect(operation).toHaveBeenCalledTimes(1);
    expect(delays).toEqual([]);
  });

  it('makes 4 attempts with 1s, 2s, 4s delays then re-throws the last error', async () => {
    const { executor, delays, logger } = makeExecutor();
    const errors = [1, 2, 3, 4].map(
      (index) => new RetryableProviderError('network', `failure ${index}`),
    );
    let calls = 0;
    const operation = vi.fn(async () => {
      const error = errors[calls];
      calls += 1;
      throw error;
    });

    await expect(executor.execute(operation, policy)).rejects.toBe(errors[3]);
    expect(operation).toHaveBeenCalledTimes(4);
    expect(delays).toEqual([1000, 2000, 4000]);
    expect(logger.warn).toHaveBeenCalledTimes(3);
    expect(logger.error).toHaveBeenCalledWith('Retries exhausted', {
      label: 'operation',
      attempts: 4,
      maxRetries: 3,
      error: 'failure 4',
    });
  });

  it('propagates a non-retryable error after exactly one attempt', async () => {
    const { executor, delays } = makeExecutor();
    const fatal = new FatalError('auth', 'invalid key');
    const operation = vi.fn().mockRejectedValue(fatal);

    await expect(executor.execute(operation, policy)).rejects.toBe(fatal);
    expect(operation).toHaveBeenCalledTimes(1);
    expect(delays).toEqual([]);
  });

  it('treats unclassified errors as non-retryable by default', async () => {
    const { executor } = makeExecutor();
    const operation = vi.fn().mockRejectedValue(new TypeError('bug'));

    await expect(executor.execute(operation, policy)).rejects.toThrow(TypeError);
    expect(operation).toHaveBeenCalledTimes(1);
  });

  it('recovers when a later attempt succeeds', async () => {
    const { executor, delays, events } = makeExecutor();
    const operation = vi
      .fn()
      .mockRejectedValueOnce(new RetryableProviderError('http', 'HTTP 503'))
      .mockRejectedValueOnce(new RetryableProviderError('rate-limit', 'HTTP 429'))
      .mockResolvedValueOnce('third time');

    await expect(
      executor.execute(operation, policy, { label: 'anthropic.analyze' }),
    ).resolves.toBe('third time');
    expect(delays).toEqual([1000, 2000]);
    expect(events.map((event) => [event.label, event.attempt])).toEqual([
      ['anthropic.analyze', 1],
      ['anthropic.analyze', 2],
    ]);
  });

  it('uses the policy predicate for classification', async () => {
    const { executor } = makeExecutor();
    const retryEverything = createRetryPolicy({
      maxRetries: 1,
      jitter: false,
      isRetryable: () => true,
    });
    const operation = vi
      .fn()
      .mockRejectedValueOnce(new Error('flaky'))
      .mockResolvedValueOnce(7);

    await expect(executor.execute(operation, retryEverything)).resolves.toBe(7);
    expect(operation).toHaveBeenCalledTimes(2);
  });

  it('caps delays at maxDelayMs', async () => {
    const { executor, delays } = makeExecutor();
    const capped = createRetryPolicy({
      maxRetries: 4,
      baseDelayMs: 1000,
      maxDelayMs: 3000,
      jitter: false,
    });
    const operation = vi
      .fn()
      .mockRejectedValue(new RetryableProviderError('network', 'down'));

    await expect(executor.execute(operation, capped)).rejects.toThrow('down');
    expect(delays).toEqual([1000, 2000, 3000, 3000]);
  });

  it('applies jitter from the injected random source', async () => {
    const { executor, delays } = makeExecutor({ random: () => 1 });
    const jittered = createRetryPolicy({ maxRetries: 2, jitter: true });
    const operation = vi
      .fn()
      .mockRejectedValue(new RetryableProviderError('network', 'down'));

    await expect(executor.execute(operation, jittered)).rejects.toThrow('down');
    expect(delays).toEqual([1500, 3000]);
  });

  it('stops retrying when cancelled during the backoff sleep', async () => {
    const controller = new AbortController();
    const cancellation = new Error('request cancelled');
    const sleep: SleepFn = async () => {
      controller.abort(cancellation);
      throw cancellation;
    };
    const executor = new RetryExecutor({ sleep, logger: makeLogger() });
    const operation = vi
      .fn()
      .mockRejectedValue(new RetryableProviderError('network', 'down'));

    await expect(
      executor.execute(operation, policy, { signal: controller.signal }),
    ).rejects.toBe(cancellation);
    expect(operation).toHaveBeenCalledTimes(1);
  });

  it('does not start when the signal is already aborted', async () => {
    const { executor } = makeExecutor();
    const controller = new AbortController();
    controller.abort(new Error('already gone'));
    const operation = vi.fn().mockResolvedValue('never');

    await expect(
      executor.execute(operation, policy, { signal: controller.signal }),
    ).rejects.toThrow('already gone');
    expect(operation).not.toHaveBeenCalled();
  });
});
