import { describe, it, expect, vi } from 'vitest';
import { FatalError, RetryableProviderError } from '../errors/errors.js';
import type { AnalysisResult, ProviderHandle } from '../providers/types.js';
import { createRetryPolicy } from './backoff-policy.js';
import { RetryExecutor } from './retry-executor.js';
import { RetryingProvider } from './retrying-provider.js';

function makeResult(provider: string): AnalysisResult {
  return {
    content: 'diagnosis',
    inputTokens: 10,
    outputTokens: 5,
    model: 'test-model',
    provider,
  };
}

describe('RetryingProvider', () => {
  const policy = createRetryPolicy({ maxRetries: 2, jitter: false });

  function makeExecutor(delays: number[]): RetryExecutor {
    return new RetryExecutor({
      sleep: async (ms) => {
        delays.push(ms);
      },
    });
  }

  it('keeps the wrapped provider name', () => {
    const inner: ProviderHandle = { name: 'openai', analyze: vi.fn() };
    expect(new RetryingProvider(inner, policy).name).toBe('openai');
  });

  it('retries transient failures of the wrapped provider', async () => {
    const delays: number[] = [];
    const analyze = vi
      .fn()
      .mockRejectedValueOnce(new RetryableProviderError('http', 'HTTP 502'))
      .mockResolvedValueOnce(makeResult('openai'));
    const provider = new RetryingProvider(
      { name: 'openai', analyze },
      policy,
      makeExecutor(delays),
    );

    const result = await provider.analyze('system', 'user');

    expect(result.provider).toBe('openai');
    expect(analyze).toHaveBeenCalledTimes(2);
    expect(analyze).toHaveBeenLastCalledWith('system', 'user', undefined);
    expect(delays).toEqual([1000]);
  });

  it('surfaces the last retryable error once retries are exhausted', async () => {
    const delays: number[] = [];
    const last = new RetryableProviderError('rate-limit', 'HTTP 429 (third)');
    const analyze = vi
      .fn()
      .mockRejectedValueOnce(new RetryableProviderError('rate-limit', 'HTTP 429'))
      .mockRejectedValueOnce(new RetryableProviderError('rate-limit', 'HTTP 429'))
      .mockRejectedValueOnce(last);
    const provider = new RetryingProvider(
      { name: 'google', analyze },
      policy,
      makeExecutor(delays),
    );

    await expect(provider.analyze('', 'prompt')).rejects.toBe(last);
    expect(analyze).toHaveBeenCalledTimes(3);
    expect(delays).toEqual([1000, 2000]);
  });

  it('does not retry fatal errors', async () => {
    const delays: number[] = [];
    const fatal = new FatalError('invalid-request', 'prompt too long');
    const analyze = vi.fn().mockRejectedValue(fatal);
    const provider = new RetryingProvider(
      { name: 'anthropic', analyze },
      policy,
      makeExecutor(delays),
    );

    await expect(provider.analyze('', 'prompt')).rejects.toBe(fatal);
    expect(analyze).toHaveBeenCalledTimes(1);
    expect(delays).toEqual([]);
  });
});
