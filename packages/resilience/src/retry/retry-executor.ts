import { createLogger, type Logger } from '@workspace/logger';
import { describeError } from '../errors/errors.js';
import { sleep as defaultSleep } from '../utils/sleep.js';
import { computeBackoffDelay } from './backoff-policy.js';
import type {
  ExecuteOptions,
  RandomFn,
  RetryEvent,
  RetryPolicy,
  SleepFn,
} from './types.js';

type RetryExecutorOptions = {
  sleep?: SleepFn;
  random?: RandomFn;
  logger?: Logger;
  onRetry?: (event: RetryEvent) => void;
};

/**
 * Runs an idempotent async operation, retrying failures the policy classifies
 * as retryable. Anything else is re-thrown on the first attempt; after
 * `maxRetries` retries the last error is re-thrown as is.
 */
export class RetryExecutor {
  private readonly sleep: SleepFn;
  private readonly random: RandomFn;
  private readonly logger: Logger;
  private readonly onRetry: ((event: RetryEvent) => void) | undefined;

  constructor(options?: RetryExecutorOptions) {
    this.sleep = options?.sleep ?? defaultSleep;
    this.random = options?.random ?? Math.random;
    this.logger = options?.logger ?? createLogger('retry');
    this.onRetry = options?.onRetry;
  }

  async execute<T>(
    operation: () => Promise<T>,
    policy: RetryPolicy,
    options?: ExecuteOptions,
  ): Promise<T> {
    const signal = options?.signal;
    const label = options?.label ?? 'operation';

    for (let attempt = 0; ; attempt++) {
      signal?.throwIfAborted();

      try {
        return await operation();
      } catch (error) {
        if (!policy.isRetryable(error)) {
          throw error;
        }

        if (attempt >= policy.maxRetries) {
          this.logger.error('Retries exhausted', {
            label,
            attempts: attempt + 1,
            maxRetries: policy.maxRetries,
            error: describeError(error),
          });
          throw error;
        }

        const delayMs = computeBackoffDelay(attempt, policy, this.random);

        this.logger.warn('Retrying after failure', {
          label,
          attempt: attempt + 1,
          maxRetries: policy.maxRetries,
          delayMs: Math.round(delayMs),
          error: describeError(error),
        });
        this.onRetry?.({
          label,
          attempt: attempt + 1,
          maxRetries: policy.maxRetries,
          delayMs,
          error,
        });

        await this.sleep(delayMs, signal);
      }
    }
  }
}

export type { RetryExecutorOptions };
