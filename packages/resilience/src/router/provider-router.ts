import { createLogger, type Logger } from '@workspace/logger';
import {
  AllProvidersFailed,
  FatalError,
  RetryableProviderError,
  describeError,
} from '../errors/errors.js';
import type { ProviderAttempt, RetryableCategory } from '../errors/types.js';
import type { ResilienceMetrics } from '../observability/metrics.js';
import type {
  AnalysisResult,
  ProviderCallOptions,
  ProviderHandle,
} from '../providers/types.js';

const RECOVERABLE_CATEGORIES: ReadonlySet<RetryableCategory> = new Set([
  'network',
  'http',
  'rate-limit',
]);

function isRecoverableError(error: unknown): boolean {
  return (
    error instanceof RetryableProviderError &&
    RECOVERABLE_CATEGORIES.has(error.category)
  );
}

type ProviderRouterOptions = {
  isRecoverable?: (error: unknown) => boolean;
  logger?: Logger;
  metrics?: ResilienceMetrics;
};

/**
 * Tries providers strictly in order and returns the first success. Only
 * recoverable failures move on to the next provider; anything else is
 * re-thrown at once. The router never retries a provider itself: wrap a
 * provider in `RetryingProvider` for that.
 */
export class ProviderRouter {
  private readonly chain: readonly ProviderHandle[];
  private readonly isRecoverable: (error: unknown) => boolean;
  private readonly logger: Logger;
  private readonly metrics: ResilienceMetrics | undefined;

  constructor(providers: readonly ProviderHandle[], options?: ProviderRouterOptions) {
    if (providers.length === 0) {
      throw new FatalError('configuration', 'At least one provider is required');
    }

    this.chain = Object.freeze([...providers]);
    this.isRecoverable = options?.isRecoverable ?? isRecoverableError;
    this.logger = options?.logger ?? createLogger('provider-router');
    this.metrics = options?.metrics;
  }

  get providers(): readonly ProviderHandle[] {
    return this.chain;
  }

  async analyze(
    userPrompt: string,
    systemPrompt = '',
    options?: ProviderCallOptions,
  ): Promise<AnalysisResult> {
    const attempts: ProviderAttempt[] = [];

    for (const [index, provider] of this.chain.entries()) {
      options?.signal?.throwIfAborted();

      this.logger.debug('Trying provider', { provider: provider.name });
      this.metrics?.increment('router.attempts');
      const startTime = performance.now();

      try {
        const result = await provider.analyze(systemPrompt, userPrompt, options);

        this.metrics?.recordDuration(
          `provider.${provider.name}`,
          performance.now() - startTime,
        );
        this.metrics?.increment('router.success');
        this.logger.info('Provider succeeded', {
          provider: provider.name,
          inputTokens: result.inputTokens,
          outputTokens: result.outputTokens,
        });

        return result;
      } catch (error) {
        if (!this.isRecoverable(error)) {
          throw error;
        }

        attempts.push({ provider: provider.name, error });

        const next = this.chain[index + 1];
        if (next) {
          this.metrics?.increment('router.fallbacks');
          this.logger.warn('Provider failed, falling back', {
            failedProvider: provider.name,
            nextProvider: next.name,
            error: describeError(error),
          });
        }
      }
    }

    this.metrics?.increment('router.exhausted');
    this.logger.error('All providers failed', {
      providers: attempts.map((attempt) => attempt.provider),
      lastError: describeError(attempts[attempts.length - 1]?.error),
    });

    throw new AllProvidersFailed(attempts);
  }
}

export { RECOVERABLE_CATEGORIES, isRecoverableError };
export type { ProviderRouterOptions };
