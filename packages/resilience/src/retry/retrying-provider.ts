import type {
  AnalysisResult,
  ProviderCallOptions,
  ProviderHandle,
} from '../providers/types.js';
import { RetryExecutor } from './retry-executor.js';
import type { RetryPolicy } from './types.js';

/**
 * Retries transient faults of a single provider before the router sees the
 * failure, so fallback only happens once retries are used up.
 */
export class RetryingProvider implements ProviderHandle {
  private readonly inner: ProviderHandle;
  private readonly policy: RetryPolicy;
  private readonly executor: RetryExecutor;

  constructor(
    inner: ProviderHandle,
    policy: RetryPolicy,
    executor?: RetryExecutor,
  ) {
    this.inner = inner;
    this.policy = policy;
    this.executor = executor ?? new RetryExecutor();
  }

  get name(): string {
    return this.inner.name;
  }

  analyze(
    systemPrompt: string,
    userPrompt: string,
    options?: ProviderCallOptions,
  ): Promise<AnalysisResult> {
    return this.executor.execute(
      () => this.inner.analyze(systemPrompt, userPrompt, options),
      this.policy,
      { signal: options?.signal, label: `${this.inner.name}.analyze` },
    );
  }
}
