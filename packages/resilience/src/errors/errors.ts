import type {
  ErrorKind,
  FatalCategory,
  ProviderAttempt,
  RateLimitInfo,
  RetryableCategory,
} from './types.js';

type ClassifiedErrorOptions = {
  provider?: string;
  status?: number;
  cause?: unknown;
};

/**
 * Base for errors that carry an explicit retry classification. Provider
 * adapters translate their transport failures into one of the two subclasses
 * so that retry and fallback never inspect a client library's own errors.
 */
abstract class ClassifiedError extends Error {
  abstract readonly kind: ErrorKind;
  readonly provider: string | undefined;
  readonly status: number | undefined;

  constructor(message: string, options?: ClassifiedErrorOptions) {
    super(message, { cause: options?.cause });
    this.provider = options?.provider;
    this.status = options?.status;
  }
}

class RetryableProviderError extends ClassifiedError {
  readonly kind = 'retryable' as const;
  readonly category: RetryableCategory;

  constructor(
    category: RetryableCategory,
    message: string,
    options?: ClassifiedErrorOptions,
  ) {
    super(message, options);
    this.name = 'RetryableProviderError';
    this.category = category;
  }
}

class FatalError extends ClassifiedError {
  readonly kind = 'fatal' as const;
  readonly category: FatalCategory;

  constructor(
    category: FatalCategory,
    message: string,
    options?: ClassifiedErrorOptions,
  ) {
    super(message, options);
    this.name = 'FatalError';
    this.category = category;
  }
}

class RateLimitExceeded extends Error {
  readonly key: string;
  readonly info: RateLimitInfo;
  readonly retryAfterSeconds: number;

  constructor(key: string, info: RateLimitInfo, retryAfterSeconds: number) {
    super(
      `Rate limit of ${info.limit} requests per minute exceeded; retry after ${retryAfterSeconds}s`,
    );
    this.name = 'RateLimitExceeded';
    this.key = key;
    this.info = info;
    this.retryAfterSeconds = retryAfterSeconds;
  }
}

class AllProvidersFailed extends Error {
  readonly attempts: readonly ProviderAttempt[];

  constructor(attempts: readonly ProviderAttempt[]) {
    const summary = attempts
      .map((attempt) => `${attempt.provider}: ${describeError(attempt.error)}`)
      .join('; ');
    super(`All providers failed (${summary})`);
    this.name = 'AllProvidersFailed';
    this.attempts = Object.freeze([...attempts]);
  }
}

function errorKindOf(error: unknown): ErrorKind | undefined {
  return error instanceof ClassifiedError ? error.kind : undefined;
}

function isRetryableError(error: unknown): boolean {
  return errorKindOf(error) === 'retryable';
}

function describeError(error: unknown, maxLength = 200): string {
  const message = error instanceof Error ? error.message : String(error);

  if (message.length <= maxLength) {
    return message;
  }

  return `${message.slice(0, maxLength)}...`;
}

export {
  ClassifiedError,
  RetryableProviderError,
  FatalError,
  RateLimitExceeded,
  AllProvidersFailed,
  errorKindOf,
  isRetryableError,
  describeError,
};
export type { ClassifiedErrorOptions };
