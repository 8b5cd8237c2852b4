type ErrorKind = 'fatal' | 'retryable';

type RetryableCategory = 'network' | 'http' | 'rate-limit';

type FatalCategory =
  | 'auth'
  | 'invalid-request'
  | 'invalid-response'
  | 'configuration';

type RateLimitInfo = {
  limit: number;
  remaining: number;
  resetEpochSeconds: number;
};

type ProviderAttempt = {
  provider: string;
  error: unknown;
};

export type {
  ErrorKind,
  RetryableCategory,
  FatalCategory,
  RateLimitInfo,
  ProviderAttempt,
};
