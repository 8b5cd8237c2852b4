type RetryPolicy = {
  readonly maxRetries: number;
  readonly baseDelayMs: number;
  readonly maxDelayMs: number;
  readonly jitter: boolean;
  readonly isRetryable: (error: unknown) => boolean;
};

type SleepFn = (ms: number, signal?: AbortSignal) => Promise<void>;

type RandomFn = () => number;

type RetryEvent = {
  label: string;
  attempt: number;
  maxRetries: number;
  delayMs: number;
  error: unknown;
};

type ExecuteOptions = {
  signal?: AbortSignal;
  label?: string;
};

export type { RetryPolicy, SleepFn, RandomFn, RetryEvent, ExecuteOptions };
