import type { RateLimitInfo } from '../errors/types.js';

type CallerKey = string;

type Clock = {
  now: () => number;
};

type AdmissionResult =
  | { allowed: true; info: RateLimitInfo }
  | { allowed: false; info: RateLimitInfo; retryAfterSeconds: number };

type SlidingWindowLimiterConfig = {
  requestsPerMinute: number;
  windowMs: number;
};

type AdmitOptions = {
  signal?: AbortSignal;
};

const systemClock: Clock = {
  now: () => Date.now(),
};

const DEFAULT_LIMITER_CONFIG: SlidingWindowLimiterConfig = {
  requestsPerMinute: 60,
  windowMs: 60_000,
};

export type {
  CallerKey,
  Clock,
  AdmissionResult,
  SlidingWindowLimiterConfig,
  AdmitOptions,
  RateLimitInfo,
};
export { systemClock, DEFAULT_LIMITER_CONFIG };
