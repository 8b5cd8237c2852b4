export {
  SlidingWindowLimiter,
  type SlidingWindowLimiterOptions,
} from './rate-limit/sliding-window-limiter.js';
export { AsyncLock } from './rate-limit/async-lock.js';
export {
  DEFAULT_LIMITER_CONFIG,
  systemClock,
  type AdmissionResult,
  type AdmitOptions,
  type CallerKey,
  type Clock,
  type SlidingWindowLimiterConfig,
} from './rate-limit/types.js';
export {
  RetryExecutor,
  type RetryExecutorOptions,
} from './retry/retry-executor.js';
export {
  DEFAULT_RETRY_POLICY,
  computeBackoffDelay,
  createRetryPolicy,
  worstCaseDelayMs,
} from './retry/backoff-policy.js';
export { RetryingProvider } from './retry/retrying-provider.js';
export type {
  ExecuteOptions,
  RandomFn,
  RetryEvent,
  RetryPolicy,
  SleepFn,
} from './retry/types.js';
export {
  ProviderRouter,
  RECOVERABLE_CATEGORIES,
  isRecoverableError,
  type ProviderRouterOptions,
} from './router/provider-router.js';
export {
  AllProvidersFailed,
  ClassifiedError,
  FatalError,
  RateLimitExceeded,
  RetryableProviderError,
  describeError,
  errorKindOf,
  isRetryableError,
  type ClassifiedErrorOptions,
} from './errors/errors.js';
export type {
  ErrorKind,
  FatalCategory,
  ProviderAttempt,
  RateLimitInfo,
  RetryableCategory,
} from './errors/types.js';
export type {
  AnalysisResult,
  ProviderCallOptions,
  ProviderHandle,
  ProviderName,
} from './providers/types.js';
export {
  HttpProvider,
  type HttpProviderConfig,
  type ProviderRequest,
} from './providers/http-provider.js';
export { AnthropicProvider } from './providers/anthropic-provider.js';
export { OpenAiProvider } from './providers/openai-provider.js';
export { GeminiProvider } from './providers/gemini-provider.js';
export {
  PROVIDER_DEFAULTS,
  createProvider,
  createProviderChain,
} from './providers/provider-factory.js';
export {
  MODEL_PRICING,
  estimateCost,
  totalTokens,
} from './providers/analysis-result.js';
export { loadConfig, type AppConfig } from './config/config.js';
export {
  ResilienceMetrics,
  type MetricSnapshot,
} from './observability/metrics.js';
export {
  callerKeyOf,
  createApp,
  rateLimitHeaders,
  type AppOptions,
} from './server/app.js';
export { startServer, type RunningServer } from './server/server.js';
