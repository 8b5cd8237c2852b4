import { z } from 'zod';
import { FatalError } from '../errors/errors.js';
import type { ProviderName } from '../providers/types.js';

const booleanFromEnvSchema = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .transform((value) => value === 'true' || value === '1' || value === 'yes');

function booleanFromEnv(fallback: boolean) {
  return z.preprocess((value) => {
    if (value === undefined) {
      return String(fallback);
    }

    if (typeof value === 'string') {
      const trimmed = value.trim().toLowerCase();
      return trimmed.length ? trimmed : String(fallback);
    }

    return value;
  }, booleanFromEnvSchema);
}

function optionalString() {
  return z.preprocess((value) => {
    if (typeof value === 'string') {
      const trimmed = value.trim();
      return trimmed.length ? trimmed : undefined;
    }

    return value;
  }, z.string().optional());
}

const providerNameSchema = z.enum(['anthropic', 'openai', 'google']);

const envSchema = z.object({
  RATE_LIMIT_PER_MINUTE: z.coerce
    .number()
    .int('RATE_LIMIT_PER_MINUTE must be an integer')
    .positive('RATE_LIMIT_PER_MINUTE must be positive')
    .default(60),
  RATE_LIMIT_CLEANUP_INTERVAL: z.coerce.number().positive().default(60),
  RETRY_MAX_RETRIES: z.coerce
    .number()
    .int('RETRY_MAX_RETRIES must be an integer')
    .min(0, 'RETRY_MAX_RETRIES must not be negative')
    .default(3),
  RETRY_BASE_DELAY: z.coerce.number().nonnegative().default(1.0),
  RETRY_MAX_DELAY: z.coerce.number().nonnegative().default(60.0),
  RETRY_JITTER: booleanFromEnv(true),
  LLM_PRIMARY_PROVIDER: z.preprocess(
    (value) => (typeof value === 'string' ? value.trim().toLowerCase() : value),
    providerNameSchema.default('google'),
  ),
  LLM_FALLBACK_PROVIDER: z.preprocess((value) => {
    if (typeof value === 'string') {
      const trimmed = value.trim().toLowerCase();
      return trimmed.length ? trimmed : undefined;
    }

    return value;
  }, providerNameSchema.optional()),
  LLM_TIMEOUT: z.coerce.number().positive().default(60),
  ANTHROPIC_API_KEY: optionalString(),
  OPENAI_API_KEY: optionalString(),
  GOOGLE_API_KEY: optionalString(),
  HOST: z.string().trim().min(1).default('0.0.0.0'),
  PORT: z.coerce.number().int().min(0).max(65_535).default(8000),
  LOG_LEVEL: z.preprocess(
    (value) => (typeof value === 'string' ? value.trim().toLowerCase() : value),
    z
      .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
      .default('info'),
  ),
});

type LogLevel = z.infer<typeof envSchema>['LOG_LEVEL'];

type AppConfig = {
  readonly rateLimit: {
    readonly requestsPerMinute: number;
    readonly cleanupIntervalMs: number;
  };
  readonly retry: {
    readonly maxRetries: number;
    readonly baseDelayMs: number;
    readonly maxDelayMs: number;
    readonly jitter: boolean;
  };
  readonly providers: {
    readonly primary: ProviderName;
    readonly fallback: ProviderName | undefined;
    readonly timeoutMs: number;
    readonly apiKeys: Readonly<Record<ProviderName, string | undefined>>;
  };
  readonly server: {
    readonly host: string;
    readonly port: number;
  };
  readonly logLevel: LogLevel;
};

function secondsToMs(seconds: number): number {
  return Math.round(seconds * 1000);
}

/**
 * Reads settings from environment variables. Durations are given in seconds
 * and converted to milliseconds.
 */
function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);

  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const variable = issue?.path.join('.') ?? 'environment';
    throw new FatalError(
      'configuration',
      `Invalid configuration for ${variable}: ${issue?.message ?? 'invalid value'}`,
    );
  }

  const values = parsed.data;

  if (values.RETRY_MAX_DELAY < values.RETRY_BASE_DELAY) {
    throw new FatalError(
      'configuration',
      'Invalid configuration for RETRY_MAX_DELAY: must not be lower than RETRY_BASE_DELAY',
    );
  }

  if (values.LLM_FALLBACK_PROVIDER === values.LLM_PRIMARY_PROVIDER) {
    throw new FatalError(
      'configuration',
      'Invalid configuration for LLM_FALLBACK_PROVIDER: must differ from LLM_PRIMARY_PROVIDER',
    );
  }

  return Object.freeze({
    rateLimit: Object.freeze({
      requestsPerMinute: values.RATE_LIMIT_PER_MINUTE,
      cleanupIntervalMs: secondsToMs(values.RATE_LIMIT_CLEANUP_INTERVAL),
    }),
    retry: Object.freeze({
      maxRetries: values.RETRY_MAX_RETRIES,
      baseDelayMs: secondsToMs(values.RETRY_BASE_DELAY),
      maxDelayMs: secondsToMs(values.RETRY_MAX_DELAY),
      jitter: values.RETRY_JITTER,
    }),
    providers: Object.freeze({
      primary: values.LLM_PRIMARY_PROVIDER,
      fallback: values.LLM_FALLBACK_PROVIDER,
      timeoutMs: secondsToMs(values.LLM_TIMEOUT),
      apiKeys: Object.freeze({
        anthropic: values.ANTHROPIC_API_KEY,
        openai: values.OPENAI_API_KEY,
        google: values.GOOGLE_API_KEY,
      }),
    }),
    server: Object.freeze({
      host: values.HOST,
      port: values.PORT,
    }),
    logLevel: values.LOG_LEVEL,
  });
}

export { loadConfig, providerNameSchema };
export type { AppConfig, LogLevel };
