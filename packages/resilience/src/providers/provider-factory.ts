import type { AxiosAdapter } from 'axios';
import type { AppConfig } from '../config/config.js';
import { FatalError } from '../errors/errors.js';
import { createRetryPolicy } from '../retry/backoff-policy.js';
import { RetryExecutor } from '../retry/retry-executor.js';
import { RetryingProvider } from '../retry/retrying-provider.js';
import { AnthropicProvider } from './anthropic-provider.js';
import { GeminiProvider } from './gemini-provider.js';
import type { HttpProvider } from './http-provider.js';
import { OpenAiProvider } from './openai-provider.js';
import type { ProviderHandle, ProviderName } from './types.js';

type ProviderDefaults = {
  model: string;
  baseUrl: string;
  maxTokens: number;
  temperature: number;
};

const PROVIDER_DEFAULTS: Readonly<Record<ProviderName, ProviderDefaults>> =
  Object.freeze({
    anthropic: {
      model: 'claude-sonnet-4-20250514',
      baseUrl: 'https://api.anthropic.com',
      maxTokens: 4096,
      temperature: 0.3,
    },
    openai: {
      model: 'gpt-4o',
      baseUrl: 'https://api.openai.com',
      maxTokens: 4096,
      temperature: 0.3,
    },
    google: {
      model: 'gemini-1.5-pro',
      baseUrl: 'https://generativelanguage.googleapis.com',
      maxTokens: 4096,
      temperature: 0.3,
    },
  });

type CreateProviderOptions = {
  apiKey: string | undefined;
  timeoutMs: number;
  model?: string;
  adapter?: AxiosAdapter;
};

function createProvider(
  name: ProviderName,
  options: CreateProviderOptions,
): HttpProvider {
  if (!options.apiKey) {
    throw new FatalError(
      'configuration',
      `Provider "${name}" is selected but has no API key configured`,
    );
  }

  const defaults = PROVIDER_DEFAULTS[name];
  const config = {
    apiKey: options.apiKey,
    model: options.model ?? defaults.model,
    maxTokens: defaults.maxTokens,
    temperature: defaults.temperature,
    timeoutMs: options.timeoutMs,
    baseUrl: defaults.baseUrl,
    adapter: options.adapter,
  };

  switch (name) {
    case 'anthropic':
      return new AnthropicProvider(config);
    case 'openai':
      return new OpenAiProvider(config);
    case 'google':
      return new GeminiProvider(config);
  }
}

type ProviderChainOptions = {
  executor?: RetryExecutor;
  adapter?: AxiosAdapter;
};

/**
 * Primary then optional fallback, each retried on its own before the router
 * moves on.
 */
function createProviderChain(
  config: AppConfig,
  options?: ProviderChainOptions,
): ProviderHandle[] {
  const policy = createRetryPolicy(config.retry);
  const executor = options?.executor ?? new RetryExecutor();
  const names = [config.providers.primary, config.providers.fallback].filter(
    (name): name is ProviderName => name !== undefined,
  );

  return names.map(
    (name) =>
      new RetryingProvider(
        createProvider(name, {
          apiKey: config.providers.apiKeys[name],
          timeoutMs: config.providers.timeoutMs,
          adapter: options?.adapter,
        }),
        policy,
        executor,
      ),
  );
}

export { PROVIDER_DEFAULTS, createProvider, createProviderChain };
export type { CreateProviderOptions, ProviderChainOptions, ProviderDefaults };
