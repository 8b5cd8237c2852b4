import axios, {
  type AxiosAdapter,
  type AxiosInstance,
  type AxiosResponse,
} from 'axios';
import { z } from 'zod';
import { createLogger, type Logger } from '@workspace/logger';
import { FatalError, RetryableProviderError } from '../errors/errors.js';
import type {
  AnalysisResult,
  ProviderCallOptions,
  ProviderHandle,
  ProviderName,
} from './types.js';

type HttpProviderConfig = {
  apiKey: string;
  model: string;
  maxTokens: number;
  temperature: number;
  timeoutMs: number;
  baseUrl: string;
  adapter?: AxiosAdapter;
};

type ProviderRequest = {
  path: string;
  body: Record<string, unknown>;
  headers?: Record<string, string>;
};

const apiErrorSchema = z.object({
  error: z.object({
    message: z.string(),
  }),
});

/**
 * Base for JSON-over-HTTP inference APIs. Subclasses describe the request
 * and read the response; this class owns the transport and maps every
 * failure onto the retryable/fatal taxonomy.
 *
 * axios accepts every status; the status is checked after the call.
 */
abstract class HttpProvider implements ProviderHandle {
  abstract readonly name: ProviderName;
  protected readonly config: HttpProviderConfig;
  protected readonly logger: Logger;
  private readonly http: AxiosInstance;

  constructor(config: HttpProviderConfig) {
    this.config = config;
    this.logger = createLogger('provider');
    this.http = axios.create({
      baseURL: config.baseUrl,
      timeout: config.timeoutMs,
      validateStatus: () => true,
      adapter: config.adapter,
      headers: { 'Content-Type': 'application/json' },
    });
  }

  get model(): string {
    return this.config.model;
  }

  async analyze(
    systemPrompt: string,
    userPrompt: string,
    options?: ProviderCallOptions,
  ): Promise<AnalysisResult> {
    this.logger.debug('Sending analysis request', {
      provider: this.name,
      model: this.config.model,
      maxTokens: this.config.maxTokens,
    });

    const data = await this.post(
      this.buildRequest(systemPrompt, userPrompt),
      options?.signal,
    );
    const result = this.toResult(data);

    this.logger.debug('Received analysis response', {
      provider: this.name,
      inputTokens: result.inputTokens,
      outputTokens: result.outputTokens,
    });

    return result;
  }

  protected abstract buildRequest(
    systemPrompt: string,
    userPrompt: string,
  ): ProviderRequest;

  protected abstract toResult(data: unknown): AnalysisResult;

  protected parse<T>(
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    data: unknown,
  ): T {
    const parsed = schema.safeParse(data);

    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const location = issue?.path.join('.') || '(root)';
      throw new FatalError(
        'invalid-response',
        `${this.name} returned an unexpected response body at ${location}: ${issue?.message ?? 'invalid'}`,
        { provider: this.name },
      );
    }

    return parsed.data;
  }

  private async post(
    request: ProviderRequest,
    signal: AbortSignal | undefined,
  ): Promise<unknown> {
    let response: AxiosResponse<unknown>;

    try {
      response = await this.http.post<unknown>(request.path, request.body, {
        headers: request.headers,
        signal,
      });
    } catch (error) {
      throw this.translateTransportError(error, signal);
    }

    if (response.status >= 400) {
      throw this.translateStatus(response.status, response.data);
    }

    return response.data;
  }

  private translateTransportError(
    error: unknown,
    signal: AbortSignal | undefined,
  ): unknown {
    if (signal?.aborted) {
      return signal.reason;
    }

    if (axios.isAxiosError(error) && !error.response) {
      const reason = error.code ?? error.message;
      return new RetryableProviderError(
        'network',
        `${this.name} request failed: ${reason}`,
        { provider: this.name, cause: error },
      );
    }

    return error;
  }

  private translateStatus(
    status: number,
    data: unknown,
  ): RetryableProviderError | FatalError {
    const detail = apiErrorSchema.safeParse(data);
    const message = `${this.name} responded with HTTP ${status}${
      detail.success ? `: ${detail.data.error.message}` : ''
    }`;
    const options = { provider: this.name, status };

    if (status === 429) {
      return new RetryableProviderError('rate-limit', message, options);
    }

    if (status === 408 || status >= 500) {
      return new RetryableProviderError('http', message, options);
    }

    if (status === 401 || status === 403) {
      return new FatalError('auth', message, options);
    }

    return new FatalError('invalid-request', message, options);
  }
}

export { HttpProvider };
export type { HttpProviderConfig, ProviderRequest };
