type AnalysisResult = {
  content: string;
  inputTokens: number;
  outputTokens: number;
  model: string;
  provider: string;
};

type ProviderCallOptions = {
  signal?: AbortSignal;
};

/**
 * Anything the router can fall back across. Implementations translate their
 * own failures into `RetryableProviderError` or `FatalError`.
 */
interface ProviderHandle {
  readonly name: string;
  analyze(
    systemPrompt: string,
    userPrompt: string,
    options?: ProviderCallOptions,
  ): Promise<AnalysisResult>;
}

type ProviderName = 'anthropic' | 'openai' | 'google';

export type { AnalysisResult, ProviderCallOptions, ProviderHandle, ProviderName };
