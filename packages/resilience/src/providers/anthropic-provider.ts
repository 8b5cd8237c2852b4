import { z } from 'zod';
import { HttpProvider, type ProviderRequest } from './http-provider.js';
import type { AnalysisResult } from './types.js';

const messagesResponseSchema = z.object({
  content: z
    .array(
      z.object({
        type: z.string(),
        text: z.string().optional(),
      }),
    )
    .min(1),
  usage: z.object({
    input_tokens: z.number().int().nonnegative(),
    output_tokens: z.number().int().nonnegative(),
  }),
});

/**
 * Claude via the Messages API.
 */
export class AnthropicProvider extends HttpProvider {
  readonly name = 'anthropic' as const;

  protected buildRequest(
    systemPrompt: string,
    userPrompt: string,
  ): ProviderRequest {
    return {
      path: '/v1/messages',
      headers: {
        'x-api-key': this.config.apiKey,
        'anthropic-version': '2023-06-01',
      },
      body: {
        model: this.config.model,
        max_tokens: this.config.maxTokens,
        temperature: this.config.temperature,
        messages: [{ role: 'user', content: userPrompt }],
        ...(systemPrompt ? { system: systemPrompt } : {}),
      },
    };
  }

  protected toResult(data: unknown): AnalysisResult {
    const body = this.parse(messagesResponseSchema, data);

    return {
      content: body.content
        .map((block) => (block.type === 'text' ? (block.text ?? '') : ''))
        .join(''),
      inputTokens: body.usage.input_tokens,
      outputTokens: body.usage.output_tokens,
      model: this.config.model,
      provider: this.name,
    };
  }
}
