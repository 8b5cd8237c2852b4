import { z } from 'zod';
import { HttpProvider, type ProviderRequest } from './http-provider.js';
import type { AnalysisResult } from './types.js';

const chatCompletionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string().nullable(),
        }),
      }),
    )
    .min(1),
  usage: z
    .object({
      prompt_tokens: z.number().int().nonnegative(),
      completion_tokens: z.number().int().nonnegative(),
    })
    .optional(),
});

export class OpenAiProvider extends HttpProvider {
  readonly name = 'openai' as const;

  protected buildRequest(
    systemPrompt: string,
    userPrompt: string,
  ): ProviderRequest {
    const messages = systemPrompt
      ? [
          { role: 'system', content: systemPrompt },
          { role: 'user', content: userPrompt },
        ]
      : [{ role: 'user', content: userPrompt }];

    return {
      path: '/v1/chat/completions',
      headers: { Authorization: `Bearer ${this.config.apiKey}` },
      body: {
        model: this.config.model,
        max_tokens: this.config.maxTokens,
        temperature: this.config.temperature,
        messages,
      },
    };
  }

  protected toResult(data: unknown): AnalysisResult {
    const body = this.parse(chatCompletionSchema, data);

    return {
      content: body.choices[0]?.message.content ?? '',
      inputTokens: body.usage?.prompt_tokens ?? 0,
      outputTokens: body.usage?.completion_tokens ?? 0,
      model: this.config.model,
      provider: this.name,
    };
  }
}
