import { z } from 'zod';
import { HttpProvider, type ProviderRequest } from './http-provider.js';
import type { AnalysisResult } from './types.js';

const generateContentSchema = z.object({
  candidates: z
    .array(
      z.object({
        content: z.object({
          parts: z.array(z.object({ text: z.string().optional() })),
        }),
      }),
    )
    .min(1),
  usageMetadata: z
    .object({
      promptTokenCount: z.number().int().nonnegative().optional(),
      candidatesTokenCount: z.number().int().nonnegative().optional(),
    })
    .optional(),
});

/**
 * Gemini via the Generative Language `generateContent` endpoint; the key goes
 * in the `x-goog-api-key` header.
 */
export class GeminiProvider extends HttpProvider {
  readonly name = 'google' as const;

  protected buildRequest(
    systemPrompt: string,
    userPrompt: string,
  ): ProviderRequest {
    return {
      path: `/v1beta/models/${encodeURIComponent(this.config.model)}:generateContent`,
      headers: { 'x-goog-api-key': this.config.apiKey },
      body: {
        contents: [{ role: 'user', parts: [{ text: userPrompt }] }],
        generationConfig: {
          maxOutputTokens: this.config.maxTokens,
          temperature: this.config.temperature,
        },
        ...(systemPrompt
          ? { systemInstruction: { parts: [{ text: systemPrompt }] } }
          : {}),
      },
    };
  }

  protected toResult(data: unknown): AnalysisResult {
    const body = this.parse(generateContentSchema, data);
    const parts = body.candidates[0]?.content.parts ?? [];

    return {
      content: parts.map((part) => part.text ?? '').join(''),
      inputTokens: body.usageMetadata?.promptTokenCount ?? 0,
      outputTokens: body.usageMetadata?.candidatesTokenCount ?? 0,
      model: this.config.model,
      provider: this.name,
    };
  }
}
