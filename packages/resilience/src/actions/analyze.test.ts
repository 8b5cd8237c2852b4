import { describe, it, expect } from 'vitest';
import type { AxiosAdapter } from 'axios';
import { analyzeArgsSchema, runAnalyzeAction } from './analyze.js';

const geminiReply = {
  candidates: [{ content: { parts: [{ text: 'Selector drift on the cart page.' }] } }],
  usageMetadata: { promptTokenCount: 400, candidatesTokenCount: 20 },
};

function replyingWith(statuses: number[]): { adapter: AxiosAdapter; calls: string[] } {
  const calls: string[] = [];
  const adapter: AxiosAdapter = async (config) => {
    calls.push(`${config.baseURL ?? ''}${config.url ?? ''}`);
    const status = statuses[calls.length - 1] ?? 200;

    return {
      data: status === 200 ? geminiReply : { error: { message: 'unavailable' } },
      status,
      statusText: String(status),
      headers: {},
      config,
    };
  };

  return { adapter, calls };
}

describe('analyzeArgsSchema', () => {
  it('requires a prompt and defaults pretty to false', () => {
    expect(analyzeArgsSchema.safeParse({}).success).toBe(false);
    expect(analyzeArgsSchema.parse({ prompt: ' why? ', system: '  ' })).toEqual({
      prompt: 'why?',
      system: undefined,
      pretty: false,
    });
    expect(analyzeArgsSchema.parse({ prompt: 'why?', pretty: 'TRUE' }).pretty).toBe(true);
  });
});

describe('runAnalyzeAction', () => {
  it('prints the analysis with token totals', async () => {
    const { adapter } = replyingWith([200]);
    const output: string[] = [];

    const exitCode = await runAnalyzeAction(
      { prompt: 'why?', system: undefined, pretty: false },
      {
        env: { GOOGLE_API_KEY: 'test-google-key' },
        adapter,
        write: (line) => output.push(line),
      },
    );

    expect(exitCode).toBe(0);
    expect(output).toHaveLength(1);
    expect(JSON.parse(output[0] ?? '')).toMatchObject({
      content: 'Selector drift on the cart page.',
      provider: 'google',
      model: 'gemini-1.5-pro',
      inputTokens: 400,
      outputTokens: 20,
      totalTokens: 420,
    });
  });

  it('reports every failed provider and exits 1', async () => {
    const { adapter, calls } = replyingWith([503, 503]);
    const errors: string[] = [];

    const exitCode = await runAnalyzeAction(
      { prompt: 'why?', system: undefined, pretty: false },
      {
        env: {
          GOOGLE_API_KEY: 'test-google-key',
          OPENAI_API_KEY: 'test-openai-key',
          LLM_FALLBACK_PROVIDER: 'openai',
          RETRY_MAX_RETRIES: '0',
        },
        adapter,
        writeError: (line) => errors.push(line),
      },
    );

    expect(exitCode).toBe(1);
    expect(calls).toEqual([
      'https://generativelanguage.googleapis.com/v1beta/models/gemini-1.5-pro:generateContent',
      'https://api.openai.com/v1/chat/completions',
    ]);
    expect(JSON.parse(errors[0] ?? '')).toEqual({
      success: false,
      error: 'All providers failed',
      attempts: [
        { provider: 'google', error: 'google responded with HTTP 503: unavailable' },
        { provider: 'openai', error: 'openai responded with HTTP 503: unavailable' },
      ],
    });
  });

  it('reports a configuration problem and exits 1', async () => {
    const errors: string[] = [];

    const exitCode = await runAnalyzeAction(
      { prompt: 'why?', system: undefined, pretty: false },
      { env: {}, writeError: (line) => errors.push(line) },
    );

    expect(exitCode).toBe(1);
    expect(JSON.parse(errors[0] ?? '')).toEqual({
      success: false,
      error: 'Provider "google" is selected but has no API key configured',
      category: 'configuration',
    });
  });
});
