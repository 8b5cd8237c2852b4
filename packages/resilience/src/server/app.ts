import { Hono } from 'hono';
import { bodyLimit } from 'hono/body-limit';
import { z } from 'zod';
import { createLogger, type Logger } from '@workspace/logger';
import {
  AllProvidersFailed,
  FatalError,
  RateLimitExceeded,
  describeError,
} from '../errors/errors.js';
import type { RateLimitInfo } from '../errors/types.js';
import { estimateCost, totalTokens } from '../providers/analysis-result.js';
import type { SlidingWindowLimiter } from '../rate-limit/sliding-window-limiter.js';
import type { ProviderRouter } from '../router/provider-router.js';

const ANALYZE_PATH = '/api/v1/analyze';
const HEALTH_PATH = '/health';
const DEFAULT_MAX_BODY_BYTES = 1024 * 1024;

const analyzeRequestSchema = z.object({
  userPrompt: z.string().trim().min(1, 'userPrompt must not be empty'),
  systemPrompt: z.string().optional(),
});

type AnalyzeRequest = z.infer<typeof analyzeRequestSchema>;

// @hono/node-server passes the Node request as `incoming`; app.request passes nothing.
type AppBindings = {
  incoming?: { socket: { remoteAddress?: string } };
};

type AppEnv = { Bindings: AppBindings };

type AppOptions = {
  limiter: SlidingWindowLimiter;
  router: ProviderRouter;
  logger?: Logger;
  maxBodyBytes?: number;
};

function rateLimitHeaders(info: RateLimitInfo): Record<string, string> {
  return {
    'X-RateLimit-Limit': String(info.limit),
    'X-RateLimit-Remaining': String(Math.max(0, info.remaining)),
    'X-RateLimit-Reset': String(info.resetEpochSeconds),
  };
}

function callerKeyOf(
  apiKey: string | undefined,
  remoteAddress: string | undefined,
): string {
  return apiKey || remoteAddress || 'unknown';
}

/**
 * Every request is admitted by the limiter first, keyed by `X-API-Key` or
 * the remote address. A denial answers 429 before any routing happens.
 */
function createApp(options: AppOptions): Hono<AppEnv> {
  const { limiter, router } = options;
  const logger = options.logger ?? createLogger('http');
  const maxBodyBytes = options.maxBodyBytes ?? DEFAULT_MAX_BODY_BYTES;
  const tooLarge = `Request body exceeds ${maxBodyBytes} bytes`;

  const app = new Hono<AppEnv>();

  app.use('*', async (c, next) => {
    const key = callerKeyOf(
      c.req.header('x-api-key'),
      c.env?.incoming?.socket.remoteAddress,
    );
    const admission = await limiter.enforce(key, { signal: c.req.raw.signal });

    for (const [name, value] of Object.entries(rateLimitHeaders(admission.info))) {
      c.header(name, value);
    }

    await next();
  });

  app.get(HEALTH_PATH, (c) => c.json({ status: 'ok' }, 200));

  app.all(HEALTH_PATH, (c) => {
    c.header('Allow', 'GET');
    return c.json({ detail: 'Method not allowed' }, 405);
  });

  app.post(
    ANALYZE_PATH,
    bodyLimit({
      maxSize: maxBodyBytes,
      onError: (c) => c.json({ detail: tooLarge }, 413),
    }),
    async (c) => {
      let body: unknown;
      try {
        body = await c.req.json();
      } catch (error) {
        if (error instanceof SyntaxError) {
          return c.json({ detail: 'Request body must be valid JSON' }, 400);
        }
        throw error;
      }

      const parsed = analyzeRequestSchema.safeParse(body);
      if (!parsed.success) {
        const issue = parsed.error.issues[0];
        const field = issue?.path.join('.');
        const message = issue?.message ?? 'Invalid request body';
        return c.json({ detail: field ? `${field}: ${message}` : message }, 400);
      }

      const result = await router.analyze(
        parsed.data.userPrompt,
        parsed.data.systemPrompt ?? '',
        { signal: c.req.raw.signal },
      );

      return c.json(
        {
          ...result,
          totalTokens: totalTokens(result),
          estimatedCost: estimateCost(result),
        },
        200,
      );
    },
  );

  app.all(ANALYZE_PATH, (c) => {
    c.header('Allow', 'POST');
    return c.json({ detail: 'Method not allowed' }, 405);
  });

  app.notFound((c) => c.json({ detail: 'Not found' }, 404));

  app.onError((error, c) => {
    if (c.req.raw.signal.aborted) {
      logger.info('Client disconnected before the response was sent', {
        method: c.req.method,
        path: c.req.path,
      });
      return new Response(null, { status: 499 });
    }

    if (error instanceof RateLimitExceeded) {
      for (const [name, value] of Object.entries(rateLimitHeaders(error.info))) {
        c.header(name, value);
      }
      c.header('Retry-After', String(error.retryAfterSeconds));
      return c.json({ detail: 'Rate limit exceeded. Please retry later.' }, 429);
    }

    // Raised while streaming a body that carried no Content-Length.
    if (error.name === 'BodyLimitError') {
      return c.json({ detail: tooLarge }, 413);
    }

    if (error instanceof FatalError) {
      logger.error('Provider request failed permanently', {
        path: c.req.path,
        category: error.category,
        provider: error.provider,
        error: describeError(error),
      });
      return c.json({ detail: error.message, category: error.category }, 502);
    }

    if (error instanceof AllProvidersFailed) {
      return c.json(
        {
          detail: 'All providers failed',
          attempts: error.attempts.map((attempt) => ({
            provider: attempt.provider,
            error: describeError(attempt.error),
          })),
        },
        503,
      );
    }

    logger.error('Unhandled error while serving request', {
      path: c.req.path,
      error: describeError(error),
    });
    return c.json({ detail: 'Internal server error' }, 500);
  });

  return app;
}

export { createApp, rateLimitHeaders, callerKeyOf };
export type { AnalyzeRequest, AppBindings, AppEnv, AppOptions };
