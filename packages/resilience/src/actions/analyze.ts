import type { AxiosAdapter } from 'axios';
import { log } from '@workspace/logger';
import { z } from 'zod';
import { loadConfig } from '../config/config.js';
import {
  AllProvidersFailed,
  FatalError,
  describeError,
} from '../errors/errors.js';
import { estimateCost, totalTokens } from '../providers/analysis-result.js';
import { createProviderChain } from '../providers/provider-factory.js';
import { ProviderRouter } from '../router/provider-router.js';

const booleanFromCliSchema = z
  .enum(['true', 'false'])
  .transform((value) => value === 'true');

const analyzeArgsSchema = z.object({
  prompt: z.string().trim().min(1, 'Missing required option: --prompt'),
  system: z
    .preprocess((value) => {
      if (typeof value === 'string') {
        const trimmed = value.trim();
        return trimmed.length ? trimmed : undefined;
      }

      return value;
    }, z.string().optional()),
  pretty: z
    .preprocess((value) => {
      if (value === undefined) {
        return 'false';
      }

      if (typeof value === 'string') {
        return value.toLowerCase();
      }

      return value;
    }, booleanFromCliSchema)
    .default(false),
});

type AnalyzeArgs = z.infer<typeof analyzeArgsSchema>;

function formatJson(value: unknown, pretty: boolean): string {
  return pretty ? JSON.stringify(value, null, 2) : JSON.stringify(value);
}

type AnalyzeActionDeps = {
  env?: NodeJS.ProcessEnv;
  adapter?: AxiosAdapter;
  write?: (output: string) => void;
  writeError?: (output: string) => void;
};

export async function runAnalyzeAction(
  args: AnalyzeArgs,
  deps?: AnalyzeActionDeps,
): Promise<number> {
  const write = deps?.write ?? ((output: string) => console.log(output));
  const writeError =
    deps?.writeError ?? ((output: string) => console.error(output));
  const startTime = Date.now();

  try {
    const config = loadConfig(deps?.env);
    const router = new ProviderRouter(
      createProviderChain(config, { adapter: deps?.adapter }),
    );

    log.info('Starting analyze action', {
      providers: router.providers.map((provider) => provider.name),
    });

    const result = await router.analyze(args.prompt, args.system ?? '');

    write(
      formatJson(
        {
          ...result,
          totalTokens: totalTokens(result),
          estimatedCost: estimateCost(result),
        },
        args.pretty,
      ),
    );

    log.info(`Execution finished in ${Date.now() - startTime}ms`);
    return 0;
  } catch (error) {
    if (error instanceof AllProvidersFailed) {
      writeError(
        formatJson(
          {
            success: false,
            error: 'All providers failed',
            attempts: error.attempts.map((attempt) => ({
              provider: attempt.provider,
              error: describeError(attempt.error),
            })),
          },
          args.pretty,
        ),
      );
      return 1;
    }

    if (error instanceof FatalError) {
      writeError(
        formatJson(
          { success: false, error: error.message, category: error.category },
          args.pretty,
        ),
      );
      return 1;
    }

    throw error;
  }
}

export { analyzeArgsSchema };
export type { AnalyzeActionDeps, AnalyzeArgs };
