#!/usr/bin/env node
import { log } from '@workspace/logger';
import { z } from 'zod';
import { analyzeArgsSchema, runAnalyzeAction } from './actions/analyze.js';
import { runServeAction } from './actions/serve.js';
import { parseArgs } from './cli-args.js';
import { describeError } from './errors/errors.js';

const cliInputSchema = z.discriminatedUnion('command', [
  z.object({
    command: z.literal('help'),
    options: z.record(z.string(), z.string()),
  }),
  z.object({
    command: z.literal('serve'),
    options: z.record(z.string(), z.string()),
  }),
  z.object({
    command: z.literal('analyze'),
    options: z.record(z.string(), z.string()),
  }),
]);

function printHelp(): void {
  console.log(`llm-resilience CLI

Usage:
  cli help
  cli serve
  cli analyze --prompt="Why did the checkout test time out?"
  cli analyze --prompt="Why did the checkout test time out?" --system="Answer in one sentence." --pretty

Commands:
  help     Show this help message
  serve    Start the rate-limited analysis HTTP server
  analyze  Send one prompt through the configured provider chain and print JSON

Analyze options:
  --prompt  Required. User prompt sent to the provider.
  --system  Optional. System prompt sent with the user prompt.
  --pretty  Optional. Pretty-print JSON output.

Environment:
  LLM_PRIMARY_PROVIDER     anthropic | openai | google (default: google)
  LLM_FALLBACK_PROVIDER    Optional provider tried after the primary fails
  ANTHROPIC_API_KEY, OPENAI_API_KEY, GOOGLE_API_KEY
  LLM_TIMEOUT              Provider request timeout in seconds (default: 60)
  RATE_LIMIT_PER_MINUTE    Requests per caller per minute (default: 60)
  RATE_LIMIT_CLEANUP_INTERVAL  Seconds between stale-entry sweeps (default: 60)
  RETRY_MAX_RETRIES        Retries per provider (default: 3)
  RETRY_BASE_DELAY         First backoff delay in seconds (default: 1)
  RETRY_MAX_DELAY          Backoff cap in seconds (default: 60)
  RETRY_JITTER             true/false (default: true)
  HOST, PORT               Server address (default: 0.0.0.0:8000)
  LOG_LEVEL, LOG_FORMAT    Logging level and json output
`);
}

async function main(): Promise<number> {
  const { command, options } = parseArgs(process.argv.slice(2));
  const parsedCliInput = cliInputSchema.safeParse({ command, options });

  if (!parsedCliInput.success) {
    console.error(`Unknown command: ${command}`);
    printHelp();
    return 1;
  }

  if (parsedCliInput.data.command === 'help') {
    printHelp();
    return 0;
  }

  if (parsedCliInput.data.command === 'serve') {
    return runServeAction();
  }

  const parsedAnalyzeArgs = analyzeArgsSchema.safeParse(
    parsedCliInput.data.options,
  );
  if (!parsedAnalyzeArgs.success) {
    console.error(
      parsedAnalyzeArgs.error.issues[0]?.message ?? 'Invalid arguments',
    );
    printHelp();
    return 1;
  }

  return runAnalyzeAction(parsedAnalyzeArgs.data);
}

try {
  process.exitCode = await main();
} catch (error) {
  log.fatal('Command failed', { error: describeError(error, 500) });
  process.exitCode = 1;
}
