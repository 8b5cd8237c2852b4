import { createLogger, setLogLevel } from '@workspace/logger';
import { loadConfig } from '../config/config.js';
import { ResilienceMetrics } from '../observability/metrics.js';
import { createProviderChain } from '../providers/provider-factory.js';
import { SlidingWindowLimiter } from '../rate-limit/sliding-window-limiter.js';
import { ProviderRouter } from '../router/provider-router.js';
import { startServer } from '../server/server.js';

const METRICS_LOG_INTERVAL_MS = 30_000;

const logger = createLogger('serve');

/**
 * Runs the HTTP surface until SIGINT or SIGTERM, then drains and exits 0.
 */
export async function runServeAction(
  env: NodeJS.ProcessEnv = process.env,
): Promise<number> {
  const config = loadConfig(env);
  setLogLevel(config.logLevel);
  const metrics = new ResilienceMetrics();
  const limiter = new SlidingWindowLimiter(
    { requestsPerMinute: config.rateLimit.requestsPerMinute },
    { metrics },
  );
  const router = new ProviderRouter(createProviderChain(config), { metrics });

  const running = await startServer({
    host: config.server.host,
    port: config.server.port,
    limiter,
    router,
  });

  const stopCleanup = limiter.scheduleCleanup(config.rateLimit.cleanupIntervalMs);
  const metricsTimer = setInterval(() => {
    metrics.log(logger);
  }, METRICS_LOG_INTERVAL_MS);
  metricsTimer.unref();

  logger.info('Resilience gateway started', {
    address: running.address,
    providers: router.providers.map((provider) => provider.name),
    requestsPerMinute: limiter.limit,
  });

  const signal = await new Promise<NodeJS.Signals>((resolve) => {
    process.once('SIGINT', resolve);
    process.once('SIGTERM', resolve);
  });

  logger.info('Shutting down', { signal });
  stopCleanup();
  clearInterval(metricsTimer);
  await running.close();
  metrics.log(logger);

  return 0;
}
