import { createLogger, type Logger } from '@workspace/logger';
import { RateLimitExceeded } from '../errors/errors.js';
import type { ResilienceMetrics } from '../observability/metrics.js';
import { AsyncLock } from './async-lock.js';
import type {
  AdmissionResult,
  AdmitOptions,
  CallerKey,
  Clock,
  SlidingWindowLimiterConfig,
} from './types.js';
import { DEFAULT_LIMITER_CONFIG, systemClock } from './types.js';

type SlidingWindowLimiterOptions = {
  clock?: Clock;
  logger?: Logger;
  metrics?: ResilienceMetrics;
};

/**
 * Per-caller sliding-window admission control.
 *
 * Each key owns a log of admitted timestamps and a lock; every read-modify-
 * write of a log happens inside that key's lock, so concurrent admits for one
 * key never both take the last slot, while different keys never wait on each
 * other.
 *
 * State lives in this process only. Several instances behind a load balancer
 * each enforce their own limit; a shared limit needs an external counter
 * store.
 *
 * A caller cancelled after `admit` resolves has still consumed its slot.
 * Slots are never handed back.
 */
export class SlidingWindowLimiter {
  private readonly config: SlidingWindowLimiterConfig;
  private readonly clock: Clock;
  private readonly logger: Logger;
  private readonly metrics: ResilienceMetrics | undefined;
  private readonly logs: Map<CallerKey, number[]>;
  private readonly locks: Map<CallerKey, AsyncLock>;

  constructor(
    config?: Partial<SlidingWindowLimiterConfig>,
    options?: SlidingWindowLimiterOptions,
  ) {
    this.config = { ...DEFAULT_LIMITER_CONFIG, ...config };

    if (
      !Number.isInteger(this.config.requestsPerMinute) ||
      this.config.requestsPerMinute < 1
    ) {
      throw new RangeError(
        `requestsPerMinute must be a positive integer, got ${this.config.requestsPerMinute}`,
      );
    }

    this.clock = options?.clock ?? systemClock;
    this.logger = options?.logger ?? createLogger('rate-limiter');
    this.metrics = options?.metrics;
    this.logs = new Map();
    this.locks = new Map();
  }

  async admit(key: CallerKey, options?: AdmitOptions): Promise<AdmissionResult> {
    const lock = this.lockFor(key);

    let result: AdmissionResult;
    try {
      result = await lock.runExclusive(() => this.evaluate(key), options?.signal);
    } catch (error) {
      this.evictIfIdle(key);
      throw error;
    }

    if (result.allowed) {
      this.metrics?.increment('limiter.allowed');
    } else {
      this.metrics?.increment('limiter.denied');
      this.logger.warn('Rate limit exceeded', {
        key,
        limit: this.config.requestsPerMinute,
        retryAfterSeconds: result.retryAfterSeconds,
      });
    }

    return result;
  }

  /**
   * Like `admit`, but a denial is thrown as `RateLimitExceeded`.
   */
  async enforce(key: CallerKey, options?: AdmitOptions): Promise<AdmissionResult> {
    const result = await this.admit(key, options);

    if (!result.allowed) {
      throw new RateLimitExceeded(key, result.info, result.retryAfterSeconds);
    }

    return result;
  }

  /**
   * Drops expired timestamps for every key and forgets keys left with none.
   * A key whose lock is held or awaited is skipped entirely.
   */
  cleanupStaleEntries(): number {
    const windowStart = this.clock.now() - this.config.windowMs;
    let removed = 0;

    for (const [key, lock] of this.locks) {
      if (!lock.isIdle) {
        continue;
      }

      const retained = this.retainedSince(key, windowStart);
      if (retained.length > 0) {
        this.logs.set(key, retained);
        continue;
      }

      this.logs.delete(key);
      this.locks.delete(key);
      removed += 1;
    }

    if (removed > 0) {
      this.logger.debug('Removed stale rate-limit entries', {
        removed,
        remaining: this.locks.size,
      });
    }
    this.metrics?.gauge('limiter.trackedKeys', this.locks.size);

    return removed;
  }

  scheduleCleanup(intervalMs: number): () => void {
    const timer = setInterval(() => {
      this.cleanupStaleEntries();
    }, intervalMs);
    timer.unref();

    return () => {
      clearInterval(timer);
    };
  }

  reset(): void {
    for (const [key, lock] of this.locks) {
      if (lock.isIdle) {
        this.logs.delete(key);
        this.locks.delete(key);
      }
    }
  }

  get limit(): number {
    return this.config.requestsPerMinute;
  }

  get trackedKeys(): number {
    return this.locks.size;
  }

  private evaluate(key: CallerKey): AdmissionResult {
    const now = this.clock.now();
    const limit = this.config.requestsPerMinute;
    const retained = this.retainedSince(key, now - this.config.windowMs);
    const count = retained.length;

    if (count < limit) {
      retained.push(now);
      this.logs.set(key, retained);

      return {
        allowed: true,
        info: {
          limit,
          remaining: limit - count - 1,
          resetEpochSeconds: this.resetAt(retained, now),
        },
      };
    }

    this.logs.set(key, retained);
    const resetEpochSeconds = this.resetAt(retained, now);

    return {
      allowed: false,
      info: { limit, remaining: 0, resetEpochSeconds },
      retryAfterSeconds: Math.max(1, Math.ceil(resetEpochSeconds - now / 1000)),
    };
  }

  private retainedSince(key: CallerKey, windowStart: number): number[] {
    const timestamps = this.logs.get(key) ?? [];
    return timestamps.filter((timestamp) => timestamp > windowStart);
  }

  private resetAt(retained: readonly number[], now: number): number {
    const oldest = retained[0] ?? now;
    return Math.ceil((oldest + this.config.windowMs) / 1000);
  }

  private lockFor(key: CallerKey): AsyncLock {
    let lock = this.locks.get(key);

    if (!lock) {
      lock = new AsyncLock();
      this.locks.set(key, lock);
    }

    return lock;
  }

  private evictIfIdle(key: CallerKey): void {
    const lock = this.locks.get(key);
    const timestamps = this.logs.get(key);

    if (lock?.isIdle && (timestamps === undefined || timestamps.length === 0)) {
      this.locks.delete(key);
      this.logs.delete(key);
    }
  }
}

export type { SlidingWindowLimiterOptions };
