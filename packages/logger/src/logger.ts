import pino from 'pino'

/**
 * Log levels:
 * - fatal (60): Process cannot continue
 * - error (50): A call failed and the failure was surfaced
 * - warn (40): Degraded path taken (retry, fallback, rate-limit denial)
 * - info (30): General informational messages (default)
 * - debug (20): Per-attempt detail
 * - trace (10): Very detailed trace messages
 */

const logLevel = parseLevel(process.env.LOG_LEVEL) ?? 'info'
const useJson = process.env.LOG_FORMAT === 'json'

const baseLogger = pino({
  level: logLevel,
  transport: useJson
    ? undefined
    : {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:HH:MM:ss',
          ignore: 'pid,hostname',
          messageFormat: '{if context}[{context}] {end}{msg}',
          customColors: 'fatal:bgRed,error:red,warn:yellow,info:cyan,debug:green,trace:gray'
        }
      }
})

type LogData = Record<string, unknown> | Error

type LogMethod = (message: string, data?: LogData) => void

type Logger = {
  fatal: LogMethod
  error: LogMethod
  warn: LogMethod
  info: LogMethod
  debug: LogMethod
  trace: LogMethod
  child: (bindings: pino.Bindings) => Logger
}

function parseLevel(value: string | undefined): pino.LevelWithSilent | undefined {
  if (value === undefined) {
    return undefined
  }

  const normalized = value.trim().toLowerCase()
  return isLevel(normalized) ? normalized : undefined
}

function isLevel(value: string): value is pino.LevelWithSilent {
  return value === 'silent' || value in pino.levels.values
}

/**
 * Structured fields go to pino as the merge object; an Error is logged under
 * `err` so pino's standard serializer picks it up.
 */
const createLoggerWrapper = (logger: pino.Logger): Logger => {
  const wrap = (level: pino.Level): LogMethod => {
    return (message, data) => {
      if (data === undefined) {
        logger[level](message)
      } else if (data instanceof Error) {
        logger[level]({ err: data }, message)
      } else {
        logger[level](data, message)
      }
    }
  }

  return {
    fatal: wrap('fatal'),
    error: wrap('error'),
    warn: wrap('warn'),
    info: wrap('info'),
    debug: wrap('debug'),
    trace: wrap('trace'),
    child: (bindings: pino.Bindings) => createLoggerWrapper(logger.child(bindings))
  }
}

/**
 * Logger instance for the application
 *
 * Usage:
 * ```typescript
 * import { log } from '@workspace/logger';
 *
 * log.info('Server listening', { port: 8000 });
 * log.warn('Provider failed, falling back', { provider: 'anthropic' });
 * log.error('Request failed', error);
 * ```
 *
 * Set log level and format via environment variables:
 * ```bash
 * LOG_LEVEL=debug npm run cli -- serve
 * LOG_FORMAT=json npm run cli -- serve
 * ```
 */
export const log = createLoggerWrapper(baseLogger)

/**
 * Create a child logger with a specific context
 *
 * @example
 * ```typescript
 * const routerLog = createLogger('provider-router');
 * routerLog.info('All providers failed');
 * ```
 */
export function createLogger(context: string): Logger {
  return createLoggerWrapper(baseLogger.child({ context }))
}

/**
 * Set the log level dynamically
 *
 * @example
 * ```typescript
 * setLogLevel('debug');
 * ```
 */
export function setLogLevel(level: pino.LevelWithSilent): void {
  baseLogger.level = level
}

export function getLogLevel(): string {
  return baseLogger.level
}

export type { Logger, LogData, LogMethod }
