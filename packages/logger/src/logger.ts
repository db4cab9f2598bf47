import {
  pino,
  type LevelWithSilent,
  type Logger,
  type TransportTargetOptions,
} from 'pino'

/**
 * Log levels:
 * - fatal (60): Run aborted before any destructive action
 * - error (50): Error messages
 * - warn (40): Rate limits, skipped messages, interrupted runs
 * - info (30): Target and batch progress (default)
 * - debug (20): Individual API calls and per-message outcomes
 * - trace (10): Very detailed trace messages
 */

const LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const

type LogMethod = Exclude<(typeof LEVELS)[number], 'silent'>

type LogFn = (msgOrObj: unknown, ...args: unknown[]) => void

type LogWrapper = Record<LogMethod, LogFn>

function resolveLevel(value: string | undefined): LevelWithSilent {
  return LEVELS.find(level => level === value) ?? 'info'
}

const logLevel = resolveLevel(process.env.LOG_LEVEL)

function buildTargets(level: LevelWithSilent, logFile: string | undefined): TransportTargetOptions[] {
  const targets: TransportTargetOptions[] = [
    {
      target: 'pino-pretty',
      level,
      options: {
        colorize: true,
        translateTime: 'SYS:HH:MM:ss',
        ignore: 'pid,hostname',
        messageFormat: '{msg}',
        customColors: 'fatal:bgRed,error:red,warn:yellow,info:cyan,debug:green,trace:gray',
        customLevels: 'fatal:60,error:50,warn:40,info:30,debug:20,trace:10'
      }
    }
  ]

  // Full JSON log kept next to the pretty console output
  if (logFile) {
    targets.push({
      target: 'pino/file',
      level,
      options: { destination: logFile, mkdir: true }
    })
  }

  return targets
}

const baseLogger: Logger =
  logLevel === 'silent'
    ? pino({ level: logLevel })
    : pino({
        level: logLevel,
        transport: { targets: buildTargets(logLevel, process.env.LOG_FILE) }
      })

function formatArg(arg: unknown): string {
  if (arg instanceof Error) {
    return arg.message
  }

  if (typeof arg === 'bigint') {
    return arg.toString()
  }

  if (typeof arg === 'object' && arg !== null) {
    return JSON.stringify(arg, (_key, value: unknown) =>
      typeof value === 'bigint' ? value.toString() : value
    )
  }

  return String(arg)
}

/**
 * Wrapper that lets callers pass a message followed by any number of values
 */
const createLoggerWrapper = (logger: Logger): LogWrapper => {
  const wrap =
    (level: LogMethod): LogFn =>
    (msgOrObj, ...args) => {
      const message = [msgOrObj, ...args].map(formatArg).join(' ')
      logger[level](message)
    }

  return {
    fatal: wrap('fatal'),
    error: wrap('error'),
    warn: wrap('warn'),
    info: wrap('info'),
    debug: wrap('debug'),
    trace: wrap('trace')
  }
}

/**
 * Logger instance for the application
 *
 * Usage:
 * ```typescript
 * import { log } from '@workspace/logger';
 *
 * log.info('Processing target', target.displayName);
 * log.debug('Search params:', { offset: 0 });
 * log.warn('Rate limited, waiting', 10, 's');
 * log.error('Search failed:', error);
 * ```
 *
 * Set log level and an optional JSON log file via environment variables:
 * ```bash
 * LOG_LEVEL=debug LOG_FILE=./chat-sweeper.log chat-sweeper run --config=config.json
 * ```
 */
export const log = createLoggerWrapper(baseLogger)

/**
 * Create a child logger with a specific context
 *
 * @example
 * ```typescript
 * const discordLog = createLogger('discord');
 * discordLog.debug('GET /users/@me');
 * ```
 */
export function createLogger(context: string): LogWrapper {
  return createLoggerWrapper(baseLogger.child({ context }))
}

export type { LogWrapper, LogFn }
