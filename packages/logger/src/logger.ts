import pino from 'pino'
import { splitLogArgs } from './format.js'

/**
 * Log levels:
 * - fatal (60): Process cannot continue
 * - error (50): Terminal task failures, broken hooks
 * - warn (40): Retries, ignored requests and responses
 * - info (30): Fetch lines, run start and end (default)
 * - debug (20): Queue and session activity
 * - trace (10): Hook-by-hook detail
 */

const LEVELS: readonly pino.LevelWithSilent[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']

const resolveLevel = (value: string | undefined): pino.LevelWithSilent => {
  const match = LEVELS.find(level => level === value?.trim().toLowerCase())
  return match ?? 'info'
}

const usePretty = process.env.LOG_FORMAT !== 'json'

const baseLogger = pino({
  level: resolveLevel(process.env.LOG_LEVEL),
  ...(usePretty
    ? {
        transport: {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'SYS:HH:MM:ss',
            ignore: 'pid,hostname',
            messageFormat: '{if context}[{context}] {end}{msg}',
            customColors: 'fatal:bgRed,error:red,warn:yellow,info:cyan,debug:green,trace:gray'
          }
        }
      }
    : {})
})

type LogMethod = (message: unknown, ...args: unknown[]) => void

type Logger = {
  fatal: LogMethod
  error: LogMethod
  warn: LogMethod
  info: LogMethod
  debug: LogMethod
  trace: LogMethod
  isLevelEnabled: (level: pino.Level) => boolean
  child: (bindings: pino.Bindings) => Logger
}

/**
 * Accepts `(message)`, `(message, data)` and `(message, error)`. Objects are
 * handed to pino as the merge object so they stay structured in JSON output,
 * errors are serialized under `err`.
 */
const wrapLogger = (logger: pino.Logger): Logger => {
  const method =
    (level: pino.Level): LogMethod =>
    (message, ...args) => {
      const { text, fields } = splitLogArgs(message, args)
      if (fields) {
        logger[level](fields, text)
      } else {
        logger[level](text)
      }
    }

  return {
    fatal: method('fatal'),
    error: method('error'),
    warn: method('warn'),
    info: method('info'),
    debug: method('debug'),
    trace: method('trace'),
    isLevelEnabled: level => logger.isLevelEnabled(level),
    child: bindings => wrapLogger(logger.child(bindings))
  }
}

/**
 * Root logger.
 *
 * ```typescript
 * import { log } from '@workspace/logger'
 *
 * log.info('Spider is running...')
 * log.warn('Retrying task', { url, attempt })
 * log.error('Cannot download', error)
 * ```
 *
 * `LOG_LEVEL=debug` raises verbosity, `LOG_FORMAT=json` prints raw pino lines.
 */
export const log = wrapLogger(baseLogger)

/**
 * Child logger tagged with a `context` field, e.g. `createLogger('scheduler')`.
 */
export function createLogger(context: string): Logger {
  return wrapLogger(baseLogger.child({ context }))
}

export function setLogLevel(level: pino.LevelWithSilent): void {
  baseLogger.level = level
}

export { resolveLevel }
export type { Logger, LogMethod }
