import type { Logger } from '@brokerkit/types'
import winston from 'winston'

export type { Logger }

export const LOG_LEVELS = ['error', 'warn', 'info', 'debug'] as const

export type LogLevel = (typeof LOG_LEVELS)[number]

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value)
}

/**
 * Resolves a level name, such as the LOG_LEVEL environment variable.
 * Unknown or missing names fall back to 'info'.
 */
export function resolveLogLevel(value?: string): LogLevel {
  const normalized = value?.trim().toLowerCase()
  return normalized !== undefined && isLogLevel(normalized) ? normalized : 'info'
}

export interface LoggerOptions {
  /** Minimum level written. Defaults to 'info' */
  readonly level?: LogLevel
  /** Also write JSON lines to this file */
  readonly logFile?: string
  /** Strategy name stamped on every line */
  readonly strategy?: string
}

// File format
const fileFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.errors({ stack: true }),
  winston.format.splat(),
  winston.format.json()
)

// Console format: HH:mm:ss [level] [component] message {context}
const consoleFormat = winston.format.combine(
  winston.format.timestamp({ format: 'HH:mm:ss' }),
  winston.format.printf(({ timestamp, level, message, component, strategy, ...metadata }) => {
    const scope = strategy ? `${String(component)}:${String(strategy)}` : String(component)
    let msg = `${String(timestamp)} [${level}] [${scope}] ${String(message)}`
    if (Object.keys(metadata).length > 0) {
      msg += ` ${JSON.stringify(metadata)}`
    }
    return msg
  })
)

/**
 * Logger backed by a winston instance
 */
export class WinstonLogger implements Logger {
  constructor(readonly target: winston.Logger) {}

  debug(message: string, context?: Record<string, unknown>): void {
    this.target.debug(message, context)
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.target.info(message, context)
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.target.warn(message, context)
  }

  error(message: string, context?: Record<string, unknown>): void {
    this.target.error(message, context)
  }

  /**
   * Logger sharing this one's transports, stamping `meta` on every line.
   */
  child(meta: Record<string, unknown>): WinstonLogger {
    return new WinstonLogger(this.target.child(meta))
  }

  /** Flushes and closes the transports */
  close(): void {
    this.target.close()
  }
}

function buildTransports(options: LoggerOptions): winston.transport[] {
  const transports: winston.transport[] = [new winston.transports.Console({ format: consoleFormat })]
  if (options.logFile) {
    transports.push(
      new winston.transports.File({
        filename: options.logFile,
        format: fileFormat,
        maxsize: 5242880, // 5MB
        maxFiles: 5
      })
    )
  }
  return transports
}

/**
 * Creates the single set of transports an engine logs through.
 * Components log through {@link WinstonLogger.child} loggers of it.
 *
 * @example
 * ```typescript
 * const root = createRootLogger({ level: 'debug', logFile: 'engine.log' })
 * const poller = root.child({ component: 'poller', strategy: 'momentum' })
 * poller.info('Poll cycle complete', { orders: 4 })
 * // 14:02:11 [info] [poller:momentum] Poll cycle complete {"orders":4}
 * ```
 */
export function createRootLogger(options: LoggerOptions = {}): WinstonLogger {
  return new WinstonLogger(
    winston.createLogger({
      level: options.level ?? 'info',
      defaultMeta: options.strategy ? { strategy: options.strategy } : undefined,
      transports: buildTransports(options)
    })
  )
}

/**
 * No-op logger for testing
 */
export class NoopLogger implements Logger {
  debug(_message: string, _context?: Record<string, unknown>): void {}
  info(_message: string, _context?: Record<string, unknown>): void {}
  warn(_message: string, _context?: Record<string, unknown>): void {}
  error(_message: string, _context?: Record<string, unknown>): void {}
}
