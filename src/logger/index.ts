/**
 * logger — Leveled console logging.
 *
 * Lines are prefixed `[sky-briefing:<scope>]`. The sink defaults to the global
 * console and can be swapped for tests.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent'

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent']

const RANK: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40, silent: 100 }

/** The subset of `console` the logger writes to */
export interface LogSink {
  debug(...args: unknown[]): void
  info(...args: unknown[]): void
  warn(...args: unknown[]): void
  error(...args: unknown[]): void
}

export interface Logger {
  readonly level: LogLevel
  debug(message: string, ...details: unknown[]): void
  info(message: string, ...details: unknown[]): void
  warn(message: string, ...details: unknown[]): void
  error(message: string, ...details: unknown[]): void
  /** A logger with the same level and sink under a nested scope */
  child(scope: string): Logger
}

export interface LoggerOptions {
  level?: LogLevel
  scope?: string
  sink?: LogSink
}

export function createLogger({ level = 'warn', scope = 'sky-briefing', sink = console }: LoggerOptions = {}): Logger {
  const prefix = `[${scope}]`
  const enabled = (at: LogLevel) => RANK[at] >= RANK[level]

  return {
    level,
    debug: (message, ...details) => { if (enabled('debug')) sink.debug(prefix, message, ...details) },
    info: (message, ...details) => { if (enabled('info')) sink.info(prefix, message, ...details) },
    warn: (message, ...details) => { if (enabled('warn')) sink.warn(prefix, message, ...details) },
    error: (message, ...details) => { if (enabled('error')) sink.error(prefix, message, ...details) },
    child: child => createLogger({ level, scope: `${scope}:${child}`, sink }),
  }
}

/** A logger that drops everything */
export const silentLogger: Logger = createLogger({ level: 'silent' })
