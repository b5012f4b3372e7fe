export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

export interface LogContext {
  [key: string]: unknown
}

export interface Logger {
  debug(message: string, context?: LogContext): void
  info(message: string, context?: LogContext): void
  warn(message: string, context?: LogContext): void
  error(message: string, context?: LogContext): void
  /** Logger that adds the given fields to every entry */
  child(bindings: LogContext): Logger
}

export interface ConsoleLoggerOptions {
  /** Prefix for every line (default: '[stream-stt]') */
  prefix?: string
  /** Print debug entries (default: false) */
  verbose?: boolean
}

/**
 * Console-backed logger with a fixed prefix and bound context fields
 */
export class ConsoleLogger implements Logger {
  private options: Required<ConsoleLoggerOptions>

  constructor(options: ConsoleLoggerOptions = {}, private readonly bindings: LogContext = {}) {
    this.options = {
      prefix: '[stream-stt]',
      verbose: false,
      ...options
    }
  }

  debug(message: string, context: LogContext = {}): void {
    if (this.options.verbose) {
      this.write('debug', message, context)
    }
  }

  info(message: string, context: LogContext = {}): void {
    this.write('info', message, context)
  }

  warn(message: string, context: LogContext = {}): void {
    this.write('warn', message, context)
  }

  error(message: string, context: LogContext = {}): void {
    this.write('error', message, context)
  }

  child(bindings: LogContext): Logger {
    return new ConsoleLogger(this.options, { ...this.bindings, ...bindings })
  }

  private write(level: LogLevel, message: string, context: LogContext): void {
    const fields = { ...this.bindings, ...context }
    const line = `${this.options.prefix} ${message}`
    const args: unknown[] = Object.keys(fields).length > 0 ? [line, fields] : [line]

    if (level === 'error') {
      console.error(...args)
      return
    }

    if (level === 'warn') {
      console.warn(...args)
      return
    }

    console.log(...args)
  }
}

/**
 * Logger that drops everything
 */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
  child: () => silentLogger
}

/**
 * Flatten an error into log fields
 */
export function describeError(error: unknown): LogContext {
  if (error instanceof Error) {
    return { error: error.message, errorName: error.name }
  }

  return { error: String(error) }
}
