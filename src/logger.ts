/**
 * Logger
 *
 * Leveled diagnostic logging with a context prefix. Everything goes to
 * stderr so command output on stdout stays clean.
 */

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const

export type LogLevel = (typeof LOG_LEVELS)[number]

export type LogSink = (line: string) => void

export interface LoggerOptions {
  level?: LogLevel
  context?: string
  silent?: boolean
  /** Defaults to console.error */
  sink?: LogSink
}

const levelPriority: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
}

export function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value)
}

export class Logger {
  private readonly level: LogLevel
  private readonly context: string
  private readonly silent: boolean
  private readonly sink: LogSink

  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? (process.env.DEBUG ? 'debug' : 'info')
    this.context = options.context ?? ''
    this.silent = options.silent ?? false
    this.sink = options.sink ?? ((line) => console.error(line))
  }

  private format(level: LogLevel, message: string, data?: Record<string, unknown>): string {
    const ctx = this.context ? ` (${this.context})` : ''
    let output = `[${level}]${ctx} ${message}`
    if (data) output += ` ${JSON.stringify(data)}`
    return output
  }

  private write(level: LogLevel, message: string, data?: Record<string, unknown>): void {
    if (this.silent || levelPriority[level] < levelPriority[this.level]) return
    this.sink(this.format(level, message, data))
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.write('debug', message, data)
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.write('info', message, data)
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.write('warn', message, data)
  }

  error(message: string, data?: Record<string, unknown>): void {
    this.write('error', message, data)
  }

  /** Logger sharing this one's settings, with `context:sub` as its prefix */
  child(context: string): Logger {
    return new Logger({
      level: this.level,
      context: this.context ? `${this.context}:${context}` : context,
      silent: this.silent,
      sink: this.sink,
    })
  }
}

export function createLogger(context?: string, options: Omit<LoggerOptions, 'context'> = {}): Logger {
  return new Logger({ ...options, ...(context !== undefined ? { context } : {}) })
}

/** Drops everything; the default where no logger is supplied */
export const silentLogger = new Logger({ silent: true })
