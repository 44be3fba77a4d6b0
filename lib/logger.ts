/**
 * Logger Utility
 *
 * Leveled console logging for graph-facade. Loggers created with `child()`
 * share their parent's level, so `configure({ logLevel })` reaches every
 * module logger at once.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

export interface LoggerOptions {
  level?: LogLevel
  context?: string
  silent?: boolean
  colors?: boolean
}

// ANSI color codes
const colors = {
  reset: '\x1b[0m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  gray: '\x1b[90m',
}

const icons: Record<LogLevel, string> = {
  debug: colors.gray + '[debug]' + colors.reset,
  info: colors.blue + '[info]' + colors.reset,
  warn: colors.yellow + '[warn]' + colors.reset,
  error: colors.red + '[error]' + colors.reset,
}

const levelPriority: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
}

/**
 * Mutable state shared between a logger and its children
 */
interface LoggerState {
  level: LogLevel
  silent: boolean
  useColors: boolean
}

export function defaultLogLevel(): LogLevel {
  return typeof process !== 'undefined' && process.env?.DEBUG ? 'debug' : 'warn'
}

export class Logger {
  private state: LoggerState
  private context: string

  constructor(options: LoggerOptions = {}, state?: LoggerState) {
    this.state = state ?? {
      level: options.level ?? defaultLogLevel(),
      silent: options.silent ?? false,
      useColors: options.colors ?? false,
    }
    this.context = options.context ?? ''
  }

  get level(): LogLevel {
    return this.state.level
  }

  /**
   * Change the level for this logger and every logger sharing its state
   */
  setLevel(level: LogLevel): void {
    this.state.level = level
  }

  private format(level: LogLevel, message: string, data?: Record<string, unknown>): string {
    const { useColors } = this.state
    const icon = useColors ? icons[level] : `[${level}]`
    const ctx = this.context ? (useColors ? `${colors.dim}(${this.context})${colors.reset}` : `(${this.context})`) : ''

    let output = ctx ? `${icon} ${ctx} ${message}` : `${icon} ${message}`

    if (data) {
      const dataStr = JSON.stringify(data)
      output += useColors ? ` ${colors.dim}${dataStr}${colors.reset}` : ` ${dataStr}`
    }

    return output
  }

  private shouldLog(level: LogLevel): boolean {
    return !this.state.silent && levelPriority[level] >= levelPriority[this.state.level]
  }

  debug(message: string, data?: Record<string, unknown>): void {
    if (this.shouldLog('debug')) {
      console.log(this.format('debug', message, data))
    }
  }

  info(message: string, data?: Record<string, unknown>): void {
    if (this.shouldLog('info')) {
      console.log(this.format('info', message, data))
    }
  }

  warn(message: string, data?: Record<string, unknown>): void {
    if (this.shouldLog('warn')) {
      console.warn(this.format('warn', message, data))
    }
  }

  error(message: string, data?: Record<string, unknown>): void {
    if (this.shouldLog('error')) {
      console.error(this.format('error', message, data))
    }
  }

  /**
   * Create a child logger with additional context
   */
  child(context: string): Logger {
    return new Logger({ context: this.context ? `${this.context}:${context}` : context }, this.state)
  }
}

export function createLogger(context?: string, options?: Omit<LoggerOptions, 'context'>): Logger {
  return new Logger({ ...options, context })
}

/**
 * Root logger; module loggers are children of it
 */
export const logger = createLogger('graph-facade')
