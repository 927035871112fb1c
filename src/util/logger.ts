/**
 * Levelled console logger.
 *
 * Usage:
 * ```typescript
 * import { Logger, LogLevel } from './util/logger'
 *
 * Logger.setLevel(LogLevel.DEBUG)
 * Logger.info('scanned', 42, 'tokens')
 * ```
 */

export enum LogLevel {
  ERROR = 0,
  WARN = 1,
  INFO = 2,
  DEBUG = 3,
}

export interface LoggerConfig {
  enabled: boolean
  /** Minimum level to output */
  level: LogLevel
  /** Optional prefix for all log messages */
  prefix?: string
}

const LEVEL_NAMES: Record<string, LogLevel> = {
  error: LogLevel.ERROR,
  warn: LogLevel.WARN,
  info: LogLevel.INFO,
  debug: LogLevel.DEBUG,
}

/**
 * Parse a level name (`error`, `warn`, `info`, `debug`), case-insensitive.
 * Returns undefined for anything else.
 */
export function parseLogLevel(name: string | undefined): LogLevel | undefined {
  if (name === undefined) return undefined
  const key = name.trim().toLowerCase()
  return Object.prototype.hasOwnProperty.call(LEVEL_NAMES, key) ? LEVEL_NAMES[key] : undefined
}

export class Logger {
  private static config: LoggerConfig = {
    enabled: true,
    level: LogLevel.INFO,
  }

  static configure(options: Partial<LoggerConfig>): void {
    this.config = { ...this.config, ...options }
  }

  static getConfig(): LoggerConfig {
    return { ...this.config }
  }

  static setLevel(level: LogLevel): void {
    this.config = { ...this.config, level, enabled: true }
  }

  static isEnabled(level: LogLevel): boolean {
    return this.config.enabled && level <= this.config.level
  }

  private static formatMessage(message: string, args: unknown[]): string {
    const prefix = this.config.prefix
    const formatted = prefix ? `[${prefix}] ${message}` : message
    if (args.length === 0) return formatted
    const rest = args.map((arg) => (typeof arg === 'object' ? JSON.stringify(arg) : String(arg)))
    return `${formatted} ${rest.join(' ')}`
  }

  private static log(level: LogLevel, message: string, args: unknown[]): void {
    if (!this.isEnabled(level)) {
      return
    }
    const fullMessage = this.formatMessage(message, args)
    switch (level) {
      case LogLevel.ERROR:
        console.error(fullMessage)
        break
      case LogLevel.WARN:
        console.warn(fullMessage)
        break
      case LogLevel.DEBUG:
        console.log(`DEBUG: ${fullMessage}`)
        break
      default:
        console.log(fullMessage)
    }
  }

  static debug(message: string, ...args: unknown[]): void {
    this.log(LogLevel.DEBUG, message, args)
  }

  static info(message: string, ...args: unknown[]): void {
    this.log(LogLevel.INFO, message, args)
  }

  static warn(message: string, ...args: unknown[]): void {
    this.log(LogLevel.WARN, message, args)
  }

  static error(message: string, ...args: unknown[]): void {
    this.log(LogLevel.ERROR, message, args)
  }
}

/**
 * Logger bound to a prefix. The level and enabled flag stay global.
 */
export function createLogger(prefix: string) {
  const withPrefix = (fn: () => void): void => {
    const previous = Logger.getConfig().prefix
    Logger.configure({ prefix })
    try {
      fn()
    } finally {
      Logger.configure({ prefix: previous })
    }
  }
  return {
    debug: (message: string, ...args: unknown[]) => withPrefix(() => Logger.debug(message, ...args)),
    info: (message: string, ...args: unknown[]) => withPrefix(() => Logger.info(message, ...args)),
    warn: (message: string, ...args: unknown[]) => withPrefix(() => Logger.warn(message, ...args)),
    error: (message: string, ...args: unknown[]) => withPrefix(() => Logger.error(message, ...args)),
  }
}
