/**
 * Logger utility
 *
 * A small logging interface shared by the exporters, the orchestrator and the
 * CLI. Library code logs through the global `logger`, which is a noop until
 * the host (usually the CLI) installs a console logger.
 *
 * @module utils/logger
 */

/**
 * Logger interface for consistent logging across the codebase
 */
export interface Logger {
  debug(message: string, ...args: unknown[]): void
  info(message: string, ...args: unknown[]): void
  warn(message: string, ...args: unknown[]): void
  error(message: string, error?: unknown, ...args: unknown[]): void
}

/** Log levels in increasing severity */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
}

/**
 * Create a console logger that drops messages below `minLevel`.
 * Everything goes to stderr so stdout stays free for command output.
 */
export function createConsoleLogger(minLevel: LogLevel = 'debug'): Logger {
  const enabled = (level: LogLevel): boolean => LEVEL_ORDER[level] >= LEVEL_ORDER[minLevel]

  return {
    debug(message: string, ...args: unknown[]): void {
      if (enabled('debug')) console.error(`[DEBUG] backup: ${message}`, ...args)
    },
    info(message: string, ...args: unknown[]): void {
      if (enabled('info')) console.error(`[INFO] backup: ${message}`, ...args)
    },
    warn(message: string, ...args: unknown[]): void {
      if (enabled('warn')) console.error(`[WARN] backup: ${message}`, ...args)
    },
    error(message: string, error?: unknown, ...args: unknown[]): void {
      if (!enabled('error')) return
      if (error !== undefined) {
        console.error(`[ERROR] backup: ${message}`, error, ...args)
      } else {
        console.error(`[ERROR] backup: ${message}`, ...args)
      }
    },
  }
}

/**
 * Console logger with every level enabled
 */
export const consoleLogger: Logger = createConsoleLogger('debug')

/**
 * Noop logger implementation
 * Silently discards all log messages (default)
 */
export const noopLogger: Logger = {
  debug(): void {},
  info(): void {},
  warn(): void {},
  error(): void {},
}

/**
 * Global logger instance
 */
export let logger: Logger = noopLogger

/**
 * Set the global logger instance
 *
 * @example
 * ```typescript
 * import { setLogger, createConsoleLogger } from './utils/logger'
 *
 * setLogger(createConsoleLogger('info'))
 * ```
 */
export function setLogger(l: Logger): void {
  logger = l
}

/**
 * Whether debug logging was requested through the environment
 * (`ISSUE_BACKUP_DEBUG=1` or `true`).
 */
export function isDebugEnabled(env: NodeJS.ProcessEnv = process.env): boolean {
  const value = env.ISSUE_BACKUP_DEBUG
  return value === '1' || value === 'true'
}
