/**
 * Logger utility for fskit
 *
 * Provides a simple logger factory that creates namespaced loggers
 * for the finder, watcher and tree builder.
 */

export interface Logger {
  info: (...args: unknown[]) => void
  warn: (...args: unknown[]) => void
  error: (...args: unknown[]) => void
  debug: (...args: unknown[]) => void
}

/**
 * Create a namespaced logger instance.
 *
 * @param prefix - Prefix to prepend to all log messages (e.g., '[fskit:find]')
 * @returns Logger instance with info, warn, error, and debug methods
 *
 * @example
 * ```typescript
 * const logger = createLogger('[fskit:watch]')
 * logger.info('Fingerprint written')  // [fskit:watch] Fingerprint written
 * logger.debug('skipped', path)       // only printed when FSKIT_DEBUG is set
 * ```
 */
export function createLogger(prefix: string): Logger {
  return {
    info: (...args: unknown[]) => console.info(prefix, ...args),
    warn: (...args: unknown[]) => console.warn(prefix, ...args),
    error: (...args: unknown[]) => console.error(prefix, ...args),
    debug: (...args: unknown[]) => {
      // Enable by setting FSKIT_DEBUG=1
      if (typeof process !== 'undefined' && process.env?.FSKIT_DEBUG) {
        console.debug(prefix, ...args)
      }
    },
  }
}

/**
 * Default logger instance with [fskit] prefix
 */
export const logger: Logger = createLogger('[fskit]')
