/**
 * Logging conventions.
 */

/** Root LogTape category for everything this package logs. */
export const ROOT_CATEGORY = 'exactbytes'

/**
 * Log levels used by the package.
 *
 * Note: LogTape uses "warning" not "warn".
 *
 * - DEBUG: replaced defaults
 * - INFO: strict-mode changes, logging initialized
 * - WARNING: unused
 * - ERROR: unused
 */
export type LogLevel = 'debug' | 'info' | 'warning' | 'error'

/** Default lowest log level routed by {@link configureSizeLogging}. */
export const DEFAULT_LOG_LEVEL: LogLevel = 'info'
