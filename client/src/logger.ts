/**
 * Leveled diagnostics written to stderr.
 *
 * Stdout belongs to the embedding program, so diagnostics go to stderr as
 * single lines: `[dockwire] level message {fields}`.
 *
 * @module
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

/**
 * Threshold accepted by createLogger; `silent` drops everything.
 */
export type LogThreshold = LogLevel | 'silent'

export const LOG_THRESHOLDS: readonly LogThreshold[] = ['debug', 'info', 'warn', 'error', 'silent']

const SEVERITY: Record<LogThreshold, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100
}

/**
 * Structured logger used across the client.
 */
export interface Logger {
  debug(message: string, fields?: Record<string, unknown>): void
  info(message: string, fields?: Record<string, unknown>): void
  warn(message: string, fields?: Record<string, unknown>): void
  error(message: string, fields?: Record<string, unknown>): void
}

/**
 * Output target for createLogger. Defaults to process.stderr.
 */
export type LogWriter = (line: string) => void

function renderFields(fields: Record<string, unknown> | undefined): string {
  if (fields === undefined || Object.keys(fields).length === 0) {
    return ''
  }
  return ` ${JSON.stringify(fields, (_key, value: unknown) =>
    value instanceof Error ? `${value.name}: ${value.message}` : value
  )}`
}

/**
 * Create a logger that writes lines at or above `threshold`.
 */
export function createLogger(
  threshold: LogThreshold = 'warn',
  write: LogWriter = (line) => {
    process.stderr.write(line)
  }
): Logger {
  const emit = (level: LogLevel, message: string, fields?: Record<string, unknown>): void => {
    if (SEVERITY[level] < SEVERITY[threshold]) return
    write(`[dockwire] ${level} ${message}${renderFields(fields)}\n`)
  }

  return {
    debug: (message, fields) => emit('debug', message, fields),
    info: (message, fields) => emit('info', message, fields),
    warn: (message, fields) => emit('warn', message, fields),
    error: (message, fields) => emit('error', message, fields)
  }
}

/**
 * Check whether a string names a threshold.
 */
export function isLogThreshold(value: string): value is LogThreshold {
  return LOG_THRESHOLDS.some((threshold) => threshold === value)
}
