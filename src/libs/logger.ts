/**
 * Prefixed console logging for the device drivers.
 *
 * Every line carries the bracketed source tag used throughout the services
 * (e.g. `[ConditionWave] Start data acquisition...`). The active level is read
 * from `WAVELINE_LOG_LEVEL` on first use and can be changed with `setLogLevel()`.
 *
 * Usage:
 *   const log = createLogger('SpotWave')
 *   log.debug('Send command:', command)  // hidden unless level is debug
 *   log.warn('Unknown AE data record:', line)
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent'

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
}

export const DEFAULT_LOG_LEVEL: LogLevel = 'warn'

let activeLevel: LogLevel | null = null

/**
 * Narrow an arbitrary string (env var, CLI flag) to a log level.
 * @param value
 */
export function parseLogLevel(value: string | undefined): LogLevel | null {
  if (!value) {
    return null
  }
  const normalized = value.trim().toLowerCase()
  switch (normalized) {
    case 'debug':
    case 'info':
    case 'warn':
    case 'error':
    case 'silent':
      return normalized
    default:
      return null
  }
}

/**
 *
 */
export function getLogLevel(): LogLevel {
  if (activeLevel === null) {
    activeLevel = parseLogLevel(process.env.WAVELINE_LOG_LEVEL) ?? DEFAULT_LOG_LEVEL
  }
  return activeLevel
}

/**
 *
 * @param level
 */
export function setLogLevel(level: LogLevel): void {
  activeLevel = level
}

function enabled(level: Exclude<LogLevel, 'silent'>): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[getLogLevel()]
}

export interface Logger {
  debug(message: string, ...args: unknown[]): void
  info(message: string, ...args: unknown[]): void
  warn(message: string, ...args: unknown[]): void
  error(message: string, ...args: unknown[]): void
  /** Logger with an extra tag appended, e.g. `[ConditionWave][3f2a9c1e]` */
  child(tag: string): Logger
}

/**
 * Create a logger whose lines start with `[prefix]`.
 * @param prefix
 */
export function createLogger(prefix: string): Logger {
  const tag = `[${prefix}]`

  return {
    debug(message, ...args) {
      if (enabled('debug')) {
        console.debug(`${tag} ${message}`, ...args)
      }
    },
    info(message, ...args) {
      if (enabled('info')) {
        console.log(`${tag} ${message}`, ...args)
      }
    },
    warn(message, ...args) {
      if (enabled('warn')) {
        console.warn(`${tag} ${message}`, ...args)
      }
    },
    error(message, ...args) {
      if (enabled('error')) {
        console.error(`${tag} ${message}`, ...args)
      }
    },
    child(childTag) {
      return createLogger(`${prefix}][${childTag}`)
    },
  }
}
