/**
 * Driver options.
 *
 * Every device takes a partial options object; missing values come from the exported
 * defaults. All options are durations or port numbers, so anything that isn't a finite,
 * non-negative number is rejected up front.
 */

import { ValidationError } from './waveline-errors'
import { BINARY_READ_TIMEOUT, BLOCK_READ_TIMEOUT, LINE_READ_TIMEOUT, POLL_FLOOR, POLL_IDLE_DELAY } from './waveline-protocol'

/**
 * Timing shared by both devices (milliseconds).
 */
export interface TimingOptions {
  /** Silence that ends a get_info / get_status / get_setup response */
  blockTimeoutMs: number
  /** Max wait for one line of an AE / TR response */
  lineTimeoutMs: number
  /** Max wait for a binary payload */
  binaryTimeoutMs: number
  /** Polling round trips faster than this are followed by `pollIdleDelayMs` */
  pollFloorMs: number
  pollIdleDelayMs: number
}

export const DEFAULT_TIMING: TimingOptions = {
  blockTimeoutMs: BLOCK_READ_TIMEOUT,
  lineTimeoutMs: LINE_READ_TIMEOUT,
  binaryTimeoutMs: BINARY_READ_TIMEOUT,
  pollFloorMs: POLL_FLOOR,
  pollIdleDelayMs: POLL_IDLE_DELAY,
}

/**
 * Merge user options over defaults.
 * @param defaults
 * @param overrides
 * @throws ValidationError for a value that isn't a finite, non-negative number
 */
export function resolveOptions<T extends object>(defaults: T, overrides: Partial<T> = {}): T {
  const resolved: T = { ...defaults, ...overrides }
  for (const [key, value] of Object.entries(resolved)) {
    if (typeof value !== 'number' || !Number.isFinite(value) || value < 0) {
      throw new ValidationError(`Invalid option ${key}: ${String(value)}`)
    }
  }
  return resolved
}
