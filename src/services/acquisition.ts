/**
 * Continuous AE / TR polling loop shared by both devices.
 *
 * Each iteration fetches pending AE records, then pending TR records, and yields them in that
 * order. A round trip faster than the floor is followed by a short idle delay so the loop doesn't
 * hammer the device with commands while adding little output latency.
 */

import type { Logger } from '../libs/logger'
import type { AERecord, AcquisitionRecord, TRRecord } from '../types/waveline'

export interface AcquisitionSource {
  startAcquisition(): Promise<void>
  stopAcquisition(): Promise<void>
  getAEData(): Promise<AERecord[]>
  getTRData(raw?: boolean): Promise<TRRecord[]>
}

export interface AcquireOptions {
  /** Keep TR amplitudes as ADC values */
  raw?: boolean
  /** Ends the loop after the current iteration */
  signal?: AbortSignal
}

export interface PollTiming {
  floorMs: number
  idleDelayMs: number
  now(): number
  delay(ms: number, signal?: AbortSignal): Promise<void>
}

/**
 * Start acquisition and yield records until the consumer stops iterating, the signal aborts
 * or a fetch fails. stopAcquisition() runs exactly once on every one of those exits.
 * @param source
 * @param options
 * @param timing
 * @param log
 */
export async function* pollAcquisition(
  source: AcquisitionSource,
  options: AcquireOptions,
  timing: PollTiming,
  log: Logger
): AsyncGenerator<AcquisitionRecord, void, undefined> {
  const { raw = false, signal } = options

  await source.startAcquisition()
  log.info('Acquisition loop started')
  let iterations = 0
  try {
    while (!signal?.aborted) {
      const started = timing.now()
      for (const record of await source.getAEData()) {
        yield record
      }
      for (const record of await source.getTRData(raw)) {
        yield record
      }
      iterations++
      if (timing.now() - started < timing.floorMs) {
        await timing.delay(timing.idleDelayMs, signal)
      }
    }
  } finally {
    log.info(`Acquisition loop finished after ${iterations} iteration(s)`)
    await source.stopAcquisition()
  }
}
