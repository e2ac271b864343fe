/**
 * Unit tests for the AE / TR polling loop
 *
 * The loop runs against a scripted source, so cancellation and error exits can be checked
 * without a device.
 */

import { describe, expect, it, vi } from 'vitest'

import { createLogger } from '../src/libs/logger'
import { type AcquisitionSource, pollAcquisition } from '../src/services/acquisition'
import { ProtocolError } from '../src/services/waveline-errors'
import type { AcquisitionRecord, AERecord, TRRecord } from '../src/types/waveline'

const log = createLogger('AcquisitionTest')

function aeRecord(trai: number): AERecord {
  return {
    kind: 'ae',
    type: 'H',
    channel: 1,
    time: 0,
    amplitude: 0,
    riseTime: 0,
    duration: 0,
    counts: 0,
    energy: 0,
    trai,
    flags: 0,
  }
}

function trRecord(trai: number): TRRecord {
  return { kind: 'tr', channel: 1, trai, time: 0, samples: 0, data: new Int16Array(0), raw: true }
}

/**
 *
 */
class ScriptedSource implements AcquisitionSource {
  started = 0
  stopped = 0
  rawFlags: Array<boolean | undefined> = []
  trError: Error | null = null

  /**
   *
   * @param ae - one batch per iteration
   * @param tr - one batch per iteration
   */
  constructor(
    private readonly ae: AERecord[][],
    private readonly tr: TRRecord[][]
  ) {}

  async startAcquisition(): Promise<void> {
    this.started++
  }

  async stopAcquisition(): Promise<void> {
    this.stopped++
  }

  async getAEData(): Promise<AERecord[]> {
    return this.ae.shift() ?? []
  }

  async getTRData(raw?: boolean): Promise<TRRecord[]> {
    this.rawFlags.push(raw)
    if (this.trError) {
      throw this.trError
    }
    return this.tr.shift() ?? []
  }
}

function fastTiming() {
  return {
    floorMs: 5,
    idleDelayMs: 10,
    now: (): number => 0,
    delay: vi.fn(async (_ms: number, _signal?: AbortSignal): Promise<void> => {}),
  }
}

function label(record: AcquisitionRecord): string {
  return `${record.kind}${record.trai}`
}

describe('pollAcquisition', () => {
  it('should yield AE records before TR records of each iteration', async () => {
    const source = new ScriptedSource([[aeRecord(1), aeRecord(2)], [aeRecord(3)]], [[trRecord(1)], [trRecord(2)]])
    const received: string[] = []

    for await (const record of pollAcquisition(source, { raw: true }, fastTiming(), log)) {
      received.push(label(record))
      if (received.length === 5) {
        break
      }
    }

    expect(received).toEqual(['ae1', 'ae2', 'tr1', 'ae3', 'tr2'])
    expect(source.rawFlags).toEqual([true, true])
  })

  it('should stop acquisition exactly once when the consumer breaks', async () => {
    const source = new ScriptedSource([[aeRecord(1), aeRecord(2)]], [])

    for await (const record of pollAcquisition(source, {}, fastTiming(), log)) {
      expect(record.trai).toBe(1)
      break
    }

    expect(source.started).toBe(1)
    expect(source.stopped).toBe(1)
  })

  it('should finish the current iteration and stop once when the signal aborts', async () => {
    const source = new ScriptedSource([[aeRecord(1)], [aeRecord(2)]], [[trRecord(1)]])
    const controller = new AbortController()
    const received: string[] = []

    for await (const record of pollAcquisition(source, { signal: controller.signal }, fastTiming(), log)) {
      received.push(label(record))
      controller.abort()
    }

    expect(received).toEqual(['ae1', 'tr1'])
    expect(source.stopped).toBe(1)
  })

  it('should stop acquisition once when a fetch fails', async () => {
    const source = new ScriptedSource([[aeRecord(1)]], [])
    source.trError = new ProtocolError('Malformed TR header')
    const received: string[] = []

    const consume = async (): Promise<void> => {
      for await (const record of pollAcquisition(source, {}, fastTiming(), log)) {
        received.push(label(record))
      }
    }

    await expect(consume()).rejects.toThrow('Malformed TR header')
    expect(received).toEqual(['ae1'])
    expect(source.stopped).toBe(1)
  })

  it('should not stop what never started', async () => {
    const source = new ScriptedSource([], [])
    source.startAcquisition = async () => {
      throw new ProtocolError('start failed')
    }

    const consume = async (): Promise<void> => {
      for await (const record of pollAcquisition(source, {}, fastTiming(), log)) {
        expect(record).toBeUndefined()
      }
    }

    await expect(consume()).rejects.toThrow('start failed')
    expect(source.stopped).toBe(0)
  })

  it('should idle between fast round trips only', async () => {
    const fast = fastTiming()
    const controller = new AbortController()
    const source = new ScriptedSource([[aeRecord(1)]], [])
    fast.delay.mockImplementation(async () => {
      controller.abort()
    })

    for await (const record of pollAcquisition(source, { signal: controller.signal }, fast, log)) {
      expect(record.trai).toBe(1)
    }
    expect(fast.delay).toHaveBeenCalledTimes(1)
    expect(fast.delay).toHaveBeenCalledWith(10, controller.signal)

    let clock = 0
    const slow = fastTiming()
    slow.now = () => (clock += 10)
    const slowSource = new ScriptedSource([[aeRecord(1)], [aeRecord(2)]], [])

    for await (const record of pollAcquisition(slowSource, {}, slow, log)) {
      if (record.trai === 2) {
        break
      }
    }
    expect(slow.delay).not.toHaveBeenCalled()
  })
})
