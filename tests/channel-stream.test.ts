import { describe, expect, it } from 'vitest'

import { ChannelStream, ChannelStreamState, type ChannelStreamOptions } from '../src/services/channel-stream'
import { ConnectionError, IncompleteReadError } from '../src/services/waveline-errors'
import { int16Payload, MockDeviceLink } from './mock-device-link'

const options: ChannelStreamOptions = { channel: 1, blocksize: 2, intervalSeconds: 0.001, adcToVolts: 0.5, raw: false }

describe('ChannelStream', () => {
  it('should yield timed blocks and end cleanly at a block boundary', async () => {
    const link = new MockDeviceLink('stream 1')
    const stream = new ChannelStream(link, options)
    await stream.ready
    expect(stream.getState()).toBe(ChannelStreamState.STREAMING)

    link.simulateData(int16Payload([2, 4, 6]))
    link.simulateData(int16Payload([8, 10, 12]))
    link.simulateClose()

    const blocks: Array<{ time: number; data: number[] }> = []
    for await (const block of stream) {
      expect(block.data).toBeInstanceOf(Float32Array)
      blocks.push({ time: block.time, data: Array.from(block.data) })
    }

    expect(blocks).toEqual([
      { time: 0, data: [1, 2] },
      { time: 0.001, data: [3, 4] },
      { time: 0.002, data: [5, 6] },
    ])
    expect(stream.getState()).toBe(ChannelStreamState.CLOSED)
  })

  it('should pause the connection while the consumer is behind', async () => {
    const link = new MockDeviceLink()
    const stream = new ChannelStream(link, options)
    await stream.ready
    expect(stream.highWaterBytes).toBe(16)

    link.simulateData(int16Payload([1, 2, 3, 4, 5, 6]))
    expect(link.paused).toBe(false)
    link.simulateData(int16Payload([7, 8]))
    expect(link.paused).toBe(true)

    const result = await stream.next()
    expect(result.done).toBe(false)
    expect(link.paused).toBe(false)
  })

  it('should keep ADC values for raw streams', async () => {
    const link = new MockDeviceLink()
    const stream = new ChannelStream(link, { ...options, raw: true })
    link.simulateData(int16Payload([-3, 7]))

    const result = await stream.next()
    expect(result.done).toBe(false)
    if (!result.done) {
      expect(result.value.data).toBeInstanceOf(Int16Array)
      expect(Array.from(result.value.data)).toEqual([-3, 7])
    }
  })

  it('should fail on a partial block at end of stream', async () => {
    const link = new MockDeviceLink()
    const stream = new ChannelStream(link, options)
    await stream.ready
    link.simulateData(Buffer.concat([int16Payload([1, 2]), Buffer.from([7])]))
    link.simulateClose()

    expect((await stream.next()).done).toBe(false)
    const error = await stream.next().catch((e: unknown) => e)
    expect(error).toBeInstanceOf(IncompleteReadError)
    if (error instanceof IncompleteReadError) {
      expect(error.partial.length).toBe(1)
      expect(error.expected).toBe(4)
    }
    expect((await stream.next()).done).toBe(true)
  })

  it('should surface a failed connection once', async () => {
    const link = new MockDeviceLink()
    link.openError = new ConnectionError('Connection refused')
    const stream = new ChannelStream(link, options)
    await stream.ready

    expect(stream.getState()).toBe(ChannelStreamState.CLOSED)
    await expect(stream.next()).rejects.toThrow('Connection refused')
    expect((await stream.next()).done).toBe(true)
  })

  it('should close while still connecting', async () => {
    const link = new MockDeviceLink()
    link.holdConnection()
    const stream = new ChannelStream(link, options)
    const states: ChannelStreamState[] = []
    stream.on('state-change', (state: ChannelStreamState) => states.push(state))

    const closing = stream.close()
    link.releaseConnection()
    await closing

    expect(states).toEqual([ChannelStreamState.CLOSED])
    expect(link.isOpen).toBe(false)
    expect((await stream.next()).done).toBe(true)
  })

  it('should end a pending read when the consumer returns', async () => {
    const link = new MockDeviceLink()
    const stream = new ChannelStream(link, options)
    await stream.ready

    const pending = stream.next()
    await stream.return()

    expect((await pending).done).toBe(true)
    expect(link.isOpen).toBe(false)
  })
})
