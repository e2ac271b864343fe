/**
 * Per-channel raw sample stream (conditionWave streaming ports).
 *
 * The port carries int16 little-endian samples with no header at all; blocks are framed purely
 * by the block size agreed when the stream was created. The connection is opened as soon as the
 * stream is created so that the device's first samples after `start_acq` are not lost.
 *
 * States: CONNECTING → STREAMING → CLOSED (or CONNECTING → CLOSED when the connection fails).
 */

import EventEmitter from 'events'

import { createLogger } from '../libs/logger'
import type { StreamBlock } from '../types/waveline'
import type { DeviceLink } from './link/device-link'
import { LinkReader } from './link/link-reader'
import { ConnectionError, IncompleteReadError } from './waveline-errors'
import { BYTES_PER_SAMPLE, decodeSamples } from './waveline-protocol'
import { scaleSamples } from './waveline-units'

const log = createLogger('ChannelStream')

/** Blocks buffered ahead of the consumer before the connection is paused */
export const STREAM_HIGH_WATER_BLOCKS = 4

/**
 *
 */
export enum ChannelStreamState {
  CONNECTING = 'connecting',
  STREAMING = 'streaming',
  CLOSED = 'closed',
}

/**
 * Snapshot taken when the stream is created; later setting changes don't affect it.
 */
export interface ChannelStreamOptions {
  channel: number
  /** Samples per block */
  blocksize: number
  /** Seconds covered by one block: decimation × blocksize / sample rate */
  intervalSeconds: number
  adcToVolts: number
  raw: boolean
}

type StreamResult = IteratorResult<StreamBlock, undefined>

const DONE: StreamResult = { done: true, value: undefined }

function toError(error: unknown): Error {
  return error instanceof Error ? error : new ConnectionError(String(error))
}

// * Async iterator over fixed-size sample blocks of one channel.
// * EVENT EMISSION: 'state-change'.
/**
 *
 */
export class ChannelStream extends EventEmitter implements AsyncIterableIterator<StreamBlock> {
  /** Settles (never rejects) once the connection attempt has finished either way */
  readonly ready: Promise<void>

  private state = ChannelStreamState.CONNECTING
  private readonly reader = new LinkReader()
  private blockIndex = 0
  private failure: Error | null = null
  private closeRequested = false
  private paused = false

  /**
   *
   * @param link
   * @param options
   */
  constructor(
    private readonly link: DeviceLink,
    readonly options: ChannelStreamOptions
  ) {
    super()

    link.on('data', (data: Buffer) => this.handleData(data))
    link.on('close', () => this.reader.end())
    link.on('error', (error: Error) => {
      this.failure = this.failure ?? error
      this.reader.end()
    })

    this.ready = link.open().then(
      () => {
        if (this.state === ChannelStreamState.CONNECTING) {
          log.debug(`Channel ${options.channel} connected (${link.description})`)
          this.setState(ChannelStreamState.STREAMING)
        }
      },
      (error: unknown) => {
        this.failure = toError(error)
        log.error(`Channel ${options.channel} connection failed: ${this.failure.message}`)
        this.setState(ChannelStreamState.CLOSED)
      }
    )
  }

  get channel(): number {
    return this.options.channel
  }

  get blockBytes(): number {
    return this.options.blocksize * BYTES_PER_SAMPLE
  }

  get highWaterBytes(): number {
    return this.blockBytes * STREAM_HIGH_WATER_BLOCKS
  }

  /**
   *
   */
  getState(): ChannelStreamState {
    return this.state
  }

  [Symbol.asyncIterator](): this {
    return this
  }

  async next(): Promise<StreamResult> {
    await this.ready
    if (this.state === ChannelStreamState.CLOSED) {
      return this.finish()
    }

    let payload: Buffer
    try {
      payload = await this.reader.readExactly(this.blockBytes)
    } catch (error) {
      await this.close()
      if (this.closeRequested && this.failure === null) {
        return DONE
      }
      // End of stream exactly at a block boundary is a clean end; anything else is framing loss
      if (error instanceof IncompleteReadError && error.partial.length === 0) {
        return this.finish()
      }
      throw this.failure ?? error
    }
    if (this.paused && this.reader.bufferedBytes < this.highWaterBytes) {
      this.paused = false
      this.link.resume()
    }

    const time = this.blockIndex * this.options.intervalSeconds
    this.blockIndex++
    const adcValues = decodeSamples(payload)
    return {
      done: false,
      value: {
        time,
        data: this.options.raw ? adcValues : scaleSamples(adcValues, this.options.adcToVolts),
      },
    }
  }

  async return(): Promise<StreamResult> {
    this.closeRequested = true
    await this.close()
    return DONE
  }

  /**
   * Stop streaming and close the connection. Safe to call in any state.
   */
  async close(): Promise<void> {
    if (this.state === ChannelStreamState.CLOSED) {
      return
    }
    this.closeRequested = this.closeRequested || this.state === ChannelStreamState.CONNECTING || !this.reader.isEnded
    this.setState(ChannelStreamState.CLOSED)
    this.reader.end()
    await this.ready
    if (this.link.isOpen) {
      await this.link.close()
    }
    log.debug(`Channel ${this.options.channel} closed after ${this.blockIndex} block(s)`)
  }

  private handleData(data: Buffer): void {
    this.reader.feed(data)
    if (!this.paused && this.reader.bufferedBytes >= this.highWaterBytes) {
      log.debug(`Channel ${this.options.channel} consumer is behind, pausing connection`)
      this.paused = true
      this.link.pause()
    }
  }

  private finish(): StreamResult {
    const failure = this.failure
    this.failure = null
    if (failure) {
      throw failure
    }
    return DONE
  }

  private setState(state: ChannelStreamState): void {
    this.state = state
    this.emit('state-change', state)
  }
}
