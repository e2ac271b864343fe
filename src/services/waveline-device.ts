// * Waveline Device (TypeScript)
// * Connection lifecycle and command transport shared by the conditionWave and spotWave controllers.
// * ARCHITECTURE:
// * - Opens/closes the control link and owns the LinkReader fed by it
// * - Serializes every command round trip on one command lock
// * - Tracks DISCONNECTED / IDLE / ACQUIRING and emits 'state-change'
// * - Runs the AE / TR polling loop through acquire()

import EventEmitter from 'events'
import { performance } from 'perf_hooks'
import { v4 as uuidv4 } from 'uuid'

import { createLogger, type Logger } from '../libs/logger'
import type { AERecord, AcquisitionRecord, TRRecord } from '../types/waveline'
import { type AcquireOptions, type AcquisitionSource, pollAcquisition } from './acquisition'
import type { DeviceLink } from './link/device-link'
import { LinkReader } from './link/link-reader'
import type { TimingOptions } from './waveline-config'
import { ConnectionError, FirmwareTooOldError, ProtocolError, ValidationError } from './waveline-errors'
import {
  ALL_CHANNELS,
  compareVersions,
  encodeCommand,
  multilineOutputToDict,
  parseAERecordLine,
  type RecordContext,
} from './waveline-protocol'

// ============================================================================
// Type Definitions
// ============================================================================

/**
 *
 */
export enum DeviceState {
  DISCONNECTED = 'disconnected',
  IDLE = 'idle',
  ACQUIRING = 'acquiring',
}

// ============================================================================
// Helpers
// ============================================================================

/**
 * Require an integer within [min, max].
 * @param name - argument name for the error message
 * @param value
 * @param min
 * @param max
 * @throws ValidationError
 */
export function requireInteger(name: string, value: number, min: number, max = Number.MAX_SAFE_INTEGER): number {
  if (!Number.isInteger(value) || value < min || value > max) {
    const upper = max === Number.MAX_SAFE_INTEGER ? '' : `, <= ${max}`
    throw new ValidationError(`Invalid ${name} ${value} (expected integer >= ${min}${upper})`)
  }
  return value
}

/**
 * Require a finite number >= min.
 * @param name
 * @param value
 * @param min
 * @throws ValidationError
 */
export function requireNumber(name: string, value: number, min = 0): number {
  if (!Number.isFinite(value) || value < min) {
    throw new ValidationError(`Invalid ${name} ${value} (expected number >= ${min})`)
  }
  return value
}

// ============================================================================
// Device Base Class
// ============================================================================

// * Base controller for both devices.
// * EVENT EMISSION: 'state-change' (DeviceState), 'error' (Error, only with listeners attached).
/**
 *
 */
export abstract class WavelineDevice<O extends TimingOptions = TimingOptions>
  extends EventEmitter
  implements AcquisitionSource
{
  protected link: DeviceLink | null = null
  protected readonly reader = new LinkReader()
  protected readonly log: Logger
  private state = DeviceState.DISCONNECTED
  private commandChain: Promise<void> = Promise.resolve()
  private closing = false
  private starting: Promise<void> | null = null
  private stopping: Promise<void> | null = null

  /**
   *
   * @param name - log prefix, e.g. "ConditionWave"
   * @param channels - physical channel numbers
   * @param options - resolved options
   */
  protected constructor(
    name: string,
    readonly channels: readonly number[],
    readonly options: O
  ) {
    super()
    this.log = createLogger(name)
  }

  // ========================================================================
  // Device specifics
  // ========================================================================

  /** Create the control link (protected for test mocking) */
  protected abstract createLink(): DeviceLink

  /** Firmware gate, calibration and defaults; runs right after the link opened */
  protected abstract initialize(): Promise<void>

  /** Conversion context for records fetched now */
  protected abstract recordContext(): RecordContext

  /** Send the start command once the device is ready for it */
  protected abstract beginAcquisition(): Promise<void>
  protected abstract endAcquisition(): Promise<void>
  abstract getTRData(raw?: boolean): Promise<TRRecord[]>

  /** Fetch the raw AE lines of one get_ae_data response */
  protected abstract readAELines(): Promise<Buffer[]>

  // ========================================================================
  // Connection Management
  // ========================================================================

  get connected(): boolean {
    return this.state !== DeviceState.DISCONNECTED
  }

  /**
   *
   */
  getState(): DeviceState {
    return this.state
  }

  /**
   * Open the control link, check the firmware and load calibration.
   * The link is closed again if any step fails.
   */
  async connect(): Promise<void> {
    if (this.state !== DeviceState.DISCONNECTED) {
      throw new ConnectionError(`Already connected (state: ${this.state})`)
    }

    const link = this.createLink()
    link.on('data', (data: Buffer) => this.reader.feed(data))
    link.on('error', (error: Error) => this.handleLinkError(error))
    link.on('close', () => this.handleLinkClose(link))

    this.reader.reset()
    try {
      await link.open()
    } catch (error) {
      link.removeAllListeners()
      if (error instanceof ConnectionError) {
        throw error
      }
      throw new ConnectionError(`Failed to open ${link.description}: ${String(error)}`)
    }

    this.link = link
    this.commandChain = Promise.resolve()
    this.setState(DeviceState.IDLE)
    this.log.info(`Connected to ${link.description}`)

    try {
      await this.initialize()
    } catch (error) {
      this.log.error(`Initialization failed: ${error instanceof Error ? error.message : String(error)}`)
      await this.closeLink()
      throw error
    }
  }

  /**
   * Stop acquisition (if running) and close the connection. No-op when disconnected.
   */
  async close(): Promise<void> {
    if (this.state === DeviceState.DISCONNECTED) {
      return
    }
    if (this.state === DeviceState.ACQUIRING) {
      try {
        await this.stopAcquisition()
      } catch (error) {
        this.log.warn(`Could not stop acquisition before closing: ${String(error)}`)
      }
    }
    await this.beforeClose()
    await this.closeLink()
    this.log.info('Disconnected')
  }

  /** Hook for resources tied to the connection (streams); runs on close() and when the link drops */
  protected async beforeClose(): Promise<void> {}

  private async closeLink(): Promise<void> {
    const link = this.link
    this.closing = true
    try {
      if (link) {
        try {
          await link.close()
        } catch (error) {
          this.log.error(`Error closing link: ${String(error)}`)
        }
        link.removeAllListeners()
      }
    } finally {
      this.closing = false
      this.link = null
      this.reader.end()
      this.setState(DeviceState.DISCONNECTED)
    }
  }

  private handleLinkError(error: Error): void {
    this.log.error(`Link error: ${error.message}`)
    this.emitError(error)
  }

  private handleLinkClose(link: DeviceLink): void {
    this.reader.end()
    if (this.closing || this.link !== link) {
      return
    }
    this.log.warn(`Link to ${link.description} closed unexpectedly`)
    link.removeAllListeners()
    this.link = null
    this.setState(DeviceState.DISCONNECTED)
    this.beforeClose().catch((error: unknown) => {
      this.log.error(`Error releasing connection resources: ${String(error)}`)
    })
    this.emitError(new ConnectionError(`Link to ${link.description} closed unexpectedly`))
  }

  // ========================================================================
  // Acquisition State
  // ========================================================================

  /**
   * Start acquisition. No-op while acquiring; overlapping calls share one start.
   */
  async startAcquisition(): Promise<void> {
    this.requireLink()
    if (this.state === DeviceState.ACQUIRING) {
      return
    }
    if (!this.starting) {
      this.starting = this.beginAcquisition()
        .then(() => this.setState(DeviceState.ACQUIRING))
        .finally(() => {
          this.starting = null
        })
    }
    return this.starting
  }

  /**
   * Stop acquisition. No-op unless acquiring; overlapping calls share one stop.
   */
  async stopAcquisition(): Promise<void> {
    this.requireLink()
    if (this.state !== DeviceState.ACQUIRING) {
      return
    }
    if (!this.stopping) {
      this.stopping = this.endAcquisition()
        .then(() => this.setState(DeviceState.IDLE))
        .finally(() => {
          this.stopping = null
        })
    }
    return this.stopping
  }

  // ========================================================================
  // Command transport
  // ========================================================================

  /**
   * Run `task` once every earlier command round trip has finished.
   * @param task
   */
  protected exclusive<T>(task: () => Promise<T>): Promise<T> {
    const run = this.commandChain.then(task)
    // The chain itself never rejects; callers get the outcome through `run`
    this.commandChain = run.then(
      () => undefined,
      () => undefined
    )
    return run
  }

  /**
   * Write a command that has no response.
   * @param command - without terminator
   */
  protected sendCommand(command: string): Promise<void> {
    return this.exclusive(() => this.writeCommand(command))
  }

  /**
   * Write a command and read its response under the command lock.
   * Bytes left over from a failed read are dropped so they can't leak into the next response.
   * @param command
   * @param read
   */
  protected request<T>(command: string, read: () => Promise<T>): Promise<T> {
    return this.exclusive(async () => {
      await this.writeCommand(command)
      try {
        return await read()
      } catch (error) {
        this.reader.clear()
        throw error
      }
    })
  }

  /**
   * Send a command answered by a key/value block that ends with silence.
   * @param command
   * @param what - e.g. "device information", for the error message
   * @throws ProtocolError when the device sends nothing
   */
  protected async requestBlock(command: string, what: string): Promise<Map<string, string>> {
    const lines = await this.request(command, () => this.reader.readLines(this.options.blockTimeoutMs))
    if (lines.length === 0) {
      throw new ProtocolError(`Could not get ${what}`)
    }
    return multilineOutputToDict(lines)
  }

  private async writeCommand(command: string): Promise<void> {
    const link = this.requireLink()
    this.log.debug(`Send command: ${command}`)
    await link.write(encodeCommand(command))
  }

  protected requireLink(): DeviceLink {
    if (!this.link || this.state === DeviceState.DISCONNECTED) {
      throw new ConnectionError('Device not connected')
    }
    return this.link
  }

  /**
   * @param channel
   * @param allowAll - accept channel 0 (all channels)
   * @throws ValidationError
   */
  protected checkChannel(channel: number, allowAll = true): void {
    if (allowAll && channel === ALL_CHANNELS) {
      return
    }
    if (!this.channels.includes(channel)) {
      const valid = allowAll ? [ALL_CHANNELS, ...this.channels] : this.channels
      throw new ValidationError(`Invalid channel number ${channel}, expected one of ${valid.join(', ')}`)
    }
  }

  /**
   * @param version
   * @param minimum
   * @param radix
   * @throws FirmwareTooOldError
   */
  protected checkFirmwareVersion(version: string, minimum: string, radix: number): void {
    if (compareVersions(version, minimum, radix) < 0) {
      throw new FirmwareTooOldError(version, minimum)
    }
    this.log.debug(`Firmware version ${version} (minimum ${minimum})`)
  }

  // ========================================================================
  // Acquisition
  // ========================================================================

  /**
   * Hit and status records accumulated since the last call.
   * Malformed lines are logged and skipped.
   */
  async getAEData(): Promise<AERecord[]> {
    const lines = await this.readAELines()
    const context = this.recordContext()
    const records: AERecord[] = []
    for (const line of lines) {
      if (line.length === 0) {
        continue
      }
      try {
        const record = parseAERecordLine(line, context)
        if (record) {
          records.push(record)
        }
      } catch (error) {
        if (!(error instanceof ProtocolError)) {
          throw error
        }
        this.log.warn(`Skipping malformed AE line '${line.toString('utf-8')}': ${error.message}`)
      }
    }
    return records
  }

  /**
   * Start acquisition and yield AE and TR records until iteration stops or `signal` aborts.
   * Acquisition is stopped again on every exit path.
   * @param options
   */
  async *acquire(options: AcquireOptions = {}): AsyncGenerator<AcquisitionRecord, void, undefined> {
    const session = uuidv4().slice(0, 8)
    yield* pollAcquisition(
      this,
      options,
      {
        floorMs: this.options.pollFloorMs,
        idleDelayMs: this.options.pollIdleDelayMs,
        now: () => performance.now(),
        delay: (ms, signal) => this.delay(ms, signal),
      },
      this.log.child(session)
    )
  }

  protected setState(state: DeviceState): void {
    if (this.state === state) {
      return
    }
    this.state = state
    this.emit('state-change', state)
  }

  private emitError(error: Error): void {
    if (this.listenerCount('error') > 0) {
      this.emit('error', error)
    }
  }

  /**
   * Sleep; resolves early when `signal` aborts.
   * @param ms
   * @param signal
   */
  protected delay(ms: number, signal?: AbortSignal): Promise<void> {
    return new Promise((resolve) => {
      if (signal?.aborted) {
        resolve()
        return
      }
      const onAbort = (): void => {
        clearTimeout(timer)
        resolve()
      }
      const timer = setTimeout(() => {
        signal?.removeEventListener('abort', onAbort)
        resolve()
      }, ms)
      signal?.addEventListener('abort', onAbort, { once: true })
    })
  }
}
