// * conditionWave Controller (TypeScript)
// * Two-channel network device: TCP control connection plus one raw sample stream port per channel.
// * ARCHITECTURE:
// * - Control link on PORT, sample streams on PORT + channel
// * - Per-channel settings mirror (range, decimation, filter) feeds unit conversion
// * - start_acq waits for every pending stream connection (samples are pushed without buffering)
// * REFERENCE:
// * Line-based text protocol; AE / TR responses end with a blank line.

import dgram, { type RemoteInfo } from 'dgram'
import { networkInterfaces } from 'os'

import type {
  ChannelSettings,
  ConditionWaveInfo,
  ConditionWaveSetup,
  ConditionWaveStatus,
  FilterSetup,
  TRRecord,
} from '../types/waveline'
import { ChannelSettingsStore } from './channel-settings'
import { ChannelStream, ChannelStreamState } from './channel-stream'
import type { DeviceLink } from './link/device-link'
import { DEFAULT_CONNECT_TIMEOUT, TcpLink } from './link/tcp'
import { DEFAULT_TIMING, resolveOptions, type TimingOptions } from './waveline-config'
import { requireInteger, requireNumber, WavelineDevice } from './waveline-device'
import { ProtocolError, ValidationError } from './waveline-errors'
import {
  ALL_CHANNELS,
  asFloat,
  asInt,
  BLOCK_READ_TIMEOUT,
  CMD_GET_AE_DATA,
  CMD_GET_INFO,
  CMD_GET_SETUP,
  CMD_GET_STATUS,
  CMD_GET_TR_DATA,
  type ChannelConversion,
  decodeTRRecord,
  formatKilohertz,
  makeCommand,
  parseFilterSetupLine,
  parseLenient,
  parseTRHeader,
  type RecordContext,
} from './waveline-protocol'
import { adcToEuFactor, adcToVoltsFactor, type Calibration, createCalibration } from './waveline-units'

// ============================================================================
// Constants
// ============================================================================

export const CONDITIONWAVE_CHANNELS: readonly number[] = [1, 2]
/** Max sampling rate in Hz; also the tick rate of record timestamps */
export const CONDITIONWAVE_MAX_SAMPLE_RATE = 10_000_000
export const CONDITIONWAVE_PORT = 5432
/** Selectable input ranges in volts; the index is what goes over the wire */
export const CONDITIONWAVE_RANGES: readonly number[] = [0.05, 5.0]
export const CONDITIONWAVE_MIN_FIRMWARE_VERSION = '2.2'
export const CONDITIONWAVE_MAX_DECIMATION = 1000

/** Nominal conversion factors, replaced by the device's own on connect */
const DEFAULT_ADC_TO_VOLTS = [1.5625e-6, 1.5625e-4]

const DEFAULT_CHANNEL_SETTINGS: ChannelSettings = {
  rangeIndex: 0,
  decimation: 1,
  filter: { highpassHz: null, lowpassHz: null, order: 0 },
}

const DISCOVERY_MESSAGE = 'find'
const BROADCAST_ADDRESS = '255.255.255.255'

// ============================================================================
// Options
// ============================================================================

export interface ConditionWaveOptions extends TimingOptions {
  /** Control port; channel n streams on port + n */
  port: number
  connectTimeoutMs: number
}

export const CONDITIONWAVE_DEFAULTS: ConditionWaveOptions = {
  ...DEFAULT_TIMING,
  // AE / TR lines follow each other without pause; 100 ms of silence means the device is stuck
  lineTimeoutMs: BLOCK_READ_TIMEOUT,
  port: CONDITIONWAVE_PORT,
  connectTimeoutMs: DEFAULT_CONNECT_TIMEOUT,
}

export interface StreamOptions {
  /** Keep ADC values instead of converting to volts */
  raw?: boolean
}

/**
 * Minimal UDP socket used by discover(); `dgram.Socket` satisfies it.
 */
export interface DiscoverySocket {
  on(event: 'message', listener: (message: Buffer, remote: RemoteInfo) => void): this
  on(event: 'error', listener: (error: Error) => void): this
  bind(port?: number, callback?: () => void): this
  setBroadcast(flag: boolean): void
  send(message: string, port?: number, address?: string, callback?: (error: Error | null, bytes: number) => void): void
  close(callback?: () => void): this
}

// ============================================================================
// Response parsers
// ============================================================================

function required(values: Map<string, string>, key: string, what: string): string {
  const value = values.get(key)
  if (value === undefined) {
    throw new ProtocolError(`Missing '${key}' in ${what}`)
  }
  return value
}

/**
 * Parse a get_info block. `adc2uv` holds one µV factor per range, space separated.
 * @param values
 */
export function parseConditionWaveInfo(values: Map<string, string>): ConditionWaveInfo {
  const adcToVolts = required(values, 'adc2uv', 'device information')
    .trim()
    .split(/\s+/)
    .map((token) => asFloat(token) / 1e6)

  return {
    firmwareVersion: required(values, 'fw_version', 'device information'),
    fpgaVersion: values.get('fpga_version') ?? '',
    channelCount: asInt(values.get('channel_count')),
    rangeCount: asInt(values.get('range_count')),
    maxSampleRate: asInt(values.get('max_sample_rate')),
    adcToVolts,
  }
}

/**
 * Parse a get_status block; unparseable fields are logged and default to 0.
 * @param values
 */
export function parseConditionWaveStatus(values: Map<string, string>): ConditionWaveStatus {
  return {
    temperature: parseLenient('temp', () => asFloat(values.get('temp')), 0),
    bufferSize: parseLenient('buffer_size', () => asInt(values.get('buffer_size')), 0),
  }
}

/**
 * Parse a get_setup block of one channel.
 * @param values
 */
export function parseConditionWaveSetup(values: Map<string, string>): ConditionWaveSetup {
  const rangeIndex = asInt(values.get('adc_range'))
  const adcRangeVolts = CONDITIONWAVE_RANGES[rangeIndex]
  if (adcRangeVolts === undefined) {
    throw new ProtocolError(`Unknown ADC range index ${rangeIndex}`)
  }
  const filter = parseFilterSetupLine(values.get('filter') ?? '')

  return {
    adcRangeVolts,
    adcToVolts: asFloat(values.get('adc2uv')) / 1e6,
    filterHighpassHz: filter.highpassHz,
    filterLowpassHz: filter.lowpassHz,
    filterOrder: filter.order,
    enabled: asInt(values.get('enabled')) === 1,
    continuousMode: asInt(values.get('cont')) === 1,
    thresholdVolts: asFloat(values.get('thr')) / 1e6,
    ddtSeconds: asFloat(values.get('ddt')) / 1e6,
    statusIntervalSeconds: asFloat(values.get('status_interval')) / 1e3,
    trEnabled: asInt(values.get('tr_enabled')) === 1,
    trDecimation: asInt(values.get('tr_decimation')),
    trPretriggerSamples: asInt(values.get('tr_pre_trig')),
    trPostdurationSamples: asInt(values.get('tr_post_dur')),
  }
}

function channelLabel(channel: number): string {
  return channel === ALL_CHANNELS ? 'all channels' : `channel ${channel}`
}

function flag(enabled: boolean): number {
  return enabled ? 1 : 0
}

function localAddresses(): Set<string> {
  const addresses = new Set<string>()
  for (const entries of Object.values(networkInterfaces())) {
    for (const entry of entries ?? []) {
      if (entry.family === 'IPv4') {
        addresses.add(entry.address)
      }
    }
  }
  return addresses
}

// ============================================================================
// Controller
// ============================================================================

// * conditionWave device controller.
// * EVENT EMISSION: 'state-change', 'error' (see WavelineDevice).
/**
 *
 */
export class ConditionWave extends WavelineDevice<ConditionWaveOptions> {
  private readonly settings = new ChannelSettingsStore(CONDITIONWAVE_CHANNELS, DEFAULT_CHANNEL_SETTINGS)
  private calibration: Calibration = createCalibration(DEFAULT_ADC_TO_VOLTS, CONDITIONWAVE_MAX_SAMPLE_RATE)
  private readonly pendingStreamConnections = new Set<Promise<void>>()
  private readonly openStreams = new Set<ChannelStream>()

  /**
   *
   * @param address - IP address or host name
   * @param options
   */
  constructor(
    readonly address: string,
    options: Partial<ConditionWaveOptions> = {}
  ) {
    super('ConditionWave', CONDITIONWAVE_CHANNELS, resolveOptions(CONDITIONWAVE_DEFAULTS, options))
    requireInteger('port', this.options.port, 1, 65535 - CONDITIONWAVE_CHANNELS.length)
  }

  /**
   * Find devices on the local network by UDP broadcast.
   * @param timeoutMs - how long to collect answers
   * @param createSocket
   * @returns sorted IP addresses, without this host's own
   */
  static discover(
    timeoutMs = 500,
    createSocket: () => DiscoverySocket = () => dgram.createSocket('udp4')
  ): Promise<string[]> {
    const socket = createSocket()
    const responders = new Set<string>()

    return new Promise((resolve, reject) => {
      let timer: NodeJS.Timeout | null = null

      socket.on('message', (_message, remote) => responders.add(remote.address))
      socket.on('error', (error) => {
        if (timer) {
          clearTimeout(timer)
        }
        socket.close()
        reject(error)
      })
      socket.bind(CONDITIONWAVE_PORT, () => {
        socket.setBroadcast(true)
        socket.send(DISCOVERY_MESSAGE, CONDITIONWAVE_PORT, BROADCAST_ADDRESS)
        timer = setTimeout(() => {
          socket.close()
          const own = localAddresses()
          resolve([...responders].filter((address) => !own.has(address)).sort())
        }, timeoutMs)
      })
    })
  }

  protected createLink(): DeviceLink {
    return new TcpLink(this.address, this.options.port, this.options.connectTimeoutMs)
  }

  /**
   * Link for the raw sample stream of one channel (protected for test mocking).
   * @param channel
   */
  protected createStreamLink(channel: number): DeviceLink {
    return new TcpLink(this.address, this.options.port + channel, this.options.connectTimeoutMs)
  }

  protected async initialize(): Promise<void> {
    const info = await this.getInfo()
    this.checkFirmwareVersion(info.firmwareVersion, CONDITIONWAVE_MIN_FIRMWARE_VERSION, 10)
    if (info.adcToVolts.length < CONDITIONWAVE_RANGES.length) {
      throw new ProtocolError(
        `Device reports ${info.adcToVolts.length} ADC conversion factor(s), expected ${CONDITIONWAVE_RANGES.length}`
      )
    }
    const sampleRate = info.maxSampleRate > 0 ? info.maxSampleRate : CONDITIONWAVE_MAX_SAMPLE_RATE
    this.calibration = createCalibration(info.adcToVolts, sampleRate)

    this.settings.reset()
    await this.setRange(ALL_CHANNELS, CONDITIONWAVE_RANGES[DEFAULT_CHANNEL_SETTINGS.rangeIndex])
    await this.setTrDecimation(ALL_CHANNELS, DEFAULT_CHANNEL_SETTINGS.decimation)
  }

  protected recordContext(): RecordContext {
    const conversions = new Map<number, ChannelConversion>()
    for (const channel of CONDITIONWAVE_CHANNELS) {
      const { rangeIndex } = this.settings.get(channel)
      conversions.set(channel, {
        adcToVolts: adcToVoltsFactor(this.calibration, rangeIndex),
        adcToEu: adcToEuFactor(this.calibration, rangeIndex),
      })
    }
    return { timebaseHz: CONDITIONWAVE_MAX_SAMPLE_RATE, defaultChannel: 1, conversions }
  }

  protected override async beforeClose(): Promise<void> {
    await Promise.all([...this.openStreams].map((stream) => stream.close()))
    this.openStreams.clear()
    this.pendingStreamConnections.clear()
  }

  // ========================================================================
  // Queries
  // ========================================================================

  /**
   *
   */
  async getInfo(): Promise<ConditionWaveInfo> {
    this.requireLink()
    return parseConditionWaveInfo(await this.requestBlock(CMD_GET_INFO, 'device information'))
  }

  /**
   *
   */
  async getStatus(): Promise<ConditionWaveStatus> {
    this.requireLink()
    return parseConditionWaveStatus(await this.requestBlock(CMD_GET_STATUS, 'status'))
  }

  /**
   * @param channel - 1 or 2
   */
  async getSetup(channel: number): Promise<ConditionWaveSetup> {
    this.requireLink()
    this.checkChannel(channel, false)
    return parseConditionWaveSetup(await this.requestBlock(makeCommand(CMD_GET_SETUP, [], channel), 'setup'))
  }

  /**
   * Local mirror of the last range / decimation / filter sent to a channel.
   * @param channel
   */
  getChannelSettings(channel: number): ChannelSettings {
    this.checkChannel(channel, false)
    return this.settings.get(channel)
  }

  // ========================================================================
  // Settings
  // ========================================================================

  /**
   * Set input range.
   * @param channel - channel number (0 for all channels)
   * @param rangeVolts - 0.05 or 5
   */
  async setRange(channel: number, rangeVolts: number): Promise<void> {
    this.checkChannel(channel)
    const rangeIndex = CONDITIONWAVE_RANGES.indexOf(rangeVolts)
    if (rangeIndex === -1) {
      throw new ValidationError(`Invalid range ${rangeVolts} V, expected one of ${CONDITIONWAVE_RANGES.join(', ')}`)
    }
    this.log.info(`Set ${channelLabel(channel)} range to ${rangeVolts} V...`)
    await this.sendCommand(makeCommand('set_adc_range', [rangeIndex], channel))
    this.settings.update(channel, { rangeIndex })
  }

  /**
   * Enable or disable a channel.
   * @param channel
   * @param enabled
   */
  async setChannel(channel: number, enabled: boolean): Promise<void> {
    this.checkChannel(channel)
    this.log.info(`${enabled ? 'Enable' : 'Disable'} ${channelLabel(channel)}...`)
    await this.sendCommand(makeCommand('set_acq', ['enabled', flag(enabled)], channel))
  }

  /**
   * Continuous mode: hits are cut by status intervals instead of threshold crossings.
   * @param channel
   * @param enabled
   */
  async setContinuousMode(channel: number, enabled: boolean): Promise<void> {
    this.checkChannel(channel)
    await this.sendCommand(makeCommand('set_acq', ['cont', flag(enabled)], channel))
  }

  /**
   * Duration discrimination time.
   * @param channel
   * @param microseconds
   */
  async setDdt(channel: number, microseconds: number): Promise<void> {
    this.checkChannel(channel)
    requireNumber('DDT', microseconds)
    await this.sendCommand(makeCommand('set_acq', ['ddt', Math.trunc(microseconds)], channel))
  }

  /**
   * @param channel
   * @param seconds
   */
  async setStatusInterval(channel: number, seconds: number): Promise<void> {
    this.checkChannel(channel)
    requireNumber('status interval', seconds)
    await this.sendCommand(makeCommand('set_acq', ['status_interval', Math.trunc(seconds * 1e3)], channel))
  }

  /**
   * @param channel
   * @param enabled
   */
  async setTrEnabled(channel: number, enabled: boolean): Promise<void> {
    this.checkChannel(channel)
    await this.sendCommand(makeCommand('set_acq', ['tr_enabled', flag(enabled)], channel))
  }

  /**
   * Decimation factor of transient and stream data.
   * @param channel
   * @param factor - 1 to 1000
   */
  async setTrDecimation(channel: number, factor: number): Promise<void> {
    this.checkChannel(channel)
    requireInteger('decimation factor', factor, 1, CONDITIONWAVE_MAX_DECIMATION)
    await this.sendCommand(makeCommand('set_acq', ['tr_decimation', factor], channel))
    this.settings.update(channel, { decimation: factor })
  }

  /**
   * @param channel
   * @param samples - pre-trigger samples
   */
  async setTrPretrigger(channel: number, samples: number): Promise<void> {
    this.checkChannel(channel)
    requireInteger('pre-trigger samples', samples, 0)
    await this.sendCommand(makeCommand('set_acq', ['tr_pre_trig', samples], channel))
  }

  /**
   * @param channel
   * @param samples - post-duration samples
   */
  async setTrPostduration(channel: number, samples: number): Promise<void> {
    this.checkChannel(channel)
    requireInteger('post-duration samples', samples, 0)
    await this.sendCommand(makeCommand('set_acq', ['tr_post_dur', samples], channel))
  }

  /**
   * Set IIR filter frequencies and order.
   * @param channel
   * @param highpassHz - null disables the highpass stage
   * @param lowpassHz - null disables the lowpass stage
   * @param order
   */
  async setFilter(channel: number, highpassHz: number | null = null, lowpassHz: number | null = null, order = 8): Promise<void> {
    this.checkChannel(channel)
    requireInteger('filter order', order, 0)
    const filter: FilterSetup = { highpassHz, lowpassHz, order }
    this.log.info(
      `Set ${channelLabel(channel)} filter to ${formatKilohertz(highpassHz)}-${formatKilohertz(lowpassHz)} kHz (order: ${order})...`
    )
    await this.sendCommand(
      makeCommand('set_filter', [formatKilohertz(highpassHz), formatKilohertz(lowpassHz), order], channel)
    )
    this.settings.update(channel, { filter })
  }

  /**
   * Threshold for hit-based acquisition.
   * @param channel
   * @param microvolts
   */
  async setThreshold(channel: number, microvolts: number): Promise<void> {
    this.checkChannel(channel)
    requireNumber('threshold', microvolts)
    await this.sendCommand(makeCommand('set_acq', ['thr', microvolts], channel))
  }

  /**
   * Pulses are generated by a square wave, so `count` should be even to end LOW.
   * @param channel - channel number (0 cycles through all channels)
   * @param intervalSeconds - interval between pulses
   * @param count - pulses per channel, 0 for infinite pulses
   * @param cycles - pulse cycles through all channels
   */
  async startPulsing(channel: number, intervalSeconds = 1, count = 4, cycles = 1): Promise<void> {
    this.checkChannel(channel)
    requireNumber('pulse interval', intervalSeconds)
    requireInteger('pulse count', count, 0)
    requireInteger('pulse cycles', cycles, 0)
    if (count % 2 !== 0) {
      this.log.warn('Number of pulse counts should be even')
    }
    this.log.info(
      `Start pulsing on ${channelLabel(channel)} (interval: ${intervalSeconds} s, count: ${count}, cycles: ${cycles})...`
    )
    await this.sendCommand(makeCommand('start_pulsing', [intervalSeconds, count, cycles], channel))
  }

  /**
   *
   */
  async stopPulsing(): Promise<void> {
    this.log.info('Stop pulsing')
    await this.sendCommand('stop_pulsing')
  }

  // ========================================================================
  // Acquisition
  // ========================================================================

  /**
   * Send start_acq once every stream created so far has finished connecting.
   */
  protected async beginAcquisition(): Promise<void> {
    // Streams created while waiting join the set and are waited for as well
    while (this.pendingStreamConnections.size > 0) {
      this.log.debug(`Wait for ${this.pendingStreamConnections.size} stream connection(s)`)
      for (const connection of [...this.pendingStreamConnections]) {
        await connection
        this.pendingStreamConnections.delete(connection)
      }
    }
    this.log.info('Start data acquisition...')
    await this.sendCommand('start_acq')
  }

  protected async endAcquisition(): Promise<void> {
    this.log.info('Stop data acquisition...')
    await this.sendCommand('stop_acq')
  }

  protected readAELines(): Promise<Buffer[]> {
    this.requireLink()
    return this.request(CMD_GET_AE_DATA, async () => {
      const lines: Buffer[] = []
      for (;;) {
        const line = await this.reader.readLine(this.options.lineTimeoutMs)
        if (line.length === 0) {
          return lines
        }
        lines.push(line)
      }
    })
  }

  /**
   * Transient records accumulated since the last call.
   * @param raw - keep ADC values instead of converting to volts
   */
  async getTRData(raw = false): Promise<TRRecord[]> {
    this.requireLink()
    const context = this.recordContext()
    return this.request(CMD_GET_TR_DATA, async () => {
      const records: TRRecord[] = []
      for (;;) {
        const line = await this.reader.readLine(this.options.lineTimeoutMs)
        if (line.length === 0) {
          return records
        }
        const header = parseTRHeader(line, context.defaultChannel)
        if (!header) {
          throw new ProtocolError(`Malformed TR header: ${line.toString('utf-8')}`)
        }
        const payload = await this.reader.readExactly(header.samples * 2, this.options.binaryTimeoutMs)
        records.push(decodeTRRecord(header, payload, context, raw))
      }
    })
  }

  /**
   * Raw sample stream of one channel. The connection opens immediately; call
   * startAcquisition() afterwards so the first samples aren't lost.
   * @param channel - 1 or 2
   * @param blocksize - samples per block
   * @param options
   */
  stream(channel: number, blocksize: number, options: StreamOptions = {}): ChannelStream {
    this.requireLink()
    this.checkChannel(channel, false)
    requireInteger('block size', blocksize, 1)

    const settings = this.settings.get(channel)
    this.log.info(
      `Start streaming acquisition on channel ${channel} ` +
        `(blocksize: ${blocksize}, range: ${CONDITIONWAVE_RANGES[settings.rangeIndex]} V)`
    )

    const stream = new ChannelStream(this.createStreamLink(channel), {
      channel,
      blocksize,
      intervalSeconds: (settings.decimation * blocksize) / this.calibration.sampleRate,
      adcToVolts: adcToVoltsFactor(this.calibration, settings.rangeIndex),
      raw: options.raw ?? false,
    })
    this.openStreams.add(stream)
    stream.on('state-change', (state: ChannelStreamState) => {
      if (state === ChannelStreamState.CLOSED) {
        this.openStreams.delete(stream)
      }
    })
    this.pendingStreamConnections.add(stream.ready)
    return stream
  }
}
