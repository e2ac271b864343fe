// * spotWave Controller (TypeScript)
// * Single-channel USB device on a virtual serial port.
// * ARCHITECTURE:
// * - Every command runs to completion under the command lock before the next one is written
// * - get_ae_data starts with a line count; get_tr_data ends with a header line without TRAI
// * - Acquisition is toggled with set_acq enabled 0/1 (no separate start/stop verbs)

import { SerialPort } from 'serialport'

import type { ChannelSettings, SpotWaveInfo, SpotWaveSetup, SpotWaveStatus, TRRecord } from '../types/waveline'
import { ChannelSettingsStore } from './channel-settings'
import type { DeviceLink } from './link/device-link'
import { DEFAULT_BAUD_RATE, SerialLink } from './link/serial'
import { DEFAULT_TIMING, resolveOptions, type TimingOptions } from './waveline-config'
import { requireInteger, requireNumber, WavelineDevice } from './waveline-device'
import { ProtocolError, ValidationError } from './waveline-errors'
import {
  asFloat,
  asInt,
  BYTES_PER_SAMPLE,
  CMD_GET_AE_DATA,
  CMD_GET_INFO,
  CMD_GET_SETUP,
  CMD_GET_STATUS,
  CMD_GET_TR_DATA,
  decodeSamples,
  decodeTRRecord,
  makeCommand,
  parseFilterSetupLine,
  parseLenient,
  parseTRHeader,
  type RecordContext,
} from './waveline-protocol'
import { adcToEuFactor, adcToVoltsFactor, type Calibration, createCalibration, scaleSamples } from './waveline-units'

// ============================================================================
// Constants
// ============================================================================

/** USB vendor id */
export const SPOTWAVE_VENDOR_ID = 8849
/** USB product id */
export const SPOTWAVE_PRODUCT_ID = 272
/** Internal clock in Hz; tick rate of timestamps and sampling rate of get_data */
export const SPOTWAVE_CLOCK = 2_000_000
/** Hex version digits */
export const SPOTWAVE_MIN_FIRMWARE_VERSION = '00.21'
export const SPOTWAVE_CHANNEL = 1

const DEFAULT_CHANNEL_SETTINGS: ChannelSettings = {
  rangeIndex: 0,
  decimation: 1,
  filter: { highpassHz: null, lowpassHz: null, order: 0 },
}

/** Device clock format: YYYY-MM-DD HH:MM:SS[.ffffff] */
const RE_DEVICE_DATETIME = /^(\d{4})-(\d{2})-(\d{2}) (\d{2}):(\d{2}):(\d{2})(?:\.(\d+))?$/

// ============================================================================
// Options
// ============================================================================

export interface SpotWaveOptions extends TimingOptions {
  baudRate: number
}

export const SPOTWAVE_DEFAULTS: SpotWaveOptions = {
  ...DEFAULT_TIMING,
  baudRate: DEFAULT_BAUD_RATE,
}

// ============================================================================
// Response parsers
// ============================================================================

const pad = (value: number, width = 2): string => String(value).padStart(width, '0')

/**
 * Parse the device clock (local time). Fractional seconds are optional and cut to milliseconds.
 * @param text
 * @returns null if the text doesn't match
 */
export function parseDeviceDatetime(text: string): Date | null {
  const match = RE_DEVICE_DATETIME.exec(text.trim())
  if (!match) {
    return null
  }
  const [, year, month, day, hours, minutes, seconds, fraction = '0'] = match
  const milliseconds = Number(fraction.padEnd(3, '0').slice(0, 3))
  return new Date(
    Number(year),
    Number(month) - 1,
    Number(day),
    Number(hours),
    Number(minutes),
    Number(seconds),
    milliseconds
  )
}

/**
 * Format a date for set_datetime (local time, whole seconds).
 * @param date
 */
export function formatDeviceDatetime(date: Date): string {
  const day = `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`
  const time = `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  return `${day} ${time}`
}

/**
 *
 * @param values
 */
export function parseSpotWaveInfo(values: Map<string, string>): SpotWaveInfo {
  const firmwareVersion = values.get('fw_version')
  if (firmwareVersion === undefined) {
    throw new ProtocolError(`Missing 'fw_version' in device information`)
  }
  return {
    hardwareId: values.get('hw_id') ?? '',
    firmwareVersion,
    inputRangeDecibel: asInt(values.get('input_range')),
  }
}

/**
 * Parse a get_status block. Fields that don't parse are logged and fall back to defaults.
 * @param values
 */
export function parseSpotWaveStatus(values: Map<string, string>): SpotWaveStatus {
  const date = values.get('date')
  const datetime = date === undefined ? null : parseDeviceDatetime(date)
  return {
    temperature: parseLenient('temp', () => asFloat(values.get('temp')), 0),
    acqEnabled: parseLenient('acq_enabled', () => asInt(values.get('acq_enabled')), 0) === 1,
    logEnabled: parseLenient('log_enabled', () => asInt(values.get('log_enabled')), 0) === 1,
    logDataUsage: parseLenient('log_data_usage', () => asInt(values.get('log_data_usage')), 0),
    datetime,
  }
}

/**
 *
 * @param values
 */
export function parseSpotWaveSetup(values: Map<string, string>): SpotWaveSetup {
  const filter = parseFilterSetupLine(values.get('filter') ?? '')
  return {
    acqEnabled: asInt(values.get('acq_enabled')) === 1,
    logEnabled: asInt(values.get('log_enabled')) === 1,
    continuousMode: asInt(values.get('cont')) === 1,
    adcToVolts: asFloat(values.get('adc2uv')) / 1e6,
    thresholdVolts: asFloat(values.get('thr')) / 1e6,
    ddtSeconds: asFloat(values.get('ddt')) / 1e6,
    statusIntervalSeconds: asFloat(values.get('status_interval')) / 1e3,
    filterHighpassHz: filter.highpassHz,
    filterLowpassHz: filter.lowpassHz,
    filterOrder: filter.order,
    trEnabled: asInt(values.get('tr_enabled')) === 1,
    trDecimation: asInt(values.get('tr_decimation')),
    trPretriggerSamples: asInt(values.get('tr_pre_trig')),
    trPostdurationSamples: asInt(values.get('tr_post_dur')),
    cctSeconds: asFloat(values.get('cct')),
  }
}

function flag(enabled: boolean): number {
  return enabled ? 1 : 0
}

// ============================================================================
// Controller
// ============================================================================

// * spotWave device controller.
// * EVENT EMISSION: 'state-change', 'error' (see WavelineDevice).
/**
 *
 */
export class SpotWave extends WavelineDevice<SpotWaveOptions> {
  private readonly settings = new ChannelSettingsStore([SPOTWAVE_CHANNEL], DEFAULT_CHANNEL_SETTINGS)
  private calibration: Calibration | null = null

  /**
   *
   * @param port - serial port path, e.g. "/dev/ttyACM0" or "COM6" (see discover())
   * @param options
   */
  constructor(
    readonly port: string,
    options: Partial<SpotWaveOptions> = {}
  ) {
    super('SpotWave', [SPOTWAVE_CHANNEL], resolveOptions(SPOTWAVE_DEFAULTS, options))
    requireInteger('baud rate', this.options.baudRate, 1)
  }

  /**
   * Serial ports with a spotWave attached.
   * @returns port paths
   */
  static async discover(): Promise<string[]> {
    const ports = await SerialPort.list()
    return ports
      .filter(
        (port) =>
          Number.parseInt(port.vendorId ?? '', 16) === SPOTWAVE_VENDOR_ID &&
          Number.parseInt(port.productId ?? '', 16) === SPOTWAVE_PRODUCT_ID
      )
      .map((port) => port.path)
  }

  protected createLink(): DeviceLink {
    return SerialLink.fromPath(this.port, this.options.baudRate)
  }

  protected async initialize(): Promise<void> {
    const info = await this.getInfo()
    this.checkFirmwareVersion(info.firmwareVersion, SPOTWAVE_MIN_FIRMWARE_VERSION, 16)
    // The device may still be acquiring from an earlier session
    await this.sendCommand('set_acq enabled 0')
    const setup = await this.getSetup()
    this.calibration = createCalibration([setup.adcToVolts], SPOTWAVE_CLOCK)
    this.settings.reset()
    this.settings.update(SPOTWAVE_CHANNEL, {
      decimation: Math.max(setup.trDecimation, 1),
      filter: { highpassHz: setup.filterHighpassHz, lowpassHz: setup.filterLowpassHz, order: setup.filterOrder },
    })
  }

  private requireCalibration(): Calibration {
    if (!this.calibration) {
      throw new ProtocolError('No calibration loaded, connect first')
    }
    return this.calibration
  }

  protected recordContext(): RecordContext {
    const calibration = this.requireCalibration()
    return {
      timebaseHz: SPOTWAVE_CLOCK,
      defaultChannel: SPOTWAVE_CHANNEL,
      conversions: new Map([
        [SPOTWAVE_CHANNEL, { adcToVolts: adcToVoltsFactor(calibration, 0), adcToEu: adcToEuFactor(calibration, 0) }],
      ]),
    }
  }

  // ========================================================================
  // Queries
  // ========================================================================

  /**
   *
   */
  async getInfo(): Promise<SpotWaveInfo> {
    this.requireLink()
    return parseSpotWaveInfo(await this.requestBlock(CMD_GET_INFO, 'device information'))
  }

  /**
   *
   */
  async getStatus(): Promise<SpotWaveStatus> {
    this.requireLink()
    const values = await this.requestBlock(CMD_GET_STATUS, 'status')
    const status = parseSpotWaveStatus(values)
    if (status.datetime === null) {
      this.log.warn(`Unparseable device date '${values.get('date') ?? ''}'`)
    }
    return status
  }

  /**
   *
   */
  async getSetup(): Promise<SpotWaveSetup> {
    this.requireLink()
    return parseSpotWaveSetup(await this.requestBlock(CMD_GET_SETUP, 'setup'))
  }

  /**
   * Local mirror of the last decimation / filter sent to the device.
   */
  getChannelSettings(): ChannelSettings {
    return this.settings.get(SPOTWAVE_CHANNEL)
  }

  // ========================================================================
  // Settings
  // ========================================================================

  /**
   * Continuous mode: hits are cut by status intervals instead of threshold crossings.
   * @param enabled
   */
  async setContinuousMode(enabled: boolean): Promise<void> {
    await this.sendCommand(makeCommand('set_acq', ['cont', flag(enabled)]))
  }

  /**
   * Duration discrimination time.
   * @param microseconds
   */
  async setDdt(microseconds: number): Promise<void> {
    requireNumber('DDT', microseconds)
    await this.sendCommand(makeCommand('set_acq', ['ddt', Math.trunc(microseconds)]))
  }

  /**
   * @param seconds
   */
  async setStatusInterval(seconds: number): Promise<void> {
    requireNumber('status interval', seconds)
    await this.sendCommand(makeCommand('set_acq', ['status_interval', Math.trunc(seconds * 1e3)]))
  }

  /**
   * @param enabled
   */
  async setTrEnabled(enabled: boolean): Promise<void> {
    await this.sendCommand(makeCommand('set_acq', ['tr_enabled', flag(enabled)]))
  }

  /**
   * @param factor - decimation factor (>= 1)
   */
  async setTrDecimation(factor: number): Promise<void> {
    requireInteger('decimation factor', factor, 1)
    await this.sendCommand(makeCommand('set_acq', ['tr_decimation', factor]))
    this.settings.update(SPOTWAVE_CHANNEL, { decimation: factor })
  }

  /**
   * @param samples
   */
  async setTrPretrigger(samples: number): Promise<void> {
    requireInteger('pre-trigger samples', samples, 0)
    await this.sendCommand(makeCommand('set_acq', ['tr_pre_trig', samples]))
  }

  /**
   * @param samples
   */
  async setTrPostduration(samples: number): Promise<void> {
    requireInteger('post-duration samples', samples, 0)
    await this.sendCommand(makeCommand('set_acq', ['tr_post_dur', samples]))
  }

  /**
   * Coupling check transmitter (CCT) / pulser interval. The pulser amplitude is 3.3 V.
   * @param intervalSeconds
   * @param sync - synchronize pulses with the first sample of getData()
   */
  async setCct(intervalSeconds: number, sync = false): Promise<void> {
    if (!Number.isFinite(intervalSeconds)) {
      throw new ValidationError(`Invalid CCT interval ${intervalSeconds}`)
    }
    const interval = sync && intervalSeconds > 0 ? -intervalSeconds : intervalSeconds
    await this.sendCommand(makeCommand('set_cct', [interval]))
  }

  /**
   * Set IIR filter frequencies and order. A disabled highpass is sent as 0 Hz,
   * a disabled lowpass as the Nyquist frequency.
   * @param highpassHz
   * @param lowpassHz
   * @param order
   */
  async setFilter(highpassHz: number | null = null, lowpassHz: number | null = null, order = 4): Promise<void> {
    requireInteger('filter order', order, 0)
    const highpassKhz = (highpassHz ?? 0) / 1e3
    const lowpassKhz = (lowpassHz ?? 0.5 * SPOTWAVE_CLOCK) / 1e3
    this.log.info(`Set filter to ${highpassKhz}-${lowpassKhz} kHz (order: ${order})...`)
    await this.sendCommand(makeCommand('set_filter', [highpassKhz, lowpassKhz, order]))
    this.settings.update(SPOTWAVE_CHANNEL, { filter: { highpassHz, lowpassHz, order } })
  }

  /**
   * Set the device clock.
   * @param date - defaults to now
   */
  async setDatetime(date: Date = new Date()): Promise<void> {
    await this.sendCommand(makeCommand('set_datetime', [formatDeviceDatetime(date)]))
  }

  /**
   * Threshold for hit-based acquisition.
   * @param microvolts
   */
  async setThreshold(microvolts: number): Promise<void> {
    requireNumber('threshold', microvolts)
    await this.sendCommand(makeCommand('set_acq', ['thr', microvolts]))
  }

  /**
   * Drain whatever the device still sends and discard it.
   */
  async clearBuffer(): Promise<void> {
    this.requireLink()
    await this.exclusive(async () => {
      const lines = await this.reader.readLines(this.options.blockTimeoutMs)
      this.reader.clear()
      this.log.debug(`Cleared buffer (${lines.length} line(s))`)
    })
  }

  // ========================================================================
  // Acquisition
  // ========================================================================

  protected async beginAcquisition(): Promise<void> {
    this.log.info('Start data acquisition...')
    await this.sendCommand('set_acq enabled 1')
  }

  protected async endAcquisition(): Promise<void> {
    this.log.info('Stop data acquisition...')
    await this.sendCommand('set_acq enabled 0')
  }

  protected readAELines(): Promise<Buffer[]> {
    this.requireLink()
    return this.request(CMD_GET_AE_DATA, async () => {
      const count = asInt((await this.reader.readLine(this.options.lineTimeoutMs)).toString('utf-8'))
      const lines: Buffer[] = []
      for (let i = 0; i < count; i++) {
        lines.push(await this.reader.readLine(this.options.lineTimeoutMs))
      }
      return lines
    })
  }

  /**
   * Transient records accumulated since the last call.
   * @param raw - keep ADC values instead of converting to volts
   */
  async getTRData(raw = false): Promise<TRRecord[]> {
    this.requireLink()
    const context = this.recordContext()
    return this.request(makeCommand(CMD_GET_TR_DATA, ['b']), async () => {
      const records: TRRecord[] = []
      for (;;) {
        const line = await this.reader.readLine(this.options.lineTimeoutMs)
        const header = parseTRHeader(line, SPOTWAVE_CHANNEL)
        if (!header) {
          this.log.debug(`Last TR header line: ${line.toString('utf-8')}`)
          return records
        }
        const payload = await this.reader.readExactly(header.samples * BYTES_PER_SAMPLE, this.options.binaryTimeoutMs)
        records.push(decodeTRRecord(header, payload, context, raw))
      }
    })
  }

  /**
   * Snapshot of transient data at the full sampling rate (2 MHz).
   * @param samples - number of samples to read
   * @param raw - keep ADC values instead of converting to volts
   */
  async getData(samples: number, raw = false): Promise<Int16Array | Float32Array> {
    this.requireLink()
    requireInteger('sample count', samples, 1)
    const calibration = this.requireCalibration()
    const payload = await this.request(makeCommand('get_data', ['b', samples]), () =>
      this.reader.readExactly(samples * BYTES_PER_SAMPLE, this.options.binaryTimeoutMs)
    )
    const adcValues = decodeSamples(payload)
    return raw ? adcValues : scaleSamples(adcValues, adcToVoltsFactor(calibration, 0))
  }
}
