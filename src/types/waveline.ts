/**
 * Shared waveline type definitions for both device drivers.
 *
 * conditionWave: two channels, TCP control on port 5432 plus one raw stream port per channel.
 * spotWave: one channel, USB virtual serial port.
 *
 * Times are in seconds, amplitudes in volts, energies in eu (1e-14 V²s, EN 1330-9)
 * unless a record is flagged `raw`.
 */

/**
 * IIR filter description as reported by `get_setup`.
 * A null frequency means that filter stage is disabled.
 */
export interface FilterSetup {
  /** Highpass corner frequency in Hz */
  highpassHz: number | null
  /** Lowpass corner frequency in Hz */
  lowpassHz: number | null
  /** Filter order (0 when no filter is active) */
  order: number
}

// ============================================================================
// Device snapshots
// ============================================================================

/**
 * Device information, fetched once at connect time.
 */
export interface ConditionWaveInfo {
  firmwareVersion: string
  fpgaVersion: string
  channelCount: number
  /** Number of selectable input ranges */
  rangeCount: number
  /** Max sampling rate in Hz */
  maxSampleRate: number
  /** Conversion factors from ADC values to volts, one per range */
  adcToVolts: number[]
}

/**
 *
 */
export interface SpotWaveInfo {
  /** Unique device identifier */
  hardwareId: string
  firmwareVersion: string
  /** Input range in dBAE */
  inputRangeDecibel: number
}

/**
 * Transient status snapshot; re-fetched on every call.
 */
export interface ConditionWaveStatus {
  /** Device temperature in °C */
  temperature: number
  /** Buffer size in bytes */
  bufferSize: number
}

/**
 *
 */
export interface SpotWaveStatus {
  /** Device temperature in °C */
  temperature: number
  acqEnabled: boolean
  logEnabled: boolean
  /** Log buffer usage in % */
  logDataUsage: number
  /** Device clock, null when the device reports an unparseable date */
  datetime: Date | null
}

/**
 * Fields common to both devices' `get_setup` responses.
 */
export interface AcquisitionSetup {
  /** Conversion factor from ADC values to volts */
  adcToVolts: number
  filterHighpassHz: number | null
  filterLowpassHz: number | null
  filterOrder: number
  continuousMode: boolean
  /** Threshold for hit-based acquisition in volts */
  thresholdVolts: number
  /** Duration discrimination time (DDT) in seconds */
  ddtSeconds: number
  statusIntervalSeconds: number
  trEnabled: boolean
  /** Decimation factor for transient data (>= 1) */
  trDecimation: number
  trPretriggerSamples: number
  trPostdurationSamples: number
}

export interface ConditionWaveSetup extends AcquisitionSetup {
  /** ADC input range in volts */
  adcRangeVolts: number
  /** Flag if channel is enabled */
  enabled: boolean
}

export interface SpotWaveSetup extends AcquisitionSetup {
  acqEnabled: boolean
  logEnabled: boolean
  /** Coupling check transmitter (CCT) / pulser interval in seconds */
  cctSeconds: number
}

// ============================================================================
// Acquisition records
// ============================================================================

/** Hit ("H") or status ("S") record */
export type AERecordType = 'H' | 'S'

/**
 * One acoustic-emission hit or status line.
 */
export interface AERecord {
  kind: 'ae'
  type: AERecordType
  channel: number
  /** Time in seconds */
  time: number
  /** Peak amplitude in volts */
  amplitude: number
  /** Rise time in seconds */
  riseTime: number
  /** Duration in seconds */
  duration: number
  /** Number of positive threshold crossings */
  counts: number
  /** Energy in eu (1e-14 V²s) */
  energy: number
  /** Transient recorder index; 0 means no transient record belongs to this hit */
  trai: number
  /** Hit flags bitmask */
  flags: number
}

/**
 * One transient waveform block. `data.length === samples` always holds.
 */
export interface TRRecord {
  kind: 'tr'
  channel: number
  /** Transient recorder index (key between AERecord and TRRecord) */
  trai: number
  /** Time in seconds */
  time: number
  samples: number
  /** Amplitudes in volts, or ADC values if `raw` */
  data: Int16Array | Float32Array
  raw: boolean
}

export type AcquisitionRecord = AERecord | TRRecord

/**
 * One block of a per-channel stream.
 */
export interface StreamBlock {
  /** Relative time of the block's first sample in seconds (first block: 0) */
  time: number
  /** Amplitudes in volts, or ADC values if the stream is raw */
  data: Int16Array | Float32Array
}

/**
 * Per-channel acquisition parameters mirrored locally after every setter.
 */
export interface ChannelSettings {
  rangeIndex: number
  decimation: number
  filter: FilterSetup
}
