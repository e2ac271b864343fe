export { ConditionWave, CONDITIONWAVE_DEFAULTS } from './services/conditionwave'
export type { ConditionWaveOptions, DiscoverySocket, StreamOptions } from './services/conditionwave'
export {
  CONDITIONWAVE_CHANNELS,
  CONDITIONWAVE_MAX_DECIMATION,
  CONDITIONWAVE_MAX_SAMPLE_RATE,
  CONDITIONWAVE_MIN_FIRMWARE_VERSION,
  CONDITIONWAVE_PORT,
  CONDITIONWAVE_RANGES,
} from './services/conditionwave'
export { SpotWave, SPOTWAVE_DEFAULTS } from './services/spotwave'
export type { SpotWaveOptions } from './services/spotwave'
export {
  SPOTWAVE_CHANNEL,
  SPOTWAVE_CLOCK,
  SPOTWAVE_MIN_FIRMWARE_VERSION,
  SPOTWAVE_PRODUCT_ID,
  SPOTWAVE_VENDOR_ID,
} from './services/spotwave'

export { DeviceState, WavelineDevice } from './services/waveline-device'
export { ChannelStream, ChannelStreamState, STREAM_HIGH_WATER_BLOCKS } from './services/channel-stream'
export type { AcquireOptions } from './services/acquisition'
export { DEFAULT_TIMING, resolveOptions } from './services/waveline-config'
export type { TimingOptions } from './services/waveline-config'

export {
  ConnectionError,
  FirmwareTooOldError,
  IncompleteReadError,
  ProtocolError,
  ReadTimeoutError,
  ValidationError,
} from './services/waveline-errors'

export { adcToVolts, computeAdcToEu, createCalibration } from './services/waveline-units'
export type { Calibration } from './services/waveline-units'
export { asFloat, asInt, formatFilterSetup, parseFilterSetupLine, parseKeyValues } from './services/waveline-protocol'

export { createLogger, getLogLevel, setLogLevel } from './libs/logger'
export type { Logger, LogLevel } from './libs/logger'

export type * from './types/waveline'
