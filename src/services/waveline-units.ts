/**
 * Conversion of ADC codes to physical units.
 *
 * All factors derive from calibration the device reports (`adc2uv` in get_info / get_setup),
 * so a Calibration is rebuilt on every connect and never mutated afterwards.
 */

import { ValidationError } from './waveline-errors'

/** Energy unit scale: 1 eu = 1e-14 V²s */
export const EU_PER_V2S = 1e14

/**
 * ADC-to-volts and ADC-to-eu factors per input range.
 */
export interface Calibration {
  readonly adcToVolts: readonly number[]
  readonly adcToEu: readonly number[]
  /** Sample rate the energy integral is referred to, in Hz */
  readonly sampleRate: number
}

/**
 * Energy factor for one range: adcToVolts² × 1e14 / sampleRate.
 * @param adcToVoltsFactor
 * @param sampleRate
 */
export function computeAdcToEu(adcToVoltsFactor: number, sampleRate: number): number {
  return (adcToVoltsFactor ** 2 * EU_PER_V2S) / sampleRate
}

/**
 *
 * @param adcToVoltsFactors
 * @param sampleRate
 */
export function createCalibration(adcToVoltsFactors: readonly number[], sampleRate: number): Calibration {
  if (adcToVoltsFactors.length === 0) {
    throw new ValidationError('Calibration needs at least one ADC-to-volts factor')
  }
  if (!Number.isFinite(sampleRate) || sampleRate <= 0) {
    throw new ValidationError(`Invalid sample rate for calibration: ${sampleRate}`)
  }
  return Object.freeze({
    adcToVolts: Object.freeze([...adcToVoltsFactors]),
    adcToEu: Object.freeze(adcToVoltsFactors.map((factor) => computeAdcToEu(factor, sampleRate))),
    sampleRate,
  })
}

function checkRangeIndex(calibration: Calibration, rangeIndex: number): void {
  if (!Number.isInteger(rangeIndex) || rangeIndex < 0 || rangeIndex >= calibration.adcToVolts.length) {
    throw new ValidationError(
      `Invalid range index ${rangeIndex}, calibration covers ${calibration.adcToVolts.length} range(s)`
    )
  }
}

/**
 *
 * @param calibration
 * @param rangeIndex
 */
export function adcToVoltsFactor(calibration: Calibration, rangeIndex: number): number {
  checkRangeIndex(calibration, rangeIndex)
  return calibration.adcToVolts[rangeIndex]
}

/**
 *
 * @param calibration
 * @param rangeIndex
 */
export function adcToEuFactor(calibration: Calibration, rangeIndex: number): number {
  checkRangeIndex(calibration, rangeIndex)
  return calibration.adcToEu[rangeIndex]
}

/**
 * @param calibration
 * @param code - signed 16-bit ADC value
 * @param rangeIndex
 * @returns code × calibration.adcToVolts[rangeIndex]
 */
export function adcToVolts(calibration: Calibration, code: number, rangeIndex: number): number {
  return code * adcToVoltsFactor(calibration, rangeIndex)
}

/**
 * @param calibration
 * @param energyCode - raw energy value from an AE record
 * @param rangeIndex
 */
export function adcToEnergy(calibration: Calibration, energyCode: number, rangeIndex: number): number {
  return energyCode * adcToEuFactor(calibration, rangeIndex)
}

/**
 * Scale a block of ADC values to volts (single precision, like the device's own tools).
 * @param data
 * @param factor
 */
export function scaleSamples(data: Int16Array, factor: number): Float32Array {
  const scaled = new Float32Array(data.length)
  for (let i = 0; i < data.length; i++) {
    scaled[i] = data[i] * factor
  }
  return scaled
}
