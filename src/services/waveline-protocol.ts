/**
 * waveline Protocol Parser
 *
 * Text command / response protocol shared by conditionWave and spotWave:
 * - Commands are ASCII lines `<verb> [args...] [@<channel>]` terminated by LF
 * - get_info / get_status / get_setup answer with `key=value` lines
 * - get_ae_data answers with one `H ...` / `S ...` line per record
 * - get_tr_data answers with a header line (`... TRAI=<n> T=<ticks> NS=<samples>`) directly
 *   followed by 2 × NS bytes of little-endian int16 samples
 *
 * Everything here is pure: conversion factors come in through a RecordContext
 * instead of being looked up on a device instance.
 */

import { createLogger } from '../libs/logger'
import type { AERecord, AERecordType, FilterSetup, TRRecord } from '../types/waveline'
import { ProtocolError } from './waveline-errors'
import { scaleSamples } from './waveline-units'

const log = createLogger('WavelineProtocol')

// ============================================================================
// Protocol Constants
// ============================================================================

/** Line termination for commands and responses */
export const COMMAND_TERMINATOR = '\n'

export const LINE_FEED = 0x0a
export const CARRIAGE_RETURN = 0x0d

/** Channel selector addressing every channel at once */
export const ALL_CHANNELS = 0

/** Bytes per sample on the wire (int16) */
export const BYTES_PER_SAMPLE = 2

export const CMD_GET_INFO = 'get_info'
export const CMD_GET_STATUS = 'get_status'
export const CMD_GET_SETUP = 'get_setup'
export const CMD_GET_AE_DATA = 'get_ae_data'
export const CMD_GET_TR_DATA = 'get_tr_data'

// ============================================================================
// Timing Constants (milliseconds)
// ============================================================================

/** Silence that ends a multi-line key=value response */
export const BLOCK_READ_TIMEOUT = 100
/** Max wait for a single line inside an AE / TR response */
export const LINE_READ_TIMEOUT = 1000
/** Max wait for a binary payload announced by a header */
export const BINARY_READ_TIMEOUT = 5000
/** Polling round trips faster than this are followed by an idle delay */
export const POLL_FLOOR = 5
export const POLL_IDLE_DELAY = 10

// ============================================================================
// Regular Expressions for Parsing
// ============================================================================

/**
 * Key with optional value: maximal run of non-space non-'=' characters, optionally
 * followed by '=' (spaces around it tolerated) and a maximal run of non-space characters.
 * Bare keys ("H", "dummy") coexist with pairs ("T=3044759", "T = 3044759").
 */
export const RE_KEY_VALUE = /([^\s=]+)(?:\s*=\s*(\S+))?/g

/**
 * Filter row of get_setup, e.g. "10.5-350 kHz, order 4" or "none-none kHz, order 0"
 * Group 1: highpass kHz or "none"
 * Group 2: lowpass kHz or "none"
 * Group 3: order
 */
export const RE_FILTER_SETUP = /^\s*(\S+)\s*-\s*(\S+)\s+.*o(?:rder)?\D*(\d+)/i

const RE_INTEGER = /^[+-]?\d+$/

// ============================================================================
// Type Definitions
// ============================================================================

export type KeyValueToken = [key: string, value: string | null]

/**
 * Conversion factors for one channel at its current input range.
 */
export interface ChannelConversion {
  adcToVolts: number
  adcToEu: number
}

/**
 * Everything the record parsers need to turn device integers into physical units.
 * Built by the controller from its calibration and channel settings before each fetch.
 */
export interface RecordContext {
  /** Device tick rate; ticks / timebaseHz = seconds */
  timebaseHz: number
  /** Channel assumed when a line carries no `Ch` key (single-channel devices) */
  defaultChannel: number
  conversions: ReadonlyMap<number, ChannelConversion>
}

/**
 * Parsed TR header line, before its binary payload is read.
 */
export interface TRHeader {
  channel: number
  trai: number
  ticks: number
  samples: number
}

// ============================================================================
// Commands
// ============================================================================

/**
 * Build a command line (without terminator).
 * @param verb - e.g. "set_acq"
 * @param args - positional arguments
 * @param channel - optional `@<channel>` selector (0 = all channels)
 */
export function makeCommand(verb: string, args: ReadonlyArray<string | number> = [], channel?: number): string {
  const parts = [verb, ...args.map(String)]
  if (channel !== undefined) {
    parts.push(`@${channel}`)
  }
  return parts.join(' ')
}

/**
 * Command line with LF terminator as wire bytes.
 * @param command
 */
export function encodeCommand(command: string): Buffer {
  return Buffer.from(command + COMMAND_TERMINATOR, 'utf-8')
}

// ============================================================================
// Key / value parsing
// ============================================================================

function asText(line: Buffer | string): string {
  return typeof line === 'string' ? line : line.toString('ascii')
}

/**
 * Ordered key / optional value tokens of one response line.
 * @param line
 */
export function parseKeyValues(line: Buffer | string): KeyValueToken[] {
  const tokens: KeyValueToken[] = []
  for (const match of asText(line).matchAll(RE_KEY_VALUE)) {
    tokens.push([match[1], match[2] ?? null])
  }
  return tokens
}

/**
 * Key / value tokens of one line as a map. Bare keys map to ''; the last duplicate wins.
 * @param line
 */
export function keyValueMap(line: Buffer | string): Map<string, string> {
  const map = new Map<string, string>()
  for (const [key, value] of parseKeyValues(line)) {
    map.set(key, value ?? '')
  }
  return map
}

function leadingToken(value: string | undefined): string {
  return (value ?? '').trim().split(' ')[0]
}

/**
 * First whitespace-delimited token as integer ("27 degC" → 27).
 * @param value
 * @param defaultValue - returned for an empty or missing value
 * @throws ProtocolError if the token is not an integer
 */
export function asInt(value: string | undefined, defaultValue = 0): number {
  const token = leadingToken(value)
  if (!token) {
    return defaultValue
  }
  if (!RE_INTEGER.test(token)) {
    throw new ProtocolError(`Expected integer, got '${token}'`)
  }
  return Number.parseInt(token, 10)
}

/**
 * First whitespace-delimited token as float ("1.5625 uV" → 1.5625).
 * @param value
 * @param defaultValue - returned for an empty or missing value
 * @throws ProtocolError if the token is not a number
 */
export function asFloat(value: string | undefined, defaultValue = 0): number {
  const token = leadingToken(value)
  if (!token) {
    return defaultValue
  }
  const parsed = Number(token)
  if (Number.isNaN(parsed)) {
    throw new ProtocolError(`Expected number, got '${token}'`)
  }
  return parsed
}

/**
 * Parse the multi-line output of get_info, get_status and get_setup.
 * Each line is split at its first '='; keys and values are trimmed, last duplicate wins.
 * @param lines
 */
export function multilineOutputToDict(lines: ReadonlyArray<Buffer | string>): Map<string, string> {
  const dict = new Map<string, string>()
  for (const line of lines) {
    const text = asText(line)
    const separator = text.indexOf('=')
    const key = (separator === -1 ? text : text.slice(0, separator)).trim()
    if (!key) {
      continue
    }
    dict.set(key, separator === -1 ? '' : text.slice(separator + 1).trim())
  }
  return dict
}

/**
 * Parse a field that must not abort the whole response; logs and falls back instead.
 * @param what - field name for the log line
 * @param parse
 * @param fallback
 */
export function parseLenient<T>(what: string, parse: () => T, fallback: T): T {
  try {
    return parse()
  } catch (error) {
    if (error instanceof ProtocolError) {
      log.warn(`Skipping unparseable field '${what}': ${error.message}`)
      return fallback
    }
    throw error
  }
}

// ============================================================================
// Filter description
// ============================================================================

function khzToHzOrNull(token: string): number | null {
  const khz = Number(token)
  return Number.isFinite(khz) ? khz * 1e3 : null
}

/**
 * Parse the filter row of get_setup.
 *
 * Examples:
 *   10.5-350 kHz, order 4
 *   10.5-none kHz, order 4
 *   none-350 kHz, order 4
 *   none-none kHz, order 0
 * @param text
 * @returns frequencies in Hz (null = stage disabled); { null, null, 0 } if the row doesn't match
 */
export function parseFilterSetupLine(text: string): FilterSetup {
  const match = RE_FILTER_SETUP.exec(text)
  if (!match) {
    return { highpassHz: null, lowpassHz: null, order: 0 }
  }
  return {
    highpassHz: khzToHzOrNull(match[1]),
    lowpassHz: khzToHzOrNull(match[2]),
    order: Number.parseInt(match[3], 10),
  }
}

/**
 * Frequency in Hz as the kHz token used by set_filter and get_setup ("none" when disabled).
 * @param hz
 */
export function formatKilohertz(hz: number | null): string {
  return hz === null ? 'none' : String(hz / 1e3)
}

/**
 * Inverse of parseFilterSetupLine.
 * @param filter
 */
export function formatFilterSetup(filter: FilterSetup): string {
  return `${formatKilohertz(filter.highpassHz)}-${formatKilohertz(filter.lowpassHz)} kHz, order ${filter.order}`
}

// ============================================================================
// Firmware versions
// ============================================================================

/**
 * Split a dotted version ("2.2", hex "00.21") into integers.
 * @param version
 * @param radix - 10 for conditionWave, 16 for spotWave
 */
export function parseVersion(version: string, radix = 10): number[] {
  const digits = radix === 16 ? /^[0-9a-f]+$/i : /^\d+$/
  const parts = version.trim().split('.')
  return parts.map((part) => {
    if (!digits.test(part)) {
      throw new ProtocolError(`Invalid firmware version '${version}'`)
    }
    return Number.parseInt(part, radix)
  })
}

/**
 * Element-wise comparison; a version that is a prefix of the other is the smaller one.
 * @param a
 * @param b
 * @param radix
 * @returns negative, 0 or positive
 */
export function compareVersions(a: string, b: string, radix = 10): number {
  const left = parseVersion(a, radix)
  const right = parseVersion(b, radix)
  const length = Math.min(left.length, right.length)
  for (let i = 0; i < length; i++) {
    if (left[i] !== right[i]) {
      return left[i] - right[i]
    }
  }
  return left.length - right.length
}

// ============================================================================
// AE / TR records
// ============================================================================

function conversionFor(context: RecordContext, channel: number): ChannelConversion {
  const conversion = context.conversions.get(channel)
  if (!conversion) {
    throw new ProtocolError(`Record for unknown channel ${channel}`)
  }
  return conversion
}

function isAERecordType(tag: string): tag is AERecordType {
  return tag === 'H' || tag === 'S'
}

function channelOf(values: Map<string, string>, context: RecordContext): number {
  return values.has('Ch') ? asInt(values.get('Ch')) : context.defaultChannel
}

/**
 * Parse one get_ae_data line.
 *
 * Missing numeric keys default to 0, so `trai === 0` marks a hit without a transient record.
 * @param line
 * @param context
 * @returns the record, or null for record start markers ("R") and unknown record types
 * @throws ProtocolError for malformed values or unknown channels
 */
export function parseAERecordLine(line: Buffer | string, context: RecordContext): AERecord | null {
  const text = asText(line)
  const recordType = text.charAt(0)

  if (recordType === 'R') {
    return null
  }
  if (!isAERecordType(recordType)) {
    log.warn(`Unknown AE data record: ${text}`)
    return null
  }

  const values = keyValueMap(text)
  const channel = channelOf(values, context)
  const conversion = conversionFor(context, channel)
  const ticks = (key: string): number => asInt(values.get(key)) / context.timebaseHz

  return {
    kind: 'ae',
    type: recordType,
    channel,
    time: ticks('T'),
    amplitude: asInt(values.get('A')) * conversion.adcToVolts,
    riseTime: ticks('R'),
    duration: ticks('D'),
    counts: asInt(values.get('C')),
    energy: asInt(values.get('E')) * conversion.adcToEu,
    trai: asInt(values.get('TRAI')),
    flags: asInt(values.get('flags')),
  }
}

/**
 * Parse a TR header line.
 *
 * Every transient record has a positive index, so a header without `TRAI` (or TRAI <= 0)
 * is the end-of-data line spotWave sends after its last record. This is specific to TR headers;
 * `trai === 0` in an AE record still just means "no transient record".
 * @param line
 * @param defaultChannel
 * @returns the header, or null for the end-of-data line
 */
export function parseTRHeader(line: Buffer | string, defaultChannel: number): TRHeader | null {
  const values = keyValueMap(line)
  const trai = asInt(values.get('TRAI'))
  if (trai <= 0) {
    return null
  }
  const samples = asInt(values.get('NS'))
  if (samples < 0) {
    throw new ProtocolError(`Negative sample count in TR header: ${asText(line)}`)
  }
  return {
    channel: values.has('Ch') ? asInt(values.get('Ch')) : defaultChannel,
    trai,
    ticks: asInt(values.get('T')),
    samples,
  }
}

/**
 * Little-endian int16 payload → samples.
 * @param payload
 */
export function decodeSamples(payload: Buffer): Int16Array {
  if (payload.length % BYTES_PER_SAMPLE !== 0) {
    throw new ProtocolError(`Odd payload length ${payload.length} for int16 samples`)
  }
  const samples = new Int16Array(payload.length / BYTES_PER_SAMPLE)
  for (let i = 0; i < samples.length; i++) {
    samples[i] = payload.readInt16LE(i * BYTES_PER_SAMPLE)
  }
  return samples
}

/**
 * Combine a TR header with its payload.
 * @param header
 * @param payload - exactly 2 × header.samples bytes
 * @param context
 * @param raw - keep ADC values instead of converting to volts
 * @throws ProtocolError if the payload doesn't hold exactly header.samples samples
 */
export function decodeTRRecord(header: TRHeader, payload: Buffer, context: RecordContext, raw: boolean): TRRecord {
  if (payload.length !== header.samples * BYTES_PER_SAMPLE) {
    throw new ProtocolError(
      `TR data samples (${payload.length / BYTES_PER_SAMPLE}) do not match expected number (${header.samples})`
    )
  }
  const conversion = conversionFor(context, header.channel)
  const adcValues = decodeSamples(payload)

  return {
    kind: 'tr',
    channel: header.channel,
    trai: header.trai,
    time: header.ticks / context.timebaseHz,
    samples: header.samples,
    data: raw ? adcValues : scaleSamples(adcValues, conversion.adcToVolts),
    raw,
  }
}
