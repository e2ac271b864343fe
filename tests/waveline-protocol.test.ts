/**
 * Unit tests for the waveline line / record parser
 *
 * Response lines are made up but follow the device's wire format.
 */

import { describe, expect, it } from 'vitest'

import { IncompleteReadError, ProtocolError } from '../src/services/waveline-errors'
import {
  asFloat,
  asInt,
  compareVersions,
  decodeSamples,
  decodeTRRecord,
  encodeCommand,
  formatFilterSetup,
  keyValueMap,
  makeCommand,
  multilineOutputToDict,
  parseAERecordLine,
  parseFilterSetupLine,
  parseKeyValues,
  parseLenient,
  parseTRHeader,
  type RecordContext,
} from '../src/services/waveline-protocol'
import { int16Payload } from './mock-device-link'

const context: RecordContext = {
  timebaseHz: 1e7,
  defaultChannel: 1,
  conversions: new Map([
    [1, { adcToVolts: 1e-6, adcToEu: 1 }],
    [2, { adcToVolts: 2e-6, adcToEu: 4 }],
  ]),
}

describe('Commands', () => {
  it('should join verb, arguments and channel selector', () => {
    expect(makeCommand('set_acq', ['thr', 100], 0)).toBe('set_acq thr 100 @0')
    expect(makeCommand('set_adc_range', [1], 2)).toBe('set_adc_range 1 @2')
    expect(makeCommand('get_info')).toBe('get_info')
  })

  it('should terminate encoded commands with LF', () => {
    expect(encodeCommand('get_status').toString('utf-8')).toBe('get_status\n')
  })
})

describe('Key/value parsing', () => {
  it('should tokenize pairs, bare keys and spaced separators', () => {
    expect(parseKeyValues('temp=27 dummy T = 3044759')).toEqual([
      ['temp', '27'],
      ['dummy', null],
      ['T', '3044759'],
    ])
  })

  it('should read integers from a response line with unrelated bare keys', () => {
    const values = keyValueMap(Buffer.from('temp=27 dummy T = 3044759\n'))
    expect(asInt(values.get('T'))).toBe(3044759)
    expect(asInt(values.get('temp'))).toBe(27)
    expect(values.get('dummy')).toBe('')
  })

  it('should let the last duplicate key win', () => {
    expect(keyValueMap('A=1 A=2').get('A')).toBe('2')
  })

  it('should convert the leading token only', () => {
    expect(asInt('27 degC')).toBe(27)
    expect(asInt('-12')).toBe(-12)
    expect(asFloat('1.5625 uV')).toBe(1.5625)
    expect(asFloat('1e-3')).toBe(0.001)
  })

  it('should fall back to the default for empty values', () => {
    expect(asInt('')).toBe(0)
    expect(asInt(undefined, 5)).toBe(5)
    expect(asFloat('   ', 2.5)).toBe(2.5)
  })

  it('should reject non-numeric tokens', () => {
    expect(() => asInt('abc')).toThrow(ProtocolError)
    expect(() => asInt('1.5')).toThrow(ProtocolError)
    expect(() => asFloat('hot')).toThrow("Expected number, got 'hot'")
  })

  it('should parse multi-line blocks at the first separator', () => {
    const dict = multilineOutputToDict(['fw_version=2.2', ' adc2uv = 1.5 2 ', 'garbage', '=x', 'date=2024-01-02 03:04:05', 'fw_version=2.3'])
    expect(dict.get('fw_version')).toBe('2.3')
    expect(dict.get('adc2uv')).toBe('1.5 2')
    expect(dict.get('garbage')).toBe('')
    expect(dict.get('date')).toBe('2024-01-02 03:04:05')
    expect(dict.size).toBe(4)
  })

  it('should fall back on unparseable lenient fields only', () => {
    expect(parseLenient('temp', () => asFloat('hot'), -1)).toBe(-1)
    expect(() =>
      parseLenient(
        'temp',
        () => {
          throw new TypeError('boom')
        },
        0
      )
    ).toThrow(TypeError)
  })
})

describe('Filter description', () => {
  it('should parse frequencies in kHz to Hz', () => {
    expect(parseFilterSetupLine('10.5-350 kHz, order 4')).toEqual({ highpassHz: 10500, lowpassHz: 350000, order: 4 })
  })

  it('should map disabled stages to null', () => {
    expect(parseFilterSetupLine('none-350 kHz, order 4')).toEqual({ highpassHz: null, lowpassHz: 350000, order: 4 })
    expect(parseFilterSetupLine('10.5-none kHz, order 4')).toEqual({ highpassHz: 10500, lowpassHz: null, order: 4 })
    expect(parseFilterSetupLine('none-none kHz, order 0')).toEqual({ highpassHz: null, lowpassHz: null, order: 0 })
  })

  it('should return an empty filter for unrecognized text', () => {
    expect(parseFilterSetupLine('bypass')).toEqual({ highpassHz: null, lowpassHz: null, order: 0 })
  })

  it('should recover the filter from its formatted description', () => {
    const filters = [
      { highpassHz: 10500, lowpassHz: 350000, order: 4 },
      { highpassHz: 100000, lowpassHz: null, order: 8 },
      { highpassHz: null, lowpassHz: null, order: 0 },
    ]
    for (const filter of filters) {
      expect(parseFilterSetupLine(formatFilterSetup(filter))).toEqual(filter)
    }
    expect(formatFilterSetup(filters[0])).toBe('10.5-350 kHz, order 4')
  })
})

describe('Firmware versions', () => {
  it('should compare decimal versions element-wise', () => {
    expect(compareVersions('2.1', '2.2')).toBeLessThan(0)
    expect(compareVersions('2.2', '2.2')).toBe(0)
    expect(compareVersions('2.3', '2.2')).toBeGreaterThan(0)
    expect(compareVersions('2.10', '2.2')).toBeGreaterThan(0)
    expect(compareVersions('2', '2.2')).toBeLessThan(0)
  })

  it('should compare hex versions', () => {
    expect(compareVersions('00.20', '00.21', 16)).toBeLessThan(0)
    expect(compareVersions('00.2A', '00.21', 16)).toBeGreaterThan(0)
    expect(compareVersions('01.00', '00.21', 16)).toBeGreaterThan(0)
  })

  it('should reject malformed versions', () => {
    expect(() => compareVersions('2.x', '2.2')).toThrow(ProtocolError)
  })
})

describe('AE records', () => {
  it('should parse hit records and convert units', () => {
    const record = parseAERecordLine('H Ch=2 T=20000000 A=1000 R=30 D=400 C=12 E=50 TRAI=7 flags=1', context)

    expect(record).not.toBeNull()
    expect(record?.kind).toBe('ae')
    expect(record?.type).toBe('H')
    expect(record?.channel).toBe(2)
    expect(record?.time).toBe(2)
    expect(record?.amplitude).toBeCloseTo(0.002, 12)
    expect(record?.riseTime).toBeCloseTo(3e-6, 15)
    expect(record?.duration).toBeCloseTo(4e-5, 15)
    expect(record?.counts).toBe(12)
    expect(record?.energy).toBe(200)
    expect(record?.trai).toBe(7)
    expect(record?.flags).toBe(1)
  })

  it('should default missing numeric keys to 0', () => {
    const record = parseAERecordLine(Buffer.from('S Ch=1 T=10000000'), context)
    expect(record).toMatchObject({ type: 'S', channel: 1, time: 1, amplitude: 0, energy: 0, trai: 0, flags: 0 })
  })

  it('should use the default channel when the line has none', () => {
    expect(parseAERecordLine('H T=0 A=10', context)?.channel).toBe(1)
  })

  it('should skip record start markers and unknown record types', () => {
    expect(parseAERecordLine('R T=100', context)).toBeNull()
    expect(parseAERecordLine('X T=100', context)).toBeNull()
  })

  it('should reject records for unknown channels', () => {
    expect(() => parseAERecordLine('H Ch=3 T=0', context)).toThrow('Record for unknown channel 3')
  })

  it('should reject malformed values', () => {
    expect(() => parseAERecordLine('H Ch=1 T=abc', context)).toThrow(ProtocolError)
  })
})

describe('TR records', () => {
  it('should parse headers', () => {
    expect(parseTRHeader('Ch=2 TRAI=5 T=1000 NS=4', 1)).toEqual({ channel: 2, trai: 5, ticks: 1000, samples: 4 })
    expect(parseTRHeader('TRAI=6 T=20 NS=2', 1)).toEqual({ channel: 1, trai: 6, ticks: 20, samples: 2 })
  })

  it('should treat a header without TRAI as end of data', () => {
    expect(parseTRHeader('', 1)).toBeNull()
    expect(parseTRHeader('T=0 NS=0', 1)).toBeNull()
    expect(parseTRHeader('TRAI=0 NS=10', 1)).toBeNull()
  })

  it('should reject negative sample counts', () => {
    expect(() => parseTRHeader('TRAI=1 NS=-1', 1)).toThrow(ProtocolError)
  })

  it('should decode little-endian int16 samples', () => {
    expect(Array.from(decodeSamples(int16Payload([1, -2, 32767, -32768])))).toEqual([1, -2, 32767, -32768])
    expect(() => decodeSamples(Buffer.alloc(3))).toThrow(ProtocolError)
  })

  it('should convert payloads to volts unless raw', () => {
    const header = { channel: 1, trai: 5, ticks: 5000, samples: 3 }
    const trContext: RecordContext = { ...context, conversions: new Map([[1, { adcToVolts: 0.5, adcToEu: 1 }]]) }

    const record = decodeTRRecord(header, int16Payload([1, -2, 3]), trContext, false)
    expect(record.kind).toBe('tr')
    expect(record.time).toBe(0.0005)
    expect(record.data).toBeInstanceOf(Float32Array)
    expect(Array.from(record.data)).toEqual([0.5, -1, 1.5])
    expect(record.raw).toBe(false)

    const raw = decodeTRRecord(header, int16Payload([1, -2, 3]), trContext, true)
    expect(raw.data).toBeInstanceOf(Int16Array)
    expect(Array.from(raw.data)).toEqual([1, -2, 3])
    expect(raw.data.length).toBe(raw.samples)
  })

  it('should reject payloads that do not match the sample count', () => {
    const header = { channel: 1, trai: 1, ticks: 0, samples: 3 }
    expect(() => decodeTRRecord(header, int16Payload([1, 2]), context, true)).toThrow(
      'TR data samples (2) do not match expected number (3)'
    )
  })

  it('should carry partial bytes on incomplete reads', () => {
    const error = new IncompleteReadError(Buffer.from([1, 2]), 8)
    expect(error).toBeInstanceOf(ProtocolError)
    expect(error.message).toBe('Stream ended after 2 of 8 expected bytes')
  })
})
