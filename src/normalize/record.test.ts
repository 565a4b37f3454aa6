import { describe, it, expect } from 'vitest'
import { Value } from '@sinclair/typebox/value'
import { normalizeRecord, flattenValue, epochToIso, parseEpochMillis } from './record.js'
import { inferSchema } from '../schema/infer.js'
import { RawDetailPayloadSchema, type RawDetailPayload } from '../types/api.js'

const inferred = inferSchema([
  { id: 1, title: 'Name', type: 'string' },
  { id: 2, title: 'Name', type: 'string' },
  { id: 3, title: 'Photos', type: 'attachments' },
  { id: 4, title: 'Inspected At', type: 'datetime' },
  { id: 5, title: 'Hazards', type: 'select', settings: { style: 'list', multiple: true } },
  { id: 6, title: 'Crew Size', type: 'counter' },
  { id: 7, title: 'Signed Off', type: 'switch', settings: { inputtype: 'checkbox' } },
])

function payload(values: Record<string, unknown>, id = 9): RawDetailPayload {
  return { id, created: 0, updated: 0, values }
}

describe('epochToIso', () => {
  it('converts epoch milliseconds to an ISO-8601 UTC string', () => {
    expect(epochToIso(0)).toBe('1970-01-01T00:00:00.000Z')
    expect(epochToIso(1700000000000)).toBe('2023-11-14T22:13:20.000Z')
    expect(epochToIso('1700000000000')).toBe('2023-11-14T22:13:20.000Z')
  })

  it('returns undefined for values that are not epoch timestamps', () => {
    expect(epochToIso('n/a')).toBeUndefined()
    expect(epochToIso('')).toBeUndefined()
    expect(epochToIso('  ')).toBeUndefined()
    expect(epochToIso(1e20)).toBeUndefined()
    expect(epochToIso(Number.NaN)).toBeUndefined()
    expect(epochToIso(null)).toBeUndefined()
  })
})

describe('parseEpochMillis', () => {
  it('accepts numbers and digit strings', () => {
    expect(parseEpochMillis(0)).toBe(0)
    expect(parseEpochMillis('-1000')).toBe(-1000)
    expect(parseEpochMillis(' 1700000000000 ')).toBe(1700000000000)
  })

  it('rejects decimals written as strings and infinities', () => {
    expect(parseEpochMillis('1.5')).toBeUndefined()
    expect(parseEpochMillis(Number.POSITIVE_INFINITY)).toBeUndefined()
  })
})

describe('RawDetailPayloadSchema timestamps', () => {
  it('accepts epoch numbers and numeric strings', () => {
    expect(Value.Check(RawDetailPayloadSchema, { id: 1, created: 0, updated: '1700000000000' })).toBe(true)
  })

  it('rejects blank, non-numeric, and out-of-range timestamps', () => {
    expect(Value.Check(RawDetailPayloadSchema, { id: 1, created: '', updated: 0 })).toBe(false)
    expect(Value.Check(RawDetailPayloadSchema, { id: 1, created: 'n/a', updated: 0 })).toBe(false)
    expect(Value.Check(RawDetailPayloadSchema, { id: 1, created: 0, updated: 1e20 })).toBe(false)
  })
})

describe('flattenValue', () => {
  it('takes the first selection for a string-typed field', () => {
    expect(flattenValue({ values: ['a', 'b'] }, 'string')).toEqual({ value: 'a' })
  })

  it('keeps the whole selection for an array-typed field', () => {
    expect(flattenValue({ values: ['a', 'b'] }, 'string_array')).toEqual({ value: ['a', 'b'] })
  })

  it('returns attachments unchanged', () => {
    const attachments = [{ id: 'att-1', name: 'photo.jpg' }]
    expect(flattenValue({ attachments }, 'mixed_array')).toEqual({ value: attachments })
  })

  it('converts utc_time to a timestamp', () => {
    expect(flattenValue({ utc_time: 1700000000000 }, 'datetime')).toEqual({
      value: '2023-11-14T22:13:20.000Z',
    })
  })

  it('leaves out a utc_time that is not an epoch timestamp', () => {
    expect(flattenValue({ utc_time: 'n/a' }, 'datetime')).toBeUndefined()
    expect(flattenValue({ utc_time: '' }, 'datetime')).toBeUndefined()
    expect(flattenValue({ utc_time: '1700000000000' }, 'datetime')).toEqual({
      value: '2023-11-14T22:13:20.000Z',
    })
  })

  it('falls through to the first key for anything else', () => {
    expect(flattenValue({ foo: 'bar' }, 'string')).toEqual({ value: 'bar' })
    expect(flattenValue({ count: 3 }, 'integer')).toEqual({ value: 3 })
  })

  it('falls through when a string field has an empty selection', () => {
    expect(flattenValue({ values: [] }, 'string')).toEqual({ value: [] })
  })

  it('yields nothing for an empty or missing container', () => {
    expect(flattenValue({}, 'string')).toBeUndefined()
    expect(flattenValue(undefined, 'string')).toBeUndefined()
    expect(flattenValue(null, 'string')).toBeUndefined()
  })

  it('uses a bare scalar container as the value', () => {
    expect(flattenValue('plain', 'string')).toEqual({ value: 'plain' })
  })
})

describe('normalizeRecord', () => {
  it('flattens the two-fields-one-title scenario', () => {
    const record = normalizeRecord(
      payload({ '1': { value: { values: ['x'] } }, '2': { value: { values: ['y'] } } }),
      inferred,
      new Set(),
    )

    expect(record).toEqual({
      kpa_id: 9,
      kpa_created: '1970-01-01T00:00:00.000Z',
      kpa_updated: '1970-01-01T00:00:00.000Z',
      Name: 'x',
      Name_2: 'y',
    })
  })

  it('flattens every container shape against its declared type', () => {
    const record = normalizeRecord(
      payload({
        '3': { value: { attachments: [{ id: 'a1' }] } },
        '4': { value: { utc_time: 1700000000000 } },
        '5': { value: { values: ['slip', 'trip'] } },
        '6': { value: { count: 4 } },
        '7': { value: { checked: true } },
      }),
      inferred,
      new Set(),
    )

    expect(record).toEqual({
      kpa_id: 9,
      kpa_created: '1970-01-01T00:00:00.000Z',
      kpa_updated: '1970-01-01T00:00:00.000Z',
      Photos: [{ id: 'a1' }],
      'Inspected At': '2023-11-14T22:13:20.000Z',
      Hazards: ['slip', 'trip'],
      'Crew Size': 4,
      'Signed Off': true,
    })
  })

  it('keeps the rest of the record when one utc_time is unreadable', () => {
    const record = normalizeRecord(
      payload({ '4': { value: { utc_time: 'n/a' } }, '6': { value: { count: 2 } } }),
      inferred,
      new Set(),
    )

    expect(record).toEqual({
      kpa_id: 9,
      kpa_created: '1970-01-01T00:00:00.000Z',
      kpa_updated: '1970-01-01T00:00:00.000Z',
      'Crew Size': 2,
    })
    expect(record).not.toHaveProperty('Inspected At')
  })

  it('keeps fields titled __proto__ or with an integer-like title', () => {
    const odd = inferSchema([
      { id: 1, title: '__proto__', type: 'string' },
      { id: 2, title: '2024', type: 'counter' },
    ])
    const record = normalizeRecord(
      payload({ '1': { value: { text: 'x' } }, '2': { value: { count: 3 } } }),
      odd,
      new Set(),
    )

    expect(record !== null && Object.hasOwn(record, '__proto__')).toBe(true)
    expect(Object.getPrototypeOf(record)).toBe(Object.prototype)
    expect(JSON.stringify(record)).toBe(
      '{"2024":3,"kpa_id":9,"kpa_created":"1970-01-01T00:00:00.000Z","kpa_updated":"1970-01-01T00:00:00.000Z","__proto__":"x"}',
    )
  })

  it('skips fields missing from the current metadata', () => {
    const record = normalizeRecord(payload({ '99': { value: { text: 'orphan' } } }), inferred, new Set())
    expect(record).toEqual({
      kpa_id: 9,
      kpa_created: '1970-01-01T00:00:00.000Z',
      kpa_updated: '1970-01-01T00:00:00.000Z',
    })
  })

  it('leaves out fields whose container is empty or absent', () => {
    const record = normalizeRecord(payload({ '1': { value: {} }, '2': {} }), inferred, new Set())
    expect(record).not.toHaveProperty('Name')
    expect(record).not.toHaveProperty('Name_2')
  })

  it('reads values from latest.responses when present', () => {
    const raw: RawDetailPayload = {
      id: 12,
      created: 1700000000000,
      updated: 1700000000000,
      latest: { responses: { '1': { value: { text: 'from latest' } } } },
    }
    expect(normalizeRecord(raw, inferred, new Set())).toEqual({
      kpa_id: 12,
      kpa_created: '2023-11-14T22:13:20.000Z',
      kpa_updated: '2023-11-14T22:13:20.000Z',
      Name: 'from latest',
    })
  })

  it('emits an id once per seen-id set', () => {
    const seen = new Set<string>()
    const first = normalizeRecord(payload({ '1': { value: { values: ['x'] } } }), inferred, seen)
    const second = normalizeRecord(payload({ '1': { value: { values: ['z'] } } }), inferred, seen)

    expect(first).not.toBeNull()
    expect(second).toBeNull()
    expect([...seen]).toEqual(['9'])
  })

  it('does not share duplicates across seen-id sets', () => {
    const raw = payload({})
    expect(normalizeRecord(raw, inferred, new Set())).not.toBeNull()
    expect(normalizeRecord(raw, inferred, new Set())).not.toBeNull()
  })
})
