import { describe, it, expect } from 'vitest'
import { inferSchema, schemaTypeOf, toJsonSchema } from './infer.js'
import type { Field } from '../types/api.js'

function field(overrides: Partial<Field> = {}): Field {
  return { id: 1, title: 'Field', type: 'text', settings: {}, ...overrides }
}

describe('schemaTypeOf', () => {
  it('maps a checkbox input to boolean', () => {
    expect(schemaTypeOf(field({ settings: { inputtype: 'checkbox' } }))).toBe('boolean')
  })

  it('maps a switch with a boolean default to boolean', () => {
    expect(schemaTypeOf(field({ settings: { inputtype: 'switch', defaulted: false } }))).toBe('boolean')
  })

  it('leaves a switch without a boolean default to the later rules', () => {
    expect(schemaTypeOf(field({ settings: { inputtype: 'switch', defaulted: 'yes' } }))).toBe('string')
  })

  it('can turn the switch rule off', () => {
    const switchField = field({ settings: { inputtype: 'switch', defaulted: true } })
    expect(schemaTypeOf(switchField, { switchAsBoolean: false })).toBe('string')
  })

  it('maps a multiple-choice list to an array of strings', () => {
    expect(schemaTypeOf(field({ settings: { style: 'list', multiple: true } }))).toBe('string_array')
    expect(schemaTypeOf(field({ settings: { style: 'list', multiple: 0 } }))).toBe('string')
  })

  it('maps datetime, counter, sketch, and attachments by field type', () => {
    expect(schemaTypeOf(field({ type: 'datetime' }))).toBe('datetime')
    expect(schemaTypeOf(field({ type: 'counter' }))).toBe('integer')
    expect(schemaTypeOf(field({ type: 'sketch' }))).toBe('mixed_array')
    expect(schemaTypeOf(field({ type: 'attachments' }))).toBe('mixed_array')
  })

  it('falls back to string', () => {
    expect(schemaTypeOf(field({ type: 'string' }))).toBe('string')
    expect(schemaTypeOf({ id: 7 })).toBe('string')
  })

  it('applies settings rules before type rules', () => {
    expect(schemaTypeOf(field({ type: 'counter', settings: { inputtype: 'checkbox' } }))).toBe('boolean')
    expect(
      schemaTypeOf(field({ type: 'datetime', settings: { style: 'list', multiple: true } })),
    ).toBe('string_array')
  })
})

describe('toJsonSchema', () => {
  it('declares attachments items as object or string', () => {
    expect(toJsonSchema('mixed_array')).toMatchObject({
      type: 'array',
      items: { type: ['object', 'string'] },
    })
  })

  it('declares datetime as a date-time string', () => {
    expect(toJsonSchema('datetime')).toMatchObject({ type: 'string', format: 'date-time' })
  })
})

describe('inferSchema', () => {
  it('prepends the fixed metadata properties', () => {
    const { schema, types } = inferSchema([field({ id: 3, title: 'Site' })])

    expect(Object.keys(schema.properties)).toEqual(['kpa_id', 'kpa_created', 'kpa_updated', 'Site'])
    expect([...types]).toEqual([
      ['kpa_id', 'integer'],
      ['kpa_created', 'datetime'],
      ['kpa_updated', 'datetime'],
      ['Site', 'string'],
    ])
    expect(schema.required).toEqual(['kpa_id', 'kpa_created', 'kpa_updated'])
  })

  it('declares form properties as nullable', () => {
    const { schema } = inferSchema([field({ id: 3, title: 'Count', type: 'counter' })])
    expect(schema.properties.Count).toMatchObject({ anyOf: [{ type: 'integer' }, { type: 'null' }] })
  })

  it('suffixes a repeated title with the field id, in encounter order', () => {
    const { resolution, types } = inferSchema([
      field({ id: 1, title: 'Name' }),
      field({ id: 2, title: 'Name' }),
    ])

    expect([...resolution]).toEqual([
      ['1', 'Name'],
      ['2', 'Name_2'],
    ])
    expect(types.get('Name_2')).toBe('string')
  })

  it('strips titles before comparing them', () => {
    const { resolution } = inferSchema([
      field({ id: 10, title: ' Location ' }),
      field({ id: 11, title: 'Location' }),
    ])
    expect(resolution.get('10')).toBe('Location')
    expect(resolution.get('11')).toBe('Location_11')
  })

  it('does not treat fixed property names as collisions', () => {
    const { resolution } = inferSchema([field({ id: 5, title: 'kpa_id' })])
    expect(resolution.get('5')).toBe('kpa_id')
  })

  it('keys the resolution by the string form of numeric ids', () => {
    const { resolution } = inferSchema([field({ id: 42, title: 'Notes' })])
    expect(resolution.get('42')).toBe('Notes')
  })

  it('declares a __proto__ title as an own property', () => {
    const { schema, resolution } = inferSchema([field({ id: 1, title: '__proto__' })])
    expect(resolution.get('1')).toBe('__proto__')
    expect(Object.hasOwn(schema.properties, '__proto__')).toBe(true)
    expect(Object.keys(schema.properties)).toEqual(['kpa_id', 'kpa_created', 'kpa_updated', '__proto__'])
  })

  it('keeps declaration order in types while integer-like names lead the properties', () => {
    const { schema, types } = inferSchema([field({ id: 1, title: 'Notes' }), field({ id: 2, title: '2024' })])
    expect([...types.keys()]).toEqual(['kpa_id', 'kpa_created', 'kpa_updated', 'Notes', '2024'])
    expect(Object.keys(schema.properties)).toEqual(['2024', 'kpa_id', 'kpa_created', 'kpa_updated', 'Notes'])
  })
})
