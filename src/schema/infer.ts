/**
 * Per-form schema inference.
 *
 * Maps field metadata to one SchemaType per field, then to a TypeBox object
 * schema. Builds the field-id -> title lookup that record normalization uses,
 * so schema and records always agree on property names.
 */

import { Type, type TObject, type TSchema } from '@sinclair/typebox'
import type { Field } from '../types/api.js'

export type SchemaType =
  | 'boolean'
  | 'integer'
  | 'datetime'
  | 'string_array'
  | 'mixed_array'
  | 'string'

export const ID_PROPERTY = 'kpa_id'
export const CREATED_PROPERTY = 'kpa_created'
export const UPDATED_PROPERTY = 'kpa_updated'

/** Metadata properties present in every detail schema, ahead of form fields */
export const FIXED_PROPERTIES: ReadonlyArray<readonly [string, SchemaType]> = [
  [ID_PROPERTY, 'integer'],
  [CREATED_PROPERTY, 'datetime'],
  [UPDATED_PROPERTY, 'datetime'],
]

export interface InferOptions {
  /** Treat `inputtype: switch` with a boolean `defaulted` setting as boolean (default true) */
  switchAsBoolean?: boolean
}

export interface InferredSchema {
  schema: TObject
  /** Property name -> SchemaType, fixed properties first, in field order */
  types: ReadonlyMap<string, SchemaType>
  /** String(field.id) -> property name */
  resolution: ReadonlyMap<string, string>
}

/** First matching rule wins. */
export function schemaTypeOf(field: Field, options: InferOptions = {}): SchemaType {
  const settings = field.settings ?? {}
  const switchAsBoolean = options.switchAsBoolean ?? true

  if (
    settings.inputtype === 'checkbox' ||
    (switchAsBoolean && settings.inputtype === 'switch' && typeof settings.defaulted === 'boolean')
  ) {
    return 'boolean'
  }
  if (settings.style === 'list' && Boolean(settings.multiple)) return 'string_array'
  if (field.type === 'datetime') return 'datetime'
  if (field.type === 'counter') return 'integer'
  if (field.type === 'sketch' || field.type === 'attachments') return 'mixed_array'
  return 'string'
}

/** Whether values of this type are JSON strings (rule a of value flattening) */
export function isStringTyped(type: SchemaType | undefined): boolean {
  return type === 'string' || type === 'datetime'
}

export function toJsonSchema(type: SchemaType): TSchema {
  switch (type) {
    case 'boolean':
      return Type.Boolean()
    case 'integer':
      return Type.Integer()
    case 'datetime':
      return Type.String({ format: 'date-time' })
    case 'string_array':
      return Type.Array(Type.String())
    case 'mixed_array':
      return Type.Array(Type.Unsafe<Record<string, unknown> | string>({ type: ['object', 'string'] }))
    case 'string':
      return Type.String()
  }
}

/**
 * Set an own enumerable property. Plain assignment would hand a `__proto__`
 * title to the prototype setter instead of creating the property.
 */
export function setProperty<T>(target: Record<string, T>, name: string, value: T): void {
  Object.defineProperty(target, name, { value, enumerable: true, writable: true, configurable: true })
}

/**
 * Infer the schema of one form.
 *
 * A stripped title already bound earlier in the form is replaced by
 * `{title}_{id}`. Fixed properties do not take part in collision checks.
 *
 * `types` keeps declaration order. In `schema.properties`, as in any JS
 * object, integer-like names such as "2024" enumerate first in ascending
 * numeric order, ahead of the fixed properties.
 */
export function inferSchema(fields: readonly Field[], options: InferOptions = {}): InferredSchema {
  const types = new Map<string, SchemaType>(FIXED_PROPERTIES)
  const resolution = new Map<string, string>()
  const bound = new Set<string>()
  const properties: Record<string, TSchema> = {}

  for (const [name, type] of FIXED_PROPERTIES) {
    setProperty(properties, name, toJsonSchema(type))
  }

  for (const field of fields) {
    const title = (field.title ?? '').trim()
    const name = bound.has(title) ? `${title}_${field.id}` : title
    const type = schemaTypeOf(field, options)
    bound.add(name)
    resolution.set(String(field.id), name)
    types.set(name, type)
    setProperty(properties, name, Type.Optional(Type.Union([toJsonSchema(type), Type.Null()])))
  }

  return { schema: Type.Object(properties), types, resolution }
}
