import { isRecord } from '../client/executor.js'
import {
  CREATED_PROPERTY,
  ID_PROPERTY,
  UPDATED_PROPERTY,
  isStringTyped,
  setProperty,
  type InferredSchema,
  type SchemaType,
} from '../schema/infer.js'
import type { RawDetailPayload, ResponseValues } from '../types/api.js'

/** Flat record keyed by resolved property name */
export type NormalizedRecord = Record<string, unknown>

/** Identifiers already normalized in one run of one form's detail stream */
export type SeenIdSet = Set<string>

const EPOCH_DIGITS = /^-?[0-9]+$/

/**
 * Epoch milliseconds from a number or a numeric string. Undefined for blank
 * or non-numeric strings and for values outside the range of a Date.
 */
export function parseEpochMillis(value: unknown): number | undefined {
  let ms: number
  if (typeof value === 'number') {
    ms = value
  } else if (typeof value === 'string' && EPOCH_DIGITS.test(value.trim())) {
    ms = Number(value.trim())
  } else {
    return undefined
  }
  if (!Number.isFinite(ms) || Number.isNaN(new Date(ms).getTime())) return undefined
  return ms
}

/** Epoch milliseconds to an ISO-8601 UTC timestamp, undefined when unparseable */
export function epochToIso(value: unknown): string | undefined {
  const ms = parseEpochMillis(value)
  return ms === undefined ? undefined : new Date(ms).toISOString()
}

/**
 * Extract the value held by a field's container.
 *
 * Returns undefined when the container holds nothing, or holds a `utc_time`
 * that is not an epoch timestamp; the property is then left out of the
 * record.
 */
export function flattenValue(
  container: unknown,
  type: SchemaType | undefined,
): { value: unknown } | undefined {
  if (container === undefined || container === null) return undefined
  if (!isRecord(container)) return { value: container }

  const keys = Object.keys(container)
  if (keys.length === 0) return undefined

  const { values, attachments, utc_time: utcTime } = container
  if (isStringTyped(type) && Array.isArray(values) && values.length > 0) {
    return { value: values[0] }
  }
  if (attachments !== undefined && attachments !== null) {
    return { value: attachments }
  }
  if (utcTime !== undefined && utcTime !== null) {
    const iso = epochToIso(utcTime)
    return iso === undefined ? undefined : { value: iso }
  }
  return { value: container[keys[0]] }
}

function valuesOf(raw: RawDetailPayload): ResponseValues {
  return raw.latest?.responses ?? raw.values ?? {}
}

/**
 * Flatten one detail payload against its form's inferred schema.
 *
 * Returns null for an id already in `seenIds`. Values of fields missing from
 * the current metadata are dropped. Integer-like property names serialize
 * ahead of `kpa_id`; consumers should match properties by name, not position.
 */
export function normalizeRecord(
  raw: RawDetailPayload,
  inferred: InferredSchema,
  seenIds: SeenIdSet,
): NormalizedRecord | null {
  const id = String(raw.id)
  if (seenIds.has(id)) return null
  seenIds.add(id)

  const record: NormalizedRecord = {
    [ID_PROPERTY]: raw.id,
    [CREATED_PROPERTY]: epochToIso(raw.created),
    [UPDATED_PROPERTY]: epochToIso(raw.updated),
  }

  for (const [fieldId, entry] of Object.entries(valuesOf(raw))) {
    const name = inferred.resolution.get(fieldId)
    if (name === undefined) continue

    const flattened = flattenValue(isRecord(entry) ? entry.value : undefined, inferred.types.get(name))
    if (flattened) setProperty(record, name, flattened.value)
  }

  return record
}
