import { Type, type Static } from '@sinclair/typebox'

/** Opaque identifier; the API returns numbers for most objects and strings for some */
export const Identifier = Type.Union([Type.String(), Type.Number()])
export type Identifier = Static<typeof Identifier>

/**
 * Epoch milliseconds, occasionally serialized as a numeric string. Bounded to
 * the range a Date can hold so conversion never fails after a shape check.
 */
export const EpochMillis = Type.Union([
  Type.Integer({ minimum: -8.64e15, maximum: 8.64e15 }),
  Type.String({ pattern: '^-?[0-9]{1,15}$' }),
])
export type EpochMillis = Static<typeof EpochMillis>

/** Envelope fields shared by every endpoint */
export const ApiEnvelopeSchema = Type.Object({
  ok: Type.Optional(Type.Boolean()),
  error: Type.Optional(Type.String()),
  paging: Type.Optional(
    Type.Object({
      last_page: Type.Optional(Type.Number()),
    }),
  ),
})
export type ApiEnvelope = Static<typeof ApiEnvelopeSchema>

export const FormSchema = Type.Object({
  id: Identifier,
  name: Type.String(),
})
export type Form = Static<typeof FormSchema>

export const FieldSchema = Type.Object({
  id: Identifier,
  title: Type.Optional(Type.String()),
  type: Type.Optional(Type.String()),
  settings: Type.Optional(Type.Record(Type.String(), Type.Unknown())),
})
export type Field = Static<typeof FieldSchema>

export const RawRecordSummarySchema = Type.Object({
  id: Identifier,
  created: EpochMillis,
  updated: EpochMillis,
})
export type RawRecordSummary = Static<typeof RawRecordSummarySchema>

/** Map from field id to its `{ value: container }` entry */
export const ResponseValuesSchema = Type.Record(Type.String(), Type.Unknown())
export type ResponseValues = Static<typeof ResponseValuesSchema>

export const RawDetailPayloadSchema = Type.Object({
  id: Identifier,
  created: EpochMillis,
  updated: EpochMillis,
  values: Type.Optional(ResponseValuesSchema),
  latest: Type.Optional(
    Type.Object({
      responses: Type.Optional(ResponseValuesSchema),
    }),
  ),
})
export type RawDetailPayload = Static<typeof RawDetailPayloadSchema>

// ---------------------------------------------------------------------------
// Endpoint bodies
// ---------------------------------------------------------------------------

export const FormsListResponseSchema = Type.Object({
  forms: Type.Array(FormSchema),
})

export const FormInfoResponseSchema = Type.Object({
  form: Type.Object({
    latest: Type.Object({
      fields: Type.Array(FieldSchema),
    }),
  }),
})

export const ResponsesListResponseSchema = Type.Object({
  responses: Type.Optional(Type.Array(RawRecordSummarySchema)),
})

export const ResponseInfoResponseSchema = Type.Object({
  response: RawDetailPayloadSchema,
})
