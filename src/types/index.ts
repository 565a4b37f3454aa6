// API payloads
export {
  Identifier,
  EpochMillis,
  ApiEnvelopeSchema,
  FormSchema,
  FieldSchema,
  RawRecordSummarySchema,
  RawDetailPayloadSchema,
  ResponseValuesSchema,
  FormsListResponseSchema,
  FormInfoResponseSchema,
  ResponsesListResponseSchema,
  ResponseInfoResponseSchema,
} from './api.js'
export type {
  ApiEnvelope,
  Form,
  Field,
  RawRecordSummary,
  RawDetailPayload,
  ResponseValues,
} from './api.js'

// Configuration
export { TapConfigSchema } from './config.js'
export type { TapConfig } from './config.js'
