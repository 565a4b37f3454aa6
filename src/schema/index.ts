export {
  inferSchema,
  schemaTypeOf,
  toJsonSchema,
  isStringTyped,
  FIXED_PROPERTIES,
  ID_PROPERTY,
  CREATED_PROPERTY,
  UPDATED_PROPERTY,
} from './infer.js'
export type { SchemaType, InferOptions, InferredSchema } from './infer.js'

export {
  ResponseSummaryRecordSchema,
  RoleRecordSchema,
  UserRecordSchema,
  LineOfBusinessRecordSchema,
} from './static.js'
