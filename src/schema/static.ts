/**
 * Hand-declared schemas of the fixed (non-form) streams and of the
 * response summaries a list stream emits.
 */

import { Type, type TSchema } from '@sinclair/typebox'

const Nullable = <T extends TSchema>(schema: T) => Type.Optional(Type.Union([schema, Type.Null()]))

const ObjectOrString = Type.Unsafe<Record<string, unknown> | string>({ type: ['object', 'string'] })

export const ResponseSummaryRecordSchema = Type.Object({
  id: Nullable(Type.Integer()),
  created: Nullable(Type.String({ format: 'date-time' })),
  updated: Nullable(Type.String({ format: 'date-time' })),
})

export const RoleRecordSchema = Type.Object({
  id: Nullable(Type.String()),
  name: Nullable(Type.String()),
})

export const UserRecordSchema = Type.Object({
  created: Nullable(Type.Integer()),
  registered_on: Nullable(Type.Integer()),
  supervisor_id: Nullable(Type.String()),
  mentor_id: Nullable(Type.String()),
  hse_id: Nullable(Type.String()),
  manager_id: Nullable(Type.String()),
  clients_id: Nullable(Type.Array(Type.String())),
  firstname: Nullable(Type.String()),
  lastname: Nullable(Type.String()),
  employeeNumber: Nullable(Type.String()),
  email: Nullable(Type.String({ format: 'email' })),
  username: Nullable(Type.String()),
  cellPhone: Nullable(Type.String()),
  hireDate: Nullable(Type.Integer()),
  sseDate: Nullable(Type.Integer()),
  terminationDate: Nullable(Type.Integer()),
  emergencyContact: Nullable(Type.String()),
  isDriver: Nullable(Type.Boolean()),
  isRegulatedDriver: Nullable(Type.Boolean()),
  role_id: Nullable(Type.String()),
  metavalues: Nullable(Type.Record(Type.String(), ObjectOrString)),
  creator_id: Nullable(
    Type.Object({
      firstname: Nullable(Type.String()),
      lastname: Nullable(Type.String()),
      id: Nullable(Type.String()),
    }),
  ),
  fieldOffice_id: Nullable(Type.Array(Type.String())),
  lineOfBusiness_id: Nullable(Type.Array(Type.String())),
  lastWebAccess: Nullable(Type.Integer()),
  lastMobileAccess: Nullable(Type.Integer()),
  id: Nullable(Type.String()),
})

export const LineOfBusinessRecordSchema = Type.Object({
  name: Nullable(Type.String()),
  code: Nullable(Type.String()),
  created: Nullable(Type.Integer()),
  id: Nullable(Type.String()),
})
