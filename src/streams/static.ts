/**
 * Fixed list endpoints with hand-declared schemas. Records are trimmed to the
 * declared properties; nothing is inferred.
 */

import type { TObject } from '@sinclair/typebox'
import { Value } from '@sinclair/typebox/value'
import { isRecord } from '../client/executor.js'
import type { FormsClient } from '../client/forms-client.js'
import type { NormalizedRecord } from '../normalize/record.js'
import { LineOfBusinessRecordSchema, RoleRecordSchema, UserRecordSchema } from '../schema/static.js'
import type { StreamDescriptor } from './descriptor.js'

export interface StaticStreamDefinition {
  descriptor: StreamDescriptor
  path: string
  /** Body property holding the records */
  recordsKey: string
  schema: TObject
  keyProperties: string[]
}

export const STATIC_STREAMS: readonly StaticStreamDefinition[] = [
  {
    descriptor: { name: 'roles', kind: 'static' },
    path: '/roles.list',
    recordsKey: 'roles',
    schema: RoleRecordSchema,
    keyProperties: [],
  },
  {
    descriptor: { name: 'users', kind: 'static' },
    path: '/users.list',
    recordsKey: 'users',
    schema: UserRecordSchema,
    keyProperties: [],
  },
  {
    descriptor: { name: 'lines_of_business', kind: 'static' },
    path: '/linesofbusiness.list',
    recordsKey: 'linesofbusiness',
    schema: LineOfBusinessRecordSchema,
    keyProperties: [],
  },
]

export async function* readStaticStream(
  client: FormsClient,
  definition: StaticStreamDefinition,
): AsyncGenerator<NormalizedRecord, void, undefined> {
  for await (const page of client.listRecords(definition.path, definition.recordsKey)) {
    for (const record of page.records) {
      const cleaned = Value.Clean(definition.schema, Value.Clone(record))
      if (isRecord(cleaned)) yield cleaned
    }
  }
}
