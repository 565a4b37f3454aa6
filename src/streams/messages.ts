import type { TObject } from '@sinclair/typebox'
import type { NormalizedRecord } from '../normalize/record.js'
import type { Bookmark } from '../state/bookmarks.js'

export interface SchemaMessage {
  type: 'schema'
  stream: string
  schema: TObject
  keyProperties: string[]
  bookmarkProperties?: string[]
}

export interface RecordMessage {
  type: 'record'
  stream: string
  record: NormalizedRecord
}

export interface StateMessage {
  type: 'state'
  bookmark: Bookmark
}

/** What a sync run hands to the output collaborator, in emission order */
export type StreamMessage = SchemaMessage | RecordMessage | StateMessage

export type MessageSink = (message: StreamMessage) => void | Promise<void>
