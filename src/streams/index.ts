export { describeForm, LIST_STREAM_SUFFIX, LIST_REPLICATION_KEY } from './descriptor.js'
export type { StreamDescriptor, StreamKind, FormStreams } from './descriptor.js'
export type { StreamMessage, SchemaMessage, RecordMessage, StateMessage, MessageSink } from './messages.js'
export { STATIC_STREAMS, readStaticStream } from './static.js'
export type { StaticStreamDefinition } from './static.js'
export { FormSync, startingTimestamp } from './form-stream.js'
export type { FormSyncOptions, FormSyncState } from './form-stream.js'
export { buildCatalog, runSync } from './orchestrator.js'
export type { RunMode, CatalogEntry, SyncOptions, StreamOutcome, SyncSummary } from './orchestrator.js'
