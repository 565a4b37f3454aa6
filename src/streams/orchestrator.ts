/**
 * Composes discovery, schema inference, and the per-form stream pairs into a
 * catalog (discover mode) or a full sync run (sync mode).
 *
 * Failure scopes:
 *   - forms.list failing aborts the run (DiscoveryError FORMS_UNAVAILABLE)
 *   - a form's field lookup or any request of its streams failing aborts
 *     only that form; the run moves on to the next one
 *   - a static stream failing aborts only that stream
 */

import { randomUUID } from 'node:crypto'
import type { TObject } from '@sinclair/typebox'
import type { FormsClient } from '../client/forms-client.js'
import { discoverForms, type FieldCatalog } from '../discovery/forms.js'
import { createChildLogger } from '../logger.js'
import { ID_PROPERTY, UPDATED_PROPERTY } from '../schema/infer.js'
import { ResponseSummaryRecordSchema } from '../schema/static.js'
import type { Bookmark } from '../state/bookmarks.js'
import {
  describeForm,
  LIST_REPLICATION_KEY,
  type FormStreams,
  type StreamKind,
} from './descriptor.js'
import { FormSync } from './form-stream.js'
import type { MessageSink } from './messages.js'
import { STATIC_STREAMS, readStaticStream, type StaticStreamDefinition } from './static.js'

const log = createChildLogger('orchestrator')

/** Chosen by the caller; list streams are hidden from discover-mode catalogs */
export type RunMode = 'discover' | 'sync'

export interface CatalogEntry {
  stream: string
  kind: StreamKind
  schema: TObject
  keyProperties: string[]
  replicationKey?: string
  parent?: string
}

export interface SyncOptions {
  /** Identifier reported in the summary; generated when omitted */
  runId?: string
  /** Stream names to run; all detail and static streams when omitted */
  streams?: readonly string[]
  /** Bookmarks from the previous run, keyed by list stream name */
  bookmarks?: ReadonlyMap<string, Bookmark>
  /** ISO-8601 lower bound for list streams without a bookmark */
  startDate?: string
  /** Checked between streams; the executor checks it between attempts */
  signal?: AbortSignal
}

export interface StreamOutcome {
  stream: string
  status: 'completed' | 'failed'
  records: number
  duplicates: number
  error?: string
}

export interface SyncSummary {
  runId: string
  startedAt: string
  completedAt: string
  streams: StreamOutcome[]
  bookmarks: Bookmark[]
  counts: {
    records: number
    duplicates: number
    failedStreams: number
  }
}

function messageOf(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}

/**
 * Catalog of every stream. Forms whose fields cannot be fetched are left out
 * and logged; a failing forms.list propagates.
 */
export async function buildCatalog(
  client: FormsClient,
  fieldCatalog: FieldCatalog,
  mode: RunMode,
): Promise<CatalogEntry[]> {
  const entries: CatalogEntry[] = STATIC_STREAMS.map((def) => ({
    stream: def.descriptor.name,
    kind: def.descriptor.kind,
    schema: def.schema,
    keyProperties: def.keyProperties,
  }))

  for (const form of await discoverForms(client)) {
    const { list, detail } = describeForm(form)
    let schema: TObject
    try {
      schema = (await fieldCatalog.get(form.id)).inferred.schema
    } catch (err) {
      log.error('Skipping form without field metadata', { form: form.name, error: messageOf(err) })
      continue
    }

    if (mode === 'sync') {
      entries.push({
        stream: list.name,
        kind: list.kind,
        schema: ResponseSummaryRecordSchema,
        keyProperties: ['id'],
        replicationKey: LIST_REPLICATION_KEY,
      })
    }
    entries.push({
      stream: detail.name,
      kind: detail.kind,
      schema,
      keyProperties: [ID_PROPERTY],
      replicationKey: UPDATED_PROPERTY,
      parent: detail.parent,
    })
  }

  return entries
}

interface Selection {
  staticStream(def: StaticStreamDefinition): boolean
  form(streams: FormStreams): boolean
  summaries(streams: FormStreams): boolean
}

function selectionOf(names?: readonly string[]): Selection {
  if (!names || names.length === 0) {
    return { staticStream: () => true, form: () => true, summaries: () => false }
  }
  const selected = new Set(names)
  return {
    staticStream: (def) => selected.has(def.descriptor.name),
    form: (s) => selected.has(s.detail.name) || selected.has(s.list.name),
    summaries: (s) => selected.has(s.list.name),
  }
}

/**
 * Run every selected stream once, handing messages to `sink` as they are
 * produced.
 *
 * @throws DiscoveryError FORMS_UNAVAILABLE when forms cannot be listed
 */
export async function runSync(
  client: FormsClient,
  fieldCatalog: FieldCatalog,
  sink: MessageSink,
  options: SyncOptions = {},
): Promise<SyncSummary> {
  const runId = options.runId ?? randomUUID()
  const startedAt = new Date().toISOString()
  const selection = selectionOf(options.streams)
  const outcomes: StreamOutcome[] = []
  const bookmarks: Bookmark[] = []

  log.info('Starting sync run', { runId, streams: options.streams ?? 'all' })

  for (const def of STATIC_STREAMS) {
    if (!selection.staticStream(def)) continue
    options.signal?.throwIfAborted()
    outcomes.push(await syncStatic(client, def, sink))
  }

  for (const form of await discoverForms(client)) {
    const streams = describeForm(form)
    if (!selection.form(streams)) continue
    options.signal?.throwIfAborted()

    const outcome: StreamOutcome = { stream: streams.detail.name, status: 'completed', records: 0, duplicates: 0 }
    let sync: FormSync | undefined
    try {
      const formFields = await fieldCatalog.get(form.id)
      sync = new FormSync(client, streams, formFields, {
        bookmark: options.bookmarks?.get(streams.list.name),
        startDate: options.startDate,
        emitSummaries: selection.summaries(streams),
      })
      for await (const message of sync.messages()) {
        if (message.type === 'state') bookmarks.push(message.bookmark)
        await sink(message)
      }
    } catch (err) {
      if (options.signal?.aborted) throw err
      outcome.status = 'failed'
      outcome.error = messageOf(err)
      log.error('Form sync failed', { form: form.name, formId: form.id, error: outcome.error })
    }
    outcome.records = sync?.records ?? 0
    outcome.duplicates = sync?.duplicates ?? 0
    outcomes.push(outcome)
  }

  const summary: SyncSummary = {
    runId,
    startedAt,
    completedAt: new Date().toISOString(),
    streams: outcomes,
    bookmarks,
    counts: {
      records: outcomes.reduce((n, o) => n + o.records, 0),
      duplicates: outcomes.reduce((n, o) => n + o.duplicates, 0),
      failedStreams: outcomes.filter((o) => o.status === 'failed').length,
    },
  }
  log.info('Sync run complete', { runId, counts: summary.counts })
  return summary
}

async function syncStatic(
  client: FormsClient,
  def: StaticStreamDefinition,
  sink: MessageSink,
): Promise<StreamOutcome> {
  const stream = def.descriptor.name
  const outcome: StreamOutcome = { stream, status: 'completed', records: 0, duplicates: 0 }
  try {
    await sink({ type: 'schema', stream, schema: def.schema, keyProperties: def.keyProperties })
    for await (const record of readStaticStream(client, def)) {
      outcome.records++
      await sink({ type: 'record', stream, record })
    }
  } catch (err) {
    outcome.status = 'failed'
    outcome.error = messageOf(err)
    log.error('Static stream failed', { stream, error: outcome.error })
  }
  return outcome
}
