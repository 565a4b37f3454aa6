/**
 * One sync of one form: the list stream walks response summaries page by
 * page and the detail stream fetches and normalizes each response.
 *
 *   DISCOVERING_FIELDS -> SCHEMA_READY -> LISTING -> (DETAIL_FETCH -> NORMALIZE)* -> DONE
 *
 * Field discovery happens before construction (the caller passes the cached
 * FormFields). Each instance owns its seen-id set and bookmark; nothing is
 * shared with other forms or other runs.
 */

import type { FormsClient } from '../client/forms-client.js'
import type { FormFields } from '../discovery/forms.js'
import { createChildLogger } from '../logger.js'
import { epochToIso, normalizeRecord, parseEpochMillis, type SeenIdSet } from '../normalize/record.js'
import { ID_PROPERTY, UPDATED_PROPERTY } from '../schema/infer.js'
import { ResponseSummaryRecordSchema } from '../schema/static.js'
import type { Bookmark } from '../state/bookmarks.js'
import type { RawRecordSummary } from '../types/api.js'
import { LIST_REPLICATION_KEY, type FormStreams } from './descriptor.js'
import type { StreamMessage } from './messages.js'

const log = createChildLogger('form-stream')

export type FormSyncState = 'SCHEMA_READY' | 'LISTING' | 'DONE'

export interface FormSyncOptions {
  /** Bookmark persisted by the previous run of the list stream */
  bookmark?: Bookmark
  /** ISO-8601 lower bound used when there is no bookmark */
  startDate?: string
  /** Emit list stream records as well as detail records */
  emitSummaries?: boolean
}

/**
 * Lower bound for `updated_after` in epoch milliseconds: the bookmark when
 * there is one, else the configured start date, else none.
 */
export function startingTimestamp(bookmark?: Bookmark, startDate?: string): number | undefined {
  const source = bookmark?.value ?? startDate
  if (source === undefined) return undefined
  const ms = Date.parse(source)
  return Number.isNaN(ms) ? undefined : ms
}

export class FormSync {
  private readonly seenIds: SeenIdSet = new Set()
  private maxUpdated: number | undefined
  private current: FormSyncState = 'SCHEMA_READY'
  private recordCount = 0
  private duplicateCount = 0

  constructor(
    private readonly client: FormsClient,
    private readonly streams: FormStreams,
    private readonly formFields: FormFields,
    private readonly options: FormSyncOptions = {},
  ) {
    this.maxUpdated = startingTimestamp(options.bookmark)
  }

  get state(): FormSyncState {
    return this.current
  }

  /** Detail records emitted so far */
  get records(): number {
    return this.recordCount
  }

  /** Detail payloads dropped because their id was already emitted */
  get duplicates(): number {
    return this.duplicateCount
  }

  /** Bookmark to persist: the highest `updated` seen, never below the starting one */
  get bookmark(): Bookmark | undefined {
    if (this.maxUpdated === undefined) return undefined
    return {
      stream: this.streams.list.name,
      replicationKey: LIST_REPLICATION_KEY,
      value: new Date(this.maxUpdated).toISOString(),
    }
  }

  /**
   * Schema messages for both streams, then records in page order, then the
   * list stream's state once listing is exhausted.
   */
  async *messages(): AsyncGenerator<StreamMessage, void, undefined> {
    const { list, detail, form } = this.streams

    if (this.options.emitSummaries) {
      yield {
        type: 'schema',
        stream: list.name,
        schema: ResponseSummaryRecordSchema,
        keyProperties: ['id'],
        bookmarkProperties: [LIST_REPLICATION_KEY],
      }
    }
    yield {
      type: 'schema',
      stream: detail.name,
      schema: this.formFields.inferred.schema,
      keyProperties: [ID_PROPERTY],
      bookmarkProperties: [UPDATED_PROPERTY],
    }

    this.current = 'LISTING'
    const updatedAfter = startingTimestamp(this.options.bookmark, this.options.startDate)
    log.info('Listing responses', { form: form.name, formId: form.id, updatedAfter })

    for await (const page of this.client.listResponses(form.id, updatedAfter)) {
      log.debug('Fetched response page', { form: form.name, page: page.token ?? 1, count: page.records.length })
      for (const summary of page.records) {
        this.observe(summary)
        if (this.options.emitSummaries) {
          yield {
            type: 'record',
            stream: list.name,
            record: {
              id: summary.id,
              created: epochToIso(summary.created),
              updated: epochToIso(summary.updated),
            },
          }
        }

        const raw = await this.client.getResponse(form.id, summary.id)
        const record = normalizeRecord(raw, this.formFields.inferred, this.seenIds)
        if (record === null) {
          this.duplicateCount++
          continue
        }
        this.recordCount++
        yield { type: 'record', stream: detail.name, record }
      }
    }

    this.current = 'DONE'
    const bookmark = this.bookmark
    if (bookmark) yield { type: 'state', bookmark }
    log.info('Form synced', {
      form: form.name,
      records: this.recordCount,
      duplicates: this.duplicateCount,
      bookmark: bookmark?.value,
    })
  }

  private observe(summary: RawRecordSummary): void {
    const updated = parseEpochMillis(summary.updated)
    if (updated === undefined) return
    if (this.maxUpdated === undefined || updated > this.maxUpdated) {
      this.maxUpdated = updated
    }
  }
}
