/**
 * `forms-tap sync` -- run every selected stream once.
 *
 * Messages are written to stdout as JSON lines. Bookmarks are persisted as
 * their state messages pass through, so an interrupted run resumes from the
 * last completed form. SIGINT stops the run between requests. Failures set
 * the exit code rather than exiting, so the state database is always closed.
 */

import { randomUUID } from 'node:crypto'
import type { Command } from 'commander'
import { createFormsClient } from '../../client/index.js'
import { FieldCatalog } from '../../discovery/index.js'
import { createJsonLinesSink } from '../../output/jsonl.js'
import { BookmarkStore, SyncRunStore } from '../../state/index.js'
import { openStateDatabase } from '../../storage/index.js'
import { runSync, type MessageSink } from '../../streams/index.js'
import { output } from '../output.js'
import { loadConfigOrExit } from './load.js'

interface SyncCommandOptions {
  config: string
  stream?: string[]
  state?: string
}

export function registerSyncCommand(program: Command): void {
  program
    .command('sync')
    .description('Extract records and write them to stdout as JSON lines')
    .option('-c, --config <path>', 'configuration file path', 'forms-tap.config.json')
    .option('-s, --stream <names...>', 'only run the named streams')
    .option('--state <path>', 'bookmark database path (overrides state_path)')
    .action(async (options: SyncCommandOptions) => {
      const config = loadConfigOrExit(options.config)
      if (!config) return

      const db = openStateDatabase(options.state ?? config.state_path)
      const bookmarkStore = new BookmarkStore(db)
      const runStore = new SyncRunStore(db)

      const controller = new AbortController()
      const onInterrupt = (): void => controller.abort()
      process.once('SIGINT', onInterrupt)

      const client = createFormsClient(config, { signal: controller.signal })
      const fieldCatalog = new FieldCatalog(client, { switchAsBoolean: config.switch_as_boolean })
      const writeLine = createJsonLinesSink()
      const sink: MessageSink = async (message) => {
        await writeLine(message)
        if (message.type === 'state') bookmarkStore.put(message.bookmark)
      }

      const runId = randomUUID()
      runStore.start(runId, options.stream ?? [])
      try {
        const summary = await runSync(client, fieldCatalog, sink, {
          runId,
          streams: options.stream,
          bookmarks: bookmarkStore.snapshot(),
          startDate: config.start_date,
          signal: controller.signal,
        })
        runStore.complete(runId, summary.counts.failedStreams > 0 ? 'failed' : 'completed', summary.counts)
        for (const failed of summary.streams.filter((s) => s.status === 'failed')) {
          output.warn(`${failed.stream}: ${failed.error ?? 'unknown error'}`)
        }
        output.success(
          `Synced ${summary.counts.records} record(s) from ${summary.streams.length} stream(s)`,
        )
        if (summary.counts.failedStreams > 0) process.exitCode = 1
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err)
        runStore.complete(runId, 'failed', { records: 0, duplicates: 0, failedStreams: 0 }, message)
        output.error(message)
        process.exitCode = 1
      } finally {
        process.removeListener('SIGINT', onInterrupt)
        db.close()
      }
    })
}
