import { Type, type Static, type TSchema } from '@sinclair/typebox'
import { Value } from '@sinclair/typebox/value'
import type Database from 'better-sqlite3'

export type SyncRunStatus = 'running' | 'completed' | 'failed'

const SyncRunCountsSchema = Type.Object({
  records: Type.Integer(),
  duplicates: Type.Integer(),
  failedStreams: Type.Integer(),
})
export type SyncRunCounts = Static<typeof SyncRunCountsSchema>

const StreamNamesSchema = Type.Array(Type.String())

export interface SyncRunRecord {
  runId: string
  startedAt: string
  completedAt?: string
  status: SyncRunStatus
  streams: string[]
  counts?: SyncRunCounts
  error?: string
}

interface SyncRunRow {
  run_id: string
  started_at: string
  completed_at: string | null
  status: string
  streams: string | null
  counts: string | null
  error: string | null
}

/** Parse a JSON column, dropping values that do not match `schema` */
function parseColumn<T extends TSchema>(schema: T, text: string | null): Static<T> | undefined {
  if (text === null) return undefined
  const value: unknown = JSON.parse(text)
  return Value.Check(schema, value) ? value : undefined
}

function isStatus(value: string): value is SyncRunStatus {
  return value === 'running' || value === 'completed' || value === 'failed'
}

/**
 * History of sync runs. A row is written when a run starts and updated once
 * when it ends; a row left 'running' marks a run that was interrupted.
 */
export class SyncRunStore {
  private readonly insert: Database.Statement<[string, string, string], unknown>
  private readonly finish: Database.Statement<[string, string, string, string | null, string], unknown>
  private readonly selectOne: Database.Statement<[string], SyncRunRow>

  constructor(db: Database.Database) {
    this.insert = db.prepare<[string, string, string], unknown>(
      "INSERT INTO sync_runs (run_id, started_at, status, streams) VALUES (?, ?, 'running', ?)",
    )
    this.finish = db.prepare<[string, string, string, string | null, string], unknown>(
      'UPDATE sync_runs SET completed_at = ?, status = ?, counts = ?, error = ? WHERE run_id = ?',
    )
    this.selectOne = db.prepare<[string], SyncRunRow>(
      'SELECT run_id, started_at, completed_at, status, streams, counts, error FROM sync_runs WHERE run_id = ?',
    )
  }

  start(runId: string, streams: readonly string[], startedAt = new Date().toISOString()): void {
    this.insert.run(runId, startedAt, JSON.stringify(streams))
  }

  complete(runId: string, status: Exclude<SyncRunStatus, 'running'>, counts: SyncRunCounts, error?: string): void {
    this.finish.run(new Date().toISOString(), status, JSON.stringify(counts), error ?? null, runId)
  }

  get(runId: string): SyncRunRecord | undefined {
    const row = this.selectOne.get(runId)
    if (!row) return undefined
    return {
      runId: row.run_id,
      startedAt: row.started_at,
      completedAt: row.completed_at ?? undefined,
      status: isStatus(row.status) ? row.status : 'failed',
      streams: parseColumn(StreamNamesSchema, row.streams) ?? [],
      counts: parseColumn(SyncRunCountsSchema, row.counts),
      error: row.error ?? undefined,
    }
  }
}
