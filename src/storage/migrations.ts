import type Database from 'better-sqlite3'

/**
 * State schema, one entry per version: entry N brings the database from
 * `user_version` N to N + 1.
 */
const MIGRATIONS: readonly string[] = [
  `
  CREATE TABLE bookmarks (
    stream TEXT PRIMARY KEY,
    replication_key TEXT NOT NULL,
    value TEXT NOT NULL,
    updated_at TEXT NOT NULL
  );

  CREATE TABLE sync_runs (
    run_id TEXT PRIMARY KEY,
    started_at TEXT NOT NULL,
    completed_at TEXT,
    status TEXT NOT NULL DEFAULT 'running',
    streams TEXT,
    counts TEXT,
    error TEXT
  );
  CREATE INDEX idx_sync_runs_started ON sync_runs(started_at);
  `,
]

export const SCHEMA_VERSION = MIGRATIONS.length

export function schemaVersionOf(db: Database.Database): number {
  const version: unknown = db.pragma('user_version', { simple: true })
  return typeof version === 'number' ? version : 0
}

/**
 * Bring the state schema up to SCHEMA_VERSION. The version lives in SQLite's
 * `user_version` header field; pending steps run in one transaction.
 */
export function migrate(db: Database.Database): void {
  const current = schemaVersionOf(db)
  if (current > SCHEMA_VERSION) {
    throw new Error(
      `State database is at schema version ${current}, newer than this build (${SCHEMA_VERSION})`,
    )
  }
  if (current === SCHEMA_VERSION) return

  db.transaction(() => {
    for (const sql of MIGRATIONS.slice(current)) db.exec(sql)
    db.pragma(`user_version = ${SCHEMA_VERSION}`)
  })()
}
