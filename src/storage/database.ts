import { mkdirSync } from 'node:fs'
import { dirname } from 'node:path'
import Database from 'better-sqlite3'
import { migrate } from './migrations.js'

/** Path that opens a throwaway in-memory state database */
export const IN_MEMORY = ':memory:'

/**
 * Open (creating it and its directory if needed) the bookmark and run-history
 * database at `path` and migrate it to the current schema.
 */
export function openStateDatabase(path: string): Database.Database {
  if (path !== IN_MEMORY) mkdirSync(dirname(path), { recursive: true })
  const db = new Database(path)
  db.pragma('journal_mode = WAL')
  try {
    migrate(db)
  } catch (err) {
    db.close()
    throw err
  }
  return db
}
