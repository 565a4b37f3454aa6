/**
 * Persisted replication bookmarks, one row per list stream.
 */

import type Database from 'better-sqlite3'

export interface Bookmark {
  stream: string
  replicationKey: string
  /** ISO-8601 timestamp of the highest replication value seen */
  value: string
}

interface BookmarkRow {
  stream: string
  replication_key: string
  value: string
}

interface BookmarkParams extends BookmarkRow {
  updated_at: string
}

function fromRow(row: BookmarkRow): Bookmark {
  return { stream: row.stream, replicationKey: row.replication_key, value: row.value }
}

export class BookmarkStore {
  private readonly selectOne: Database.Statement<[string], BookmarkRow>
  private readonly selectAll: Database.Statement<[], BookmarkRow>
  private readonly upsert: Database.Statement<[BookmarkParams], unknown>
  private readonly upsertMany: (bookmarks: readonly Bookmark[]) => void

  constructor(db: Database.Database) {
    this.selectOne = db.prepare<[string], BookmarkRow>(
      'SELECT stream, replication_key, value FROM bookmarks WHERE stream = ?',
    )
    this.selectAll = db.prepare<[], BookmarkRow>(
      'SELECT stream, replication_key, value FROM bookmarks ORDER BY stream',
    )
    this.upsert = db.prepare<[BookmarkParams], unknown>(
      `INSERT INTO bookmarks (stream, replication_key, value, updated_at)
       VALUES (@stream, @replication_key, @value, @updated_at)
       ON CONFLICT(stream) DO UPDATE SET
         replication_key = excluded.replication_key,
         value = excluded.value,
         updated_at = excluded.updated_at`,
    )
    this.upsertMany = db.transaction((bookmarks: readonly Bookmark[]) => {
      for (const bookmark of bookmarks) this.put(bookmark)
    })
  }

  get(stream: string): Bookmark | undefined {
    const row = this.selectOne.get(stream)
    return row ? fromRow(row) : undefined
  }

  list(): Bookmark[] {
    return this.selectAll.all().map(fromRow)
  }

  /** All bookmarks keyed by stream name, the shape a sync run reads from */
  snapshot(): Map<string, Bookmark> {
    return new Map(this.list().map((b) => [b.stream, b]))
  }

  put(bookmark: Bookmark): void {
    this.upsert.run({
      stream: bookmark.stream,
      replication_key: bookmark.replicationKey,
      value: bookmark.value,
      updated_at: new Date().toISOString(),
    })
  }

  /** Write several bookmarks atomically */
  putMany(bookmarks: readonly Bookmark[]): void {
    this.upsertMany(bookmarks)
  }
}
