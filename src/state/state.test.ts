import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import type Database from 'better-sqlite3'
import { openStateDatabase, IN_MEMORY } from '../storage/database.js'
import { migrate, schemaVersionOf, SCHEMA_VERSION } from '../storage/migrations.js'
import { BookmarkStore } from './bookmarks.js'
import { SyncRunStore } from './runs.js'

describe('state stores', () => {
  let db: Database.Database

  beforeEach(() => {
    db = openStateDatabase(IN_MEMORY)
  })

  afterEach(() => {
    db.close()
  })

  describe('migrations', () => {
    it('creates the state tables and records the version', () => {
      const tables = db
        .prepare<[], { name: string }>(
          "SELECT name FROM sqlite_master WHERE type='table' AND name NOT LIKE 'sqlite_%' ORDER BY name",
        )
        .all()
        .map((t) => t.name)
      expect(tables).toEqual(['bookmarks', 'sync_runs'])
      expect(schemaVersionOf(db)).toBe(SCHEMA_VERSION)
      expect(SCHEMA_VERSION).toBe(1)
    })

    it('is idempotent', () => {
      expect(() => migrate(db)).not.toThrow()
      expect(schemaVersionOf(db)).toBe(1)
    })

    it('refuses a database written by a newer schema', () => {
      db.pragma('user_version = 2')
      expect(() => migrate(db)).toThrow('State database is at schema version 2, newer than this build (1)')
    })
  })

  describe('BookmarkStore', () => {
    it('returns undefined for a stream without a bookmark', () => {
      expect(new BookmarkStore(db).get('Vehicle_Inspection_responses_list')).toBeUndefined()
    })

    it('stores and replaces a bookmark per stream', () => {
      const store = new BookmarkStore(db)
      store.put({ stream: 'a_responses_list', replicationKey: 'updated', value: '2024-01-01T00:00:00.000Z' })
      store.put({ stream: 'a_responses_list', replicationKey: 'updated', value: '2024-02-01T00:00:00.000Z' })

      expect(store.get('a_responses_list')).toEqual({
        stream: 'a_responses_list',
        replicationKey: 'updated',
        value: '2024-02-01T00:00:00.000Z',
      })
      expect(store.list()).toHaveLength(1)
    })

    it('writes several bookmarks together and snapshots them by stream', () => {
      const store = new BookmarkStore(db)
      store.putMany([
        { stream: 'b_responses_list', replicationKey: 'updated', value: '2024-03-01T00:00:00.000Z' },
        { stream: 'a_responses_list', replicationKey: 'updated', value: '2024-01-01T00:00:00.000Z' },
      ])

      expect(store.list().map((b) => b.stream)).toEqual(['a_responses_list', 'b_responses_list'])
      expect(store.snapshot().get('b_responses_list')?.value).toBe('2024-03-01T00:00:00.000Z')
    })

    it('rolls back bookmark writes when the surrounding transaction fails', () => {
      const store = new BookmarkStore(db)

      const writeThenFail = db.transaction(() => {
        store.putMany([{ stream: 'a_responses_list', replicationKey: 'updated', value: '2024-01-01T00:00:00.000Z' }])
        throw new Error('sink closed')
      })

      expect(() => writeThenFail()).toThrow('sink closed')
      expect(store.list()).toEqual([])
    })
  })

  describe('SyncRunStore', () => {
    it('records a run from start to completion', () => {
      const runs = new SyncRunStore(db)
      runs.start('run-1', ['roles', 'Vehicle_Inspection'], '2024-05-01T00:00:00.000Z')

      expect(runs.get('run-1')).toEqual({
        runId: 'run-1',
        startedAt: '2024-05-01T00:00:00.000Z',
        status: 'running',
        streams: ['roles', 'Vehicle_Inspection'],
        completedAt: undefined,
        counts: undefined,
        error: undefined,
      })

      runs.complete('run-1', 'failed', { records: 3, duplicates: 1, failedStreams: 1 }, 'form 200 failed')
      const done = runs.get('run-1')
      expect(done?.status).toBe('failed')
      expect(done?.counts).toEqual({ records: 3, duplicates: 1, failedStreams: 1 })
      expect(done?.error).toBe('form 200 failed')
      expect(done?.completedAt).toEqual(expect.any(String))
    })

    it('returns undefined for an unknown run', () => {
      expect(new SyncRunStore(db).get('missing')).toBeUndefined()
    })
  })
})
