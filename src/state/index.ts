export { BookmarkStore } from './bookmarks.js'
export type { Bookmark } from './bookmarks.js'
export { SyncRunStore } from './runs.js'
export type { SyncRunStatus, SyncRunCounts, SyncRunRecord } from './runs.js'
