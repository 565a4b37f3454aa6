export { normalizeRecord, flattenValue, epochToIso, parseEpochMillis } from './record.js'
export type { NormalizedRecord, SeenIdSet } from './record.js'
