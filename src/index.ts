export * from './types/index.js'
export * from './client/index.js'
export * from './discovery/index.js'
export * from './schema/index.js'
export * from './normalize/index.js'
export * from './streams/index.js'
export * from './state/index.js'
export * from './storage/index.js'
export { loadConfig, resolveConfig, ConfigError } from './config/index.js'
export { createJsonLinesSink, serializeMessage } from './output/jsonl.js'
export { logger, createChildLogger } from './logger.js'
