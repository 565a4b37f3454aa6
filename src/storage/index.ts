export { openStateDatabase, IN_MEMORY } from './database.js'
export { migrate, schemaVersionOf, SCHEMA_VERSION } from './migrations.js'
