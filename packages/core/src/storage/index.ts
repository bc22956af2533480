/**
 * Storage: SQLite database and migrations.
 */

export { openDatabase, openStateStore, MEMORY_DATABASE } from './database.js'
export type { OpenStateStoreOptions } from './database.js'
export { runMigrations, currentSchemaVersion } from './migrations.js'
