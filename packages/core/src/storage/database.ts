/**
 * SQLite database initialization with WAL mode and migrations.
 */

import { mkdirSync } from 'node:fs'
import { dirname } from 'node:path'
import Database from 'better-sqlite3'
import { attempt, KBSyncError } from '../common/index.js'
import type { Result } from '../common/index.js'
import { runMigrations } from './migrations.js'

export const MEMORY_DATABASE = ':memory:'

export function openDatabase(path: string): Database.Database {
  if (path !== MEMORY_DATABASE) {
    mkdirSync(dirname(path), { recursive: true })
  }

  const db = new Database(path)

  db.pragma('journal_mode = WAL')
  db.pragma('foreign_keys = ON')

  runMigrations(db)

  return db
}

export interface OpenStateStoreOptions {
  /** Open an existing store without migrating or writing to it. */
  readonly?: boolean
}

/** {@link openDatabase} (or a read-only open) with failures reported as DB_ERROR. */
export function openStateStore(
  path: string,
  options: OpenStateStoreOptions = {},
): Result<Database.Database, KBSyncError> {
  return attempt(
    () => (options.readonly ? new Database(path, { readonly: true, fileMustExist: true }) : openDatabase(path)),
    err => KBSyncError.from(err, 'DB_ERROR', `Failed to open state store ${path}`),
  )
}
