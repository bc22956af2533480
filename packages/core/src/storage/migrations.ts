/**
 * Version-based SQLite migrations for the chunk state store.
 */

import type Database from 'better-sqlite3'

interface Migration {
  version: number
  description: string
  up(db: Database.Database): void
}

const migrations: Migration[] = [
  {
    version: 1,
    description: 'Chunk state table',
    up(db) {
      // Same shape older bundles were written with, so an existing store is adopted as-is.
      db.exec(`
        CREATE TABLE IF NOT EXISTS rag_chunks (
          id TEXT PRIMARY KEY,
          source TEXT NOT NULL,
          topic TEXT NOT NULL,
          body TEXT NOT NULL,
          checksum TEXT NOT NULL,
          updated_at TEXT NOT NULL
        );
      `)
    },
  },
  {
    version: 2,
    description: 'Per-source lookup index',
    up(db) {
      db.exec('CREATE INDEX IF NOT EXISTS idx_rag_chunks_source ON rag_chunks(source);')
    },
  },
]

export function currentSchemaVersion(db: Database.Database): number {
  const row = db
    .prepare<[], { version: number | null }>('SELECT MAX(version) as version FROM schema_version')
    .get()
  return row?.version ?? 0
}

export function runMigrations(db: Database.Database): void {
  db.exec(`CREATE TABLE IF NOT EXISTS schema_version (
    version INTEGER PRIMARY KEY,
    applied_at TEXT NOT NULL
  )`)

  const applied = currentSchemaVersion(db)

  for (const migration of migrations) {
    if (migration.version > applied) {
      db.transaction(() => {
        migration.up(db)
        db.prepare('INSERT INTO schema_version (version, applied_at) VALUES (?, ?)').run(
          migration.version,
          new Date().toISOString(),
        )
      })()
    }
  }
}
