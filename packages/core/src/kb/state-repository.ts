/**
 * Sync state repository: the local record of the last synchronized chunk set.
 * Follows the repository pattern: constructor(db), methods return Result<T>.
 */

import type Database from 'better-sqlite3'
import { Ok, Err, attempt, KBSyncError } from '../common/index.js'
import type { Result } from '../common/index.js'
import { StoredChunkSchema } from './schemas.js'
import type { Chunk, StateInspection, StoredChunk } from './schemas.js'

interface ChunkRow {
  id: string
  source: string
  topic: string
  body: string
  checksum: string
  updated_at: string
}

const dbError = (context: string) => (err: unknown) => KBSyncError.from(err, 'DB_ERROR', context)

export class SyncStateRepository {
  private db: Database.Database

  constructor(db: Database.Database) {
    this.db = db
  }

  /** id → checksum for every chunk recorded by the last successful run. Empty on a fresh store. */
  loadChecksums(): Result<Map<string, string>, KBSyncError> {
    return attempt(() => {
      const rows = this.db.prepare<[], Pick<ChunkRow, 'id' | 'checksum'>>('SELECT id, checksum FROM rag_chunks').all()
      return new Map(rows.map(row => [row.id, row.checksum]))
    }, dbError('Failed to load sync state'))
  }

  /**
   * Replace the whole table with `chunks` in one transaction: either every row
   * is swapped or the previous contents stay untouched.
   */
  replaceAll(chunks: readonly Chunk[], now: Date = new Date()): Result<number, KBSyncError> {
    return attempt(() => {
      const updatedAt = now.toISOString()
      const insert = this.db.prepare(
        'INSERT INTO rag_chunks (id, source, topic, body, checksum, updated_at) VALUES (?, ?, ?, ?, ?, ?)',
      )

      this.db.transaction(() => {
        this.db.prepare('DELETE FROM rag_chunks').run()
        for (const chunk of chunks) {
          insert.run(chunk.chunkId, chunk.source, chunk.topic, chunk.body, chunk.checksum, updatedAt)
        }
      })()

      return chunks.length
    }, dbError('Failed to persist sync state'))
  }

  getChunk(id: string): Result<StoredChunk | null, KBSyncError> {
    let row: ChunkRow | undefined
    try {
      row = this.db
        .prepare<[string], ChunkRow>(
          'SELECT id, source, topic, body, checksum, updated_at FROM rag_chunks WHERE id = ? LIMIT 1',
        )
        .get(id)
    } catch (err) {
      return Err(KBSyncError.from(err, 'DB_ERROR', `Failed to read chunk ${id}`))
    }
    if (!row) return Ok(null)

    const parsed = StoredChunkSchema.safeParse({
      id: row.id,
      source: row.source,
      topic: row.topic,
      body: row.body,
      checksum: row.checksum,
      updatedAt: row.updated_at,
    })
    if (!parsed.success) {
      return Err(KBSyncError.db(`Corrupt state row ${id}: ${parsed.error.message}`))
    }
    return Ok(parsed.data)
  }

  /** Row count, per-source counts and up to `sampleLimit` random rows. */
  inspect(sampleLimit = 3): Result<StateInspection, KBSyncError> {
    return attempt(() => {
      const total = this.db.prepare<[], { count: number }>('SELECT COUNT(*) as count FROM rag_chunks').get()
      const bySource = this.db
        .prepare<[], { source: string; count: number }>(
          'SELECT source, COUNT(*) as count FROM rag_chunks GROUP BY source ORDER BY source',
        )
        .all()
      const samples =
        sampleLimit > 0
          ? this.db
              .prepare<[number], { id: string; topic: string }>(
                'SELECT id, topic FROM rag_chunks ORDER BY RANDOM() LIMIT ?',
              )
              .all(sampleLimit)
          : []

      return { rows: total?.count ?? 0, bySource, samples }
    }, dbError('Failed to inspect sync state'))
  }
}
