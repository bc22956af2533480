/**
 * Diff engine: classifies the fresh chunk set against the last persisted checksums.
 */

import type { Chunk, SyncDiff } from './schemas.js'

export function diffChunks(previous: ReadonlyMap<string, string>, chunks: readonly Chunk[]): SyncDiff {
  const freshIds = new Set(chunks.map(chunk => chunk.chunkId))

  const toDelete = [...previous.keys()].filter(id => !freshIds.has(id)).sort()
  const toRefresh = chunks.filter(chunk => previous.get(chunk.chunkId) !== chunk.checksum)

  return { toDelete, toRefresh, unchanged: chunks.length - toRefresh.length }
}
