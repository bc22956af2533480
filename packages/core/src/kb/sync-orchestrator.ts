/**
 * Sync orchestrator: Scan → Diff → Embed+Upsert → Delete → Persist.
 *
 * Remote work always completes before the state store is touched, so a failed
 * or interrupted run leaves the previous state in place and the next run
 * recomputes the same diff.
 */

import { v4 as uuidv4 } from 'uuid'
import { Ok, Err, KBSyncError } from '../common/index.js'
import type { Result } from '../common/index.js'
import type { ChunkerOptions } from './chunker.js'
import { scanSourceDirectory } from './scanner.js'
import { buildChunkSet } from './chunk-set.js'
import { diffChunks } from './diff.js'
import type { SyncStateRepository } from './state-repository.js'
import type { EmbeddingClient } from './embedding-client.js'
import type { VectorIndexClient, VectorRecord } from './vector-index-client.js'
import type { RemoteSync } from './remote.js'
import type { Chunk, SyncDiff, SyncReport } from './schemas.js'

export type SyncPhase = 'scan' | 'diff' | 'upsert' | 'delete' | 'persist' | 'done'

export interface SyncOptions extends ChunkerOptions {
  dataDir: string
  remote: RemoteSync
  /** Called on entry to each phase; skipped phases are not reported. */
  onPhase?: (phase: SyncPhase, diff?: SyncDiff) => void
}

export function toVectorRecords(chunks: readonly Chunk[], vectors: readonly number[][]): VectorRecord[] {
  if (chunks.length !== vectors.length) {
    throw KBSyncError.remote(`Embedding count mismatch: ${vectors.length} vector(s) for ${chunks.length} chunk(s)`)
  }
  return chunks.map((chunk, idx) => ({
    id: chunk.chunkId,
    values: vectors[idx],
    metadata: { source: chunk.source, topic: chunk.topic, checksum: chunk.checksum },
  }))
}

/** Any failure inside a remote phase is reported as REMOTE_ERROR, prefixed with `label`. */
async function remotePhase<T>(label: string, step: () => Promise<T>): Promise<T> {
  try {
    return await step()
  } catch (err) {
    throw KBSyncError.from(err, 'REMOTE_ERROR', label)
  }
}

async function embedAndUpsert(
  embeddings: EmbeddingClient,
  index: VectorIndexClient,
  chunks: readonly Chunk[],
): Promise<number> {
  const { embeddings: vectors } = await embeddings.embed(chunks.map(chunk => chunk.body))
  return index.upsert(toVectorRecords(chunks, vectors))
}

export async function runSync(
  repo: SyncStateRepository,
  options: SyncOptions,
): Promise<Result<SyncReport, KBSyncError>> {
  const runId = uuidv4()
  const { remote, onPhase } = options

  try {
    onPhase?.('scan')
    const sources = await scanSourceDirectory(options.dataDir)
    if (!sources.ok) return sources

    const built = buildChunkSet(sources.value, { chunkSize: options.chunkSize, overlap: options.overlap })
    if (!built.ok) return built
    const chunks = built.value
    console.log(`[sync] Discovered ${chunks.length} chunks from ${options.dataDir}`)

    const previous = repo.loadChecksums()
    if (!previous.ok) return previous

    const diff = diffChunks(previous.value, chunks)
    onPhase?.('diff', diff)
    if (diff.toDelete.length > 0) {
      console.log(`[sync] Detected ${diff.toDelete.length} stale chunk(s) to delete.`)
    }
    console.log(`[sync] ${diff.toRefresh.length} chunk(s) need fresh embeddings and upserts.`)

    let refreshed = 0
    let deleted = 0

    if (remote.mode === 'live') {
      if (diff.toRefresh.length > 0) {
        onPhase?.('upsert', diff)
        refreshed = await remotePhase('Embedding upsert failed', () =>
          embedAndUpsert(remote.embeddings, remote.index, diff.toRefresh),
        )
      } else {
        console.log('[sync] No embeddings need to be refreshed.')
      }

      if (diff.toDelete.length > 0) {
        onPhase?.('delete', diff)
        deleted = await remotePhase('Vector delete failed', () => remote.index.delete(diff.toDelete))
      }
    } else if (diff.toRefresh.length > 0 || diff.toDelete.length > 0) {
      console.warn('[sync] Remote sync disabled; the state store will still be updated with the new content.')
    }

    onPhase?.('persist', diff)
    const persisted = repo.replaceAll(chunks)
    if (!persisted.ok) return persisted
    console.log(`[state] Recorded ${persisted.value} chunk(s)`)

    onPhase?.('done', diff)
    return Ok({
      runId,
      totalChunks: chunks.length,
      refreshed,
      deleted,
      unchanged: diff.unchanged,
      remote: remote.mode,
    })
  } catch (err) {
    const error = KBSyncError.from(err, 'INTERNAL_ERROR', 'Sync failed')
    console.error(`[sync] run ${runId.slice(0, 8)} aborted: ${error.message}`)
    return Err(error)
  }
}
