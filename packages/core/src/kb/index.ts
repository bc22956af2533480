/**
 * Knowledge base sync: documents to chunks, chunks to the state store and the remote index.
 */

export {
  JsonValueSchema,
  LogicalDocumentSchema,
  ChunkSchema,
  SourceFileSchema,
  StoredChunkSchema,
  SyncReportSchema,
} from './schemas.js'
export type {
  JsonValue,
  LogicalDocument,
  Chunk,
  SourceFile,
  StoredChunk,
  SyncDiff,
  SyncReport,
  StateInspection,
} from './schemas.js'

export { extractDocuments, guessTopic, renderBody, slugify, TOPIC_KEYS } from './extractor.js'
export {
  splitText,
  chunkWindows,
  assertChunkerOptions,
  DEFAULT_CHUNK_SIZE,
  DEFAULT_CHUNK_OVERLAP,
} from './chunker.js'
export type { ChunkerOptions, ChunkWindow } from './chunker.js'
export { fingerprint } from './fingerprint.js'
export { checkSourceDirectory, scanSourceDirectory } from './scanner.js'
export { buildChunkSet } from './chunk-set.js'
export { diffChunks } from './diff.js'
export { batches } from './batch.js'
export { SyncStateRepository } from './state-repository.js'

// Remote contracts
export type { EmbeddingClient, EmbedResult } from './embedding-client.js'
export type { VectorIndexClient, VectorRecord, VectorMetadata } from './vector-index-client.js'
export { LOCAL_ONLY, liveRemote } from './remote.js'
export type { RemoteSync } from './remote.js'

export { runSync, toVectorRecords } from './sync-orchestrator.js'
export type { SyncOptions, SyncPhase } from './sync-orchestrator.js'
