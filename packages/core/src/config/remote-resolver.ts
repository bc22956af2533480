/**
 * Resolves the remote capability once, before any work begins.
 * `skipRemote` → local-only; otherwise every credential must be present.
 */

import { Ok, Err, KBSyncError } from '../common/index.js'
import type { Result } from '../common/index.js'
import type { EmbeddingClient } from '../kb/embedding-client.js'
import type { VectorIndexClient } from '../kb/vector-index-client.js'
import { LOCAL_ONLY, liveRemote } from '../kb/remote.js'
import type { RemoteSync } from '../kb/remote.js'
import type { SyncConfig } from './schema.js'

export interface EmbeddingClientOptions {
  apiKey: string
  model: string
  batchSize: number
}

export interface VectorIndexClientOptions {
  host: string
  apiKey: string
  namespace: string | undefined
  batchSize: number
  deleteBatchSize: number
}

export interface RemoteClientFactories {
  embeddings(options: EmbeddingClientOptions): EmbeddingClient
  index(options: VectorIndexClientOptions): VectorIndexClient
}

export function resolveRemoteSync(
  config: SyncConfig,
  factories: RemoteClientFactories,
): Result<RemoteSync, KBSyncError> {
  if (config.skipRemote) {
    return Ok(LOCAL_ONLY)
  }

  if (!config.openaiApiKey) {
    return Err(KBSyncError.config('OPENAI_API_KEY is required to build embeddings unless remote sync is skipped.'))
  }
  if (!config.indexApiKey) {
    return Err(KBSyncError.config('PINECONE_API_KEY is required unless remote sync is skipped.'))
  }
  if (!config.indexHost) {
    return Err(KBSyncError.config('PINECONE_HOST must be provided (argument or env) unless remote sync is skipped.'))
  }

  return Ok(
    liveRemote(
      factories.embeddings({
        apiKey: config.openaiApiKey,
        model: config.embeddingModel,
        batchSize: config.embeddingBatchSize,
      }),
      factories.index({
        host: config.indexHost,
        apiKey: config.indexApiKey,
        namespace: config.indexNamespace,
        batchSize: config.indexBatchSize,
        deleteBatchSize: config.deleteBatchSize,
      }),
    ),
  )
}
