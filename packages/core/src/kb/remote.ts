/**
 * Remote capability handed to the orchestrator. Decided once at startup:
 * either a live embedding + index client pair, or an explicit local-only marker.
 */

import type { EmbeddingClient } from './embedding-client.js'
import type { VectorIndexClient } from './vector-index-client.js'

export type RemoteSync =
  | { mode: 'live'; embeddings: EmbeddingClient; index: VectorIndexClient }
  | { mode: 'local-only' }

export const LOCAL_ONLY: RemoteSync = { mode: 'local-only' }

export function liveRemote(embeddings: EmbeddingClient, index: VectorIndexClient): RemoteSync {
  return { mode: 'live', embeddings, index }
}
