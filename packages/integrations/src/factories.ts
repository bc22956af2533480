/**
 * Default factories handed to `resolveRemoteSync`.
 */

import type { RemoteClientFactories } from '@kb-sync/core'
import { OpenAIEmbeddingClient } from './openai/embeddings.js'
import { PineconeIndexClient } from './pinecone/index-client.js'

export const remoteClientFactories: RemoteClientFactories = {
  embeddings: options => new OpenAIEmbeddingClient(options),
  index: options => new PineconeIndexClient(options),
}
