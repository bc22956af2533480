/**
 * @kb-sync/integrations: remote services behind the core sync contracts.
 */

export { OpenAIEmbeddingClient } from './openai/embeddings.js'
export type { OpenAIEmbeddingClientOptions, EmbeddingsApi } from './openai/embeddings.js'

export { PineconeIndexClient } from './pinecone/index-client.js'

export { remoteClientFactories } from './factories.js'
