/**
 * Embedding client interface — contract for remote vector embedding providers.
 * Concrete implementations live in @kb-sync/integrations.
 */

export interface EmbeddingClient {
  /**
   * Embed texts into vectors, one per input and in input order.
   * Rejects with a REMOTE_ERROR if any request fails; no partial result is returned.
   */
  embed(texts: string[]): Promise<EmbedResult>
  readonly modelName: string
}

export interface EmbedResult {
  embeddings: number[][]
}
