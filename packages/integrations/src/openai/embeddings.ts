/**
 * OpenAI embedding client: one embeddings request per fixed-size batch.
 *
 * Fail-fast: the first rejected batch aborts the whole call, so callers never
 * see a partial set of vectors. The SDK's own retries are turned off.
 */

import OpenAI from 'openai'
import { batches, KBSyncError } from '@kb-sync/core'
import type { EmbeddingClient, EmbeddingClientOptions, EmbedResult } from '@kb-sync/core'

/** The slice of the OpenAI embeddings resource this client calls. */
export interface EmbeddingsApi {
  create(body: {
    model: string
    input: string[]
    encoding_format: 'float'
  }): Promise<{ data: Array<{ index: number; embedding: number[] }> }>
}

export interface OpenAIEmbeddingClientOptions extends EmbeddingClientOptions {
  baseUrl?: string
  /** Replaces the SDK resource, e.g. with an in-process fake. */
  api?: EmbeddingsApi
}

function describeFailure(err: unknown): string {
  if (err instanceof OpenAI.APIError) {
    return ` (${err.status ?? 'no status'}): ${err.message}`
  }
  return `: ${err instanceof Error ? err.message : String(err)}`
}

export class OpenAIEmbeddingClient implements EmbeddingClient {
  readonly modelName: string
  readonly batchSize: number
  private readonly api: EmbeddingsApi

  constructor(options: OpenAIEmbeddingClientOptions) {
    this.modelName = options.model
    this.batchSize = options.batchSize
    this.api =
      options.api ??
      new OpenAI({ apiKey: options.apiKey, baseURL: options.baseUrl, maxRetries: 0, timeout: 60_000 }).embeddings
  }

  async embed(texts: string[]): Promise<EmbedResult> {
    const embeddings: number[][] = []
    if (texts.length === 0) {
      return { embeddings }
    }

    console.log(`[embedding] Embedding ${texts.length} text(s) with ${this.modelName}...`)
    for (const batch of batches(texts, this.batchSize)) {
      let data: Array<{ index: number; embedding: number[] }>
      try {
        const response = await this.api.create({ model: this.modelName, input: batch, encoding_format: 'float' })
        data = response.data
      } catch (err) {
        throw KBSyncError.remote(`OpenAI embedding request failed${describeFailure(err)}`)
      }

      if (data.length !== batch.length) {
        throw KBSyncError.remote(`OpenAI returned ${data.length} embedding(s) for a batch of ${batch.length}`)
      }

      // Sort by index to preserve input order
      const sorted = [...data].sort((a, b) => a.index - b.index)
      for (const item of sorted) {
        embeddings.push(item.embedding)
      }
    }

    return { embeddings }
  }
}
