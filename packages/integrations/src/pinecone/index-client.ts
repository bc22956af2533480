/**
 * Pinecone data-plane client over plain HTTP: batched upserts and deletes,
 * scoped to a namespace when one is configured.
 */

import { batches, KBSyncError } from '@kb-sync/core'
import type { VectorIndexClient, VectorIndexClientOptions, VectorRecord } from '@kb-sync/core'

type Operation = 'upsert' | 'delete'

export class PineconeIndexClient implements VectorIndexClient {
  readonly namespace: string | undefined
  private readonly baseUrl: string
  private readonly apiKey: string
  private readonly batchSize: number
  private readonly deleteBatchSize: number

  constructor(options: VectorIndexClientOptions) {
    this.baseUrl = options.host.replace(/\/+$/, '')
    this.apiKey = options.apiKey
    this.namespace = options.namespace
    this.batchSize = options.batchSize
    this.deleteBatchSize = options.deleteBatchSize
  }

  async upsert(records: VectorRecord[]): Promise<number> {
    if (records.length === 0) return 0

    console.log(`[pinecone] Upserting ${records.length} vector(s)...`)
    for (const batch of batches(records, this.batchSize)) {
      await this.post('upsert', { vectors: batch })
    }
    return records.length
  }

  async delete(ids: string[]): Promise<number> {
    if (ids.length === 0) return 0

    console.log(`[pinecone] Deleting ${ids.length} vector(s)...`)
    for (const batch of batches(ids, this.deleteBatchSize)) {
      await this.post('delete', { ids: batch })
    }
    return ids.length
  }

  private async post(operation: Operation, payload: Record<string, unknown>): Promise<void> {
    const body = this.namespace ? { ...payload, namespace: this.namespace } : payload

    let res: Response
    try {
      res = await fetch(`${this.baseUrl}/vectors/${operation}`, {
        method: 'POST',
        headers: {
          'Api-Key': this.apiKey,
          'Content-Type': 'application/json',
        },
        body: JSON.stringify(body),
        signal: AbortSignal.timeout(60_000),
      })
    } catch (err) {
      throw KBSyncError.remote(`Pinecone ${operation} failed: ${err instanceof Error ? err.message : String(err)}`)
    }

    if (!res.ok) {
      const text = await res.text()
      throw KBSyncError.remote(`Pinecone ${operation} failed (${res.status}): ${text}`)
    }
  }
}
