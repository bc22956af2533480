/**
 * Vector index interface: contract for the remote index that mirrors the chunk state.
 */

export interface VectorMetadata {
  source: string
  topic: string
  checksum: string
}

export interface VectorRecord {
  id: string
  values: number[]
  metadata: VectorMetadata
}

export interface VectorIndexClient {
  /** Partition the upserts and deletes are scoped to, when set. */
  readonly namespace: string | undefined
  /** Upsert in fixed-size batches. Resolves to the number of records sent; an empty input sends nothing. */
  upsert(records: VectorRecord[]): Promise<number>
  /** Delete by id, batched. Resolves to the number of ids sent; an empty input sends nothing. */
  delete(ids: string[]): Promise<number>
}
