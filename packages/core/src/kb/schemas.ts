/**
 * Zod schemas and types for documents, chunks and sync state.
 */

import { z } from 'zod'
import { LosslessNumber } from 'lossless-json'
import { ChunkIdSchema, NonEmptyStringSchema, TimestampSchema } from '../common/index.js'

/** Parsed source JSON. Numbers read from disk stay {@link LosslessNumber}s so their text survives rendering. */
export type JsonValue =
  | string
  | number
  | LosslessNumber
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue }

export const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.instanceof(LosslessNumber),
    z.boolean(),
    z.null(),
    z.array(JsonValueSchema),
    z.record(JsonValueSchema),
  ]),
)

export const LogicalDocumentSchema = z.object({
  baseId: NonEmptyStringSchema,
  topic: z.string(),
  text: z.string(),
})

export type LogicalDocument = z.infer<typeof LogicalDocumentSchema>

export const ChunkSchema = z.object({
  chunkId: ChunkIdSchema,
  /** File name of the originating document, e.g. `faq.json`. */
  source: NonEmptyStringSchema,
  topic: z.string(),
  body: NonEmptyStringSchema,
  checksum: z.string().regex(/^[0-9a-f]{64}$/),
})

export type Chunk = z.infer<typeof ChunkSchema>

export const SourceFileSchema = z.object({
  fileName: NonEmptyStringSchema,
  /** File name without the `.json` extension; used as the document source label. */
  stem: NonEmptyStringSchema,
  payload: JsonValueSchema,
})

export type SourceFile = z.infer<typeof SourceFileSchema>

export const StoredChunkSchema = z.object({
  id: ChunkIdSchema,
  source: z.string(),
  topic: z.string(),
  body: z.string(),
  checksum: z.string(),
  updatedAt: TimestampSchema,
})

export type StoredChunk = z.infer<typeof StoredChunkSchema>

export interface SyncDiff {
  /** Previously synced ids that no longer exist, sorted. */
  toDelete: string[]
  /** New chunks and chunks whose checksum changed, in chunk-set order. */
  toRefresh: Chunk[]
  unchanged: number
}

export const SyncReportSchema = z.object({
  runId: z.string().uuid(),
  totalChunks: z.number().int().nonnegative(),
  refreshed: z.number().int().nonnegative(),
  deleted: z.number().int().nonnegative(),
  unchanged: z.number().int().nonnegative(),
  remote: z.enum(['live', 'local-only']),
})

export type SyncReport = z.infer<typeof SyncReportSchema>

export interface StateInspection {
  rows: number
  bySource: Array<{ source: string; count: number }>
  samples: Array<{ id: string; topic: string }>
}
