/**
 * Sync configuration schema. Defaults match a repository that keeps its
 * knowledge files under `static/data`.
 */

import { z } from 'zod'
import { DEFAULT_CHUNK_OVERLAP, DEFAULT_CHUNK_SIZE } from '../kb/chunker.js'

export const DEFAULT_BATCH_SIZE = 32
export const DEFAULT_DELETE_BATCH_SIZE = 1000
export const DEFAULT_EMBEDDING_MODEL = 'text-embedding-3-small'

const optionalString = z.string().trim().min(1).optional()

export const SyncConfigSchema = z
  .object({
    dataDir: z.string().min(1).default('static/data'),
    statePath: z.string().min(1).default('static/data/rag_chunks.db'),
    chunkSize: z.number().int().positive().default(DEFAULT_CHUNK_SIZE),
    chunkOverlap: z.number().int().nonnegative().default(DEFAULT_CHUNK_OVERLAP),
    indexHost: z.string().trim().url().optional(),
    indexNamespace: optionalString,
    indexBatchSize: z.number().int().positive().default(DEFAULT_BATCH_SIZE),
    deleteBatchSize: z.number().int().positive().default(DEFAULT_DELETE_BATCH_SIZE),
    embeddingModel: z.string().min(1).default(DEFAULT_EMBEDDING_MODEL),
    embeddingBatchSize: z.number().int().positive().default(DEFAULT_BATCH_SIZE),
    skipRemote: z.boolean().default(false),
    openaiApiKey: optionalString,
    indexApiKey: optionalString,
  })
  .refine(config => config.chunkOverlap < config.chunkSize, {
    message: 'chunkOverlap must be smaller than chunkSize',
    path: ['chunkOverlap'],
  })

export type SyncConfig = z.infer<typeof SyncConfigSchema>
export type SyncConfigInput = z.input<typeof SyncConfigSchema>
