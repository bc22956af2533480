/**
 * Shared Zod schemas used across modules.
 */

import { z } from 'zod'

export const TimestampSchema = z.string().datetime({ offset: true })

/** `<document_id>:<sequence>` with a 1-based sequence. */
export const ChunkIdSchema = z.string().regex(/^.+:[1-9]\d*$/, 'Chunk id must look like <document>:<n>')

export const NonEmptyStringSchema = z.string().min(1, 'Value cannot be empty')
