/**
 * Builds the full chunk set for a run: extract documents, split them, fingerprint each chunk.
 */

import { Ok, Err, KBSyncError } from '../common/index.js'
import type { Result } from '../common/index.js'
import { extractDocuments } from './extractor.js'
import { splitText } from './chunker.js'
import type { ChunkerOptions } from './chunker.js'
import { fingerprint } from './fingerprint.js'
import type { Chunk, SourceFile } from './schemas.js'

export function buildChunkSet(sources: SourceFile[], options: ChunkerOptions): Result<Chunk[], KBSyncError> {
  const chunks: Chunk[] = []
  const origins = new Map<string, string>()

  try {
    for (const file of sources) {
      for (const doc of extractDocuments(file.stem, file.payload)) {
        const parts = splitText(doc.text, options)
        for (const [idx, body] of parts.entries()) {
          const chunkId = `${doc.baseId}:${idx + 1}`

          // Two entries whose topics slug to the same id would overwrite each other in the index.
          const seenIn = origins.get(chunkId)
          if (seenIn !== undefined) {
            return Err(
              KBSyncError.validation(
                `Duplicate chunk id ${chunkId} (from ${file.fileName}, already produced by ${seenIn}); give the entries distinct topics`,
              ),
            )
          }
          origins.set(chunkId, file.fileName)

          chunks.push({
            chunkId,
            source: file.fileName,
            topic: doc.topic,
            body,
            checksum: fingerprint(body),
          })
        }
      }
    }
  } catch (err) {
    return Err(KBSyncError.from(err, 'VALIDATION_ERROR', 'Failed to chunk documents'))
  }

  return Ok(chunks)
}
