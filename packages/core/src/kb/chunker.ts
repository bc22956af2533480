/**
 * Fixed-window text chunker with code-point overlap.
 */

import { KBSyncError } from '../common/index.js'

export interface ChunkerOptions {
  chunkSize: number
  overlap: number
}

export const DEFAULT_CHUNK_SIZE = 900
export const DEFAULT_CHUNK_OVERLAP = 150

/** A half-open `[start, end)` code-point range of the source text. */
export type ChunkWindow = readonly [start: number, end: number]

export function assertChunkerOptions({ chunkSize, overlap }: ChunkerOptions): void {
  if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
    throw KBSyncError.validation(`chunk size must be a positive integer, got ${chunkSize}`)
  }
  if (!Number.isInteger(overlap) || overlap < 0) {
    throw KBSyncError.validation(`chunk overlap must be a non-negative integer, got ${overlap}`)
  }
  // With overlap >= chunkSize the next window never starts past the previous one.
  if (overlap >= chunkSize) {
    throw KBSyncError.validation(`chunk overlap (${overlap}) must be smaller than chunk size (${chunkSize})`)
  }
}

/**
 * Pre-trim windows covering a text of `length` code points. Adjacent windows
 * share exactly `overlap` code points; the last one ends at `length`.
 */
export function chunkWindows(length: number, options: ChunkerOptions): ChunkWindow[] {
  assertChunkerOptions(options)
  const { chunkSize, overlap } = options

  if (length <= chunkSize) return [[0, length]]

  const windows: ChunkWindow[] = []
  let start = 0
  let end = chunkSize
  while (start < length) {
    windows.push([start, end])
    if (end >= length) break
    start = Math.max(0, end - overlap)
    end = Math.min(length, start + chunkSize)
  }
  return windows
}

/**
 * Split `text` into trimmed, non-empty chunks. Sizes count code points, so a
 * window edge never falls inside a surrogate pair. Text that fits in one window
 * is returned whole.
 */
export function splitText(text: string, options: ChunkerOptions): string[] {
  const chars = Array.from(text)
  const windows = chunkWindows(chars.length, options)
  if (windows.length === 1) return [text.trim()]

  return windows
    .map(([start, end]) => chars.slice(start, end).join('').trim())
    .filter(chunk => chunk.length > 0)
}
