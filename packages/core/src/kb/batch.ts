/** Yield consecutive slices of at most `size` items. */
export function* batches<T>(items: readonly T[], size: number): Generator<T[]> {
  if (!Number.isInteger(size) || size <= 0) {
    throw new RangeError(`batch size must be a positive integer, got ${size}`)
  }
  for (let start = 0; start < items.length; start += size) {
    yield items.slice(start, start + size)
  }
}
