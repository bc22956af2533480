/**
 * Content fingerprint for change detection: SHA-256 over the UTF-8 bytes of a chunk body.
 */

import { createHash } from 'node:crypto'

export function fingerprint(body: string): string {
  return createHash('sha256').update(body, 'utf8').digest('hex')
}
