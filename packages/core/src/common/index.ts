/**
 * Common utilities — Result pattern, typed errors, shared schemas.
 */

export { Ok, Err, unwrap, isOk, isErr, attempt } from './result.js'
export type { Result } from './result.js'

export { KBSyncError } from './errors.js'
export type { ErrorCode } from './errors.js'

export { TimestampSchema, ChunkIdSchema, NonEmptyStringSchema } from './schemas.js'
