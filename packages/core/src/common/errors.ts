/**
 * Typed error class for kb-sync operations.
 */

export type ErrorCode =
  | 'CONFIG_ERROR'
  | 'INPUT_ERROR'
  | 'PARSE_ERROR'
  | 'REMOTE_ERROR'
  | 'DB_ERROR'
  | 'VALIDATION_ERROR'
  | 'INTERNAL_ERROR'

export class KBSyncError extends Error {
  readonly code: ErrorCode

  constructor(code: ErrorCode, message: string) {
    super(message)
    this.name = 'KBSyncError'
    this.code = code
  }

  static config(message: string): KBSyncError {
    return new KBSyncError('CONFIG_ERROR', message)
  }

  static input(message: string): KBSyncError {
    return new KBSyncError('INPUT_ERROR', message)
  }

  static parse(message: string): KBSyncError {
    return new KBSyncError('PARSE_ERROR', message)
  }

  static remote(message: string): KBSyncError {
    return new KBSyncError('REMOTE_ERROR', message)
  }

  static db(message: string): KBSyncError {
    return new KBSyncError('DB_ERROR', message)
  }

  static validation(message: string): KBSyncError {
    return new KBSyncError('VALIDATION_ERROR', message)
  }

  static internal(message: string): KBSyncError {
    return new KBSyncError('INTERNAL_ERROR', message)
  }

  /** Wrap an unknown thrown value, keeping the code of an existing KBSyncError. */
  static from(err: unknown, fallback: ErrorCode, context: string): KBSyncError {
    if (err instanceof KBSyncError) return err
    const message = err instanceof Error ? err.message : String(err)
    return new KBSyncError(fallback, `${context}: ${message}`)
  }
}
