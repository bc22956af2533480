/**
 * Configuration: validated sync settings and remote capability resolution.
 */

export {
  SyncConfigSchema,
  DEFAULT_BATCH_SIZE,
  DEFAULT_DELETE_BATCH_SIZE,
  DEFAULT_EMBEDDING_MODEL,
} from './schema.js'
export type { SyncConfig, SyncConfigInput } from './schema.js'
export { loadSyncConfig } from './loader.js'
export type { Env } from './loader.js'
export { resolveRemoteSync } from './remote-resolver.js'
export type {
  RemoteClientFactories,
  EmbeddingClientOptions,
  VectorIndexClientOptions,
} from './remote-resolver.js'
