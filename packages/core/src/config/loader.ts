/**
 * Builds a validated SyncConfig from environment variables plus explicit overrides.
 * Overrides win; blank environment values count as unset.
 */

import { Ok, Err, KBSyncError } from '../common/index.js'
import type { Result } from '../common/index.js'
import { SyncConfigSchema } from './schema.js'
import type { SyncConfig, SyncConfigInput } from './schema.js'

export type Env = Record<string, string | undefined>

function fromEnv(env: Env, key: string): string | undefined {
  const value = env[key]?.trim()
  return value ? value : undefined
}

export function loadSyncConfig(env: Env, overrides: SyncConfigInput = {}): Result<SyncConfig, KBSyncError> {
  const input: SyncConfigInput = {
    ...overrides,
    openaiApiKey: overrides.openaiApiKey ?? fromEnv(env, 'OPENAI_API_KEY'),
    embeddingModel: overrides.embeddingModel ?? fromEnv(env, 'OPENAI_EMBEDDING_MODEL'),
    indexApiKey: overrides.indexApiKey ?? fromEnv(env, 'PINECONE_API_KEY'),
    indexHost: overrides.indexHost ?? fromEnv(env, 'PINECONE_HOST'),
    indexNamespace: overrides.indexNamespace ?? fromEnv(env, 'PINECONE_NAMESPACE'),
  }

  const parsed = SyncConfigSchema.safeParse(input)
  if (!parsed.success) {
    const details = parsed.error.issues.map(issue => `${issue.path.join('.') || 'config'}: ${issue.message}`)
    return Err(KBSyncError.config(`Invalid configuration: ${details.join('; ')}`))
  }
  return Ok(parsed.data)
}
