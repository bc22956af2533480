/**
 * Flag parsing for the kb-sync commands. Only maps flags onto SyncConfigInput;
 * validation happens in the config schema.
 */

import { parseArgs } from 'node:util'
import type { SyncConfigInput } from '@kb-sync/core'

export type Command =
  | { name: 'sync'; overrides: SyncConfigInput }
  | { name: 'inspect'; overrides: SyncConfigInput; limit: number }
  | { name: 'help' }

export const USAGE = `Usage:
  kb-sync sync [--data-dir DIR] [--state-path FILE] [--chunk-size N] [--chunk-overlap N]
               [--index-host URL] [--index-namespace NS] [--index-batch-size N]
               [--embedding-model ID] [--skip-remote]
  kb-sync inspect [--state-path FILE] [--limit N]`

function toNumber(value: string | undefined): number | undefined {
  return value === undefined ? undefined : Number(value)
}

export function parseCommand(argv: string[]): Command {
  const { values, positionals } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      'data-dir': { type: 'string' },
      'state-path': { type: 'string' },
      'chunk-size': { type: 'string' },
      'chunk-overlap': { type: 'string' },
      'index-host': { type: 'string' },
      'index-namespace': { type: 'string' },
      'index-batch-size': { type: 'string' },
      'embedding-model': { type: 'string' },
      'skip-remote': { type: 'boolean' },
      limit: { type: 'string' },
      help: { type: 'boolean', short: 'h' },
    },
  })

  const [name] = positionals
  if (values.help || name === undefined) return { name: 'help' }

  const overrides: SyncConfigInput = {
    dataDir: values['data-dir'],
    statePath: values['state-path'],
    chunkSize: toNumber(values['chunk-size']),
    chunkOverlap: toNumber(values['chunk-overlap']),
    indexHost: values['index-host'],
    indexNamespace: values['index-namespace'],
    indexBatchSize: toNumber(values['index-batch-size']),
    embeddingModel: values['embedding-model'],
    skipRemote: values['skip-remote'],
  }

  switch (name) {
    case 'sync':
      return { name, overrides }
    case 'inspect':
      return { name, overrides, limit: toNumber(values.limit) ?? 3 }
    default:
      throw new Error(`Unknown command: ${name}\n${USAGE}`)
  }
}
