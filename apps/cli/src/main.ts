/**
 * kb-sync entry point: wires configuration, the state store and the remote
 * clients together and reports the outcome as an exit code.
 */

import { existsSync } from 'node:fs'
import { resolve } from 'node:path'
import {
  checkSourceDirectory,
  loadSyncConfig,
  openStateStore,
  resolveRemoteSync,
  runSync,
  SyncStateRepository,
} from '@kb-sync/core'
import type { Env, RemoteClientFactories, SyncConfigInput } from '@kb-sync/core'
import { remoteClientFactories } from '@kb-sync/integrations'
import { parseCommand, USAGE } from './args.js'
import type { Command } from './args.js'

async function syncCommand(env: Env, overrides: SyncConfigInput, factories: RemoteClientFactories): Promise<number> {
  const config = loadSyncConfig(env, overrides)
  if (!config.ok) {
    console.error(config.error.message)
    return 1
  }

  // Credentials are checked here, before the data directory is even read.
  const remote = resolveRemoteSync(config.value, factories)
  if (!remote.ok) {
    console.error(remote.error.message)
    return 1
  }

  // The store is only created once there is something to sync from.
  const source = await checkSourceDirectory(config.value.dataDir)
  if (!source.ok) {
    console.error(`[${source.error.code}] ${source.error.message}`)
    return 1
  }

  const opened = openStateStore(config.value.statePath)
  if (!opened.ok) {
    console.error(`[${opened.error.code}] ${opened.error.message}`)
    return 1
  }

  const db = opened.value
  try {
    const result = await runSync(new SyncStateRepository(db), {
      dataDir: config.value.dataDir,
      chunkSize: config.value.chunkSize,
      overlap: config.value.chunkOverlap,
      remote: remote.value,
    })
    if (!result.ok) {
      console.error(`[${result.error.code}] ${result.error.message}`)
      return 1
    }

    const report = result.value
    console.log(`State store updated at ${resolve(config.value.statePath)}`)
    console.log(
      `[sync] ${report.totalChunks} chunk(s): ${report.refreshed} upserted, ${report.deleted} deleted, ${report.unchanged} unchanged (${report.remote})`,
    )
    return 0
  } finally {
    db.close()
  }
}

function inspectCommand(env: Env, overrides: SyncConfigInput, limit: number): number {
  const config = loadSyncConfig(env, { ...overrides, skipRemote: true })
  if (!config.ok) {
    console.error(config.error.message)
    return 1
  }
  if (!existsSync(config.value.statePath)) {
    console.error(`${config.value.statePath} is missing; run \`kb-sync sync\` first.`)
    return 1
  }

  const opened = openStateStore(config.value.statePath, { readonly: true })
  if (!opened.ok) {
    console.error(`[${opened.error.code}] ${opened.error.message}`)
    return 1
  }

  const db = opened.value
  try {
    const stats = new SyncStateRepository(db).inspect(limit)
    if (!stats.ok) {
      console.error(`[${stats.error.code}] ${stats.error.message}`)
      return 1
    }

    console.log(`rows=${stats.value.rows}`)
    for (const { source, count } of stats.value.bySource) {
      console.log(`  ${source}: ${count}`)
    }
    if (stats.value.samples.length > 0) {
      console.log('sample rows:')
      for (const { id, topic } of stats.value.samples) {
        console.log(`  ${id} (${topic})`)
      }
    }
    return 0
  } finally {
    db.close()
  }
}

export async function main(
  argv: string[],
  env: Env,
  factories: RemoteClientFactories = remoteClientFactories,
): Promise<number> {
  let command: Command
  try {
    command = parseCommand(argv)
  } catch (err) {
    console.error(err instanceof Error ? err.message : String(err))
    return 2
  }

  switch (command.name) {
    case 'help':
      console.log(USAGE)
      return 0
    case 'sync':
      return syncCommand(env, command.overrides, factories)
    case 'inspect':
      return inspectCommand(env, command.overrides, command.limit)
  }
}
