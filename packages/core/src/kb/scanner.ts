/**
 * Source directory scanner: finds the top-level `*.json` files and parses them.
 */

import { readdir, readFile, stat } from 'node:fs/promises'
import { basename, join } from 'node:path'
import { parse } from 'lossless-json'
import { Ok, Err, KBSyncError } from '../common/index.js'
import type { Result } from '../common/index.js'
import { JsonValueSchema } from './schemas.js'
import type { SourceFile } from './schemas.js'

const SOURCE_EXTENSION = '.json'

/** Confirms `dirPath` exists and is a directory. */
export async function checkSourceDirectory(dirPath: string): Promise<Result<void, KBSyncError>> {
  try {
    const dirStat = await stat(dirPath)
    if (!dirStat.isDirectory()) {
      return Err(KBSyncError.input(`Not a directory: ${dirPath}`))
    }
  } catch {
    return Err(KBSyncError.input(`Data directory ${dirPath} does not exist.`))
  }
  return Ok(undefined)
}

export async function scanSourceDirectory(dirPath: string): Promise<Result<SourceFile[], KBSyncError>> {
  const checked = await checkSourceDirectory(dirPath)
  if (!checked.ok) return checked

  let fileNames: string[]
  try {
    const entries = await readdir(dirPath, { withFileTypes: true })
    fileNames = []
    for (const entry of entries) {
      if (!entry.name.endsWith(SOURCE_EXTENSION)) continue
      if (entry.isFile()) {
        fileNames.push(entry.name)
      } else if (entry.isSymbolicLink() && (await stat(join(dirPath, entry.name))).isFile()) {
        // stat follows the link; links to directories are skipped like directories are
        fileNames.push(entry.name)
      }
    }
    fileNames.sort()
  } catch (err) {
    return Err(KBSyncError.from(err, 'INPUT_ERROR', `Failed to read ${dirPath}`))
  }

  const files: SourceFile[] = []
  for (const fileName of fileNames) {
    let raw: string
    try {
      raw = await readFile(join(dirPath, fileName), 'utf-8')
    } catch (err) {
      return Err(KBSyncError.from(err, 'INPUT_ERROR', `Failed to read ${fileName}`))
    }

    let parsed: unknown
    try {
      parsed = parse(raw)
    } catch (err) {
      return Err(KBSyncError.from(err, 'PARSE_ERROR', `Invalid JSON in ${fileName}`))
    }

    const payload = JsonValueSchema.safeParse(parsed)
    if (!payload.success) {
      return Err(KBSyncError.parse(`Unsupported JSON in ${fileName}: ${payload.error.message}`))
    }

    files.push({ fileName, stem: basename(fileName, SOURCE_EXTENSION), payload: payload.data })
  }

  return Ok(files)
}
