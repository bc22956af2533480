import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import { mkdtemp, writeFile, rm } from 'node:fs/promises'
import { join } from 'node:path'
import { tmpdir } from 'node:os'
import type Database from 'better-sqlite3'
import { openDatabase } from '../../src/storage/index.js'
import { SyncStateRepository } from '../../src/kb/state-repository.js'
import { runSync, toVectorRecords } from '../../src/kb/sync-orchestrator.js'
import type { SyncPhase } from '../../src/kb/sync-orchestrator.js'
import { LOCAL_ONLY, liveRemote } from '../../src/kb/remote.js'
import type { EmbeddingClient, EmbedResult } from '../../src/kb/embedding-client.js'
import type { VectorIndexClient, VectorRecord } from '../../src/kb/vector-index-client.js'
import { KBSyncError } from '../../src/common/index.js'

class FakeEmbeddings implements EmbeddingClient {
  readonly modelName = 'fake-embed'
  calls: string[][] = []
  failWith: Error | null = null

  async embed(texts: string[]): Promise<EmbedResult> {
    this.calls.push(texts)
    if (this.failWith) throw this.failWith
    return { embeddings: texts.map((text, idx) => [text.length, idx]) }
  }
}

class FakeIndex implements VectorIndexClient {
  readonly namespace = 'test-ns'
  upserts: VectorRecord[][] = []
  deletes: string[][] = []
  failDeleteWith: Error | null = null

  async upsert(records: VectorRecord[]): Promise<number> {
    this.upserts.push(records)
    return records.length
  }

  async delete(ids: string[]): Promise<number> {
    if (this.failDeleteWith) throw this.failDeleteWith
    this.deletes.push(ids)
    return ids.length
  }
}

describe('runSync', () => {
  let dataDir: string
  let db: Database.Database
  let repo: SyncStateRepository
  let embeddings: FakeEmbeddings
  let index: FakeIndex

  const options = { chunkSize: 900, overlap: 150 }

  async function writeSource(name: string, value: unknown): Promise<void> {
    await writeFile(join(dataDir, name), JSON.stringify(value))
  }

  function storedIds(): string[] {
    const state = repo.loadChecksums()
    if (!state.ok) throw state.error
    return [...state.value.keys()].sort()
  }

  beforeEach(async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {})
    vi.spyOn(console, 'warn').mockImplementation(() => {})
    vi.spyOn(console, 'error').mockImplementation(() => {})

    dataDir = await mkdtemp(join(tmpdir(), 'kb-sync-run-'))
    db = openDatabase(':memory:')
    repo = new SyncStateRepository(db)
    embeddings = new FakeEmbeddings()
    index = new FakeIndex()

    await writeSource('faq.json', [{ question: 'What is X?', answer: 'A letter.' }, { question: 'Why Y?' }])
    await writeSource('profile.json', { Summary: 'Builds sync engines.' })
  })

  afterEach(async () => {
    db.close()
    await rm(dataDir, { recursive: true, force: true })
    vi.restoreAllMocks()
  })

  it('embeds and upserts every chunk on the first run, then records them', async () => {
    const result = await runSync(repo, { ...options, dataDir, remote: liveRemote(embeddings, index) })

    expect(result.ok).toBe(true)
    if (!result.ok) return
    expect(result.value).toMatchObject({ totalChunks: 3, refreshed: 3, deleted: 0, unchanged: 0, remote: 'live' })

    expect(embeddings.calls).toHaveLength(1)
    expect(embeddings.calls[0]).toHaveLength(3)
    expect(index.upserts).toHaveLength(1)
    expect(index.upserts[0].map(r => r.id)).toEqual(['faq-what-is-x:1', 'faq-why-y:1', 'profile-summary:1'])
    expect(index.upserts[0][2].metadata).toMatchObject({ source: 'profile.json', topic: 'Summary' })
    expect(index.deletes).toEqual([])

    expect(storedIds()).toEqual(['faq-what-is-x:1', 'faq-why-y:1', 'profile-summary:1'])
  })

  it('issues no remote calls when nothing changed', async () => {
    await runSync(repo, { ...options, dataDir, remote: liveRemote(embeddings, index) })
    embeddings.calls = []
    index.upserts = []

    const second = await runSync(repo, { ...options, dataDir, remote: liveRemote(embeddings, index) })

    expect(second.ok).toBe(true)
    if (!second.ok) return
    expect(second.value).toMatchObject({ refreshed: 0, deleted: 0, unchanged: 3 })
    expect(embeddings.calls).toEqual([])
    expect(index.upserts).toEqual([])
    expect(index.deletes).toEqual([])
  })

  it('refreshes changed chunks and deletes removed ones', async () => {
    await runSync(repo, { ...options, dataDir, remote: liveRemote(embeddings, index) })
    embeddings.calls = []
    index.upserts = []

    await writeSource('faq.json', [{ question: 'What is X?', answer: 'A different letter.' }])
    const result = await runSync(repo, { ...options, dataDir, remote: liveRemote(embeddings, index) })

    expect(result.ok).toBe(true)
    if (!result.ok) return
    expect(result.value).toMatchObject({ totalChunks: 2, refreshed: 1, deleted: 1, unchanged: 1 })
    expect(index.upserts[0].map(r => r.id)).toEqual(['faq-what-is-x:1'])
    expect(index.deletes).toEqual([['faq-why-y:1']])
    expect(storedIds()).toEqual(['faq-what-is-x:1', 'profile-summary:1'])
  })

  it('runs the phases in order', async () => {
    await runSync(repo, { ...options, dataDir, remote: liveRemote(embeddings, index) })
    await writeSource('profile.json', { Summary: 'Changed summary.' })
    await rm(join(dataDir, 'faq.json'))

    const phases: SyncPhase[] = []
    await runSync(repo, {
      ...options,
      dataDir,
      remote: liveRemote(embeddings, index),
      onPhase: phase => phases.push(phase),
    })

    expect(phases).toEqual(['scan', 'diff', 'upsert', 'delete', 'persist', 'done'])
  })

  it('updates only the state store in local-only mode', async () => {
    const phases: SyncPhase[] = []
    const result = await runSync(repo, { ...options, dataDir, remote: LOCAL_ONLY, onPhase: phase => phases.push(phase) })

    expect(result.ok).toBe(true)
    if (!result.ok) return
    expect(result.value).toMatchObject({ totalChunks: 3, refreshed: 0, deleted: 0, remote: 'local-only' })
    expect(phases).toEqual(['scan', 'diff', 'persist', 'done'])
    expect(storedIds()).toHaveLength(3)
    expect(console.warn).toHaveBeenCalledWith(
      '[sync] Remote sync disabled; the state store will still be updated with the new content.',
    )
  })

  it('aborts without touching state when an embedding batch fails', async () => {
    await runSync(repo, { ...options, dataDir, remote: LOCAL_ONLY })
    await writeSource('profile.json', { Summary: 'Changed summary.' })
    embeddings.failWith = KBSyncError.remote('OpenAI embedding request failed (500): boom')

    const result = await runSync(repo, { ...options, dataDir, remote: liveRemote(embeddings, index) })

    expect(result.ok).toBe(false)
    if (result.ok) return
    expect(result.error.code).toBe('REMOTE_ERROR')
    expect(result.error.message).toBe('OpenAI embedding request failed (500): boom')
    expect(index.upserts).toEqual([])

    const stored = repo.getChunk('profile-summary:1')
    expect(stored.ok && stored.value?.body).toBe('Source: profile\nTopic: Summary\n\nBuilds sync engines.')
  })

  it('keeps the previous state when a delete fails after upserts went through', async () => {
    await runSync(repo, { ...options, dataDir, remote: liveRemote(embeddings, index) })
    await writeSource('faq.json', [{ question: 'Why Y?' }])
    await writeSource('profile.json', { Summary: 'Changed summary.' })
    index.upserts = []
    index.failDeleteWith = new Error('socket hang up')

    const result = await runSync(repo, { ...options, dataDir, remote: liveRemote(embeddings, index) })

    expect(index.upserts.map(batch => batch.map(r => r.id))).toEqual([['profile-summary:1']])
    expect(result.ok).toBe(false)
    if (result.ok) return
    expect(result.error.code).toBe('REMOTE_ERROR')
    expect(result.error.message).toBe('Vector delete failed: socket hang up')
    expect(storedIds()).toEqual(['faq-what-is-x:1', 'faq-why-y:1', 'profile-summary:1'])
  })

  it('labels failures outside the remote phases as internal', async () => {
    const result = await runSync(repo, {
      ...options,
      dataDir,
      remote: liveRemote(embeddings, index),
      onPhase: phase => {
        if (phase === 'persist') throw new TypeError('listener exploded')
      },
    })

    expect(result.ok).toBe(false)
    if (result.ok) return
    expect(result.error.code).toBe('INTERNAL_ERROR')
    expect(result.error.message).toBe('Sync failed: listener exploded')
    expect(storedIds()).toEqual([])
  })

  it('fails with INPUT_ERROR when the data directory is missing', async () => {
    const result = await runSync(repo, { ...options, dataDir: join(dataDir, 'missing'), remote: LOCAL_ONLY })

    expect(result.ok).toBe(false)
    if (result.ok) return
    expect(result.error.code).toBe('INPUT_ERROR')
    expect(storedIds()).toEqual([])
  })
})

describe('toVectorRecords', () => {
  const chunk = {
    chunkId: 'faq-a:1',
    source: 'faq.json',
    topic: 'A',
    body: 'body',
    checksum: 'f'.repeat(64),
  }

  it('attaches source, topic and checksum metadata', () => {
    expect(toVectorRecords([chunk], [[0.1, 0.2]])).toEqual([
      {
        id: 'faq-a:1',
        values: [0.1, 0.2],
        metadata: { source: 'faq.json', topic: 'A', checksum: 'f'.repeat(64) },
      },
    ])
  })

  it('rejects a vector count that does not match the chunks', () => {
    expect(() => toVectorRecords([chunk], [])).toThrow('Embedding count mismatch: 0 vector(s) for 1 chunk(s)')
  })
})
