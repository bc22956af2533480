/**
 * Document extractor: turns one parsed JSON source into logical documents.
 *
 * A list yields one document per element, a mapping one per key, and any
 * scalar a single `<source>-all` document.
 */

import { LosslessNumber, stringify } from 'lossless-json'
import type { JsonValue, LogicalDocument } from './schemas.js'

/** Keys probed, in order, for a human label on list elements. */
export const TOPIC_KEYS = ['title', 'company', 'name', 'question', 'label', 'role'] as const

type JsonObject = { [key: string]: JsonValue }

function isJsonObject(value: JsonValue): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof LosslessNumber)
}

export function slugify(value: string): string {
  const slug = value
    .replace(/[^a-zA-Z0-9]+/g, '-')
    .replace(/^-+|-+$/g, '')
    .toLowerCase()
  return slug || 'entry'
}

/** First non-blank string found under one of {@link TOPIC_KEYS}, trimmed. */
export function guessTopic(entry: JsonValue): string | null {
  if (!isJsonObject(entry)) return null
  for (const key of TOPIC_KEYS) {
    const value = entry[key]
    if (typeof value === 'string' && value.trim()) {
      return value.trim()
    }
  }
  return null
}

/** Two-space JSON for lists and mappings, keeping numbers as written; scalars as plain text. */
export function renderBody(entry: JsonValue): string {
  if (Array.isArray(entry) || isJsonObject(entry)) {
    return stringify(entry, undefined, 2) ?? ''
  }
  return String(entry)
}

function composeDocument(source: string, topic: string, body: string): LogicalDocument {
  return {
    baseId: `${source}-${slugify(topic)}`,
    topic,
    text: `Source: ${source}\nTopic: ${topic}\n\n${body}`.trim(),
  }
}

export function* extractDocuments(source: string, payload: JsonValue): Generator<LogicalDocument> {
  if (Array.isArray(payload)) {
    for (const [idx, entry] of payload.entries()) {
      const topic = guessTopic(entry) ?? `${source}-${idx + 1}`
      yield composeDocument(source, topic, renderBody(entry))
    }
    return
  }

  if (isJsonObject(payload)) {
    for (const [key, value] of Object.entries(payload)) {
      yield composeDocument(source, key, renderBody(value))
    }
    return
  }

  yield {
    baseId: `${source}-all`,
    topic: source,
    text: `Source: ${source}\n\n${renderBody(payload)}`,
  }
}
