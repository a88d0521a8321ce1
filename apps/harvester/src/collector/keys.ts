/**
 * Item identity keys.
 *
 * Dedupe key format: {idType}:{idValue}
 * - id:{source}:{naturalKey} when the source provides an id
 * - hash:{derivedKey} otherwise
 */

import { createHash } from 'node:crypto'
import type { ExtractedFields, Item } from './types.js'

export function normalizeText(value: string | undefined | null): string {
  return (value ?? '').trim().replace(/\s+/g, ' ').toLowerCase()
}

/**
 * Strip what changes between sightings of the same posting: query string
 * (tracking ids), fragment, trailing slash and host case.
 */
export function normalizeLink(link: string | undefined | null): string {
  const trimmed = (link ?? '').trim()
  if (!trimmed) return ''

  try {
    const url = new URL(trimmed)
    const path = url.pathname.replace(/\/+$/, '')
    return `${url.protocol}//${url.host.toLowerCase()}${path}`
  } catch {
    return trimmed.split(/[?#]/)[0].replace(/\/+$/, '').toLowerCase()
  }
}

export function deriveItemKey(fields: Pick<ExtractedFields, 'title' | 'organization' | 'location' | 'link'>): string {
  const base = [
    normalizeText(fields.title),
    normalizeText(fields.organization),
    normalizeText(fields.location),
    normalizeLink(fields.link),
  ].join('|')
  return createHash('sha256').update(base, 'utf8').digest('hex')
}

export function dedupeKey(item: Pick<Item, 'naturalKey' | 'derivedKey' | 'source'>): string {
  const natural = item.naturalKey?.trim()
  if (natural) {
    return `id:${item.source}:${natural}`
  }
  return `hash:${item.derivedKey}`
}

export function createItem(source: string, fields: ExtractedFields): Item {
  const naturalKey = fields.naturalKey?.trim() || undefined
  return {
    naturalKey,
    derivedKey: deriveItemKey(fields),
    source,
    link: fields.link?.trim() || undefined,
    payload: fields.payload,
    status: 'pending',
  }
}
