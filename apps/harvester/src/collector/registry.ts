/**
 * Source Extractor Registry
 *
 * Extractors are registered explicitly and selected by source id.
 * The core never inspects source-specific record shapes.
 */

import { ConfigurationError } from './errors.js'
import type { ExtractResult, ExtractedFields, RawRecord, SourceExtractor } from './types.js'

export class ExtractorRegistry {
  private readonly extractors = new Map<string, SourceExtractor>()

  /**
   * @throws ConfigurationError if an extractor with the same id is already registered
   */
  register(extractor: SourceExtractor): this {
    if (this.extractors.has(extractor.id)) {
      throw new ConfigurationError(`Extractor with ID '${extractor.id}' is already registered`)
    }
    this.extractors.set(extractor.id, extractor)
    return this
  }

  get(sourceId: string): SourceExtractor | undefined {
    return this.extractors.get(sourceId)
  }

  /**
   * @throws ConfigurationError when no extractor is registered for the source
   */
  require(sourceId: string): SourceExtractor {
    const extractor = this.extractors.get(sourceId)
    if (!extractor) {
      throw new ConfigurationError(`No extractor registered for source '${sourceId}'`)
    }
    return extractor
  }

  list(): string[] {
    return Array.from(this.extractors.keys())
  }

  size(): number {
    return this.extractors.size
  }
}

export interface FieldMap {
  naturalKey?: string
  title?: string
  organization?: string
  location?: string
  link?: string
}

export interface FieldMapExtractorOptions {
  id: string
  fields: FieldMap
  /**
   * Fields that must be present and non-empty. Records missing any of them
   * are rejected. Default: title.
   */
  required?: Array<keyof FieldMap>
}

/**
 * Build an extractor that reads identity fields by name and keeps the
 * whole raw record as payload.
 */
export function createFieldMapExtractor(options: FieldMapExtractorOptions): SourceExtractor {
  const required = options.required ?? ['title']

  return {
    id: options.id,
    extract(raw: RawRecord): ExtractResult {
      const fields: ExtractedFields = { payload: { ...raw } }

      for (const name of FIELD_NAMES) {
        const column = options.fields[name]
        if (!column) continue
        const value = readString(raw[column])
        if (value !== undefined) {
          fields[name] = value
        }
      }

      const missing = required.filter((name) => !fields[name])
      if (missing.length > 0) {
        return { ok: false, reason: `missing required field(s): ${missing.join(', ')}` }
      }

      return { ok: true, fields }
    },
  }
}

const FIELD_NAMES = ['naturalKey', 'title', 'organization', 'location', 'link'] as const

function readString(value: unknown): string | undefined {
  if (typeof value === 'string') {
    const trimmed = value.trim()
    return trimmed ? trimmed : undefined
  }
  if (typeof value === 'number' && Number.isFinite(value)) {
    return String(value)
  }
  return undefined
}
