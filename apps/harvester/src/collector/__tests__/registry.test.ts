import { describe, it, expect } from 'vitest'
import { ConfigurationError } from '../errors.js'
import { ExtractorRegistry, createFieldMapExtractor } from '../registry.js'

const boardA = createFieldMapExtractor({
  id: 'board-a',
  fields: {
    naturalKey: 'jobId',
    title: 'jobTitle',
    organization: 'company',
    location: 'place',
    link: 'url',
  },
})

describe('ExtractorRegistry', () => {
  it('selects extractors by source id', () => {
    const registry = new ExtractorRegistry().register(boardA)

    expect(registry.require('board-a')).toBe(boardA)
    expect(registry.get('board-b')).toBeUndefined()
    expect(registry.list()).toEqual(['board-a'])
    expect(registry.size()).toBe(1)
  })

  it('rejects duplicate ids', () => {
    const registry = new ExtractorRegistry().register(boardA)
    expect(() => registry.register(boardA)).toThrow(ConfigurationError)
  })

  it('throws ConfigurationError for unknown sources', () => {
    expect(() => new ExtractorRegistry().require('missing')).toThrow(
      "No extractor registered for source 'missing'"
    )
  })
})

describe('createFieldMapExtractor', () => {
  it('maps columns to identity fields and keeps the raw record as payload', () => {
    const raw = { jobId: 991, jobTitle: ' Platform Engineer ', company: 'Acme', place: 'Berlin', url: 'https://x.test/j/991', salary: '90k' }
    const result = boardA.extract(raw)

    expect(result).toEqual({
      ok: true,
      fields: {
        naturalKey: '991',
        title: 'Platform Engineer',
        organization: 'Acme',
        location: 'Berlin',
        link: 'https://x.test/j/991',
        payload: raw,
      },
    })
  })

  it('rejects records missing a required field', () => {
    expect(boardA.extract({ jobTitle: '   ', company: 'Acme' })).toEqual({
      ok: false,
      reason: 'missing required field(s): title',
    })
  })

  it('ignores values that are not strings or finite numbers', () => {
    const result = boardA.extract({ jobTitle: 'Engineer', company: { name: 'Acme' }, jobId: Number.NaN })
    expect(result.ok).toBe(true)
    if (result.ok) {
      expect(result.fields.organization).toBeUndefined()
      expect(result.fields.naturalKey).toBeUndefined()
    }
  })

  it('supports custom required fields', () => {
    const strict = createFieldMapExtractor({ id: 'strict', fields: { title: 't', link: 'l' }, required: ['title', 'link'] })
    expect(strict.extract({ t: 'Engineer' })).toEqual({ ok: false, reason: 'missing required field(s): link' })
  })
})
