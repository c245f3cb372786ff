import { describe, expect, it } from 'vitest'
import {
  formatPublishedDate,
  isValidDocument,
  normalizePublishedDate,
  rawDocumentSchema,
  toReaderDocument,
} from './document'

describe('normalizePublishedDate', () => {
  it('keeps strings as text', () => {
    expect(normalizePublishedDate('2024-03-01')).toEqual({ kind: 'text', value: '2024-03-01' })
  })

  it('rounds numeric timestamps', () => {
    expect(normalizePublishedDate(1709251200000.4)).toEqual({ kind: 'numeric', value: 1709251200000 })
  })

  it('treats missing and blank values as unknown', () => {
    expect(normalizePublishedDate(null)).toEqual({ kind: 'unknown' })
    expect(normalizePublishedDate(undefined)).toEqual({ kind: 'unknown' })
    expect(normalizePublishedDate('  ')).toEqual({ kind: 'unknown' })
    expect(normalizePublishedDate(Number.NaN)).toEqual({ kind: 'unknown' })
  })

  it('formats every variant as a display string', () => {
    expect(formatPublishedDate({ kind: 'text', value: 'March 2024' })).toBe('March 2024')
    expect(formatPublishedDate({ kind: 'numeric', value: 1709251200000 })).toBe('1709251200000')
    expect(formatPublishedDate({ kind: 'unknown' })).toBe('')
  })
})

describe('toReaderDocument', () => {
  it('maps the wire shape and fills missing fields', () => {
    const raw = rawDocumentSchema.parse({
      id: 'doc-1',
      title: 'Hello',
      html_content: '<p>Hi</p>',
      location: 'later',
      word_count: null,
      published_date: 1700000000000,
    })

    expect(toReaderDocument(raw)).toEqual({
      id: 'doc-1',
      title: 'Hello',
      author: '',
      summary: '',
      htmlContent: '<p>Hi</p>',
      location: 'later',
      wordCount: 0,
      publishedDate: { kind: 'numeric', value: 1700000000000 },
      publishedLabel: '1700000000000',
    })
  })

  it('removes terminal control characters from text fields', () => {
    const raw = rawDocumentSchema.parse({
      id: 'doc-3',
      title: 'Clean\x1b]0;title\x07 me',
      author: 'Ada\x1b[2J',
      summary: 'line one\nline\ttwo\x9b',
    })

    expect(raw.title).toBe('Clean]0;title me')
    expect(raw.author).toBe('Ada[2J')
    expect(raw.summary).toBe('line one\nline\ttwo')
  })

  it('rejects records without an id', () => {
    expect(rawDocumentSchema.safeParse({ title: 'No id' }).success).toBe(false)
  })

  it('flags blank titles as invalid', () => {
    const raw = rawDocumentSchema.parse({ id: 'doc-2', title: '   ' })

    expect(isValidDocument(toReaderDocument(raw))).toBe(false)
  })
})
