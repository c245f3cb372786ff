import { z } from 'zod'
import { stripControl } from '../../../shared/lib/text'
import type { PublishedDate, ReaderDocument } from './types'

const text = z
  .string()
  .nullish()
  .transform((value) => stripControl(value ?? ''))

export const rawDocumentSchema = z.object({
  id: z.string(),
  title: text,
  author: text,
  summary: text,
  html_content: text,
  location: text,
  word_count: z
    .number()
    .nullish()
    .transform((value) => value ?? 0),
  published_date: z.union([z.string(), z.number()]).nullish(),
})

export type RawDocument = z.infer<typeof rawDocumentSchema>

export const normalizePublishedDate = (value: string | number | null | undefined): PublishedDate => {
  if (typeof value === 'number' && Number.isFinite(value)) return { kind: 'numeric', value: Math.round(value) }
  if (typeof value === 'string' && value.trim()) return { kind: 'text', value }
  return { kind: 'unknown' }
}

export const formatPublishedDate = (date: PublishedDate) => {
  switch (date.kind) {
    case 'text':
      return date.value
    case 'numeric':
      return String(date.value)
    case 'unknown':
      return ''
  }
}

export const toReaderDocument = (raw: RawDocument): ReaderDocument => {
  const publishedDate = normalizePublishedDate(raw.published_date)
  return {
    id: raw.id,
    title: raw.title,
    author: raw.author,
    summary: raw.summary,
    htmlContent: raw.html_content,
    location: raw.location,
    wordCount: raw.word_count,
    publishedDate,
    publishedLabel: formatPublishedDate(publishedDate),
  }
}

// Documents with a blank title are excluded from every view.
export const isValidDocument = (doc: ReaderDocument) => doc.title.trim() !== ''
