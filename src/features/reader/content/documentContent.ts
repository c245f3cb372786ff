import type { ReaderDocument } from '../model/types'
import { convertMarkup, looksLikeMarkup } from './markup'

// Body text handed to the renderer when a document is opened.
export const composeDocumentContent = (doc: ReaderDocument) => {
  const source = doc.htmlContent.trim() ? doc.htmlContent : doc.summary
  const body = looksLikeMarkup(source) ? convertMarkup(source) : source
  if (body.includes(doc.title)) return body

  const parts = [`# ${doc.title}`]
  if (doc.author.trim()) parts.push(`*by ${doc.author}*`)
  if (body.trim()) parts.push(body)
  return parts.join('\n\n')
}
