import DOMPurify from 'dompurify'
import { JSDOM } from 'jsdom'
import { stripControl } from '../../../shared/lib/text'

const purify = DOMPurify(new JSDOM('').window)

/**
 * Strips every tag, drops the contents of unsafe elements such as script and
 * style, and returns the remaining text with entities decoded. Control
 * characters decoded from entities are removed as well.
 */
export const sanitizeToText = (html: string) => {
  const fragment = purify.sanitize(html, {
    ALLOWED_TAGS: [],
    ALLOWED_ATTR: [],
    RETURN_DOM_FRAGMENT: true,
  })
  return stripControl(fragment.textContent ?? '')
}
