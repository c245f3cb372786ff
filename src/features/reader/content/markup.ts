import { sanitizeToText } from './sanitize'

type Rule = [pattern: RegExp, replacement: string]

// Opening tag with optional attributes, e.g. `<b>` or `<b class="x">` but not `<br>`.
const open = (tag: string) => `<${tag}(?:\\s[^>]*)?>`

const headingRules: Rule[] = [1, 2, 3, 4, 5, 6].map((level): Rule => [
  new RegExp(`${open(`h${level}`)}(.*?)</h${level}>`, 'g'),
  `${'#'.repeat(level)} $1`,
])

const emphasisRules: Rule[] = [
  [new RegExp(`${open('strong')}(.*?)</strong>`, 'g'), '**$1**'],
  [new RegExp(`${open('b')}(.*?)</b>`, 'g'), '**$1**'],
  [new RegExp(`${open('em')}(.*?)</em>`, 'g'), '*$1*'],
  [new RegExp(`${open('i')}(.*?)</i>`, 'g'), '*$1*'],
]

const linkRules: Rule[] = [[/<a\s[^>]*?href=(["'])(.*?)\1[^>]*>(.*?)<\/a>/g, '[$3]($2)']]

const blockRules: Rule[] = [
  [new RegExp(open('p'), 'g'), '\n'],
  [/<\/p>/g, '\n'],
  [/<br(?:\s[^>]*)?\/?>/g, '\n'],
  [new RegExp(open('blockquote'), 'g'), '\n> '],
  [/<\/blockquote>/g, '\n'],
]

const applyRules = (input: string, rules: Rule[]) =>
  rules.reduce((text, [pattern, replacement]) => text.replace(pattern, replacement), input)

/**
 * Best-effort HTML to Markdown-like text: headings, emphasis, links,
 * paragraphs, line breaks and blockquotes are rewritten, everything else is
 * stripped by the sanitizer.
 */
export const convertMarkup = (markup: string) => {
  if (!markup) return ''
  let text = applyRules(markup, headingRules)
  text = applyRules(text, emphasisRules)
  text = applyRules(text, linkRules)
  text = applyRules(text, blockRules)
  text = sanitizeToText(text)
  return text.replace(/\n\s*\n\s*\n/g, '\n\n').trim()
}

export const looksLikeMarkup = (text: string) => text.includes('<')
