import stringWidth from 'string-width'

const ANSI_PATTERN = /\x1b\[[0-9;]*m/g
const ANSI_SPLIT = /(\x1b\[[0-9;]*m)/
const CONTROL_PATTERN = /[\x00-\x08\x0b-\x1f\x7f-\x9f]/g

export const stripAnsi = (text: string) => text.replace(ANSI_PATTERN, '')

// Drops C0/C1 controls (ESC included) except tab and newline.
export const stripControl = (text: string) => text.replace(CONTROL_PATTERN, '')

// Terminal columns, so wide characters and emoji count as two.
export const visibleLength = (text: string) => stringWidth(text)

// Cuts to `width` visible columns, keeping escape sequences intact.
export const truncateVisible = (text: string, width: number) => {
  if (width <= 0 || visibleLength(text) <= width) return text
  let out = ''
  let shown = 0
  fill: for (const part of text.split(ANSI_SPLIT)) {
    if (ANSI_SPLIT.test(part)) {
      out += part
      continue
    }
    for (const char of part) {
      const columns = stringWidth(char)
      if (shown + columns > width - 1) break fill
      out += char
      shown += columns
    }
  }
  const reset = text.includes('\x1b[') ? '\x1b[0m' : ''
  return `${out}…${reset}`
}

// Words break on anything but letters, digits and underscores.
export const titleCase = (value: string) =>
  value.toLowerCase().replace(/(^|[^\p{L}\p{N}_])(\p{L})/gu, (_match, sep: string, letter: string) => sep + letter.toUpperCase())
