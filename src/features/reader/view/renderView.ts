import { truncateVisible } from '../../../shared/lib/text'
import { centeredWindow, listCapacity, readingCapacity, scrollPercent, scrollWindow } from '../helpers/viewport'
import type { Category, ReaderDocument, ReaderState } from '../model/types'

const LIST_HELP = '↑/↓ j/k move, ctrl+u/ctrl+d half page, enter read'
const CATEGORY_HELP = ', ←/→ h/l switch category'
const LIST_HELP_TAIL = ', r refresh, q quit'
const READING_HELP = '↑/↓ j/k scroll, ctrl+u/ctrl+d half page, g/G top/bottom, esc back, q quit'

export type RenderOptions = {
  color?: boolean
}

const dim = (text: string, { color = false }: RenderOptions) => (color && text ? `\x1b[2m${text}\x1b[22m` : text)

const categoryBar = (categories: Category[], selected: number) => {
  if (categories.length === 1) return `${categories[0].name} (${categories[0].count})`
  return categories
    .map((category, i) => {
      const label = `${category.name} (${category.count})`
      return i === selected ? `[${label}]` : label
    })
    .join(' | ')
}

const documentMeta = (doc: ReaderDocument, options: RenderOptions) => {
  const parts: string[] = []
  if (doc.author.trim()) parts.push(doc.author)
  if (doc.publishedLabel) parts.push(doc.publishedLabel)
  if (doc.wordCount > 0) parts.push(`${doc.wordCount} words`)
  return parts.length > 0 ? dim(` · ${parts.join(' · ')}`, options) : ''
}

const listBody = (state: ReaderState, options: RenderOptions): string[] => {
  if (state.error) {
    return [`Error: ${state.error.message}`, '', 'Press r to refresh. Set token: reader config set-token <token>']
  }
  if (state.loading) return ['Loading...']
  if (state.documents.length === 0) return ['No documents found.']

  const capacity = listCapacity(state.height)
  const { start, end } = centeredWindow(state.documents.length, state.selected, capacity)
  const rows = state.documents.slice(start, end).map((doc, offset) => {
    const cursor = start + offset === state.selected ? '>' : ' '
    return `${cursor} ${doc.title}${documentMeta(doc, options)}`
  })
  if (state.documents.length > capacity) {
    rows.push('', `(${state.selected + 1}/${state.documents.length})`)
  }
  return rows
}

export const renderListView = (state: ReaderState, options: RenderOptions = {}): string[] => {
  const lines = ['📚 Reader', '']
  if (state.categories.length > 0) {
    lines.push(categoryBar(state.categories, state.selectedCategory), '')
  }
  lines.push(...listBody(state, options))
  const help = LIST_HELP + (state.categories.length > 1 ? CATEGORY_HELP : '') + LIST_HELP_TAIL
  lines.push('', help)
  return lines
}

export const renderReadingView = (state: ReaderState): string[] => {
  const title = state.openDocument?.title
  const lines = [title ? `📖 Reading: ${title}` : '📖 Reading', '']
  if (!state.content) {
    lines.push('Loading content...')
  } else {
    const capacity = readingCapacity(state.height)
    const total = state.contentLines.length
    const { start, end } = scrollWindow(total, state.scrollOffset, capacity)
    lines.push(...state.contentLines.slice(start, end))
    if (total > capacity) {
      lines.push('', `[${scrollPercent(state.scrollOffset, total, capacity)}%]`)
    }
  }
  lines.push('', READING_HELP)
  return lines
}

// Frame for the current state; lines are cut to the terminal width.
export const renderView = (state: ReaderState, options: RenderOptions = {}) => {
  const lines = state.view === 'list' ? renderListView(state, options) : renderReadingView(state)
  return lines.map((line) => truncateVisible(line, state.width)).join('\n')
}
