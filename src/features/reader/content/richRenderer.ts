import type { List, ListItem, PhrasingContent, Root, RootContent, Table } from 'mdast'
import remarkGfm from 'remark-gfm'
import remarkParse from 'remark-parse'
import { unified } from 'unified'
import { visibleLength } from '../../../shared/lib/text'

export type RichRendererOptions = {
  wordWrap?: number
  color?: boolean
}

export type RichRenderer = {
  render: (markdown: string, width?: number) => string
}

type Style = (text: string) => string

type Palette = {
  bold: Style
  italic: Style
  dim: Style
  underline: Style
  strike: Style
  code: Style
}

const sgr =
  (open: number, close: number): Style =>
  (text) =>
    text ? `\x1b[${open}m${text}\x1b[${close}m` : text

const plain: Style = (text) => text

const colorPalette: Palette = {
  bold: sgr(1, 22),
  italic: sgr(3, 23),
  dim: sgr(2, 22),
  underline: sgr(4, 24),
  strike: sgr(9, 29),
  code: sgr(36, 39),
}

const plainPalette: Palette = {
  bold: plain,
  italic: plain,
  dim: plain,
  underline: plain,
  strike: plain,
  code: plain,
}

const RULE_WIDTH = 40

export const wrapLine = (line: string, width: number) => {
  if (width <= 0 || visibleLength(line) <= width) return [line]
  const words = line.split(' ').filter((word) => word !== '')
  const lines: string[] = []
  let current = ''
  for (const word of words) {
    if (!current) {
      current = word
    } else if (visibleLength(current) + 1 + visibleLength(word) <= width) {
      current = `${current} ${word}`
    } else {
      lines.push(current)
      current = word
    }
  }
  if (current) lines.push(current)
  return lines
}

const prefixLines = (lines: string[], first: string, rest: string) =>
  lines.map((line, i) => `${i === 0 ? first : rest}${line}`)

export const createRichRenderer = ({ wordWrap = 80, color = false }: RichRendererOptions = {}): RichRenderer => {
  const paint = color ? colorPalette : plainPalette
  const processor = unified().use(remarkParse).use(remarkGfm)

  const inline = (nodes: PhrasingContent[]): string => nodes.map(phrasing).join('')

  const phrasing = (node: PhrasingContent): string => {
    switch (node.type) {
      case 'text':
        return node.value
      case 'strong':
        return paint.bold(inline(node.children))
      case 'emphasis':
        return paint.italic(inline(node.children))
      case 'delete':
        return paint.strike(inline(node.children))
      case 'inlineCode':
        return paint.code(node.value)
      case 'break':
        return '\n'
      case 'link': {
        const label = inline(node.children)
        if (!label || label === node.url) return paint.underline(node.url)
        return `${paint.underline(label)} ${paint.dim(`(${node.url})`)}`
      }
      case 'image':
        return paint.dim(`[image: ${node.alt || node.url}]`)
      case 'html':
        return node.value
      default:
        return ''
    }
  }

  const wrapText = (text: string, width: number) =>
    text.split('\n').flatMap((line) => wrapLine(line, width))

  const listLines = (node: List, width: number): string[] => {
    const start = node.start ?? 1
    return node.children.flatMap((item: ListItem, i) => {
      const marker = node.ordered ? `${start + i}. ` : '• '
      const checkbox = item.checked === true ? '[x] ' : item.checked === false ? '[ ] ' : ''
      const indent = ' '.repeat(marker.length)
      const body = item.children.flatMap((child, j) => {
        const lines = block(child, width - marker.length)
        return j > 0 && child.type === 'paragraph' ? ['', ...lines] : lines
      })
      const [first = '', ...rest] = body
      return prefixLines([checkbox + first, ...rest], marker, indent)
    })
  }

  const tableLines = (node: Table): string[] =>
    node.children.map((row, i) => {
      const cells = row.children.map((cell) => inline(cell.children)).join(' | ')
      return i === 0 ? paint.bold(cells) : cells
    })

  const block = (node: RootContent, width: number): string[] => {
    switch (node.type) {
      case 'heading':
        return [paint.bold(`${'#'.repeat(node.depth)} ${inline(node.children)}`)]
      case 'paragraph':
        return wrapText(inline(node.children), width)
      case 'blockquote': {
        const inner = blocks(node.children, width - 2)
        return inner.map((line) => paint.dim('│ ') + line)
      }
      case 'list':
        return listLines(node, width)
      case 'code':
        return node.value.split('\n').map((line) => `    ${paint.code(line)}`)
      case 'thematicBreak':
        return [paint.dim('─'.repeat(Math.min(RULE_WIDTH, Math.max(1, width))))]
      case 'table':
        return tableLines(node)
      case 'html':
        return node.value.split('\n')
      default:
        return []
    }
  }

  const blocks = (nodes: RootContent[], width: number): string[] =>
    nodes
      .map((node) => block(node, width))
      .filter((lines) => lines.length > 0)
      .flatMap((lines, i) => (i === 0 ? lines : ['', ...lines]))

  // Wraps at `wordWrap`, or at `width` when the terminal is narrower.
  const render = (markdown: string, width?: number) => {
    const tree: Root = processor.parse(markdown)
    const wrap = width && width > 0 ? Math.min(wordWrap, width) : wordWrap
    return blocks(tree.children, wrap).join('\n')
  }

  return { render }
}

export const shouldUseColor = (env: Record<string, string | undefined>, isTTY: boolean) =>
  isTTY && env.NO_COLOR === undefined
