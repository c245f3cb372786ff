import { emitKeypressEvents, type Key } from 'node:readline'

const ENTER_ALT_SCREEN = '\x1b[?1049h'
const LEAVE_ALT_SCREEN = '\x1b[?1049l'
const HIDE_CURSOR = '\x1b[?25l'
const SHOW_CURSOR = '\x1b[?25h'
const CLEAR_SCREEN = '\x1b[H\x1b[2J'

const DEFAULT_WIDTH = 80
const DEFAULT_HEIGHT = 24

export type TerminalSize = {
  width: number
  height: number
}

export type TerminalEvent = { type: 'key'; name: string } | ({ type: 'resized' } & TerminalSize)

export type TerminalInput = NodeJS.ReadableStream & {
  isTTY?: boolean
  setRawMode?: (mode: boolean) => unknown
  unref?: () => unknown
}

export type TerminalOutput = NodeJS.WritableStream & {
  columns?: number
  rows?: number
}

export type TerminalHost = {
  start: (handler: (event: TerminalEvent) => void) => void
  paint: (frame: string) => void
  stop: () => void
  size: () => TerminalSize
}

const NAMED_KEYS: Record<string, string> = {
  return: 'enter',
  enter: 'enter',
  escape: 'escape',
  backspace: 'backspace',
  pageup: 'page-up',
  pagedown: 'page-down',
  up: 'up',
  down: 'down',
  left: 'left',
  right: 'right',
  home: 'home',
  end: 'end',
}

/**
 * Maps a readline keypress to the key names used by the hotkey table:
 * `ctrl+<key>` for control chords, a named key such as `page-up`, or the
 * printable character itself (case preserved).
 */
export const keyNameFromKeypress = (str: string | undefined, key: Key | undefined): string | null => {
  if (key?.ctrl && key.name) return `ctrl+${key.name}`
  if (key?.name && Object.hasOwn(NAMED_KEYS, key.name)) return NAMED_KEYS[key.name]
  if (str && str.length === 1 && str >= ' ' && str !== '\x7f') return str
  return null
}

export const createTerminalHost = ({
  input = process.stdin,
  output = process.stdout,
}: { input?: TerminalInput; output?: TerminalOutput } = {}): TerminalHost => {
  let onKeypress: ((str: string | undefined, key: Key | undefined) => void) | null = null
  let onResize: (() => void) | null = null

  const size = (): TerminalSize => ({
    width: output.columns || DEFAULT_WIDTH,
    height: output.rows || DEFAULT_HEIGHT,
  })

  const setRaw = (mode: boolean) => {
    if (input.isTTY && input.setRawMode) input.setRawMode(mode)
  }

  const start = (handler: (event: TerminalEvent) => void) => {
    if (onKeypress) return
    emitKeypressEvents(input)
    setRaw(true)

    onKeypress = (str, key) => {
      const name = keyNameFromKeypress(str, key)
      if (name) handler({ type: 'key', name })
    }
    onResize = () => handler({ type: 'resized', ...size() })

    input.on('keypress', onKeypress)
    output.on('resize', onResize)
    input.resume()
    output.write(ENTER_ALT_SCREEN + HIDE_CURSOR)
  }

  const paint = (frame: string) => {
    output.write(CLEAR_SCREEN + frame)
  }

  const stop = () => {
    if (!onKeypress) return
    input.removeListener('keypress', onKeypress)
    if (onResize) output.removeListener('resize', onResize)
    onKeypress = null
    onResize = null
    setRaw(false)
    input.pause()
    // a paused stdin still holds the event loop open
    input.unref?.()
    output.write(SHOW_CURSOR + LEAVE_ALT_SCREEN)
  }

  return { start, paint, stop, size }
}
