export type ReaderCommandId =
  | 'move_up'
  | 'move_down'
  | 'half_page_up'
  | 'half_page_down'
  | 'jump_start'
  | 'jump_end'
  | 'category_prev'
  | 'category_next'
  | 'open'
  | 'back'
  | 'refresh'
  | 'quit'

export type HotkeyBinding = {
  commandId: ReaderCommandId
  keys: string[]
}

// Key names as delivered by the terminal host; single characters are case-sensitive.
export const DEFAULT_HOTKEYS: HotkeyBinding[] = [
  { commandId: 'move_up', keys: ['up', 'k'] },
  { commandId: 'move_down', keys: ['down', 'j'] },
  { commandId: 'half_page_up', keys: ['page-up', 'ctrl+u'] },
  { commandId: 'half_page_down', keys: ['page-down', 'ctrl+d'] },
  { commandId: 'jump_start', keys: ['home', 'g'] },
  { commandId: 'jump_end', keys: ['end', 'G'] },
  { commandId: 'category_prev', keys: ['left', 'h'] },
  { commandId: 'category_next', keys: ['right', 'l'] },
  { commandId: 'open', keys: ['enter'] },
  { commandId: 'back', keys: ['escape', 'backspace'] },
  { commandId: 'refresh', keys: ['r'] },
  { commandId: 'quit', keys: ['ctrl+c', 'q'] },
]

const keymap = new Map<string, ReaderCommandId>(
  DEFAULT_HOTKEYS.flatMap((binding) => binding.keys.map((key): [string, ReaderCommandId] => [key, binding.commandId])),
)

export const resolveCommand = (key: string): ReaderCommandId | null => keymap.get(key) ?? null
