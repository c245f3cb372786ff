import { resolveCommand, type ReaderCommandId } from '../config/hotkeys'
import { buildCategories, filterByLocation } from '../model/categories'
import { isValidDocument } from '../model/document'
import type { Dimensions, ReaderEvent, ReaderState, Transition } from '../model/types'
import { moveCaret, moveScroll } from '../helpers/navigationController'
import { halfPage, listCapacity, maxScrollFor, readingCapacity } from '../helpers/viewport'

export type ApplyOptions = {
  renderMarkdown?: (text: string, width: number) => string
  onRenderError?: (error: unknown) => void
}

export const createInitialState = ({ width, height }: Dimensions): ReaderState => ({
  view: 'list',
  allDocuments: [],
  categories: [],
  selectedCategory: -1,
  documents: [],
  selected: 0,
  openDocument: null,
  content: '',
  contentLines: [],
  scrollOffset: 0,
  error: null,
  loading: true,
  loadGeneration: 1,
  width,
  height,
})

// Initial state plus the first "load all documents" task.
export const initReader = (dimensions: Dimensions): Transition => {
  const state = createInitialState(dimensions)
  return { state, tasks: [{ type: 'load-documents', generation: state.loadGeneration }] }
}

const unchanged = (state: ReaderState): Transition => ({ state, tasks: [] })

const maxScroll = (state: ReaderState) => maxScrollFor(state.contentLines.length, readingCapacity(state.height))

// Wraps to the terminal width; falls back to the raw lines when rich rendering fails.
export const contentToLines = (content: string, width: number, { renderMarkdown, onRenderError }: ApplyOptions = {}) => {
  if (renderMarkdown) {
    try {
      return renderMarkdown(content, width).split('\n')
    } catch (error) {
      onRenderError?.(error)
    }
  }
  return content.split('\n')
}

const selectCategory = (state: ReaderState, index: number): ReaderState => {
  const category = state.categories[index]
  return {
    ...state,
    selectedCategory: category ? index : -1,
    documents: category ? filterByLocation(state.allDocuments, category.location) : [],
    selected: 0,
  }
}

const move = (state: ReaderState, delta: number): ReaderState => {
  if (state.view === 'list') {
    return { ...state, selected: moveCaret({ count: state.documents.length, current: state.selected, delta }) }
  }
  return { ...state, scrollOffset: moveScroll({ offset: state.scrollOffset, maxScroll: maxScroll(state), delta }) }
}

const jump = (state: ReaderState, toEnd: boolean): ReaderState => {
  if (state.view === 'list') {
    return {
      ...state,
      selected: moveCaret({ count: state.documents.length, current: state.selected, toStart: !toEnd, toEnd }),
    }
  }
  return {
    ...state,
    scrollOffset: moveScroll({ offset: state.scrollOffset, maxScroll: maxScroll(state), toStart: !toEnd, toEnd }),
  }
}

const pageStep = (state: ReaderState) =>
  halfPage(state.view === 'list' ? listCapacity(state.height) : readingCapacity(state.height))

const applyCommand = (state: ReaderState, command: ReaderCommandId): Transition => {
  switch (command) {
    case 'quit':
      return { state, tasks: [{ type: 'quit' }] }
    case 'move_up':
      return unchanged(move(state, -1))
    case 'move_down':
      return unchanged(move(state, 1))
    case 'half_page_up':
      return unchanged(move(state, -pageStep(state)))
    case 'half_page_down':
      return unchanged(move(state, pageStep(state)))
    case 'jump_start':
      return unchanged(jump(state, false))
    case 'jump_end':
      return unchanged(jump(state, true))
    case 'category_prev':
    case 'category_next': {
      if (state.view !== 'list') return unchanged(state)
      const next = state.selectedCategory + (command === 'category_next' ? 1 : -1)
      if (next < 0 || next >= state.categories.length) return unchanged(state)
      return unchanged(selectCategory(state, next))
    }
    case 'open': {
      if (state.view !== 'list' || state.documents.length === 0) return unchanged(state)
      const document = state.documents[state.selected]
      return {
        state: { ...state, view: 'reading', openDocument: document, content: '', contentLines: [], scrollOffset: 0 },
        tasks: [{ type: 'load-content', document }],
      }
    }
    case 'back':
      if (state.view !== 'reading') return unchanged(state)
      return unchanged({ ...state, view: 'list', openDocument: null, content: '', contentLines: [], scrollOffset: 0 })
    case 'refresh': {
      if (state.view !== 'list') return unchanged(state)
      const generation = state.loadGeneration + 1
      return {
        state: { ...state, loading: true, error: null, loadGeneration: generation },
        tasks: [{ type: 'load-documents', generation }],
      }
    }
  }
}

/**
 * Applies one event to the navigation state. Returns the next state and the
 * asynchronous tasks it triggered; never mutates `state`.
 */
export const applyEvent = (state: ReaderState, event: ReaderEvent, options: ApplyOptions = {}): Transition => {
  switch (event.type) {
    case 'documents-loaded': {
      if (event.generation !== state.loadGeneration) return unchanged(state)
      const allDocuments = event.documents.filter(isValidDocument)
      const loaded: ReaderState = {
        ...state,
        allDocuments,
        categories: buildCategories(allDocuments),
        loading: false,
        error: null,
      }
      return unchanged(selectCategory(loaded, 0))
    }
    case 'documents-failed':
      if (event.generation !== state.loadGeneration) return unchanged(state)
      return unchanged({ ...state, error: event.error, loading: false })
    case 'content-loaded': {
      if (state.view !== 'reading' || state.openDocument?.id !== event.documentId) return unchanged(state)
      return unchanged({
        ...state,
        content: event.content,
        contentLines: contentToLines(event.content, state.width, options),
        scrollOffset: 0,
      })
    }
    case 'resized': {
      // a taller terminal shrinks the maximum scroll
      const resized = { ...state, width: event.width, height: event.height }
      if (resized.content && event.width !== state.width) {
        resized.contentLines = contentToLines(resized.content, event.width, options)
      }
      const scrollOffset = moveScroll({ offset: resized.scrollOffset, maxScroll: maxScroll(resized) })
      return unchanged({ ...resized, scrollOffset })
    }
    case 'key': {
      const command = resolveCommand(event.name)
      if (!command) return unchanged(state)
      return applyCommand(state, command)
    }
  }
}
