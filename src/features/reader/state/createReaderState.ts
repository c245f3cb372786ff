import { get, writable, type Readable } from 'svelte/store'
import { normalizeError } from '../../../shared/lib/error'
import { createSilentLogger, type Logger } from '../../../shared/lib/logger'
import { composeDocumentContent } from '../content/documentContent'
import type { Dimensions, ReaderDocument, ReaderEvent, ReaderState, ReaderTask } from '../model/types'
import type { DocumentSource } from '../services/readerApi.service'
import { applyEvent, initReader, type ApplyOptions } from './applyEvent'

export type ReaderStateDeps = {
  source: Pick<DocumentSource, 'fetchAllDocuments'>
  renderMarkdown?: (text: string, width: number) => string
  logger?: Logger
  onQuit?: () => void
}

export type ReaderStateStore = Readable<ReaderState> & {
  start: () => void
  dispatch: (event: ReaderEvent) => void
  settled: () => Promise<void>
}

/**
 * Owns the navigation state. Events are applied one at a time through
 * `applyEvent`; the tasks they trigger run asynchronously and report back
 * only by dispatching further events.
 */
export const createReaderState = (deps: ReaderStateDeps, dimensions: Dimensions): ReaderStateStore => {
  const logger = deps.logger ?? createSilentLogger()
  const initial = initReader(dimensions)
  const state = writable<ReaderState>(initial.state)
  const inflight = new Set<Promise<void>>()
  const lifetime = new AbortController()

  const applyOptions: ApplyOptions = {
    renderMarkdown: deps.renderMarkdown,
    onRenderError: (error) => logger.debug({ err: normalizeError(error) }, 'rich render failed, using raw lines'),
  }

  const loadDocuments = async (generation: number) => {
    const startedAt = Date.now()
    logger.info({ generation }, 'loading documents')
    try {
      const documents = await deps.source.fetchAllDocuments({ signal: lifetime.signal })
      logger.info({ generation, count: documents.length, ms: Date.now() - startedAt }, 'documents loaded')
      dispatch({ type: 'documents-loaded', generation, documents })
    } catch (err) {
      if (lifetime.signal.aborted) {
        logger.debug({ generation }, 'load abandoned on quit')
        return
      }
      const error = normalizeError(err)
      logger.error({ generation, err: error, ms: Date.now() - startedAt }, 'loading documents failed')
      dispatch({ type: 'documents-failed', generation, error })
    }
  }

  const loadContent = async (document: ReaderDocument) => {
    logger.debug({ id: document.id }, 'opening document')
    let content: string
    try {
      content = composeDocumentContent(document)
    } catch (err) {
      logger.error({ id: document.id, err: normalizeError(err) }, 'converting document failed, showing raw text')
      content = document.htmlContent.trim() ? document.htmlContent : document.summary
    }
    dispatch({ type: 'content-loaded', documentId: document.id, content })
  }

  // Tasks start after the event that triggered them has been applied.
  const schedule = (work: () => Promise<void>) => {
    const task = Promise.resolve().then(work)
    inflight.add(task)
    void task.finally(() => inflight.delete(task))
  }

  const runTask = (task: ReaderTask) => {
    switch (task.type) {
      case 'load-documents': {
        const { generation } = task
        schedule(() => loadDocuments(generation))
        return
      }
      case 'load-content': {
        const { document } = task
        schedule(() => loadContent(document))
        return
      }
      case 'quit':
        logger.info({ pending: inflight.size }, 'quit requested')
        lifetime.abort()
        deps.onQuit?.()
        return
    }
  }

  const isStale = (current: ReaderState, event: ReaderEvent) =>
    (event.type === 'documents-loaded' || event.type === 'documents-failed') &&
    event.generation !== current.loadGeneration

  const dispatch = (event: ReaderEvent) => {
    const current = get(state)
    if (isStale(current, event)) {
      logger.debug({ event: event.type, latest: current.loadGeneration }, 'discarding stale load result')
    }
    const { state: next, tasks } = applyEvent(current, event, applyOptions)
    if (next !== current) state.set(next)
    for (const task of tasks) runTask(task)
  }

  let started = false
  const start = () => {
    if (started) return
    started = true
    for (const task of initial.tasks) runTask(task)
  }

  const settled = async () => {
    while (inflight.size > 0) {
      await Promise.all([...inflight])
    }
  }

  return {
    subscribe: state.subscribe,
    start,
    dispatch,
    settled,
  }
}
