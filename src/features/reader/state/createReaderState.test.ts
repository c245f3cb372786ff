import { get } from 'svelte/store'
import { describe, expect, it, vi } from 'vitest'
import { makeDocument } from '../../../test/fixtures/documents'
import type { ReaderDocument } from '../model/types'
import type { FetchOptions } from '../services/readerApi.service'
import { renderView } from '../view/renderView'
import { createReaderState } from './createReaderState'

const deferred = <T>() => {
  let resolve: (value: T) => void = () => {}
  let reject: (reason: unknown) => void = () => {}
  const promise = new Promise<T>((res, rej) => {
    resolve = res
    reject = rej
  })
  return { promise, resolve, reject }
}

const dimensions = { width: 80, height: 24 }

describe('createReaderState', () => {
  it('loads documents on start', async () => {
    const docs = [makeDocument({ id: '1', location: 'later' }), makeDocument({ id: '2', location: 'new' })]
    const fetchAllDocuments = vi.fn(async () => docs)
    const store = createReaderState({ source: { fetchAllDocuments } }, dimensions)

    expect(get(store).loading).toBe(true)
    store.start()
    store.start()
    await store.settled()

    const state = get(store)
    expect(fetchAllDocuments).toHaveBeenCalledTimes(1)
    expect(state.loading).toBe(false)
    expect(state.categories.map((category) => category.location)).toEqual(['new', 'later'])
    expect(state.documents.map((doc) => doc.id)).toEqual(['2'])
  })

  it('keeps the error when loading fails', async () => {
    const fetchAllDocuments = vi.fn(async (): Promise<ReaderDocument[]> => {
      throw new Error('API request failed with status 401')
    })
    const store = createReaderState({ source: { fetchAllDocuments } }, dimensions)

    store.start()
    await store.settled()

    const state = get(store)
    expect(state.loading).toBe(false)
    expect(state.error?.message).toBe('API request failed with status 401')
  })

  it('ignores a slow load that a refresh has replaced', async () => {
    const first = deferred<ReaderDocument[]>()
    const second = deferred<ReaderDocument[]>()
    const fetchAllDocuments = vi
      .fn<() => Promise<ReaderDocument[]>>()
      .mockReturnValueOnce(first.promise)
      .mockReturnValueOnce(second.promise)
    const store = createReaderState({ source: { fetchAllDocuments } }, dimensions)

    store.start()
    store.dispatch({ type: 'key', name: 'r' })
    await vi.waitFor(() => expect(fetchAllDocuments).toHaveBeenCalledTimes(2))

    second.resolve([makeDocument({ id: 'fresh' })])
    first.resolve([makeDocument({ id: 'stale' })])
    await store.settled()

    const state = get(store)
    expect(state.loadGeneration).toBe(2)
    expect(state.allDocuments.map((doc) => doc.id)).toEqual(['fresh'])
  })

  it('opens a document and renders its content', async () => {
    const doc = makeDocument({ id: '1', title: 'Essay', author: 'Ada', htmlContent: '<p>Hello</p>' })
    const renderMarkdown = vi.fn((text: string) => text.toUpperCase())
    const store = createReaderState(
      { source: { fetchAllDocuments: async () => [doc] }, renderMarkdown },
      dimensions,
    )

    store.start()
    await store.settled()
    store.dispatch({ type: 'key', name: 'enter' })

    expect(get(store).view).toBe('reading')
    expect(get(store).content).toBe('')

    await store.settled()

    const state = get(store)
    expect(state.content).toBe('# Essay\n\n*by Ada*\n\nHello')
    expect(state.contentLines).toEqual(['# ESSAY', '', '*BY ADA*', '', 'HELLO'])
    expect(renderMarkdown).toHaveBeenCalledWith('# Essay\n\n*by Ada*\n\nHello', 80)
  })

  it('drops content that arrives after leaving the document', async () => {
    const doc = makeDocument({ id: '1', title: 'Essay' })
    const store = createReaderState({ source: { fetchAllDocuments: async () => [doc] } }, dimensions)

    store.start()
    await store.settled()
    store.dispatch({ type: 'key', name: 'enter' })
    store.dispatch({ type: 'key', name: 'escape' })
    await store.settled()

    const state = get(store)
    expect(state.view).toBe('list')
    expect(state.content).toBe('')
  })

  it('aborts a pending load on quit', async () => {
    const onQuit = vi.fn()
    const signals: AbortSignal[] = []
    const fetchAllDocuments = vi.fn(
      ({ signal }: FetchOptions = {}) =>
        new Promise<ReaderDocument[]>((_resolve, reject) => {
          if (signal) signals.push(signal)
          signal?.addEventListener('abort', () => reject(new Error('aborted')))
        }),
    )
    const store = createReaderState({ source: { fetchAllDocuments }, onQuit }, dimensions)

    store.start()
    await vi.waitFor(() => expect(fetchAllDocuments).toHaveBeenCalledTimes(1))
    store.dispatch({ type: 'key', name: 'q' })
    await store.settled()

    expect(signals).toHaveLength(1)
    expect(signals[0].aborted).toBe(true)
    expect(onQuit).toHaveBeenCalledTimes(1)
    expect(get(store).error).toBeNull()
    expect(get(store).loading).toBe(true)
  })

  it('keeps control characters from remote content out of the frame', async () => {
    const doc = makeDocument({ id: '1', title: 'Essay', htmlContent: '<p>hi &#27;[2J&#27;]0;owned&#7; there</p>' })
    const store = createReaderState({ source: { fetchAllDocuments: async () => [doc] } }, dimensions)

    store.start()
    await store.settled()
    store.dispatch({ type: 'key', name: 'enter' })
    await store.settled()

    const frame = renderView(get(store))
    expect(get(store).contentLines).toEqual(['# Essay', '', 'hi [2J]0;owned there'])
    expect(frame).not.toMatch(/[\x00-\x08\x0b-\x1f\x7f-\x9f]/)
  })

  it('calls onQuit for the quit key', () => {
    const onQuit = vi.fn()
    const store = createReaderState({ source: { fetchAllDocuments: async () => [] }, onQuit }, dimensions)

    store.dispatch({ type: 'key', name: 'q' })

    expect(onQuit).toHaveBeenCalledTimes(1)
  })
})
