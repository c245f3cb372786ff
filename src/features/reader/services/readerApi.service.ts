import { z } from 'zod'
import { LoadError, getErrorMessage } from '../../../shared/lib/error'
import { rawDocumentSchema, toReaderDocument } from '../model/document'
import type { ReaderDocument } from '../model/types'

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>

export type FetchOptions = {
  location?: string
  // aborts in-flight requests, e.g. when the reader quits
  signal?: AbortSignal
}

export type DocumentSource = {
  fetchAllDocuments: (options?: FetchOptions) => Promise<ReaderDocument[]>
  fetchOne: (id: string) => Promise<string>
  validateToken: () => Promise<void>
}

export type ReaderApiOptions = {
  token: string
  baseUrl?: string
  authUrl?: string
  timeoutMs?: number
  fetch?: FetchLike
}

const DEFAULT_BASE_URL = 'https://readwise.io/api/v3'
const DEFAULT_AUTH_URL = 'https://readwise.io/api/v2/auth/'
const DEFAULT_TIMEOUT_MS = 30_000

const listResponseSchema = z.object({
  count: z.number().nullish(),
  nextPageCursor: z.string().nullish(),
  results: z.array(rawDocumentSchema),
})

type ListResponse = z.infer<typeof listResponseSchema>

export const createReaderApi = ({
  token,
  baseUrl = DEFAULT_BASE_URL,
  authUrl = DEFAULT_AUTH_URL,
  timeoutMs = DEFAULT_TIMEOUT_MS,
  fetch: fetchImpl = fetch,
}: ReaderApiOptions): DocumentSource => {
  const send = async (url: string, signal?: AbortSignal) => {
    const timeout = AbortSignal.timeout(timeoutMs)
    try {
      return await fetchImpl(url, {
        method: 'GET',
        headers: {
          Authorization: `Token ${token}`,
          'Content-Type': 'application/json',
        },
        signal: signal ? AbortSignal.any([signal, timeout]) : timeout,
      })
    } catch (error) {
      throw new LoadError(`request failed: ${getErrorMessage(error)}`, { cause: error })
    }
  }

  const listUrl = (params: Record<string, string | undefined>) => {
    const query = new URLSearchParams({ withHtmlContent: 'true' })
    for (const [key, value] of Object.entries(params)) {
      if (value) query.set(key, value)
    }
    return `${baseUrl}/list/?${query.toString()}`
  }

  const readList = async (url: string, signal?: AbortSignal): Promise<ListResponse> => {
    const response = await send(url, signal)
    if (response.status !== 200) {
      throw new LoadError(`API request failed with status ${response.status}`, { status: response.status })
    }

    let payload: unknown
    try {
      payload = await response.json()
    } catch (error) {
      throw new LoadError(`failed to decode response: ${getErrorMessage(error)}`, { cause: error })
    }

    const parsed = listResponseSchema.safeParse(payload)
    if (!parsed.success) {
      throw new LoadError('failed to decode response: unexpected payload shape', { cause: parsed.error })
    }
    return parsed.data
  }

  // Follows page cursors until the server stops returning one.
  const fetchAllDocuments = async ({ location, signal }: FetchOptions = {}) => {
    const documents: ReaderDocument[] = []
    const seenCursors = new Set<string>()
    let pageCursor: string | undefined

    for (;;) {
      const page = await readList(listUrl({ location, pageCursor }), signal)
      documents.push(...page.results.map(toReaderDocument))
      const next = page.nextPageCursor
      if (!next || seenCursors.has(next)) break
      seenCursors.add(next)
      pageCursor = next
    }
    return documents
  }

  const fetchOne = async (id: string) => {
    const page = await readList(listUrl({ id }))
    const [first] = page.results
    if (!first) throw new LoadError('document not found')
    return first.summary
  }

  const validateToken = async () => {
    const response = await send(authUrl)
    if (response.status !== 204) {
      throw new LoadError('invalid token', { status: response.status })
    }
  }

  return { fetchAllDocuments, fetchOne, validateToken }
}
