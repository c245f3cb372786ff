export { createReaderApi } from './services/readerApi.service'
export type { DocumentSource, FetchLike } from './services/readerApi.service'
export { createRichRenderer, shouldUseColor } from './content/richRenderer'
export { createReaderState } from './state/createReaderState'
export type { ReaderStateStore } from './state/createReaderState'
export { renderView } from './view/renderView'
export type { Category, ReaderDocument, ReaderEvent, ReaderState } from './model/types'
