export type PublishedDate =
  | { kind: 'unknown' }
  | { kind: 'text'; value: string }
  | { kind: 'numeric'; value: number }

export type ReaderDocument = {
  id: string
  title: string
  author: string
  summary: string
  htmlContent: string
  location: string
  wordCount: number
  publishedDate: PublishedDate
  publishedLabel: string
}

export type Category = {
  location: string
  name: string
  count: number
}

export type ViewMode = 'list' | 'reading'

export type Dimensions = {
  width: number
  height: number
}

export type ReaderState = {
  view: ViewMode
  allDocuments: ReaderDocument[]
  categories: Category[]
  // -1 while no category is available
  selectedCategory: number
  documents: ReaderDocument[]
  selected: number
  openDocument: ReaderDocument | null
  content: string
  contentLines: string[]
  scrollOffset: number
  error: Error | null
  loading: boolean
  loadGeneration: number
  width: number
  height: number
}

export type ReaderEvent =
  | { type: 'documents-loaded'; generation: number; documents: ReaderDocument[] }
  | { type: 'documents-failed'; generation: number; error: Error }
  | { type: 'content-loaded'; documentId: string; content: string }
  | { type: 'resized'; width: number; height: number }
  | { type: 'key'; name: string }

export type ReaderTask =
  | { type: 'load-documents'; generation: number }
  | { type: 'load-content'; document: ReaderDocument }
  | { type: 'quit' }

export type Transition = {
  state: ReaderState
  tasks: ReaderTask[]
}
