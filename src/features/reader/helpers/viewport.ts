export const LIST_CHROME_ROWS = 8
export const READING_CHROME_ROWS = 6
export const LIST_MIN_CAPACITY = 5
export const READING_MIN_CAPACITY = 10

export type ViewportWindow = {
  start: number
  end: number
}

export const listCapacity = (height: number) => Math.max(LIST_MIN_CAPACITY, height - LIST_CHROME_ROWS)

export const readingCapacity = (height: number) => Math.max(READING_MIN_CAPACITY, height - READING_CHROME_ROWS)

export const halfPage = (capacity: number) => Math.max(1, Math.floor(capacity / 2))

export const maxScrollFor = (totalLines: number, capacity: number) => Math.max(0, totalLines - capacity)

/**
 * Window of at most `capacity` items around `index`, centred where the list
 * allows it and pinned to either end otherwise.
 */
export const centeredWindow = (total: number, index: number, capacity: number): ViewportWindow => {
  const size = Math.max(1, capacity)
  if (total <= size) return { start: 0, end: Math.max(0, total) }
  const ideal = index - Math.floor(size / 2)
  const start = Math.min(total - size, Math.max(0, ideal))
  return { start, end: start + size }
}

// Window starting at the scroll offset, as used for content lines.
export const scrollWindow = (total: number, offset: number, capacity: number): ViewportWindow => {
  const size = Math.max(1, capacity)
  const start = Math.min(Math.max(0, offset), maxScrollFor(total, size))
  return { start, end: Math.min(total, start + size) }
}

export const scrollPercent = (offset: number, totalLines: number, capacity: number) => {
  if (totalLines <= capacity) return 0
  return Math.round((offset / Math.max(1, totalLines - capacity)) * 100)
}
