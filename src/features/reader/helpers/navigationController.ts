export type NavigateArgs = {
  count: number
  current: number
  delta?: number
  toStart?: boolean
  toEnd?: boolean
}

// Index into a list of `count` items; 0 for an empty list.
export const moveCaret = ({ count, current, delta = 0, toStart, toEnd }: NavigateArgs) => {
  if (count <= 0) return 0
  if (toStart) return 0
  if (toEnd) return count - 1
  return Math.min(count - 1, Math.max(0, current + delta))
}

export type ScrollArgs = {
  offset: number
  maxScroll: number
  delta?: number
  toStart?: boolean
  toEnd?: boolean
}

export const moveScroll = ({ offset, maxScroll, delta = 0, toStart, toEnd }: ScrollArgs) => {
  const limit = Math.max(0, maxScroll)
  if (toStart) return 0
  if (toEnd) return limit
  return Math.min(limit, Math.max(0, offset + delta))
}
