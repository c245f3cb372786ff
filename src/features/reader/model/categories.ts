import { titleCase } from '../../../shared/lib/text'
import type { Category, ReaderDocument } from './types'

const LOCATION_NAMES: Record<string, string> = {
  new: '📥 New',
  later: '🕐 Later',
  archive: '📦 Archive',
  feed: '📰 Feed',
  shortlist: '⭐ Shortlist',
}

export const PREFERRED_LOCATIONS = ['new', 'later', 'archive', 'feed', 'shortlist'] as const

export const locationName = (location: string) => {
  if (Object.hasOwn(LOCATION_NAMES, location)) return LOCATION_NAMES[location]
  if (!location.trim()) return 'Unsorted'
  return titleCase(location)
}

/**
 * Distinct locations of the valid documents, each with its count. Known
 * locations come first in their fixed order, unknown ones follow in the
 * order they were first seen.
 */
export const buildCategories = (documents: ReaderDocument[]): Category[] => {
  const counts = new Map<string, number>()
  for (const doc of documents) {
    if (!doc.title.trim()) continue
    counts.set(doc.location, (counts.get(doc.location) ?? 0) + 1)
  }

  const preferred: readonly string[] = PREFERRED_LOCATIONS
  const ordered = [
    ...PREFERRED_LOCATIONS.filter((location) => counts.has(location)),
    ...[...counts.keys()].filter((location) => !preferred.includes(location)),
  ]

  return ordered.map((location) => ({
    location,
    name: locationName(location),
    count: counts.get(location) ?? 0,
  }))
}

export const filterByLocation = (documents: ReaderDocument[], location: string) =>
  documents.filter((doc) => doc.location === location)
