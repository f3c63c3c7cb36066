import type { Account } from '../components/crmTypes'

const selectionVerbs = ['open ', 'view ', 'select ']

/** Strips a leading `open `/`view `/`select ` verb or `#` marker. */
export const selectionQuery = (input: string) => {
  const trimmed = input.trim()
  const lower = trimmed.toLowerCase()
  const verb = selectionVerbs.find((candidate) => lower.startsWith(candidate))
  if (verb) {
    return trimmed.slice(verb.length).trim()
  }
  if (lower.startsWith('#')) {
    return trimmed.slice(1).trim()
  }
  return trimmed
}

/**
 * True when the text is a selection command rather than a search term. The account list keeps
 * its current filter for these so a typed index still points at the row the user saw.
 */
export const isSelectionCommand = (input: string) => {
  const trimmed = input.trim()
  if (trimmed.length === 0) {
    return false
  }
  const lower = trimmed.toLowerCase()
  if (lower.startsWith('#') || selectionVerbs.some((verb) => lower.startsWith(verb))) {
    return true
  }
  return /^\d+$/.test(trimmed)
}

const parseIndex = (query: string) => {
  if (!/^\d+$/.test(query)) {
    return null
  }
  const parsed = Number.parseInt(query, 10)
  return Number.isFinite(parsed) && parsed > 0 ? parsed : null
}

/**
 * Picks one account from the filtered view, falling back to the full list.
 *
 * Order: blank input takes a lone filtered entry; a number is a 1-based index into the filtered
 * list; then exact case-insensitive name; then a case-insensitive name prefix that is unique
 * within one list. The filtered list is always consulted before the full one.
 */
export const resolveAccountSelection = (input: string, filtered: Account[], all: Account[]): Account | null => {
  if (filtered.length === 0 && all.length === 0) {
    return null
  }

  if (input.trim().length === 0) {
    return filtered.length === 1 ? (filtered[0] ?? null) : null
  }

  const query = selectionQuery(input)
  const index = parseIndex(query)
  if (index !== null && index <= filtered.length) {
    return filtered[index - 1] ?? null
  }

  const lists = [filtered, all]
  const needle = query.toLowerCase()

  for (const list of lists) {
    const exact = list.find((account) => account.name.toLowerCase() === needle)
    if (exact) {
      return exact
    }
  }

  if (needle.length === 0) {
    return null
  }

  for (const list of lists) {
    const matches = list.filter((account) => account.name.toLowerCase().startsWith(needle))
    if (matches.length === 1) {
      return matches[0] ?? null
    }
  }

  return null
}
