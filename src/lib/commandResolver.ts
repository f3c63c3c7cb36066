import type { MenuOption } from '../components/crmTypes'

export const normalizeCommand = (input: string) => input.trim().toLowerCase()

/**
 * Resolves free text against a menu table.
 *
 * Exact synonyms win first, so literal shortcuts like `1` or `q` stay deterministic even when
 * they would be an ambiguous prefix. Otherwise the input must be a prefix of a keyword of
 * exactly one option. Unknown and ambiguous input both resolve to `null`.
 */
export const resolveCommand = <TId extends string>(input: string, options: MenuOption<TId>[]): TId | null => {
  const value = normalizeCommand(input)
  if (value.length === 0) {
    return null
  }

  const exact = options.find((option) => option.synonyms.includes(value))
  if (exact) {
    return exact.id
  }

  const candidates = new Set<TId>()
  for (const option of options) {
    if (option.keywords.some((keyword) => keyword.startsWith(value))) {
      candidates.add(option.id)
    }
  }

  if (candidates.size !== 1) {
    return null
  }
  const [only] = candidates
  return only ?? null
}
