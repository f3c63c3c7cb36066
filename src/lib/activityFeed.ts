import type { Activity, ActivityKind } from '../components/crmTypes'
import { activityDetailLength } from './crmConstants'

export const activityKinds: readonly ActivityKind[] = ['account', 'note', 'event']

export const defaultActivityLimit = 20

export type ActivityRow = {
  id: number
  kind: string
  title: string | null
  detail: string | null
  createdAt: number
}

const isActivityKind = (value: string): value is ActivityKind =>
  activityKinds.some((kind) => kind === value)

export const truncateDetail = (value: string, length = activityDetailLength) =>
  Array.from(value).slice(0, length).join('')

export const normalizeActivityLimit = (limit: number) =>
  Number.isFinite(limit) && limit >= 1 ? Math.floor(limit) : defaultActivityLimit

/**
 * Shapes raw feed rows for display: unknown kinds are dropped, missing text becomes `''`,
 * detail is cut to the display length, entries run newest first and at most `limit` are kept.
 */
export const normalizeActivityFeed = (rows: ActivityRow[], limit: number): Activity[] => {
  const cap = normalizeActivityLimit(limit)
  const feed: Activity[] = []

  for (const row of rows) {
    if (!isActivityKind(row.kind)) {
      continue
    }
    feed.push({
      id: row.id,
      kind: row.kind,
      title: row.title ?? '',
      detail: truncateDetail(row.detail ?? ''),
      createdAt: row.createdAt,
    })
  }

  feed.sort((left, right) => right.createdAt - left.createdAt)
  return feed.slice(0, cap)
}

export const activityKindLabel = (kind: ActivityKind) => `${kind.charAt(0).toUpperCase()}${kind.slice(1)}`
