import { TZDate } from '@date-fns/tz'
import { format, isValid, parse } from 'date-fns'

export type TimeZoneDateParts = {
  year: number
  month: number
  day: number
  hour: number
  minute: number
  second: number
}

const formatterCache = new Map<string, Intl.DateTimeFormat>()

export const isValidTimeZone = (value: string) => {
  if (value.trim().length === 0) {
    return false
  }
  try {
    new Intl.DateTimeFormat('en-US', { timeZone: value.trim() })
    return true
  } catch {
    return false
  }
}

export function normalizeTimeZone(value: unknown, fallback = 'UTC') {
  const candidate = typeof value === 'string' && value.trim().length > 0 ? value.trim() : fallback
  try {
    return new Intl.DateTimeFormat('en-US', { timeZone: candidate }).resolvedOptions().timeZone
  } catch {
    return fallback
  }
}

export const hostTimeZone = () => normalizeTimeZone(Intl.DateTimeFormat().resolvedOptions().timeZone)

export function timeZonePartsAt(timestampMs: number, timeZone: string): TimeZoneDateParts {
  const formatter = getFormatter(timeZone)
  const parts = formatter.formatToParts(new Date(timestampMs))
  const numeric = (type: Intl.DateTimeFormatPartTypes) => {
    const value = Number(parts.find((part) => part.type === type)?.value ?? 0)
    return Number.isFinite(value) ? value : 0
  }
  return {
    year: numeric('year'),
    month: numeric('month'),
    day: numeric('day'),
    hour: numeric('hour'),
    minute: numeric('minute'),
    second: numeric('second'),
  }
}

export function zonedDateTimeToUtcMs(
  value: {
    year: number
    month: number // 1-based
    day: number
    hour?: number
    minute?: number
    second?: number
  },
  timeZone: string,
) {
  const tz = normalizeTimeZone(timeZone)
  const localAsUtc = Date.UTC(
    value.year,
    value.month - 1,
    value.day,
    value.hour ?? 0,
    value.minute ?? 0,
    value.second ?? 0,
  )
  let actual = localAsUtc - timeZoneOffsetMsAt(localAsUtc, tz)
  const adjusted = localAsUtc - timeZoneOffsetMsAt(actual, tz)
  if (adjusted !== actual) actual = adjusted
  return actual
}

/** Midnight, in `timeZone`, of the calendar day containing `timestampMs`. */
export function startOfDayInTimeZone(timestampMs: number, timeZone: string) {
  const parts = timeZonePartsAt(timestampMs, timeZone)
  return zonedDateTimeToUtcMs({ year: parts.year, month: parts.month, day: parts.day }, timeZone)
}

export function formatInTimeZone(timestampMs: number, timeZone: string, pattern: string) {
  return format(new TZDate(timestampMs, normalizeTimeZone(timeZone)), pattern)
}

/** Parses wall-clock text such as `2026-03-04 09:30` as a time in `timeZone`; null when malformed. */
export function parseInTimeZone(value: string, pattern: string, timeZone: string) {
  // Read the fields against UTC so no host daylight-saving gap can shift them.
  const parsed = parse(value.trim(), pattern, new TZDate(2000, 0, 1, 'UTC'))
  if (!isValid(parsed)) {
    return null
  }
  return zonedDateTimeToUtcMs(
    {
      year: parsed.getFullYear(),
      month: parsed.getMonth() + 1,
      day: parsed.getDate(),
      hour: parsed.getHours(),
      minute: parsed.getMinutes(),
      second: parsed.getSeconds(),
    },
    timeZone,
  )
}

function getFormatter(timeZone: string) {
  const key = normalizeTimeZone(timeZone)
  const cached = formatterCache.get(key)
  if (cached) return cached
  const formatter = new Intl.DateTimeFormat('en-US', {
    timeZone: key,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
    hour: '2-digit',
    minute: '2-digit',
    second: '2-digit',
    hourCycle: 'h23',
  })
  formatterCache.set(key, formatter)
  return formatter
}

function timeZoneOffsetMsAt(timestampMs: number, timeZone: string) {
  const date = new Date(timestampMs)
  const utcSecondPrecision = Date.UTC(
    date.getUTCFullYear(),
    date.getUTCMonth(),
    date.getUTCDate(),
    date.getUTCHours(),
    date.getUTCMinutes(),
    date.getUTCSeconds(),
    0,
  )
  const localParts = timeZonePartsAt(timestampMs, timeZone)
  const localAsUtc = Date.UTC(
    localParts.year,
    localParts.month - 1,
    localParts.day,
    localParts.hour,
    localParts.minute,
    localParts.second,
    0,
  )
  return localAsUtc - utcSecondPrecision
}
