import type { EventBuckets, ScheduledEvent } from '../components/crmTypes'
import { startOfDayInTimeZone } from './timezone'

const dayMs = 24 * 60 * 60 * 1000

export const dayWindow = (now: number, timeZone: string) => {
  const dayStart = startOfDayInTimeZone(now, timeZone)
  return { dayStart, dayEnd: dayStart + dayMs }
}

/**
 * Splits events into today / upcoming / past relative to `now` in `timeZone`.
 *
 * Today and upcoming run soonest first, past runs most recent first. Equal timestamps keep the
 * order they arrived in (`Array.prototype.sort` is stable), which for the store is id order.
 */
export const classifyEvents = (events: ScheduledEvent[], now: number, timeZone: string): EventBuckets => {
  const { dayStart, dayEnd } = dayWindow(now, timeZone)
  const today: ScheduledEvent[] = []
  const upcoming: ScheduledEvent[] = []
  const past: ScheduledEvent[] = []

  for (const event of events) {
    if (event.eventTime >= dayStart && event.eventTime < dayEnd) {
      today.push(event)
    } else if (event.eventTime > now) {
      upcoming.push(event)
    } else {
      past.push(event)
    }
  }

  today.sort((left, right) => left.eventTime - right.eventTime)
  upcoming.sort((left, right) => left.eventTime - right.eventTime)
  past.sort((left, right) => right.eventTime - left.eventTime)

  return { today, upcoming, past }
}
