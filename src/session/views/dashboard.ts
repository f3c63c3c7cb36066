import type { ScheduledEvent } from '../../components/crmTypes'
import { resolveCommand } from '../../lib/commandResolver'
import { activityFeedLimit, dashboardCommands, pastEventsShown, prompts, upcomingEventsShown } from '../../lib/crmConstants'
import { classifyEvents } from '../../lib/eventBuckets'
import { blankLine, line } from '../../lib/theme'
import type { ScreenLine, ThemeRole } from '../../lib/theme'
import { loadInto } from '../feedback'
import type { SessionModel, ViewHandler } from '../sessionTypes'
import { activityLines, eventLineText, titleLines } from './screenParts'

export const unknownDashboardMessage = 'Unknown dashboard command'

export const loadDashboard = (model: SessionModel) => {
  const timeZone = model.preferences.timeZone
  loadInto(
    model,
    'load events',
    () => model.store.listEvents(),
    (events) => {
      model.dashboard.buckets = classifyEvents(events, model.now(), timeZone)
    },
  )
  loadInto(
    model,
    'load activity',
    () => model.store.listActivity(activityFeedLimit),
    (activity) => {
      model.dashboard.activity = activity
    },
  )
}

const eventSection = (
  heading: string,
  events: ScheduledEvent[],
  role: ThemeRole,
  emptyText: string,
  timeZone: string,
): ScreenLine[] => {
  const lines: ScreenLine[] = [line('subtitle', heading)]
  if (events.length === 0) {
    lines.push(line('faint', emptyText))
  }
  for (const event of events) {
    lines.push(line(role, eventLineText(event, timeZone)))
  }
  return lines
}

export const dashboardView: ViewHandler = {
  prompt: () => prompts.dashboard,

  enter: loadDashboard,

  submit: (model, text) => {
    if (text.trim() === '') {
      return null
    }
    switch (resolveCommand(text, dashboardCommands)) {
      case 'toggle':
        model.dashboard.pane = model.dashboard.pane === 'events' ? 'activity' : 'events'
        return null
      case 'refresh':
        loadDashboard(model)
        return null
      case null:
        model.error = unknownDashboardMessage
        return null
    }
  },

  render: (model) => {
    const timeZone = model.preferences.timeZone
    const lines = titleLines('Dashboard', "Press t to toggle events/activity, r to refresh, '/' to go back.")

    if (model.dashboard.pane === 'activity') {
      lines.push(line('subtitle', 'Recent CRM Activity'), ...activityLines(model.dashboard.activity, timeZone))
      return lines
    }

    const { today, upcoming, past } = model.dashboard.buckets
    lines.push(
      ...eventSection("Today's Events", today, 'success', 'Nothing scheduled today.', timeZone),
      blankLine(),
      ...eventSection('Upcoming', upcoming.slice(0, upcomingEventsShown), 'warning', 'No upcoming events.', timeZone),
      blankLine(),
      ...eventSection('Recent', past.slice(0, pastEventsShown), 'danger', 'No recent events.', timeZone),
    )
    return lines
  },
}
