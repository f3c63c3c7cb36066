import type { Account, Activity, ActivityKind, ScheduledEvent } from '../../components/crmTypes'
import { feedDateFormat, eventDateFormat, listDateFormat } from '../../lib/crmConstants'
import { accountMetaLine } from '../../lib/crmHelpers'
import { activityKindLabel } from '../../lib/activityFeed'
import { formatInTimeZone } from '../../lib/timezone'
import { blankLine, line, segment } from '../../lib/theme'
import type { ScreenLine, ThemeRole } from '../../lib/theme'
import { stageIndex, stageValue } from '../wizard'
import type { WizardDefinition, WizardState } from '../wizard'

export const escapeHint = line('faint', "'/' goes back, 'exit.' returns home.")

export const titleLines = (title: string, hint?: string): ScreenLine[] =>
  hint ? [line('title', title), line('faint', hint), blankLine()] : [line('title', title), blankLine()]

export const createdLine = (account: Account, timeZone: string) =>
  `Created by ${account.creator} on ${formatInTimeZone(account.createdAt, timeZone, listDateFormat)}`

export const accountSummaryLines = (account: Account, timeZone: string, indent = ''): ScreenLine[] => {
  const lines: ScreenLine[] = []
  const meta = accountMetaLine(account)
  if (meta) {
    lines.push([segment('plain', indent), segment('secondary', meta)])
  }
  if (account.address) {
    lines.push([segment('plain', indent), segment('faint', account.address)])
  }
  lines.push([segment('plain', indent), segment('faint', createdLine(account, timeZone))])
  return lines
}

export const eventLineText = (event: ScheduledEvent, timeZone: string) => {
  const linked = event.accountName ? ` (${event.accountName})` : ''
  const parts = [`${formatInTimeZone(event.eventTime, timeZone, eventDateFormat)} - ${event.title}${linked}`]
  if (event.details) {
    parts.push(event.details)
  }
  parts.push(`by ${event.creator}`)
  return parts.join(' • ')
}

const activityRoles: Record<ActivityKind, ThemeRole> = {
  account: 'accent',
  note: 'success',
  event: 'warning',
}

export const activityLineText = (activity: Activity, timeZone: string) => {
  const stamp = formatInTimeZone(activity.createdAt, timeZone, feedDateFormat)
  const detail = activity.detail ? ` • ${activity.detail}` : ''
  return `[${activityKindLabel(activity.kind)}] ${activity.title}${detail} - ${stamp}`
}

export const activityLines = (feed: Activity[], timeZone: string): ScreenLine[] => {
  if (feed.length === 0) {
    return [line('faint', 'No activity yet.')]
  }
  return feed.map((activity) => line(activityRoles[activity.kind], activityLineText(activity, timeZone)))
}

export const menuLines = (labels: string[], backLabel?: string): ScreenLine[] => {
  const lines = labels.map((label) => line('secondary', label))
  if (backLabel) {
    lines.push(line('faint', backLabel))
  }
  return lines
}

type WizardScreen<S extends string> = {
  title: string
  definition: WizardDefinition<S>
  state: WizardState<S>
  notes?: string[]
}

/** Title, progress, the values captured so far and the current stage's label. */
export const wizardLines = <S extends string>({ title, definition, state, notes = [] }: WizardScreen<S>) => {
  const current = stageIndex(definition, state.stage)
  const lines: ScreenLine[] = [line('title', title), escapeHint]
  for (const note of notes) {
    lines.push(line('faint', note))
  }
  lines.push(blankLine())

  definition.order.forEach((stage, index) => {
    if (index >= current) return
    const value = stageValue(state, stage)
    lines.push([
      segment('faint', `${definition.stages[stage].label} `),
      segment('secondary', value.length > 0 ? value : '-'),
    ])
  })

  lines.push(line('secondary', `${current + 1}/${definition.order.length}`))
  lines.push(line('primary', definition.stages[state.stage].label))
  if (state.error) {
    lines.push(blankLine(), line('danger', state.error))
  }
  return lines
}

export const wizardPrompt = <S extends string>(definition: WizardDefinition<S>, state: WizardState<S>) => {
  const stageSpec = definition.stages[state.stage]
  return { placeholder: stageSpec.placeholder, charLimit: stageSpec.charLimit, value: stageValue(state) }
}
