import type { Account } from '../components/crmTypes'
import { scheduleInputFormat } from '../lib/crmConstants'
import { parseInTimeZone } from '../lib/timezone'
import { accountNameStage, associateStage } from './association'
import { WIZARD_CANCEL, WIZARD_SAVE, createWizardState } from './wizard'
import type { WizardDefinition, WizardState, WizardStageSpec } from './wizard'

export type EventStage = 'title' | 'details' | 'schedule' | 'associate' | 'account'

export const eventTitleMessage = 'Title is required'
export const scheduleFormatMessage = 'Use format YYYY-MM-DD HH:MM'

const schedulePattern = /^\d{4}-\d{2}-\d{2} \d{2}:\d{2}$/

/** Blank means "now"; anything else must read as a wall-clock `YYYY-MM-DD HH:MM`. */
export const validateSchedule = (value: string) => {
  const text = value.trim()
  if (text.length === 0) {
    return null
  }
  if (!schedulePattern.test(text)) {
    return scheduleFormatMessage
  }
  return parseInTimeZone(text, scheduleInputFormat, 'UTC') === null ? scheduleFormatMessage : null
}

/** Converts the schedule text to epoch milliseconds in `timeZone`; null when it does not parse. */
export const scheduleTimestamp = (value: string, timeZone: string, now: number) => {
  const text = value.trim()
  if (text.length === 0) {
    return now
  }
  if (!schedulePattern.test(text)) {
    return null
  }
  return parseInTimeZone(text, scheduleInputFormat, timeZone)
}

const eventStages: Record<EventStage, WizardStageSpec> = {
  title: { label: 'Event title:', placeholder: 'Title', charLimit: 96, requiredMessage: eventTitleMessage },
  details: { label: 'Details (optional):', placeholder: 'Details', charLimit: 256 },
  schedule: {
    label: 'Schedule time (YYYY-MM-DD HH:MM, blank = now):',
    placeholder: 'YYYY-MM-DD HH:MM',
    charLimit: 32,
    validate: validateSchedule,
  },
  associate: associateStage,
  account: accountNameStage,
}

export const eventWizard: WizardDefinition<EventStage> = {
  initial: 'title',
  order: ['title', 'details', 'schedule', 'associate', 'account'],
  stages: eventStages,
  transitions: {
    title: { submit: 'details', back: WIZARD_CANCEL },
    details: { submit: 'schedule', back: 'title' },
    schedule: { submit: 'associate', back: 'details' },
    associate: { affirm: 'account', decline: WIZARD_SAVE, back: 'schedule' },
    account: { submit: WIZARD_SAVE, back: 'associate' },
  },
}

export const presetEventWizard: WizardDefinition<EventStage> = {
  initial: 'title',
  order: ['title', 'details', 'schedule'],
  stages: eventStages,
  transitions: {
    title: { submit: 'details', back: WIZARD_CANCEL },
    details: { submit: 'schedule', back: 'title' },
    schedule: { submit: WIZARD_SAVE, back: 'details' },
  },
}

export type EventWizardState = {
  preset: Account | null
  wizard: WizardState<EventStage>
}

export const eventWizardFor = (state: EventWizardState) => (state.preset ? presetEventWizard : eventWizard)

export const startEventWizard = (preset: Account | null = null): EventWizardState => ({
  preset,
  wizard: createWizardState(eventWizard),
})
