import { accountNotFoundMessage, linkedSuffix, resolveAssociation } from '../association'
import { eventWizardFor, scheduleFormatMessage, scheduleTimestamp, startEventWizard } from '../eventWizard'
import type { EventStage } from '../eventWizard'
import { failureMessage } from '../feedback'
import type { Navigate, SessionModel, ViewHandler } from '../sessionTypes'
import { advanceWizard, rejectAt, stageValue } from '../wizard'
import { wizardLines, wizardPrompt } from './screenParts'

const saveEvent = (model: SessionModel, from: EventStage): Navigate | null => {
  const state = model.eventWizard
  const now = model.now()
  const eventTime = scheduleTimestamp(stageValue(state.wizard, 'schedule'), model.preferences.timeZone, now)
  if (eventTime === null) {
    model.eventWizard = { ...state, wizard: rejectAt(state.wizard, 'schedule', scheduleFormatMessage) }
    return null
  }
  try {
    const association = resolveAssociation(model.store, state.preset, from, stageValue(state.wizard, 'account'))
    if (association.type === 'missing') {
      model.eventWizard = { ...state, wizard: rejectAt(state.wizard, 'account', accountNotFoundMessage) }
      return null
    }
    model.store.createEvent({
      title: stageValue(state.wizard, 'title'),
      details: stageValue(state.wizard, 'details'),
      eventTime,
      accountId: association.type === 'linked' ? association.account.id : null,
      creator: model.preferences.name,
      createdAt: now,
    })
    model.info = `Event created${linkedSuffix(association)}`
    model.eventWizard = startEventWizard()
    return { type: 'pop' }
  } catch (error) {
    model.eventWizard = { ...state, wizard: { ...state.wizard, error: failureMessage(model, error) } }
    return null
  }
}

const step = (model: SessionModel, text: string): Navigate | null => {
  const result = advanceWizard(eventWizardFor(model.eventWizard), model.eventWizard.wizard, text)
  model.eventWizard = { ...model.eventWizard, wizard: result.state }
  switch (result.type) {
    case 'stay':
    case 'moved':
      return null
    case 'cancel':
      model.eventWizard = startEventWizard()
      return { type: 'pop' }
    case 'save':
      return saveEvent(model, result.from)
  }
}

export const eventWizardView: ViewHandler = {
  prompt: (model) => wizardPrompt(eventWizardFor(model.eventWizard), model.eventWizard.wizard),

  submit: step,
  back: step,

  discard: (model) => {
    model.eventWizard = startEventWizard()
  },

  render: (model) => {
    const preset = model.eventWizard.preset
    return wizardLines({
      title: 'New Event',
      definition: eventWizardFor(model.eventWizard),
      state: model.eventWizard.wizard,
      notes: preset ? [`Will link to ${preset.name}`] : [],
    })
  },
}
