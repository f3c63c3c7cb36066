import { accountNotFoundMessage, linkedSuffix, resolveAssociation } from '../association'
import { failureMessage } from '../feedback'
import { noteWizardFor, startNoteWizard } from '../noteWizard'
import type { NoteStage } from '../noteWizard'
import type { Navigate, SessionModel, ViewHandler } from '../sessionTypes'
import { advanceWizard, rejectAt, stageValue } from '../wizard'
import { wizardLines, wizardPrompt } from './screenParts'

const saveNote = (model: SessionModel, from: NoteStage): Navigate | null => {
  const state = model.noteWizard
  try {
    const association = resolveAssociation(model.store, state.preset, from, stageValue(state.wizard, 'account'))
    if (association.type === 'missing') {
      model.noteWizard = { ...state, wizard: rejectAt(state.wizard, 'account', accountNotFoundMessage) }
      return null
    }
    model.store.createNote({
      content: stageValue(state.wizard, 'content'),
      accountId: association.type === 'linked' ? association.account.id : null,
      creator: model.preferences.name,
      createdAt: model.now(),
    })
    model.info = `Note saved${linkedSuffix(association)}`
    model.noteWizard = startNoteWizard()
    return { type: 'pop' }
  } catch (error) {
    model.noteWizard = { ...state, wizard: { ...state.wizard, error: failureMessage(model, error) } }
    return null
  }
}

const step = (model: SessionModel, text: string): Navigate | null => {
  const result = advanceWizard(noteWizardFor(model.noteWizard), model.noteWizard.wizard, text)
  model.noteWizard = { ...model.noteWizard, wizard: result.state }
  switch (result.type) {
    case 'stay':
    case 'moved':
      return null
    case 'cancel':
      model.noteWizard = startNoteWizard()
      return { type: 'pop' }
    case 'save':
      return saveNote(model, result.from)
  }
}

export const noteWizardView: ViewHandler = {
  prompt: (model) => wizardPrompt(noteWizardFor(model.noteWizard), model.noteWizard.wizard),

  submit: step,
  back: step,

  discard: (model) => {
    model.noteWizard = startNoteWizard()
  },

  render: (model) => {
    const preset = model.noteWizard.preset
    return wizardLines({
      title: 'New Note',
      definition: noteWizardFor(model.noteWizard),
      state: model.noteWizard.wizard,
      notes: preset ? [`Will link to ${preset.name}`] : [],
    })
  },
}
