import type { Account } from '../components/crmTypes'
import { accountNameStage, associateStage } from './association'
import { WIZARD_CANCEL, WIZARD_SAVE, createWizardState } from './wizard'
import type { WizardDefinition, WizardState, WizardStageSpec } from './wizard'

export type NoteStage = 'content' | 'associate' | 'account'

export const noteContentMessage = 'Note cannot be empty'

const noteStages: Record<NoteStage, WizardStageSpec> = {
  content: {
    label: 'Type note text and press enter',
    placeholder: 'Note',
    charLimit: 256,
    requiredMessage: noteContentMessage,
  },
  associate: associateStage,
  account: accountNameStage,
}

export const noteWizard: WizardDefinition<NoteStage> = {
  initial: 'content',
  order: ['content', 'associate', 'account'],
  stages: noteStages,
  transitions: {
    content: { submit: 'associate', back: WIZARD_CANCEL },
    associate: { affirm: 'account', decline: WIZARD_SAVE, back: 'content' },
    account: { submit: WIZARD_SAVE, back: 'associate' },
  },
}

/** Launched from an account: the association stages are skipped. */
export const presetNoteWizard: WizardDefinition<NoteStage> = {
  initial: 'content',
  order: ['content'],
  stages: noteStages,
  transitions: {
    content: { submit: WIZARD_SAVE, back: WIZARD_CANCEL },
  },
}

export type NoteWizardState = {
  preset: Account | null
  wizard: WizardState<NoteStage>
}

export const noteWizardFor = (state: NoteWizardState) => (state.preset ? presetNoteWizard : noteWizard)

export const startNoteWizard = (preset: Account | null = null): NoteWizardState => ({
  preset,
  wizard: createWizardState(noteWizard),
})
