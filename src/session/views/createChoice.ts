import { resolveCommand } from '../../lib/commandResolver'
import { createChoiceOptions, prompts } from '../../lib/crmConstants'
import { startEventWizard } from '../eventWizard'
import { startNoteWizard } from '../noteWizard'
import type { ViewHandler } from '../sessionTypes'
import { menuLines, titleLines } from './screenParts'

export const createChoiceMessage = 'Choose 1 for note or 2 for event'

export const createChoiceView: ViewHandler = {
  prompt: () => prompts.createChoice,

  submit: (model, text) => {
    if (text.trim() === '') {
      return null
    }
    switch (resolveCommand(text, createChoiceOptions)) {
      case 'note':
        model.noteWizard = startNoteWizard()
        return { type: 'push', view: 'noteWizard' }
      case 'event':
        model.eventWizard = startEventWizard()
        return { type: 'push', view: 'eventWizard' }
      case 'back':
        return { type: 'pop' }
      case null:
        model.error = createChoiceMessage
        return null
    }
  },

  render: () => [...titleLines('Create Note or Event'), ...menuLines(['1. Note', '2. Event'], '3. Back')],
}
