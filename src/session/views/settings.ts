import { resolveCommand } from '../../lib/commandResolver'
import { prompts, settingsOptions } from '../../lib/crmConstants'
import { blankLine, line, segment } from '../../lib/theme'
import type { ScreenLine } from '../../lib/theme'
import { isValidTimeZone, normalizeTimeZone } from '../../lib/timezone'
import { showFailure } from '../feedback'
import type { SessionModel, ViewHandler } from '../sessionTypes'
import { escapeHint, menuLines } from './screenParts'

export const settingsChoiceMessage = 'Choose 1 or 2 to edit settings'
export const emptyNameMessage = 'Name cannot be empty'
export const emptyTimeZoneMessage = 'Timezone cannot be empty'
export const invalidTimeZoneMessage = 'Invalid timezone'

const shortcuts: Array<[string, string]> = [
  ['/', 'Back'],
  ['exit.', 'Main menu'],
  ['Esc', 'Leave this screen'],
  ['Ctrl+C', 'Quit'],
]

const settingsHeader = (model: SessionModel): ScreenLine[] => [
  line('title', 'Settings & Help'),
  escapeHint,
  blankLine(),
  line('secondary', `Name: ${model.preferences.name}`),
  line('secondary', `Timezone: ${model.preferences.timeZone}`),
  blankLine(),
  line('highlight', 'Shortcuts'),
  ...shortcuts.map(([key, value]) => [segment('helpKey', key), segment('plain', ' → '), segment('helpValue', value)]),
  blankLine(),
]

export const settingsView: ViewHandler = {
  prompt: () => prompts.settings,

  submit: (model, text) => {
    if (text.trim() === '') {
      return null
    }
    switch (resolveCommand(text, settingsOptions)) {
      case 'name':
        return { type: 'push', view: 'settingsName' }
      case 'timezone':
        return { type: 'push', view: 'settingsTimezone' }
      case 'back':
        return { type: 'pop' }
      case null:
        model.error = settingsChoiceMessage
        return null
    }
  },

  render: (model) => [...settingsHeader(model), ...menuLines(['1. Update name', '2. Update timezone'], '3. Back')],
}

export const settingsNameView: ViewHandler = {
  prompt: (model) => ({ ...prompts.settingsName, value: model.settingsDraft }),

  enter: (model) => {
    model.settingsDraft = model.preferences.name
  },

  submit: (model, text) => {
    const name = text.trim()
    model.settingsDraft = text
    if (name === '') {
      model.error = emptyNameMessage
      return null
    }
    try {
      model.preferences.saveName(name)
    } catch (error) {
      showFailure(model, error)
      return null
    }
    model.info = 'Name updated'
    return { type: 'pop' }
  },

  render: (model) => [...settingsHeader(model), line('secondary', 'Enter new name:')],
}

export const settingsTimezoneView: ViewHandler = {
  prompt: (model) => ({ ...prompts.settingsTimezone, value: model.settingsDraft }),

  enter: (model) => {
    model.settingsDraft = model.preferences.timeZone
  },

  submit: (model, text) => {
    const zone = text.trim()
    model.settingsDraft = text
    if (zone === '') {
      model.error = emptyTimeZoneMessage
      return null
    }
    if (!isValidTimeZone(zone)) {
      model.error = invalidTimeZoneMessage
      return null
    }
    try {
      model.preferences.saveTimeZone(normalizeTimeZone(zone))
    } catch (error) {
      showFailure(model, error)
      return null
    }
    model.info = 'Timezone updated'
    return { type: 'pop' }
  },

  render: (model) => [...settingsHeader(model), line('secondary', 'Enter timezone (e.g. America/New_York):')],
}
