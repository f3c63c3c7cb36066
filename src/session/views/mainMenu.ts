import { appTagline, appTitle, mainMenuLabels, mainMenuOptions, prompts, splashBanner } from '../../lib/crmConstants'
import { resolveCommand } from '../../lib/commandResolver'
import { blankLine, line } from '../../lib/theme'
import type { ScreenLine } from '../../lib/theme'
import { newAccountForm } from '../accountForm'
import type { ViewHandler } from '../sessionTypes'

export const unknownChoiceMessage = 'Unknown choice'

export const mainMenuView: ViewHandler = {
  prompt: () => prompts.mainMenu,

  submit: (model, text) => {
    const value = text.trim()
    if (value === '' || value === '0') {
      return null
    }
    switch (resolveCommand(value, mainMenuOptions)) {
      case 'dashboard':
        return { type: 'push', view: 'dashboard' }
      case 'accounts':
        model.accounts.term = ''
        return { type: 'push', view: 'accounts' }
      case 'add-account':
        model.accountForm = newAccountForm()
        return { type: 'push', view: 'accountForm' }
      case 'create':
        return { type: 'push', view: 'createChoice' }
      case 'settings':
        return { type: 'push', view: 'settings' }
      case 'quit':
        return { type: 'quit' }
      case null:
        model.error = unknownChoiceMessage
        return null
    }
  },

  render: (model) => {
    const lines: ScreenLine[] = []
    if (model.splash) {
      lines.push(...splashBanner.map((row) => line('accent', row)), blankLine())
    }
    lines.push(line('title', appTitle), line('secondary', appTagline))
    lines.push(line('faint', `${model.preferences.name} • ${model.preferences.timeZone}`), blankLine())
    lines.push(...mainMenuLabels.map((label) => line('primary', label)))
    return lines
  },
}
