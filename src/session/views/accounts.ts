import { isSelectionCommand, resolveAccountSelection } from '../../lib/accountResolver'
import { prompts } from '../../lib/crmConstants'
import { blankLine, line, segment } from '../../lib/theme'
import type { ScreenLine } from '../../lib/theme'
import { loadInto } from '../feedback'
import type { SessionModel, ViewHandler } from '../sessionTypes'
import { accountSummaryLines, titleLines } from './screenParts'

const applyFilter = (model: SessionModel) => {
  const term = model.accounts.term
  if (term === '') {
    model.accounts.filtered = model.accounts.all
    return
  }
  loadInto(
    model,
    'search accounts',
    () => model.store.searchAccounts(term),
    (found) => {
      model.accounts.filtered = found
    },
  )
}

export const noMatchMessage = (text: string) => `No account matches "${text.trim()}"`

export const accountsView: ViewHandler = {
  prompt: (model) => ({ ...prompts.accounts, value: model.accounts.term }),

  enter: (model) => {
    loadInto(
      model,
      'load accounts',
      () => model.store.listAccounts(),
      (accounts) => {
        model.accounts.all = accounts
      },
    )
    applyFilter(model)
  },

  inputChanged: (model) => {
    const value = model.input.value
    // Keep the list still while a row is being picked by number or verb.
    if (isSelectionCommand(value)) {
      return
    }
    model.accounts.term = value.trim()
    applyFilter(model)
  },

  submit: (model, text) => {
    const account = resolveAccountSelection(text, model.accounts.filtered, model.accounts.all)
    if (!account) {
      if (text.trim() !== '') {
        model.error = noMatchMessage(text)
      }
      return null
    }
    model.detail = { account, pane: 'summary', activity: [] }
    return { type: 'push', view: 'accountDetail' }
  },

  render: (model) => {
    const { all, filtered } = model.accounts
    const timeZone = model.preferences.timeZone
    const lines = titleLines(
      'Accounts',
      "Type to search. Enter a number or name to manage. '/' to go back, 'exit.' home.",
    )

    if (filtered.length === 0) {
      lines.push(line('warning', all.length === 0 ? 'No accounts yet.' : 'No accounts found.'))
      return lines
    }

    lines.push(line('faint', `${filtered.length} of ${all.length} accounts`), blankLine())
    filtered.forEach((account, index) => {
      const row: ScreenLine = [segment('primary', `${index + 1}. ${account.name}`)]
      lines.push(row, ...accountSummaryLines(account, timeZone, '  '), blankLine())
    })
    return lines
  },
}
