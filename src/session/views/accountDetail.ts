import { resolveCommand } from '../../lib/commandResolver'
import { accountDetailOptions, activityFeedLimit, prompts } from '../../lib/crmConstants'
import { blankLine, line } from '../../lib/theme'
import { editAccountForm } from '../accountForm'
import { startEventWizard } from '../eventWizard'
import { loadInto } from '../feedback'
import { startNoteWizard } from '../noteWizard'
import type { SessionModel, ViewHandler } from '../sessionTypes'
import { accountSummaryLines, activityLines, menuLines } from './screenParts'
import { unknownChoiceMessage } from './mainMenu'

export const loadAccountDetail = (model: SessionModel) => {
  const current = model.detail.account
  if (!current) {
    return
  }
  loadInto(
    model,
    'load account',
    () => model.store.accountById(current.id),
    (account) => {
      model.detail.account = account
    },
  )
  loadInto(
    model,
    'load activity',
    () => model.store.listAccountActivity(current.id, activityFeedLimit),
    (activity) => {
      model.detail.activity = activity
    },
  )
}

export const accountDetailView: ViewHandler = {
  prompt: () => prompts.accountDetail,

  enter: loadAccountDetail,

  submit: (model, text) => {
    const account = model.detail.account
    if (!account) {
      return { type: 'pop' }
    }
    if (text.trim() === '') {
      return null
    }
    switch (resolveCommand(text, accountDetailOptions)) {
      case 'activity':
        model.detail.pane = model.detail.pane === 'activity' ? 'summary' : 'activity'
        return null
      case 'add-note':
        model.noteWizard = startNoteWizard(account)
        return { type: 'push', view: 'noteWizard' }
      case 'add-event':
        model.eventWizard = startEventWizard(account)
        return { type: 'push', view: 'eventWizard' }
      case 'edit-account':
        model.accountForm = editAccountForm(account)
        return { type: 'push', view: 'accountForm' }
      case 'back':
        return { type: 'pop' }
      case null:
        model.error = unknownChoiceMessage
        return null
    }
  },

  render: (model) => {
    const account = model.detail.account
    if (!account) {
      return [line('warning', 'No account selected.')]
    }
    const timeZone = model.preferences.timeZone
    const lines = [line('title', account.name), ...accountSummaryLines(account, timeZone), blankLine()]

    if (model.detail.pane === 'activity') {
      lines.push(line('subtitle', 'Recent Activity'), ...activityLines(model.detail.activity, timeZone), blankLine())
    }

    lines.push(
      line('subtitle', 'Actions'),
      ...menuLines(
        ['1. View activity', '2. Add note (auto links)', '3. Add event (auto links)', '4. Edit account'],
        '5. Back',
      ),
    )
    return lines
  },
}
