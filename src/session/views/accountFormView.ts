import { duplicateAccountMessage, isStoreError } from '../../../storage/storeErrors'
import { accountDraft, accountFormWizard, newAccountForm } from '../accountForm'
import { failureMessage } from '../feedback'
import type { Navigate, SessionModel, ViewHandler } from '../sessionTypes'
import { advanceWizard, rejectAt } from '../wizard'
import { wizardLines, wizardPrompt } from './screenParts'

const saveAccount = (model: SessionModel): Navigate | null => {
  const form = model.accountForm
  const draft = accountDraft(form)
  try {
    const saved = form.original
      ? model.store.updateAccount({ ...form.original, ...draft })
      : model.store.createAccount({ ...draft, creator: model.preferences.name, createdAt: model.now() })
    model.info = `Account '${saved.name}' ${form.original ? 'updated' : 'created'}`
    model.accountForm = newAccountForm()
    return { type: 'pop' }
  } catch (error) {
    if (isStoreError(error, 'account_exists')) {
      model.accountForm = { ...form, wizard: rejectAt(form.wizard, 'name', duplicateAccountMessage) }
    } else {
      model.accountForm = { ...form, wizard: { ...form.wizard, error: failureMessage(model, error) } }
    }
    return null
  }
}

const step = (model: SessionModel, text: string): Navigate | null => {
  const result = advanceWizard(accountFormWizard, model.accountForm.wizard, text)
  model.accountForm = { ...model.accountForm, wizard: result.state }
  switch (result.type) {
    case 'stay':
    case 'moved':
      return null
    case 'cancel':
      model.accountForm = newAccountForm()
      return { type: 'pop' }
    case 'save':
      return saveAccount(model)
  }
}

export const accountFormView: ViewHandler = {
  prompt: (model) => wizardPrompt(accountFormWizard, model.accountForm.wizard),

  submit: step,
  back: step,

  discard: (model) => {
    model.accountForm = newAccountForm()
  },

  render: (model) =>
    wizardLines({
      title: model.accountForm.original ? 'Edit Account' : 'Add Account',
      definition: accountFormWizard,
      state: model.accountForm.wizard,
    }),
}
