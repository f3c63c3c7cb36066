import type { Account, AccountDraft } from '../components/crmTypes'
import { createWizardState, linearTransitions, stageValue } from './wizard'
import type { WizardDefinition, WizardState } from './wizard'

export type AccountFormStage = keyof AccountDraft

export const accountFormOrder: readonly AccountFormStage[] = ['name', 'phone', 'address', 'email', 'decisionMaker']

export const requiredFieldMessage = 'This field is required'

export const accountFormWizard: WizardDefinition<AccountFormStage> = {
  initial: 'name',
  order: accountFormOrder,
  stages: {
    name: { label: 'Account name', placeholder: 'Account name', charLimit: 96, requiredMessage: requiredFieldMessage },
    phone: { label: 'Phone', placeholder: 'Phone', charLimit: 96 },
    address: { label: 'Address', placeholder: 'Address', charLimit: 96 },
    email: { label: 'Email', placeholder: 'Email', charLimit: 96 },
    decisionMaker: { label: 'Decision maker', placeholder: 'Decision maker', charLimit: 96 },
  },
  transitions: linearTransitions(accountFormOrder),
}

export type AccountFormState = {
  /** The record being edited; null while creating. */
  original: Account | null
  wizard: WizardState<AccountFormStage>
}

export const newAccountForm = (): AccountFormState => ({
  original: null,
  wizard: createWizardState(accountFormWizard),
})

export const editAccountForm = (account: Account): AccountFormState => ({
  original: account,
  wizard: createWizardState(accountFormWizard, {
    name: account.name,
    phone: account.phone,
    address: account.address,
    email: account.email,
    decisionMaker: account.decisionMaker,
  }),
})

export const accountDraft = (state: AccountFormState): AccountDraft => ({
  name: stageValue(state.wizard, 'name').trim(),
  phone: stageValue(state.wizard, 'phone').trim(),
  address: stageValue(state.wizard, 'address').trim(),
  email: stageValue(state.wizard, 'email').trim(),
  decisionMaker: stageValue(state.wizard, 'decisionMaker').trim(),
})
