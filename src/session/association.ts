import type { Account, CrmStore } from '../components/crmTypes'
import { isStoreError } from '../../storage/storeErrors'
import type { WizardStageSpec } from './wizard'

export const associateStage: WizardStageSpec = {
  label: 'Associate with an account? (y/n)',
  placeholder: 'y/n',
  charLimit: 5,
  kind: 'confirm',
}

export const accountNameStage: WizardStageSpec = {
  label: 'Enter account name (blank to skip)',
  placeholder: 'Account name',
  charLimit: 96,
}

export const accountNotFoundMessage = 'Account not found'

export type Association =
  | { type: 'unlinked' }
  | { type: 'linked'; account: Account }
  | { type: 'missing' }

/**
 * Decides which account a finished note or event belongs to. A preset account always wins; a
 * save that came from the account-name stage looks the name up exactly (case-insensitive), and
 * any other save is unlinked.
 */
export const resolveAssociation = (
  store: CrmStore,
  preset: Account | null,
  savedFrom: string,
  accountName: string,
): Association => {
  if (preset) {
    return { type: 'linked', account: preset }
  }
  const name = accountName.trim()
  if (savedFrom !== 'account' || name.length === 0) {
    return { type: 'unlinked' }
  }
  try {
    return { type: 'linked', account: store.accountByName(name) }
  } catch (error) {
    if (isStoreError(error, 'not_found')) {
      return { type: 'missing' }
    }
    throw error
  }
}

export const linkedSuffix = (association: Association) =>
  association.type === 'linked' ? ` for ${association.account.name}` : ''
