import type { ViewId } from '../../components/crmTypes'
import type { ViewHandler } from '../sessionTypes'
import { accountDetailView } from './accountDetail'
import { accountFormView } from './accountFormView'
import { accountsView } from './accounts'
import { createChoiceView } from './createChoice'
import { dashboardView } from './dashboard'
import { eventWizardView } from './eventWizardView'
import { mainMenuView } from './mainMenu'
import { noteWizardView } from './noteWizardView'
import { settingsNameView, settingsTimezoneView, settingsView } from './settings'

export const viewHandlers: Record<ViewId, ViewHandler> = {
  mainMenu: mainMenuView,
  dashboard: dashboardView,
  accounts: accountsView,
  accountDetail: accountDetailView,
  accountForm: accountFormView,
  createChoice: createChoiceView,
  noteWizard: noteWizardView,
  eventWizard: eventWizardView,
  settings: settingsView,
  settingsName: settingsNameView,
  settingsTimezone: settingsTimezoneView,
}
