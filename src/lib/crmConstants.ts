import type { MenuOption } from '../components/crmTypes'

export type MainMenuAction = 'dashboard' | 'accounts' | 'add-account' | 'create' | 'settings' | 'quit'
export type AccountDetailAction = 'activity' | 'add-note' | 'add-event' | 'edit-account' | 'back'
export type CreateChoiceAction = 'note' | 'event' | 'back'
export type SettingsAction = 'name' | 'timezone' | 'back'
export type DashboardCommand = 'toggle' | 'refresh'

export const appTitle = 'CRM Desk'
export const appTagline = 'A lightning-fast terminal CRM'

export const splashBanner = [
  '  ___ ___ __  __   ___         _   ',
  ' / __| _ \\  \\/  | |   \\ ___ __| |__',
  '| (__|   / |\\/| | | |) / -_|_-< / /',
  ' \\___|_|_\\_|  |_| |___/\\___/__/_\\_\\',
]

export const exitTokens = ['exit.', 'quit']
export const backTokens = ['/', 'back']

export const mainMenuOptions: MenuOption<MainMenuAction>[] = [
  {
    id: 'dashboard',
    keywords: ['dashboard'],
    synonyms: ['1', 'd', 'dash', 'dashboard'],
  },
  {
    id: 'accounts',
    keywords: ['accounts'],
    synonyms: ['2', 'accounts', 'account', 'view', 'view accounts'],
  },
  {
    id: 'add-account',
    keywords: ['add', 'new'],
    synonyms: ['3', 'add', 'add account', 'new account'],
  },
  {
    id: 'create',
    keywords: ['create', 'note', 'event'],
    synonyms: ['4', 'create', 'note', 'event', 'create note', 'create event'],
  },
  {
    id: 'settings',
    keywords: ['settings', 'help'],
    synonyms: ['5', 'settings', 'help', 'settings & help'],
  },
  {
    id: 'quit',
    keywords: ['quit', 'exit'],
    synonyms: ['6', 'quit', 'exit', 'exit.', 'q'],
  },
]

export const mainMenuLabels = [
  '1. Dashboard',
  '2. View accounts',
  '3. Add account',
  '4. Create note/event',
  '5. Settings & Help',
  '6. Quit',
]

// '/', 'back' and 'exit.' never reach this table; the session reads them first.
export const accountDetailOptions: MenuOption<AccountDetailAction>[] = [
  {
    id: 'activity',
    keywords: ['activity', 'timeline'],
    synonyms: ['1', 'activity', 'view', 'timeline'],
  },
  {
    id: 'add-note',
    keywords: ['note'],
    synonyms: ['2', 'note', 'add note', 'create note'],
  },
  {
    id: 'add-event',
    keywords: ['event'],
    synonyms: ['3', 'event', 'add event', 'create event'],
  },
  {
    id: 'edit-account',
    keywords: ['edit', 'update'],
    synonyms: ['4', 'edit', 'update'],
  },
  {
    id: 'back',
    keywords: ['back', 'close'],
    synonyms: ['5', 'close', 'exit'],
  },
]

export const createChoiceOptions: MenuOption<CreateChoiceAction>[] = [
  { id: 'note', keywords: ['note'], synonyms: ['1', 'n', 'note'] },
  { id: 'event', keywords: ['event'], synonyms: ['2', 'e', 'event'] },
  { id: 'back', keywords: [], synonyms: ['3'] },
]

export const settingsOptions: MenuOption<SettingsAction>[] = [
  { id: 'name', keywords: ['name'], synonyms: ['1', 'name'] },
  { id: 'timezone', keywords: ['timezone', 'zone'], synonyms: ['2', 'timezone', 'tz'] },
  { id: 'back', keywords: [], synonyms: ['3'] },
]

export const dashboardCommands: MenuOption<DashboardCommand>[] = [
  { id: 'toggle', keywords: ['toggle'], synonyms: ['t', 'toggle'] },
  { id: 'refresh', keywords: ['refresh'], synonyms: ['r', 'refresh'] },
]

export const prompts = {
  mainMenu: { placeholder: 'Choose an option', charLimit: 32 },
  dashboard: { placeholder: 'Command (t=toggle, r=refresh, /, exit.)', charLimit: 48 },
  accounts: { placeholder: 'Type to search, / to go back', charLimit: 64 },
  accountDetail: { placeholder: '1=Activity  2=Add note  3=Add event  4=Edit  5=Back', charLimit: 64 },
  createChoice: { placeholder: '1=Note  2=Event  3=Back', charLimit: 32 },
  settings: { placeholder: '1=Name  2=Timezone  3=Back', charLimit: 40 },
  settingsName: { placeholder: 'Display name', charLimit: 64 },
  settingsTimezone: { placeholder: 'e.g. America/New_York', charLimit: 64 },
} as const

export const activityFeedLimit = 50
export const activityDetailLength = 80
export const upcomingEventsShown = 5
export const pastEventsShown = 3

export const scheduleInputFormat = 'yyyy-MM-dd HH:mm'
export const listDateFormat = 'MMM dd yyyy HH:mm'
export const feedDateFormat = 'MMM dd HH:mm'
export const eventDateFormat = 'EEE MMM dd HH:mm'
