export type AccountId = number

export type ViewId =
  | 'mainMenu'
  | 'dashboard'
  | 'accounts'
  | 'accountDetail'
  | 'accountForm'
  | 'createChoice'
  | 'noteWizard'
  | 'eventWizard'
  | 'settings'
  | 'settingsName'
  | 'settingsTimezone'

export type ActivityKind = 'account' | 'note' | 'event'
export type DashboardPane = 'events' | 'activity'
export type AccountDetailPane = 'summary' | 'activity'

export type Account = {
  id: AccountId
  name: string
  phone: string
  address: string
  email: string
  decisionMaker: string
  creator: string
  createdAt: number
}

export type AccountDraft = {
  name: string
  phone: string
  address: string
  email: string
  decisionMaker: string
}

export type NewAccount = AccountDraft & {
  creator: string
  createdAt: number
}

export type Note = {
  id: number
  content: string
  accountId: AccountId | null
  accountName: string | null
  creator: string
  createdAt: number
}

export type NewNote = {
  content: string
  accountId: AccountId | null
  creator: string
  createdAt: number
}

export type ScheduledEvent = {
  id: number
  title: string
  details: string
  eventTime: number
  accountId: AccountId | null
  accountName: string | null
  creator: string
  createdAt: number
}

export type NewScheduledEvent = {
  title: string
  details: string
  eventTime: number
  accountId: AccountId | null
  creator: string
  createdAt: number
}

export type Activity = {
  id: number
  kind: ActivityKind
  title: string
  detail: string
  createdAt: number
}

export type MenuOption<TId extends string = string> = {
  id: TId
  keywords: string[]
  synonyms: string[]
}

export type EventBuckets = {
  today: ScheduledEvent[]
  upcoming: ScheduledEvent[]
  past: ScheduledEvent[]
}

/**
 * Storage contract consumed by the session. Every call is synchronous; failures are thrown
 * as `StoreError` with `account_exists` for duplicate names and `not_found` for missing rows.
 */
export type CrmStore = {
  /** All accounts, case-insensitive name order. */
  listAccounts: () => Account[]
  /** Case-insensitive substring match on name; a blank term lists everything. */
  searchAccounts: (term: string) => Account[]
  accountByName: (name: string) => Account
  accountById: (id: AccountId) => Account
  createAccount: (account: NewAccount) => Account
  updateAccount: (account: Account) => Account
  /** Every event, ascending by event time, with the linked account name. */
  listEvents: () => ScheduledEvent[]
  /** Newest first, at most `limit` entries. */
  listActivity: (limit: number) => Activity[]
  listAccountActivity: (accountId: AccountId, limit: number) => Activity[]
  createNote: (note: NewNote) => Note
  createEvent: (event: NewScheduledEvent) => ScheduledEvent
}

export type PreferenceStore = {
  readonly name: string
  /** Always a loadable IANA zone. */
  readonly timeZone: string
  saveName: (name: string) => void
  saveTimeZone: (timeZone: string) => void
}
