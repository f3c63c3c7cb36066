import type {
  Account,
  AccountDetailPane,
  Activity,
  CrmStore,
  DashboardPane,
  EventBuckets,
  PreferenceStore,
  ViewId,
} from '../components/crmTypes'
import type { ScreenLine } from '../lib/theme'
import type { AccountFormState } from './accountForm'
import type { EventWizardState } from './eventWizard'
import type { NoteWizardState } from './noteWizard'

export type SessionKey =
  | { type: 'text'; text: string }
  | { type: 'backspace' }
  | { type: 'enter' }
  | { type: 'escape' }
  | { type: 'interrupt' }

export type InputState = {
  value: string
  placeholder: string
  charLimit: number
}

export type PromptSpec = {
  placeholder: string
  charLimit: number
  /** Text the buffer is refilled with; blank when omitted. */
  value?: string
}

export type Navigate = { type: 'push'; view: ViewId } | { type: 'pop' } | { type: 'root' } | { type: 'quit' }

export type SessionDeps = {
  store: CrmStore
  preferences: PreferenceStore
  now?: () => number
  /** Receives collaborator failures that are not an expected duplicate or not-found signal. */
  report?: (error: unknown) => void
}

export type SessionModel = {
  store: CrmStore
  preferences: PreferenceStore
  now: () => number
  report: (error: unknown) => void
  input: InputState
  info: string
  error: string
  splash: boolean
  dashboard: {
    pane: DashboardPane
    buckets: EventBuckets
    activity: Activity[]
  }
  accounts: {
    all: Account[]
    filtered: Account[]
    /** The last search term typed; selection commands never replace it. */
    term: string
  }
  detail: {
    account: Account | null
    pane: AccountDetailPane
    activity: Activity[]
  }
  accountForm: AccountFormState
  noteWizard: NoteWizardState
  eventWizard: EventWizardState
  settingsDraft: string
}

/**
 * One screen's behaviour. The session owns navigation and the input buffer; a handler reads and
 * updates the model and answers each submission with where to go next, or null to stay.
 */
export type ViewHandler = {
  prompt: (model: SessionModel) => PromptSpec
  /** Runs every time the view becomes active, including on return from a child view. */
  enter?: (model: SessionModel) => void
  submit: (model: SessionModel, text: string) => Navigate | null
  /** Replaces the plain pop for the back token. */
  back?: (model: SessionModel, text: string) => Navigate | null
  /** Throws away in-progress state when the view is left without finishing. */
  discard?: (model: SessionModel) => void
  inputChanged?: (model: SessionModel) => void
  render: (model: SessionModel) => ScreenLine[]
}
