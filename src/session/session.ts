import type { ViewId } from '../components/crmTypes'
import { isBackToken, isExitToken } from '../lib/crmHelpers'
import { blankLine, line, segment } from '../lib/theme'
import type { ScreenLine } from '../lib/theme'
import { newAccountForm } from './accountForm'
import { startEventWizard } from './eventWizard'
import { showFailure } from './feedback'
import { createNavigation, popView, pushView, resetToRoot } from './navigation'
import { startNoteWizard } from './noteWizard'
import type { InputState, Navigate, SessionDeps, SessionKey, SessionModel, ViewHandler } from './sessionTypes'
import { viewHandlers } from './views'

export type Session = {
  readonly view: ViewId
  readonly history: readonly ViewId[]
  /** True once the user has quit; later keys are ignored. */
  readonly closed: boolean
  readonly model: SessionModel
  handleKey: (key: SessionKey) => void
  /** Types `text` into the buffer and accepts it. */
  submit: (text: string) => void
  render: () => ScreenLine[]
}

const clip = (value: string, limit: number) => Array.from(value).slice(0, limit).join('')

const printable = (text: string) => text.replace(/[\u0000-\u001f\u007f]/g, '')

export const createSessionModel = (deps: SessionDeps): SessionModel => ({
  store: deps.store,
  preferences: deps.preferences,
  now: deps.now ?? Date.now,
  report: deps.report ?? (() => undefined),
  input: { value: '', placeholder: '', charLimit: 0 },
  info: '',
  error: '',
  splash: true,
  dashboard: { pane: 'events', buckets: { today: [], upcoming: [], past: [] }, activity: [] },
  accounts: { all: [], filtered: [], term: '' },
  detail: { account: null, pane: 'summary', activity: [] },
  accountForm: newAccountForm(),
  noteWizard: startNoteWizard(),
  eventWizard: startEventWizard(),
  settingsDraft: '',
})

export const promptLine = (input: InputState): ScreenLine => [
  segment('accent', '> '),
  input.value.length > 0 ? segment('plain', input.value) : segment('faint', input.placeholder),
]

export const createSession = (deps: SessionDeps, handlers: Record<ViewId, ViewHandler> = viewHandlers): Session => {
  const model = createSessionModel(deps)
  let nav = createNavigation<ViewId>('mainMenu')
  let closed = false

  const active = () => handlers[nav.active]

  const syncInput = () => {
    const prompt = active().prompt(model)
    model.input = {
      value: clip(prompt.value ?? '', prompt.charLimit),
      placeholder: prompt.placeholder,
      charLimit: prompt.charLimit,
    }
  }

  const activate = () => {
    active().enter?.(model)
    syncInput()
  }

  const resetFlows = () => {
    model.accountForm = newAccountForm()
    model.noteWizard = startNoteWizard()
    model.eventWizard = startEventWizard()
    model.accounts.term = ''
  }

  const navigate = (next: Navigate) => {
    switch (next.type) {
      case 'push':
        nav = pushView(nav, next.view)
        break
      case 'pop':
        nav = popView(nav)
        break
      case 'root':
        resetFlows()
        nav = resetToRoot(nav)
        break
      case 'quit':
        closed = true
        return
    }
    activate()
  }

  const submit = (text: string) => {
    if (closed) return
    model.info = ''
    model.error = ''
    model.splash = false

    // The root menu reads the exit token itself.
    if (nav.active !== nav.root && isExitToken(text)) {
      navigate({ type: 'root' })
      return
    }

    const handler = active()
    let next: Navigate | null
    try {
      if (isBackToken(text)) {
        next = handler.back ? handler.back(model, text) : { type: 'pop' }
      } else {
        next = handler.submit(model, text)
      }
    } catch (error) {
      showFailure(model, error)
      next = null
    }

    if (next) {
      navigate(next)
    } else {
      syncInput()
    }
  }

  const updateInput = (value: string) => {
    if (value === model.input.value) return
    model.input = { ...model.input, value }
    active().inputChanged?.(model)
  }

  const handleKey = (key: SessionKey) => {
    if (closed) return
    switch (key.type) {
      case 'interrupt':
        closed = true
        return
      case 'enter':
        submit(model.input.value)
        return
      case 'escape':
        if (nav.active === nav.root) return
        active().discard?.(model)
        model.info = ''
        model.error = ''
        navigate({ type: 'pop' })
        return
      case 'text':
        updateInput(clip(model.input.value + printable(key.text), model.input.charLimit))
        return
      case 'backspace':
        updateInput(Array.from(model.input.value).slice(0, -1).join(''))
        return
    }
  }

  const render = () => {
    const lines = [...active().render(model)]
    if (model.info) {
      lines.push(blankLine(), line('success', model.info))
    }
    if (model.error) {
      lines.push(blankLine(), line('danger', model.error))
    }
    lines.push(blankLine(), line('border', '─'.repeat(40)), promptLine(model.input))
    return lines
  }

  activate()

  return {
    get view() {
      return nav.active
    },
    get history() {
      return nav.history
    },
    get closed() {
      return closed
    },
    model,
    handleKey,
    submit: (text: string) => {
      updateInput(clip(text, model.input.charLimit))
      submit(model.input.value)
    },
    render,
  }
}
