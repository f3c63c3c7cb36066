import { describe, expect, it } from 'vitest'
import { createMemoryPreferences, createMemoryStore, seedAccount } from '../../tests/memoryStore'
import type { NewAccount } from '../components/crmTypes'
import { splashBanner } from '../lib/crmConstants'
import { lineText, screenToText } from '../lib/theme'
import { createSession } from './session'

const now = Date.UTC(2026, 2, 4, 15, 0)

const setup = (seed: NewAccount[] = []) => {
  const memory = createMemoryStore(seed)
  const prefs = createMemoryPreferences()
  const reported: unknown[] = []
  const session = createSession({
    store: memory.store,
    preferences: prefs.preferences,
    now: () => now,
    report: (error) => {
      reported.push(error)
    },
  })
  const run = (...inputs: string[]) => {
    for (const input of inputs) {
      session.submit(input)
    }
  }
  const screen = () => screenToText(session.render()).split('\n')
  return { memory, prefs, reported, session, run, screen }
}

describe('session: main menu', () => {
  it('shows the splash banner until the first submission', () => {
    const { session, run } = setup()
    expect(lineText(session.render()[0] ?? [])).toBe(splashBanner[0])
    run('')
    expect(lineText(session.render()[0] ?? [])).toBe('CRM Desk')
    expect(session.model.error).toBe('')
  })

  it('ignores blank and zero, and reports anything else it cannot resolve', () => {
    const { session, run } = setup()
    run('0')
    expect(session.model.error).toBe('')
    run('zzz')
    expect(session.model.error).toBe('Unknown choice')
    expect(session.view).toBe('mainMenu')
    run('1')
    expect(session.model.error).toBe('')
  })

  it('resolves numbers and keyword prefixes', () => {
    const { session, run } = setup()
    run('dash')
    expect(session.view).toBe('dashboard')
    expect(session.history).toEqual(['mainMenu'])
    run('/', 'set')
    expect(session.view).toBe('settings')
  })

  it('quits through the menu and on interrupt', () => {
    for (const input of ['6', 'q', 'quit', 'exit.']) {
      const { session, run } = setup()
      run(input)
      expect(session.closed).toBe(true)
    }
    const { session } = setup()
    session.handleKey({ type: 'interrupt' })
    expect(session.closed).toBe(true)
  })

  it('treats the back token at the root as a no-op', () => {
    const { session, run } = setup()
    run('/')
    expect(session.view).toBe('mainMenu')
    expect(session.closed).toBe(false)
  })
})

describe('session: input buffer', () => {
  it('drops typed text beyond the prompt limit', () => {
    const { session } = setup()
    session.handleKey({ type: 'text', text: 'x'.repeat(40) })
    expect(session.model.input.value).toHaveLength(32)
    session.handleKey({ type: 'backspace' })
    expect(session.model.input.value).toHaveLength(31)
  })

  it('submits the buffer on enter', () => {
    const { session } = setup()
    session.handleKey({ type: 'text', text: '5' })
    session.handleKey({ type: 'enter' })
    expect(session.view).toBe('settings')
    expect(session.model.input).toEqual({ value: '', placeholder: '1=Name  2=Timezone  3=Back', charLimit: 40 })
  })

  it('shows the placeholder while the buffer is empty', () => {
    const { screen } = setup()
    expect(screen().at(-1)).toBe('> Choose an option')
  })
})

describe('session: note wizard', () => {
  it('saves an unassociated note and returns to the view it started from', () => {
    const { memory, session, run, screen } = setup()
    run('4', '1')
    expect(session.view).toBe('noteWizard')
    run('Follow up')
    expect(session.model.noteWizard.wizard.stage).toBe('associate')
    run('n')

    expect(memory.notes).toHaveLength(1)
    expect(memory.notes[0]).toMatchObject({ content: 'Follow up', accountId: null, creator: 'Test User', createdAt: now })
    expect(session.model.info).toBe('Note saved')
    expect(session.view).toBe('createChoice')
    expect(screen()).toContain('Note saved')
    expect(session.model.noteWizard.wizard).toEqual({ stage: 'content', values: {}, error: '' })
  })

  it('links a note to an account found by exact name', () => {
    const { memory, session, run } = setup([seedAccount('Acme')])
    run('4', '1', 'Call back', 'y', 'acme')
    expect(memory.notes[0]?.accountId).toBe(1)
    expect(session.model.info).toBe('Note saved for Acme')
  })

  it('keeps the account stage open when the name is unknown', () => {
    const { memory, session, run } = setup([seedAccount('Acme')])
    run('4', '1', 'Call back', 'y', 'Acm')
    expect(session.view).toBe('noteWizard')
    expect(session.model.noteWizard.wizard).toMatchObject({ stage: 'account', error: 'Account not found' })
    expect(session.model.input.value).toBe('Acm')
    expect(memory.notes).toHaveLength(0)

    run('')
    expect(memory.notes[0]?.accountId).toBeNull()
    expect(session.model.info).toBe('Note saved')
  })

  it('rejects empty content', () => {
    const { session, run } = setup()
    run('4', '1', '   ')
    expect(session.model.noteWizard.wizard).toMatchObject({ stage: 'content', error: 'Note cannot be empty' })
  })

  it('shows and reports an unexpected storage failure without leaving the wizard', () => {
    const { memory, reported, session, run } = setup()
    memory.failOn('createNote', 'disk full')
    run('4', '1', 'Hello', 'n')
    expect(session.view).toBe('noteWizard')
    expect(session.model.noteWizard.wizard.error).toBe('disk full')
    expect(reported).toHaveLength(1)
  })
})

describe('session: account form', () => {
  it('sends the cursor back to the name on a duplicate and keeps the typed value', () => {
    const { memory, reported, session, run } = setup([seedAccount('Acme')])
    run('3', 'Acme', '', '', '', '')
    expect(session.view).toBe('accountForm')
    expect(session.model.accountForm.wizard).toMatchObject({
      stage: 'name',
      error: 'An account with that name already exists',
    })
    expect(session.model.input.value).toBe('Acme')
    expect(reported).toHaveLength(0)

    run('Acme Corp', '', '', '', '')
    expect(session.model.info).toBe("Account 'Acme Corp' created")
    expect(session.view).toBe('mainMenu')
    expect(memory.accounts.map((account) => account.name)).toEqual(['Acme', 'Acme Corp'])
  })

  it('requires a name', () => {
    const { session, run } = setup()
    run('3', '')
    expect(session.model.accountForm.wizard.error).toBe('This field is required')
  })

  it('pops the view when backing out of the first field', () => {
    const { session, run } = setup()
    run('3', '/')
    expect(session.view).toBe('mainMenu')
    expect(session.history).toEqual([])
  })

  it('restores the previous field value on back', () => {
    const { session, run } = setup()
    run('3', 'Acme', '/')
    expect(session.model.accountForm.wizard.stage).toBe('name')
    expect(session.model.input.value).toBe('Acme')
  })

  it('discards progress on escape', () => {
    const { session, run } = setup()
    run('3', 'Acme')
    session.handleKey({ type: 'escape' })
    expect(session.view).toBe('mainMenu')
    run('3')
    expect(session.model.accountForm.wizard).toEqual({ stage: 'name', values: {}, error: '' })
    expect(session.model.input.value).toBe('')
  })

  it('edits an account from its detail screen', () => {
    const { memory, session, run } = setup([seedAccount('Acme', { phone: '555-0100' })])
    run('2', '1', '4')
    expect(session.view).toBe('accountForm')
    expect(session.model.input.value).toBe('Acme')
    run('Acme Inc')
    expect(session.model.input.value).toBe('555-0100')
    run('555-0199', '', '', '')

    expect(session.model.info).toBe("Account 'Acme Inc' updated")
    expect(session.view).toBe('accountDetail')
    expect(session.model.detail.account).toMatchObject({ name: 'Acme Inc', phone: '555-0199' })
    expect(memory.accounts).toHaveLength(1)
  })

  it('leaves the detail screen on a plain exit or a back prefix', () => {
    const { session, run } = setup([seedAccount('Acme')])
    run('2', '1', 'exit')
    expect(session.view).toBe('accounts')
    expect(session.model.error).toBe('')

    run('1', 'ba')
    expect(session.view).toBe('accounts')
    expect(session.model.error).toBe('')
  })
})

describe('session: event wizard', () => {
  it('keeps a malformed schedule on screen until it is fixed', () => {
    const { memory, session, run } = setup()
    run('4', '2', 'Demo', '', 'soon')
    expect(session.model.eventWizard.wizard).toMatchObject({ stage: 'schedule', error: 'Use format YYYY-MM-DD HH:MM' })
    expect(session.model.input.value).toBe('soon')

    run('', 'n')
    expect(memory.events[0]).toMatchObject({ title: 'Demo', details: '', eventTime: now, accountId: null })
    expect(session.model.info).toBe('Event created')
  })

  it('links a preset account and refreshes the detail feed', () => {
    const { memory, session, run } = setup([seedAccount('Acme')])
    run('2', '1', '3', 'Kickoff', 'Agenda', '2026-03-05 10:00')

    expect(memory.events[0]).toMatchObject({ eventTime: Date.UTC(2026, 2, 5, 10, 0), accountId: 1 })
    expect(session.model.info).toBe('Event created for Acme')
    expect(session.view).toBe('accountDetail')
    expect(session.model.detail.activity.map((entry) => entry.kind)).toEqual(['event', 'account'])
    expect(session.model.detail.activity[0]).toMatchObject({ title: 'Kickoff', detail: 'Agenda' })
  })
})

describe('session: universal escape', () => {
  it('returns to the root from deep inside a flow and resets it', () => {
    const { memory, session, run } = setup([seedAccount('Acme')])
    run('2', '1', '3', 'Kickoff')
    expect(session.history).toEqual(['mainMenu', 'accounts', 'accountDetail'])

    run('EXIT.')
    expect(session.view).toBe('mainMenu')
    expect(session.history).toEqual([])
    expect(session.model.eventWizard).toEqual({ preset: null, wizard: { stage: 'title', values: {}, error: '' } })
    expect(memory.events).toHaveLength(0)
    expect(session.closed).toBe(false)
  })

  it('escapes a stage that is showing an error', () => {
    const { session, run } = setup()
    run('4', '1', '')
    expect(session.model.noteWizard.wizard.error).toBe('Note cannot be empty')
    run('quit')
    expect(session.view).toBe('mainMenu')
  })
})

describe('session: accounts', () => {
  const accounts = [seedAccount('Acme'), seedAccount('Beta Labs'), seedAccount('Acme Corp')]

  it('keeps the filtered list still while an index is typed', () => {
    const { session } = setup(accounts)
    session.submit('2')
    session.handleKey({ type: 'text', text: 'acm' })
    expect(session.model.accounts.filtered.map((account) => account.name)).toEqual(['Acme', 'Acme Corp'])

    session.submit('2')
    expect(session.view).toBe('accountDetail')
    expect(session.model.detail.account?.name).toBe('Acme Corp')
  })

  it('reports a selection that matches nothing', () => {
    const { session, run } = setup(accounts)
    run('2', 'acm')
    expect(session.model.error).toBe('No account matches "acm"')
    expect(session.model.input.value).toBe('acm')

    run('zzz')
    expect(session.model.error).toBe('No account matches "zzz"')
    expect(session.model.accounts.filtered).toEqual([])
  })

  it('opens an account by verb and name', () => {
    const { session, run } = setup(accounts)
    run('2', 'open beta')
    expect(session.model.detail.account?.name).toBe('Beta Labs')
  })

  it('returns to the list from the account detail', () => {
    const { session, run } = setup(accounts)
    run('2', '#1', '5')
    expect(session.view).toBe('accounts')
    run('1', 'zz')
    expect(session.model.error).toBe('Unknown choice')
  })
})

describe('session: dashboard', () => {
  const seedEvents = (store: ReturnType<typeof createMemoryStore>['store']) => {
    const add = (title: string, eventTime: number) =>
      store.createEvent({ title, details: '', eventTime, accountId: null, creator: 'Test User', createdAt: now - 1000 })
    add('Review', Date.UTC(2026, 2, 4, 18, 0))
    add('Breakfast', Date.UTC(2026, 2, 4, 8, 0))
    add('Launch', Date.UTC(2026, 2, 6, 9, 0))
    add('Retro', Date.UTC(2026, 2, 1, 12, 0))
  }

  it('splits events into today, upcoming and recent', () => {
    const { memory, session, run, screen } = setup()
    seedEvents(memory.store)
    run('1')

    const { today, upcoming, past } = session.model.dashboard.buckets
    expect(today.map((event) => event.title)).toEqual(['Breakfast', 'Review'])
    expect(upcoming.map((event) => event.title)).toEqual(['Launch'])
    expect(past.map((event) => event.title)).toEqual(['Retro'])
    expect(screen()).toContain('Wed Mar 04 08:00 - Breakfast • by Test User')
  })

  it('toggles panes and rejects unknown commands', () => {
    const { session, run } = setup()
    run('1', 't')
    expect(session.model.dashboard.pane).toBe('activity')
    run('toggle')
    expect(session.model.dashboard.pane).toBe('events')
    run('x')
    expect(session.model.error).toBe('Unknown dashboard command')
  })

  it('keeps loaded data when a refresh fails', () => {
    const { memory, reported, session, run } = setup()
    seedEvents(memory.store)
    run('1')
    expect(session.model.dashboard.activity).toHaveLength(4)

    memory.failOn('listActivity', 'disk gone')
    run('r')
    expect(session.model.error).toBe('load activity: disk gone')
    expect(session.model.dashboard.activity).toHaveLength(4)
    expect(reported).toHaveLength(1)
  })
})

describe('session: settings', () => {
  it('updates the display name', () => {
    const { prefs, session, run } = setup()
    run('5', '1')
    expect(session.view).toBe('settingsName')
    expect(session.model.input.value).toBe('Test User')

    run('  ')
    expect(session.model.error).toBe('Name cannot be empty')
    run('Dana')
    expect(session.model.info).toBe('Name updated')
    expect(session.view).toBe('settings')
    expect(prefs.preferences.name).toBe('Dana')
  })

  it('validates the time zone before saving it', () => {
    const { prefs, session, run } = setup()
    run('5', '2', '')
    expect(session.model.error).toBe('Timezone cannot be empty')
    run('Mars/Base')
    expect(session.model.error).toBe('Invalid timezone')
    expect(session.model.input.value).toBe('Mars/Base')
    run('America/New_York')
    expect(session.model.info).toBe('Timezone updated')
    expect(prefs.saved).toEqual(['timezone:America/New_York'])
  })

  it('rejects other choices', () => {
    const { session, run } = setup()
    run('5', '9')
    expect(session.model.error).toBe('Choose 1 or 2 to edit settings')
  })
})
