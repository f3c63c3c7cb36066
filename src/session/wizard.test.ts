import { describe, expect, it } from 'vitest'
import { accountFormWizard, requiredFieldMessage } from './accountForm'
import { eventWizard, presetEventWizard, scheduleFormatMessage } from './eventWizard'
import { noteWizard, presetNoteWizard } from './noteWizard'
import {
  WIZARD_CANCEL,
  WIZARD_SAVE,
  advanceWizard,
  confirmAnswerMessage,
  createWizardState,
  linearTransitions,
  rejectAt,
  stageValue,
  wizardOutcomes,
} from './wizard'
import type { WizardDefinition, WizardOutcome } from './wizard'

const sampleValues: Record<string, string> = {
  schedule: '2026-03-04 09:30',
}

const inputFor = (stage: string, outcome: WizardOutcome) => {
  if (outcome === 'back') return '/'
  if (outcome === 'affirm') return 'y'
  if (outcome === 'decline') return 'n'
  return sampleValues[stage] ?? 'Sample value'
}

const checkTransitions = <S extends string>(definition: WizardDefinition<S>) => {
  const exits: string[] = [WIZARD_SAVE, WIZARD_CANCEL]
  let checked = 0

  for (const stage of definition.order) {
    const row = definition.transitions[stage]
    expect(row, `stage ${stage}`).toBeDefined()
    expect(row?.back, `back from ${stage}`).toBeDefined()
    if (definition.stages[stage].kind === 'confirm') {
      expect(row?.affirm).toBeDefined()
      expect(row?.decline).toBeDefined()
    } else {
      expect(row?.submit).toBeDefined()
    }

    for (const outcome of wizardOutcomes) {
      const target = row?.[outcome]
      if (target === undefined) continue
      expect([...definition.order, ...exits]).toContain(target)

      const state = { ...createWizardState(definition), stage }
      const step = advanceWizard(definition, state, inputFor(stage, outcome))
      if (target === WIZARD_SAVE) {
        expect(step).toMatchObject({ type: 'save', from: stage })
      } else if (target === WIZARD_CANCEL) {
        expect(step.type).toBe('cancel')
      } else {
        expect(step).toMatchObject({ type: 'moved', state: { stage: target, error: '' } })
      }
      checked += 1
    }
  }

  return checked
}

describe('wizard transition tables', () => {
  it('drives every account form transition', () => {
    expect(checkTransitions(accountFormWizard)).toBe(10)
  })

  it('drives every note wizard transition', () => {
    expect(checkTransitions(noteWizard)).toBe(7)
    expect(checkTransitions(presetNoteWizard)).toBe(2)
  })

  it('drives every event wizard transition', () => {
    expect(checkTransitions(eventWizard)).toBe(11)
    expect(checkTransitions(presetEventWizard)).toBe(6)
  })

  it('builds straight-line tables', () => {
    expect(linearTransitions(['a', 'b', 'c'])).toEqual({
      a: { submit: 'b', back: WIZARD_CANCEL },
      b: { submit: 'c', back: 'a' },
      c: { submit: WIZARD_SAVE, back: 'b' },
    })
  })
})

describe('advanceWizard', () => {
  it('rejects a blank required stage and stays put', () => {
    const state = createWizardState(accountFormWizard)
    for (const input of ['', '   ']) {
      expect(advanceWizard(accountFormWizard, state, input)).toEqual({
        type: 'stay',
        state: { stage: 'name', values: {}, error: requiredFieldMessage },
      })
    }
  })

  it('accepts a blank optional stage', () => {
    const state = { ...createWizardState(accountFormWizard, { name: 'Acme' }), stage: 'phone' as const }
    const step = advanceWizard(accountFormWizard, state, '')
    expect(step).toEqual({
      type: 'moved',
      state: { stage: 'address', values: { name: 'Acme', phone: '' }, error: '' },
    })
  })

  it('trims submitted values', () => {
    const step = advanceWizard(accountFormWizard, createWizardState(accountFormWizard), '  Acme  ')
    expect(step.state.values.name).toBe('Acme')
  })

  it('re-prompts a confirm stage until it gets y or n', () => {
    const state = { ...createWizardState(noteWizard, { content: 'Follow up' }), stage: 'associate' as const }
    const unclear = advanceWizard(noteWizard, state, 'maybe')
    expect(unclear).toEqual({ type: 'stay', state: { ...state, error: confirmAnswerMessage } })

    const again = advanceWizard(noteWizard, unclear.state, 'later')
    expect(again.state.error).toBe(confirmAnswerMessage)

    const yes = advanceWizard(noteWizard, again.state, 'YES')
    expect(yes).toEqual({
      type: 'moved',
      state: { stage: 'account', values: { content: 'Follow up', associate: 'y' }, error: '' },
    })
  })

  it('treats no and blank as declining', () => {
    const state = { ...createWizardState(noteWizard, { content: 'Follow up' }), stage: 'associate' as const }
    for (const input of ['n', 'No', '']) {
      const step = advanceWizard(noteWizard, state, input)
      expect(step).toMatchObject({ type: 'save', from: 'associate' })
      expect(step.state.values.associate).toBe('n')
    }
  })

  it('keeps an invalid value on the stage with the validator error', () => {
    const state = { ...createWizardState(eventWizard, { title: 'Demo' }), stage: 'schedule' as const }
    const step = advanceWizard(eventWizard, state, 'tomorrow')
    expect(step).toEqual({
      type: 'stay',
      state: { stage: 'schedule', values: { title: 'Demo', schedule: 'tomorrow' }, error: scheduleFormatMessage },
    })

    const fixed = advanceWizard(eventWizard, step.state, '2026-03-04 09:30')
    expect(fixed).toMatchObject({ type: 'moved', state: { stage: 'associate', error: '' } })
  })

  it('honours the back token before validation', () => {
    const state = { ...createWizardState(eventWizard), stage: 'schedule' as const, error: scheduleFormatMessage }
    const step = advanceWizard(eventWizard, state, ' BACK ')
    expect(step).toMatchObject({ type: 'moved', state: { stage: 'details', error: '' } })
  })

  it('cancels when backing out of the first stage', () => {
    const step = advanceWizard(noteWizard, createWizardState(noteWizard), '/')
    expect(step.type).toBe('cancel')
  })

  it('round-trips forward, back and forward again', () => {
    const first = advanceWizard(noteWizard, createWizardState(noteWizard), 'Follow up')
    const back = advanceWizard(noteWizard, first.state, '/')
    expect(back.state.stage).toBe('content')
    expect(stageValue(back.state)).toBe('Follow up')

    const again = advanceWizard(noteWizard, back.state, stageValue(back.state))
    expect(again).toEqual(first)
  })

  it('restores each earlier value when backing through the account form', () => {
    let state = createWizardState(accountFormWizard)
    for (const value of ['Acme', '555-0100', '1 Main St']) {
      state = advanceWizard(accountFormWizard, state, value).state
    }
    expect(state.stage).toBe('email')

    state = advanceWizard(accountFormWizard, state, '/').state
    expect(stageValue(state)).toBe('1 Main St')
    state = advanceWizard(accountFormWizard, state, 'back').state
    expect(stageValue(state)).toBe('555-0100')
    state = advanceWizard(accountFormWizard, state, '/').state
    expect(state.stage).toBe('name')
    expect(stageValue(state)).toBe('Acme')
  })

  it('throws when a stage has no transition for the outcome', () => {
    const broken: WizardDefinition<'only'> = {
      initial: 'only',
      order: ['only'],
      stages: { only: { label: 'Only', placeholder: '', charLimit: 10 } },
      transitions: { only: { back: WIZARD_CANCEL } },
    }
    expect(() => advanceWizard(broken, createWizardState(broken), 'value')).toThrow(
      'Wizard stage "only" has no transition for "submit".',
    )
  })
})

describe('rejectAt', () => {
  it('moves the cursor and keeps every value', () => {
    const state = createWizardState(accountFormWizard, { name: 'Acme', phone: '555-0100' })
    const rejected = rejectAt({ ...state, stage: 'decisionMaker' }, 'name', 'Taken')
    expect(rejected).toEqual({ stage: 'name', values: { name: 'Acme', phone: '555-0100' }, error: 'Taken' })
  })
})
