import { isBackToken } from '../lib/crmHelpers'

export const WIZARD_SAVE = '@save'
export const WIZARD_CANCEL = '@cancel'

export type WizardExit = typeof WIZARD_SAVE | typeof WIZARD_CANCEL

/**
 * What a submission meant. `submit` is any accepted value on a text stage; confirm stages
 * produce `affirm` (y/yes) or `decline` (n/no/blank).
 */
export type WizardOutcome = 'submit' | 'affirm' | 'decline' | 'back'

export const wizardOutcomes: readonly WizardOutcome[] = ['submit', 'affirm', 'decline', 'back']

export type WizardTarget<S extends string> = S | WizardExit

export type WizardTransitionRow<S extends string> = Partial<Record<WizardOutcome, WizardTarget<S>>>

export type WizardTransitions<S extends string> = Partial<Record<S, WizardTransitionRow<S>>>

export type WizardStageSpec = {
  label: string
  placeholder: string
  charLimit: number
  kind?: 'text' | 'confirm'
  /** Error shown when the value is blank; optional stages leave this out. */
  requiredMessage?: string
  validate?: (value: string) => string | null
}

export type WizardDefinition<S extends string> = {
  initial: S
  /** Display order; also the order `n/m` progress is counted in. */
  order: readonly S[]
  stages: Record<S, WizardStageSpec>
  transitions: WizardTransitions<S>
}

export type WizardState<S extends string> = {
  stage: S
  values: Partial<Record<S, string>>
  error: string
}

export type WizardStep<S extends string> =
  | { type: 'stay'; state: WizardState<S> }
  | { type: 'moved'; state: WizardState<S> }
  | { type: 'save'; state: WizardState<S>; from: S }
  | { type: 'cancel'; state: WizardState<S> }

export const confirmAnswerMessage = 'Please answer y or n'

export const createWizardState = <S extends string>(
  definition: WizardDefinition<S>,
  values: Partial<Record<S, string>> = {},
): WizardState<S> => ({
  stage: definition.initial,
  values: { ...values },
  error: '',
})

/** Builds a straight-line table: every stage submits forward and backs up one step. */
export const linearTransitions = <S extends string>(order: readonly S[]): WizardTransitions<S> => {
  const table: WizardTransitions<S> = {}
  order.forEach((stage, index) => {
    table[stage] = {
      submit: order[index + 1] ?? WIZARD_SAVE,
      back: order[index - 1] ?? WIZARD_CANCEL,
    }
  })
  return table
}

const withValue = <S extends string>(values: Partial<Record<S, string>>, stage: S, value: string) => {
  const next: Partial<Record<S, string>> = { ...values }
  next[stage] = value
  return next
}

const classifyConfirm = (value: string): WizardOutcome | null => {
  const answer = value.trim().toLowerCase()
  if (answer === 'y' || answer === 'yes') return 'affirm'
  if (answer === 'n' || answer === 'no' || answer === '') return 'decline'
  return null
}

export const stageValue = <S extends string>(state: WizardState<S>, stage: S = state.stage) =>
  state.values[stage] ?? ''

export const stageIndex = <S extends string>(definition: WizardDefinition<S>, stage: S) =>
  definition.order.indexOf(stage)

export const transitionTarget = <S extends string>(
  definition: WizardDefinition<S>,
  stage: S,
  outcome: WizardOutcome,
): WizardTarget<S> | undefined => definition.transitions[stage]?.[outcome]

const moveTo = <S extends string>(
  state: WizardState<S>,
  target: WizardTarget<S>,
  from: S,
): WizardStep<S> => {
  if (target === WIZARD_SAVE) {
    return { type: 'save', state: { ...state, error: '' }, from }
  }
  if (target === WIZARD_CANCEL) {
    return { type: 'cancel', state: { ...state, error: '' } }
  }
  return { type: 'moved', state: { ...state, stage: target, error: '' } }
}

/**
 * Runs one submission through the stage machine: back token, then validation, then the
 * transition table. The exit token is handled by the session before this is reached.
 */
export const advanceWizard = <S extends string>(
  definition: WizardDefinition<S>,
  state: WizardState<S>,
  input: string,
): WizardStep<S> => {
  const stage = state.stage
  const stageSpec = definition.stages[stage]
  const value = input.trim()

  if (isBackToken(value)) {
    return moveTo(state, transitionTarget(definition, stage, 'back') ?? WIZARD_CANCEL, stage)
  }

  let outcome: WizardOutcome = 'submit'
  let stored = value

  if (stageSpec.kind === 'confirm') {
    const answer = classifyConfirm(value)
    if (!answer) {
      return { type: 'stay', state: { ...state, error: confirmAnswerMessage } }
    }
    outcome = answer
    stored = answer === 'affirm' ? 'y' : 'n'
  } else {
    if (stageSpec.requiredMessage && value.length === 0) {
      return { type: 'stay', state: { ...state, error: stageSpec.requiredMessage } }
    }
    const problem = stageSpec.validate?.(value) ?? null
    if (problem) {
      return { type: 'stay', state: { ...state, values: withValue(state.values, stage, value), error: problem } }
    }
  }

  const target = transitionTarget(definition, stage, outcome)
  if (target === undefined) {
    throw new Error(`Wizard stage "${stage}" has no transition for "${outcome}".`)
  }
  return moveTo({ ...state, values: withValue(state.values, stage, stored) }, target, stage)
}

/** Puts the wizard back on `stage` with an error, keeping every captured value. */
export const rejectAt = <S extends string>(state: WizardState<S>, stage: S, error: string): WizardState<S> => ({
  ...state,
  stage,
  error,
})
