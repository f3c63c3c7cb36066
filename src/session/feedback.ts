import { isStoreError } from '../../storage/storeErrors'
import { errorMessage, withContext } from '../lib/crmHelpers'
import type { SessionModel } from './sessionTypes'

const isExpected = (error: unknown) => isStoreError(error, 'account_exists') || isStoreError(error, 'not_found')

export const failureMessage = (model: SessionModel, error: unknown, context?: string) => {
  if (!isExpected(error)) {
    model.report(error)
  }
  return context ? withContext(context, error) : errorMessage(error)
}

/** Shows a failure on the current screen, after any failure already shown this turn. */
export const showFailure = (model: SessionModel, error: unknown, context?: string) => {
  const message = failureMessage(model, error, context)
  model.error = model.error ? `${model.error}; ${message}` : message
}

/** Runs a load, leaving the previously loaded data in place when it fails. */
export const loadInto = <T>(model: SessionModel, context: string, load: () => T, apply: (value: T) => void) => {
  try {
    apply(load())
  } catch (error) {
    showFailure(model, error, context)
  }
}
