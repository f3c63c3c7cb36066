export type StoreErrorCode = 'account_exists' | 'not_found' | 'failure'

/**
 * The only error the store throws. `account_exists` marks a duplicate account name on create or
 * update, `not_found` a lookup that matched no row; anything else is `failure`.
 */
export class StoreError extends Error {
  readonly code: StoreErrorCode
  readonly op: string

  constructor(code: StoreErrorCode, op: string, message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'StoreError'
    this.code = code
    this.op = op
  }
}

export const duplicateAccountMessage = 'An account with that name already exists'

export const isStoreError = (error: unknown, code?: StoreErrorCode): error is StoreError =>
  error instanceof StoreError && (code === undefined || error.code === code)

/** Wraps a driver error, keeping StoreErrors that are already classified. */
export const toStoreError = (op: string, error: unknown) => {
  if (error instanceof StoreError) {
    return error
  }
  const message = error instanceof Error ? error.message : String(error)
  return new StoreError('failure', op, `${op}: ${message}`, { cause: error })
}
