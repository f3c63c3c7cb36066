import * as Sentry from '@sentry/node'

let initialized = false

export const initDiagnostics = (args: { dsn?: string; environment?: string }) => {
  if (initialized) return
  if (!args.dsn) return

  Sentry.init({
    dsn: args.dsn,
    environment: args.environment,
    sendDefaultPii: false,
    tracesSampleRate: 0,
    beforeSend(event) {
      // Record content stays on this machine.
      return {
        ...event,
        request: undefined,
        user: undefined,
        breadcrumbs: undefined,
        contexts: undefined,
        extra: undefined,
      }
    },
  })

  initialized = true
}

export const captureException = (error: unknown) => {
  if (!initialized) return
  Sentry.captureException(error)
}

/** Waits for queued reports to send; a no-op when diagnostics are off. */
export const flushDiagnostics = async (timeoutMs = 2000) => {
  if (!initialized) return
  await Sentry.flush(timeoutMs)
}
