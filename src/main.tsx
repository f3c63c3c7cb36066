import { join } from 'node:path'
import { render } from 'ink'
import { openStore } from '../storage/store'
import App from './App'
import { errorMessage } from './lib/crmHelpers'
import { captureException, flushDiagnostics, initDiagnostics } from './lib/diagnostics'
import { databaseFileName, loadPreferences, resolveDataDir } from './lib/preferences'

const main = async () => {
  initDiagnostics({ dsn: process.env.CRMDESK_SENTRY_DSN, environment: process.env.NODE_ENV })

  const dataDir = resolveDataDir()
  const preferences = loadPreferences(dataDir)
  const store = await openStore(join(dataDir, databaseFileName))

  const app = render(<App store={store} preferences={preferences} report={captureException} />, {
    exitOnCtrlC: false,
  })

  try {
    await app.waitUntilExit()
  } finally {
    store.close()
    await flushDiagnostics()
  }
}

void main().catch(async (error: unknown) => {
  captureException(error)
  await flushDiagnostics()
  process.stderr.write(`crmdesk: ${errorMessage(error)}\n`)
  process.exitCode = 1
})
