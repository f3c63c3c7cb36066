import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs'
import { homedir } from 'node:os'
import { join } from 'node:path'
import { z } from 'zod'
import type { PreferenceStore } from '../components/crmTypes'
import { errorMessage } from './crmHelpers'
import { hostTimeZone, isValidTimeZone, normalizeTimeZone } from './timezone'

export class PreferenceError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'PreferenceError'
  }
}

export const configFileName = 'config.json'
export const databaseFileName = 'crmdesk.db'

const preferencesSchema = z.object({
  name: z.string().optional(),
  timezone: z.string().optional(),
})

export type PreferenceFile = {
  name: string
  timezone: string
}

type Environment = Record<string, string | undefined>

export type FilePreferenceStore = PreferenceStore & {
  readonly path: string
}

export const resolveDataDir = (env: Environment = process.env) => {
  const home = env.CRMDESK_HOME?.trim()
  if (home) return home
  const xdg = env.XDG_CONFIG_HOME?.trim()
  if (xdg) return join(xdg, 'crmdesk')
  return join(homedir(), '.config', 'crmdesk')
}

export const defaultPreferences = (env: Environment = process.env, timeZone = hostTimeZone()): PreferenceFile => ({
  name: env.USER?.trim() || env.USERNAME?.trim() || 'CRM User',
  timezone: timeZone,
})

const writePreferences = (path: string, preferences: PreferenceFile) => {
  try {
    writeFileSync(path, `${JSON.stringify(preferences, null, 2)}\n`, 'utf8')
  } catch (error) {
    throw new PreferenceError(`write ${path}: ${errorMessage(error)}`, { cause: error })
  }
}

const readPreferences = (path: string, defaults: PreferenceFile): PreferenceFile => {
  let raw: unknown
  try {
    raw = JSON.parse(readFileSync(path, 'utf8'))
  } catch (error) {
    throw new PreferenceError(`read ${path}: ${errorMessage(error)}`, { cause: error })
  }
  const parsed = preferencesSchema.safeParse(raw)
  if (!parsed.success) {
    const issue = parsed.error.issues[0]
    const where = issue && issue.path.length > 0 ? `${issue.path.join('.')}: ` : ''
    throw new PreferenceError(`invalid ${path}: ${where}${issue?.message ?? 'unexpected shape'}`)
  }
  return {
    name: parsed.data.name?.trim() || defaults.name,
    timezone: parsed.data.timezone?.trim() || defaults.timezone,
  }
}

/**
 * Opens `config.json` under `dataDir`, creating the directory and a default file on first run.
 * The time zone always reads as a loadable zone; a stored value that no longer loads reads as UTC.
 */
export const loadPreferences = (dataDir: string, env: Environment = process.env): FilePreferenceStore => {
  try {
    mkdirSync(dataDir, { recursive: true })
  } catch (error) {
    throw new PreferenceError(`create ${dataDir}: ${errorMessage(error)}`, { cause: error })
  }

  const path = join(dataDir, configFileName)
  const defaults = defaultPreferences(env)
  const exists = existsSync(path)
  let current = exists ? readPreferences(path, defaults) : defaults
  if (!exists) {
    writePreferences(path, current)
  }

  const save = (next: PreferenceFile) => {
    writePreferences(path, next)
    current = next
  }

  return {
    path,
    get name() {
      return current.name
    },
    get timeZone() {
      return normalizeTimeZone(current.timezone)
    },
    saveName: (name) => {
      const trimmed = name.trim()
      if (!trimmed) {
        throw new PreferenceError('Name cannot be empty')
      }
      save({ ...current, name: trimmed })
    },
    saveTimeZone: (timeZone) => {
      if (!isValidTimeZone(timeZone)) {
        throw new PreferenceError('Invalid timezone')
      }
      save({ ...current, timezone: normalizeTimeZone(timeZone) })
    },
  }
}
