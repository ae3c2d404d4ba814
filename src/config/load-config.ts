import {cosmiconfig} from 'cosmiconfig'
import dotenv from 'dotenv'
import {mkdir, writeFile} from 'node:fs/promises'
import {
  PROVIDER_NAMES,
  defaultProviderSettings,
  defaultSettings,
  settingsSchema,
  type ProviderSettings,
  type Settings
} from './schema.js'
import {getGlobalEnvPath, getSettingsDir} from './paths.js'

function nonEmpty(value?: string): string | undefined {
  if (!value) return undefined
  const trimmed = value.trim()
  return trimmed.length > 0 ? trimmed : undefined
}

export function loadEnvFiles(settingsPath: string): void {
  dotenv.config({path: getGlobalEnvPath(settingsPath)})
  dotenv.config()
}

function backfill(settings: Settings): Settings {
  const providers: Record<string, ProviderSettings> = {...settings.providers}
  for (const name of PROVIDER_NAMES) {
    providers[name] ??= defaultProviderSettings()
  }

  return {...settings, providers}
}

/**
 * Reads the settings file. A missing, unreadable or malformed file yields the
 * defaults; providers absent from the file are filled in with empty entries.
 */
export async function loadSettings(settingsPath: string): Promise<Settings> {
  const explorer = cosmiconfig('shellpal', {cache: false})
  let raw: unknown
  try {
    const result = await explorer.load(settingsPath)
    raw = result?.config
  } catch {
    return defaultSettings()
  }

  const parsed = settingsSchema.safeParse(raw)
  if (!parsed.success) return defaultSettings()
  return backfill(parsed.data)
}

export async function saveSettings(settingsPath: string, settings: Settings): Promise<void> {
  await mkdir(getSettingsDir(settingsPath), {recursive: true})
  await writeFile(settingsPath, JSON.stringify(settings, null, 2) + '\n', 'utf8')
}

function envKey(provider: string, suffix: string): string {
  return `SHELLPAL_${provider.toUpperCase()}_${suffix}`
}

/** Runtime-only overrides; the result is never written back to disk. */
export function applyEnvOverrides(settings: Settings, env: NodeJS.ProcessEnv = process.env): Settings {
  const providers: Record<string, ProviderSettings> = {}
  for (const [name, entry] of Object.entries(settings.providers)) {
    providers[name] = {
      api_key: nonEmpty(env[envKey(name, 'API_KEY')]) ?? entry.api_key,
      model: nonEmpty(env[envKey(name, 'MODEL')]) ?? entry.model
    }
  }

  const requested = nonEmpty(env.SHELLPAL_PROVIDER)?.toLowerCase()
  const defaultProvider = requested && requested in providers ? requested : settings.default_provider

  return {default_provider: defaultProvider, providers}
}

export function listEnvOverrides(settings: Settings, env: NodeJS.ProcessEnv = process.env): string[] {
  const names = ['SHELLPAL_PROVIDER']
  for (const provider of Object.keys(settings.providers)) {
    names.push(envKey(provider, 'API_KEY'), envKey(provider, 'MODEL'))
  }

  return names.filter((name) => nonEmpty(env[name]) !== undefined)
}
