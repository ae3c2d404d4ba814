import {DEFAULT_MODEL, type Settings} from './schema.js'

export type SettingsCommandResult = {
  settings: Settings
  changed: boolean
  ok: boolean
  lines: string[]
}

export function maskApiKey(key: string): string {
  if (!key) return '(not set)'
  if (key.length <= 7) return key
  return `${key.slice(0, 4)}...${key.slice(-3)}`
}

export function formatSettings(settings: Settings): string[] {
  const lines = [`default provider: ${settings.default_provider}`]
  for (const [name, entry] of Object.entries(settings.providers)) {
    lines.push(`[${name}]`)
    lines.push(`  api key: ${maskApiKey(entry.api_key)}`)
    lines.push(`  model:   ${entry.model || '(not set)'}`)
  }

  return lines
}

function failure(settings: Settings, message: string): SettingsCommandResult {
  return {settings, changed: false, ok: false, lines: [message]}
}

function updateProvider(
  settings: Settings,
  provider: string,
  field: 'api_key' | 'model',
  value: string
): Settings {
  const current = settings.providers[provider] ?? {api_key: '', model: DEFAULT_MODEL}
  return {
    ...settings,
    providers: {...settings.providers, [provider]: {...current, [field]: value}}
  }
}

/**
 * Applies `show` / `set provider|api_key|model ...` to a settings document.
 * The caller persists `settings` when `changed` is true.
 */
export function applySettingsCommand(settings: Settings, args: string[]): SettingsCommandResult {
  const [action, rawKey, ...rest] = args
  if (!action || action === 'show') {
    return {settings, changed: false, ok: true, lines: formatSettings(settings)}
  }

  if (action !== 'set') {
    return failure(settings, `unknown settings action '${action}'. usage: settings [show|set ...]`)
  }

  const key = rawKey?.toLowerCase()
  const known = Object.keys(settings.providers)

  switch (key) {
    case 'provider': {
      const provider = rest[0]?.toLowerCase()
      if (!provider) return failure(settings, 'usage: settings set provider <name>')
      if (!known.includes(provider)) {
        return failure(settings, `provider '${provider}' not found. available: ${known.join(', ')}`)
      }

      return {
        settings: {...settings, default_provider: provider},
        changed: true,
        ok: true,
        lines: [`default provider set to '${provider}'`]
      }
    }

    case 'api_key': {
      const provider = rest[0]?.toLowerCase()
      const value = rest[1]
      if (!provider || !value) return failure(settings, 'usage: settings set api_key <provider> <key>')
      if (!known.includes(provider)) return failure(settings, `provider '${provider}' not found.`)
      return {
        settings: updateProvider(settings, provider, 'api_key', value),
        changed: true,
        ok: true,
        lines: [`api key for '${provider}' saved`]
      }
    }

    case 'model': {
      const provider = rest[0]?.toLowerCase()
      const value = rest.slice(1).join(' ')
      if (!provider || !value) return failure(settings, 'usage: settings set model <provider> <model>')
      if (!known.includes(provider)) return failure(settings, `provider '${provider}' not found.`)
      return {
        settings: updateProvider(settings, provider, 'model', value),
        changed: true,
        ok: true,
        lines: [`default model for '${provider}' set to '${value}'`]
      }
    }

    default:
      return failure(settings, `unknown setting '${rawKey ?? ''}'. expected provider, api_key or model`)
  }
}
