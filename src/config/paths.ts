import {homedir} from 'node:os'
import {dirname, resolve} from 'node:path'

export type SettingsPathOptions = {
  platform?: NodeJS.Platform
  env?: NodeJS.ProcessEnv
  homeDir?: string
}

function nonEmpty(value?: string): string | undefined {
  const trimmed = value?.trim()
  return trimmed ? trimmed : undefined
}

export function resolveSettingsPath(options: SettingsPathOptions = {}): string {
  const platform = options.platform ?? process.platform
  const env = options.env ?? process.env
  const home = options.homeDir ?? homedir()

  const custom = nonEmpty(env.SHELLPAL_HOME)
  if (custom) return resolve(custom, 'config.json')

  switch (platform) {
    case 'win32':
      return resolve(nonEmpty(env.APPDATA) ?? resolve(home, 'AppData', 'Roaming'), 'shellpal', 'config.json')
    case 'darwin':
      return resolve(home, 'Library', 'Application Support', 'shellpal', 'config.json')
    default:
      return resolve(nonEmpty(env.XDG_CONFIG_HOME) ?? resolve(home, '.config'), 'shellpal', 'config.json')
  }
}

export function getSettingsDir(settingsPath: string): string {
  return dirname(settingsPath)
}

export function getGlobalEnvPath(settingsPath: string): string {
  return resolve(getSettingsDir(settingsPath), '.env')
}
