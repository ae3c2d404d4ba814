import {applyEnvOverrides, loadSettings, saveSettings} from '../config/load-config.js'
import {isProviderName, type Settings} from '../config/schema.js'
import {applySettingsCommand} from '../config/settings-commands.js'
import {errorMessage, isModelError} from '../providers/errors.js'
import {listModels} from '../providers/registry.js'
import type {ModelInfo} from '../providers/types.js'
import {cyan, red} from '../ui/ansi.js'
import type {ChatIO} from './chat-loop.js'
import {formatModels} from './models.js'
import {resolveChatTarget, type ChatTarget} from './runtime.js'

export type ReplOptions = {
  io: ChatIO
  settingsPath: string
  env?: NodeJS.ProcessEnv
  chat(target: ChatTarget): Promise<void>
  fetchModels?(provider: string, apiKey: string): Promise<ModelInfo[]>
}

const HELP_LINES = [
  'commands:',
  '  /help                                 show this help',
  '  /models                               list models of the current provider',
  '  /chat [model]                         chat with the agent (default model when omitted)',
  '  /settings show                        show current settings',
  '  /settings set provider <name>         set the default provider (base, openrouter, gemini)',
  '  /settings set api_key <provider> <key>',
  '  /settings set model <provider> <model>',
  '  /exit                                 quit'
]

async function defaultFetchModels(provider: string, apiKey: string): Promise<ModelInfo[]> {
  if (!isProviderName(provider)) throw new Error(`provider '${provider}' is not supported`)
  return listModels(provider, apiKey)
}

async function showModels(options: ReplOptions, settings: Settings): Promise<void> {
  const {io} = options
  const effective = applyEnvOverrides(settings, options.env)
  const provider = effective.default_provider
  const apiKey = effective.providers[provider]?.api_key ?? ''
  try {
    const models = await (options.fetchModels ?? defaultFetchModels)(provider, apiKey)
    for (const line of formatModels(provider, models)) io.write(line)
  } catch (error) {
    io.write(red(`could not fetch models: ${errorMessage(error)}`))
    if (isModelError(error) && error.kind === 'response') io.write(`response: ${error.rawText}`)
  }
}

/**
 * Top-level slash-command prompt. Settings are saved back on start so that a
 * fresh install gets a settings file with every provider present.
 */
export async function runRepl(options: ReplOptions): Promise<void> {
  const {io, settingsPath} = options
  let settings = await loadSettings(settingsPath)
  await saveSettings(settingsPath, settings)

  io.write(cyan('type /help for the list of commands.'))
  const startup = applyEnvOverrides(settings, options.env)
  if (!startup.providers[startup.default_provider]?.api_key) {
    io.write(
      red(`no api key for provider '${startup.default_provider}'. set one with /settings set api_key ${startup.default_provider} <key>`)
    )
  }

  while (true) {
    const line = await options.io.readLine(cyan('>>> '))
    if (line === undefined) return

    const [rawCommand, ...args] = line.trim().split(/\s+/)
    const command = rawCommand?.toLowerCase()
    if (!command) continue

    try {
      switch (command) {
        case '/help':
          for (const help of HELP_LINES) io.write(help)
          break

        case '/settings': {
          const result = applySettingsCommand(settings, args)
          if (result.changed) {
            settings = result.settings
            await saveSettings(settingsPath, settings)
          }

          for (const out of result.lines) io.write(result.ok ? out : red(out))
          break
        }

        case '/models':
          await showModels(options, settings)
          break

        case '/chat': {
          const resolved = resolveChatTarget(applyEnvOverrides(settings, options.env), args[0])
          if (!resolved.ok) {
            io.write(red(resolved.message))
            break
          }

          await options.chat(resolved.target)
          break
        }

        case '/exit':
          io.write(cyan('bye!'))
          return

        default:
          io.write(red(`unknown command '${command}'. type /help for the list of commands.`))
      }
    } catch (error) {
      io.write(red(`unexpected error: ${errorMessage(error)}`))
    }
  }
}
