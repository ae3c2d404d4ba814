import {Command} from '@oclif/core'
import {applyEnvOverrides, loadEnvFiles, loadSettings} from '../config/load-config.js'
import {resolveSettingsPath} from '../config/paths.js'
import {isProviderName} from '../config/schema.js'
import {formatModels} from '../cli/models.js'
import {listModels} from '../providers/registry.js'

export default class Models extends Command {
  static override description = 'List models offered by the default provider'

  public async run(): Promise<void> {
    const settingsPath = resolveSettingsPath()
    loadEnvFiles(settingsPath)
    const settings = applyEnvOverrides(await loadSettings(settingsPath))
    const provider = settings.default_provider
    if (!isProviderName(provider)) return this.error(`provider '${provider}' is not supported`, {exit: 1})

    const models = await listModels(provider, settings.providers[provider]?.api_key ?? '')
    for (const line of formatModels(provider, models)) this.log(line)
  }
}
