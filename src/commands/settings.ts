import {Command} from '@oclif/core'
import {loadSettings, saveSettings} from '../config/load-config.js'
import {resolveSettingsPath} from '../config/paths.js'
import {applySettingsCommand} from '../config/settings-commands.js'

export default class Settings extends Command {
  static override description = 'Show or change saved settings: show | set provider <name> | set api_key <provider> <key> | set model <provider> <model>'

  static override strict = false

  public async run(): Promise<void> {
    const {argv} = await this.parse(Settings)
    const words = argv.filter((value): value is string => typeof value === 'string')
    const settingsPath = resolveSettingsPath()

    const result = applySettingsCommand(await loadSettings(settingsPath), words)
    if (result.changed) await saveSettings(settingsPath, result.settings)
    if (!result.ok) this.error(result.lines.join('\n'), {exit: 1})
    for (const line of result.lines) this.log(line)
  }
}
