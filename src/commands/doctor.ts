import {Command, Flags} from '@oclif/core'
import {existsSync} from 'node:fs'
import process from 'node:process'
import {applyEnvOverrides, listEnvOverrides, loadEnvFiles, loadSettings} from '../config/load-config.js'
import {getGlobalEnvPath, resolveSettingsPath} from '../config/paths.js'
import {maskApiKey} from '../config/settings-commands.js'

type DoctorReport = {
  cliVersion: string
  nodeVersion: string
  platform: string
  cwd: string
  settingsPath: string
  settingsExists: boolean
  globalEnvPath: string
  globalEnvExists: boolean
  defaultProvider: string
  providers: Record<string, {apiKey: string; model: string}>
  envOverrides: string[]
}

export default class Doctor extends Command {
  static override description = 'Print runtime diagnostics for settings and environment'

  static override flags = {
    json: Flags.boolean({description: 'print JSON output'})
  }

  public async run(): Promise<void> {
    const {flags} = await this.parse(Doctor)
    const settingsPath = resolveSettingsPath()
    loadEnvFiles(settingsPath)
    const stored = await loadSettings(settingsPath)
    const effective = applyEnvOverrides(stored)

    const report: DoctorReport = {
      cliVersion: this.config.pjson.version,
      nodeVersion: process.version,
      platform: `${process.platform}-${process.arch}`,
      cwd: process.cwd(),
      settingsPath,
      settingsExists: existsSync(settingsPath),
      globalEnvPath: getGlobalEnvPath(settingsPath),
      globalEnvExists: existsSync(getGlobalEnvPath(settingsPath)),
      defaultProvider: effective.default_provider,
      providers: Object.fromEntries(
        Object.entries(effective.providers).map(([name, entry]) => [
          name,
          {apiKey: maskApiKey(entry.api_key), model: entry.model}
        ])
      ),
      envOverrides: listEnvOverrides(stored)
    }

    if (flags.json) {
      this.log(JSON.stringify(report, null, 2))
      return
    }

    this.log(`shellpal version: ${report.cliVersion}`)
    this.log(`node: ${report.nodeVersion}`)
    this.log(`platform: ${report.platform}`)
    this.log(`cwd: ${report.cwd}`)
    this.log(`settings: ${report.settingsPath} (exists=${report.settingsExists})`)
    this.log(`global env: ${report.globalEnvPath} (exists=${report.globalEnvExists})`)
    this.log(`default provider: ${report.defaultProvider}`)
    for (const [name, entry] of Object.entries(report.providers)) {
      this.log(`  ${name}: api_key=${entry.apiKey} model=${entry.model}`)
    }
    this.log(`env overrides: ${report.envOverrides.length > 0 ? report.envOverrides.join(', ') : '(none)'}`)
  }
}
