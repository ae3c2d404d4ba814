import {Args, Command, Flags} from '@oclif/core'
import {applyEnvOverrides, loadEnvFiles, loadSettings} from '../config/load-config.js'
import {resolveSettingsPath} from '../config/paths.js'
import {startChat} from '../cli/chat-runner.js'
import {resolveChatTarget} from '../cli/runtime.js'
import {createTerminalIO} from '../cli/terminal-io.js'

export default class Chat extends Command {
  static override description = 'Chat with the tool-using agent'

  static override args = {
    model: Args.string({description: 'model to use instead of the saved default'})
  }

  static override flags = {
    quiet: Flags.boolean({description: 'hide tool progress and show only assistant replies'}),
    verboseModel: Flags.boolean({description: 'show raw model replies for each step'}),
    debug: Flags.boolean({description: 'show timing debug info'})
  }

  public async run(): Promise<void> {
    const {args, flags} = await this.parse(Chat)
    const settingsPath = resolveSettingsPath()
    loadEnvFiles(settingsPath)
    const settings = applyEnvOverrides(await loadSettings(settingsPath))

    const resolved = resolveChatTarget(settings, args.model)
    if (!resolved.ok) return this.error(resolved.message, {exit: 1})

    const io = createTerminalIO((line) => this.log(line))
    try {
      await startChat(resolved.target, io, flags)
    } finally {
      io.close()
    }
  }
}
