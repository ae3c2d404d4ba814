import {Command, Flags} from '@oclif/core'
import {loadEnvFiles} from '../config/load-config.js'
import {resolveSettingsPath} from '../config/paths.js'
import {startChat} from '../cli/chat-runner.js'
import {runRepl} from '../cli/repl.js'
import {createTerminalIO} from '../cli/terminal-io.js'

export default class Start extends Command {
  static override description = 'Open the interactive prompt (/help, /settings, /models, /chat, /exit)'

  static override flags = {
    quiet: Flags.boolean({description: 'hide tool progress during chats'}),
    verboseModel: Flags.boolean({description: 'show raw model replies during chats'}),
    debug: Flags.boolean({description: 'show timing debug info during chats'})
  }

  public async run(): Promise<void> {
    const {flags} = await this.parse(Start)
    const settingsPath = resolveSettingsPath()
    loadEnvFiles(settingsPath)

    const io = createTerminalIO((line) => this.log(line))
    try {
      await runRepl({
        io,
        settingsPath,
        chat: (target) => startChat(target, io, flags)
      })
    } finally {
      io.close()
    }
  }
}
