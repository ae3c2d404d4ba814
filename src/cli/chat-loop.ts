import {runAgentTurn, type AgentRunOptions, type ChatSession, type TurnOutcome} from '../core/agent.js'
import {cyan, magenta, red} from '../ui/ansi.js'
import {renderMarkdown} from '../ui/markdown.js'

export type ChatIO = {
  /** Resolves with undefined once input is closed. */
  readLine(prompt: string): Promise<string | undefined>
  write(line: string): void
}

export const EXIT_COMMANDS = ['/exit', '/back']

export function renderOutcome(outcome: TurnOutcome): string[] {
  switch (outcome.kind) {
    case 'final_answer':
    case 'plain':
      return [cyan('assistant>'), renderMarkdown(outcome.text)]
    case 'ask_user':
      return [magenta('agent asks>'), outcome.question]
    case 'error':
      if (outcome.error.kind === 'response') {
        return [red(`Could not read the model response: ${outcome.error.message}`), `response: ${outcome.error.rawText}`]
      }
      return [red(`Request failed: ${outcome.error.message}`)]
  }
}

/**
 * Reads user lines and runs one agent turn per line until `/exit`, `/back`
 * or end of input. Returns the number of turns run.
 */
export async function runChatLoop(session: ChatSession, io: ChatIO, options: AgentRunOptions = {}): Promise<number> {
  let turns = 0
  while (true) {
    const line = await io.readLine(cyan('you> '))
    if (line === undefined) return turns

    const input = line.trim()
    if (!input) continue
    if (EXIT_COMMANDS.includes(input.toLowerCase())) return turns

    const outcome = await runAgentTurn(session, input, options)
    turns += 1
    for (const rendered of renderOutcome(outcome)) io.write(rendered)
  }
}
