import ora from 'ora'
import {closeChatSession, createChatSession, type AgentEvent, type AgentEventListener} from '../core/agent.js'
import {createProvider} from '../providers/registry.js'
import type {LLMProvider} from '../providers/types.js'
import {cyan, green, magenta, red} from '../ui/ansi.js'
import {formatEventLine} from '../ui/event-line.js'
import {runChatLoop, type ChatIO} from './chat-loop.js'
import type {ChatTarget} from './runtime.js'

export type ChatDisplayOptions = {
  quiet?: boolean
  verboseModel?: boolean
  debug?: boolean
}

/** Transient "working" indicator shown while a request or a tool runs. */
export type StatusIndicator = {
  start(text: string): void
  stop(): void
}

export type TerminalListenerOptions = ChatDisplayOptions & {
  status?: StatusIndicator
}

export type StartChatOptions = ChatDisplayOptions & {
  cwd?: string
  provider?: LLMProvider
  status?: StatusIndicator
}

export function createSpinnerStatus(): StatusIndicator {
  // readline owns stdin; the spinner must not pause or drain it.
  const spinner = ora({discardStdin: false})
  return {
    start(text) {
      spinner.start(text)
    },
    stop() {
      if (spinner.isSpinning) spinner.stop()
    }
  }
}

function colorFor(event: AgentEvent): (text: string) => string {
  switch (event.type) {
    case 'tool_call':
      return magenta
    case 'tool_result':
      return event.ok ? green : red
    case 'model_error':
      return red
    default:
      return (text) => text
  }
}

function isShown(event: AgentEvent, options: ChatDisplayOptions): boolean {
  if (options.quiet) return false
  switch (event.type) {
    case 'final':
    case 'ask_user':
      return false
    case 'model_response':
      return options.verboseModel === true
    case 'model_request_start':
      return options.debug === true
    default:
      return true
  }
}

/** Progress lines for the terminal; ask/final outcomes are rendered by the chat loop itself. */
export function createTerminalListener(
  log: (line: string) => void,
  options: TerminalListenerOptions = {}
): AgentEventListener {
  const {status} = options
  const startedAt = Date.now()
  let lastEventAt = startedAt

  return (event) => {
    if (event.type !== 'model_request_start') status?.stop()

    if (isShown(event, options)) {
      const base = colorFor(event)(formatEventLine(event))
      if (options.debug) {
        const nowAt = Date.now()
        log(`[debug +${nowAt - lastEventAt}ms total=${nowAt - startedAt}ms] ${base}`)
        lastEventAt = nowAt
      } else {
        log(base)
      }
    }

    if (event.type === 'model_request_start') status?.start('thinking...')
    if (event.type === 'tool_call') status?.start(`running ${event.tool}...`)
  }
}

export async function startChat(target: ChatTarget, io: ChatIO, options: StartChatOptions = {}): Promise<void> {
  const status = options.status ?? createSpinnerStatus()
  const onEvent = createTerminalListener((line) => io.write(line), {...options, status})
  const provider = options.provider ?? createProvider(target.provider, {apiKey: target.apiKey, model: target.model})

  io.write(cyan(`chat with ${target.model} (provider: ${target.provider}). type /back or /exit to leave.`))
  const session = createChatSession(provider, {onEvent, cwd: options.cwd})
  try {
    await runChatLoop(session, io, {onEvent})
  } finally {
    status.stop()
    closeChatSession(session, {onEvent})
  }
}
