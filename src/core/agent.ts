import {ModelTransportError, isModelError, type ModelError} from '../providers/errors.js'
import type {LLMProvider} from '../providers/types.js'
import {executeTool, isExecutorName, stringArg, type ToolArgs, type ToolResult} from '../tools/index.js'
import {parseAction, type Action} from './action-parser.js'
import {ConversationHistory} from './history.js'
import {buildSystemPrompt} from './prompt.js'

export type AgentEvent =
  | {type: 'start'; provider: string; model: string; cwd: string}
  | {type: 'model_request_start'; step: number; messageCount: number}
  | {type: 'model_response'; step: number; content: string}
  | {type: 'tool_call'; step: number; tool: string; args: ToolArgs}
  | {type: 'tool_result'; step: number; tool: string; ok: boolean; output: string}
  | {type: 'ask_user'; step: number; question: string}
  | {type: 'final'; step: number; content: string}
  | {type: 'model_error'; step: number; kind: ModelError['kind']; message: string; status?: number}
  | {type: 'session_end'; provider: string; model: string; messageCount: number}

export type TurnOutcome =
  | {kind: 'final_answer'; text: string}
  | {kind: 'ask_user'; question: string}
  | {kind: 'plain'; text: string}
  | {kind: 'error'; error: ModelError}

export type ChatSession = {
  readonly provider: LLMProvider
  readonly history: ConversationHistory
  readonly cwd: string
}

export type AgentEventListener = (event: AgentEvent) => void

export type AgentRunOptions = {
  onEvent?: AgentEventListener
}

export type ChatSessionOptions = AgentRunOptions & {
  cwd?: string
  systemPrompt?: string
}

export const MISSING_TOOL_NAME = '(missing)'

export function createChatSession(provider: LLMProvider, options: ChatSessionOptions = {}): ChatSession {
  const cwd = options.cwd ?? process.cwd()
  const history = new ConversationHistory(options.systemPrompt ?? buildSystemPrompt(cwd))
  options.onEvent?.({type: 'start', provider: provider.name, model: provider.model, cwd})
  return {provider, history, cwd}
}

export function closeChatSession(session: ChatSession, options: AgentRunOptions = {}): void {
  options.onEvent?.({
    type: 'session_end',
    provider: session.provider.name,
    model: session.provider.model,
    messageCount: session.history.length
  })
}

async function dispatchTool(action: Action, session: ChatSession): Promise<ToolResult> {
  if (!isExecutorName(action.tool)) {
    return {ok: false, output: `Unknown tool: ${action.tool ?? MISSING_TOOL_NAME}`}
  }

  return executeTool(action.tool, action.args, session.cwd)
}

/**
 * Runs one human turn: the user message is appended, then the model is queried
 * repeatedly, with every tool result folded back into the history, until it
 * answers, asks a question, replies with plain text, or a request fails.
 */
export async function runAgentTurn(
  session: ChatSession,
  userMessage: string,
  options: AgentRunOptions = {}
): Promise<TurnOutcome> {
  const {onEvent} = options
  const {history, provider} = session
  history.appendUser(userMessage)

  for (let step = 0; ; step += 1) {
    onEvent?.({type: 'model_request_start', step, messageCount: history.length})

    let reply: string
    try {
      reply = await provider.chat(history.messages())
    } catch (error) {
      if (!isModelError(error)) throw error
      onEvent?.({
        type: 'model_error',
        step,
        kind: error.kind,
        message: error.message,
        status: error instanceof ModelTransportError ? error.status : undefined
      })
      return {kind: 'error', error}
    }

    onEvent?.({type: 'model_response', step, content: reply})
    history.appendAssistant(reply)

    const action = parseAction(reply)
    if (!action) {
      onEvent?.({type: 'final', step, content: reply})
      return {kind: 'plain', text: reply}
    }

    if (action.tool === 'ask_user') {
      const question = stringArg(action.args, 'question') ?? ''
      onEvent?.({type: 'ask_user', step, question})
      return {kind: 'ask_user', question}
    }

    if (action.tool === 'final_answer') {
      const text = stringArg(action.args, 'text') ?? ''
      onEvent?.({type: 'final', step, content: text})
      return {kind: 'final_answer', text}
    }

    const tool = action.tool ?? MISSING_TOOL_NAME
    onEvent?.({type: 'tool_call', step, tool, args: action.args})
    const result = await dispatchTool(action, session)
    onEvent?.({type: 'tool_result', step, tool, ok: result.ok, output: result.output})
    history.appendToolResult(result.output)
  }
}
