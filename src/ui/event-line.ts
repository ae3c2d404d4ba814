import type {AgentEvent} from '../core/agent.js'
import type {ToolArgs} from '../tools/types.js'
import {shorten} from './ansi.js'

const MAX_ARG_LINES = 5

function now(): string {
  return new Date().toISOString()
}

/** Renders tool arguments as `key='value'`, keeping the first few lines of long values. */
export function formatToolArgs(args: ToolArgs): string {
  return Object.entries(args)
    .map(([key, value]) => {
      const text = typeof value === 'string' ? value : JSON.stringify(value)
      const lines = text.split('\n')
      const clipped = lines.length > MAX_ARG_LINES ? `${lines.slice(0, MAX_ARG_LINES).join('\n')}\n...` : text
      return `${key}='${clipped}'`
    })
    .join(', ')
}

export function formatEventLine(event: AgentEvent, timestamp: string = now()): string {
  switch (event.type) {
    case 'start':
      return `[${timestamp}] START provider=${event.provider} model=${event.model} cwd=${event.cwd}`
    case 'model_request_start':
      return `[${timestamp}] MODEL_REQUEST_START step=${event.step} messages=${event.messageCount}`
    case 'model_response':
      return `[${timestamp}] MODEL_RESPONSE step=${event.step}\n${shorten(event.content)}`
    case 'tool_call':
      return `[${timestamp}] TOOL_CALL step=${event.step} → ${event.tool}(${formatToolArgs(event.args)})`
    case 'tool_result':
      return `[${timestamp}] TOOL_RESULT step=${event.step} tool=${event.tool} ok=${event.ok}\n${shorten(event.output)}`
    case 'ask_user':
      return `[${timestamp}] ASK_USER step=${event.step}`
    case 'final':
      return `[${timestamp}] FINAL step=${event.step}`
    case 'model_error':
      return `[${timestamp}] MODEL_ERROR step=${event.step} kind=${event.kind} status=${event.status ?? '-'}`
    case 'session_end':
      return `[${timestamp}] SESSION_END provider=${event.provider} model=${event.model} messages=${event.messageCount}`
  }
}
