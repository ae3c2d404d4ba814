import type {ChatMessage, ChatRole} from '../providers/types.js'

export const TOOL_RESULT_PREFIX = 'TOOL_RESULT: '

/**
 * Append-only conversation log replayed to the model on every request.
 * Index 0 is always the single system message.
 */
export class ConversationHistory {
  private readonly entries: ChatMessage[]

  constructor(systemPrompt: string) {
    const system: ChatMessage = {role: 'system', content: systemPrompt}
    this.entries = [Object.freeze(system)]
  }

  get length(): number {
    return this.entries.length
  }

  get last(): ChatMessage {
    return this.entries[this.entries.length - 1]
  }

  appendUser(content: string): void {
    this.push('user', content)
  }

  appendAssistant(content: string): void {
    if (this.last.role !== 'user') {
      throw new Error('An assistant message must follow a user message.')
    }
    this.push('assistant', content)
  }

  appendToolResult(output: string): void {
    if (this.last.role !== 'assistant') {
      throw new Error('A tool result must follow an assistant message.')
    }
    this.push('user', `${TOOL_RESULT_PREFIX}${output}`)
  }

  messages(): readonly ChatMessage[] {
    return [...this.entries]
  }

  private push(role: ChatRole, content: string): void {
    this.entries.push(Object.freeze({role, content}))
  }
}
