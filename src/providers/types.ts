export type ChatRole = 'system' | 'user' | 'assistant'

export type ChatMessage = {
  readonly role: ChatRole
  readonly content: string
}

export type ModelInfo = {
  name: string
  description?: string
  community: boolean
}

export interface LLMProvider {
  readonly name: string
  readonly model: string
  /** Sends the whole conversation and resolves with the reply text. Rejects with a ModelError. */
  chat(messages: readonly ChatMessage[]): Promise<string>
}

export type ProviderOptions = {
  apiKey: string
  model: string
}
