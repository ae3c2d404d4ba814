import {ApiError, GoogleGenAI, type Content, type GenerateContentParameters} from '@google/genai'
import {z} from 'zod'
import {ModelResponseError, ModelTransportError, errorMessage, safeJsonSnippet} from './errors.js'
import type {ChatMessage, LLMProvider, ModelInfo, ProviderOptions} from './types.js'

const generateContentSchema = z.object({
  candidates: z
    .array(
      z.object({
        content: z.object({
          parts: z.array(z.object({text: z.string()})).nonempty()
        })
      })
    )
    .nonempty()
})

export function buildGeminiRequest(model: string, messages: readonly ChatMessage[]): GenerateContentParameters {
  const system = messages.filter((message) => message.role === 'system')
  const contents: Content[] = messages
    .filter((message) => message.role !== 'system')
    .map((message) => ({
      role: message.role === 'assistant' ? 'model' : 'user',
      parts: [{text: message.content}]
    }))

  if (system.length === 0) return {model, contents}
  return {
    model,
    contents,
    config: {systemInstruction: {parts: system.map((message) => ({text: message.content}))}}
  }
}

/** Reads `candidates[0].content.parts[0].text`. */
export function extractGeminiReply(response: unknown): string {
  const parsed = generateContentSchema.safeParse(response)
  if (!parsed.success) {
    throw new ModelResponseError(
      'Could not read candidates[0].content.parts[0].text from the model response',
      safeJsonSnippet(response, 2000)
    )
  }

  return parsed.data.candidates[0].content.parts[0].text
}

/** Maps SDK failures onto the model error types; `action` prefixes errors that carry no HTTP status. */
export function toGeminiError(error: unknown, action: string): ModelTransportError | ModelResponseError {
  if (error instanceof ApiError) {
    return new ModelTransportError(`HTTP ${error.status}: ${error.message.slice(0, 500)}`, error.status, {cause: error})
  }

  if (error instanceof SyntaxError) {
    return new ModelResponseError('Model response is not valid JSON', errorMessage(error))
  }

  return new ModelTransportError(`${action}: ${errorMessage(error)}`, undefined, {cause: error})
}

export class GeminiProvider implements LLMProvider {
  readonly name = 'gemini'
  readonly model: string
  private readonly client: GoogleGenAI

  constructor(options: ProviderOptions) {
    this.model = options.model
    this.client = new GoogleGenAI({apiKey: options.apiKey})
  }

  async chat(messages: readonly ChatMessage[]): Promise<string> {
    let response: unknown
    try {
      response = await this.client.models.generateContent(buildGeminiRequest(this.model, messages))
    } catch (error) {
      throw toGeminiError(error, 'Request to gemini failed')
    }

    return extractGeminiReply(response)
  }
}

export async function listGeminiModels(apiKey: string): Promise<ModelInfo[]> {
  const models: ModelInfo[] = []
  try {
    const client = new GoogleGenAI({apiKey})
    const pager = await client.models.list()
    for await (const model of pager) {
      if (model.name) models.push({name: model.name, community: false})
    }
  } catch (error) {
    throw toGeminiError(error, 'Could not fetch models for gemini')
  }

  return models
}
