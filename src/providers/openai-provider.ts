import OpenAI, {APIError} from 'openai'
import {z} from 'zod'
import type {
  ChatCompletionCreateParamsNonStreaming,
  ChatCompletionMessageParam
} from 'openai/resources/chat/completions'
import {ModelResponseError, ModelTransportError, errorMessage, safeJsonSnippet} from './errors.js'
import type {ChatMessage, LLMProvider, ProviderOptions} from './types.js'

type OpenAIProviderOptions = ProviderOptions & {
  name: string
  baseUrl: string
}

const textPartSchema = z.union([z.string(), z.object({text: z.string()})])

const completionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.union([z.string(), z.array(textPartSchema)])
        })
      })
    )
    .nonempty()
})

export function buildOpenAIRequest(
  model: string,
  messages: readonly ChatMessage[]
): ChatCompletionCreateParamsNonStreaming {
  const mappedMessages: ChatCompletionMessageParam[] = messages.map((message) => ({
    role: message.role,
    content: message.content
  }))

  return {model, messages: mappedMessages}
}

/** Reads `choices[0].message.content`; content given as text parts is joined. */
export function extractOpenAIReply(completion: unknown): string {
  const parsed = completionSchema.safeParse(completion)
  if (!parsed.success) {
    const raw = safeJsonSnippet(completion, 2000)
    throw new ModelResponseError('Could not read choices[0].message.content from the model response', raw)
  }

  const content = parsed.data.choices[0].message.content
  if (typeof content === 'string') return content
  return content.map((part) => (typeof part === 'string' ? part : part.text)).join('')
}

export class OpenAIProvider implements LLMProvider {
  readonly name: string
  readonly model: string
  private readonly client: OpenAI

  constructor(options: OpenAIProviderOptions) {
    this.name = options.name
    this.model = options.model
    this.client = new OpenAI({
      apiKey: options.apiKey,
      baseURL: options.baseUrl.replace(/\/+$/, ''),
      maxRetries: 0
    })
  }

  async chat(messages: readonly ChatMessage[]): Promise<string> {
    const request = buildOpenAIRequest(this.model, messages)
    let completion: unknown
    try {
      completion = await this.client.chat.completions.create(request)
    } catch (error) {
      const status = error instanceof APIError ? error.status : undefined
      throw new ModelTransportError(`Request to ${this.name} failed: ${errorMessage(error)}`, status, {
        cause: error
      })
    }

    return extractOpenAIReply(completion)
  }
}
