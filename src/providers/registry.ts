import OpenAI, {APIError} from 'openai'
import {z} from 'zod'
import type {ProviderName} from '../config/schema.js'
import {ModelResponseError, ModelTransportError, errorMessage} from './errors.js'
import {GeminiProvider, listGeminiModels} from './gemini-provider.js'
import {OpenAIProvider} from './openai-provider.js'
import type {LLMProvider, ModelInfo, ProviderOptions} from './types.js'

type ProviderDefinition = {
  create(options: ProviderOptions): LLMProvider
  listModels(apiKey: string): Promise<ModelInfo[]>
}

const POLLINATIONS_MODELS_URL = 'https://text.pollinations.ai/models'
const OPENROUTER_BASE_URL = 'https://openrouter.ai/api/v1'

const pollinationsModelsSchema = z.array(
  z.object({
    name: z.string(),
    description: z.string().optional(),
    community: z.boolean().optional()
  })
)

// OpenRouter adds fields beyond the OpenAI model object.
const openRouterModelSchema = z.object({description: z.string().optional()})

/** Pollinations serves its model catalogue outside the OpenAI-compatible API. */
async function listPollinationsModels(apiKey: string): Promise<ModelInfo[]> {
  let rawText: string
  try {
    const response = await fetch(POLLINATIONS_MODELS_URL, {
      headers: apiKey ? {Authorization: `Bearer ${apiKey}`} : {}
    })
    rawText = await response.text()
    if (!response.ok) {
      throw new ModelTransportError(`HTTP ${response.status}: ${rawText.slice(0, 500)}`, response.status)
    }
  } catch (error) {
    if (error instanceof ModelTransportError) throw error
    throw new ModelTransportError(`Could not fetch models for base: ${errorMessage(error)}`, undefined, {cause: error})
  }

  let body: unknown
  try {
    body = JSON.parse(rawText)
  } catch {
    throw new ModelResponseError('Models response is not valid JSON', rawText)
  }

  const parsed = pollinationsModelsSchema.safeParse(body)
  if (!parsed.success) throw new ModelResponseError('Unexpected models response from base', rawText)
  return parsed.data.map((model) => ({
    name: model.name,
    description: model.description,
    community: model.community ?? false
  }))
}

async function listOpenRouterModels(apiKey: string): Promise<ModelInfo[]> {
  const client = new OpenAI({apiKey, baseURL: OPENROUTER_BASE_URL, maxRetries: 0})
  const models: ModelInfo[] = []
  try {
    for await (const model of client.models.list()) {
      const extra = openRouterModelSchema.safeParse(model)
      models.push({
        name: model.id,
        description: extra.success ? extra.data.description : undefined,
        community: false
      })
    }
  } catch (error) {
    const status = error instanceof APIError ? error.status : undefined
    throw new ModelTransportError(`Could not fetch models for openrouter: ${errorMessage(error)}`, status, {
      cause: error
    })
  }

  return models
}

export const PROVIDERS: Record<ProviderName, ProviderDefinition> = {
  base: {
    create: (options) => new OpenAIProvider({...options, name: 'base', baseUrl: 'https://text.pollinations.ai/openai'}),
    listModels: listPollinationsModels
  },
  openrouter: {
    create: (options) => new OpenAIProvider({...options, name: 'openrouter', baseUrl: OPENROUTER_BASE_URL}),
    listModels: listOpenRouterModels
  },
  gemini: {
    create: (options) => new GeminiProvider(options),
    listModels: listGeminiModels
  }
}

export function createProvider(name: ProviderName, options: ProviderOptions): LLMProvider {
  return PROVIDERS[name].create(options)
}

export function listModels(name: ProviderName, apiKey: string): Promise<ModelInfo[]> {
  return PROVIDERS[name].listModels(apiKey)
}
