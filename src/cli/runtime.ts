import {DEFAULT_MODEL, isProviderName, type ProviderName, type Settings} from '../config/schema.js'

export type ChatTarget = {
  provider: ProviderName
  model: string
  apiKey: string
}

export type ChatTargetResult = {ok: true; target: ChatTarget} | {ok: false; message: string}

/** Picks provider, model and key for a chat; an explicit model wins over the saved one. */
export function resolveChatTarget(settings: Settings, requestedModel?: string): ChatTargetResult {
  const provider = settings.default_provider
  if (!isProviderName(provider)) {
    return {ok: false, message: `provider '${provider}' is not supported. use one of: base, openrouter, gemini`}
  }

  const entry = settings.providers[provider]
  const model = requestedModel?.trim() || entry?.model
  if (!model || model === DEFAULT_MODEL) {
    return {
      ok: false,
      message: `no model given and no default model set for '${provider}'. use /chat <model> or settings set model ${provider} <model>`
    }
  }

  const apiKey = entry?.api_key ?? ''
  if (!apiKey) {
    return {
      ok: false,
      message: `no api key for provider '${provider}'. set one with: settings set api_key ${provider} <key>`
    }
  }

  return {ok: true, target: {provider, model, apiKey}}
}
