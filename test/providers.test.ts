import {afterEach, describe, expect, it, vi} from 'vitest'
import {ModelResponseError, ModelTransportError} from '../src/providers/errors.js'
import {buildGeminiRequest, extractGeminiReply} from '../src/providers/gemini-provider.js'
import {buildOpenAIRequest, extractOpenAIReply} from '../src/providers/openai-provider.js'
import {createProvider, listModels} from '../src/providers/registry.js'
import type {ChatMessage} from '../src/providers/types.js'

const conversation: ChatMessage[] = [
  {role: 'system', content: 'use tools'},
  {role: 'user', content: 'hi'},
  {role: 'assistant', content: '{"tool":"list_directory"}'},
  {role: 'user', content: 'TOOL_RESULT: a.txt'}
]

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: {'Content-Type': 'application/json'}
  })
}

function requestUrl(input: string | URL | Request): string {
  return typeof input === 'string' ? input : input instanceof URL ? input.toString() : input.url
}

describe('OpenAI-style request and reply', () => {
  it('sends the history verbatim with the model name', () => {
    expect(buildOpenAIRequest('gpt-test', conversation)).toEqual({
      model: 'gpt-test',
      messages: conversation
    })
  })

  it('reads choices[0].message.content', () => {
    expect(extractOpenAIReply({choices: [{message: {content: 'hello'}}]})).toBe('hello')
    expect(extractOpenAIReply({choices: [{message: {content: [{text: 'a'}, 'b']}}]})).toBe('ab')
  })

  it('throws a response error with the raw body for other shapes', () => {
    expect(() => extractOpenAIReply({error: {message: 'quota'}})).toThrow(ModelResponseError)

    let failure: unknown
    try {
      extractOpenAIReply({choices: []})
    } catch (error) {
      failure = error
    }
    expect(failure).toBeInstanceOf(ModelResponseError)
    expect(failure instanceof ModelResponseError && failure.rawText).toBe('{"choices":[]}')
  })
})

describe('Gemini-style request and reply', () => {
  it('moves the system prompt out and maps assistant to model', () => {
    expect(buildGeminiRequest('gemini-1.5-flash', conversation)).toEqual({
      model: 'gemini-1.5-flash',
      contents: [
        {role: 'user', parts: [{text: 'hi'}]},
        {role: 'model', parts: [{text: '{"tool":"list_directory"}'}]},
        {role: 'user', parts: [{text: 'TOOL_RESULT: a.txt'}]}
      ],
      config: {systemInstruction: {parts: [{text: 'use tools'}]}}
    })
  })

  it('leaves config out when there is no system message', () => {
    expect(buildGeminiRequest('gemini-1.5-flash', [{role: 'user', content: 'hi'}])).toEqual({
      model: 'gemini-1.5-flash',
      contents: [{role: 'user', parts: [{text: 'hi'}]}]
    })
  })

  it('reads candidates[0].content.parts[0].text', () => {
    const body = {candidates: [{content: {parts: [{text: 'first'}, {text: 'second'}]}}]}
    expect(extractGeminiReply(body)).toBe('first')
  })

  it('throws a response error carrying the response', () => {
    let failure: unknown
    try {
      extractGeminiReply({candidates: []})
    } catch (error) {
      failure = error
    }
    expect(failure).toBeInstanceOf(ModelResponseError)
    expect(failure instanceof ModelResponseError && failure.rawText).toBe('{"candidates":[]}')
  })
})

describe('providers over HTTP', () => {
  afterEach(() => {
    vi.unstubAllGlobals()
  })

  it('posts OpenAI-style chats to openrouter', async () => {
    const fetchMock = vi.fn(async (input: string | URL | Request, init?: RequestInit) => {
      expect(requestUrl(input)).toBe('https://openrouter.ai/api/v1/chat/completions')
      const body = JSON.parse(String(init?.body)) as {model?: string; messages?: ChatMessage[]}
      expect(body.model).toBe('some/model')
      expect(body.messages).toEqual(conversation)
      return jsonResponse({choices: [{message: {content: 'hello from openrouter'}}]})
    })
    vi.stubGlobal('fetch', fetchMock)

    const provider = createProvider('openrouter', {apiKey: 'test-key', model: 'some/model'})
    expect(await provider.chat(conversation)).toBe('hello from openrouter')
    expect(fetchMock).toHaveBeenCalledOnce()
  })

  it('turns a non-success status into a transport error without retrying', async () => {
    const fetchMock = vi.fn(async () => jsonResponse({error: {message: 'bad key'}}, 401))
    vi.stubGlobal('fetch', fetchMock)

    const provider = createProvider('base', {apiKey: 'test-key', model: 'openai'})
    const failure = await provider.chat(conversation).catch((error: unknown) => error)
    expect(failure).toBeInstanceOf(ModelTransportError)
    expect(failure instanceof ModelTransportError && failure.status).toBe(401)
    expect(fetchMock).toHaveBeenCalledOnce()
  })

  it('posts Gemini-style chats with the key header', async () => {
    const fetchMock = vi.fn(async (input: string | URL | Request, init?: RequestInit) => {
      expect(new URL(requestUrl(input)).pathname).toBe('/v1beta/models/gemini-1.5-flash:generateContent')
      expect(new Headers(init?.headers).get('x-goog-api-key')).toBe('test-key')
      return jsonResponse({candidates: [{content: {parts: [{text: 'hello from gemini'}]}}]})
    })
    vi.stubGlobal('fetch', fetchMock)

    const provider = createProvider('gemini', {apiKey: 'test-key', model: 'gemini-1.5-flash'})
    expect(await provider.chat(conversation)).toBe('hello from gemini')
  })

  it('reports Gemini HTTP failures as transport errors with the status', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => new Response('quota exceeded', {status: 429})))

    const provider = createProvider('gemini', {apiKey: 'test-key', model: 'gemini-1.5-flash'})
    const failure = await provider.chat(conversation).catch((error: unknown) => error)
    expect(failure).toBeInstanceOf(ModelTransportError)
    expect(failure instanceof ModelTransportError && failure.status).toBe(429)
    expect(failure instanceof ModelTransportError && failure.message.startsWith('HTTP 429: ')).toBe(true)
    expect(failure instanceof ModelTransportError && failure.message).toContain('quota exceeded')
  })

  it('reports a Gemini body that is not JSON as a response error', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn(async () => new Response('<html>oops</html>', {status: 200, headers: {'Content-Type': 'application/json'}}))
    )

    const provider = createProvider('gemini', {apiKey: 'test-key', model: 'gemini-1.5-flash'})
    await expect(provider.chat(conversation)).rejects.toBeInstanceOf(ModelResponseError)
  })

  it('reports a Gemini reply without candidates as a response error', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => jsonResponse({promptFeedback: {blockReason: 'SAFETY'}})))

    const provider = createProvider('gemini', {apiKey: 'test-key', model: 'gemini-1.5-flash'})
    await expect(provider.chat(conversation)).rejects.toBeInstanceOf(ModelResponseError)
  })

  it('wraps network failures as transport errors', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn(async () => {
        throw new TypeError('fetch failed')
      })
    )

    const provider = createProvider('gemini', {apiKey: 'test-key', model: 'gemini-1.5-flash'})
    await expect(provider.chat(conversation)).rejects.toThrow('Request to gemini failed: fetch failed')
  })
})

describe('listModels', () => {
  afterEach(() => {
    vi.unstubAllGlobals()
  })

  it('splits base models into official and community', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn(async () =>
        jsonResponse([
          {name: 'openai', description: 'general purpose'},
          {name: 'fan-made', description: 'by the community', community: true}
        ])
      )
    )

    expect(await listModels('base', '')).toEqual([
      {name: 'openai', description: 'general purpose', community: false},
      {name: 'fan-made', description: 'by the community', community: true}
    ])
  })

  it('reads openrouter ids from data[]', async () => {
    const fetchMock = vi.fn(async (input: string | URL | Request, init?: RequestInit) => {
      expect(requestUrl(input)).toBe('https://openrouter.ai/api/v1/models')
      expect(new Headers(init?.headers).get('authorization')).toBe('Bearer test-key')
      return jsonResponse({data: [{id: 'vendor/model-a'}]})
    })
    vi.stubGlobal('fetch', fetchMock)

    expect(await listModels('openrouter', 'test-key')).toEqual([
      {name: 'vendor/model-a', description: undefined, community: false}
    ])
  })

  it('lists gemini model names through the SDK', async () => {
    const fetchMock = vi.fn(async (input: string | URL | Request, init?: RequestInit) => {
      expect(new URL(requestUrl(input)).pathname).toBe('/v1beta/models')
      expect(new Headers(init?.headers).get('x-goog-api-key')).toBe('test-key')
      return jsonResponse({models: [{name: 'models/gemini-1.5-flash'}, {name: 'models/gemini-1.5-pro'}]})
    })
    vi.stubGlobal('fetch', fetchMock)

    expect(await listModels('gemini', 'test-key')).toEqual([
      {name: 'models/gemini-1.5-flash', community: false},
      {name: 'models/gemini-1.5-pro', community: false}
    ])
  })

  it('reports an openrouter listing failure with its status', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => jsonResponse({error: {message: 'no key'}}, 401)))

    const failure = await listModels('openrouter', 'test-key').catch((error: unknown) => error)
    expect(failure).toBeInstanceOf(ModelTransportError)
    expect(failure instanceof ModelTransportError && failure.status).toBe(401)
  })

  it('rejects an unexpected models payload', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => jsonResponse({nothing: []})))
    await expect(listModels('base', '')).rejects.toThrow('Unexpected models response from base')
  })
})
