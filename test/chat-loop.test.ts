import {describe, expect, it} from 'vitest'
import {renderOutcome, runChatLoop} from '../src/cli/chat-loop.js'
import {createChatSession} from '../src/core/agent.js'
import {ModelResponseError, ModelTransportError} from '../src/providers/errors.js'
import {cyan, magenta, red} from '../src/ui/ansi.js'
import {scriptedIO} from './fixtures/scripted-io.js'
import {ScriptedProvider} from './fixtures/scripted-provider.js'

describe('runChatLoop', () => {
  it('skips empty lines and stops on /exit', async () => {
    const provider = new ScriptedProvider(['{"tool":"final_answer","args":{"text":"hi"}}'])
    const session = createChatSession(provider, {systemPrompt: 'sys'})
    const io = scriptedIO(['', '   ', 'hello', '/exit', 'never read'])

    const turns = await runChatLoop(session, io)
    expect(turns).toBe(1)
    expect(io.prompts).toBe(4)
    expect(io.output).toEqual([cyan('assistant>'), 'hi'])
    expect(provider.requests).toHaveLength(1)
  })

  it('treats /back as leaving the chat, case-insensitively', async () => {
    const provider = new ScriptedProvider([])
    const session = createChatSession(provider, {systemPrompt: 'sys'})
    const io = scriptedIO(['/BACK'])

    expect(await runChatLoop(session, io)).toBe(0)
    expect(session.history.length).toBe(1)
  })

  it('ends when input runs out', async () => {
    const provider = new ScriptedProvider(['plain reply'])
    const session = createChatSession(provider, {systemPrompt: 'sys'})
    const io = scriptedIO(['question'])

    expect(await runChatLoop(session, io)).toBe(1)
    expect(io.output).toEqual([cyan('assistant>'), 'plain reply'])
  })

  it('returns to the prompt after a failed request', async () => {
    const provider = new ScriptedProvider([new ModelTransportError('connection refused'), 'back online'])
    const session = createChatSession(provider, {systemPrompt: 'sys'})
    const io = scriptedIO(['first', 'second'])

    expect(await runChatLoop(session, io)).toBe(2)
    expect(io.output).toEqual([red('Request failed: connection refused'), cyan('assistant>'), 'back online'])
  })
})

describe('renderOutcome', () => {
  it('shows the question of ask_user', () => {
    expect(renderOutcome({kind: 'ask_user', question: 'Which one?'})).toEqual([magenta('agent asks>'), 'Which one?'])
  })

  it('includes the raw text of response-shape errors', () => {
    const error = new ModelResponseError('bad shape', '{"error":"quota"}')
    expect(renderOutcome({kind: 'error', error})).toEqual([
      red('Could not read the model response: bad shape'),
      'response: {"error":"quota"}'
    ])
  })
})
