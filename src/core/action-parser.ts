import {stringArg} from '../tools/index.js'
import type {ToolArgs} from '../tools/types.js'

export type Action = {
  tool?: string
  args: ToolArgs
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

export function extractActionJson(text: string): string | undefined {
  const start = text.indexOf('{')
  const end = text.lastIndexOf('}')
  if (start === -1 || end < start) return undefined
  return text.slice(start, end + 1)
}

/**
 * Decodes the span from the first `{` to the last `}`; prose around it is
 * ignored. Returns undefined when there is no span or it does not decode to
 * an object, and the reply is then treated as plain text.
 */
export function parseAction(text: string): Action | undefined {
  const json = extractActionJson(text)
  if (json === undefined) return undefined

  let decoded: unknown
  try {
    decoded = JSON.parse(json)
  } catch {
    return undefined
  }

  if (!isPlainObject(decoded)) return undefined

  // A non-string tool name is kept in text form so it can be reported back.
  const tool = stringArg(decoded, 'tool')
  return {
    ...(tool === undefined ? {} : {tool}),
    args: isPlainObject(decoded.args) ? decoded.args : {}
  }
}
