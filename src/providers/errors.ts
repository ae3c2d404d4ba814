export class ModelTransportError extends Error {
  readonly kind = 'transport'

  constructor(
    message: string,
    readonly status?: number,
    options?: {cause?: unknown}
  ) {
    super(message, options)
    this.name = 'ModelTransportError'
  }
}

/** The endpoint answered, but not in the shape the provider expects. */
export class ModelResponseError extends Error {
  readonly kind = 'response'

  constructor(
    message: string,
    readonly rawText: string
  ) {
    super(message)
    this.name = 'ModelResponseError'
  }
}

export type ModelError = ModelTransportError | ModelResponseError

export function isModelError(error: unknown): error is ModelError {
  return error instanceof ModelTransportError || error instanceof ModelResponseError
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}

export function safeJsonSnippet(value: unknown, max = 500): string {
  try {
    return (JSON.stringify(value) ?? String(value)).slice(0, max)
  } catch {
    return '[unserializable response]'
  }
}
