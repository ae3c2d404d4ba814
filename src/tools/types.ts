export type ToolResult = {
  ok: boolean
  output: string
}

export type ToolArgs = Record<string, unknown>
