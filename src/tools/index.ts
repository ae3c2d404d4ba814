import {listDirectory, readTextFile, writeTextFile} from './filesystem.js'
import {runShell} from './shell.js'
import type {ToolArgs, ToolResult} from './types.js'

export type {ToolArgs, ToolResult} from './types.js'

export const EXECUTOR_NAMES = ['list_directory', 'read_file', 'write_file', 'execute_shell'] as const

export type ExecutorName = (typeof EXECUTOR_NAMES)[number]

type Executor = (args: ToolArgs, cwd: string) => Promise<ToolResult>

/** Model arguments are loosely typed; scalars are stringified, structures JSON-encoded. */
export function stringArg(args: ToolArgs, key: string): string | undefined {
  const value = args[key]
  if (value === undefined || value === null) return undefined
  if (typeof value === 'string') return value
  if (typeof value === 'number' || typeof value === 'boolean' || typeof value === 'bigint') return String(value)
  return JSON.stringify(value)
}

function missingArgument(tool: ExecutorName, key: string): ToolResult {
  return {ok: false, output: `Error: ${tool} requires the "${key}" argument.`}
}

const EXECUTORS: Record<ExecutorName, Executor> = {
  list_directory: (args, cwd) => listDirectory(stringArg(args, 'path') ?? '.', cwd),

  read_file: async (args, cwd) => {
    const path = stringArg(args, 'path')
    if (path === undefined) return missingArgument('read_file', 'path')
    return readTextFile(path, cwd)
  },

  write_file: async (args, cwd) => {
    const path = stringArg(args, 'path')
    if (path === undefined) return missingArgument('write_file', 'path')
    const content = stringArg(args, 'content')
    if (content === undefined) return missingArgument('write_file', 'content')
    return writeTextFile(path, content, cwd)
  },

  execute_shell: async (args, cwd) => {
    const command = stringArg(args, 'command')
    if (command === undefined) return missingArgument('execute_shell', 'command')
    return runShell(command, cwd)
  }
}

export function isExecutorName(name: string | undefined): name is ExecutorName {
  return EXECUTOR_NAMES.some((executor) => executor === name)
}

export function executeTool(name: ExecutorName, args: ToolArgs, cwd = process.cwd()): Promise<ToolResult> {
  return EXECUTORS[name](args, cwd)
}
