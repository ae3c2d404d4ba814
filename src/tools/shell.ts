import {execa} from 'execa'
import {errorMessage} from '../providers/errors.js'
import type {ToolResult} from './types.js'

export const NO_OUTPUT_MARKER = 'Command completed with no output.'

function resolveShell(): string | true {
  const shell = process.env.SHELL?.trim()
  if (shell) return shell
  if (process.platform === 'win32') return process.env.ComSpec || 'cmd.exe'
  return true
}

function formatStreams(stdout: string, stderr: string): string {
  let output = ''
  if (stdout) output += `STDOUT:\n${stdout}\n`
  if (stderr) output += `STDERR:\n${stderr}\n`
  return output || NO_OUTPUT_MARKER
}

/**
 * Runs `command` through the platform shell and waits for it to exit.
 * A non-zero exit is not an error here: whatever the command printed is returned.
 */
export async function runShell(command: string, cwd = process.cwd()): Promise<ToolResult> {
  // An empty script produces nothing, same as `sh -c ""`.
  if (!command.trim()) return {ok: true, output: NO_OUTPUT_MARKER}

  try {
    const result = await execa(command, {
      cwd,
      reject: false,
      shell: resolveShell(),
      maxBuffer: Number.POSITIVE_INFINITY
    })
    if (result.failed && result.exitCode === undefined && !result.stdout && !result.stderr) {
      const reason = result instanceof Error ? result.message : 'the command could not be started'
      return {ok: false, output: `Error executing command: ${reason}`}
    }

    return {ok: !result.failed, output: formatStreams(result.stdout, result.stderr)}
  } catch (error) {
    return {ok: false, output: `Error executing command: ${errorMessage(error)}`}
  }
}
