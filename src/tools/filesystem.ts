import {readFile, readdir, writeFile} from 'node:fs/promises'
import {resolve} from 'node:path'
import {errorMessage} from '../providers/errors.js'
import type {ToolResult} from './types.js'

// Paths are resolved against cwd as given: no workspace confinement.
function resolvePath(cwd: string, path: string): string {
  return resolve(cwd, path)
}

export async function listDirectory(path: string, cwd = process.cwd()): Promise<ToolResult> {
  try {
    const entries = await readdir(resolvePath(cwd, path))
    entries.sort()
    return {ok: true, output: `Contents of directory '${path}':\n${entries.join('\n')}`}
  } catch (error) {
    return {ok: false, output: `Error listing directory: ${errorMessage(error)}`}
  }
}

export async function readTextFile(path: string, cwd = process.cwd()): Promise<ToolResult> {
  try {
    const content = await readFile(resolvePath(cwd, path), 'utf8')
    return {ok: true, output: `Contents of file '${path}':\n\`\`\`\n${content}\n\`\`\``}
  } catch (error) {
    return {ok: false, output: `Error reading file: ${errorMessage(error)}`}
  }
}

/** Creates or truncates the file. Parent directories must already exist. */
export async function writeTextFile(path: string, content: string, cwd = process.cwd()): Promise<ToolResult> {
  try {
    await writeFile(resolvePath(cwd, path), content, 'utf8')
    return {ok: true, output: `File '${path}' written successfully.`}
  } catch (error) {
    return {ok: false, output: `Error writing file: ${errorMessage(error)}`}
  }
}
