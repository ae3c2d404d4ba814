import {createInterface} from 'node:readline/promises'
import process, {stdin as stdIn, stdout as stdOut} from 'node:process'
import type {ChatIO} from './chat-loop.js'

export type TerminalIO = ChatIO & {close(): void}

export type TerminalIOOptions = {
  input?: NodeJS.ReadableStream
  output?: NodeJS.WritableStream
  terminal?: boolean
  /** Called on Ctrl+C, at the prompt or while a turn is running. */
  onInterrupt?: () => void
}

export const INTERRUPT_EXIT_CODE = 130

function exitOnInterrupt(): void {
  process.exit(INTERRUPT_EXIT_CODE)
}

export function createTerminalIO(write: (line: string) => void, options: TerminalIOOptions = {}): TerminalIO {
  const rl = createInterface({
    input: options.input ?? stdIn,
    output: options.output ?? stdOut,
    terminal: options.terminal
  })
  let closed = false
  rl.on('close', () => {
    closed = true
  })

  // The interface stays open between prompts, so raw-mode Ctrl+C lands here even mid-turn.
  // It ends the whole session; execa kills a running shell command on exit.
  const onInterrupt = options.onInterrupt ?? exitOnInterrupt
  rl.on('SIGINT', () => {
    rl.close()
    onInterrupt()
  })

  return {
    write,
    readLine(prompt: string): Promise<string | undefined> {
      if (closed) return Promise.resolve(undefined)
      return new Promise((resolve) => {
        const onClose = (): void => resolve(undefined)
        rl.once('close', onClose)
        rl.question(prompt).then(
          (answer) => {
            rl.off('close', onClose)
            resolve(answer)
          },
          () => {
            // question() rejects when the interface is closed or aborted.
            rl.off('close', onClose)
            resolve(undefined)
          }
        )
      })
    },
    close(): void {
      rl.close()
    }
  }
}
