const ANSI = {
  reset: '\x1b[0m',
  bold: '\x1b[1m',
  dim: '\x1b[2m',
  italic: '\x1b[3m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  magenta: '\x1b[35m',
  cyan: '\x1b[36m'
}

export function red(text: string): string {
  return `${ANSI.red}${text}${ANSI.reset}`
}

export function green(text: string): string {
  return `${ANSI.green}${text}${ANSI.reset}`
}

export function magenta(text: string): string {
  return `${ANSI.magenta}${text}${ANSI.reset}`
}

export function cyan(text: string): string {
  return `${ANSI.cyan}${text}${ANSI.reset}`
}

export function bold(text: string): string {
  return `${ANSI.bold}${text}${ANSI.reset}`
}

export function dim(text: string): string {
  return `${ANSI.dim}${text}${ANSI.reset}`
}

export function italic(text: string): string {
  return `${ANSI.italic}${text}${ANSI.reset}`
}

export function shorten(text: string, max = 500): string {
  if (text.length <= max) return text
  return `${text.slice(0, max)}\n...[truncated]`
}
