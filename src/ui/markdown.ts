import {marked, type Token, type Tokens} from 'marked'
import {bold, cyan, dim, italic} from './ansi.js'

function renderInline(tokens: Token[]): string {
  return tokens.map((token) => renderInlineToken(token)).join('')
}

function renderInlineToken(token: Token): string {
  switch (token.type) {
    case 'strong':
      return bold(renderInline(token.tokens ?? []))
    case 'em':
      return italic(renderInline(token.tokens ?? []))
    case 'codespan':
      return cyan(token.text)
    case 'link':
      return `${renderInline(token.tokens ?? [])} (${token.href})`
    case 'br':
      return '\n'
    case 'text':
      return token.tokens ? renderInline(token.tokens) : token.text
    case 'escape':
      return token.text
    default:
      return token.raw
  }
}

function renderList(ordered: boolean, start: number | '', items: Tokens.ListItem[]): string {
  const first = typeof start === 'number' ? start : 1
  return items
    .map((item, index) => {
      const marker = ordered ? `${first + index}.` : '-'
      return `${marker} ${renderInline(item.tokens).trimEnd()}`
    })
    .join('\n')
}

function renderBlock(token: Token): string | undefined {
  switch (token.type) {
    case 'space':
      return undefined
    case 'heading':
      return bold(renderInline(token.tokens ?? []))
    case 'paragraph':
      return renderInline(token.tokens ?? [])
    case 'code': {
      const code: string = token.text
      return code
        .split('\n')
        .map((line) => dim(`  ${line}`))
        .join('\n')
    }
    case 'list':
      return renderList(token.ordered, token.start, token.items)
    case 'blockquote':
      return renderBlocks(token.tokens ?? [])
        .split('\n')
        .map((line) => dim(`> ${line}`))
        .join('\n')
    case 'hr':
      return '---'
    default:
      return token.raw.trimEnd()
  }
}

function renderBlocks(tokens: Token[]): string {
  return tokens
    .map((token) => renderBlock(token))
    .filter((block): block is string => block !== undefined)
    .join('\n\n')
}

/** Renders a model answer's Markdown as terminal text. */
export function renderMarkdown(text: string): string {
  return renderBlocks(marked.lexer(text))
}
