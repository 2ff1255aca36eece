/**
 * Tokenizer shared by the Datalog and MyriaL/SQL grammars.
 */

import { QuerySyntaxError } from '../errors'

export type TokenKind = 'ident' | 'number' | 'string' | 'punct' | 'eof'

export interface Token {
  kind: TokenKind
  text: string
  line: number
  column: number
}

export interface LexerOptions {
  /** Prefixes that start a comment running to end of line */
  commentPrefixes: readonly string[]
}

// Longest first, so that `:-` wins over `:` and `<=` over `<`.
const PUNCTUATION = [':-', '==', '!=', '<>', '<=', '>=', '(', ')', '[', ']', ',', '.', ';', ':', '=', '<', '>', '+', '-', '*', '/', '$']

export function tokenize(source: string, options: LexerOptions): Token[] {
  const tokens: Token[] = []
  let pos = 0
  let line = 1
  let lineStart = 0

  const at = (offset = 0): string => source.charAt(pos + offset)

  while (pos < source.length) {
    const ch = at()

    if (ch === '\n') {
      pos++
      line++
      lineStart = pos
      continue
    }
    if (/\s/.test(ch)) {
      pos++
      continue
    }
    if (options.commentPrefixes.some((prefix) => source.startsWith(prefix, pos))) {
      while (pos < source.length && at() !== '\n') pos++
      continue
    }

    const column = pos - lineStart + 1
    const start = pos

    if (/[A-Za-z_]/.test(ch)) {
      while (/[A-Za-z0-9_]/.test(at())) pos++
      tokens.push({ kind: 'ident', text: source.slice(start, pos), line, column })
      continue
    }

    if (/[0-9]/.test(ch)) {
      while (/[0-9]/.test(at())) pos++
      if (at() === '.' && /[0-9]/.test(at(1))) {
        pos++
        while (/[0-9]/.test(at())) pos++
      }
      tokens.push({ kind: 'number', text: source.slice(start, pos), line, column })
      continue
    }

    if (ch === "'" || ch === '"') {
      pos++
      let value = ''
      for (;;) {
        if (pos >= source.length || at() === '\n') {
          throw new QuerySyntaxError('Unterminated string literal', line, column)
        }
        if (at() === ch) {
          // doubled quote is an escaped quote
          if (at(1) === ch) {
            value += ch
            pos += 2
            continue
          }
          pos++
          break
        }
        value += at()
        pos++
      }
      tokens.push({ kind: 'string', text: value, line, column })
      continue
    }

    const punct = PUNCTUATION.find((p) => source.startsWith(p, pos))
    if (punct) {
      pos += punct.length
      tokens.push({ kind: 'punct', text: punct, line, column })
      continue
    }

    throw new QuerySyntaxError(`Unexpected character '${ch}'`, line, column)
  }

  tokens.push({ kind: 'eof', text: '', line, column: pos - lineStart + 1 })
  return tokens
}

/**
 * Cursor over a token list with the usual expect/accept helpers.
 */
export class TokenStream {
  private pos = 0

  constructor(private readonly tokens: readonly Token[]) {}

  peek(offset = 0): Token {
    const last = this.tokens[this.tokens.length - 1]
    const token = this.tokens[Math.min(this.pos + offset, this.tokens.length - 1)] ?? last
    if (!token) throw new QuerySyntaxError('Empty token stream')
    return token
  }

  next(): Token {
    const token = this.peek()
    if (token.kind !== 'eof') this.pos++
    return token
  }

  atEnd(): boolean {
    return this.peek().kind === 'eof'
  }

  isPunct(text: string, offset = 0): boolean {
    const token = this.peek(offset)
    return token.kind === 'punct' && token.text === text
  }

  isKeyword(word: string, offset = 0): boolean {
    const token = this.peek(offset)
    return token.kind === 'ident' && token.text.toLowerCase() === word
  }

  acceptPunct(text: string): boolean {
    if (!this.isPunct(text)) return false
    this.pos++
    return true
  }

  acceptKeyword(word: string): boolean {
    if (!this.isKeyword(word)) return false
    this.pos++
    return true
  }

  expectPunct(text: string): Token {
    if (!this.isPunct(text)) throw this.error(`Expected '${text}'`)
    return this.next()
  }

  expectKeyword(word: string): Token {
    if (!this.isKeyword(word)) throw this.error(`Expected ${word.toUpperCase()}`)
    return this.next()
  }

  expectIdent(what = 'identifier'): Token {
    if (this.peek().kind !== 'ident') throw this.error(`Expected ${what}`)
    return this.next()
  }

  error(message: string): QuerySyntaxError {
    const token = this.peek()
    const found = token.kind === 'eof' ? 'end of input' : `'${token.text}'`
    return new QuerySyntaxError(`${message}, found ${found}`, token.line, token.column)
  }
}
