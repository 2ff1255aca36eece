/**
 * Datalog Parser
 *
 * Grammar:
 *   program    := (rule '.'?)*
 *   rule       := atom ':-' literal (',' literal)*
 *   literal    := atom | term cmp term
 *   atom       := relation '(' term (',' term)* ')'
 *   relation   := ident (':' ident)*
 *   term       := variable | number | string | '_' | aggfn '(' variable ')'
 */

import type { AggregateFunction, ComparisonOperator } from '../../algebra'
import { tokenize, TokenStream } from '../lexer'

export type DatalogTerm =
  | { kind: 'variable'; name: string }
  | { kind: 'constant'; value: string | number }
  | { kind: 'wildcard' }
  | { kind: 'aggregate'; fn: AggregateFunction; variable: string }

export interface DatalogAtom {
  relation: string
  terms: DatalogTerm[]
  line: number
}

export interface DatalogComparison {
  operator: ComparisonOperator
  left: DatalogTerm
  right: DatalogTerm
}

export type DatalogLiteral = { kind: 'atom'; atom: DatalogAtom } | { kind: 'comparison'; comparison: DatalogComparison }

export interface DatalogRule {
  head: DatalogAtom
  body: DatalogLiteral[]
}

const AGGREGATES: Record<string, AggregateFunction> = {
  count: 'COUNT',
  sum: 'SUM',
  min: 'MIN',
  max: 'MAX',
  avg: 'AVG',
}

const COMPARISONS: Record<string, ComparisonOperator> = {
  '=': '=',
  '==': '=',
  '!=': '!=',
  '<>': '!=',
  '<': '<',
  '<=': '<=',
  '>': '>',
  '>=': '>=',
}

/**
 * Stateless parser: a fresh instance is created for every query.
 */
export class DatalogParser {
  parse(source: string): DatalogRule[] {
    const stream = new TokenStream(tokenize(source, { commentPrefixes: ['%', '#'] }))
    const rules: DatalogRule[] = []
    while (!stream.atEnd()) {
      rules.push(this.parseRule(stream))
      stream.acceptPunct('.')
    }
    return rules
  }

  private parseRule(stream: TokenStream): DatalogRule {
    const head = this.parseAtom(stream, true)
    stream.expectPunct(':-')
    const body: DatalogLiteral[] = [this.parseLiteral(stream)]
    while (stream.acceptPunct(',')) {
      body.push(this.parseLiteral(stream))
    }
    return { head, body }
  }

  private parseLiteral(stream: TokenStream): DatalogLiteral {
    if (this.atAtom(stream)) {
      return { kind: 'atom', atom: this.parseAtom(stream, false) }
    }
    const left = this.parseTerm(stream, false)
    const op = stream.peek()
    const operator = op.kind === 'punct' ? COMPARISONS[op.text] : undefined
    if (!operator) throw stream.error('Expected comparison operator')
    stream.next()
    const right = this.parseTerm(stream, false)
    return { kind: 'comparison', comparison: { operator, left, right } }
  }

  /**
   * An atom starts with a relation name followed (possibly after
   * `:`-qualified parts) by an opening parenthesis.
   */
  private atAtom(stream: TokenStream): boolean {
    let offset = 0
    if (stream.peek(offset).kind !== 'ident') return false
    offset++
    while (stream.isPunct(':', offset) && stream.peek(offset + 1).kind === 'ident') {
      offset += 2
    }
    return stream.isPunct('(', offset)
  }

  private parseAtom(stream: TokenStream, isHead: boolean): DatalogAtom {
    const first = stream.expectIdent('relation name')
    let relation = first.text
    while (stream.isPunct(':') && stream.peek(1).kind === 'ident') {
      stream.next()
      relation += `:${stream.next().text}`
    }
    stream.expectPunct('(')
    const terms: DatalogTerm[] = [this.parseTerm(stream, isHead)]
    while (stream.acceptPunct(',')) {
      terms.push(this.parseTerm(stream, isHead))
    }
    stream.expectPunct(')')
    return { relation, terms, line: first.line }
  }

  private parseTerm(stream: TokenStream, allowAggregate: boolean): DatalogTerm {
    const token = stream.peek()
    if (token.kind === 'number') {
      stream.next()
      return { kind: 'constant', value: Number(token.text) }
    }
    if (token.kind === 'punct' && token.text === '-' && stream.peek(1).kind === 'number') {
      stream.next()
      return { kind: 'constant', value: -Number(stream.next().text) }
    }
    if (token.kind === 'string') {
      stream.next()
      return { kind: 'constant', value: token.text }
    }
    if (token.kind === 'ident') {
      const fn = AGGREGATES[token.text.toLowerCase()]
      if (fn && stream.isPunct('(', 1)) {
        if (!allowAggregate) throw stream.error('Aggregates are only allowed in rule heads')
        stream.next()
        stream.expectPunct('(')
        const variable = stream.expectIdent('variable').text
        stream.expectPunct(')')
        return { kind: 'aggregate', fn, variable }
      }
      stream.next()
      return token.text === '_' ? { kind: 'wildcard' } : { kind: 'variable', name: token.text }
    }
    throw stream.error('Expected term')
  }
}
