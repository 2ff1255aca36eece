/**
 * MyriaL / SQL Parser
 *
 * One instance is shared by the whole process. It keeps the token cursor
 * and dialect of the parse in progress on the instance, so concurrent
 * calls would corrupt each other: callers go through GuardedParser.
 *
 * MyriaL:
 *   X = scan(public:adhoc:R);
 *   Y = select distinct a, count(*) as n from X where b > 3;
 *   Z = [from X as x, Y where x.a = Y.a emit x.a, Y.n];
 *   W = Z;
 *   store(W, OUTPUT);
 *
 * SQL: a single SELECT, bound to OUTPUT and stored as public:adhoc:OUTPUT.
 */

import type { AggregateFunction, BinaryOperator } from '../../algebra'
import { QuerySyntaxError } from '../../errors'
import { tokenize, TokenStream } from '../lexer'
import type { Dialect, EmitItem, FromItem, RelationExpr, ScalarExpr, SelectExpr, Statement } from './ast'

const KEYWORDS = new Set([
  'select',
  'distinct',
  'from',
  'where',
  'emit',
  'as',
  'and',
  'or',
  'not',
  'scan',
  'store',
  'true',
  'false',
])

const AGGREGATES: Record<string, AggregateFunction> = {
  count: 'COUNT',
  sum: 'SUM',
  min: 'MIN',
  max: 'MAX',
  avg: 'AVG',
}

const COMPARISONS: Record<string, BinaryOperator> = {
  '=': '=',
  '==': '=',
  '!=': '!=',
  '<>': '!=',
  '<': '<',
  '<=': '<=',
  '>': '>',
  '>=': '>=',
}

export const SQL_OUTPUT = 'OUTPUT'

export class MyrialParser {
  private stream: TokenStream | null = null
  private dialect: Dialect = 'myrial'

  parse(source: string, dialect: Dialect): Statement[] {
    this.dialect = dialect
    this.stream = new TokenStream(tokenize(source, { commentPrefixes: ['--'] }))
    try {
      return dialect === 'sql' ? this.parseSqlProgram() : this.parseProgram()
    } finally {
      this.stream = null
    }
  }

  private get tokens(): TokenStream {
    if (!this.stream) throw new QuerySyntaxError('Parser is not running')
    return this.stream
  }

  // ===========================================================================
  // PROGRAMS
  // ===========================================================================

  private parseProgram(): Statement[] {
    const statements: Statement[] = []
    while (!this.tokens.atEnd()) {
      statements.push(this.parseStatement())
      while (this.tokens.acceptPunct(';')) {
        // empty statements
      }
    }
    if (statements.length === 0) {
      throw new QuerySyntaxError(`Unable to parse ${this.dialect === 'sql' ? 'SQL' : 'MyriaL'}: empty program`)
    }
    return statements
  }

  private parseSqlProgram(): Statement[] {
    const line = this.tokens.peek().line
    if (this.tokens.atEnd()) return this.parseProgram()
    const value = this.parseSelect()
    this.tokens.acceptPunct(';')
    if (!this.tokens.atEnd()) throw this.tokens.error('Expected end of query')
    return [
      { kind: 'assign', target: SQL_OUTPUT, value, line },
      { kind: 'store', source: SQL_OUTPUT, relation: SQL_OUTPUT, line },
    ]
  }

  private parseStatement(): Statement {
    const start = this.tokens.peek()
    if (this.tokens.isKeyword('store') && this.tokens.isPunct('(', 1)) {
      this.tokens.next()
      this.tokens.expectPunct('(')
      const source = this.parseName('relation variable')
      this.tokens.expectPunct(',')
      const relation = this.parseRelationName()
      this.tokens.expectPunct(')')
      return { kind: 'store', source, relation, line: start.line }
    }
    const target = this.parseName('variable')
    this.tokens.expectPunct('=')
    const value = this.parseRelationExpr()
    return { kind: 'assign', target, value, line: start.line }
  }

  // ===========================================================================
  // RELATIONS
  // ===========================================================================

  private parseRelationExpr(): RelationExpr {
    if (this.tokens.isKeyword('scan') && this.tokens.isPunct('(', 1)) {
      this.tokens.next()
      this.tokens.expectPunct('(')
      const relation = this.parseRelationName()
      this.tokens.expectPunct(')')
      return { kind: 'scan', relation }
    }
    if (this.tokens.isKeyword('select')) return this.parseSelect()
    if (this.tokens.isPunct('[')) return this.parseBracketQuery()
    if (this.tokens.acceptPunct('(')) {
      const inner = this.parseRelationExpr()
      this.tokens.expectPunct(')')
      return inner
    }
    return { kind: 'variable', name: this.parseName('relation') }
  }

  private parseSelect(): SelectExpr {
    this.tokens.expectKeyword('select')
    const distinct = this.tokens.acceptKeyword('distinct')
    const emits = this.parseEmitList()
    this.tokens.expectKeyword('from')
    const from = this.parseFromList()
    const where = this.tokens.acceptKeyword('where') ? this.parseExpression() : null
    return { kind: 'select', distinct, emits, from, where }
  }

  private parseBracketQuery(): SelectExpr {
    this.tokens.expectPunct('[')
    this.tokens.expectKeyword('from')
    const from = this.parseFromList()
    const where = this.tokens.acceptKeyword('where') ? this.parseExpression() : null
    this.tokens.expectKeyword('emit')
    const distinct = this.tokens.acceptKeyword('distinct')
    const emits = this.parseEmitList()
    this.tokens.expectPunct(']')
    return { kind: 'select', distinct, emits, from, where }
  }

  private parseFromList(): FromItem[] {
    const items = [this.parseFromItem()]
    while (this.tokens.acceptPunct(',')) items.push(this.parseFromItem())
    return items
  }

  private parseFromItem(): FromItem {
    let source: RelationExpr
    if (this.tokens.isKeyword('scan') || this.tokens.isPunct('(')) {
      source = this.parseRelationExpr()
    } else {
      const name = this.parseRelationName()
      source = name.includes(':') ? { kind: 'scan', relation: name } : { kind: 'variable', name }
    }
    if (this.tokens.acceptKeyword('as')) {
      return { source, alias: this.parseName('alias') }
    }
    const next = this.tokens.peek()
    if (next.kind === 'ident' && !KEYWORDS.has(next.text.toLowerCase())) {
      return { source, alias: this.parseName('alias') }
    }
    return { source }
  }

  private parseEmitList(): EmitItem[] {
    const items = [this.parseEmitItem()]
    while (this.tokens.acceptPunct(',')) items.push(this.parseEmitItem())
    return items
  }

  private parseEmitItem(): EmitItem {
    if (this.tokens.acceptPunct('*')) return { kind: 'star' }
    if (this.tokens.peek().kind === 'ident' && this.tokens.isPunct('.', 1) && this.tokens.isPunct('*', 2)) {
      const qualifier = this.tokens.next().text
      this.tokens.next()
      this.tokens.next()
      return { kind: 'star', qualifier }
    }
    const expression = this.parseExpression()
    if (this.tokens.acceptKeyword('as')) {
      return { kind: 'expr', expression, alias: this.parseName('column alias') }
    }
    return { kind: 'expr', expression }
  }

  /** `name`, `program:name` or `user:program:name` */
  private parseRelationName(): string {
    let name = this.parseName('relation name')
    while (this.tokens.isPunct(':') && this.tokens.peek(1).kind === 'ident') {
      this.tokens.next()
      name += `:${this.tokens.next().text}`
    }
    return name
  }

  private parseName(what: string): string {
    const token = this.tokens.peek()
    if (token.kind !== 'ident' || KEYWORDS.has(token.text.toLowerCase())) {
      throw this.tokens.error(`Expected ${what}`)
    }
    return this.tokens.next().text
  }

  // ===========================================================================
  // SCALAR EXPRESSIONS
  // ===========================================================================
  // precedence: OR < AND < NOT < comparison < + - < * / < unary < primary

  private parseExpression(): ScalarExpr {
    let left = this.parseAnd()
    while (this.tokens.acceptKeyword('or')) {
      left = { kind: 'binary', operator: 'OR', left, right: this.parseAnd() }
    }
    return left
  }

  private parseAnd(): ScalarExpr {
    let left = this.parseNot()
    while (this.tokens.acceptKeyword('and')) {
      left = { kind: 'binary', operator: 'AND', left, right: this.parseNot() }
    }
    return left
  }

  private parseNot(): ScalarExpr {
    if (this.tokens.acceptKeyword('not')) return { kind: 'not', operand: this.parseNot() }
    return this.parseComparison()
  }

  private parseComparison(): ScalarExpr {
    const left = this.parseAdditive()
    const token = this.tokens.peek()
    const operator = token.kind === 'punct' ? COMPARISONS[token.text] : undefined
    if (!operator) return left
    this.tokens.next()
    return { kind: 'binary', operator, left, right: this.parseAdditive() }
  }

  private parseAdditive(): ScalarExpr {
    let left = this.parseMultiplicative()
    for (;;) {
      if (this.tokens.acceptPunct('+')) left = { kind: 'binary', operator: '+', left, right: this.parseMultiplicative() }
      else if (this.tokens.acceptPunct('-')) left = { kind: 'binary', operator: '-', left, right: this.parseMultiplicative() }
      else return left
    }
  }

  private parseMultiplicative(): ScalarExpr {
    let left = this.parseUnary()
    for (;;) {
      if (this.tokens.acceptPunct('*')) left = { kind: 'binary', operator: '*', left, right: this.parseUnary() }
      else if (this.tokens.acceptPunct('/')) left = { kind: 'binary', operator: '/', left, right: this.parseUnary() }
      else return left
    }
  }

  private parseUnary(): ScalarExpr {
    if (this.tokens.isPunct('-') && this.tokens.peek(1).kind === 'number') {
      this.tokens.next()
      return { kind: 'literal', value: -Number(this.tokens.next().text) }
    }
    if (this.tokens.acceptPunct('-')) {
      return { kind: 'binary', operator: '-', left: { kind: 'literal', value: 0 }, right: this.parseUnary() }
    }
    return this.parsePrimary()
  }

  private parsePrimary(): ScalarExpr {
    const token = this.tokens.peek()

    if (token.kind === 'number') {
      this.tokens.next()
      return { kind: 'literal', value: Number(token.text) }
    }
    if (token.kind === 'string') {
      this.tokens.next()
      return { kind: 'literal', value: token.text }
    }
    if (this.tokens.acceptKeyword('true')) return { kind: 'literal', value: true }
    if (this.tokens.acceptKeyword('false')) return { kind: 'literal', value: false }
    if (this.tokens.acceptPunct('(')) {
      const inner = this.parseExpression()
      this.tokens.expectPunct(')')
      return inner
    }
    if (this.tokens.isPunct('$')) return { kind: 'position', index: this.parsePosition() }

    if (token.kind === 'ident' && !KEYWORDS.has(token.text.toLowerCase())) {
      const fn = AGGREGATES[token.text.toLowerCase()]
      if (this.tokens.isPunct('(', 1)) {
        if (!fn) throw this.tokens.error('Unknown function')
        this.tokens.next()
        this.tokens.expectPunct('(')
        const argument = this.tokens.acceptPunct('*') ? null : this.parseExpression()
        this.tokens.expectPunct(')')
        if (argument === null && fn !== 'COUNT') {
          throw new QuerySyntaxError(`${fn}(*) is not allowed`, token.line, token.column)
        }
        return { kind: 'call', fn, argument }
      }
      this.tokens.next()
      if (this.tokens.acceptPunct('.')) {
        if (this.tokens.isPunct('$')) return { kind: 'position', qualifier: token.text, index: this.parsePosition() }
        return { kind: 'name', qualifier: token.text, name: this.parseName('column name') }
      }
      return { kind: 'name', name: token.text }
    }

    throw this.tokens.error('Expected expression')
  }

  private parsePosition(): number {
    this.tokens.expectPunct('$')
    const token = this.tokens.peek()
    if (token.kind !== 'number' || !/^[0-9]+$/.test(token.text)) {
      throw this.tokens.error('Expected column position')
    }
    this.tokens.next()
    return Number(token.text)
  }
}
