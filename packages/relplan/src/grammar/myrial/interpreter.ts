/**
 * MyriaL statement interpreter
 *
 * Evaluates parsed statements against a catalog into logical rules, one
 * per `store`. Relation variables hold logical plans; a from-item that
 * names no variable is scanned from the catalog, or from a relation the
 * program itself stored earlier.
 */

import {
  column,
  containsAggregate,
  formatRelationKey,
  literal,
  parseRelationKey,
  schemeOf,
  typeOf,
} from '../../algebra'
import type {
  AggregateColumn,
  Emitter,
  Expression,
  GroupingColumn,
  LogicalOperator,
  Scheme,
} from '../../algebra'
import type { Catalog } from '../../catalog'
import { SemanticError, TypeMismatchError, UnsupportedOperationError } from '../../errors'
import { UniqueNames } from '../../utils/names'
import type { LogicalRule } from '../types'
import type { EmitItem, FromItem, RelationExpr, ScalarExpr, SelectExpr, Statement } from './ast'

interface ScopeEntry {
  alias: string
  scheme: Scheme
  offset: number
}

/**
 * Column lookup over the concatenated schemes of a from-list.
 */
class Scope {
  constructor(private readonly entries: readonly ScopeEntry[]) {}

  get width(): number {
    return this.entries.reduce((sum, entry) => sum + entry.scheme.length, 0)
  }

  get scheme(): Scheme {
    return this.entries.flatMap((entry) => entry.scheme)
  }

  entry(alias: string): ScopeEntry {
    const found = this.entries.find((entry) => entry.alias === alias)
    if (!found) throw new SemanticError(`Unknown relation alias ${alias}`)
    return found
  }

  columnsOf(alias?: string): number[] {
    const entries = alias === undefined ? this.entries : [this.entry(alias)]
    return entries.flatMap((entry) => entry.scheme.map((_, i) => entry.offset + i))
  }

  resolveName(name: string, qualifier?: string): number {
    if (qualifier !== undefined) {
      const entry = this.entry(qualifier)
      const index = entry.scheme.findIndex((col) => col.name === name)
      if (index < 0) throw new SemanticError(`Column ${qualifier}.${name} not found`)
      return entry.offset + index
    }
    const matches = this.entries.flatMap((entry) =>
      entry.scheme.flatMap((col, i) => (col.name === name ? [entry.offset + i] : [])),
    )
    const [match, ...others] = matches
    if (match === undefined) throw new SemanticError(`Column ${name} not found`)
    if (others.length > 0) throw new SemanticError(`Column ${name} is ambiguous`)
    return match
  }

  resolvePosition(index: number, qualifier?: string): number {
    if (qualifier !== undefined) {
      const entry = this.entry(qualifier)
      if (index >= entry.scheme.length) throw new SemanticError(`Column ${qualifier}.$${index} out of range`)
      return entry.offset + index
    }
    if (index >= this.width) throw new SemanticError(`Column $${index} out of range`)
    return index
  }
}

export class StatementProcessor {
  private readonly variables = new Map<string, LogicalOperator>()
  private readonly stored = new Map<string, Scheme>()
  private readonly rules: LogicalRule[] = []

  constructor(private readonly catalog: Catalog) {}

  async evaluate(statements: readonly Statement[]): Promise<LogicalRule[]> {
    for (const statement of statements) {
      if (statement.kind === 'assign') {
        this.variables.set(statement.target, await this.evaluateRelation(statement.value))
        continue
      }
      const plan = this.variables.get(statement.source)
      if (!plan) {
        throw new SemanticError(`Relation variable ${statement.source} is not defined (line ${statement.line})`)
      }
      const relation = parseRelationKey(statement.relation)
      this.stored.set(formatRelationKey(relation), schemeOf(plan))
      this.rules.push({ name: relation.name, relation, plan })
    }
    if (this.rules.length === 0) {
      throw new SemanticError('Program stores no relation')
    }
    return [...this.rules]
  }

  // ===========================================================================
  // RELATIONS
  // ===========================================================================

  private async evaluateRelation(expr: RelationExpr): Promise<LogicalOperator> {
    switch (expr.kind) {
      case 'scan':
        return this.scan(expr.relation)
      case 'variable':
        return this.variables.get(expr.name) ?? this.scan(expr.name)
      case 'select':
        return this.evaluateSelect(expr)
    }
  }

  private async scan(name: string): Promise<LogicalOperator> {
    const relation = parseRelationKey(name)
    const scheme = this.stored.get(formatRelationKey(relation)) ?? (await this.catalog.getScheme(relation))
    return { op: 'Scan', relation, scheme }
  }

  private async evaluateSelect(select: SelectExpr): Promise<LogicalOperator> {
    const sources: LogicalOperator[] = []
    const entries: ScopeEntry[] = []
    let offset = 0
    for (const item of select.from) {
      const source = await this.evaluateRelation(item.source)
      const alias = aliasOf(item)
      if (entries.some((entry) => entry.alias === alias)) {
        throw new SemanticError(`Duplicate relation alias ${alias}`)
      }
      const scheme = schemeOf(source)
      entries.push({ alias, scheme, offset })
      sources.push(source)
      offset += scheme.length
    }
    const scope = new Scope(entries)

    const [first, ...rest] = sources
    if (!first) throw new SemanticError('Select has no relation to read from')
    let plan = rest.reduce<LogicalOperator>((left, right) => ({ op: 'CrossProduct', left, right }), first)

    if (select.where) {
      const condition = resolve(select.where, scope)
      if (containsAggregate(condition)) throw new SemanticError('Aggregates are not allowed in WHERE')
      const type = typeOf(condition, scope.scheme)
      if (type !== 'BOOLEAN_TYPE') throw new TypeMismatchError('WHERE', 'BOOLEAN_TYPE', type)
      plan = { op: 'Select', condition, input: plan }
    }

    const emitters = expandEmits(select.emits, scope)
    plan = emitters.some((e) => containsAggregate(e.expression))
      ? groupAndEmit(plan, emitters)
      : project(plan, emitters, scope.scheme)

    // type-check every emitted expression now rather than at lowering time
    schemeOf(plan)
    return select.distinct ? { op: 'Distinct', input: plan } : plan
  }
}

// =============================================================================
// EMITTERS
// =============================================================================

function aliasOf(item: FromItem): string {
  if (item.alias) return item.alias
  switch (item.source.kind) {
    case 'scan':
      return parseRelationKey(item.source.relation).name
    case 'variable':
      return parseRelationKey(item.source.name).name
    case 'select':
      throw new SemanticError('A nested select in FROM needs an alias')
  }
}

function expandEmits(items: readonly EmitItem[], scope: Scope): Emitter[] {
  const names = new UniqueNames()

  const emitters: Emitter[] = []
  for (const item of items) {
    if (item.kind === 'star') {
      for (const index of scope.columnsOf(item.qualifier)) {
        emitters.push({ name: names.take(scope.scheme[index]?.name ?? `_COLUMN${emitters.length}_`), expression: column(index) })
      }
      continue
    }
    const expression = resolve(item.expression, scope)
    const name = item.alias ?? defaultName(item.expression, expression, scope, emitters.length)
    emitters.push({ name: names.take(name), expression })
  }
  return emitters
}

function defaultName(source: ScalarExpr, expr: Expression, scope: Scope, position: number): string {
  if (source.kind === 'name') return source.name
  if (expr.type === 'column') return scope.scheme[expr.index]?.name ?? `_COLUMN${position}_`
  if (expr.type === 'aggregate') {
    const operand = expr.operand?.type === 'column' ? scope.scheme[expr.operand.index]?.name : undefined
    return operand ? `${expr.fn.toLowerCase()}_${operand}` : expr.fn.toLowerCase()
  }
  return `_COLUMN${position}_`
}

function project(input: LogicalOperator, emitters: readonly Emitter[], inputScheme: Scheme): LogicalOperator {
  const identity =
    emitters.length === inputScheme.length &&
    emitters.every((e, i) => e.expression.type === 'column' && e.expression.index === i && e.name === inputScheme[i]?.name)
  return identity ? input : { op: 'Apply', emitters, input }
}

/**
 * Emitters with aggregates: non-aggregate emitters are the grouping keys.
 * Computed keys and aggregate arguments are evaluated by an Apply below
 * the GroupBy; an Apply above restores the emit order.
 */
function groupAndEmit(input: LogicalOperator, emitters: readonly Emitter[]): LogicalOperator {
  const needsPreApply = emitters.some((e) => {
    if (e.expression.type === 'aggregate') return e.expression.operand !== null && e.expression.operand.type !== 'column'
    if (containsAggregate(e.expression)) return false
    return e.expression.type !== 'column'
  })

  const pre: Emitter[] = []
  const slot = (name: string, expression: Expression): number => {
    if (needsPreApply) {
      pre.push({ name, expression })
      return pre.length - 1
    }
    if (expression.type !== 'column') throw new SemanticError(`Cannot group by ${name}`)
    return expression.index
  }

  const groupings: GroupingColumn[] = []
  const aggregates: AggregateColumn[] = []
  const layout: ({ group: number } | { agg: number })[] = []

  for (const emitter of emitters) {
    const expr = emitter.expression
    if (expr.type === 'aggregate') {
      const operand = expr.operand
      if (operand && containsAggregate(operand)) throw new SemanticError(`Nested aggregate in ${emitter.name}`)
      const columnIndex = operand === null ? null : slot(`${emitter.name}_arg`, operand)
      layout.push({ agg: aggregates.length })
      aggregates.push({ name: emitter.name, fn: expr.fn, column: columnIndex })
    } else if (containsAggregate(expr)) {
      throw new UnsupportedOperationError(`Expression over an aggregate in ${emitter.name}`)
    } else {
      layout.push({ group: groupings.length })
      groupings.push({ name: emitter.name, column: slot(emitter.name, expr) })
    }
  }

  const source: LogicalOperator = needsPreApply ? { op: 'Apply', emitters: pre, input } : input
  const groupBy: LogicalOperator = { op: 'GroupBy', groupings, aggregates, input: source }

  const positions = layout.map((entry) => ('group' in entry ? entry.group : groupings.length + entry.agg))
  if (positions.every((position, i) => position === i)) return groupBy
  const output = schemeOf(groupBy)
  return {
    op: 'Apply',
    emitters: positions.map((position, i) => ({ name: output[position]?.name ?? `_COLUMN${i}_`, expression: column(position) })),
    input: groupBy,
  }
}

// =============================================================================
// SCALAR RESOLUTION
// =============================================================================

function resolve(expr: ScalarExpr, scope: Scope): Expression {
  switch (expr.kind) {
    case 'name':
      return column(scope.resolveName(expr.name, expr.qualifier))
    case 'position':
      return column(scope.resolvePosition(expr.index, expr.qualifier))
    case 'literal':
      return literal(expr.value)
    case 'binary':
      return { type: 'binary', operator: expr.operator, left: resolve(expr.left, scope), right: resolve(expr.right, scope) }
    case 'not':
      return { type: 'not', operand: resolve(expr.operand, scope) }
    case 'call':
      return { type: 'aggregate', fn: expr.fn, operand: expr.argument ? resolve(expr.argument, scope) : null }
  }
}
