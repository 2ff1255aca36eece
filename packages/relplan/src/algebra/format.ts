/**
 * Plan rendering
 *
 * Operators render as `Label(args)[child,child]`; a plan renders as one
 * `name = operator` line per rule.
 */

import { formatExpression } from './expression'
import { formatRelationKey } from './relation'
import type {
  AggregateColumn,
  Emitter,
  GroupingColumn,
  LogicalOperator,
  PhysicalOperator,
  Rule,
} from './types'

function formatEmitters(emitters: readonly Emitter[]): string {
  return emitters.map((e) => `${e.name}=${formatExpression(e.expression)}`).join(',')
}

function formatGrouping(groupings: readonly GroupingColumn[], aggregates: readonly AggregateColumn[]): string {
  const groups = groupings.map((g) => `${g.name}=$${g.column}`).join(',')
  const aggs = aggregates
    .map((a) => `${a.name}=${a.fn}(${a.column === null ? '*' : `$${a.column}`})`)
    .join(',')
  return `${groups}; ${aggs}`
}

function withChildren(label: string, children: readonly string[]): string {
  return children.length === 0 ? label : `${label}[${children.join(',')}]`
}

/**
 * Operator label without its children.
 */
export function logicalLabel(op: LogicalOperator): string {
  switch (op.op) {
    case 'Scan':
      return `Scan(${formatRelationKey(op.relation)})`
    case 'Select':
      return `Select(${formatExpression(op.condition)})`
    case 'Apply':
      return `Apply(${formatEmitters(op.emitters)})`
    case 'Join':
      return `Join(${formatExpression(op.condition)})`
    case 'GroupBy':
      return `GroupBy(${formatGrouping(op.groupings, op.aggregates)})`
    case 'CrossProduct':
    case 'Distinct':
    case 'UnionAll':
      return op.op
  }
}

export function formatLogical(op: LogicalOperator): string {
  switch (op.op) {
    case 'Scan':
      return logicalLabel(op)
    case 'Select':
    case 'Apply':
    case 'GroupBy':
    case 'Distinct':
      return withChildren(logicalLabel(op), [formatLogical(op.input)])
    case 'Join':
    case 'CrossProduct':
      return withChildren(logicalLabel(op), [formatLogical(op.left), formatLogical(op.right)])
    case 'UnionAll':
      return withChildren(logicalLabel(op), op.inputs.map(formatLogical))
  }
}

export function physicalLabel(op: PhysicalOperator): string {
  switch (op.kind) {
    case 'scan':
    case 'store':
      return `${op.name}(${formatRelationKey(op.relation)})`
    case 'query-scan':
      return `${op.name}(${op.sql})`
    case 'select':
      return `${op.name}(${formatExpression(op.condition)})`
    case 'apply':
      return `${op.name}(${formatEmitters(op.emitters)})`
    case 'hash-join': {
      const pairs = op.leftKeys.map((key, i) => `$${key}=$${op.rightKeys[i] ?? key}`)
      return `${op.name}(${pairs.join(',')})`
    }
    case 'multiway-join': {
      const fields = op.joinFields.map((set) => `[${set.map((f) => `${f.input}.$${f.column}`).join(',')}]`)
      return `${op.name}(${fields.join(';')})`
    }
    case 'group-by':
      return `${op.name}(${formatGrouping(op.groupings, op.aggregates)})`
    case 'cross-product':
    case 'distinct':
    case 'union-all':
      return op.name
    case 'exchange': {
      const hashed = op.columns.map((c) => `$${c}`).join(',')
      if (op.mode === 'hypercube' && op.hypercube) {
        return `${op.producer}(h(${hashed}); dims=${op.hypercube.dimensions.join('x')})`
      }
      return op.mode === 'shuffle' ? `${op.producer}(h(${hashed}))` : op.producer
    }
  }
}

export function physicalChildren(op: PhysicalOperator): readonly PhysicalOperator[] {
  switch (op.kind) {
    case 'scan':
    case 'query-scan':
      return []
    case 'select':
    case 'apply':
    case 'group-by':
    case 'distinct':
    case 'store':
    case 'exchange':
      return [op.input]
    case 'hash-join':
    case 'cross-product':
      return [op.left, op.right]
    case 'multiway-join':
    case 'union-all':
      return op.inputs
  }
}

export function formatPhysical(op: PhysicalOperator): string {
  const children = physicalChildren(op).map(formatPhysical)
  if (op.kind === 'exchange') {
    // consumer wraps producer: Consumer[Producer(...)[child]]
    return withChildren(op.consumer, [withChildren(physicalLabel(op), children)])
  }
  return withChildren(physicalLabel(op), children)
}

export function formatRules<TPlan>(rules: readonly Rule<TPlan>[], format: (plan: TPlan) => string): string {
  return rules.map((rule) => `${rule.name} = ${format(rule.plan)}`).join('\n')
}
