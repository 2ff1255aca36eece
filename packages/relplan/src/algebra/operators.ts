/**
 * Logical operator helpers.
 */

import { aggregateType, typeOf } from './expression'
import type { Column, LogicalOperator, Scheme } from './types'

/**
 * Output scheme of a logical operator.
 */
export function schemeOf(op: LogicalOperator): Scheme {
  switch (op.op) {
    case 'Scan':
      return op.scheme
    case 'Select':
    case 'Distinct':
      return schemeOf(op.input)
    case 'Apply': {
      const input = schemeOf(op.input)
      return op.emitters.map((e) => ({ name: e.name, type: typeOf(e.expression, input) }))
    }
    case 'Join':
    case 'CrossProduct':
      return [...schemeOf(op.left), ...schemeOf(op.right)]
    case 'GroupBy': {
      const input = schemeOf(op.input)
      const groups: Column[] = op.groupings.map((g) => ({ name: g.name, type: columnType(input, g.column) }))
      const aggs: Column[] = op.aggregates.map((a) => ({
        name: a.name,
        type: aggregateType(a.fn, a.column === null ? null : columnType(input, a.column)),
      }))
      return [...groups, ...aggs]
    }
    case 'UnionAll': {
      const [first] = op.inputs
      return first ? schemeOf(first) : []
    }
  }
}

export function childrenOf(op: LogicalOperator): readonly LogicalOperator[] {
  switch (op.op) {
    case 'Scan':
      return []
    case 'Select':
    case 'Apply':
    case 'GroupBy':
    case 'Distinct':
      return [op.input]
    case 'Join':
    case 'CrossProduct':
      return [op.left, op.right]
    case 'UnionAll':
      return op.inputs
  }
}

/**
 * Every operator in the tree, parents before children.
 */
export function walk(op: LogicalOperator): LogicalOperator[] {
  return [op, ...childrenOf(op).flatMap(walk)]
}

function columnType(scheme: Scheme, index: number): Column['type'] {
  return scheme[index]?.type ?? 'LONG_TYPE'
}
