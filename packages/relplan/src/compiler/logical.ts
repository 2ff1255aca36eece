/**
 * Logical Plan Optimizer
 *
 * Splits selections into conjuncts and pushes each one as far down as it
 * can go: into one side of a join or cross product when it only reads that
 * side, or into the join condition when it reads both. A cross product
 * that gains a condition becomes a join.
 */

import { conjunction, conjuncts, referencedColumns, schemeOf, shiftColumns } from '../algebra'
import type { Expression, LogicalOperator } from '../algebra'
import type { LogicalRule } from '../grammar'

export function optimizeLogical(op: LogicalOperator): LogicalOperator {
  return push(op, [])
}

export function optimizeRules(rules: readonly LogicalRule[]): LogicalRule[] {
  return rules.map((rule) => ({ ...rule, plan: optimizeLogical(rule.plan) }))
}

function select(conditions: readonly Expression[], input: LogicalOperator): LogicalOperator {
  const condition = conjunction(conditions)
  return condition ? { op: 'Select', condition, input } : input
}

/**
 * Rewrite `op` with `pending` conditions (over `op`'s output) applied.
 */
function push(op: LogicalOperator, pending: readonly Expression[]): LogicalOperator {
  switch (op.op) {
    case 'Select':
      return push(op.input, [...pending, ...conjuncts(op.condition)])

    case 'Join':
    case 'CrossProduct': {
      const candidates = op.op === 'Join' ? [...pending, ...conjuncts(op.condition)] : [...pending]
      const width = schemeOf(op.left).length
      const leftConds: Expression[] = []
      const rightConds: Expression[] = []
      const joinConds: Expression[] = []
      const above: Expression[] = []

      for (const cond of candidates) {
        const cols = referencedColumns(cond)
        if (cols.length === 0) above.push(cond)
        else if (cols.every((c) => c < width)) leftConds.push(cond)
        else if (cols.every((c) => c >= width)) rightConds.push(shiftColumns(cond, -width))
        else joinConds.push(cond)
      }

      const left = push(op.left, leftConds)
      const right = push(op.right, rightConds)
      const condition = conjunction(joinConds)
      const joined: LogicalOperator = condition
        ? { op: 'Join', condition, left, right }
        : { op: 'CrossProduct', left, right }
      return select(above, joined)
    }

    case 'Apply':
    case 'GroupBy':
    case 'Distinct':
      return select(pending, { ...op, input: push(op.input, []) })

    case 'UnionAll':
      return select(pending, { ...op, inputs: op.inputs.map((input) => push(input, [])) })

    case 'Scan':
      return select(pending, op)
  }
}
