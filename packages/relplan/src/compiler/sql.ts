/**
 * SQL push-down
 *
 * A chain of selections and projections over a single scan can run inside
 * the storage layer of each worker. The chain is compiled to one SELECT
 * statement, reading the stored relation under the alias `rel0`.
 */

import { formatLiteral, formatRelationKey, schemeOf } from '../algebra'
import type { Expression, LogicalOperator, RelationKey, ScanOperator, Scheme } from '../algebra'

export interface PushedQuery {
  sql: string
  relations: RelationKey[]
  scheme: Scheme
}

const SQL_OPERATORS: Record<string, string> = {
  '=': '=',
  '!=': '<>',
  '<': '<',
  '<=': '<=',
  '>': '>',
  '>=': '>=',
  '+': '+',
  '-': '-',
  '*': '*',
  '/': '/',
  AND: 'AND',
  OR: 'OR',
}

export function quoteIdentifier(name: string): string {
  return `"${name.replace(/"/g, '""')}"`
}

/**
 * Compile `op` to SQL when it is at least one Select or Apply over a Scan
 * with nothing else in between. Returns null for any other shape.
 */
export function pushDownSql(op: LogicalOperator): PushedQuery | null {
  const chain: LogicalOperator[] = []
  let current = op
  while (current.op === 'Select' || current.op === 'Apply') {
    chain.push(current)
    current = current.input
  }
  if (current.op !== 'Scan' || chain.length === 0) return null
  const scan: ScanOperator = current

  const alias = 'rel0'
  let columns = scan.scheme.map((col) => `${alias}.${quoteIdentifier(col.name)}`)
  const where: string[] = []

  for (const node of chain.reverse()) {
    if (node.op === 'Select') {
      const condition = toSql(node.condition, columns)
      if (condition === null) return null
      where.push(condition)
    } else if (node.op === 'Apply') {
      const next: string[] = []
      for (const emitter of node.emitters) {
        const expr = toSql(emitter.expression, columns)
        if (expr === null) return null
        next.push(expr)
      }
      columns = next
    }
  }

  const scheme = schemeOf(op)
  const selectList = columns.map((expr, i) => {
    const name = scheme[i]?.name ?? `_COLUMN${i}_`
    return expr === `${alias}.${quoteIdentifier(name)}` ? expr : `${expr} AS ${quoteIdentifier(name)}`
  })

  let sql = `SELECT ${selectList.join(', ')} FROM ${quoteIdentifier(formatRelationKey(scan.relation))} AS ${alias}`
  if (where.length > 0) sql += ` WHERE ${where.join(' AND ')}`
  return { sql, relations: [scan.relation], scheme }
}

/**
 * SQL text of an expression whose column `$i` is `columns[i]`. Aggregates
 * are not pushed; they yield null.
 */
function toSql(expr: Expression, columns: readonly string[]): string | null {
  switch (expr.type) {
    case 'column':
      return columns[expr.index] ?? null
    case 'literal':
      return typeof expr.value === 'boolean' ? (expr.value ? 'TRUE' : 'FALSE') : formatLiteral(expr.value)
    case 'binary': {
      const left = toSql(expr.left, columns)
      const right = toSql(expr.right, columns)
      const operator = SQL_OPERATORS[expr.operator]
      if (left === null || right === null || !operator) return null
      return `(${left} ${operator} ${right})`
    }
    case 'not': {
      const operand = toSql(expr.operand, columns)
      return operand === null ? null : `(NOT ${operand})`
    }
    case 'aggregate':
      return null
  }
}
