/**
 * MyriaL / SQL syntax tree
 */

import type { AggregateFunction, BinaryOperator } from '../../algebra'

export type Dialect = 'myrial' | 'sql'

export type ScalarExpr =
  | { kind: 'name'; qualifier?: string; name: string }
  | { kind: 'position'; qualifier?: string; index: number }
  | { kind: 'literal'; value: string | number | boolean }
  | { kind: 'binary'; operator: BinaryOperator; left: ScalarExpr; right: ScalarExpr }
  | { kind: 'not'; operand: ScalarExpr }
  | { kind: 'call'; fn: AggregateFunction; argument: ScalarExpr | null }

export type EmitItem =
  | { kind: 'star'; qualifier?: string }
  | { kind: 'expr'; expression: ScalarExpr; alias?: string }

export type RelationExpr =
  | { kind: 'scan'; relation: string }
  | { kind: 'variable'; name: string }
  | SelectExpr

export interface FromItem {
  source: RelationExpr
  alias?: string
}

export interface SelectExpr {
  kind: 'select'
  distinct: boolean
  emits: EmitItem[]
  from: FromItem[]
  where: ScalarExpr | null
}

export type Statement =
  | { kind: 'assign'; target: string; value: RelationExpr; line: number }
  | { kind: 'store'; source: string; relation: string; line: number }
