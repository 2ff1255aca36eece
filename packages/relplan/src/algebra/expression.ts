/**
 * Expression helpers: rendering, typing and column rewriting.
 */

import { TypeMismatchError } from '../errors'
import type {
  AggregateFunction,
  BinaryOperator,
  ColumnType,
  Expression,
  Literal,
  Scheme,
} from './types'

const COMPARISONS = new Set<BinaryOperator>(['=', '!=', '<', '<=', '>', '>='])
const ARITHMETIC = new Set<BinaryOperator>(['+', '-', '*', '/'])
const NUMERIC = new Set<ColumnType>(['LONG_TYPE', 'INT_TYPE', 'DOUBLE_TYPE', 'FLOAT_TYPE'])

// =============================================================================
// CONSTRUCTORS
// =============================================================================

export function column(index: number): Expression {
  return { type: 'column', index }
}

export function literal(value: string | number | boolean): Literal {
  if (typeof value === 'string') return { type: 'literal', value, valueType: 'STRING_TYPE' }
  if (typeof value === 'boolean') return { type: 'literal', value, valueType: 'BOOLEAN_TYPE' }
  return { type: 'literal', value, valueType: Number.isInteger(value) ? 'LONG_TYPE' : 'DOUBLE_TYPE' }
}

export function binary(operator: BinaryOperator, left: Expression, right: Expression): Expression {
  return { type: 'binary', operator, left, right }
}

export function isComparison(operator: BinaryOperator): boolean {
  return COMPARISONS.has(operator)
}

export function isNumericType(type: ColumnType): boolean {
  return NUMERIC.has(type)
}

// =============================================================================
// RENDERING
// =============================================================================

export function formatLiteral(value: string | number | boolean): string {
  if (typeof value === 'string') return `'${value.replace(/'/g, "''")}'`
  return String(value)
}

export function formatExpression(expr: Expression): string {
  switch (expr.type) {
    case 'column':
      return `$${expr.index}`
    case 'literal':
      return formatLiteral(expr.value)
    case 'binary':
      return `(${formatExpression(expr.left)} ${expr.operator} ${formatExpression(expr.right)})`
    case 'not':
      return `(NOT ${formatExpression(expr.operand)})`
    case 'aggregate':
      return `${expr.fn}(${expr.operand ? formatExpression(expr.operand) : '*'})`
  }
}

// =============================================================================
// STRUCTURE
// =============================================================================

/**
 * Split a condition into its top-level AND terms.
 */
export function conjuncts(expr: Expression): Expression[] {
  if (expr.type === 'binary' && expr.operator === 'AND') {
    return [...conjuncts(expr.left), ...conjuncts(expr.right)]
  }
  return [expr]
}

export function conjunction(terms: readonly Expression[]): Expression | null {
  const [first, ...rest] = terms
  if (!first) return null
  return rest.reduce((acc, term) => binary('AND', acc, term), first)
}

export function referencedColumns(expr: Expression): number[] {
  switch (expr.type) {
    case 'column':
      return [expr.index]
    case 'literal':
      return []
    case 'binary':
      return [...referencedColumns(expr.left), ...referencedColumns(expr.right)]
    case 'not':
      return referencedColumns(expr.operand)
    case 'aggregate':
      return expr.operand ? referencedColumns(expr.operand) : []
  }
}

export function containsAggregate(expr: Expression): boolean {
  switch (expr.type) {
    case 'aggregate':
      return true
    case 'binary':
      return containsAggregate(expr.left) || containsAggregate(expr.right)
    case 'not':
      return containsAggregate(expr.operand)
    default:
      return false
  }
}

/**
 * Rewrite every column reference through `mapping`.
 */
export function remapColumns(expr: Expression, mapping: (index: number) => number): Expression {
  switch (expr.type) {
    case 'column':
      return { type: 'column', index: mapping(expr.index) }
    case 'literal':
      return expr
    case 'binary':
      return { ...expr, left: remapColumns(expr.left, mapping), right: remapColumns(expr.right, mapping) }
    case 'not':
      return { type: 'not', operand: remapColumns(expr.operand, mapping) }
    case 'aggregate':
      return { ...expr, operand: expr.operand ? remapColumns(expr.operand, mapping) : null }
  }
}

export function shiftColumns(expr: Expression, offset: number): Expression {
  return remapColumns(expr, (index) => index + offset)
}

/**
 * If the expression is `$a = $b`, return the two column indexes.
 */
export function equiJoinPair(expr: Expression): [number, number] | null {
  if (
    expr.type === 'binary' &&
    expr.operator === '=' &&
    expr.left.type === 'column' &&
    expr.right.type === 'column'
  ) {
    return [expr.left.index, expr.right.index]
  }
  return null
}

// =============================================================================
// TYPING
// =============================================================================

export function aggregateType(fn: AggregateFunction, operandType: ColumnType | null): ColumnType {
  if (fn === 'COUNT') return 'LONG_TYPE'
  if (fn === 'AVG') return 'DOUBLE_TYPE'
  return operandType ?? 'LONG_TYPE'
}

/**
 * Infer the type of an expression over `scheme`, rejecting operand types
 * the operator cannot combine.
 */
export function typeOf(expr: Expression, scheme: Scheme): ColumnType {
  switch (expr.type) {
    case 'column': {
      const col = scheme[expr.index]
      if (!col) {
        throw new TypeMismatchError(`$${expr.index}`, `a column below ${scheme.length}`, 'out of range')
      }
      return col.type
    }
    case 'literal':
      return expr.valueType
    case 'not': {
      expectType(expr, typeOf(expr.operand, scheme), 'BOOLEAN_TYPE')
      return 'BOOLEAN_TYPE'
    }
    case 'aggregate': {
      const operandType = expr.operand ? typeOf(expr.operand, scheme) : null
      if (operandType && expr.fn !== 'COUNT' && expr.fn !== 'MIN' && expr.fn !== 'MAX' && !isNumericType(operandType)) {
        throw new TypeMismatchError(formatExpression(expr), 'a numeric operand', operandType)
      }
      return aggregateType(expr.fn, operandType)
    }
    case 'binary': {
      const left = typeOf(expr.left, scheme)
      const right = typeOf(expr.right, scheme)
      if (expr.operator === 'AND' || expr.operator === 'OR') {
        expectType(expr, left, 'BOOLEAN_TYPE')
        expectType(expr, right, 'BOOLEAN_TYPE')
        return 'BOOLEAN_TYPE'
      }
      if (ARITHMETIC.has(expr.operator)) {
        if (!isNumericType(left)) throw new TypeMismatchError(formatExpression(expr), 'a numeric operand', left)
        if (!isNumericType(right)) throw new TypeMismatchError(formatExpression(expr), 'a numeric operand', right)
        if (expr.operator === '/' || left === 'DOUBLE_TYPE' || right === 'DOUBLE_TYPE') return 'DOUBLE_TYPE'
        if (left === 'FLOAT_TYPE' || right === 'FLOAT_TYPE') return 'FLOAT_TYPE'
        return 'LONG_TYPE'
      }
      if (left !== right && !(isNumericType(left) && isNumericType(right))) {
        throw new TypeMismatchError(formatExpression(expr), left, right)
      }
      return 'BOOLEAN_TYPE'
    }
  }
}

function expectType(expr: Expression, actual: ColumnType, expected: ColumnType): void {
  if (actual !== expected) {
    throw new TypeMismatchError(formatExpression(expr), expected, actual)
  }
}
