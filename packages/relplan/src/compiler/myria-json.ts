/**
 * Myria JSON codec
 *
 * Serializes a physical plan into the fragment list the clustered engine
 * executes. Operator ids are integers assigned from 0 in pre-order; every
 * exchange ends a fragment, its producer rooting a new fragment that is
 * listed before the fragment reading from it.
 */

import { physicalLabel } from '../algebra'
import type { Expression, PhysicalExchange, PhysicalOperator, RelationKey } from '../algebra'
import { UnsupportedOperationError } from '../errors'
import type { FragmentJson, OperatorJson } from '../executor/types'
import type { PhysicalPlan } from './plan'

const EXPRESSION_TYPES: Record<string, string> = {
  '=': 'EQUALS',
  '!=': 'NOT_EQUALS',
  '<': 'LESS_THAN',
  '<=': 'LESS_THAN_EQ',
  '>': 'GREATER_THAN',
  '>=': 'GREATER_THAN_EQ',
  AND: 'AND',
  OR: 'OR',
  '+': 'PLUS',
  '-': 'MINUS',
  '*': 'TIMES',
  '/': 'DIVIDE',
}

const EXCHANGE_TYPES = {
  shuffle: 'Shuffle',
  broadcast: 'Broadcast',
  collect: 'Collect',
  hypercube: 'HyperCubeShuffle',
} as const

export type ExpressionJson = { type: string } & Record<string, unknown>

export function expressionToJson(expr: Expression): ExpressionJson {
  switch (expr.type) {
    case 'column':
      return { type: 'VARIABLE', columnIdx: expr.index }
    case 'literal':
      return { type: 'CONSTANT', value: String(expr.value), valueType: expr.valueType }
    case 'binary': {
      const type = EXPRESSION_TYPES[expr.operator]
      if (!type) throw new UnsupportedOperationError(`Operator ${expr.operator} has no engine expression`)
      return { type, left: expressionToJson(expr.left), right: expressionToJson(expr.right) }
    }
    case 'not':
      return { type: 'NOT', operand: expressionToJson(expr.operand) }
    case 'aggregate':
      throw new UnsupportedOperationError(`Aggregate ${expr.fn} cannot appear in a scalar expression`)
  }
}

function relationKeyJson(key: RelationKey): { userName: string; programName: string; relationName: string } {
  return { userName: key.user, programName: key.program, relationName: key.name }
}

class FragmentBuilder {
  private nextId = 0
  readonly fragments: FragmentJson[] = []

  addFragment(root: PhysicalOperator): void {
    const operators: OperatorJson[] = []
    this.emit(root, operators)
    this.fragments.push({ operators })
  }

  /** Emit `op` and its subtree into `operators`, returning its id. */
  private emit(op: PhysicalOperator, operators: OperatorJson[]): number {
    const opId = this.nextId++
    const slot = operators.length

    if (op.kind === 'exchange') {
      const prefix = EXCHANGE_TYPES[op.mode]
      const producerId = this.addProducer(op)
      operators.splice(slot, 0, { opId, opName: op.consumer, opType: `${prefix}Consumer`, argOperatorId: producerId })
      return opId
    }

    // children are emitted first but listed after their parent
    const body = this.body(op, operators)
    operators.splice(slot, 0, { opId, opName: physicalLabel(op), ...body })
    return opId
  }

  /** The producer side of an exchange roots a fragment of its own. */
  private addProducer(op: PhysicalExchange): number {
    const operators: OperatorJson[] = []
    const opId = this.nextId++
    const argChild = this.emit(op.input, operators)
    const producer: OperatorJson = {
      opId,
      opName: physicalLabel(op),
      opType: `${EXCHANGE_TYPES[op.mode]}Producer`,
      argChild,
    }
    if (op.mode === 'shuffle') {
      producer.distributeFunction = { type: 'Hash', indexes: [...op.columns] }
    } else if (op.mode === 'hypercube' && op.hypercube) {
      producer.distributeFunction = {
        type: 'HyperCube',
        hashedColumns: [...op.columns],
        mappedHCDimensions: [...op.hypercube.mappedDimensions],
        hyperCubeDimensions: [...op.hypercube.dimensions],
      }
    }
    this.fragments.push({ operators: [producer, ...operators] })
    return opId
  }

  private body(
    op: Exclude<PhysicalOperator, PhysicalExchange>,
    operators: OperatorJson[],
  ): { opType: string } & Record<string, unknown> {
    const child = (input: PhysicalOperator): number => this.emit(input, operators)
    const columnNames = op.scheme.map((col) => col.name)

    switch (op.kind) {
      case 'scan':
        return { opType: 'TableScan', relationKey: relationKeyJson(op.relation) }
      case 'query-scan':
        return {
          opType: 'DbQueryScan',
          sql: op.sql,
          schema: { columnNames, columnTypes: op.scheme.map((col) => col.type) },
        }
      case 'select':
        return { opType: 'Filter', argChild: child(op.input), argPredicate: { rootExpressionOperator: expressionToJson(op.condition) } }
      case 'apply':
        return {
          opType: 'Apply',
          argChild: child(op.input),
          emitExpressions: op.emitters.map((e) => ({ outputName: e.name, rootExpressionOperator: expressionToJson(e.expression) })),
        }
      case 'hash-join':
      case 'cross-product': {
        const leftWidth = op.left.scheme.length
        const rightWidth = op.right.scheme.length
        return {
          opType: 'SymmetricHashJoin',
          argChild1: child(op.left),
          argChild2: child(op.right),
          argColumns1: op.kind === 'hash-join' ? [...op.leftKeys] : [],
          argColumns2: op.kind === 'hash-join' ? [...op.rightKeys] : [],
          argSelect1: Array.from({ length: leftWidth }, (_, i) => i),
          argSelect2: Array.from({ length: rightWidth }, (_, i) => i),
          argColumnNames: columnNames,
        }
      }
      case 'multiway-join':
        return {
          opType: 'LeapFrogJoin',
          argChildren: op.inputs.map(child),
          joinFieldMapping: op.joinFields.map((fields) => fields.map((f) => [f.input, f.column])),
          outputFieldMapping: op.inputs.flatMap((input, i) => input.scheme.map((_, c) => [i, c])),
          argColumnNames: columnNames,
        }
      case 'group-by': {
        const aggregators = op.aggregates.map((a) =>
          a.column === null ? { type: 'CountAll' } : { type: 'SingleColumn', column: a.column, aggOps: [a.fn] },
        )
        const argChild = child(op.input)
        return op.groupings.length > 0
          ? { opType: 'MultiGroupByAggregate', argChild, argGroupFields: op.groupings.map((g) => g.column), aggregators }
          : { opType: 'Aggregate', argChild, aggregators }
      }
      case 'distinct':
        return { opType: 'DupElim', argChild: child(op.input) }
      case 'union-all':
        return { opType: 'UnionAll', argChildren: op.inputs.map(child) }
      case 'store':
        return {
          opType: 'DbInsert',
          argChild: child(op.input),
          relationKey: relationKeyJson(op.relation),
          argOverwriteTable: true,
        }
    }
  }
}

export function compileFragments(plan: PhysicalPlan): FragmentJson[] {
  const builder = new FragmentBuilder()
  for (const rule of plan.rules) builder.addFragment(rule.plan)
  return builder.fragments
}
