/**
 * Physical Lowering
 *
 * Maps logical rules onto the operators of one target algebra.
 *
 * - myria-left-deep: binary hash joins over hash shuffles, broadcast cross
 *   products, shuffled (or collected) aggregates and duplicate elimination
 * - myria-hypercube: every join tree becomes one multiway join fed by
 *   hypercube shuffles
 * - clang / grappa: one code-generation operator per logical operator,
 *   no data movement
 */

import {
  conjunction,
  conjuncts,
  equiJoinPair,
  schemeOf,
  shiftColumns,
} from '../algebra'
import type {
  Expression,
  ExchangeMode,
  JoinField,
  LogicalOperator,
  PhysicalExchange,
  PhysicalOperator,
  PhysicalStore,
  Rule,
  Scheme,
} from '../algebra'
import type { LogicalRule } from '../grammar'
import { PhysicalPlan } from './plan'
import { pushDownSql } from './sql'
import { isMyriaAlgebra } from './target'
import type { TargetAlgebra } from './target'

// =============================================================================
// OPERATOR NAMES
// =============================================================================

type NamedKind = Exclude<PhysicalOperator['kind'], 'exchange'>

const MYRIA_NAMES: Record<NamedKind, string> = {
  scan: 'MyriaScan',
  'query-scan': 'MyriaQueryScan',
  select: 'MyriaSelect',
  apply: 'MyriaApply',
  'hash-join': 'MyriaSymmetricHashJoin',
  'cross-product': 'MyriaCrossProduct',
  'multiway-join': 'MyriaLeapFrogJoin',
  'group-by': 'MyriaGroupBy',
  distinct: 'MyriaDupElim',
  'union-all': 'MyriaUnionAll',
  store: 'MyriaStore',
}

const CLANG_NAMES: Record<NamedKind, string> = {
  scan: 'CFileScan',
  'query-scan': 'CFileScan',
  select: 'CSelect',
  apply: 'CApply',
  'hash-join': 'CHashJoin',
  'cross-product': 'CCrossProduct',
  'multiway-join': 'CHashJoin',
  'group-by': 'CGroupBy',
  distinct: 'CDistinct',
  'union-all': 'CUnionAll',
  store: 'CStore',
}

const GRAPPA_NAMES: Record<NamedKind, string> = {
  scan: 'GrappaFileScan',
  'query-scan': 'GrappaFileScan',
  select: 'GrappaSelect',
  apply: 'GrappaApply',
  'hash-join': 'GrappaShuffleHashJoin',
  'cross-product': 'GrappaCrossProduct',
  'multiway-join': 'GrappaShuffleHashJoin',
  'group-by': 'GrappaGroupBy',
  distinct: 'GrappaDistinct',
  'union-all': 'GrappaUnionAll',
  store: 'GrappaStore',
}

const EXCHANGE_NAMES: Record<ExchangeMode, { producer: string; consumer: string }> = {
  shuffle: { producer: 'MyriaShuffleProducer', consumer: 'MyriaShuffleConsumer' },
  broadcast: { producer: 'MyriaBroadcastProducer', consumer: 'MyriaBroadcastConsumer' },
  collect: { producer: 'MyriaCollectProducer', consumer: 'MyriaCollectConsumer' },
  hypercube: { producer: 'MyriaHyperCubeShuffleProducer', consumer: 'MyriaHyperCubeShuffleConsumer' },
}

function namesFor(algebra: TargetAlgebra): Record<NamedKind, string> {
  switch (algebra) {
    case 'myria-left-deep':
    case 'myria-hypercube':
      return MYRIA_NAMES
    case 'clang':
      return CLANG_NAMES
    case 'grappa':
      return GRAPPA_NAMES
  }
}

// =============================================================================
// LOWERING
// =============================================================================

export interface LoweringOptions {
  /** Live servers; sizes hypercube dimensions */
  numServers: number
  /** Push Select/Apply chains over a scan into the storage layer as SQL */
  pushSql: boolean
}

export function lowerPlan(
  rules: readonly LogicalRule[],
  algebra: TargetAlgebra,
  options: LoweringOptions,
): PhysicalPlan {
  const lowering = new Lowering(algebra, options)
  const physical = rules.map((rule): Rule<PhysicalStore> => ({ ...rule, plan: lowering.store(rule) }))
  return new PhysicalPlan(algebra, physical)
}

/**
 * Split `width`-column join conditions into key pairs and residual terms.
 */
function splitJoinCondition(
  condition: Expression | null,
  leftWidth: number,
): { leftKeys: number[]; rightKeys: number[]; residual: Expression[] } {
  const leftKeys: number[] = []
  const rightKeys: number[] = []
  const residual: Expression[] = []
  for (const term of condition ? conjuncts(condition) : []) {
    const pair = equiJoinPair(term)
    if (pair && pair[0] < leftWidth && pair[1] >= leftWidth) {
      leftKeys.push(pair[0])
      rightKeys.push(pair[1] - leftWidth)
    } else if (pair && pair[1] < leftWidth && pair[0] >= leftWidth) {
      leftKeys.push(pair[1])
      rightKeys.push(pair[0] - leftWidth)
    } else {
      residual.push(term)
    }
  }
  return { leftKeys, rightKeys, residual }
}

function allColumns(scheme: Scheme): number[] {
  return scheme.map((_, i) => i)
}

class Lowering {
  private readonly names: Record<NamedKind, string>
  private readonly myria: boolean

  constructor(
    private readonly algebra: TargetAlgebra,
    private readonly options: LoweringOptions,
  ) {
    this.names = namesFor(algebra)
    this.myria = isMyriaAlgebra(algebra)
  }

  store(rule: LogicalRule): PhysicalStore {
    const input = this.lower(rule.plan)
    return { kind: 'store', name: this.names.store, relation: rule.relation, scheme: input.scheme, input }
  }

  private lower(op: LogicalOperator): PhysicalOperator {
    if (this.myria && this.options.pushSql) {
      const pushed = pushDownSql(op)
      if (pushed) {
        return { kind: 'query-scan', name: this.names['query-scan'], ...pushed }
      }
    }

    const scheme = schemeOf(op)
    switch (op.op) {
      case 'Scan':
        return { kind: 'scan', name: this.names.scan, relation: op.relation, scheme }
      case 'Select':
        return { kind: 'select', name: this.names.select, condition: op.condition, scheme, input: this.lower(op.input) }
      case 'Apply':
        return { kind: 'apply', name: this.names.apply, emitters: op.emitters, scheme, input: this.lower(op.input) }
      case 'Join':
      case 'CrossProduct':
        return this.algebra === 'myria-hypercube' ? this.lowerMultiway(op) : this.lowerBinaryJoin(op)
      case 'GroupBy': {
        let input = this.lower(op.input)
        if (this.myria) {
          input =
            op.groupings.length > 0
              ? this.exchange('shuffle', input, op.groupings.map((g) => g.column))
              : this.exchange('collect', input, [])
        }
        return {
          kind: 'group-by',
          name: this.names['group-by'],
          groupings: op.groupings,
          aggregates: op.aggregates,
          scheme,
          input,
        }
      }
      case 'Distinct': {
        let input = this.lower(op.input)
        if (this.myria) input = this.exchange('shuffle', input, allColumns(input.scheme))
        return { kind: 'distinct', name: this.names.distinct, scheme, input }
      }
      case 'UnionAll':
        return { kind: 'union-all', name: this.names['union-all'], scheme, inputs: op.inputs.map((i) => this.lower(i)) }
    }
  }

  private exchange(
    mode: ExchangeMode,
    input: PhysicalOperator,
    columns: readonly number[],
    hypercube?: PhysicalExchange['hypercube'],
  ): PhysicalExchange {
    const { producer, consumer } = EXCHANGE_NAMES[mode]
    const exchange: PhysicalExchange = { kind: 'exchange', mode, producer, consumer, columns, scheme: input.scheme, input }
    return hypercube ? { ...exchange, hypercube } : exchange
  }

  private lowerBinaryJoin(op: Extract<LogicalOperator, { op: 'Join' | 'CrossProduct' }>): PhysicalOperator {
    const scheme = schemeOf(op)
    const width = schemeOf(op.left).length
    const { leftKeys, rightKeys, residual } = splitJoinCondition(op.op === 'Join' ? op.condition : null, width)
    let left = this.lower(op.left)
    let right = this.lower(op.right)

    let joined: PhysicalOperator
    if (leftKeys.length > 0) {
      if (this.myria) {
        left = this.exchange('shuffle', left, leftKeys)
        right = this.exchange('shuffle', right, rightKeys)
      }
      joined = { kind: 'hash-join', name: this.names['hash-join'], leftKeys, rightKeys, scheme, left, right }
    } else {
      if (this.myria) right = this.exchange('broadcast', right, [])
      joined = { kind: 'cross-product', name: this.names['cross-product'], scheme, left, right }
    }

    const condition = conjunction(residual)
    return condition ? { kind: 'select', name: this.names.select, condition, scheme, input: joined } : joined
  }

  /**
   * One multiway join over the leaves of a join tree. Equality terms between
   * different inputs form the join variables; each variable gets one cube
   * dimension. Remaining terms are applied above the join.
   */
  private lowerMultiway(op: Extract<LogicalOperator, { op: 'Join' | 'CrossProduct' }>): PhysicalOperator {
    const scheme = schemeOf(op)
    const leaves: LogicalOperator[] = []
    const terms: Expression[] = []
    flattenJoins(op, 0, leaves, terms)

    // global column -> (input, local column)
    const owners: JoinField[] = leaves.flatMap((leaf, input) =>
      schemeOf(leaf).map((_, column) => ({ input, column })),
    )

    const classes = new UnionFind(owners.length)
    const residual: Expression[] = []
    for (const term of terms) {
      const pair = equiJoinPair(term)
      const a = pair ? owners[pair[0]] : undefined
      const b = pair ? owners[pair[1]] : undefined
      if (pair && a && b && a.input !== b.input) classes.union(pair[0], pair[1])
      else residual.push(term)
    }

    const joinFields: JoinField[][] = classes
      .groups()
      .filter((group) => group.length > 1)
      .map((group) => group.flatMap((global) => owners[global] ?? []))

    if (joinFields.length === 0) {
      // no join variable to hash on: behave like the left-deep plan
      return this.lowerBinaryJoin(op)
    }
    const inputs = leaves.map((leaf) => this.lower(leaf))

    const dimensions = hypercubeDimensions(this.options.numServers, joinFields.length)
    const shuffled = inputs.map((input, index) => {
      const columns: number[] = []
      const mappedDimensions: number[] = []
      joinFields.forEach((fields, dimension) => {
        for (const field of fields) {
          if (field.input === index) {
            columns.push(field.column)
            mappedDimensions.push(dimension)
          }
        }
      })
      return this.exchange('hypercube', input, columns, { dimensions, mappedDimensions })
    })

    const joined: PhysicalOperator = {
      kind: 'multiway-join',
      name: this.names['multiway-join'],
      joinFields,
      scheme,
      inputs: shuffled,
    }
    const condition = conjunction(residual)
    return condition ? { kind: 'select', name: this.names.select, condition, scheme, input: joined } : joined
  }
}

/**
 * Collect the non-join leaves of a join tree in order, and its conditions
 * over the concatenation of all leaves.
 */
function flattenJoins(op: LogicalOperator, offset: number, leaves: LogicalOperator[], terms: Expression[]): void {
  if (op.op !== 'Join' && op.op !== 'CrossProduct') {
    leaves.push(op)
    return
  }
  if (op.op === 'Join') {
    for (const term of conjuncts(op.condition)) {
      terms.push(shiftColumns(term, offset))
    }
  }
  flattenJoins(op.left, offset, leaves, terms)
  flattenJoins(op.right, offset + schemeOf(op.left).length, leaves, terms)
}

/**
 * Split `servers` across `variables` dimensions: every dimension gets the
 * integer root, then dimensions grow one at a time while the product still
 * fits.
 */
export function hypercubeDimensions(servers: number, variables: number): number[] {
  const total = Math.max(1, Math.floor(servers))
  let base = 1
  while ((base + 1) ** variables <= total) base++
  const dimensions = Array.from({ length: variables }, () => base)
  let product = base ** variables
  for (let i = 0; i < variables; i++) {
    const current = dimensions[i] ?? base
    const grown = (product / current) * (current + 1)
    if (grown <= total) {
      dimensions[i] = current + 1
      product = grown
    }
  }
  return dimensions
}

class UnionFind {
  private readonly parent: number[]

  constructor(size: number) {
    this.parent = Array.from({ length: size }, (_, i) => i)
  }

  find(x: number): number {
    let root = x
    while ((this.parent[root] ?? root) !== root) root = this.parent[root] ?? root
    this.parent[x] = root
    return root
  }

  union(a: number, b: number): void {
    const ra = this.find(a)
    const rb = this.find(b)
    if (ra !== rb) this.parent[Math.max(ra, rb)] = Math.min(ra, rb)
  }

  /** Members of each set, sets ordered by their smallest member */
  groups(): number[][] {
    const byRoot = new Map<number, number[]>()
    this.parent.forEach((_, x) => {
      const root = this.find(x)
      const group = byRoot.get(root)
      if (group) group.push(x)
      else byRoot.set(root, [x])
    })
    return [...byRoot.values()]
  }
}
