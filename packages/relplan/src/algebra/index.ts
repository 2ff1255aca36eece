/**
 * Algebra Module
 *
 * Relation keys, schemes, expressions and the logical/physical operator trees
 * shared by every language front-end and target algebra.
 */

export type {
  ColumnType,
  Column,
  Scheme,
  RelationKey,
  ComparisonOperator,
  ArithmeticOperator,
  BinaryOperator,
  AggregateFunction,
  ColumnRef,
  Literal,
  BinaryExpression,
  NotExpression,
  AggregateExpression,
  Expression,
  Emitter,
  GroupingColumn,
  AggregateColumn,
  ScanOperator,
  SelectOperator,
  ApplyOperator,
  JoinOperator,
  CrossProductOperator,
  GroupByOperator,
  DistinctOperator,
  UnionAllOperator,
  LogicalOperator,
  Rule,
  PhysicalScan,
  PhysicalQueryScan,
  PhysicalSelect,
  PhysicalApply,
  PhysicalHashJoin,
  PhysicalCrossProduct,
  JoinField,
  PhysicalMultiwayJoin,
  PhysicalGroupBy,
  PhysicalDistinct,
  PhysicalUnionAll,
  PhysicalStore,
  ExchangeMode,
  HyperCubeLayout,
  PhysicalExchange,
  PhysicalOperator,
} from './types'

export { parseRelationKey, formatRelationKey, relationKeyEquals, DEFAULT_USER, DEFAULT_PROGRAM } from './relation'

export {
  column,
  literal,
  binary,
  isComparison,
  isNumericType,
  formatLiteral,
  formatExpression,
  conjuncts,
  conjunction,
  referencedColumns,
  containsAggregate,
  remapColumns,
  shiftColumns,
  equiJoinPair,
  aggregateType,
  typeOf,
} from './expression'

export { schemeOf, childrenOf, walk } from './operators'

export {
  logicalLabel,
  formatLogical,
  physicalLabel,
  physicalChildren,
  formatPhysical,
  formatRules,
} from './format'
