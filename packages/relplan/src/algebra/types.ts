/**
 * Relational Algebra Type Definitions
 *
 * Logical operators describe what a query computes; physical operators
 * describe how one target algebra computes it. Both are plain immutable
 * trees so that plans can be rendered, compared and serialized directly.
 */

// =============================================================================
// RELATIONS & SCHEMES
// =============================================================================

export type ColumnType =
  | "LONG_TYPE"
  | "INT_TYPE"
  | "DOUBLE_TYPE"
  | "FLOAT_TYPE"
  | "STRING_TYPE"
  | "BOOLEAN_TYPE"
  | "DATETIME_TYPE"

export interface Column {
  name: string
  type: ColumnType
}

export type Scheme = readonly Column[]

/**
 * Fully qualified relation name, written `user:program:name`.
 */
export interface RelationKey {
  user: string
  program: string
  name: string
}

// =============================================================================
// EXPRESSIONS
// =============================================================================

export type ComparisonOperator = "=" | "!=" | "<" | "<=" | ">" | ">="

export type ArithmeticOperator = "+" | "-" | "*" | "/"

export type BinaryOperator = ComparisonOperator | ArithmeticOperator | "AND" | "OR"

export type AggregateFunction = "COUNT" | "SUM" | "MIN" | "MAX" | "AVG"

/**
 * Positional reference into the input scheme (`$0`, `$1`, ...).
 */
export interface ColumnRef {
  type: "column"
  index: number
}

export interface Literal {
  type: "literal"
  value: string | number | boolean
  valueType: ColumnType
}

export interface BinaryExpression {
  type: "binary"
  operator: BinaryOperator
  left: Expression
  right: Expression
}

export interface NotExpression {
  type: "not"
  operand: Expression
}

/**
 * Aggregate call. A null operand means `COUNT(*)`.
 */
export interface AggregateExpression {
  type: "aggregate"
  fn: AggregateFunction
  operand: Expression | null
}

export type Expression = ColumnRef | Literal | BinaryExpression | NotExpression | AggregateExpression

export interface Emitter {
  name: string
  expression: Expression
}

export interface GroupingColumn {
  name: string
  column: number
}

export interface AggregateColumn {
  name: string
  fn: AggregateFunction
  /** Input column, or null for `COUNT(*)` */
  column: number | null
}

// =============================================================================
// LOGICAL OPERATORS
// =============================================================================

export interface ScanOperator {
  op: "Scan"
  relation: RelationKey
  scheme: Scheme
}

export interface SelectOperator {
  op: "Select"
  condition: Expression
  input: LogicalOperator
}

export interface ApplyOperator {
  op: "Apply"
  emitters: readonly Emitter[]
  input: LogicalOperator
}

/**
 * Join of two inputs. Column references in the condition index the
 * concatenation of the left and right schemes.
 */
export interface JoinOperator {
  op: "Join"
  condition: Expression
  left: LogicalOperator
  right: LogicalOperator
}

export interface CrossProductOperator {
  op: "CrossProduct"
  left: LogicalOperator
  right: LogicalOperator
}

/**
 * Output scheme is the grouping columns followed by the aggregates.
 */
export interface GroupByOperator {
  op: "GroupBy"
  groupings: readonly GroupingColumn[]
  aggregates: readonly AggregateColumn[]
  input: LogicalOperator
}

export interface DistinctOperator {
  op: "Distinct"
  input: LogicalOperator
}

export interface UnionAllOperator {
  op: "UnionAll"
  inputs: readonly LogicalOperator[]
}

export type LogicalOperator =
  | ScanOperator
  | SelectOperator
  | ApplyOperator
  | JoinOperator
  | CrossProductOperator
  | GroupByOperator
  | DistinctOperator
  | UnionAllOperator

/**
 * A named output relation bound to an expression over source relations.
 */
export interface Rule<TPlan> {
  name: string
  relation: RelationKey
  plan: TPlan
}

// =============================================================================
// PHYSICAL OPERATORS
// =============================================================================

interface PhysicalBase {
  /** Algebra-specific operator name, e.g. `MyriaSelect` */
  name: string
  scheme: Scheme
}

export interface PhysicalScan extends PhysicalBase {
  kind: "scan"
  relation: RelationKey
}

/**
 * A sub-plan pushed into the storage layer as SQL.
 */
export interface PhysicalQueryScan extends PhysicalBase {
  kind: "query-scan"
  sql: string
  relations: readonly RelationKey[]
}

export interface PhysicalSelect extends PhysicalBase {
  kind: "select"
  condition: Expression
  input: PhysicalOperator
}

export interface PhysicalApply extends PhysicalBase {
  kind: "apply"
  emitters: readonly Emitter[]
  input: PhysicalOperator
}

export interface PhysicalHashJoin extends PhysicalBase {
  kind: "hash-join"
  leftKeys: readonly number[]
  rightKeys: readonly number[]
  left: PhysicalOperator
  right: PhysicalOperator
}

export interface PhysicalCrossProduct extends PhysicalBase {
  kind: "cross-product"
  left: PhysicalOperator
  right: PhysicalOperator
}

export interface JoinField {
  input: number
  column: number
}

/**
 * One join over many inputs. Each entry of `joinFields` is a set of
 * input columns that must be equal; output is the inputs concatenated.
 */
export interface PhysicalMultiwayJoin extends PhysicalBase {
  kind: "multiway-join"
  joinFields: readonly (readonly JoinField[])[]
  inputs: readonly PhysicalOperator[]
}

export interface PhysicalGroupBy extends PhysicalBase {
  kind: "group-by"
  groupings: readonly GroupingColumn[]
  aggregates: readonly AggregateColumn[]
  input: PhysicalOperator
}

export interface PhysicalDistinct extends PhysicalBase {
  kind: "distinct"
  input: PhysicalOperator
}

export interface PhysicalUnionAll extends PhysicalBase {
  kind: "union-all"
  inputs: readonly PhysicalOperator[]
}

export interface PhysicalStore extends PhysicalBase {
  kind: "store"
  relation: RelationKey
  input: PhysicalOperator
}

export type ExchangeMode = "shuffle" | "broadcast" | "collect" | "hypercube"

export interface HyperCubeLayout {
  /** Size of every cube dimension */
  dimensions: readonly number[]
  /** Dimension each hashed column maps to */
  mappedDimensions: readonly number[]
}

/**
 * Data movement between workers: a producer/consumer pair that splits the
 * plan into fragments when serialized.
 */
export interface PhysicalExchange {
  kind: "exchange"
  mode: ExchangeMode
  producer: string
  consumer: string
  columns: readonly number[]
  hypercube?: HyperCubeLayout
  scheme: Scheme
  input: PhysicalOperator
}

export type PhysicalOperator =
  | PhysicalScan
  | PhysicalQueryScan
  | PhysicalSelect
  | PhysicalApply
  | PhysicalHashJoin
  | PhysicalCrossProduct
  | PhysicalMultiwayJoin
  | PhysicalGroupBy
  | PhysicalDistinct
  | PhysicalUnionAll
  | PhysicalStore
  | PhysicalExchange
