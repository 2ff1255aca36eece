/**
 * Compiler Module
 *
 * Logical rewriting, physical lowering per target algebra, and plan
 * serialization (engine JSON, Graphviz).
 */

// Target algebra
export { TARGET_ALGEBRAS, selectTargetAlgebra, isMyriaAlgebra } from './target'
export type { TargetAlgebra } from './target'

// Plans
export { LogicalPlan, PhysicalPlan } from './plan'

// Rewriting & lowering
export { optimizeLogical, optimizeRules } from './logical'
export { lowerPlan, hypercubeDimensions } from './physical'
export type { LoweringOptions } from './physical'
export { pushDownSql, quoteIdentifier } from './sql'
export type { PushedQuery } from './sql'

// Serialization
export { compileFragments, expressionToJson } from './myria-json'
export type { ExpressionJson } from './myria-json'
export { renderDot, escapeDotLabel } from './dot'
