/**
 * relplan - Query plan compilation and dispatch
 *
 * Translates Datalog, MyriaL and SQL into logical plans, lowers them into a
 * backend's physical algebra, and compiles or submits the result.
 *
 * @example
 * ```typescript
 * import { QueryDispatcher, MyriaConnection, CodegenConnection } from 'relplan'
 *
 * const dispatcher = new QueryDispatcher({
 *   clients: {
 *     myria: new MyriaConnection({ hostname: 'localhost', port: 8753, ssl: false }),
 *     codegen: new CodegenConnection({ hostname: 'localhost', port: 1337 }),
 *   },
 * })
 *
 * const logical = await dispatcher.plan({ query: 'A(x) :- R(x,3)', language: 'datalog' })
 * const physical = await dispatcher.optimize({ query: 'A(x) :- R(x,3)', multiway_join: 'true' })
 * ```
 *
 * @packageDocumentation
 */

// =============================================================================
// ALGEBRA
// =============================================================================

export * from './algebra'

// =============================================================================
// LANGUAGE FRONT-ENDS
// =============================================================================

export * from './grammar'

// =============================================================================
// CATALOGS
// =============================================================================

export * from './catalog'

// =============================================================================
// COMPILER
// =============================================================================

export * from './compiler'

// =============================================================================
// EXECUTION
// =============================================================================

export * from './executor'

// =============================================================================
// PIPELINE
// =============================================================================

export * from './pipeline'

// =============================================================================
// SERVER
// =============================================================================

export * from './server'

// =============================================================================
// ERRORS & LOGGING
// =============================================================================

export * from './errors'
export * from './observability'

// =============================================================================
// UTILITIES
// =============================================================================

export { Mutex, UniqueNames, formatElapsed } from './utils'
