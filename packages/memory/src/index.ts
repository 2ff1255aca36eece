/**
 * relplan In-Memory Backends
 *
 * Zero-infrastructure stand-ins for the clustered engine and the
 * code-generation service.
 *
 * @example
 * ```typescript
 * import { QueryDispatcher } from 'relplan'
 * import { createInMemoryBackends } from '@relplan/memory'
 *
 * const backends = createInMemoryBackends({
 *   relations: { R: [{ name: 'a', type: 'LONG_TYPE' }, { name: 'b', type: 'LONG_TYPE' }] },
 * })
 * const dispatcher = new QueryDispatcher({ clients: backends })
 *
 * const submission = await dispatcher.execute({ query: 'A(x) :- R(x,3)' })
 * backends.myria.queries.update(submission.queryId, 'SUCCESS', { elapsedNanos: 1500000000 })
 *
 * backends.myria.offline = true // every call now fails to connect
 * ```
 *
 * @packageDocumentation
 */

// =============================================================================
// MAIN API
// =============================================================================

export { createInMemoryBackends } from './backends'
export type { InMemoryBackends, InMemoryBackendsConfig } from './backends'

// =============================================================================
// CLIENTS
// =============================================================================

export { InMemoryMyria } from './myria'
export type { InMemoryMyriaConfig } from './myria'
export { InMemoryCodegen } from './codegen'
export type { InMemoryCodegenConfig } from './codegen'

// =============================================================================
// STORE
// =============================================================================

export { RelationStore, QueryLog } from './store'
export type { StoredRelation, LoggedQuery } from './store'
