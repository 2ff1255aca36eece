/**
 * Both in-memory backends over one relation store.
 */

import type { BackendClients, Scheme } from 'relplan'
import { InMemoryCodegen } from './codegen'
import type { InMemoryCodegenConfig } from './codegen'
import { InMemoryMyria } from './myria'
import type { InMemoryMyriaConfig } from './myria'
import { RelationStore } from './store'

export interface InMemoryBackendsConfig {
  myria?: Omit<InMemoryMyriaConfig, 'relations'>
  codegen?: Omit<InMemoryCodegenConfig, 'relations'>
  /** Relations to register up front, by name */
  relations?: Record<string, Scheme>
}

export interface InMemoryBackends extends BackendClients {
  myria: InMemoryMyria
  codegen: InMemoryCodegen
  relations: RelationStore
  /** Drop all relations and submitted queries */
  reset(): void
}

export function createInMemoryBackends(config: InMemoryBackendsConfig = {}): InMemoryBackends {
  const relations = new RelationStore()
  for (const [name, scheme] of Object.entries(config.relations ?? {})) {
    relations.put(name, scheme)
  }
  const myria = new InMemoryMyria({ ...config.myria, relations })
  const codegen = new InMemoryCodegen({ ...config.codegen, relations })

  return {
    myria,
    codegen,
    relations,
    reset() {
      relations.clear()
      myria.queries.clear()
      codegen.queries.clear()
      myria.offline = false
      codegen.offline = false
    },
  }
}
