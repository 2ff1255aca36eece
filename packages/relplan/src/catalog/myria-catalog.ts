import { formatRelationKey, type RelationKey, type Scheme } from '../algebra'
import { NoSuchRelationError } from '../errors'
import type { MyriaClient } from '../executor/provider'
import { schemeFromDescriptor, type Catalog } from './provider'

/**
 * Cluster-aware catalog backed by the clustered engine.
 */
export class MyriaCatalog implements Catalog {
  readonly name = 'myria'

  constructor(private readonly client: MyriaClient) {}

  async getScheme(key: RelationKey): Promise<Scheme> {
    const descriptor = await this.client.dataset(key)
    if (!descriptor) {
      throw new NoSuchRelationError(formatRelationKey(key))
    }
    return schemeFromDescriptor(descriptor)
  }

  async getNumServers(): Promise<number> {
    const alive = await this.client.workersAlive()
    return alive.length
  }
}
