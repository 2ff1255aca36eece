import { formatRelationKey, type RelationKey, type Scheme } from '../algebra'
import { NoSuchRelationError } from '../errors'
import type { CodegenClient } from '../executor/provider'
import { schemeFromDescriptor, type Catalog } from './provider'

/**
 * Lightweight single-node catalog for the code-generation backends.
 */
export class CodegenCatalog implements Catalog {
  readonly name = 'codegen'

  constructor(private readonly client: CodegenClient) {}

  async getScheme(key: RelationKey): Promise<Scheme> {
    const descriptor = await this.client.relation(key)
    if (!descriptor) {
      throw new NoSuchRelationError(formatRelationKey(key))
    }
    return schemeFromDescriptor(descriptor)
  }

  async getNumServers(): Promise<number> {
    return 1
  }
}
