/**
 * Catalog Provider Interface
 *
 * Schema lookup bound to one backend connection.
 */

import type { Column, RelationKey, Scheme } from '../algebra'
import type { DatasetDescriptor } from '../executor/types'

export interface Catalog {
  /** Unique name for this catalog (e.g. 'myria', 'codegen') */
  readonly name: string

  /**
   * Scheme of a stored relation.
   * @throws NoSuchRelationError when the relation does not exist
   */
  getScheme(key: RelationKey): Promise<Scheme>

  /** Number of live servers that will execute the plan */
  getNumServers(): Promise<number>
}

export function schemeFromDescriptor(descriptor: DatasetDescriptor): Scheme {
  const { columnNames, columnTypes } = descriptor.schema
  return columnNames.map((name, i): Column => ({ name, type: columnTypes[i] ?? 'LONG_TYPE' }))
}
