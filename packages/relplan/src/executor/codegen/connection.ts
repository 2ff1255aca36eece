/**
 * Code-generation service connection
 *
 * Serves both the single-node (clang) and distributed (grappa) code
 * generators, which share one REST service.
 */

import { formatRelationKey, type RelationKey } from '../../algebra'
import type { CodegenClient } from '../provider'
import { RestClient, type FetchLike } from '../rest'
import { DatasetDescriptorSchema, QueryStatusSchema } from '../schemas'
import type { CodegenProgram, DatasetDescriptor, QueryStatus } from '../types'

export interface CodegenConnectionConfig {
  hostname: string
  port: number
  fetch?: FetchLike
}

export class CodegenConnection implements CodegenClient {
  readonly hostname: string
  readonly port: number
  private readonly rest: RestClient

  constructor(config: CodegenConnectionConfig) {
    this.hostname = config.hostname
    this.port = config.port
    this.rest = new RestClient(`http://${config.hostname}:${config.port}`, config.fetch)
  }

  relation(key: RelationKey): Promise<DatasetDescriptor | null> {
    return this.rest.optionalJson(
      { path: '/dataset', query: { relation: formatRelationKey(key) } },
      DatasetDescriptorSchema,
    )
  }

  submitQuery(program: CodegenProgram): Promise<QueryStatus> {
    return this.rest.json({ method: 'POST', path: '/query', body: program }, QueryStatusSchema)
  }

  checkQuery(queryId: number): Promise<QueryStatus> {
    return this.rest.json({ path: '/status', query: { qid: String(queryId) } }, QueryStatusSchema)
  }
}
