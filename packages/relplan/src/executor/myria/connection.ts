/**
 * Myria REST Connection
 *
 * Talks to the clustered engine's REST API. Holds no per-request state, so one
 * instance is shared by every request in the process.
 */

import type { RelationKey } from '../../algebra'
import type { MyriaClient } from '../provider'
import { RestClient, type FetchLike } from '../rest'
import { DatasetDescriptorSchema, QueryStatusSchema, WorkersAliveSchema, WorkersSchema } from '../schemas'
import type { DatasetDescriptor, MyriaProgram, QueryStatus } from '../types'

export interface MyriaConnectionConfig {
  hostname: string
  port: number
  ssl: boolean
  fetch?: FetchLike
}

export class MyriaConnection implements MyriaClient {
  readonly hostname: string
  readonly port: number
  readonly ssl: boolean
  private readonly rest: RestClient

  constructor(config: MyriaConnectionConfig) {
    this.hostname = config.hostname
    this.port = config.port
    this.ssl = config.ssl
    const scheme = config.ssl ? 'https' : 'http'
    this.rest = new RestClient(`${scheme}://${config.hostname}:${config.port}`, config.fetch)
  }

  workers(): Promise<Record<string, string>> {
    return this.rest.json({ path: '/workers' }, WorkersSchema)
  }

  workersAlive(): Promise<number[]> {
    return this.rest.json({ path: '/workers/alive' }, WorkersAliveSchema)
  }

  dataset(key: RelationKey): Promise<DatasetDescriptor | null> {
    const path = `/dataset/user-${encodeURIComponent(key.user)}/program-${encodeURIComponent(key.program)}/relation-${encodeURIComponent(key.name)}`
    return this.rest.optionalJson({ path }, DatasetDescriptorSchema)
  }

  submitQuery(program: MyriaProgram): Promise<QueryStatus> {
    return this.rest.json({ method: 'POST', path: '/query', body: program }, QueryStatusSchema)
  }

  getQueryStatus(queryId: number): Promise<QueryStatus> {
    return this.rest.json({ path: `/query/query-${queryId}` }, QueryStatusSchema)
  }
}
