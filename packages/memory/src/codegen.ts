/**
 * In-Memory Code-Generation Service
 */

import { BackendExecutionError, ConnectivityError } from 'relplan'
import type { CodegenClient, CodegenProgram, DatasetDescriptor, QueryStatus, RelationKey } from 'relplan'
import { QueryLog, RelationStore } from './store'

export interface InMemoryCodegenConfig {
  hostname?: string
  port?: number
  relations?: RelationStore
}

export class InMemoryCodegen implements CodegenClient {
  readonly hostname: string
  readonly port: number
  readonly relations: RelationStore
  readonly queries = new QueryLog<CodegenProgram>()

  offline = false

  constructor(config: InMemoryCodegenConfig = {}) {
    this.hostname = config.hostname ?? 'localhost'
    this.port = config.port ?? 1337
    this.relations = config.relations ?? new RelationStore()
  }

  async relation(key: RelationKey): Promise<DatasetDescriptor | null> {
    this.ensureOnline()
    return this.relations.describe(key)
  }

  async submitQuery(program: CodegenProgram): Promise<QueryStatus> {
    this.ensureOnline()
    const missing = program.relations.find((name) => !this.relations.keys().includes(name))
    if (missing !== undefined) {
      throw new BackendExecutionError(`Relation ${missing} is not loaded`, 400, this.baseUrl)
    }
    return { ...this.queries.record(program).status }
  }

  async checkQuery(queryId: number): Promise<QueryStatus> {
    this.ensureOnline()
    const entry = this.queries.get(queryId)
    if (!entry) {
      throw new BackendExecutionError(`Query ${queryId} was not found`, 404, this.baseUrl)
    }
    return { ...entry.status }
  }

  private get baseUrl(): string {
    return `http://${this.hostname}:${this.port}`
  }

  private ensureOnline(): void {
    if (this.offline) {
      throw new ConnectivityError(`Unable to connect to ${this.baseUrl}`, this.baseUrl)
    }
  }
}
