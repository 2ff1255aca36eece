/**
 * In-Memory Clustered Engine
 *
 * Stands in for the clustered engine's REST service: a fixed set of workers,
 * a relation catalog, and a query log that accepts every submitted program.
 */

import { BackendExecutionError, ConnectivityError } from 'relplan'
import type { DatasetDescriptor, MyriaClient, MyriaProgram, QueryStatus, RelationKey } from 'relplan'
import { QueryLog, RelationStore } from './store'

export interface InMemoryMyriaConfig {
  hostname?: string
  port?: number
  ssl?: boolean
  /** Registered workers (default 4) */
  workers?: number
  /** Ids of the live workers (default: all) */
  alive?: number[]
  /** Shared relation store */
  relations?: RelationStore
}

export class InMemoryMyria implements MyriaClient {
  readonly hostname: string
  readonly port: number
  readonly ssl: boolean
  readonly relations: RelationStore
  readonly queries = new QueryLog<MyriaProgram>()

  /** While set, every call fails as an unreachable server would */
  offline = false

  private workerIds: number[]
  private aliveIds: number[]

  constructor(config: InMemoryMyriaConfig = {}) {
    this.hostname = config.hostname ?? 'localhost'
    this.port = config.port ?? 8753
    this.ssl = config.ssl ?? false
    this.relations = config.relations ?? new RelationStore()
    this.workerIds = Array.from({ length: config.workers ?? 4 }, (_, i) => i + 1)
    this.aliveIds = config.alive ?? [...this.workerIds]
  }

  /**
   * Change which workers are alive. Ids must be registered workers.
   */
  setAlive(ids: number[]): void {
    const unknown = ids.find((id) => !this.workerIds.includes(id))
    if (unknown !== undefined) {
      throw new Error(`Unknown worker: ${unknown}`)
    }
    this.aliveIds = [...ids]
  }

  async workers(): Promise<Record<string, string>> {
    this.ensureOnline()
    return Object.fromEntries(this.workerIds.map((id) => [String(id), `worker-${id}:${9000 + id}`]))
  }

  async workersAlive(): Promise<number[]> {
    this.ensureOnline()
    return [...this.aliveIds]
  }

  async dataset(key: RelationKey): Promise<DatasetDescriptor | null> {
    this.ensureOnline()
    return this.relations.describe(key)
  }

  async submitQuery(program: MyriaProgram): Promise<QueryStatus> {
    this.ensureOnline()
    const entry = this.queries.record(program)
    return { ...entry.status }
  }

  async getQueryStatus(queryId: number): Promise<QueryStatus> {
    this.ensureOnline()
    const entry = this.queries.get(queryId)
    if (!entry) {
      throw new BackendExecutionError(`Query ${queryId} was not found`, 404, this.baseUrl)
    }
    return { ...entry.status }
  }

  private get baseUrl(): string {
    return `${this.ssl ? 'https' : 'http'}://${this.hostname}:${this.port}`
  }

  private ensureOnline(): void {
    if (this.offline) {
      throw new ConnectivityError(`Unable to connect to ${this.baseUrl}`, this.baseUrl)
    }
  }
}
