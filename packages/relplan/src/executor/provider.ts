/**
 * Backend Client Provider Interfaces
 *
 * Abstraction layer for the execution services. The REST connections in this
 * module implement them; the in-memory package implements them for tests and
 * local development.
 */

import type { RelationKey } from '../algebra'
import type { CodegenProgram, DatasetDescriptor, MyriaProgram, QueryStatus } from './types'

// =============================================================================
// CLIENT INTERFACES
// =============================================================================

/**
 * Client of the clustered relational engine.
 * One instance lives for the whole process and is shared by all requests.
 */
export interface MyriaClient {
  readonly hostname: string
  readonly port: number
  readonly ssl: boolean

  /** Worker id -> address for every registered worker */
  workers(): Promise<Record<string, string>>

  /** Ids of the workers currently alive */
  workersAlive(): Promise<number[]>

  /** Relation metadata, or null when the relation does not exist */
  dataset(key: RelationKey): Promise<DatasetDescriptor | null>

  submitQuery(program: MyriaProgram): Promise<QueryStatus>

  getQueryStatus(queryId: number): Promise<QueryStatus>
}

/**
 * Client of a code-generation execution service.
 */
export interface CodegenClient {
  readonly hostname: string
  readonly port: number

  /** Relation metadata, or null when the relation does not exist */
  relation(key: RelationKey): Promise<DatasetDescriptor | null>

  submitQuery(program: CodegenProgram): Promise<QueryStatus>

  checkQuery(queryId: number): Promise<QueryStatus>
}

/**
 * The long-lived clients a process talks to.
 */
export interface BackendClients {
  myria: MyriaClient
  codegen: CodegenClient
}
