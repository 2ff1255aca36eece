/**
 * Executor Type Definitions
 */

import type { ColumnType } from '../algebra'
import type { Language } from '../pipeline/request'

export type ProfilingMode = 'QUERY' | 'RESOURCE'

/**
 * Relation metadata as reported by a backend.
 */
export interface DatasetDescriptor {
  relationKey: {
    userName: string
    programName: string
    relationName: string
  }
  schema: {
    columnNames: string[]
    columnTypes: ColumnType[]
  }
  numTuples: number
}

/**
 * Execution status reported by a backend. `queryId` is assigned on
 * acceptance; everything else is passed through as the backend sends it.
 */
export interface QueryStatus {
  queryId: number
  status?: string
  elapsedNanos?: number | null
  [key: string]: unknown
}

export type OperatorJson = { opId: number; opName: string; opType: string } & Record<string, unknown>

export interface FragmentJson {
  operators: OperatorJson[]
}

/**
 * Program accepted by the clustered engine's query endpoint.
 */
export interface MyriaProgram {
  rawQuery: string
  logicalRa: string
  language: Language
  plan: {
    type: 'SubQuery'
    fragments: FragmentJson[]
  }
  profilingMode: ProfilingMode[]
}

/**
 * Program accepted by a code-generation service.
 */
export interface CodegenProgram {
  rawQuery: string
  logicalRa: string
  physicalRa: string
  backend: 'clang' | 'grappa'
  language: Language
  relations: string[]
  profilingMode: ProfilingMode[]
}

export type CompiledProgram = MyriaProgram | CodegenProgram

/**
 * Result of submitting a program.
 */
export interface Submission {
  queryId: number
  /** Where the caller polls for status */
  url: string
  status: QueryStatus
}
