/**
 * Backend Compiler/Submitter
 *
 * Turns staged plans into the program a backend accepts, submits it, and
 * polls its status. One service per backend, over the long-lived clients.
 */

import { formatRelationKey, physicalChildren } from '../algebra'
import type { PhysicalOperator } from '../algebra'
import { compileFragments, isMyriaAlgebra } from '../compiler'
import type { LogicalPlan, PhysicalPlan } from '../compiler'
import { UnsupportedOperationError } from '../errors'
import type { Backend, CompilationRequest } from '../pipeline/request'
import { formatElapsed } from '../utils/elapsed'
import type { BackendClients, CodegenClient, MyriaClient } from './provider'
import type { CodegenProgram, CompiledProgram, MyriaProgram, ProfilingMode, QueryStatus, Submission } from './types'

export const PROFILING_MODES: readonly ProfilingMode[] = ['QUERY', 'RESOURCE']

export function profilingModeFor(profile: boolean): ProfilingMode[] {
  return profile ? [...PROFILING_MODES] : []
}

/**
 * Status as returned to callers: the backend's own fields plus a readable
 * elapsed time when the backend reports one.
 */
export type ReportedStatus = QueryStatus & { elapsedStr?: string }

export function withElapsed(status: QueryStatus): ReportedStatus {
  return typeof status.elapsedNanos === 'number' ? { ...status, elapsedStr: formatElapsed(status.elapsedNanos) } : status
}

export interface BackendService {
  readonly backend: Backend

  /** Serialize the plans into this backend's program. Does not submit. */
  compile(request: CompilationRequest, logical: LogicalPlan, physical: PhysicalPlan): CompiledProgram

  /** Compile and submit. */
  execute(request: CompilationRequest, logical: LogicalPlan, physical: PhysicalPlan): Promise<Submission>

  status(queryId: number): Promise<ReportedStatus>
}

// =============================================================================
// CLUSTERED ENGINE
// =============================================================================

export class MyriaBackend implements BackendService {
  readonly backend = 'myria'

  constructor(private readonly client: MyriaClient) {}

  compile(request: CompilationRequest, logical: LogicalPlan, physical: PhysicalPlan): MyriaProgram {
    if (!isMyriaAlgebra(physical.algebra)) {
      throw new UnsupportedOperationError(`Cannot run a ${physical.algebra} plan on myria`)
    }
    return {
      rawQuery: request.query,
      logicalRa: logical.toString(),
      language: request.language,
      plan: { type: 'SubQuery', fragments: compileFragments(physical) },
      profilingMode: profilingModeFor(request.profile),
    }
  }

  async submit(program: MyriaProgram): Promise<Submission> {
    const status = await this.client.submitQuery(program)
    return { queryId: status.queryId, url: this.queryUrl(status.queryId), status }
  }

  execute(request: CompilationRequest, logical: LogicalPlan, physical: PhysicalPlan): Promise<Submission> {
    return this.submit(this.compile(request, logical, physical))
  }

  async status(queryId: number): Promise<ReportedStatus> {
    return withElapsed(await this.client.getQueryStatus(queryId))
  }

  queryUrl(queryId: number): string {
    const scheme = this.client.ssl ? 'https' : 'http'
    return `${scheme}://${this.client.hostname}:${this.client.port}/execute?query_id=${queryId}`
  }
}

// =============================================================================
// CODE GENERATION
// =============================================================================

function scannedRelations(op: PhysicalOperator): string[] {
  const own = op.kind === 'scan' ? [formatRelationKey(op.relation)] : []
  return [...own, ...physicalChildren(op).flatMap(scannedRelations)]
}

export class CodegenBackend implements BackendService {
  constructor(
    readonly backend: 'clang' | 'grappa',
    private readonly client: CodegenClient,
  ) {}

  compile(request: CompilationRequest, logical: LogicalPlan, physical: PhysicalPlan): CodegenProgram {
    if (physical.algebra !== this.backend) {
      throw new UnsupportedOperationError(`Cannot run a ${physical.algebra} plan on ${this.backend}`)
    }
    const relations = [...new Set(physical.rules.flatMap((rule) => scannedRelations(rule.plan)))]
    return {
      rawQuery: request.query,
      logicalRa: logical.toString(),
      physicalRa: physical.toString(),
      backend: this.backend,
      language: request.language,
      relations,
      profilingMode: profilingModeFor(request.profile),
    }
  }

  async submit(program: CodegenProgram): Promise<Submission> {
    const status = await this.client.submitQuery(program)
    return { queryId: status.queryId, url: this.queryUrl(status.queryId), status }
  }

  execute(request: CompilationRequest, logical: LogicalPlan, physical: PhysicalPlan): Promise<Submission> {
    return this.submit(this.compile(request, logical, physical))
  }

  async status(queryId: number): Promise<ReportedStatus> {
    return withElapsed(await this.client.checkQuery(queryId))
  }

  queryUrl(queryId: number): string {
    return `http://${this.client.hostname}:${this.client.port}/query?qid=${queryId}`
  }
}

/**
 * Service for a backend. Exhaustive over the backend union.
 */
export function backendServiceFor(backend: Backend, clients: BackendClients): BackendService {
  switch (backend) {
    case 'myria':
      return new MyriaBackend(clients.myria)
    case 'clang':
    case 'grappa':
      return new CodegenBackend(backend, clients.codegen)
    default: {
      const unknown: never = backend
      throw new UnsupportedOperationError(`Backend ${String(unknown)} is not supported`)
    }
  }
}
