/**
 * Query Dispatcher
 *
 * The operations behind the request boundary. Each one decodes raw request
 * parameters, stages the query and, where asked, compiles or submits it.
 */

import { z } from 'zod'
import { renderDot } from '../compiler'
import { InvalidRequestError } from '../errors'
import { backendServiceFor } from '../executor/backend'
import type { ReportedStatus } from '../executor/backend'
import type { BackendClients } from '../executor/provider'
import type { CompiledProgram, Submission } from '../executor/types'
import type { GuardedParser } from '../grammar'
import { silentLogger } from '../observability'
import type { Logger } from '../observability'
import { BACKENDS, parseCompilationRequest } from './request'
import type { RequestParams } from './request'
import { PlanStager } from './stager'

const StatusRequestSchema = z
  .object({
    queryId: z.string().optional(),
    query_id: z.string().optional(),
    backend: z
      .string()
      .optional()
      .transform((value) => (value === undefined || value.trim() === '' ? 'myria' : value.trim().toLowerCase()))
      .pipe(z.enum(BACKENDS)),
  })
  .transform((params, ctx) => {
    const raw = (params.queryId ?? params.query_id ?? '').trim()
    if (raw === '') {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'missing query_id', path: ['query_id'] })
      return z.NEVER
    }
    if (!/^[0-9]+$/.test(raw) || !Number.isSafeInteger(Number(raw))) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `invalid query_id '${raw}'`, path: ['query_id'] })
      return z.NEVER
    }
    return { queryId: Number(raw), backend: params.backend }
  })

export interface QueryDispatcherOptions {
  clients: BackendClients
  parser?: GuardedParser
  logger?: Logger
}

export class QueryDispatcher {
  private readonly clients: BackendClients
  private readonly stager: PlanStager
  private readonly logger: Logger

  constructor(options: QueryDispatcherOptions) {
    this.clients = options.clients
    this.logger = options.logger ?? silentLogger
    this.stager = new PlanStager({ clients: options.clients, parser: options.parser, logger: this.logger })
  }

  /** Logical plan, as its string form */
  async plan(params: RequestParams): Promise<string> {
    const request = parseCompilationRequest(params)
    return (await this.stager.getLogicalPlan(request)).toString()
  }

  /** Physical plan, as its string form */
  async optimize(params: RequestParams): Promise<string> {
    const request = parseCompilationRequest(params)
    return (await this.stager.getPhysicalPlan(request)).toString()
  }

  /** Backend program, not submitted */
  async compile(params: RequestParams): Promise<CompiledProgram> {
    const request = parseCompilationRequest(params)
    const { logical, physical } = await this.stager.stage(request)
    return backendServiceFor(request.backend, this.clients).compile(request, logical, physical)
  }

  async execute(params: RequestParams): Promise<Submission> {
    const request = parseCompilationRequest(params)
    const { logical, physical } = await this.stager.stage(request)
    const submission = await backendServiceFor(request.backend, this.clients).execute(request, logical, physical)
    this.logger.info('query.submitted', { backend: request.backend, queryId: submission.queryId })
    return submission
  }

  async status(params: RequestParams): Promise<ReportedStatus> {
    const parsed = StatusRequestSchema.safeParse(params)
    if (!parsed.success) {
      const [issue] = parsed.error.issues
      throw new InvalidRequestError(issue ? issue.message : 'invalid status request', String(issue?.path[0] ?? 'query_id'))
    }
    return backendServiceFor(parsed.data.backend, this.clients).status(parsed.data.queryId)
  }

  /** Graphviz rendering of the plan named by `type` */
  async dot(params: RequestParams): Promise<string> {
    const request = parseCompilationRequest(params)
    const plan = await this.stager.getPlan(request, (params.type ?? '').trim().toLowerCase())
    return renderDot(plan)
  }
}
