/**
 * Plan Stager
 *
 * Drives one request through its stages: resolve the catalog and the target
 * algebra (concurrently), translate the query into a logical plan, then
 * optimize and lower it into a physical plan.
 */

import { resolveCatalog } from '../catalog'
import type { Catalog } from '../catalog'
import { LogicalPlan, lowerPlan, optimizeRules, selectTargetAlgebra } from '../compiler'
import type { PhysicalPlan, TargetAlgebra } from '../compiler'
import { UnsupportedOperationError } from '../errors'
import type { BackendClients } from '../executor/provider'
import { DatalogFrontend, GuardedParser, MyrialFrontend, MyrialParser } from '../grammar'
import type { LanguageFrontend, LogicalRule } from '../grammar'
import { silentLogger } from '../observability'
import type { Logger } from '../observability'
import type { CompilationRequest, Language, PlanType } from './request'
import { PLAN_TYPES } from './request'

export interface StagedPlans {
  logical: LogicalPlan
  physical: PhysicalPlan
}

export interface PlanStagerOptions {
  clients: BackendClients
  /** Guard around the shared MyriaL/SQL parser; one per process */
  parser?: GuardedParser
  logger?: Logger
}

export function isPlanType(value: string): value is PlanType {
  return PLAN_TYPES.some((type) => type === value)
}

export class PlanStager {
  private readonly clients: BackendClients
  private readonly parser: GuardedParser
  private readonly logger: Logger

  constructor(options: PlanStagerOptions) {
    this.clients = options.clients
    this.parser = options.parser ?? new GuardedParser(new MyrialParser())
    this.logger = options.logger ?? silentLogger
  }

  /**
   * Logical or physical plan, by name. The plan type is checked before any
   * other work is done.
   */
  async getPlan(request: CompilationRequest, planType: string): Promise<LogicalPlan | PhysicalPlan> {
    if (!isPlanType(planType)) {
      throw new UnsupportedOperationError(`Plan type ${planType} is not supported`)
    }
    return planType === 'logical' ? this.getLogicalPlan(request) : this.getPhysicalPlan(request)
  }

  async getLogicalPlan(request: CompilationRequest): Promise<LogicalPlan> {
    const { catalog } = await this.resolve(request)
    const rules = await this.translate(request, this.frontendFor(request.language), catalog)
    return new LogicalPlan(rules)
  }

  async getPhysicalPlan(request: CompilationRequest): Promise<PhysicalPlan> {
    return (await this.stage(request)).physical
  }

  /**
   * Both plans from a single parse.
   */
  async stage(request: CompilationRequest): Promise<StagedPlans> {
    const started = Date.now()
    const { catalog, algebra } = await this.resolve(request)
    const frontend = this.frontendFor(request.language)

    const rules = await this.translate(request, frontend, catalog)
    const logical = new LogicalPlan(rules)

    const [bound, numServers] = await Promise.all([frontend.bind(rules, catalog), catalog.getNumServers()])
    const physical = lowerPlan(optimizeRules(bound), algebra, { numServers, pushSql: request.pushSql })

    this.logger.debug('plan.staged', {
      language: request.language,
      backend: request.backend,
      algebra,
      catalog: catalog.name,
      rules: rules.length,
      duration_ms: Date.now() - started,
    })
    return { logical, physical }
  }

  // MyriaL/SQL report the rewritten plan; Datalog reports its rules as written
  private async translate(request: CompilationRequest, frontend: LanguageFrontend, catalog: Catalog): Promise<LogicalRule[]> {
    const rules = await frontend.translate(request.query, catalog)
    return request.language === 'datalog' ? rules : optimizeRules(rules)
  }

  private async resolve(request: CompilationRequest): Promise<{ catalog: Catalog; algebra: TargetAlgebra }> {
    const [catalog, algebra] = await Promise.all([
      resolveCatalog(request.backend, request.multiwayJoin, this.clients),
      Promise.resolve().then(() => selectTargetAlgebra(request.backend, request.multiwayJoin)),
    ])
    return { catalog, algebra }
  }

  private frontendFor(language: Language): LanguageFrontend {
    switch (language) {
      case 'datalog':
        return new DatalogFrontend()
      case 'myrial':
      case 'sql':
        return new MyrialFrontend(language, this.parser)
      default: {
        const unknown: never = language
        throw new UnsupportedOperationError(`Language ${String(unknown)} is not supported`)
      }
    }
  }
}
