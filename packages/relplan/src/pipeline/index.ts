/**
 * Pipeline Module
 *
 * Request decoding, plan staging and the dispatcher operations.
 */

export {
  LANGUAGES,
  BACKENDS,
  PLAN_TYPES,
  BooleanParamSchema,
  CompilationRequestSchema,
  parseCompilationRequest,
  createCompilationRequest,
} from './request'
export type { Language, Backend, PlanType, CompilationRequest, RequestParams } from './request'
export { PlanStager, isPlanType } from './stager'
export type { StagedPlans, PlanStagerOptions } from './stager'
export { QueryDispatcher } from './dispatcher'
export type { QueryDispatcherOptions } from './dispatcher'
