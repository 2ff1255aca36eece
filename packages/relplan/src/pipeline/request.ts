/**
 * Compilation requests
 *
 * Raw request parameters are decoded once into a frozen CompilationRequest.
 */

import { z } from 'zod'
import { UnsupportedOperationError } from '../errors'

export const LANGUAGES = ['datalog', 'myrial', 'sql'] as const
export const BACKENDS = ['myria', 'clang', 'grappa'] as const
export const PLAN_TYPES = ['logical', 'physical'] as const

export type Language = (typeof LANGUAGES)[number]
export type Backend = (typeof BACKENDS)[number]
export type PlanType = (typeof PLAN_TYPES)[number]

export interface CompilationRequest {
  readonly query: string
  readonly language: Language
  readonly backend: Backend
  readonly multiwayJoin: boolean
  readonly pushSql: boolean
  readonly profile: boolean
}

const TRUE_VALUES = new Set(['y', 'yes', 't', 'true', 'on', '1'])
const FALSE_VALUES = new Set(['n', 'no', 'f', 'false', 'off', '0'])

/**
 * Decode a boolean request parameter. Missing or empty values take the default.
 */
export const BooleanParamSchema = (defaultValue = false) =>
  z
    .string()
    .optional()
    .transform((value, ctx) => {
      if (value === undefined || value.trim() === '') return defaultValue
      const normalized = value.trim().toLowerCase()
      if (TRUE_VALUES.has(normalized)) return true
      if (FALSE_VALUES.has(normalized)) return false
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `invalid truth value '${value}'` })
      return z.NEVER
    })

const normalizedParam = (fallback: string) =>
  z
    .string()
    .optional()
    .transform((value) => (value === undefined || value.trim() === '' ? fallback : value.trim().toLowerCase()))

export const CompilationRequestSchema = z.object({
  query: z.string().default(''),
  language: normalizedParam('datalog').pipe(z.enum(LANGUAGES)),
  backend: normalizedParam('myria').pipe(z.enum(BACKENDS)),
  multiway_join: BooleanParamSchema(),
  push_sql: BooleanParamSchema(),
  profile: BooleanParamSchema(),
})

export type RequestParams = Record<string, string | undefined>

/**
 * Build a frozen request from raw parameters. An unknown language or backend
 * is an unsupported operation; any other bad parameter fails validation.
 */
export function parseCompilationRequest(params: RequestParams): CompilationRequest {
  const result = CompilationRequestSchema.safeParse(params)
  if (!result.success) {
    const unsupported = result.error.issues.find((issue) => issue.path[0] === 'language' || issue.path[0] === 'backend')
    if (unsupported) {
      const language = params.language?.trim().toLowerCase() || 'datalog'
      const backend = params.backend?.trim().toLowerCase() || 'myria'
      throw new UnsupportedOperationError(`Language ${language} is not supported on ${backend}`)
    }
    throw result.error
  }
  const parsed = result.data
  return createCompilationRequest({
    query: parsed.query,
    language: parsed.language,
    backend: parsed.backend,
    multiwayJoin: parsed.multiway_join,
    pushSql: parsed.push_sql,
    profile: parsed.profile,
  })
}

export function createCompilationRequest(
  fields: Pick<CompilationRequest, 'query'> & Partial<Omit<CompilationRequest, 'query'>>,
): CompilationRequest {
  return Object.freeze({
    query: fields.query,
    language: fields.language ?? 'datalog',
    backend: fields.backend ?? 'myria',
    multiwayJoin: fields.multiwayJoin ?? false,
    pushSql: fields.pushSql ?? false,
    profile: fields.profile ?? false,
  })
}
