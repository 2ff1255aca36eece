/**
 * Error Classifier
 *
 * Maps any raised condition to the small taxonomy the request boundary turns
 * into response status codes.
 */

import { ZodError } from 'zod'
import {
  BackendExecutionError,
  ConfigurationFault,
  ConnectivityError,
  InvalidRequestError,
  QuerySyntaxError,
  SemanticError,
  UnsupportedOperationError,
} from './errors'

export type ErrorKind =
  | 'syntax'
  | 'semantic'
  | 'unsupported'
  | 'invalid-request'
  | 'configuration'
  | 'connectivity'
  | 'backend'
  | 'internal'

export interface ErrorClassification {
  kind: ErrorKind
  status: 400 | 500 | 503
  message: string
}

const REASONS: Record<ErrorClassification['status'], string> = {
  400: 'Bad Request',
  500: 'Internal Server Error',
  503: 'Unavailable',
}

export function classifyError(error: unknown): ErrorClassification {
  if (error instanceof QuerySyntaxError) {
    return { kind: 'syntax', status: 400, message: `${error.name}: ${error.message}` }
  }
  if (error instanceof SemanticError) {
    return { kind: 'semantic', status: 400, message: error.message }
  }
  if (error instanceof UnsupportedOperationError) {
    return { kind: 'unsupported', status: 400, message: error.message }
  }
  if (error instanceof InvalidRequestError) {
    return { kind: 'invalid-request', status: 400, message: error.message }
  }
  if (error instanceof ZodError) {
    return {
      kind: 'invalid-request',
      status: 400,
      message: error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join(', '),
    }
  }
  if (error instanceof ConfigurationFault) {
    return { kind: 'configuration', status: 500, message: error.message }
  }
  if (error instanceof ConnectivityError) {
    return { kind: 'connectivity', status: 503, message: 'Unable to connect to REST server' }
  }
  if (error instanceof BackendExecutionError) {
    return { kind: 'backend', status: 400, message: error.message }
  }
  return {
    kind: 'internal',
    status: 500,
    message: error instanceof Error ? error.message : String(error),
  }
}

/**
 * Render a classification as the plain-text response body.
 */
export function formatErrorBody(classification: ErrorClassification): string {
  return `Error ${classification.status} (${REASONS[classification.status]}): ${classification.message}`
}
