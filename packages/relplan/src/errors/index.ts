/**
 * Errors Module
 */

export {
  PlanError,
  QuerySyntaxError,
  SemanticError,
  NoSuchRelationError,
  TypeMismatchError,
  UnsupportedOperationError,
  InvalidRequestError,
  ConfigurationFault,
  ConnectivityError,
  BackendExecutionError,
} from './errors'

export { classifyError, formatErrorBody } from './classify'
export type { ErrorKind, ErrorClassification } from './classify'
