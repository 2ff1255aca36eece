/**
 * Custom Error Classes
 */

/**
 * Base error for everything raised while planning or submitting a query.
 */
export class PlanError extends Error {
  public override readonly cause?: Error
  readonly code: string = 'PLAN_ERROR'

  constructor(message: string, cause?: Error) {
    super(message)
    this.name = 'PlanError'
    this.cause = cause

    // V8-specific stack trace capture (not in TypeScript's lib)
    if (typeof (Error as { captureStackTrace?: unknown }).captureStackTrace === 'function') {
      ;(Error as { captureStackTrace: (target: Error, ctor: unknown) => void }).captureStackTrace(
        this,
        this.constructor,
      )
    }
  }
}

/**
 * Syntax error.
 * Thrown when a grammar engine rejects the query text.
 */
export class QuerySyntaxError extends PlanError {
  override readonly code = 'SYNTAX_ERROR'

  constructor(
    message: string,
    public readonly line?: number,
    public readonly column?: number,
  ) {
    super(line !== undefined ? `${message} (line ${line}, column ${column ?? 0})` : message)
    this.name = 'QuerySyntaxError'
  }
}

/**
 * Semantic error.
 * Thrown while evaluating a parsed program into a logical plan.
 */
export class SemanticError extends PlanError {
  override readonly code: string = 'SEMANTIC_ERROR'

  constructor(message: string) {
    super(message)
    this.name = 'SemanticError'
  }
}

/**
 * A referenced relation is absent from the catalog.
 */
export class NoSuchRelationError extends SemanticError {
  override readonly code = 'NO_SUCH_RELATION'

  constructor(public readonly relation: string) {
    super(`Relation ${relation} not found`)
    this.name = 'NoSuchRelationError'
  }
}

/**
 * An expression combines values of incompatible types.
 */
export class TypeMismatchError extends SemanticError {
  override readonly code = 'TYPE_MISMATCH'

  constructor(
    public readonly expression: string,
    public readonly expected: string,
    public readonly received: string,
  ) {
    super(`Type mismatch in ${expression}: expected ${expected}, got ${received}`)
    this.name = 'TypeMismatchError'
  }
}

/**
 * Unsupported operation.
 * Unknown plan type, or a language/backend combination with no implementation.
 */
export class UnsupportedOperationError extends PlanError {
  override readonly code = 'UNSUPPORTED_OPERATION'

  constructor(message: string) {
    super(message)
    this.name = 'UnsupportedOperationError'
  }
}

/**
 * Request parameters that cannot be decoded.
 */
export class InvalidRequestError extends PlanError {
  override readonly code = 'INVALID_REQUEST'

  constructor(
    message: string,
    public readonly param?: string,
  ) {
    super(message)
    this.name = 'InvalidRequestError'
  }
}

/**
 * Configuration fault.
 * A live cluster requirement is unmet (e.g. zero servers alive). Not retried.
 */
export class ConfigurationFault extends PlanError {
  override readonly code = 'CONFIGURATION_FAULT'

  constructor(message: string) {
    super(message)
    this.name = 'ConfigurationFault'
  }
}

/**
 * Connectivity error.
 * Thrown when a backend service cannot be reached.
 */
export class ConnectivityError extends PlanError {
  override readonly code = 'CONNECTIVITY_ERROR'

  constructor(
    message: string,
    public readonly url?: string,
    cause?: Error,
  ) {
    super(message, cause)
    this.name = 'ConnectivityError'
  }
}

/**
 * Backend execution error.
 * The backend was reached but rejected the request.
 */
export class BackendExecutionError extends PlanError {
  override readonly code = 'BACKEND_ERROR'

  constructor(
    message: string,
    public readonly status?: number,
    public readonly url?: string,
  ) {
    super(message)
    this.name = 'BackendExecutionError'
  }
}
