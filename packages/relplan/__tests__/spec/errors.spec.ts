/**
 * Error Classification Tests
 */

import { describe, it, expect } from 'vitest'
import { z } from 'zod'
import {
  BackendExecutionError,
  ConfigurationFault,
  ConnectivityError,
  InvalidRequestError,
  NoSuchRelationError,
  PlanError,
  QuerySyntaxError,
  SemanticError,
  TypeMismatchError,
  UnsupportedOperationError,
  classifyError,
  formatErrorBody,
} from '../../src'
import type { ErrorClassification } from '../../src'

describe('error types', () => {
  it('carries a code and a name', () => {
    const error = new NoSuchRelationError('public:adhoc:Ghost')
    expect(error).toBeInstanceOf(SemanticError)
    expect(error).toBeInstanceOf(PlanError)
    expect(error.code).toBe('NO_SUCH_RELATION')
    expect(error.name).toBe('NoSuchRelationError')
    expect(error.message).toBe('Relation public:adhoc:Ghost not found')
  })

  it('places syntax errors', () => {
    expect(new QuerySyntaxError('Unexpected token', 2, 5).message).toBe('Unexpected token (line 2, column 5)')
    expect(new QuerySyntaxError('Unexpected end').message).toBe('Unexpected end')
  })

  it('describes type mismatches', () => {
    expect(new TypeMismatchError('($1 = 3)', 'STRING_TYPE', 'LONG_TYPE').message).toBe(
      'Type mismatch in ($1 = 3): expected STRING_TYPE, got LONG_TYPE',
    )
  })
})

describe('classifyError', () => {
  it.each<[string, unknown, ErrorClassification]>([
    [
      'syntax',
      new QuerySyntaxError('Unexpected token', 1, 4),
      { kind: 'syntax', status: 400, message: 'QuerySyntaxError: Unexpected token (line 1, column 4)' },
    ],
    [
      'semantic',
      new NoSuchRelationError('public:adhoc:Ghost'),
      { kind: 'semantic', status: 400, message: 'Relation public:adhoc:Ghost not found' },
    ],
    [
      'unsupported',
      new UnsupportedOperationError('Plan type json is not supported'),
      { kind: 'unsupported', status: 400, message: 'Plan type json is not supported' },
    ],
    [
      'invalid request',
      new InvalidRequestError('missing query_id', 'query_id'),
      { kind: 'invalid-request', status: 400, message: 'missing query_id' },
    ],
    [
      'configuration',
      new ConfigurationFault('No live servers reported by myria.test:8753'),
      { kind: 'configuration', status: 500, message: 'No live servers reported by myria.test:8753' },
    ],
    [
      'connectivity',
      new ConnectivityError('Unable to connect to http://myria.test:8753', 'http://myria.test:8753'),
      { kind: 'connectivity', status: 503, message: 'Unable to connect to REST server' },
    ],
    [
      'backend',
      new BackendExecutionError('Relation public:adhoc:Q is not loaded', 400),
      { kind: 'backend', status: 400, message: 'Relation public:adhoc:Q is not loaded' },
    ],
    ['internal', new RangeError('boom'), { kind: 'internal', status: 500, message: 'boom' }],
    ['non-error', 'plain string', { kind: 'internal', status: 500, message: 'plain string' }],
  ])('classifies %s', (_, error, expected) => {
    expect(classifyError(error)).toEqual(expected)
  })

  it('lists validation issues', () => {
    const result = z.object({ port: z.number() }).safeParse({ port: 'x' })
    expect(result.success).toBe(false)
    expect(classifyError(result.error)).toEqual({
      kind: 'invalid-request',
      status: 400,
      message: 'port: Expected number, received string',
    })
  })
})

describe('formatErrorBody', () => {
  it('writes status, reason and message', () => {
    expect(formatErrorBody({ kind: 'semantic', status: 400, message: 'Relation R not found' })).toBe(
      'Error 400 (Bad Request): Relation R not found',
    )
    expect(formatErrorBody({ kind: 'connectivity', status: 503, message: 'Unable to connect to REST server' })).toBe(
      'Error 503 (Unavailable): Unable to connect to REST server',
    )
    expect(formatErrorBody({ kind: 'internal', status: 500, message: 'boom' })).toBe(
      'Error 500 (Internal Server Error): boom',
    )
  })
})
