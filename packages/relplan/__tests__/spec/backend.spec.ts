/**
 * Backend Service Tests
 */

import { describe, it, expect } from 'vitest'
import {
  CodegenBackend,
  DatalogFrontend,
  LogicalPlan,
  MyriaBackend,
  UnsupportedOperationError,
  backendServiceFor,
  createCompilationRequest,
  profilingModeFor,
  withElapsed,
} from '../../src'
import { createFakeClients } from './fixtures/backends'
import { boundDatalog, lower } from './fixtures/plans'

const QUERY = 'Q(x,z) :- R(x,y), S(y,z)'

async function logicalPlan(): Promise<LogicalPlan> {
  return new LogicalPlan(await new DatalogFrontend().translate(QUERY))
}

describe('MyriaBackend', () => {
  it('wraps the fragments in a sub-query program', async () => {
    const clients = createFakeClients()
    const physical = lower(await boundDatalog(QUERY), 'myria-left-deep')
    const program = new MyriaBackend(clients.myria).compile(
      createCompilationRequest({ query: QUERY }),
      await logicalPlan(),
      physical,
    )
    expect(program.rawQuery).toBe(QUERY)
    expect(program.logicalRa).toBe('Q = Apply(x=$0,z=$3)[Join(($1 = $2))[Scan(public:adhoc:R),Scan(public:adhoc:S)]]')
    expect(program.language).toBe('datalog')
    expect(program.plan.type).toBe('SubQuery')
    expect(program.plan.fragments).toHaveLength(3)
    expect(program.profilingMode).toEqual([])
  })

  it('refuses plans lowered for another algebra', async () => {
    const clients = createFakeClients()
    const physical = lower(await boundDatalog(QUERY), 'clang')
    expect(() =>
      new MyriaBackend(clients.myria).compile(createCompilationRequest({ query: QUERY }), new LogicalPlan([]), physical),
    ).toThrow(new UnsupportedOperationError('Cannot run a clang plan on myria'))
  })

  it('links to the status endpoint over the configured scheme', () => {
    expect(new MyriaBackend(createFakeClients().myria).queryUrl(12)).toBe('http://myria.test:8753/execute?query_id=12')
    expect(new MyriaBackend(createFakeClients({ ssl: true }).myria).queryUrl(12)).toBe(
      'https://myria.test:8753/execute?query_id=12',
    )
  })
})

describe('CodegenBackend', () => {
  it('sends both plans and the relations they scan', async () => {
    const clients = createFakeClients()
    const physical = lower(await boundDatalog(QUERY), 'clang')
    const program = new CodegenBackend('clang', clients.codegen).compile(
      createCompilationRequest({ query: QUERY, backend: 'clang', profile: true }),
      await logicalPlan(),
      physical,
    )
    expect(program).toEqual({
      rawQuery: QUERY,
      logicalRa: 'Q = Apply(x=$0,z=$3)[Join(($1 = $2))[Scan(public:adhoc:R),Scan(public:adhoc:S)]]',
      physicalRa:
        'Q = CStore(public:adhoc:Q)[CApply(x=$0,z=$3)[CHashJoin($1=$0)[CFileScan(public:adhoc:R),CFileScan(public:adhoc:S)]]]',
      backend: 'clang',
      language: 'datalog',
      relations: ['public:adhoc:R', 'public:adhoc:S'],
      profilingMode: ['QUERY', 'RESOURCE'],
    })
  })

  it('lists each scanned relation once', async () => {
    const clients = createFakeClients()
    const physical = lower(await boundDatalog('Q(x,z) :- R(x,y), R(y,z)'), 'grappa')
    const program = new CodegenBackend('grappa', clients.codegen).compile(
      createCompilationRequest({ query: '', backend: 'grappa' }),
      new LogicalPlan([]),
      physical,
    )
    expect(program.relations).toEqual(['public:adhoc:R'])
  })

  it('refuses plans lowered for the other code generator', async () => {
    const physical = lower(await boundDatalog(QUERY), 'grappa')
    expect(() =>
      new CodegenBackend('clang', createFakeClients().codegen).compile(
        createCompilationRequest({ query: QUERY }),
        new LogicalPlan([]),
        physical,
      ),
    ).toThrow('Cannot run a grappa plan on clang')
  })
})

describe('backendServiceFor', () => {
  it('routes each backend to its service', () => {
    const clients = createFakeClients()
    expect(backendServiceFor('myria', clients)).toBeInstanceOf(MyriaBackend)
    expect(backendServiceFor('clang', clients).backend).toBe('clang')
    expect(backendServiceFor('grappa', clients).backend).toBe('grappa')
  })
})

describe('status helpers', () => {
  it('profiles queries and resources only when asked', () => {
    expect(profilingModeFor(true)).toEqual(['QUERY', 'RESOURCE'])
    expect(profilingModeFor(false)).toEqual([])
  })

  it('adds elapsedStr only when the backend reports elapsed time', () => {
    expect(withElapsed({ queryId: 1, status: 'SUCCESS', elapsedNanos: 5e8 })).toEqual({
      queryId: 1,
      status: 'SUCCESS',
      elapsedNanos: 5e8,
      elapsedStr: ' 0.500000s',
    })
    expect(withElapsed({ queryId: 1, status: 'RUNNING', elapsedNanos: null })).toEqual({
      queryId: 1,
      status: 'RUNNING',
      elapsedNanos: null,
    })
    expect(withElapsed({ queryId: 1 })).toEqual({ queryId: 1 })
  })
})
