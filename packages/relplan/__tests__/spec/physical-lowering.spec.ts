/**
 * Physical Lowering Tests
 */

import { describe, it, expect } from 'vitest'
import { hypercubeDimensions, physicalChildren } from '../../src'
import type { PhysicalOperator } from '../../src'
import { boundDatalog, boundMyrial, lower } from './fixtures/plans'

function collect(op: PhysicalOperator, kind: PhysicalOperator['kind']): PhysicalOperator[] {
  const own = op.kind === kind ? [op] : []
  return [...own, ...physicalChildren(op).flatMap((child) => collect(child, kind))]
}

const JOIN = 'Q(x,z) :- R(x,y), S(y,z)'
const CROSS = 'A(x,z) :- R(x,_), S(_,z)'
const TRIANGLE = 'Q(x,y,z) :- R(x,y), S(y,z), T(z,x)'

describe('myria-left-deep', () => {
  it('shuffles both join inputs on the join keys', async () => {
    const plan = lower(await boundDatalog(JOIN), 'myria-left-deep')
    expect(plan.toString()).toBe(
      'Q = MyriaStore(public:adhoc:Q)[MyriaApply(x=$0,z=$3)[MyriaSymmetricHashJoin($1=$0)[' +
        'MyriaShuffleConsumer[MyriaShuffleProducer(h($1))[MyriaScan(public:adhoc:R)]],' +
        'MyriaShuffleConsumer[MyriaShuffleProducer(h($0))[MyriaScan(public:adhoc:S)]]]]]',
    )
    expect(plan.algebra).toBe('myria-left-deep')
  })

  it('broadcasts the right input of a cross product', async () => {
    const plan = lower(await boundDatalog(CROSS), 'myria-left-deep')
    expect(plan.toString()).toBe(
      'A = MyriaStore(public:adhoc:A)[MyriaApply(x=$0,z=$3)[MyriaCrossProduct[' +
        'MyriaScan(public:adhoc:R),MyriaBroadcastConsumer[MyriaBroadcastProducer[MyriaScan(public:adhoc:S)]]]]]',
    )
  })

  it('keeps non-equality join terms in a select above the join', async () => {
    const plan = lower(await boundDatalog('A(x) :- R(x,y), S(y,z), x < z'), 'myria-left-deep')
    const [store] = plan.rules.map((rule) => rule.plan)
    const selects = store ? collect(store, 'select') : []
    expect(selects).toHaveLength(1)
    const [select] = selects
    expect(select?.kind === 'select' ? select.input.kind : null).toBe('hash-join')
  })

  it('shuffles grouped aggregates on the grouping columns', async () => {
    const plan = lower(await boundDatalog('C(x, count(y)) :- R(x,y)'), 'myria-left-deep')
    expect(plan.toString()).toBe(
      'C = MyriaStore(public:adhoc:C)[MyriaGroupBy(x=$0; count_y=COUNT($1))[' +
        'MyriaShuffleConsumer[MyriaShuffleProducer(h($0))[MyriaScan(public:adhoc:R)]]]]',
    )
  })

  it('collects global aggregates', async () => {
    const plan = lower(await boundDatalog('N(count(x)) :- R(x,_)'), 'myria-left-deep')
    expect(plan.toString()).toBe(
      'N = MyriaStore(public:adhoc:N)[MyriaGroupBy(; count_x=COUNT($0))[' +
        'MyriaCollectConsumer[MyriaCollectProducer[MyriaScan(public:adhoc:R)]]]]',
    )
  })

  it('shuffles on every column before duplicate elimination', async () => {
    const plan = lower(await boundMyrial('X = select distinct dept from Emp; store(X, D);'), 'myria-left-deep')
    expect(plan.toString()).toBe(
      'D = MyriaStore(public:adhoc:D)[MyriaDupElim[MyriaShuffleConsumer[MyriaShuffleProducer(h($0))[' +
        'MyriaApply(dept=$2)[MyriaScan(public:adhoc:Emp)]]]]]',
    )
  })
})

describe('myria-hypercube', () => {
  it('lowers a join tree into one multiway join', async () => {
    const plan = lower(await boundDatalog(TRIANGLE), 'myria-hypercube', { numServers: 8 })
    const [store] = plan.rules.map((rule) => rule.plan)
    const joins = store ? collect(store, 'multiway-join') : []
    expect(joins).toHaveLength(1)
    const [join] = joins
    if (join?.kind !== 'multiway-join') throw new Error('expected a multiway join')

    expect(join.name).toBe('MyriaLeapFrogJoin')
    expect(join.joinFields).toEqual([
      [{ input: 0, column: 0 }, { input: 2, column: 1 }],
      [{ input: 0, column: 1 }, { input: 1, column: 0 }],
      [{ input: 1, column: 1 }, { input: 2, column: 0 }],
    ])
    expect(
      join.inputs.map((input) =>
        input.kind === 'exchange' ? { columns: input.columns, layout: input.hypercube, producer: input.producer } : null,
      ),
    ).toEqual([
      { columns: [0, 1], layout: { dimensions: [2, 2, 2], mappedDimensions: [0, 1] }, producer: 'MyriaHyperCubeShuffleProducer' },
      { columns: [0, 1], layout: { dimensions: [2, 2, 2], mappedDimensions: [1, 2] }, producer: 'MyriaHyperCubeShuffleProducer' },
      { columns: [1, 0], layout: { dimensions: [2, 2, 2], mappedDimensions: [0, 2] }, producer: 'MyriaHyperCubeShuffleProducer' },
    ])
  })

  it('renders the hypercube shuffles', async () => {
    const plan = lower(await boundDatalog(JOIN), 'myria-hypercube', { numServers: 4 })
    expect(plan.toString()).toBe(
      'Q = MyriaStore(public:adhoc:Q)[MyriaApply(x=$0,z=$3)[MyriaLeapFrogJoin([0.$1,1.$0])[' +
        'MyriaHyperCubeShuffleConsumer[MyriaHyperCubeShuffleProducer(h($1); dims=4)[MyriaScan(public:adhoc:R)]],' +
        'MyriaHyperCubeShuffleConsumer[MyriaHyperCubeShuffleProducer(h($0); dims=4)[MyriaScan(public:adhoc:S)]]]]]',
    )
  })

  it('falls back to a broadcast cross product without join variables', async () => {
    const hypercube = lower(await boundDatalog(CROSS), 'myria-hypercube')
    const leftDeep = lower(await boundDatalog(CROSS), 'myria-left-deep')
    expect(hypercube.toString()).toBe(leftDeep.toString())
    expect(hypercube.algebra).toBe('myria-hypercube')
  })
})

describe('code generation algebras', () => {
  it('maps clang operators one to one', async () => {
    const plan = lower(await boundDatalog(JOIN), 'clang')
    expect(plan.toString()).toBe(
      'Q = CStore(public:adhoc:Q)[CApply(x=$0,z=$3)[CHashJoin($1=$0)[CFileScan(public:adhoc:R),CFileScan(public:adhoc:S)]]]',
    )
  })

  it('maps grappa operators one to one', async () => {
    const plan = lower(await boundDatalog(JOIN), 'grappa')
    expect(plan.toString()).toBe(
      'Q = GrappaStore(public:adhoc:Q)[GrappaApply(x=$0,z=$3)[GrappaShuffleHashJoin($1=$0)[' +
        'GrappaFileScan(public:adhoc:R),GrappaFileScan(public:adhoc:S)]]]',
    )
  })

  it('moves no data between workers', async () => {
    for (const algebra of ['clang', 'grappa'] as const) {
      const plan = lower(await boundDatalog('C(x, count(y)) :- R(x,y)'), algebra)
      const [store] = plan.rules.map((rule) => rule.plan)
      expect(store ? collect(store, 'exchange') : null).toEqual([])
    }
  })
})

describe('push_sql', () => {
  it('collapses a select/apply chain into a query scan on myria', async () => {
    const plan = lower(await boundDatalog('A(x) :- R(x,3)'), 'myria-left-deep', { pushSql: true })
    expect(plan.toString()).toBe(
      'A = MyriaStore(public:adhoc:A)[MyriaQueryScan(SELECT rel0."a" AS "x" FROM "public:adhoc:R" AS rel0 WHERE (rel0."b" = 3))]',
    )
  })

  it('is ignored by the code generation algebras', async () => {
    const plan = lower(await boundDatalog('A(x) :- R(x,3)'), 'clang', { pushSql: true })
    expect(plan.toString()).toBe('A = CStore(public:adhoc:A)[CApply(x=$0)[CSelect(($1 = 3))[CFileScan(public:adhoc:R)]]]')
  })
})

describe('hypercubeDimensions', () => {
  it.each([
    [4, 1, [4]],
    [4, 2, [2, 2]],
    [6, 2, [3, 2]],
    [8, 3, [2, 2, 2]],
    [1, 2, [1, 1]],
    [0, 1, [1]],
  ])('splits %i servers over %i variables', (servers, variables, expected) => {
    expect(hypercubeDimensions(servers, variables)).toEqual(expected)
  })
})
