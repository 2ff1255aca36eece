/**
 * Graphviz Rendering Tests
 */

import { describe, it, expect } from 'vitest'
import { DatalogFrontend, LogicalPlan, escapeDotLabel, renderDot } from '../../src'
import { boundMyrial, lower } from './fixtures/plans'

const HEADER = [
  'digraph G {',
  '  rankdir = "BT";',
  '  node [fontname="Helvetica", fontsize=10, shape=oval, style=filled, fillcolor=white];',
]

describe('renderDot', () => {
  it('draws a logical rule as one cluster with edges pointing upwards', async () => {
    const plan = new LogicalPlan(await new DatalogFrontend().translate('A(x) :- R(x,3)'))
    expect(renderDot(plan).split('\n')).toEqual([
      ...HEADER,
      '',
      '  subgraph cluster_0 {',
      '    label = "A";',
      '    n0 [label="Apply(x=$0)"];',
      '    n1 [label="Select(($1 = 3))"];',
      '    n2 [label="Scan(public:adhoc:R)"];',
      '  }',
      '',
      '  n2 -> n1;',
      '  n1 -> n0;',
      '}',
    ])
  })

  it('numbers nodes across clusters', async () => {
    const plan = new LogicalPlan(await new DatalogFrontend().translate('A(x) :- R(x,y).\nB(y) :- S(y,z).'))
    const lines = renderDot(plan).split('\n')
    expect(lines).toContain('  subgraph cluster_1 {')
    expect(lines).toContain('    label = "B";')
    expect(lines.filter((line) => line.includes('[label='))).toHaveLength(4)
    expect(lines.slice(-3)).toEqual(['  n1 -> n0;', '  n3 -> n2;', '}'])
  })

  it('splits exchanges into consumer and producer nodes', async () => {
    const plan = lower(await boundMyrial('X = select distinct dept from Emp; store(X, D);'), 'myria-left-deep')
    const lines = renderDot(plan).split('\n')
    expect(lines.filter((line) => line.includes('[label=')).map((line) => line.trim())).toEqual([
      'n0 [label="MyriaStore(public:adhoc:D)"];',
      'n1 [label="MyriaDupElim"];',
      'n2 [label="MyriaShuffleConsumer"];',
      'n3 [label="MyriaShuffleProducer(h($0))"];',
      'n4 [label="MyriaApply(dept=$2)"];',
      'n5 [label="MyriaScan(public:adhoc:Emp)"];',
    ])
    expect(lines).toContain('  n3 -> n2;')
  })
})

describe('escapeDotLabel', () => {
  it('escapes quotes, backslashes and newlines', () => {
    expect(escapeDotLabel('say "hi"\\\n')).toBe('say \\"hi\\"\\\\\\n')
  })
})
