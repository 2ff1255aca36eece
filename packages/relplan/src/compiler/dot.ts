/**
 * Graphviz rendering
 *
 * One cluster per rule, operators as nodes, edges pointing from each input
 * to the operator reading it (drawn bottom to top).
 */

import { logicalLabel, physicalChildren, physicalLabel, childrenOf } from '../algebra'
import type { LogicalOperator, PhysicalOperator } from '../algebra'
import type { LogicalPlan, PhysicalPlan } from './plan'

interface DotNode {
  label: string
  children: DotNode[]
}

function logicalTree(op: LogicalOperator): DotNode {
  return { label: logicalLabel(op), children: childrenOf(op).map(logicalTree) }
}

function physicalTree(op: PhysicalOperator): DotNode {
  const children = physicalChildren(op).map(physicalTree)
  if (op.kind === 'exchange') {
    return { label: op.consumer, children: [{ label: physicalLabel(op), children }] }
  }
  return { label: physicalLabel(op), children }
}

export function escapeDotLabel(label: string): string {
  return label.replace(/\\/g, '\\\\').replace(/"/g, '\\"').replace(/\n/g, '\\n')
}

export function renderDot(plan: LogicalPlan | PhysicalPlan): string {
  const trees: { name: string; root: DotNode }[] =
    'algebra' in plan
      ? plan.rules.map((rule) => ({ name: rule.name, root: physicalTree(rule.plan) }))
      : plan.rules.map((rule) => ({ name: rule.name, root: logicalTree(rule.plan) }))

  const lines = [
    'digraph G {',
    '  rankdir = "BT";',
    '  node [fontname="Helvetica", fontsize=10, shape=oval, style=filled, fillcolor=white];',
  ]
  const edges: string[] = []
  let next = 0

  trees.forEach((tree, index) => {
    lines.push('', `  subgraph cluster_${index} {`, `    label = "${escapeDotLabel(tree.name)}";`)
    const visit = (node: DotNode): string => {
      const id = `n${next++}`
      lines.push(`    ${id} [label="${escapeDotLabel(node.label)}"];`)
      for (const child of node.children) {
        edges.push(`  ${visit(child)} -> ${id};`)
      }
      return id
    }
    visit(tree.root)
    lines.push('  }')
  })

  if (edges.length > 0) lines.push('', ...edges)
  lines.push('}')
  return lines.join('\n')
}
