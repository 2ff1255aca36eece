/**
 * Datalog Compiler
 *
 * Translates parsed rules into logical operator trees:
 * - each body atom becomes a scan (or the inlined plan of another rule),
 *   filtered on its constants and repeated variables
 * - atoms are joined left-deep on the variables they share
 * - comparisons become one selection above the joins
 * - the head becomes an Apply, or a GroupBy when it aggregates
 * - rules with the same head are unioned
 */

import {
  binary,
  column,
  conjunction,
  formatRelationKey,
  literal,
  parseRelationKey,
  schemeOf,
} from '../../algebra'
import type {
  AggregateColumn,
  Column,
  Emitter,
  Expression,
  GroupingColumn,
  LogicalOperator,
  ScanOperator,
  Scheme,
} from '../../algebra'
import type { Catalog } from '../../catalog'
import { QuerySyntaxError, SemanticError, UnsupportedOperationError } from '../../errors'
import { UniqueNames } from '../../utils/names'
import type { LanguageFrontend, LogicalRule } from '../types'
import { DatalogParser } from './parser'
import type { DatalogAtom, DatalogRule, DatalogTerm } from './parser'

// =============================================================================
// TRANSLATION
// =============================================================================

interface BodyState {
  plan: LogicalOperator | null
  width: number
  bindings: Map<string, number>
}

/**
 * Translation state for one program. Not reusable across programs.
 */
export class DatalogCompiler {
  private readonly rulesByHead = new Map<string, DatalogRule[]>()
  private readonly plans = new Map<string, LogicalOperator>()
  private readonly visiting = new Set<string>()

  constructor(private readonly program: readonly DatalogRule[]) {
    for (const rule of program) {
      const key = formatRelationKey(parseRelationKey(rule.head.relation))
      const group = this.rulesByHead.get(key)
      if (group) group.push(rule)
      else this.rulesByHead.set(key, [rule])
    }
  }

  compile(): LogicalRule[] {
    if (this.program.length === 0) {
      throw new QuerySyntaxError('Unable to parse Datalog')
    }
    return [...this.rulesByHead.entries()].map(([key, group]) => {
      const relation = parseRelationKey(key)
      const [first] = group
      const arity = first ? first.head.terms.length : 0
      for (const rule of group) {
        if (rule.head.terms.length !== arity) {
          throw new SemanticError(`Rules for ${rule.head.relation} disagree on arity`)
        }
      }
      return { name: relation.name, relation, plan: this.planFor(key) }
    })
  }

  private planFor(key: string): LogicalOperator {
    const cached = this.plans.get(key)
    if (cached) return cached
    if (this.visiting.has(key)) {
      throw new UnsupportedOperationError(`Recursive rule ${key} is not supported`)
    }
    this.visiting.add(key)
    const group = this.rulesByHead.get(key) ?? []
    const branches = group.map((rule) => this.translateRule(rule))
    this.visiting.delete(key)

    const [only] = branches
    const plan: LogicalOperator =
      branches.length === 1 && only ? only : { op: 'UnionAll', inputs: branches }
    this.plans.set(key, plan)
    return plan
  }

  private translateRule(rule: DatalogRule): LogicalOperator {
    const state: BodyState = { plan: null, width: 0, bindings: new Map() }
    const comparisons: Expression[] = []

    for (const literalNode of rule.body) {
      if (literalNode.kind === 'atom') {
        this.joinAtom(state, literalNode.atom)
      }
    }
    for (const literalNode of rule.body) {
      if (literalNode.kind === 'comparison') {
        const { operator, left, right } = literalNode.comparison
        comparisons.push(binary(operator, this.termExpression(left, state, rule), this.termExpression(right, state, rule)))
      }
    }

    if (!state.plan) {
      throw new SemanticError(`Rule for ${rule.head.relation} has no relation in its body`)
    }
    const condition = conjunction(comparisons)
    const body: LogicalOperator = condition ? { op: 'Select', condition, input: state.plan } : state.plan
    return this.translateHead(rule, body, state)
  }

  private joinAtom(state: BodyState, atom: DatalogAtom): void {
    const source = this.sourceFor(atom)
    const local: Expression[] = []
    const firstSeen = new Map<string, number>()
    const shared: Expression[] = []

    atom.terms.forEach((term, j) => {
      switch (term.kind) {
        case 'constant':
          local.push(binary('=', column(j), literal(term.value)))
          return
        case 'wildcard':
          return
        case 'aggregate':
          throw new SemanticError(`Aggregate ${term.fn} is not allowed in a rule body`)
        case 'variable': {
          const seenAt = firstSeen.get(term.name)
          if (seenAt !== undefined) {
            local.push(binary('=', column(seenAt), column(j)))
            return
          }
          firstSeen.set(term.name, j)
          const bound = state.bindings.get(term.name)
          if (bound !== undefined) {
            shared.push(binary('=', column(bound), column(state.width + j)))
          } else {
            state.bindings.set(term.name, state.width + j)
          }
        }
      }
    })

    const localCondition = conjunction(local)
    const filtered: LogicalOperator = localCondition ? { op: 'Select', condition: localCondition, input: source } : source

    if (!state.plan) {
      state.plan = filtered
    } else {
      const joinCondition = conjunction(shared)
      state.plan = joinCondition
        ? { op: 'Join', condition: joinCondition, left: state.plan, right: filtered }
        : { op: 'CrossProduct', left: state.plan, right: filtered }
    }
    state.width += atom.terms.length
  }

  /**
   * Plan of an earlier rule when the atom names one, otherwise a scan with
   * a placeholder scheme of the atom's arity.
   */
  private sourceFor(atom: DatalogAtom): LogicalOperator {
    const relation = parseRelationKey(atom.relation)
    const key = formatRelationKey(relation)
    if (this.rulesByHead.has(key)) {
      const plan = this.planFor(key)
      const arity = schemeOf(plan).length
      if (arity !== atom.terms.length) {
        throw new SemanticError(`${atom.relation} has arity ${arity} but is used with ${atom.terms.length} terms`)
      }
      return plan
    }
    const scheme: Scheme = atom.terms.map((_, j): Column => ({ name: `col${j}`, type: 'LONG_TYPE' }))
    return { op: 'Scan', relation, scheme }
  }

  private termExpression(term: DatalogTerm, state: BodyState, rule: DatalogRule): Expression {
    switch (term.kind) {
      case 'constant':
        return literal(term.value)
      case 'variable': {
        const index = state.bindings.get(term.name)
        if (index === undefined) {
          throw new SemanticError(`Variable ${term.name} of rule ${rule.head.relation} is not bound in its body`)
        }
        return column(index)
      }
      case 'wildcard':
        throw new SemanticError(`Anonymous variable cannot appear in a comparison or head of ${rule.head.relation}`)
      case 'aggregate':
        throw new SemanticError(`Aggregate ${term.fn} is only allowed in a rule head`)
    }
  }

  private translateHead(rule: DatalogRule, body: LogicalOperator, state: BodyState): LogicalOperator {
    const names = new UniqueNames()
    const terms = rule.head.terms

    if (!terms.some((term) => term.kind === 'aggregate')) {
      const emitters: Emitter[] = terms.map((term, i) => ({
        name: names.take(term.kind === 'variable' ? term.name : `_COLUMN${i}_`),
        expression: this.termExpression(term, state, rule),
      }))
      return { op: 'Apply', emitters, input: body }
    }

    const groupings: GroupingColumn[] = []
    const aggregates: AggregateColumn[] = []
    // position of each head term in the GroupBy output, or its constant
    const layout: ({ group: number } | { agg: number } | { constant: Expression })[] = []

    terms.forEach((term, i) => {
      if (term.kind === 'aggregate') {
        const bound = state.bindings.get(term.variable)
        if (bound === undefined) {
          throw new SemanticError(`Variable ${term.variable} of rule ${rule.head.relation} is not bound in its body`)
        }
        layout.push({ agg: aggregates.length })
        aggregates.push({ name: names.take(`${term.fn.toLowerCase()}_${term.variable}`), fn: term.fn, column: bound })
      } else if (term.kind === 'variable') {
        const bound = state.bindings.get(term.name)
        if (bound === undefined) {
          throw new SemanticError(`Variable ${term.name} of rule ${rule.head.relation} is not bound in its body`)
        }
        layout.push({ group: groupings.length })
        groupings.push({ name: names.take(term.name), column: bound })
      } else {
        layout.push({ constant: this.termExpression(term, state, rule) })
        names.take(`_COLUMN${i}_`)
      }
    })

    const groupBy: LogicalOperator = { op: 'GroupBy', groupings, aggregates, input: body }
    const inOrder = layout.every((slot, i) => {
      if ('group' in slot) return slot.group === i
      if ('agg' in slot) return slot.agg + groupings.length === i
      return false
    })
    if (inOrder) return groupBy

    const output = schemeOf(groupBy)
    const emitters: Emitter[] = layout.map((slot, i) => {
      if ('constant' in slot) return { name: `_COLUMN${i}_`, expression: slot.constant }
      const index = 'group' in slot ? slot.group : groupings.length + slot.agg
      return { name: output[index]?.name ?? `_COLUMN${i}_`, expression: column(index) }
    })
    return { op: 'Apply', emitters, input: groupBy }
  }
}

// =============================================================================
// CATALOG BINDING
// =============================================================================

/**
 * Replace the placeholder scheme of every scan with the catalog's.
 */
export async function resolveScans(op: LogicalOperator, catalog: Catalog): Promise<LogicalOperator> {
  switch (op.op) {
    case 'Scan':
      return resolveScan(op, catalog)
    case 'Select':
    case 'Apply':
    case 'GroupBy':
    case 'Distinct':
      return { ...op, input: await resolveScans(op.input, catalog) }
    case 'Join':
    case 'CrossProduct': {
      const [left, right] = await Promise.all([resolveScans(op.left, catalog), resolveScans(op.right, catalog)])
      return { ...op, left, right }
    }
    case 'UnionAll':
      return { ...op, inputs: await Promise.all(op.inputs.map((input) => resolveScans(input, catalog))) }
  }
}

async function resolveScan(scan: ScanOperator, catalog: Catalog): Promise<ScanOperator> {
  const scheme = await catalog.getScheme(scan.relation)
  if (scheme.length !== scan.scheme.length) {
    throw new SemanticError(
      `Relation ${formatRelationKey(scan.relation)} has arity ${scheme.length} but is used with ${scan.scheme.length} terms`,
    )
  }
  return { ...scan, scheme }
}

// =============================================================================
// FRONT-END
// =============================================================================

/**
 * Datalog needs no lock: a fresh parser is created for every query.
 */
export class DatalogFrontend implements LanguageFrontend {
  readonly name = 'datalog'

  async translate(query: string): Promise<LogicalRule[]> {
    const program = new DatalogParser().parse(query)
    return new DatalogCompiler(program).compile()
  }

  async bind(rules: readonly LogicalRule[], catalog: Catalog): Promise<LogicalRule[]> {
    return Promise.all(rules.map(async (rule) => ({ ...rule, plan: await resolveScans(rule.plan, catalog) })))
  }
}
