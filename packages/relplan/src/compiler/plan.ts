/**
 * Staged plans
 *
 * Immutable rule lists with a memoized string form. The string is computed
 * on first use and reused by every later serialization of the same plan.
 */

import { formatLogical, formatPhysical, formatRules } from '../algebra'
import type { LogicalOperator, PhysicalOperator, PhysicalStore, Rule } from '../algebra'
import type { TargetAlgebra } from './target'

abstract class Plan<TOperator> {
  private rendered: string | null = null

  constructor(readonly rules: readonly Rule<TOperator>[]) {}

  protected abstract formatOperator(op: TOperator): string

  toString(): string {
    if (this.rendered === null) {
      this.rendered = formatRules(this.rules, (op) => this.formatOperator(op))
    }
    return this.rendered
  }

  toJSON(): string {
    return this.toString()
  }
}

export class LogicalPlan extends Plan<LogicalOperator> {
  protected formatOperator(op: LogicalOperator): string {
    return formatLogical(op)
  }
}

/**
 * Physical plan for one target algebra. Every rule is rooted at a store.
 */
export class PhysicalPlan extends Plan<PhysicalStore> {
  constructor(
    readonly algebra: TargetAlgebra,
    rules: readonly Rule<PhysicalStore>[],
  ) {
    super(rules)
  }

  protected formatOperator(op: PhysicalOperator): string {
    return formatPhysical(op)
  }
}
