import type { Catalog } from '../../catalog'
import type { GuardedParser } from '../guard'
import type { LanguageFrontend, LogicalRule } from '../types'
import type { Dialect } from './ast'
import { StatementProcessor } from './interpreter'

/**
 * MyriaL and SQL share one guarded parser. Only the parse holds the lock;
 * statements are evaluated against the catalog after it is released.
 */
export class MyrialFrontend implements LanguageFrontend {
  constructor(
    readonly name: Dialect,
    private readonly parser: GuardedParser,
  ) {}

  async translate(query: string, catalog: Catalog): Promise<LogicalRule[]> {
    const statements = await this.parser.parse(query, this.name)
    return new StatementProcessor(catalog).evaluate(statements)
  }

  // schemes already come from the catalog during evaluation
  async bind(rules: readonly LogicalRule[], _catalog?: Catalog): Promise<LogicalRule[]> {
    return [...rules]
  }
}
