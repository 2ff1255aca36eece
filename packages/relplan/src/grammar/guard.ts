/**
 * Parser guard
 *
 * The MyriaL/SQL grammar engine keeps per-parse state on a single shared
 * instance. Every parse goes through one mutex; the lock covers the parse
 * call only, never catalog lookups or plan evaluation.
 */

import { Mutex } from '../utils/mutex'
import type { Dialect, Statement } from './myrial/ast'

/**
 * Anything that can turn MyriaL or SQL text into statements.
 */
export interface GrammarEngine {
  parse(source: string, dialect: Dialect): Statement[] | Promise<Statement[]>
}

export class GuardedParser {
  constructor(
    private readonly engine: GrammarEngine,
    private readonly lock: Mutex = new Mutex(),
  ) {}

  parse(source: string, dialect: Dialect): Promise<Statement[]> {
    return this.lock.runExclusive(() => this.engine.parse(source, dialect))
  }
}
