/**
 * Language Front-end Interface
 *
 * A front-end turns query text into logical rules. Each supported language
 * has one; the plan stager picks it from the request.
 */

import type { LogicalOperator, Rule } from '../algebra'
import type { Catalog } from '../catalog'

export type LogicalRule = Rule<LogicalOperator>

export interface LanguageFrontend {
  /** Language identifier (e.g. 'datalog', 'myrial') */
  readonly name: string

  /**
   * Parse and translate the query.
   * @throws QuerySyntaxError when the text does not parse
   * @throws SemanticError when it parses but cannot be evaluated
   */
  translate(query: string, catalog: Catalog): Promise<LogicalRule[]>

  /**
   * Make translated rules ready for physical lowering, e.g. by replacing
   * placeholder schemes with the catalog's.
   */
  bind(rules: readonly LogicalRule[], catalog: Catalog): Promise<LogicalRule[]>
}
