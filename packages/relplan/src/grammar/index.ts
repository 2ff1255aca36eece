/**
 * Grammar Module
 *
 * Language front-ends: Datalog (parser per query) and MyriaL/SQL (one
 * shared parser behind a lock).
 */

export type { LanguageFrontend, LogicalRule } from './types'
export type { Token, TokenKind, LexerOptions } from './lexer'
export { tokenize, TokenStream } from './lexer'
export type { GrammarEngine } from './guard'
export { GuardedParser } from './guard'

export * from './datalog'
export * from './myrial'
