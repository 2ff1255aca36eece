export type { Dialect, ScalarExpr, EmitItem, RelationExpr, FromItem, SelectExpr, Statement } from './ast'
export { MyrialParser, SQL_OUTPUT } from './parser'
export { StatementProcessor } from './interpreter'
export { MyrialFrontend } from './frontend'
