export { DatalogParser } from './parser'
export type { DatalogRule, DatalogAtom, DatalogTerm, DatalogLiteral, DatalogComparison } from './parser'
export { DatalogCompiler, DatalogFrontend, resolveScans } from './compiler'
