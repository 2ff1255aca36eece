import { SemanticError } from '../errors'
import type { RelationKey } from './types'

export const DEFAULT_USER = 'public'
export const DEFAULT_PROGRAM = 'adhoc'

/**
 * Parse `name`, `program:name` or `user:program:name`.
 */
export function parseRelationKey(text: string): RelationKey {
  const parts = text.split(':').map((part) => part.trim())
  if (parts.some((part) => part.length === 0) || parts.length > 3) {
    throw new SemanticError(`Invalid relation name "${text}"`)
  }
  const [first, second, third] = parts
  if (third !== undefined && second !== undefined) return { user: first, program: second, name: third }
  if (second !== undefined) return { user: DEFAULT_USER, program: first, name: second }
  return { user: DEFAULT_USER, program: DEFAULT_PROGRAM, name: first }
}

export function formatRelationKey(key: RelationKey): string {
  return `${key.user}:${key.program}:${key.name}`
}

export function relationKeyEquals(a: RelationKey, b: RelationKey): boolean {
  return a.user === b.user && a.program === b.program && a.name === b.name
}
