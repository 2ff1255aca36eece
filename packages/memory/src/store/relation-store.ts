/**
 * In-Memory Relation Store
 *
 * Relation metadata keyed by `user:program:name`. Shared by both in-memory
 * backends so a test can register a relation once.
 */

import { formatRelationKey, parseRelationKey } from 'relplan'
import type { DatasetDescriptor, RelationKey, Scheme } from 'relplan'

export interface StoredRelation {
  key: RelationKey
  scheme: Scheme
  numTuples: number
}

export class RelationStore {
  /** All relations by formatted key */
  private relations = new Map<string, StoredRelation>()

  /**
   * Register (or replace) a relation. Short names take the default user and
   * program.
   */
  put(name: string | RelationKey, scheme: Scheme, numTuples = 0): StoredRelation {
    const key = typeof name === 'string' ? parseRelationKey(name) : name
    const stored: StoredRelation = { key, scheme: scheme.map((column) => ({ ...column })), numTuples }
    this.relations.set(formatRelationKey(key), stored)
    return stored
  }

  get(key: RelationKey): StoredRelation | undefined {
    return this.relations.get(formatRelationKey(key))
  }

  has(key: RelationKey): boolean {
    return this.relations.has(formatRelationKey(key))
  }

  delete(key: RelationKey): boolean {
    return this.relations.delete(formatRelationKey(key))
  }

  /** Formatted keys, in registration order */
  keys(): string[] {
    return [...this.relations.keys()]
  }

  clear(): void {
    this.relations.clear()
  }

  get size(): number {
    return this.relations.size
  }

  /**
   * Metadata in the shape the REST services report it.
   */
  describe(key: RelationKey): DatasetDescriptor | null {
    const stored = this.get(key)
    if (!stored) return null
    return {
      relationKey: {
        userName: stored.key.user,
        programName: stored.key.program,
        relationName: stored.key.name,
      },
      schema: {
        columnNames: stored.scheme.map((column) => column.name),
        columnTypes: stored.scheme.map((column) => column.type),
      },
      numTuples: stored.numTuples,
    }
  }
}
