/**
 * Submitted programs and their statuses, with sequential query ids.
 */

import type { QueryStatus } from 'relplan'

export interface LoggedQuery<TProgram> {
  queryId: number
  program: TProgram
  status: QueryStatus
}

export class QueryLog<TProgram> {
  private entries = new Map<number, LoggedQuery<TProgram>>()
  private nextId: number

  constructor(firstId = 1) {
    this.nextId = firstId
  }

  record(program: TProgram, status = 'ACCEPTED'): LoggedQuery<TProgram> {
    const queryId = this.nextId++
    const entry: LoggedQuery<TProgram> = { queryId, program, status: { queryId, status } }
    this.entries.set(queryId, entry)
    return entry
  }

  get(queryId: number): LoggedQuery<TProgram> | undefined {
    return this.entries.get(queryId)
  }

  /**
   * Move a query to a new status. Extra fields are merged into the status
   * the backend reports.
   */
  update(queryId: number, status: string, fields: Record<string, unknown> = {}): QueryStatus {
    const entry = this.entries.get(queryId)
    if (!entry) {
      throw new Error(`Query not found: ${queryId}`)
    }
    entry.status = { ...entry.status, ...fields, queryId, status }
    return { ...entry.status }
  }

  /** Programs in submission order */
  programs(): TProgram[] {
    return [...this.entries.values()].map((entry) => entry.program)
  }

  clear(): void {
    this.entries.clear()
  }

  get size(): number {
    return this.entries.size
  }
}
