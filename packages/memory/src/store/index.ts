export { RelationStore } from './relation-store'
export type { StoredRelation } from './relation-store'
export { QueryLog } from './query-log'
export type { LoggedQuery } from './query-log'
