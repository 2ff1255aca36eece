/**
 * Executor Module
 *
 * Backend clients, program compilation and query submission.
 */

// Client interfaces
export type { MyriaClient, CodegenClient, BackendClients } from './provider'

// REST connections (default)
export { MyriaConnection } from './myria/connection'
export type { MyriaConnectionConfig } from './myria/connection'
export { CodegenConnection } from './codegen/connection'
export type { CodegenConnectionConfig } from './codegen/connection'
export { RestClient } from './rest'
export type { FetchLike, RestRequest } from './rest'

// Payload schemas
export {
  ColumnTypeSchema,
  DatasetDescriptorSchema,
  QueryStatusSchema,
  WorkersSchema,
  WorkersAliveSchema,
} from './schemas'

// Backend services
export {
  MyriaBackend,
  CodegenBackend,
  backendServiceFor,
  profilingModeFor,
  withElapsed,
  PROFILING_MODES,
} from './backend'
export type { BackendService, ReportedStatus } from './backend'

// Types
export type {
  ProfilingMode,
  DatasetDescriptor,
  QueryStatus,
  OperatorJson,
  FragmentJson,
  MyriaProgram,
  CodegenProgram,
  CompiledProgram,
  Submission,
} from './types'
