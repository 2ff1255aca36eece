export { Logger, silentLogger, LOG_LEVELS } from './logger'
export type { LogLevel, LogEvent, LogSink } from './logger'
