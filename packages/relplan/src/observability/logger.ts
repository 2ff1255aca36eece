/**
 * Structured logging to stderr, one JSON object per line.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error']

export interface LogEvent {
  ts: string
  level: LogLevel
  event: string
  duration_ms?: number
  err_code?: string
  err_message?: string
  [key: string]: unknown
}

export type LogSink = (line: string) => void

export class Logger {
  private readonly minLevel: LogLevel
  private readonly sink: LogSink

  constructor(minLevel: LogLevel = 'info', sink: LogSink = (line) => console.error(line)) {
    this.minLevel = minLevel
    this.sink = sink
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(this.minLevel)
  }

  private log(level: LogLevel, event: string, data?: Record<string, unknown>): void {
    if (!this.shouldLog(level)) {
      return
    }

    const logEvent: LogEvent = {
      ts: new Date().toISOString(),
      level,
      event,
      ...data,
    }
    this.sink(JSON.stringify(logEvent))
  }

  debug(event: string, data?: Record<string, unknown>): void {
    this.log('debug', event, data)
  }

  info(event: string, data?: Record<string, unknown>): void {
    this.log('info', event, data)
  }

  warn(event: string, data?: Record<string, unknown>): void {
    this.log('warn', event, data)
  }

  error(event: string, data?: Record<string, unknown>): void {
    this.log('error', event, data)
  }

  /** One line per handled request */
  request(route: string, duration_ms: number, status: number, err?: Error & { code?: string }): void {
    if (!err) {
      this.info('request.success', { route, duration_ms, status })
      return
    }
    this.log(status >= 500 ? 'error' : 'warn', 'request.error', {
      route,
      duration_ms,
      status,
      err_code: err.code ?? err.name,
      err_message: err.message,
    })
  }
}

/** Logger that drops everything; the default where none is supplied */
export const silentLogger = new Logger('error', () => undefined)
