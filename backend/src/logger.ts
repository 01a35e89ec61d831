/**
 * Console logger with a level threshold.
 * Same call shape everywhere: (data: unknown, msg?: string) => void
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

export type LoggerFn = (data: unknown, msg?: string) => void

export interface Logger {
  debug: LoggerFn
  info: LoggerFn
  warn: LoggerFn
  error: LoggerFn
}

export interface LogSink {
  log(...args: unknown[]): void
  warn(...args: unknown[]): void
  error(...args: unknown[]): void
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
}

function format(data: unknown): unknown {
  if (data instanceof Error) return data.stack ?? data.message
  return typeof data === 'object' && data !== null ? JSON.stringify(data) : data
}

export function createLogger(scope: string, threshold: LogLevel = 'info', sink: LogSink = console): Logger {
  const createLogMethod = (level: LogLevel): LoggerFn => {
    const write = level === 'error' ? sink.error : level === 'warn' ? sink.warn : sink.log

    return (data: unknown, msg?: string) => {
      if (LEVEL_ORDER[level] < LEVEL_ORDER[threshold]) return

      const prefix = `[${new Date().toISOString()}] [${scope}:${level}]`
      if (msg) {
        write.call(sink, prefix, msg, format(data))
      } else {
        write.call(sink, prefix, format(data))
      }
    }
  }

  return {
    debug: createLogMethod('debug'),
    info: createLogMethod('info'),
    warn: createLogMethod('warn'),
    error: createLogMethod('error'),
  }
}
