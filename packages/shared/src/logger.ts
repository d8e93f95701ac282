import type { LogLevel } from "./config-schema.js"

export interface LogContext {
  domain?: string
  phase?: string
  [key: string]: unknown
}

export interface LogEntry {
  level: LogLevel
  scope: string
  message: string
  error?: unknown
  context?: LogContext
  timestamp: string
}

export type LogSink = (entry: LogEntry) => void

export interface Logger {
  debug(message: string, context?: LogContext): void
  info(message: string, context?: LogContext): void
  warn(message: string, error?: unknown, context?: LogContext): void
  error(message: string, error?: unknown, context?: LogContext): void
  child(scope: string): Logger
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
}

function describeError(error: unknown): string {
  if (error instanceof Error) return error.message
  return String(error)
}

export function consoleSink(entry: LogEntry): void {
  const suffix = entry.error === undefined ? "" : `: ${describeError(entry.error)}`
  const line = `[${entry.scope}] ${entry.message}${suffix}`
  if (entry.level === "warn" || entry.level === "error") {
    console.error(line)
  } else {
    console.log(line)
  }
}

export interface CreateLoggerOptions {
  scope?: string
  level?: LogLevel
  sink?: LogSink
}

export function createLogger(options: CreateLoggerOptions = {}): Logger {
  const { scope = "sslctl", level = "info", sink = consoleSink } = options
  const threshold = LEVEL_ORDER[level]

  const log = (entryLevel: LogLevel, message: string, error?: unknown, context?: LogContext): void => {
    if (LEVEL_ORDER[entryLevel] < threshold) return
    sink({
      level: entryLevel,
      scope,
      message,
      error,
      context,
      timestamp: new Date().toISOString(),
    })
  }

  return {
    debug: (message, context) => log("debug", message, undefined, context),
    info: (message, context) => log("info", message, undefined, context),
    warn: (message, error, context) => log("warn", message, error, context),
    error: (message, error, context) => log("error", message, error, context),
    child: childScope => createLogger({ scope: `${scope}:${childScope}`, level, sink }),
  }
}

/** Discards everything. */
export const silentLogger: Logger = createLogger({ sink: () => {} })
