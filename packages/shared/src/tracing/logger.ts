/**
 * JSON-lines logger that stamps each entry with the active span's
 * traceId/spanId, so a step's log lines join up with its span.
 */

import { trace } from "@opentelemetry/api"

export type LogLevel = "debug" | "info" | "warn" | "error"

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"]

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value)
}

export type LogFields = Record<string, unknown>

/** Receives one serialized line. warn and error go to stderr by default. */
export type LogSink = (level: LogLevel, line: string) => void

const stdSink: LogSink = (level, line) => {
  const out = level === "warn" || level === "error" ? process.stderr : process.stdout
  out.write(line + "\n")
}

export interface TracingLoggerOptions {
  /** Defaults to "info". */
  level?: LogLevel
  /** Defaults to "waveline". */
  serviceName?: string
  /** Bound to every line, e.g. `{ runId }`. */
  bindings?: LogFields
  sink?: LogSink
  now?: () => Date
}

export class TracingLogger {
  private readonly options: Required<TracingLoggerOptions>

  constructor(options: TracingLoggerOptions = {}) {
    this.options = {
      level: options.level ?? "info",
      serviceName: options.serviceName ?? "waveline",
      bindings: options.bindings ?? {},
      sink: options.sink ?? stdSink,
      now: options.now ?? (() => new Date()),
    }
  }

  get level(): LogLevel {
    return this.options.level
  }

  /** Same level, service and sink; `bindings` are merged over the parent's. */
  child(bindings: LogFields): TracingLogger {
    return new TracingLogger({ ...this.options, bindings: { ...this.options.bindings, ...bindings } })
  }

  debug(message: string, fields?: LogFields): void {
    this.write("debug", message, fields)
  }

  info(message: string, fields?: LogFields): void {
    this.write("info", message, fields)
  }

  warn(message: string, fields?: LogFields): void {
    this.write("warn", message, fields)
  }

  error(message: string, fields?: LogFields): void {
    this.write("error", message, fields)
  }

  private write(level: LogLevel, message: string, fields?: LogFields): void {
    if (LOG_LEVELS.indexOf(level) < LOG_LEVELS.indexOf(this.options.level)) return

    const span = trace.getActiveSpan()?.spanContext()
    const entry: LogFields = {
      level,
      time: this.options.now().toISOString(),
      service: this.options.serviceName,
      msg: message,
      ...this.options.bindings,
      ...(span ? { traceId: span.traceId, spanId: span.spanId } : {}),
      ...fields,
    }
    this.options.sink(level, JSON.stringify(entry))
  }
}
