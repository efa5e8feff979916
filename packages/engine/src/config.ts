/**
 * Configuration module: validates environment variables at startup.
 *
 * All config is sourced from process.env and validated eagerly. Invalid
 * values throw immediately so the process fails fast.
 */

import { resolve } from "node:path"

import { isLogLevel, type LogLevel, type TracingConfig } from "@waveline/shared/tracing"

export type DeviationDefaultAction = "auto_fix" | "checkpoint"

export type DatabaseTarget =
  | { kind: "sqlite"; filename: string }
  | { kind: "postgres"; connectionString: string }

export interface Config {
  database: DatabaseTarget
  /** Root for run directories and the default SQLite file. */
  dataDir: string
  port: number
  host: string
  nodeEnv: string
  logLevel: LogLevel
  /** Worker pool bound; steps of one wave run at most this many at once. */
  maxParallel: number
  /** Per-step worker timeout; 0 disables it. */
  stepTimeoutMs: number
  /** Verdict for a deviation no rule matches. */
  deviationDefaultAction: DeviationDefaultAction
  /** Gate critical-risk steps behind a checkpoint. */
  approveCriticalSteps: boolean
  /** The service version comes from the shared defaults. */
  tracing: Omit<TracingConfig, "serviceVersion">
}

/**
 * Load and validate configuration from environment variables.
 * Throws on any value that is present but unusable.
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): Config {
  const dataDir = resolve(env.WAVELINE_DATA_DIR ?? ".waveline")

  const logLevel = env.LOG_LEVEL ?? "info"
  if (!isLogLevel(logLevel)) {
    throw new Error(`Invalid LOG_LEVEL: ${logLevel}. Must be "debug", "info", "warn", or "error".`)
  }

  const deviationDefaultAction = env.DEVIATION_DEFAULT_ACTION ?? "auto_fix"
  if (deviationDefaultAction !== "auto_fix" && deviationDefaultAction !== "checkpoint") {
    throw new Error(
      `Invalid DEVIATION_DEFAULT_ACTION: ${deviationDefaultAction}. Must be "auto_fix" or "checkpoint".`,
    )
  }

  const exporterType = env.OTEL_EXPORTER_TYPE ?? "otlp"
  if (exporterType !== "otlp" && exporterType !== "console" && exporterType !== "none") {
    throw new Error(
      `Invalid OTEL_EXPORTER_TYPE: ${exporterType}. Must be "otlp", "console", or "none".`,
    )
  }

  const maxParallel = parseIntOr(env.MAX_PARALLEL, 4)
  if (maxParallel < 1) {
    throw new Error(`Invalid MAX_PARALLEL: ${maxParallel}. Must be at least 1.`)
  }

  const stepTimeoutMs = parseIntOr(env.STEP_TIMEOUT_MS, 0)
  if (stepTimeoutMs < 0) {
    throw new Error(`Invalid STEP_TIMEOUT_MS: ${stepTimeoutMs}. Must not be negative.`)
  }

  return {
    database: parseDatabaseTarget(env.DATABASE_URL, dataDir),
    dataDir,
    port: parseIntOr(env.PORT, 4100),
    host: env.HOST ?? "127.0.0.1",
    nodeEnv: env.NODE_ENV ?? "development",
    logLevel,
    maxParallel,
    stepTimeoutMs,
    deviationDefaultAction,
    approveCriticalSteps: env.APPROVE_CRITICAL_STEPS === "true",
    tracing: {
      enabled: env.OTEL_TRACING_ENABLED === "true",
      endpoint: env.OTEL_EXPORTER_OTLP_ENDPOINT ?? "http://localhost:4318",
      sampleRate: parseFloatOr(env.OTEL_SAMPLE_RATE, 1.0),
      serviceName: env.OTEL_SERVICE_NAME ?? "waveline-engine",
      exporterType,
    },
  }
}

/**
 * postgres:// and postgresql:// URLs select PostgreSQL. Anything else is a
 * SQLite filename (":memory:" included); unset means `<dataDir>/engine.db`.
 */
function parseDatabaseTarget(url: string | undefined, dataDir: string): DatabaseTarget {
  if (!url) return { kind: "sqlite", filename: resolve(dataDir, "engine.db") }
  if (url.startsWith("postgres://") || url.startsWith("postgresql://")) {
    return { kind: "postgres", connectionString: url }
  }
  const filename = url.startsWith("sqlite:") ? url.slice("sqlite:".length) : url
  return { kind: "sqlite", filename: filename === ":memory:" ? filename : resolve(filename) }
}

function parseIntOr(value: string | undefined, fallback: number): number {
  if (value === undefined) return fallback
  const parsed = parseInt(value, 10)
  if (Number.isNaN(parsed)) return fallback
  return parsed
}

function parseFloatOr(value: string | undefined, fallback: number): number {
  if (value === undefined) return fallback
  const parsed = parseFloat(value)
  if (Number.isNaN(parsed)) return fallback
  return Math.max(0, Math.min(1, parsed))
}
