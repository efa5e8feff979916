/**
 * OpenTelemetry SDK lifecycle for the engine process.
 *
 * `initTracing()` runs once before the server starts; `shutdownTracing()`
 * flushes buffered spans during shutdown. While the SDK is off, the OTel
 * API hands out no-op spans, so `withSpan` call sites need no guards.
 */

import { OTLPTraceExporter } from "@opentelemetry/exporter-trace-otlp-http"
import { HttpInstrumentation } from "@opentelemetry/instrumentation-http"
import { resourceFromAttributes } from "@opentelemetry/resources"
import { NodeSDK } from "@opentelemetry/sdk-node"
import {
  AlwaysOnSampler,
  BatchSpanProcessor,
  ConsoleSpanExporter,
  ParentBasedSampler,
  type Sampler,
  SimpleSpanProcessor,
  type SpanProcessor,
  TraceIdRatioBasedSampler,
} from "@opentelemetry/sdk-trace-node"
import { ATTR_SERVICE_NAME, ATTR_SERVICE_VERSION } from "@opentelemetry/semantic-conventions"

export {
  isLogLevel,
  LOG_LEVELS,
  type LogFields,
  type LogLevel,
  type LogSink,
  TracingLogger,
  type TracingLoggerOptions,
} from "./logger.js"
export { addSpanEvent, type SpanOptions, WavelineAttributes, WavelineEvents, withSpan } from "./spans.js"

export type TracingExporterType = "otlp" | "console" | "none"

export interface TracingConfig {
  enabled: boolean
  /** Collector base URL; spans are posted to `${endpoint}/v1/traces`. */
  endpoint: string
  /** Fraction of root traces kept, 0 to 1. */
  sampleRate: number
  serviceName: string
  serviceVersion: string
  exporterType: TracingExporterType
}

export const DEFAULT_TRACING_CONFIG: TracingConfig = {
  enabled: false,
  endpoint: "http://localhost:4318",
  sampleRate: 1.0,
  serviceName: "waveline-engine",
  serviceVersion: "0.1.0",
  exporterType: "otlp",
}

/** Every trace at rate 1, otherwise a ratio of root traces; children follow their parent. */
export function createSampler(sampleRate: number): Sampler {
  if (sampleRate >= 1) return new AlwaysOnSampler()
  return new ParentBasedSampler({ root: new TraceIdRatioBasedSampler(Math.max(0, sampleRate)) })
}

/** Console spans are exported one by one; OTLP spans are batched. Null for "none". */
export function createSpanProcessor(config: Pick<TracingConfig, "exporterType" | "endpoint">): SpanProcessor | null {
  switch (config.exporterType) {
    case "none":
      return null
    case "console":
      return new SimpleSpanProcessor(new ConsoleSpanExporter())
    case "otlp":
      return new BatchSpanProcessor(new OTLPTraceExporter({ url: `${config.endpoint}/v1/traces` }))
  }
}

let sdk: NodeSDK | undefined

/**
 * Start the SDK. Returns whether tracing is on afterwards; a disabled config
 * or the "none" exporter leaves it off, and a second call while running
 * changes nothing.
 */
export function initTracing(config: Partial<TracingConfig> = {}): boolean {
  if (sdk) return true

  const resolved: TracingConfig = { ...DEFAULT_TRACING_CONFIG, ...config }
  const processor = resolved.enabled ? createSpanProcessor(resolved) : null
  if (!processor) return false

  sdk = new NodeSDK({
    resource: resourceFromAttributes({
      [ATTR_SERVICE_NAME]: resolved.serviceName,
      [ATTR_SERVICE_VERSION]: resolved.serviceVersion,
    }),
    sampler: createSampler(resolved.sampleRate),
    spanProcessors: [processor],
    instrumentations: [new HttpInstrumentation()],
  })
  sdk.start()
  return true
}

export function isTracingActive(): boolean {
  return sdk !== undefined
}

/** Flush and stop the SDK; a no-op when it never started. */
export async function shutdownTracing(): Promise<void> {
  const running = sdk
  sdk = undefined
  await running?.shutdown()
}
