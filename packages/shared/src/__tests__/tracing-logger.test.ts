import { trace } from "@opentelemetry/api"
import { InMemorySpanExporter, NodeTracerProvider, SimpleSpanProcessor } from "@opentelemetry/sdk-trace-node"
import { afterAll, afterEach, beforeAll, describe, expect, it, vi } from "vitest"

import { isLogLevel, type LogLevel, TracingLogger, type TracingLoggerOptions } from "../tracing/logger.js"

// startActiveSpan needs the AsyncHooks context manager that register() installs.
const provider = new NodeTracerProvider({ spanProcessors: [new SimpleSpanProcessor(new InMemorySpanExporter())] })

beforeAll(() => {
  provider.register()
})

afterAll(async () => {
  await provider.shutdown()
})

const fixedNow = () => new Date("2026-03-02T09:00:00.000Z")

function capture(options: TracingLoggerOptions = {}) {
  const lines: { level: LogLevel; entry: Record<string, unknown> }[] = []
  const logger = new TracingLogger({
    now: fixedNow,
    sink: (level, line) => {
      const entry: Record<string, unknown> = JSON.parse(line)
      lines.push({ level, entry })
    },
    ...options,
  })
  return { logger, lines }
}

describe("TracingLogger", () => {
  it("writes one JSON entry per call", () => {
    const { logger, lines } = capture({ serviceName: "waveline-test" })
    logger.info("Run started", { runId: "run-1" })

    expect(lines).toEqual([
      {
        level: "info",
        entry: {
          level: "info",
          time: "2026-03-02T09:00:00.000Z",
          service: "waveline-test",
          msg: "Run started",
          runId: "run-1",
        },
      },
    ])
  })

  it("drops entries below the minimum level", () => {
    const { logger, lines } = capture({ level: "warn" })
    logger.debug("hidden")
    logger.info("hidden too")
    logger.warn("Step failed")
    logger.error("Run failed")

    expect(lines.map((l) => l.entry.msg)).toEqual(["Step failed", "Run failed"])
  })

  it("binds child fields to every line and keeps the parent level", () => {
    const { logger, lines } = capture({ level: "debug" })
    const stepLogger = logger.child({ runId: "run-1" }).child({ stepId: "B" })
    stepLogger.debug("Step dispatched", { wave: 2 })

    expect(stepLogger.level).toBe("debug")
    expect(lines[0]?.entry).toMatchObject({ runId: "run-1", stepId: "B", wave: 2, service: "waveline" })
  })

  it("lets call fields override bindings", () => {
    const { logger, lines } = capture()
    logger.child({ stepId: "A" }).info("Step moved", { stepId: "B" })
    expect(lines[0]?.entry.stepId).toBe("B")
  })

  it("adds the active span's ids", () => {
    const { logger, lines } = capture()
    trace.getTracer("test").startActiveSpan("waveline.step.execute", (span) => {
      logger.info("inside span")
      span.end()
    })

    expect(lines[0]?.entry.traceId).toMatch(/^[0-9a-f]{32}$/)
    expect(lines[0]?.entry.spanId).toMatch(/^[0-9a-f]{16}$/)
  })

  it("leaves span ids out without an active span", () => {
    const { logger, lines } = capture()
    logger.info("no span")
    expect(Object.keys(lines[0]?.entry ?? {})).toEqual(["level", "time", "service", "msg"])
  })

  describe("default sink", () => {
    afterEach(() => {
      vi.restoreAllMocks()
    })

    it("sends warn and error to stderr, the rest to stdout", () => {
      const stdout = vi.spyOn(process.stdout, "write").mockImplementation(() => true)
      const stderr = vi.spyOn(process.stderr, "write").mockImplementation(() => true)
      const logger = new TracingLogger({ now: fixedNow })

      logger.info("to stdout")
      logger.warn("to stderr")

      expect(stdout).toHaveBeenCalledOnce()
      expect(stderr).toHaveBeenCalledWith(
        '{"level":"warn","time":"2026-03-02T09:00:00.000Z","service":"waveline","msg":"to stderr"}\n',
      )
    })
  })
})

describe("isLogLevel", () => {
  it("accepts known levels only", () => {
    expect(isLogLevel("debug")).toBe(true)
    expect(isLogLevel("verbose")).toBe(false)
  })
})
