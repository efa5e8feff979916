/**
 * Graceful shutdown for the engine process.
 *
 *   http     fastify.close(): stop taking requests; the pool's onClose hook
 *            drops queued units
 *   steps    wait for in-flight steps to settle, up to POOL_DRAIN_DEADLINE_MS
 *   database close the Kysely connection
 *   tracing  flush buffered spans
 *
 * A failing phase is logged and the next one still runs. A step abandoned
 * at the deadline stays in_progress in its run and is dispatched again the
 * next time the run is executed.
 */

import type { WorkerPool } from "@waveline/shared/pool"
import { shutdownTracing } from "@waveline/shared/tracing"
import type { FastifyInstance } from "fastify"

export interface ShutdownDeps {
  fastify: FastifyInstance
  pool: WorkerPool
  closeDatabase: () => Promise<void>
  /** Default: process.exit */
  exit?: (code: number) => void
}

export interface ShutdownHandle {
  shutdown: (signal: string) => Promise<void>
  /** Remove the process listeners. */
  unregister: () => void
}

export const POOL_DRAIN_DEADLINE_MS = 30_000

interface Phase {
  name: string
  run: () => Promise<void>
}

export function registerShutdownHandlers(deps: ShutdownDeps): ShutdownHandle {
  const { fastify, pool } = deps
  const exit = deps.exit ?? ((code: number) => process.exit(code))
  let started: Promise<void> | undefined

  const drainPool = async (): Promise<void> => {
    let timer: NodeJS.Timeout | undefined
    const expired = new Promise<"expired">((resolve) => {
      timer = setTimeout(() => resolve("expired"), POOL_DRAIN_DEADLINE_MS)
    })
    try {
      const result = await Promise.race([pool.shutdown({ wait: true }).then(() => "drained" as const), expired])
      if (result === "expired") {
        fastify.log.warn({ activeSteps: pool.activeCount }, "Pool drain deadline passed, abandoning in-flight steps")
      }
    } finally {
      clearTimeout(timer)
    }
  }

  const phases: Phase[] = [
    { name: "http", run: () => fastify.close() },
    { name: "steps", run: drainPool },
    { name: "database", run: deps.closeDatabase },
    { name: "tracing", run: shutdownTracing },
  ]

  const sequence = async (signal: string): Promise<void> => {
    fastify.log.info({ signal, activeSteps: pool.activeCount }, "Shutdown signal received, draining")
    for (const phase of phases) {
      try {
        await phase.run()
      } catch (err) {
        fastify.log.error({ err, phase: phase.name }, "Shutdown phase failed")
      }
    }
    fastify.log.info("Shutdown complete")
    exit(0)
  }

  const shutdown = (signal: string): Promise<void> => {
    started ??= sequence(signal)
    return started
  }

  const onSignal = (signal: NodeJS.Signals): void => void shutdown(signal)
  const onFatal =
    (kind: "unhandledRejection" | "uncaughtException") =>
    (err: unknown): void => {
      fastify.log.fatal({ err }, `${kind}, shutting down`)
      void shutdown(kind)
    }
  const onUnhandledRejection = onFatal("unhandledRejection")
  const onUncaughtException = onFatal("uncaughtException")

  process.on("SIGTERM", onSignal)
  process.on("SIGINT", onSignal)
  process.on("unhandledRejection", onUnhandledRejection)
  process.on("uncaughtException", onUncaughtException)

  return {
    shutdown,
    unregister: () => {
      process.removeListener("SIGTERM", onSignal)
      process.removeListener("SIGINT", onSignal)
      process.removeListener("unhandledRejection", onUnhandledRejection)
      process.removeListener("uncaughtException", onUncaughtException)
    },
  }
}
