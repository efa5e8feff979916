import type { WorkerPool } from "@waveline/shared/pool"
import type { FastifyInstance } from "fastify"
import type { Kysely } from "kysely"

import type { Database } from "../db/types.js"

export interface HealthRouteDeps {
  db: Kysely<Database>
  pool: WorkerPool
}

interface ReadinessChecks {
  /** The schema_migrations table answers, so migrations have run. */
  db: boolean
  /** The worker pool still accepts steps. */
  pool: boolean
}

export function healthRoutes(deps: HealthRouteDeps) {
  const { db, pool } = deps

  return function register(app: FastifyInstance): void {
    app.get("/health", async () => ({ status: "ok" }))

    app.get("/ready", async (request, reply) => {
      const checks: ReadinessChecks = { db: false, pool: !pool.isClosed }
      try {
        await db.selectFrom("schema_migrations").select("version").limit(1).execute()
        checks.db = true
      } catch (err) {
        request.log.warn({ err }, "Readiness check: database unavailable")
      }

      const ready = checks.db && checks.pool
      return reply.status(ready ? 200 : 503).send({
        status: ready ? "ok" : "not_ready",
        checks,
        activeSteps: pool.activeCount,
      })
    })
  }
}
