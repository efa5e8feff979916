import { initTracing, shutdownTracing, TracingLogger } from "@waveline/shared/tracing"

import { buildApp } from "./app.js"
import { loadConfig } from "./config.js"
import { runMigrations } from "./db/auto-migrate.js"
import { createDatabase } from "./db/index.js"
import { registerShutdownHandlers } from "./lifecycle/shutdown.js"

const config = loadConfig()

// Spans started before the SDK is up are no-ops, so this goes first.
initTracing(config.tracing)

const logger = new TracingLogger({ level: config.logLevel, serviceName: config.tracing.serviceName })
const database = createDatabase(config.database)
logger.info("Starting plan engine", {
  database: config.database.kind,
  dataDir: config.dataDir,
  maxParallel: config.maxParallel,
})

// Run pending migrations before starting the app
await runMigrations(database.db, logger.child({ component: "migrations" }))

const { app, pool } = await buildApp({ db: database.db, config, logger })

registerShutdownHandlers({ fastify: app, pool, closeDatabase: database.close })

try {
  const address = await app.listen({ port: config.port, host: config.host })
  app.log.info(`Plan engine listening on ${address}`)
} catch (err) {
  app.log.fatal(err)
  await database.close()
  await shutdownTracing()
  process.exit(1)
}
