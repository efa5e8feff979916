import { WorkerPool } from "@waveline/shared/pool"
import { TracingLogger } from "@waveline/shared/tracing"
import Fastify, { type FastifyInstance } from "fastify"
import type { Kysely } from "kysely"

import { CheckpointManager } from "./checkpoint/manager.js"
import type { Config } from "./config.js"
import type { Database } from "./db/types.js"
import { DeviationLog } from "./deviation/audit.js"
import { DeviationClassifier } from "./deviation/classifier.js"
import { WaveRunner } from "./executor/wave-runner.js"
import { EchoStepWorker, type KnowledgeStore, type StepWorker } from "./executor/worker.js"
import { checkpointRoutes } from "./routes/checkpoints.js"
import { healthRoutes } from "./routes/health.js"
import { runRoutes } from "./routes/runs.js"
import { RunStore } from "./run/store.js"
import { EngineService } from "./service.js"
import { type GateProvider, projectGates } from "./verification/gate.js"

export interface AppContext {
  app: FastifyInstance
  service: EngineService
  runner: WaveRunner
  pool: WorkerPool
}

export interface AppOptions {
  db: Kysely<Database>
  config: Config
  /** Performs steps. Defaults to the echo worker, which makes `execute` a dry run. */
  worker?: StepWorker
  knowledge?: KnowledgeStore
  /** Defaults to each project's own verification config. */
  gates?: GateProvider
  logger?: TracingLogger
  /** Fastify request logging. Default: on, at the configured level. */
  httpLogging?: boolean
  now?: () => Date
}

export async function buildApp(options: AppOptions): Promise<AppContext> {
  const { db, config } = options
  const logger = options.logger ?? new TracingLogger({ level: config.logLevel, serviceName: config.tracing.serviceName })
  const now = options.now

  const app = Fastify({
    logger: options.httpLogging === false ? false : { level: config.logLevel },
  })

  const store = new RunStore({ db, dataDir: config.dataDir, logger: logger.child({ component: "run-store" }), now })
  const checkpoints = new CheckpointManager({ db, logger: logger.child({ component: "checkpoints" }), now })
  const gates = options.gates ?? projectGates({ logger: logger.child({ component: "verification" }), now })

  // One pool per process; waves of every run share its slots.
  const pool = new WorkerPool({ maxParallel: config.maxParallel })

  const runner = new WaveRunner({
    store,
    checkpoints,
    deviations: new DeviationLog(db, now),
    pool,
    worker: options.worker ?? new EchoStepWorker(),
    classifier: new DeviationClassifier({ defaultAction: config.deviationDefaultAction }),
    gates,
    knowledge: options.knowledge,
    logger: logger.child({ component: "executor" }),
    stepTimeoutMs: config.stepTimeoutMs,
    approveCriticalSteps: config.approveCriticalSteps,
    now,
  })

  const service = new EngineService({ store, checkpoints, runner, gates, logger, now })

  await app.register(healthRoutes({ db, pool }))
  await app.register(runRoutes({ service }))
  await app.register(checkpointRoutes({ service }))

  app.addHook("onClose", async () => {
    await pool.shutdown({ wait: false })
  })

  return { app, service, runner, pool }
}
