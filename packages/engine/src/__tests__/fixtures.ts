import { mkdtemp, rm } from "node:fs/promises"
import { tmpdir } from "node:os"
import { join } from "node:path"

import {
  type CheckpointStepDocument,
  type CheckStepDocument,
  Plan,
  type PlanDocumentInput,
  type Step,
  type StepDocument,
  type WorkStepDocument,
} from "@waveline/shared/plan"
import type { Kysely } from "kysely"

import { CheckpointManager } from "../checkpoint/manager.js"
import { runMigrations } from "../db/auto-migrate.js"
import { createDatabase } from "../db/index.js"
import type { Database } from "../db/types.js"
import { RunStore } from "../run/store.js"

export interface TestEnv {
  db: Kysely<Database>
  dataDir: string
  now: () => Date
  store: RunStore
  checkpoints: CheckpointManager
  cleanup: () => Promise<void>
}

/** A clock that advances one second per call, starting at `start`. */
export function tickingClock(start = "2026-03-02T09:00:00.000Z"): () => Date {
  let current = Date.parse(start)
  return () => {
    const at = new Date(current)
    current += 1000
    return at
  }
}

export async function createTempDir(prefix = "waveline-test-"): Promise<string> {
  return mkdtemp(join(tmpdir(), prefix))
}

/** Migrated in-memory SQLite plus a temp data directory. */
export async function createTestEnv(): Promise<TestEnv> {
  const { db, close } = createDatabase({ kind: "sqlite", filename: ":memory:" })
  await runMigrations(db)
  const dataDir = await createTempDir()
  const now = tickingClock()
  return {
    db,
    dataDir,
    now,
    store: new RunStore({ db, dataDir, now }),
    checkpoints: new CheckpointManager({ db, now }),
    cleanup: async () => {
      await close()
      await rm(dataDir, { recursive: true, force: true })
    },
  }
}

export function work(
  id: string,
  fields: Partial<Omit<WorkStepDocument, "id">> = {},
): WorkStepDocument {
  return { id, kind: "create", target: `src/${id}.ts`, action: `create ${id}`, ...fields }
}

export function check(
  id: string,
  verifyCommand: string,
  fields: Partial<Omit<CheckStepDocument, "id" | "verify_command">> = {},
): CheckStepDocument {
  return { id, kind: "test", target: "tests", action: `check ${id}`, verify_command: verifyCommand, ...fields }
}

export function humanGate(
  id: string,
  awaiting: string,
  fields: Partial<Omit<CheckpointStepDocument, "id" | "kind" | "awaiting">> = {},
): CheckpointStepDocument {
  return { id, kind: "checkpoint", target: "review", action: `review ${id}`, awaiting, ...fields }
}

export function planDocument(steps: StepDocument[], planId = "demo-plan"): PlanDocumentInput {
  return { schema_version: "v1", plan_id: planId, title: "Demo plan", steps }
}

export function buildPlan(steps: StepDocument[], planId = "demo-plan"): Plan {
  return Plan.fromDocument(planDocument(steps, planId))
}

/** The plan's step with `id`; throws when there is none. */
export function stepOf(plan: Plan, id: string): Step {
  const step = plan.getStep(id)
  if (!step) throw new Error(`No step ${id} in plan ${plan.id}`)
  return step
}
