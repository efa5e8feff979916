/**
 * Run Store: durable, resumable persistence of execution progress.
 *
 * The run record lives in the `run` table and is only ever written whole
 * (`save` is a full overwrite). The plan it executes is frozen at creation
 * as `<dataDir>/runs/<runId>/plan.json`; step contexts, artifacts and logs
 * sit beside it.
 */

import { randomBytes } from "node:crypto"
import { appendFile, mkdir, readdir, readFile, writeFile } from "node:fs/promises"
import { basename, join, relative } from "node:path"

import { Plan } from "@waveline/shared/plan"
import type { TracingLogger } from "@waveline/shared/tracing"
import type { Kysely } from "kysely"

import type { Database, NewRunRow, RunRow } from "../db/types.js"
import { RunNotFoundError } from "../errors.js"
import { CommandResultListSchema, type VerificationResult } from "../verification/types.js"
import { emptyStepResult, type Run, StepResultListSchema } from "./types.js"

export interface RunStoreDeps {
  db: Kysely<Database>
  dataDir: string
  logger?: TracingLogger
  /** Injectable clock. */
  now?: () => Date
}

export interface ResumedRun {
  run: Run
  plan: Plan
}

function pad(value: number): string {
  return String(value).padStart(2, "0")
}

/** `run-<first 10 chars of plan id>-<yyyyMMdd-HHmmss>-<6 hex>`, UTC. */
export function createRunId(planId: string, at: Date, suffix = randomBytes(3).toString("hex")): string {
  const date = `${at.getUTCFullYear()}${pad(at.getUTCMonth() + 1)}${pad(at.getUTCDate())}`
  const time = `${pad(at.getUTCHours())}${pad(at.getUTCMinutes())}${pad(at.getUTCSeconds())}`
  return `run-${planId.slice(0, 10)}-${date}-${time}-${suffix}`
}

/** Reduce a caller-supplied file name to a single safe path segment. */
function safeName(name: string): string {
  const base = basename(name).replace(/[^A-Za-z0-9._@-]/g, "_")
  return base === "" || base === "." || base === ".." ? "_" : base
}

function rowToRun(row: RunRow): Run {
  return {
    id: row.id,
    planId: row.plan_id,
    project: row.project,
    planPath: row.plan_path,
    status: row.status,
    currentStep: row.current_step,
    stepResults: StepResultListSchema.parse(JSON.parse(row.step_results)),
    createdAt: row.created_at,
    startedAt: row.started_at,
    completedAt: row.completed_at,
    updatedAt: row.updated_at,
    error: row.error,
  }
}

function runToRow(run: Run): NewRunRow {
  return {
    id: run.id,
    plan_id: run.planId,
    project: run.project,
    plan_path: run.planPath,
    status: run.status,
    current_step: run.currentStep,
    step_results: JSON.stringify(run.stepResults),
    error: run.error,
    created_at: run.createdAt,
    started_at: run.startedAt,
    completed_at: run.completedAt,
    updated_at: run.updatedAt,
  }
}

export class RunStore {
  private readonly db: Kysely<Database>
  readonly dataDir: string
  private readonly logger: TracingLogger | undefined
  private readonly now: () => Date

  constructor(deps: RunStoreDeps) {
    this.db = deps.db
    this.dataDir = deps.dataDir
    this.logger = deps.logger
    this.now = deps.now ?? (() => new Date())
  }

  runDir(runId: string): string {
    return join(this.dataDir, "runs", safeName(runId))
  }

  // ──────────────────────────────────────────────────
  // Run record
  // ──────────────────────────────────────────────────

  /**
   * Allocate a run for a validated plan: lay out the run directory, freeze
   * the plan snapshot and persist a pending record with one pending result
   * per step, in plan order.
   */
  async create(plan: Plan, project: string): Promise<Run> {
    plan.assertValid()

    const at = this.now()
    const timestamp = at.toISOString()
    const runId = createRunId(plan.id, at)
    const dir = this.runDir(runId)

    await Promise.all(
      ["contexts", "artifacts", "logs"].map((sub) => mkdir(join(dir, sub), { recursive: true })),
    )
    const planPath = join(dir, "plan.json")
    await writeFile(planPath, JSON.stringify(plan.toDocument(), null, 2) + "\n", "utf-8")

    const run: Run = {
      id: runId,
      planId: plan.id,
      project,
      planPath,
      status: "pending",
      currentStep: null,
      stepResults: plan.steps.map((step) => emptyStepResult(step.id)),
      createdAt: timestamp,
      startedAt: null,
      completedAt: null,
      updatedAt: timestamp,
      error: null,
    }
    await this.db.insertInto("run").values(runToRow(run)).execute()
    this.logger?.info("Run created", { runId, planId: plan.id, project })
    return run
  }

  /** Full overwrite of the durable record. Stamps `updatedAt`. */
  async save(run: Run): Promise<void> {
    run.updatedAt = this.now().toISOString()
    const row = runToRow(run)
    await this.db
      .insertInto("run")
      .values(row)
      .onConflict((oc) =>
        oc.column("id").doUpdateSet({
          plan_id: row.plan_id,
          project: row.project,
          plan_path: row.plan_path,
          status: row.status,
          current_step: row.current_step,
          step_results: row.step_results,
          error: row.error,
          created_at: row.created_at,
          started_at: row.started_at,
          completed_at: row.completed_at,
          updated_at: row.updated_at,
        }),
      )
      .execute()
  }

  async load(runId: string): Promise<Run | null> {
    const row = await this.db.selectFrom("run").selectAll().where("id", "=", runId).executeTakeFirst()
    return row ? rowToRun(row) : null
  }

  /** Like load, but a missing run is an error. */
  async get(runId: string): Promise<Run> {
    const run = await this.load(runId)
    if (!run) throw new RunNotFoundError(runId)
    return run
  }

  /** Newest first. */
  async list(project?: string): Promise<Run[]> {
    let query = this.db.selectFrom("run").selectAll()
    if (project !== undefined) query = query.where("project", "=", project)
    const rows = await query.orderBy("created_at", "desc").orderBy("id", "desc").execute()
    return rows.map(rowToRun)
  }

  async latest(project?: string): Promise<Run | null> {
    const [run] = await this.list(project)
    return run ?? null
  }

  /** The frozen plan snapshot, with fresh (all pending) step state. */
  async loadPlan(run: Run): Promise<Plan> {
    const raw = await readFile(run.planPath, "utf-8")
    return Plan.fromDocument(JSON.parse(raw))
  }

  /**
   * Load a run and its plan, replaying every recorded step result onto the
   * plan. Writes nothing, so resuming twice yields the same next step.
   */
  async resume(runId: string): Promise<ResumedRun> {
    const run = await this.get(runId)
    const plan = await this.loadPlan(run)
    plan.applyResults(run.stepResults)
    return { run, plan }
  }

  // ──────────────────────────────────────────────────
  // Run directory
  // ──────────────────────────────────────────────────

  /** Returns the artifact path relative to the run directory. */
  async saveArtifact(runId: string, stepId: string, name: string, content: string | Uint8Array): Promise<string> {
    const dir = join(this.runDir(runId), "artifacts", safeName(stepId))
    await mkdir(dir, { recursive: true })
    const path = join(dir, safeName(name))
    await writeFile(path, content)
    return relative(this.runDir(runId), path)
  }

  async listArtifacts(runId: string, stepId: string): Promise<string[]> {
    const dir = join(this.runDir(runId), "artifacts", safeName(stepId))
    try {
      const names = await readdir(dir)
      return names.sort().map((name) => relative(this.runDir(runId), join(dir, name)))
    } catch (err) {
      if (err instanceof Error && "code" in err && err.code === "ENOENT") return []
      throw err
    }
  }

  /** Persist the context handed to a worker. Returns the path relative to the run directory. */
  async writeStepContext(runId: string, stepId: string, context: unknown): Promise<string> {
    const dir = join(this.runDir(runId), "contexts")
    await mkdir(dir, { recursive: true })
    const path = join(dir, `${safeName(stepId)}.json`)
    await writeFile(path, JSON.stringify(context, null, 2) + "\n", "utf-8")
    return relative(this.runDir(runId), path)
  }

  /** Append one JSON line to the run's event log. */
  async appendEvent(runId: string, event: string, fields: Record<string, unknown> = {}): Promise<void> {
    const dir = join(this.runDir(runId), "logs")
    await mkdir(dir, { recursive: true })
    const line = JSON.stringify({ time: this.now().toISOString(), event, ...fields })
    await appendFile(join(dir, "events.jsonl"), line + "\n", "utf-8")
  }

  // ──────────────────────────────────────────────────
  // Verification results
  // ──────────────────────────────────────────────────

  /** Keyed by (run id, step id); a later result for the same key replaces the earlier one. */
  async saveVerification(runId: string, result: VerificationResult): Promise<void> {
    const row = {
      run_id: runId,
      step_id: result.stepId,
      status: result.status,
      commands: JSON.stringify(result.commands),
      started_at: result.startedAt,
      completed_at: result.completedAt,
    }
    await this.db
      .insertInto("verification_result")
      .values(row)
      .onConflict((oc) =>
        oc.columns(["run_id", "step_id"]).doUpdateSet({
          status: row.status,
          commands: row.commands,
          started_at: row.started_at,
          completed_at: row.completed_at,
        }),
      )
      .execute()
  }

  async loadVerification(runId: string, stepId: string): Promise<VerificationResult | null> {
    const row = await this.db
      .selectFrom("verification_result")
      .selectAll()
      .where("run_id", "=", runId)
      .where("step_id", "=", stepId)
      .executeTakeFirst()
    if (!row) return null
    return {
      stepId: row.step_id,
      status: row.status,
      commands: CommandResultListSchema.parse(JSON.parse(row.commands)),
      startedAt: row.started_at,
      completedAt: row.completed_at,
    }
  }

  async listVerifications(runId: string): Promise<VerificationResult[]> {
    const rows = await this.db
      .selectFrom("verification_result")
      .selectAll()
      .where("run_id", "=", runId)
      .orderBy("completed_at", "asc")
      .execute()
    return rows.map((row) => ({
      stepId: row.step_id,
      status: row.status,
      commands: CommandResultListSchema.parse(JSON.parse(row.commands)),
      startedAt: row.started_at,
      completedAt: row.completed_at,
    }))
  }
}
