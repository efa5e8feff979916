/**
 * Checkpoint Manager: persists halted execution state and its human
 * resolution.
 *
 * A checkpoint is created when a step cannot proceed unattended, stays
 * pending until `resolve()` stamps it, and is then kept as an archived
 * record. Pending checkpoints are listed per project across all runs.
 */

import { randomUUID } from "node:crypto"

import { type TracingLogger, WavelineAttributes, withSpan } from "@waveline/shared/tracing"
import type { Kysely } from "kysely"

import type { CheckpointRow, Database } from "../db/types.js"
import { CheckpointAlreadyResolvedError, CheckpointNotFoundError, ConflictError } from "../errors.js"
import {
  type Checkpoint,
  type CompletedTask,
  CompletedTaskListSchema,
  type ContinuationContext,
  type CreateCheckpointInput,
  ExecutionContextSchema,
} from "./types.js"

export interface CheckpointManagerDeps {
  db: Kysely<Database>
  logger?: TracingLogger
  now?: () => Date
}

function rowToCheckpoint(row: CheckpointRow): Checkpoint {
  return {
    id: row.id,
    runId: row.run_id,
    planId: row.plan_id,
    project: row.project,
    stepId: row.step_id,
    type: row.type,
    origin: row.origin,
    completedTasks: CompletedTaskListSchema.parse(JSON.parse(row.completed_tasks)),
    currentTask: row.current_task,
    blocker: row.blocker,
    awaiting: row.awaiting,
    executionContext: ExecutionContextSchema.parse(JSON.parse(row.execution_context)),
    createdAt: row.created_at,
    resolvedAt: row.resolved_at,
    userResponse: row.user_response,
  }
}

export class CheckpointManager {
  private readonly db: Kysely<Database>
  private readonly logger: TracingLogger | undefined
  private readonly now: () => Date

  constructor(deps: CheckpointManagerDeps) {
    this.db = deps.db
    this.logger = deps.logger
    this.now = deps.now ?? (() => new Date())
  }

  async create(input: CreateCheckpointInput): Promise<Checkpoint> {
    const checkpoint: Checkpoint = {
      id: `cp-${randomUUID()}`,
      runId: input.runId,
      planId: input.planId,
      project: input.project,
      stepId: input.stepId,
      type: input.type,
      origin: input.origin,
      completedTasks: input.completedTasks,
      currentTask: input.currentTask,
      blocker: input.blocker,
      awaiting: input.awaiting,
      executionContext: input.executionContext ?? {},
      createdAt: this.now().toISOString(),
      resolvedAt: null,
      userResponse: null,
    }

    await this.db
      .insertInto("checkpoint")
      .values({
        id: checkpoint.id,
        run_id: checkpoint.runId,
        plan_id: checkpoint.planId,
        project: checkpoint.project,
        step_id: checkpoint.stepId,
        type: checkpoint.type,
        origin: checkpoint.origin,
        completed_tasks: JSON.stringify(checkpoint.completedTasks),
        current_task: checkpoint.currentTask,
        blocker: checkpoint.blocker,
        awaiting: checkpoint.awaiting,
        execution_context: JSON.stringify(checkpoint.executionContext),
        created_at: checkpoint.createdAt,
        resolved_at: null,
        user_response: null,
      })
      .execute()

    this.logger?.info("Checkpoint created", {
      checkpointId: checkpoint.id,
      runId: checkpoint.runId,
      stepId: checkpoint.stepId,
      origin: checkpoint.origin,
      awaiting: checkpoint.awaiting,
    })
    return checkpoint
  }

  async find(checkpointId: string): Promise<Checkpoint | null> {
    const row = await this.db
      .selectFrom("checkpoint")
      .selectAll()
      .where("id", "=", checkpointId)
      .executeTakeFirst()
    return row ? rowToCheckpoint(row) : null
  }

  async get(checkpointId: string): Promise<Checkpoint> {
    const checkpoint = await this.find(checkpointId)
    if (!checkpoint) throw new CheckpointNotFoundError(checkpointId)
    return checkpoint
  }

  /**
   * Stamp the human response. The update only matches an unresolved row, so
   * two resolvers racing on one checkpoint cannot both win.
   */
  async resolve(checkpointId: string, response: string): Promise<Checkpoint> {
    return withSpan(
      "waveline.checkpoint.resolve",
      { [WavelineAttributes.CHECKPOINT_ID]: checkpointId },
      async () => {
        const resolvedAt = this.now().toISOString()
        const result = await this.db
          .updateTable("checkpoint")
          .set({ resolved_at: resolvedAt, user_response: response })
          .where("id", "=", checkpointId)
          .where("resolved_at", "is", null)
          .executeTakeFirst()

        if (result.numUpdatedRows === 0n) {
          const existing = await this.get(checkpointId)
          throw new CheckpointAlreadyResolvedError(checkpointId, existing.resolvedAt ?? "an unknown time")
        }

        this.logger?.info("Checkpoint resolved", { checkpointId })
        return this.get(checkpointId)
      },
    )
  }

  /** Every unresolved checkpoint in the project, oldest first, whichever run owns it. */
  async listPending(project: string): Promise<Checkpoint[]> {
    const rows = await this.db
      .selectFrom("checkpoint")
      .selectAll()
      .where("project", "=", project)
      .where("resolved_at", "is", null)
      .orderBy("created_at", "asc")
      .orderBy("id", "asc")
      .execute()
    return rows.map(rowToCheckpoint)
  }

  async pendingForRun(runId: string): Promise<Checkpoint[]> {
    const rows = await this.db
      .selectFrom("checkpoint")
      .selectAll()
      .where("run_id", "=", runId)
      .where("resolved_at", "is", null)
      .orderBy("created_at", "asc")
      .execute()
    return rows.map(rowToCheckpoint)
  }

  async listForRun(runId: string): Promise<Checkpoint[]> {
    const rows = await this.db
      .selectFrom("checkpoint")
      .selectAll()
      .where("run_id", "=", runId)
      .orderBy("created_at", "asc")
      .execute()
    return rows.map(rowToCheckpoint)
  }

  /** Resolved checkpoints raised at `stepId`, oldest first. */
  async resolvedForStep(runId: string, stepId: string): Promise<Checkpoint[]> {
    const rows = await this.db
      .selectFrom("checkpoint")
      .selectAll()
      .where("run_id", "=", runId)
      .where("step_id", "=", stepId)
      .where("resolved_at", "is not", null)
      .orderBy("resolved_at", "asc")
      .execute()
    return rows.map(rowToCheckpoint)
  }
}

// ──────────────────────────────────────────────────
// Continuation
// ──────────────────────────────────────────────────

export function buildContinuation(checkpoint: Checkpoint): ContinuationContext {
  if (checkpoint.resolvedAt === null || checkpoint.userResponse === null) {
    throw new ConflictError(`Checkpoint ${checkpoint.id} is not resolved yet`)
  }
  return {
    checkpointId: checkpoint.id,
    resumeFrom: checkpoint.stepId,
    checkpointType: checkpoint.type,
    completedTasks: checkpoint.completedTasks.map((task) => ({ ...task })),
    blocker: checkpoint.blocker,
    awaiting: checkpoint.awaiting,
    userResponse: checkpoint.userResponse,
    executionContext: structuredClone(checkpoint.executionContext),
  }
}

function formatTask(task: CompletedTask): string {
  return task.output ? `- ${task.stepId}: ${task.action} (${task.output})` : `- ${task.stepId}: ${task.action}`
}

/** Markdown block a worker prompt can embed when picking up after a checkpoint. */
export function formatContinuation(context: ContinuationContext): string {
  const lines = [
    "## Continuation",
    "",
    `Resuming at step \`${context.resumeFrom}\` after a ${context.checkpointType} checkpoint.`,
    "",
    "### Completed so far",
    ...(context.completedTasks.length > 0 ? context.completedTasks.map(formatTask) : ["- (none)"]),
    "",
    "### Blocker",
    context.blocker,
    "",
    "### Asked",
    context.awaiting,
    "",
    "### Response",
    context.userResponse,
  ]
  return lines.join("\n")
}

export function formatCheckpointSummary(checkpoints: readonly Checkpoint[]): string {
  if (checkpoints.length === 0) return "No pending checkpoints."
  const lines = [`${checkpoints.length} pending checkpoint(s):`, ""]
  for (const cp of checkpoints) {
    lines.push(`[${cp.id}] ${cp.type} at ${cp.stepId} (run ${cp.runId})`)
    lines.push(`  Blocker: ${cp.blocker}`)
    lines.push(`  Awaiting: ${cp.awaiting}`)
  }
  return lines.join("\n")
}
