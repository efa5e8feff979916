import type { CheckpointType } from "@waveline/shared/plan"
import { z } from "zod"

/** What raised the checkpoint. */
export type CheckpointOrigin = "planned" | "risk-gate" | "deviation" | "worker"

export const CheckpointOriginSchema = z.enum(["planned", "risk-gate", "deviation", "worker"])

export const CompletedTaskSchema = z.object({
  stepId: z.string(),
  action: z.string(),
  output: z.string(),
  completedAt: z.string().nullable(),
})

export type CompletedTask = z.infer<typeof CompletedTaskSchema>

export const CompletedTaskListSchema = z.array(CompletedTaskSchema)

export const ExecutionContextSchema = z.record(z.unknown())

export interface Checkpoint {
  id: string
  runId: string
  planId: string
  project: string
  /** The step execution halted at; it resumes from here. */
  stepId: string
  type: CheckpointType
  origin: CheckpointOrigin
  completedTasks: CompletedTask[]
  currentTask: string
  /** Why execution halted. */
  blocker: string
  /** What response is needed to continue. */
  awaiting: string
  executionContext: Record<string, unknown>
  createdAt: string
  resolvedAt: string | null
  userResponse: string | null
}

export interface CreateCheckpointInput {
  runId: string
  planId: string
  project: string
  stepId: string
  type: CheckpointType
  origin: CheckpointOrigin
  completedTasks: CompletedTask[]
  currentTask: string
  blocker: string
  awaiting: string
  executionContext?: Record<string, unknown>
}

/**
 * Everything a worker needs to pick up after a resolved checkpoint. Built
 * fresh from the checkpoint record; nothing from the halted session leaks in.
 */
export interface ContinuationContext {
  checkpointId: string
  resumeFrom: string
  checkpointType: CheckpointType
  completedTasks: CompletedTask[]
  blocker: string
  awaiting: string
  userResponse: string
  executionContext: Record<string, unknown>
}
