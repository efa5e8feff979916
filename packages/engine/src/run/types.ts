import { type Plan, StepStatusSchema } from "@waveline/shared/plan"
import { z } from "zod"

export type RunStatus = "pending" | "in_progress" | "paused" | "completed" | "failed" | "cancelled"

export const RunStatusSchema = z.enum(["pending", "in_progress", "paused", "completed", "failed", "cancelled"])

export const StepResultSchema = z.object({
  stepId: z.string(),
  status: StepStatusSchema,
  startedAt: z.string().nullable(),
  completedAt: z.string().nullable(),
  output: z.string(),
  error: z.string().nullable(),
  /** Paths relative to the run directory. */
  artifacts: z.array(z.string()),
  /** Path of the context file handed to the worker, relative to the run directory. */
  contextFile: z.string().nullable(),
})

export type StepResult = z.infer<typeof StepResultSchema>

export const StepResultListSchema = z.array(StepResultSchema)

/** The durable record of one execution of a plan. */
export interface Run {
  id: string
  planId: string
  project: string
  /** Absolute path of the immutable plan snapshot. */
  planPath: string
  status: RunStatus
  currentStep: string | null
  /** One entry per step that has been touched, in first-touch order. */
  stepResults: StepResult[]
  createdAt: string
  startedAt: string | null
  completedAt: string | null
  updatedAt: string
  /** Why the run failed or paused, when it did. */
  error: string | null
}

export interface RunProgress {
  runId: string
  status: RunStatus
  total: number
  completed: number
  failed: number
  skipped: number
  pending: number
  inProgress: number
  currentStep: string | null
}

export function emptyStepResult(stepId: string): StepResult {
  return {
    stepId,
    status: "pending",
    startedAt: null,
    completedAt: null,
    output: "",
    error: null,
    artifacts: [],
    contextFile: null,
  }
}

/** Replace or append the result for `result.stepId`, keeping first-touch order. */
export function upsertStepResult(run: Run, result: StepResult): void {
  const index = run.stepResults.findIndex((r) => r.stepId === result.stepId)
  if (index === -1) run.stepResults.push(result)
  else run.stepResults[index] = result
}

export function findStepResult(run: Run, stepId: string): StepResult | undefined {
  return run.stepResults.find((r) => r.stepId === stepId)
}

/** Merge `patch` into the result for `stepId`, creating a pending one first if needed. */
export function patchStepResult(run: Run, stepId: string, patch: Partial<Omit<StepResult, "stepId">>): StepResult {
  const next: StepResult = { ...(findStepResult(run, stepId) ?? emptyStepResult(stepId)), ...patch, stepId }
  upsertStepResult(run, next)
  return next
}

/**
 * Skip every pending step with a skipped dependency, following chains of
 * dependents until none is left. Returns the skipped ids in plan order.
 */
export function skipBlockedSteps(run: Run, plan: Plan, at: string): string[] {
  const skipped: string[] = []
  for (;;) {
    let changed = false
    for (const step of plan.steps) {
      if (step.status !== "pending") continue
      const blocker = step.dependsOn.find((dep) => plan.getStep(dep)?.status === "skipped")
      if (blocker === undefined) continue
      patchStepResult(run, step.id, { status: "skipped", completedAt: at, error: `dependency ${blocker} was skipped` })
      skipped.push(step.id)
      changed = true
    }
    if (!changed) return skipped
    plan.applyResults(run.stepResults)
  }
}
