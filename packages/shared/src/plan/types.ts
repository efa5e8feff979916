export type StepStatus = "pending" | "in_progress" | "completed" | "failed" | "skipped"

export type RiskLevel = "low" | "medium" | "high" | "critical"

export type CheckpointType = "human-verify" | "decision" | "human-action"

export type WorkStepKind = "read" | "extract" | "create" | "modify" | "wire"
export type CheckStepKind = "verify" | "test"
export type StepKind = WorkStepKind | CheckStepKind | "checkpoint"

export const STEP_KINDS: readonly StepKind[] = [
  "read",
  "extract",
  "create",
  "modify",
  "wire",
  "verify",
  "test",
  "checkpoint",
]

interface StepBase {
  /** Unique within the owning plan. */
  id: string
  target: string
  action: string
  details: string
  dependsOn: readonly string[]
  /** Display tie-break only; scheduling never reads it. */
  order: number
  risk: RiskLevel
  riskReason: string
  /** Advisory file identifiers. */
  inputs: readonly string[]
  outputs: readonly string[]
}

export interface WorkStepSpec extends StepBase {
  kind: WorkStepKind
  verifyCommand?: string
}

export interface CheckStepSpec extends StepBase {
  kind: CheckStepKind
  verifyCommand: string
}

/** A planned human gate. The executor halts here instead of dispatching a worker. */
export interface CheckpointStepSpec extends StepBase {
  kind: "checkpoint"
  checkpointType: CheckpointType
  awaiting: string
}

export type StepSpec = WorkStepSpec | CheckStepSpec | CheckpointStepSpec

/** Mutable execution state. Only the executor writes these fields. */
export interface StepState {
  status: StepStatus
  error: string | null
  startedAt: string | null
  completedAt: string | null
}

export type Step = StepSpec & StepState

export interface StepProgress {
  total: number
  completed: number
  failed: number
  skipped: number
  pending: number
  inProgress: number
}

/**
 * The slice of a run's step result the plan needs to rehydrate step state.
 */
export interface StepResultSnapshot {
  stepId: string
  status: StepStatus
  startedAt: string | null
  completedAt: string | null
  error: string | null
}
