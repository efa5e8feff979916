import { PlanValidationError } from "./errors.js"
import { type PlanDocument, PlanDocumentSchema } from "./schemas.js"
import type {
  Step,
  StepProgress,
  StepResultSnapshot,
  StepSpec,
  StepStatus,
} from "./types.js"

export interface PlanInit {
  id: string
  title?: string
  description?: string
  metadata?: Record<string, unknown>
  steps: readonly StepSpec[]
}

const STATUS_ICONS: Record<StepStatus, string> = {
  pending: "○",
  in_progress: "→",
  completed: "✓",
  failed: "✗",
  skipped: "⊘",
}

function freshStep(spec: StepSpec): Step {
  return { ...spec, status: "pending", error: null, startedAt: null, completedAt: null }
}

function stepFromDocument(doc: PlanDocument["steps"][number]): StepSpec {
  const base = {
    id: doc.id,
    target: doc.target,
    action: doc.action,
    details: doc.details,
    dependsOn: doc.depends_on,
    order: doc.order,
    risk: doc.risk,
    riskReason: doc.risk_reason,
    inputs: doc.inputs,
    outputs: doc.outputs,
  }
  switch (doc.kind) {
    case "checkpoint":
      return { ...base, kind: doc.kind, checkpointType: doc.checkpoint_type, awaiting: doc.awaiting }
    case "verify":
    case "test":
      return { ...base, kind: doc.kind, verifyCommand: doc.verify_command }
    default:
      return doc.verify_command
        ? { ...base, kind: doc.kind, verifyCommand: doc.verify_command }
        : { ...base, kind: doc.kind }
  }
}

function stepToDocument(step: StepSpec): PlanDocument["steps"][number] {
  const base = {
    id: step.id,
    target: step.target,
    action: step.action,
    details: step.details,
    depends_on: [...step.dependsOn],
    order: step.order,
    risk: step.risk,
    risk_reason: step.riskReason,
    inputs: [...step.inputs],
    outputs: [...step.outputs],
  }
  switch (step.kind) {
    case "checkpoint":
      return {
        ...base,
        kind: step.kind,
        checkpoint_type: step.checkpointType,
        awaiting: step.awaiting,
      }
    case "verify":
    case "test":
      return { ...base, kind: step.kind, verify_command: step.verifyCommand }
    default:
      return step.verifyCommand
        ? { ...base, kind: step.kind, verify_command: step.verifyCommand }
        : { ...base, kind: step.kind }
  }
}

function byOrder(a: Step, b: Step): number {
  return a.order - b.order
}

/**
 * A validated-on-demand collection of steps with dependency edges.
 *
 * The step specs are immutable once constructed; only the execution state
 * (status, error, timestamps) changes, and only the executor changes it.
 */
export class Plan {
  readonly id: string
  readonly title: string
  readonly description: string
  readonly metadata: Record<string, unknown>
  readonly steps: readonly Step[]
  private readonly byId: Map<string, Step>

  constructor(init: PlanInit) {
    this.id = init.id
    this.title = init.title ?? ""
    this.description = init.description ?? ""
    this.metadata = init.metadata ?? {}
    this.steps = init.steps.map(freshStep)
    this.byId = new Map()
    for (const step of this.steps) {
      if (!this.byId.has(step.id)) this.byId.set(step.id, step)
    }
  }

  /**
   * Parse a v1 plan document. Schema errors raise PlanValidationError;
   * structural errors (cycles, dangling dependencies) are left to validate().
   */
  static fromDocument(input: unknown): Plan {
    const parsed = PlanDocumentSchema.safeParse(input)
    if (!parsed.success) {
      const planId =
        typeof input === "object" && input !== null && "plan_id" in input && typeof input.plan_id === "string"
          ? input.plan_id
          : null
      const errors = parsed.error.issues.map((issue) =>
        issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message,
      )
      throw new PlanValidationError(planId, errors)
    }
    const doc = parsed.data
    return new Plan({
      id: doc.plan_id,
      title: doc.title,
      description: doc.description,
      metadata: doc.metadata,
      steps: doc.steps.map(stepFromDocument),
    })
  }

  toDocument(): PlanDocument {
    return {
      schema_version: "v1",
      plan_id: this.id,
      title: this.title,
      description: this.description,
      metadata: { ...this.metadata },
      steps: this.steps.map(stepToDocument),
    }
  }

  // ──────────────────────────────────────────────────
  // Structure
  // ──────────────────────────────────────────────────

  /** Returns every structural problem found; an empty list means the plan is schedulable. */
  validate(): string[] {
    const errors: string[] = []
    if (!this.id.trim()) errors.push("plan id is required")
    if (this.steps.length === 0) errors.push("plan must have at least one step")

    const seen = new Set<string>()
    this.steps.forEach((step, index) => {
      if (!step.id.trim()) {
        errors.push(`step[${index}]: id is required`)
        return
      }
      if (seen.has(step.id)) errors.push(`duplicate step id: ${step.id}`)
      seen.add(step.id)
      if (!step.action.trim()) errors.push(`step ${step.id}: action is required`)
      if (!step.target.trim()) errors.push(`step ${step.id}: target is required`)
      for (const dep of step.dependsOn) {
        if (dep === step.id) {
          errors.push(`step ${step.id} depends on itself`)
        } else if (!this.byId.has(dep)) {
          errors.push(`step ${step.id} depends on unknown step: ${dep}`)
        }
      }
    })

    for (const cycle of this.detectCycles()) {
      // Self-loops are already reported above.
      if (cycle.length > 2) errors.push(`dependency cycle: ${cycle.join(" -> ")}`)
    }
    return errors
  }

  /** Throws PlanValidationError when validate() reports anything. */
  assertValid(): void {
    const errors = this.validate()
    if (errors.length > 0) throw new PlanValidationError(this.id || null, errors)
  }

  /**
   * Depth-first search over dependency edges. Each cycle is reported as the
   * path that closes it, first id repeated at the end.
   */
  detectCycles(): string[][] {
    const cycles: string[][] = []
    const visited = new Set<string>()
    const onStack = new Set<string>()
    const path: string[] = []

    const visit = (id: string): void => {
      const step = this.byId.get(id)
      if (!step) return
      visited.add(id)
      onStack.add(id)
      path.push(id)
      for (const dep of step.dependsOn) {
        if (onStack.has(dep)) {
          cycles.push([...path.slice(path.indexOf(dep)), dep])
        } else if (!visited.has(dep)) {
          visit(dep)
        }
      }
      path.pop()
      onStack.delete(id)
    }

    for (const step of this.steps) {
      if (!visited.has(step.id)) visit(step.id)
    }
    return cycles
  }

  // ──────────────────────────────────────────────────
  // Scheduling queries
  // ──────────────────────────────────────────────────

  getStep(stepId: string): Step | undefined {
    return this.byId.get(stepId)
  }

  completedIds(): Set<string> {
    return new Set(this.steps.filter((s) => s.status === "completed").map((s) => s.id))
  }

  /**
   * Pending steps whose dependencies are all in `completed`, lowest order
   * first. A failed or skipped dependency never satisfies.
   */
  getReadySteps(completed: ReadonlySet<string> = this.completedIds()): Step[] {
    return this.steps
      .filter((s) => s.status === "pending" && s.dependsOn.every((dep) => completed.has(dep)))
      .sort(byOrder)
  }

  getNextStep(completed: ReadonlySet<string> = this.completedIds()): Step | null {
    return this.getReadySteps(completed)[0] ?? null
  }

  isComplete(): boolean {
    return this.steps.every((s) => s.status === "completed" || s.status === "skipped")
  }

  progress(): StepProgress {
    const progress: StepProgress = {
      total: this.steps.length,
      completed: 0,
      failed: 0,
      skipped: 0,
      pending: 0,
      inProgress: 0,
    }
    for (const step of this.steps) {
      switch (step.status) {
        case "completed":
          progress.completed++
          break
        case "failed":
          progress.failed++
          break
        case "skipped":
          progress.skipped++
          break
        case "in_progress":
          progress.inProgress++
          break
        case "pending":
          progress.pending++
          break
      }
    }
    return progress
  }

  // ──────────────────────────────────────────────────
  // Execution state
  // ──────────────────────────────────────────────────

  /**
   * Rehydrate step state from recorded results. Steps without a result go
   * back to pending, so applying the same results twice is a no-op.
   */
  applyResults(results: Iterable<StepResultSnapshot>): void {
    for (const step of this.steps) {
      step.status = "pending"
      step.error = null
      step.startedAt = null
      step.completedAt = null
    }
    for (const result of results) {
      const step = this.byId.get(result.stepId)
      if (!step) continue
      step.status = result.status
      step.error = result.error
      step.startedAt = result.startedAt
      step.completedAt = result.completedAt
    }
  }

  snapshot(): StepResultSnapshot[] {
    return this.steps.map((s) => ({
      stepId: s.id,
      status: s.status,
      startedAt: s.startedAt,
      completedAt: s.completedAt,
      error: s.error,
    }))
  }
}

export function formatPlanSummary(plan: Plan): string {
  const progress = plan.progress()
  const lines = [
    `Plan: ${plan.title || plan.id}`,
    `Progress: ${progress.completed}/${progress.total} completed`,
    "",
  ]
  for (const step of [...plan.steps].sort(byOrder)) {
    const deps = step.dependsOn.length > 0 ? ` (after ${step.dependsOn.join(", ")})` : ""
    const risk = step.risk === "low" ? "" : ` (${step.risk} risk)`
    lines.push(`${STATUS_ICONS[step.status]} ${step.id} [${step.kind}] ${step.action}${risk}${deps}`)
    if (step.error) lines.push(`    error: ${step.error}`)
  }
  return lines.join("\n")
}
