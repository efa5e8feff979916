/**
 * Raised when a plan is structurally unusable: a malformed document, a
 * dependency cycle, a dangling dependency or a missing required field.
 * A plan that raises this must never be scheduled.
 */
export class PlanValidationError extends Error {
  readonly planId: string | null
  readonly errors: readonly string[]

  constructor(planId: string | null, errors: readonly string[]) {
    const label = planId ? `Plan ${planId}` : "Plan"
    super(`${label} failed validation: ${errors.join("; ")}`)
    this.name = "PlanValidationError"
    this.planId = planId
    this.errors = errors
  }
}
