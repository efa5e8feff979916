/**
 * Error taxonomy for the engine. Routes map NotFoundError to 404 and
 * ConflictError to 409; PlanValidationError (from the plan model) maps to 400.
 */

export class NotFoundError extends Error {
  constructor(message: string) {
    super(message)
    this.name = "NotFoundError"
  }
}

export class ConflictError extends Error {
  constructor(message: string) {
    super(message)
    this.name = "ConflictError"
  }
}

export class RunNotFoundError extends NotFoundError {
  readonly runId: string

  constructor(runId: string) {
    super(`Run not found: ${runId}`)
    this.name = "RunNotFoundError"
    this.runId = runId
  }
}

export class StepNotFoundError extends NotFoundError {
  readonly runId: string
  readonly stepId: string

  constructor(runId: string, stepId: string) {
    super(`Step ${stepId} not found in run ${runId}`)
    this.name = "StepNotFoundError"
    this.runId = runId
    this.stepId = stepId
  }
}

export class CheckpointNotFoundError extends NotFoundError {
  readonly checkpointId: string

  constructor(checkpointId: string) {
    super(`Checkpoint not found: ${checkpointId}`)
    this.name = "CheckpointNotFoundError"
    this.checkpointId = checkpointId
  }
}

export class CheckpointAlreadyResolvedError extends ConflictError {
  readonly checkpointId: string

  constructor(checkpointId: string, resolvedAt: string) {
    super(`Checkpoint ${checkpointId} was already resolved at ${resolvedAt}`)
    this.name = "CheckpointAlreadyResolvedError"
    this.checkpointId = checkpointId
  }
}
