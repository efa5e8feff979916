/**
 * Run status state machine.
 *
 * States:
 * - pending: created, nothing dispatched yet
 * - in_progress: the executor is driving waves
 * - paused: halted at a checkpoint, waiting for a human response
 * - completed: every step completed or skipped (and run verification passed)
 * - failed: a step failed; resumable after a fix
 * - cancelled: abandoned
 */

import { ConflictError } from "../errors.js"
import type { Run, RunStatus } from "./types.js"

export const VALID_TRANSITIONS: Record<RunStatus, RunStatus[]> = {
  pending: ["in_progress", "cancelled"],
  in_progress: ["paused", "completed", "failed", "cancelled"],
  paused: ["in_progress", "cancelled"],
  failed: ["in_progress"],
  completed: [],
  cancelled: [],
}

export class InvalidRunTransitionError extends ConflictError {
  readonly from: RunStatus
  readonly to: RunStatus

  constructor(from: RunStatus, to: RunStatus, runId?: string) {
    super(`Invalid run transition${runId ? ` for ${runId}` : ""}: ${from} → ${to}`)
    this.name = "InvalidRunTransitionError"
    this.from = from
    this.to = to
  }
}

export function isValidTransition(from: RunStatus, to: RunStatus): boolean {
  return VALID_TRANSITIONS[from].includes(to)
}

export function assertValidTransition(from: RunStatus, to: RunStatus, runId?: string): void {
  if (!isValidTransition(from, to)) {
    throw new InvalidRunTransitionError(from, to, runId)
  }
}

export function isTerminal(status: RunStatus): boolean {
  return VALID_TRANSITIONS[status].length === 0
}

/**
 * Move `run` to `to`, stamping timestamps: the first entry into in_progress
 * sets startedAt, terminal and failed states set completedAt, and re-entering
 * in_progress clears completedAt and the previous error.
 */
export function transitionRun(run: Run, to: RunStatus, at: string, reason?: string): void {
  assertValidTransition(run.status, to, run.id)
  run.status = to
  switch (to) {
    case "in_progress":
      run.startedAt ??= at
      run.completedAt = null
      run.error = null
      break
    case "paused":
      run.error = reason ?? null
      break
    case "completed":
      run.completedAt = at
      run.currentStep = null
      run.error = null
      break
    case "failed":
    case "cancelled":
      run.completedAt = at
      run.error = reason ?? null
      break
    case "pending":
      break
  }
}
