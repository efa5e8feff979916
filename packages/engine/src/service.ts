/**
 * EngineService: the operational command set over runs and checkpoints.
 *
 * Every command reads the run from the store, changes it and writes it
 * back whole. Commands that change a run are refused while the wave runner
 * is executing it.
 */

import { Plan, type Step } from "@waveline/shared/plan"
import type { TracingLogger } from "@waveline/shared/tracing"

import { buildContinuation, type CheckpointManager } from "./checkpoint/manager.js"
import type { Checkpoint, ContinuationContext } from "./checkpoint/types.js"
import { ConflictError, StepNotFoundError } from "./errors.js"
import type { ExecutionOutcome, WaveRunner } from "./executor/wave-runner.js"
import { summarizeProgress } from "./run/format.js"
import { isTerminal, transitionRun } from "./run/state-machine.js"
import type { RunStore } from "./run/store.js"
import { findStepResult, patchStepResult, type Run, type RunProgress, skipBlockedSteps } from "./run/types.js"
import type { GateProvider } from "./verification/gate.js"
import { RUN_VERIFICATION_KEY, type VerificationResult } from "./verification/types.js"

export type MarkAction = "started" | "completed" | "failed" | "skipped"

export const MARK_ACTIONS: readonly MarkAction[] = ["started", "completed", "failed", "skipped"]

export interface MarkStepOptions {
  output?: string
  /** Recorded on failed and skipped steps. */
  error?: string
}

export interface ResumedRunView {
  run: Run
  nextStep: Step | null
  readySteps: Step[]
  pendingCheckpoints: Checkpoint[]
}

export interface ResolvedCheckpoint {
  checkpoint: Checkpoint
  continuation: ContinuationContext
}

export interface EngineServiceDeps {
  store: RunStore
  checkpoints: CheckpointManager
  runner: WaveRunner
  gates?: GateProvider
  logger?: TracingLogger
  now?: () => Date
}

export class EngineService {
  private readonly store: RunStore
  private readonly checkpoints: CheckpointManager
  private readonly runner: WaveRunner
  private readonly gates: GateProvider | undefined
  private readonly logger: TracingLogger | undefined
  private readonly now: () => Date

  constructor(deps: EngineServiceDeps) {
    this.store = deps.store
    this.checkpoints = deps.checkpoints
    this.runner = deps.runner
    this.gates = deps.gates
    this.logger = deps.logger
    this.now = deps.now ?? (() => new Date())
  }

  /** Validate a plan (a Plan or a v1 plan document) and allocate a pending run for it. */
  async startRun(plan: unknown, project: string): Promise<Run> {
    const parsed = plan instanceof Plan ? plan : Plan.fromDocument(plan)
    parsed.assertValid()
    return this.store.create(parsed, project)
  }

  async getRun(runId: string): Promise<Run> {
    return this.store.get(runId)
  }

  async listRuns(project?: string): Promise<Run[]> {
    return this.store.list(project)
  }

  /**
   * Rehydrate a run and report where it stands. Writes nothing, so calling
   * it repeatedly always gives the same answer.
   */
  async resumeRun(runId: string): Promise<ResumedRunView> {
    const { run, plan } = await this.store.resume(runId)
    const done = isTerminal(run.status)
    return {
      run,
      nextStep: done ? null : plan.getNextStep(),
      readySteps: done ? [] : plan.getReadySteps(),
      pendingCheckpoints: await this.checkpoints.pendingForRun(runId),
    }
  }

  async executeRun(runId: string): Promise<ExecutionOutcome> {
    return this.runner.execute(runId)
  }

  /** The lowest-order step whose dependencies have all completed, or null. */
  async nextStep(runId: string): Promise<Step | null> {
    const { run, plan } = await this.store.resume(runId)
    if (isTerminal(run.status)) return null
    return plan.getNextStep()
  }

  /**
   * Record a step transition made outside the wave runner. Marking a step
   * failed fails the run; skipping one skips its dependents; finishing the
   * last step completes it.
   */
  async markStep(runId: string, stepId: string, action: MarkAction, options: MarkStepOptions = {}): Promise<Run> {
    if (this.runner.isExecuting(runId)) {
      throw new ConflictError(`Run ${runId} is executing; wait for it to halt`)
    }
    const { run, plan } = await this.store.resume(runId)
    const step = plan.getStep(stepId)
    if (!step) throw new StepNotFoundError(runId, stepId)

    const at = this.now().toISOString()
    if (run.status !== "in_progress") transitionRun(run, "in_progress", at)
    const previous = findStepResult(run, stepId)

    switch (action) {
      case "started":
        patchStepResult(run, stepId, { status: "in_progress", startedAt: at, completedAt: null, error: null })
        run.currentStep = stepId
        break
      case "completed":
        patchStepResult(run, stepId, {
          status: "completed",
          startedAt: previous?.startedAt ?? at,
          completedAt: at,
          output: options.output ?? previous?.output ?? "",
          error: null,
        })
        break
      case "failed": {
        const error = options.error ?? "marked failed"
        patchStepResult(run, stepId, {
          status: "failed",
          startedAt: previous?.startedAt ?? at,
          completedAt: at,
          error,
          ...(options.output !== undefined ? { output: options.output } : {}),
        })
        run.currentStep = stepId
        transitionRun(run, "failed", at, `Step ${stepId} failed: ${error}`)
        break
      }
      case "skipped":
        patchStepResult(run, stepId, { status: "skipped", completedAt: at, error: options.error ?? null })
        break
    }

    plan.applyResults(run.stepResults)
    const cascaded = action === "skipped" ? skipBlockedSteps(run, plan, at) : []
    if (run.status === "in_progress" && plan.isComplete()) transitionRun(run, "completed", at)

    await this.store.save(run)
    await this.store.appendEvent(runId, "step_marked", { stepId, action, runStatus: run.status, cascaded })
    this.logger?.info("Step marked", { runId, stepId, action, runStatus: run.status, cascaded })
    return run
  }

  /** Run the project's checks for one step and store the result. */
  async verifyStep(runId: string, stepId: string): Promise<VerificationResult> {
    const { run, plan } = await this.store.resume(runId)
    const step = plan.getStep(stepId)
    if (!step) throw new StepNotFoundError(runId, stepId)

    const gate = this.gates ? await this.gates(run.project) : null
    const result = gate ? await gate.verifyStep(step) : this.skipped(stepId)
    await this.store.saveVerification(runId, result)
    return result
  }

  /** Run-level verification; callers gating a commit must see `passed`, not merely not-failed. */
  async verifyRun(runId: string): Promise<VerificationResult> {
    const result = await this.runner.verifyRun(runId)
    if (result) return result
    const skipped = this.skipped(RUN_VERIFICATION_KEY)
    await this.store.saveVerification(runId, skipped)
    return skipped
  }

  async progress(runId: string): Promise<RunProgress> {
    return summarizeProgress(await this.store.get(runId))
  }

  async listCheckpoints(project: string): Promise<Checkpoint[]> {
    return this.checkpoints.listPending(project)
  }

  /**
   * Stamp the response and hand back the continuation a worker resumes
   * with. The run stays paused until it is executed again.
   */
  async resolveCheckpoint(checkpointId: string, response: string): Promise<ResolvedCheckpoint> {
    const checkpoint = await this.checkpoints.resolve(checkpointId, response)
    await this.store.appendEvent(checkpoint.runId, "checkpoint_resolved", {
      checkpointId,
      stepId: checkpoint.stepId,
    })
    return { checkpoint, continuation: buildContinuation(checkpoint) }
  }

  private skipped(stepId: string): VerificationResult {
    const at = this.now().toISOString()
    return { stepId, status: "skipped", commands: [], startedAt: at, completedAt: at }
  }
}
