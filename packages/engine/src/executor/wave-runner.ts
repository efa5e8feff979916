/**
 * Wave Runner: drives a run's plan wave by wave.
 *
 * Waves run in ascending order with a barrier between them: every step of
 * wave N has a recorded result, and the run is saved, before anything in
 * wave N+1 is submitted. Within a wave, steps go to the worker pool
 * together. The runner stops after the first wave that produces a failure
 * or a checkpoint; a failure outranks a checkpoint raised in the same wave.
 *
 * The Run Store is the only source of truth. Every execution starts by
 * replaying the stored run onto its plan, so a crash between saves loses
 * at most the wave in flight, whose steps are dispatched again.
 */

import { assignWaves, groupByWave, type CheckpointType, type Plan, type Step } from "@waveline/shared/plan"
import type { PoolHandle, PoolResult, WorkerPool } from "@waveline/shared/pool"
import {
  addSpanEvent,
  type TracingLogger,
  WavelineAttributes,
  WavelineEvents,
  withSpan,
} from "@waveline/shared/tracing"

import { buildContinuation, type CheckpointManager } from "../checkpoint/manager.js"
import type { Checkpoint, CheckpointOrigin, CompletedTask } from "../checkpoint/types.js"
import type { DeviationLog } from "../deviation/audit.js"
import { DeviationClassifier, type DeviationRecord } from "../deviation/classifier.js"
import { ConflictError } from "../errors.js"
import { transitionRun } from "../run/state-machine.js"
import type { RunStore } from "../run/store.js"
import { findStepResult, patchStepResult, type Run } from "../run/types.js"
import type { GateProvider, VerificationGate } from "../verification/gate.js"
import { RUN_VERIFICATION_KEY, type VerificationResult } from "../verification/types.js"
import { ExecutionSession, type HaltInfo } from "./session.js"
import type { KnowledgeStore, ReportedDeviation, StepContext, StepWorker, WorkerOutcome } from "./worker.js"

export interface WaveRunnerDeps {
  store: RunStore
  checkpoints: CheckpointManager
  deviations: DeviationLog
  pool: WorkerPool
  worker: StepWorker
  classifier?: DeviationClassifier
  /** Resolves the verification gate for a run's project. Without one, nothing is verified. */
  gates?: GateProvider
  knowledge?: KnowledgeStore
  logger?: TracingLogger
  /** Per-step wait limit. 0 or omitted waits indefinitely. */
  stepTimeoutMs?: number
  /** Hold critical-risk steps behind a risk-gate checkpoint. */
  approveCriticalSteps?: boolean
  now?: () => Date
}

export type ExecutionOutcome =
  | { status: "completed"; runId: string; verification: VerificationResult | null }
  | { status: "failed"; runId: string; stepId: string | null; reason: string }
  | {
      status: "paused"
      runId: string
      stepId: string
      checkpointId: string
      checkpointType: CheckpointType
      reason: string
      awaiting: string
    }

interface RaiseCheckpoint {
  origin: CheckpointOrigin
  type: CheckpointType
  blocker: string
  awaiting: string
  executionContext?: Record<string, unknown>
}

function pausedOutcome(checkpoint: Checkpoint): ExecutionOutcome {
  return {
    status: "paused",
    runId: checkpoint.runId,
    stepId: checkpoint.stepId,
    checkpointId: checkpoint.id,
    checkpointType: checkpoint.type,
    reason: checkpoint.blocker,
    awaiting: checkpoint.awaiting,
  }
}

/** Completed steps in plan order, as checkpoint and worker context. */
export function completedTasks(run: Run, plan: Plan): CompletedTask[] {
  return plan.steps
    .filter((step) => step.status === "completed")
    .map((step) => {
      const result = findStepResult(run, step.id)
      return {
        stepId: step.id,
        action: step.action,
        output: result?.output ?? "",
        completedAt: result?.completedAt ?? null,
      }
    })
}

function failingCommands(result: VerificationResult): string {
  return result.commands
    .filter((cmd) => cmd.required && cmd.status !== "passed")
    .map((cmd) => cmd.name)
    .join(", ")
}

export class WaveRunner {
  private readonly store: RunStore
  private readonly checkpoints: CheckpointManager
  private readonly deviations: DeviationLog
  private readonly pool: WorkerPool
  private readonly worker: StepWorker
  private readonly classifier: DeviationClassifier
  private readonly gates: GateProvider | undefined
  private readonly knowledge: KnowledgeStore | undefined
  private readonly logger: TracingLogger | undefined
  private readonly stepTimeoutMs: number | undefined
  private readonly approveCriticalSteps: boolean
  private readonly now: () => Date
  private readonly executing = new Set<string>()

  constructor(deps: WaveRunnerDeps) {
    this.store = deps.store
    this.checkpoints = deps.checkpoints
    this.deviations = deps.deviations
    this.pool = deps.pool
    this.worker = deps.worker
    this.classifier = deps.classifier ?? new DeviationClassifier()
    this.gates = deps.gates
    this.knowledge = deps.knowledge
    this.logger = deps.logger
    this.stepTimeoutMs = deps.stepTimeoutMs ? deps.stepTimeoutMs : undefined
    this.approveCriticalSteps = deps.approveCriticalSteps ?? false
    this.now = deps.now ?? (() => new Date())
  }

  isExecuting(runId: string): boolean {
    return this.executing.has(runId)
  }

  /**
   * Drive a run until it completes, fails or pauses. Resumes paused and
   * failed runs; a completed run is returned as is.
   */
  async execute(runId: string): Promise<ExecutionOutcome> {
    if (this.executing.has(runId)) {
      throw new ConflictError(`Run ${runId} is already executing`)
    }
    this.executing.add(runId)
    try {
      return await withSpan("waveline.run.execute", { [WavelineAttributes.RUN_ID]: runId }, () => this.drive(runId), {
        resultAttributes: (outcome) => ({ [WavelineAttributes.RUN_STATUS]: outcome.status }),
      })
    } finally {
      this.executing.delete(runId)
    }
  }

  /** Run-level verification, stored under the reserved `@run` key. Null without a gate. */
  async verifyRun(runId: string): Promise<VerificationResult | null> {
    const run = await this.store.get(runId)
    const gate = this.gates ? await this.gates(run.project) : null
    return gate ? this.runVerification(run.id, gate) : null
  }

  private async runVerification(runId: string, gate: VerificationGate): Promise<VerificationResult> {
    const result = await gate.run(RUN_VERIFICATION_KEY)
    await this.store.saveVerification(runId, result)
    return result
  }

  // ──────────────────────────────────────────────────
  // Run
  // ──────────────────────────────────────────────────

  private async drive(runId: string): Promise<ExecutionOutcome> {
    const { run, plan } = await this.store.resume(runId)

    if (run.status === "completed") {
      return {
        status: "completed",
        runId,
        verification: await this.store.loadVerification(runId, RUN_VERIFICATION_KEY),
      }
    }
    if (run.status === "paused") {
      const [pending] = await this.checkpoints.pendingForRun(run.id)
      if (pending) return pausedOutcome(pending)
    }

    const previous = run.status
    this.prepare(run, plan)
    await this.store.save(run)
    await this.store.appendEvent(run.id, "run_started", { previousStatus: previous })
    this.logger?.info("Run executing", { runId: run.id, planId: run.planId, previousStatus: previous })

    const gate = this.gates ? await this.gates(run.project) : null
    const session = new ExecutionSession(run.id, { gate, now: this.now })

    const { waves, needsValidation } = assignWaves(plan.steps)
    if (needsValidation) {
      return this.finishHalted(run, {
        kind: "failed",
        stepId: null,
        reason: `Plan failed validation: ${plan.validate().join("; ")}`,
      })
    }

    for (const group of groupByWave(plan.steps, waves)) {
      await this.runWave(run, plan, group.wave, group.stepIds, session)
      if (session.halt) return this.finishHalted(run, session.halt)
    }
    return this.finishComplete(run, plan, session)
  }

  /**
   * Enter in_progress. Steps left in_progress by an interrupted execution go
   * back to pending; resuming a failed run also retries its failed steps.
   */
  private prepare(run: Run, plan: Plan): void {
    const retryFailed = run.status === "failed"
    for (const result of [...run.stepResults]) {
      if (result.status === "in_progress" || (retryFailed && result.status === "failed")) {
        patchStepResult(run, result.stepId, { status: "pending", startedAt: null, completedAt: null, error: null })
      }
    }
    if (run.status !== "in_progress") transitionRun(run, "in_progress", this.timestamp())
    plan.applyResults(run.stepResults)
  }

  private async finishHalted(run: Run, halt: HaltInfo): Promise<ExecutionOutcome> {
    run.currentStep = halt.stepId
    if (halt.kind === "failed") {
      transitionRun(run, "failed", this.timestamp(), halt.reason)
      await this.store.save(run)
      await this.store.appendEvent(run.id, "run_failed", { stepId: halt.stepId, reason: halt.reason })
      this.logger?.warn("Run failed", { runId: run.id, stepId: halt.stepId, reason: halt.reason })
      return { status: "failed", runId: run.id, stepId: halt.stepId, reason: halt.reason }
    }

    transitionRun(run, "paused", this.timestamp(), halt.reason)
    await this.store.save(run)
    await this.store.appendEvent(run.id, "run_paused", { stepId: halt.stepId, checkpointId: halt.checkpointId })
    this.logger?.info("Run paused at checkpoint", {
      runId: run.id,
      stepId: halt.stepId,
      checkpointId: halt.checkpointId,
      awaiting: halt.awaiting,
    })
    return {
      status: "paused",
      runId: run.id,
      stepId: halt.stepId,
      checkpointId: halt.checkpointId,
      checkpointType: halt.checkpointType,
      reason: halt.reason,
      awaiting: halt.awaiting,
    }
  }

  private async finishComplete(run: Run, plan: Plan, session: ExecutionSession): Promise<ExecutionOutcome> {
    if (!plan.isComplete()) {
      const left = plan.steps.filter((s) => s.status !== "completed" && s.status !== "skipped").map((s) => s.id)
      return this.finishHalted(run, { kind: "failed", stepId: null, reason: `Steps left unfinished: ${left.join(", ")}` })
    }

    const verification = session.gate ? await this.runVerification(run.id, session.gate) : null
    if (verification && (verification.status === "failed" || verification.status === "error")) {
      return this.finishHalted(run, {
        kind: "failed",
        stepId: null,
        reason: `Run verification ${verification.status}: ${failingCommands(verification)}`,
      })
    }

    transitionRun(run, "completed", this.timestamp())
    await this.store.save(run)
    await this.store.appendEvent(run.id, "run_completed", { verification: verification?.status ?? null })
    this.logger?.info("Run completed", { runId: run.id, verification: verification?.status ?? null })
    return { status: "completed", runId: run.id, verification }
  }

  // ──────────────────────────────────────────────────
  // Wave
  // ──────────────────────────────────────────────────

  private async runWave(
    run: Run,
    plan: Plan,
    wave: number,
    stepIds: readonly string[],
    session: ExecutionSession,
  ): Promise<void> {
    const steps = stepIds
      .map((id) => plan.getStep(id))
      .filter((step): step is Step => step !== undefined && step.status === "pending")
    if (steps.length === 0) return

    await withSpan(
      "waveline.wave.run",
      { [WavelineAttributes.RUN_ID]: run.id, [WavelineAttributes.WAVE]: wave, [WavelineAttributes.WAVE_SIZE]: steps.length },
      async () => {
        const dispatch: Step[] = []
        for (const step of steps) {
          if (await this.gateStep(run, plan, step, wave, session)) dispatch.push(step)
        }

        if (dispatch.length > 0) await this.dispatch(run, plan, dispatch, session)

        plan.applyResults(run.stepResults)
        await this.store.save(run)
        await this.store.appendEvent(run.id, "wave_completed", {
          wave,
          steps: steps.map((s) => `${s.id}:${plan.getStep(s.id)?.status ?? "unknown"}`),
        })
      },
    )
  }

  /**
   * Decide whether a step may go to a worker. Steps blocked by a skipped
   * dependency are skipped; checkpoint steps and unapproved critical steps
   * raise a checkpoint instead.
   */
  private async gateStep(run: Run, plan: Plan, step: Step, wave: number, session: ExecutionSession): Promise<boolean> {
    const blocker = step.dependsOn.find((dep) => plan.getStep(dep)?.status !== "completed")
    if (blocker !== undefined) {
      const status = plan.getStep(blocker)?.status ?? "missing"
      if (status === "skipped") {
        patchStepResult(run, step.id, {
          status: "skipped",
          completedAt: this.timestamp(),
          error: `dependency ${blocker} was skipped`,
        })
        plan.applyResults(run.stepResults)
      } else {
        session.haltWith({
          kind: "failed",
          stepId: step.id,
          reason: `Step ${step.id} is blocked by ${blocker} (${status})`,
        })
      }
      return false
    }

    if (step.kind === "checkpoint") {
      const resolved = await this.latestResolved(run.id, step.id, "planned")
      if (resolved) {
        const at = this.timestamp()
        patchStepResult(run, step.id, {
          status: "completed",
          startedAt: resolved.createdAt,
          completedAt: at,
          output: resolved.userResponse ?? "",
          error: null,
        })
        plan.applyResults(run.stepResults)
        return false
      }

      let executionContext: Record<string, unknown> = { wave }
      if (session.gate?.shouldRunForStep(true)) {
        const verification = await session.gate.run(step.id, { stepKind: "checkpoint" })
        await this.store.saveVerification(run.id, verification)
        executionContext = { ...executionContext, verification: verification.status }
      }
      await this.raiseCheckpoint(run, plan, step, session, {
        origin: "planned",
        type: step.checkpointType,
        blocker: step.details ? `${step.action}: ${step.details}` : step.action,
        awaiting: step.awaiting,
        executionContext,
      })
      return false
    }

    if (this.approveCriticalSteps && step.risk === "critical") {
      const approved = await this.latestResolved(run.id, step.id, "risk-gate")
      if (!approved) {
        await this.raiseCheckpoint(run, plan, step, session, {
          origin: "risk-gate",
          type: "decision",
          blocker: `Step ${step.id} is critical risk${step.riskReason ? `: ${step.riskReason}` : ""}`,
          awaiting: "Approval to execute this critical step",
          executionContext: { wave },
        })
        return false
      }
    }

    return true
  }

  private async dispatch(run: Run, plan: Plan, steps: readonly Step[], session: ExecutionSession): Promise<void> {
    const startedAt = this.timestamp()
    for (const step of steps) {
      patchStepResult(run, step.id, { status: "in_progress", startedAt, completedAt: null, error: null })
    }
    run.currentStep = steps[0]?.id ?? run.currentStep
    plan.applyResults(run.stepResults)
    await this.store.save(run)

    const submitted: { step: Step; handle: PoolHandle<WorkerOutcome> }[] = []
    for (const step of steps) {
      const context = await this.buildContext(run, plan, step)
      const contextFile = await this.store.writeStepContext(run.id, step.id, context)
      patchStepResult(run, step.id, { contextFile })
      const handle = this.pool.submit(
        (ctx: StepContext, signal: AbortSignal) =>
          withSpan(
            "waveline.step.execute",
            {
              [WavelineAttributes.RUN_ID]: ctx.runId,
              [WavelineAttributes.STEP_ID]: ctx.step.id,
              [WavelineAttributes.STEP_KIND]: ctx.step.kind,
            },
            () => this.worker.execute(ctx, signal),
          ),
        context,
        { label: step.id, timeoutMs: this.stepTimeoutMs },
      )
      submitted.push({ step, handle })
    }

    // The step timeout runs from when a step gets a slot, not from submission.
    const results = await Promise.all(submitted.map(({ handle }) => this.pool.wait(handle)))

    for (const [index, { step }] of submitted.entries()) {
      const result = results[index]
      if (result) await this.recordOutcome(run, plan, step, result, session)
    }
  }

  private async buildContext(run: Run, plan: Plan, step: Step): Promise<StepContext> {
    let knowledge: string | null = null
    if (this.knowledge) {
      try {
        knowledge = await this.knowledge.lookup(step.target)
      } catch (err) {
        this.logger?.warn("Knowledge lookup failed", {
          runId: run.id,
          stepId: step.id,
          target: step.target,
          error: err instanceof Error ? err.message : String(err),
        })
      }
    }

    const resolved = await this.checkpoints.resolvedForStep(run.id, step.id)
    const latest = resolved.at(-1)

    return {
      runId: run.id,
      project: run.project,
      step: { ...step },
      knowledge,
      completedTasks: completedTasks(run, plan),
      continuation: latest ? buildContinuation(latest) : null,
    }
  }

  // ──────────────────────────────────────────────────
  // Step outcomes
  // ──────────────────────────────────────────────────

  private async recordOutcome(
    run: Run,
    plan: Plan,
    step: Step,
    result: PoolResult<WorkerOutcome>,
    session: ExecutionSession,
  ): Promise<void> {
    if (result.status === "failed") {
      this.failStep(run, step, result.error, session)
      return
    }

    const outcome = result.value
    switch (outcome.status) {
      case "failed":
        this.failStep(run, step, outcome.error, session, outcome.output)
        return
      case "checkpoint":
        this.resetStep(run, step)
        await this.raiseCheckpoint(run, plan, step, session, {
          origin: "worker",
          type: outcome.checkpointType,
          blocker: outcome.blocker,
          awaiting: outcome.awaiting,
        })
        return
      case "completed":
        break
    }

    if (await this.handleDeviations(run, plan, step, outcome.deviations ?? [], session)) {
      this.resetStep(run, step)
      return
    }

    const artifacts = await Promise.all(
      (outcome.artifacts ?? []).map((artifact) =>
        this.store.saveArtifact(run.id, step.id, artifact.name, artifact.content),
      ),
    )
    patchStepResult(run, step.id, {
      status: "completed",
      completedAt: this.timestamp(),
      output: outcome.output,
      artifacts,
      error: null,
    })
    this.logger?.info("Step completed", { runId: run.id, stepId: step.id })

    const hasOwnCheck = step.kind !== "checkpoint" && step.verifyCommand !== undefined
    const gate = session.gate
    if (gate && (gate.shouldRunForStep(false) || hasOwnCheck)) {
      const verification = await gate.verifyStep(step)
      await this.store.saveVerification(run.id, verification)
      if (verification.status === "failed" || verification.status === "error") {
        this.failStep(run, step, `Verification ${verification.status}: ${failingCommands(verification)}`, session)
      }
    }
  }

  /**
   * Classify and audit what the worker reported. Auto-fixable deviations
   * are recorded as fixes; the first one that needs a human raises a
   * deviation checkpoint unless one with the same description was already
   * resolved for this step. Returns whether the step must halt.
   */
  private async handleDeviations(
    run: Run,
    plan: Plan,
    step: Step,
    reported: readonly ReportedDeviation[],
    session: ExecutionSession,
  ): Promise<boolean> {
    if (reported.length === 0) return false

    const approved = (await this.checkpoints.resolvedForStep(run.id, step.id)).filter((cp) => cp.origin === "deviation")
    let needsHuman: DeviationRecord | null = null

    for (const deviation of reported) {
      const record = this.classifier.createRecord(
        deviation.description,
        deviation.targets ?? [step.target],
        deviation.resolution ?? "",
        deviation.context ?? "",
      )

      if (record.action === "auto_fix") {
        const fix = session.recordFix(step.id, record.description, record.resolution || "fixed inline")
        record.resolution = fix.resolution
      } else {
        const answer = approved.find((cp) => cp.blocker === record.description)
        if (answer) record.resolution = `approved: ${answer.userResponse ?? ""}`
        else needsHuman ??= record
      }

      session.recordDeviation(await this.deviations.append(run.id, step.id, record))
      addSpanEvent(WavelineEvents.DEVIATION, {
        [WavelineAttributes.STEP_ID]: step.id,
        [WavelineAttributes.DEVIATION_RULE]: record.rule ?? "unmatched",
        [WavelineAttributes.DEVIATION_ACTION]: record.action,
      })
      this.logger?.info("Deviation recorded", {
        runId: run.id,
        stepId: step.id,
        category: record.category,
        rule: record.rule,
        action: record.action,
      })
    }

    if (!needsHuman) return false
    await this.raiseCheckpoint(run, plan, step, session, {
      origin: "deviation",
      type: "decision",
      blocker: needsHuman.description,
      awaiting: "Approve the change or give direction before the step continues",
      executionContext: { category: needsHuman.category, rule: needsHuman.rule, targets: needsHuman.targets },
    })
    return true
  }

  /** Reuses the step's pending checkpoint of the same origin rather than raising a duplicate. */
  private async raiseCheckpoint(
    run: Run,
    plan: Plan,
    step: Step,
    session: ExecutionSession,
    input: RaiseCheckpoint,
  ): Promise<Checkpoint> {
    const pending = await this.checkpoints.pendingForRun(run.id)
    const checkpoint =
      pending.find((cp) => cp.stepId === step.id && cp.origin === input.origin) ??
      (await this.checkpoints.create({
        runId: run.id,
        planId: run.planId,
        project: run.project,
        stepId: step.id,
        type: input.type,
        origin: input.origin,
        completedTasks: completedTasks(run, plan),
        currentTask: `${step.id}: ${step.action}`,
        blocker: input.blocker,
        awaiting: input.awaiting,
        executionContext: input.executionContext,
      }))

    addSpanEvent(WavelineEvents.CHECKPOINT_RAISED, {
      [WavelineAttributes.STEP_ID]: step.id,
      [WavelineAttributes.CHECKPOINT_ID]: checkpoint.id,
      [WavelineAttributes.CHECKPOINT_ORIGIN]: checkpoint.origin,
    })
    session.haltWith({
      kind: "checkpoint",
      stepId: step.id,
      reason: checkpoint.blocker,
      checkpointId: checkpoint.id,
      checkpointType: checkpoint.type,
      awaiting: checkpoint.awaiting,
    })
    return checkpoint
  }

  private async latestResolved(runId: string, stepId: string, origin: CheckpointOrigin): Promise<Checkpoint | undefined> {
    const resolved = await this.checkpoints.resolvedForStep(runId, stepId)
    return resolved.filter((cp) => cp.origin === origin).at(-1)
  }

  private failStep(run: Run, step: Step, error: string, session: ExecutionSession, output?: string): void {
    patchStepResult(run, step.id, {
      status: "failed",
      completedAt: this.timestamp(),
      error,
      ...(output !== undefined ? { output } : {}),
    })
    session.haltWith({ kind: "failed", stepId: step.id, reason: `Step ${step.id} failed: ${error}` })
    this.logger?.warn("Step failed", { runId: run.id, stepId: step.id, error })
  }

  private resetStep(run: Run, step: Step): void {
    patchStepResult(run, step.id, { status: "pending", startedAt: null, completedAt: null, error: null })
  }

  private timestamp(): string {
    return this.now().toISOString()
  }
}
