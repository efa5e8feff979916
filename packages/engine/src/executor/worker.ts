/**
 * Worker contract: whatever performs a step (an agent, a script, a human
 * behind a queue) sees only a `StepContext` and answers with a
 * `WorkerOutcome`. Contexts are plain data so the pool can clone them.
 */

import type { CheckpointType, Step } from "@waveline/shared/plan"

import type { CompletedTask, ContinuationContext } from "../checkpoint/types.js"

export interface StepContext {
  runId: string
  project: string
  step: Step
  /** Notes for `step.target` from the knowledge store, when it has any. */
  knowledge: string | null
  /** Steps already completed in this run, in plan order. */
  completedTasks: CompletedTask[]
  /** Set when resuming this step after a resolved checkpoint. */
  continuation: ContinuationContext | null
}

/** An anomaly the worker ran into while performing the step. */
export interface ReportedDeviation {
  description: string
  targets?: string[]
  /** Extra text the classifier searches alongside the description. */
  context?: string
  /** What the worker did about it, if anything. */
  resolution?: string
}

export interface StepArtifact {
  name: string
  content: string
}

export type WorkerOutcome =
  | {
      status: "completed"
      output: string
      artifacts?: StepArtifact[]
      deviations?: ReportedDeviation[]
    }
  | { status: "failed"; error: string; output?: string }
  | { status: "checkpoint"; checkpointType: CheckpointType; blocker: string; awaiting: string }

export interface StepWorker {
  /** `signal` aborts when the executor stops waiting for this step. */
  execute(context: StepContext, signal: AbortSignal): Promise<WorkerOutcome>
}

/** Read-only lookup by step target. Absence is not an error. */
export interface KnowledgeStore {
  lookup(target: string): Promise<string | null>
}

// ──────────────────────────────────────────────────
// Echo worker
// ──────────────────────────────────────────────────

export type ScriptedOutcome = WorkerOutcome | ((context: StepContext) => WorkerOutcome)

export interface EchoStepWorkerConfig {
  /** Artificial latency before answering. Default: 0. */
  latencyMs?: number
  /** Outcomes by step id. Unscripted steps complete with their action as output. */
  outcomes?: Record<string, ScriptedOutcome>
}

/**
 * Stub worker for tests and dry runs. Echoes each step's action back as
 * its output and records what it was asked to do.
 */
export class EchoStepWorker implements StepWorker {
  readonly calls: StepContext[] = []
  private latencyMs: number
  private outcomes: Record<string, ScriptedOutcome>
  private running = 0
  private peak = 0

  constructor(config: EchoStepWorkerConfig = {}) {
    this.latencyMs = config.latencyMs ?? 0
    this.outcomes = { ...config.outcomes }
  }

  /** Highest number of steps seen executing at once. */
  get maxConcurrent(): number {
    return this.peak
  }

  get executedStepIds(): string[] {
    return this.calls.map((c) => c.step.id)
  }

  configure(config: EchoStepWorkerConfig): void {
    if (config.latencyMs !== undefined) this.latencyMs = config.latencyMs
    if (config.outcomes !== undefined) this.outcomes = { ...this.outcomes, ...config.outcomes }
  }

  /** Drop the scripted outcome for a step so it echoes again. */
  unscript(stepId: string): void {
    delete this.outcomes[stepId]
  }

  async execute(context: StepContext, signal: AbortSignal): Promise<WorkerOutcome> {
    this.calls.push(context)
    this.running++
    this.peak = Math.max(this.peak, this.running)
    try {
      if (this.latencyMs > 0) await sleep(this.latencyMs, signal)
      if (signal.aborted) return { status: "failed", error: "aborted" }

      const scripted = this.outcomes[context.step.id]
      if (scripted === undefined) return { status: "completed", output: context.step.action }
      return typeof scripted === "function" ? scripted(context) : scripted
    } finally {
      this.running--
    }
  }
}

function sleep(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    const timer = setTimeout(done, ms)
    function done(): void {
      clearTimeout(timer)
      signal.removeEventListener("abort", done)
      resolve()
    }
    signal.addEventListener("abort", done, { once: true })
  })
}
