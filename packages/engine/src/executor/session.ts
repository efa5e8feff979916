/**
 * Per-execution state for one run.
 *
 * A session lives exactly as long as one `WaveRunner.execute()` call and is
 * never shared between runs. It holds the run's verification gate, the
 * fixes and deviations recorded so far and why execution stopped. Workers
 * apply fixes themselves and report them with their result, so a fix is
 * recorded once it is done.
 */

import type { CheckpointType } from "@waveline/shared/plan"

import type { AuditedDeviation } from "../deviation/audit.js"
import type { VerificationGate } from "../verification/gate.js"

export interface AppliedFix {
  stepId: string
  description: string
  resolution: string
  recordedAt: string
}

export type HaltInfo =
  | { kind: "failed"; stepId: string | null; reason: string }
  | {
      kind: "checkpoint"
      stepId: string
      reason: string
      checkpointId: string
      checkpointType: CheckpointType
      awaiting: string
    }

export interface ExecutionSessionOptions {
  /** The gate for the run's project, resolved once per execution. */
  gate?: VerificationGate | null
  now?: () => Date
}

export class ExecutionSession {
  readonly runId: string
  readonly gate: VerificationGate | null
  readonly deviations: AuditedDeviation[] = []
  readonly fixes: AppliedFix[] = []
  private haltInfo: HaltInfo | null = null
  private readonly now: () => Date

  constructor(runId: string, options: ExecutionSessionOptions = {}) {
    this.runId = runId
    this.gate = options.gate ?? null
    this.now = options.now ?? (() => new Date())
  }

  get halt(): HaltInfo | null {
    return this.haltInfo
  }

  recordFix(stepId: string, description: string, resolution: string): AppliedFix {
    const fix: AppliedFix = { stepId, description, resolution, recordedAt: this.now().toISOString() }
    this.fixes.push(fix)
    return fix
  }

  recordDeviation(entry: AuditedDeviation): void {
    this.deviations.push(entry)
  }

  /**
   * Record why execution stops. A failure outranks a checkpoint; otherwise
   * the first halt recorded is kept.
   */
  haltWith(info: HaltInfo): void {
    if (this.haltInfo === null || (info.kind === "failed" && this.haltInfo.kind === "checkpoint")) {
      this.haltInfo = info
    }
  }
}
