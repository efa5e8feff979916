import type { StepKind } from "@waveline/shared/plan"
import { z } from "zod"

export type CommandStatus = "pending" | "passed" | "failed" | "skipped" | "error"
export type VerificationStatus = "passed" | "failed" | "skipped" | "error"

/** Reserved step key for run-level verification. */
export const RUN_VERIFICATION_KEY = "@run"

export interface VerificationCommand {
  name: string
  command: string
  /** Relative paths resolve against the project directory. */
  workingDir: string | null
  timeoutSeconds: number
  required: boolean
  /** Only run for these step kinds; empty means every kind. */
  runOn: StepKind[]
}

export interface VerificationConfig {
  commands: VerificationCommand[]
  runAfterEachStep: boolean
  runAtCheckpoints: boolean
  stopOnFailure: boolean
}

export const CommandResultSchema = z.object({
  name: z.string(),
  command: z.string(),
  status: z.enum(["pending", "passed", "failed", "skipped", "error"]),
  exitCode: z.number().int().nullable(),
  stdout: z.string(),
  stderr: z.string(),
  startedAt: z.string().nullable(),
  completedAt: z.string().nullable(),
  durationMs: z.number(),
  required: z.boolean(),
  error: z.string().nullable(),
})

export type CommandResult = z.infer<typeof CommandResultSchema>

export const CommandResultListSchema = z.array(CommandResultSchema)

export interface VerificationResult {
  stepId: string
  status: VerificationStatus
  commands: CommandResult[]
  startedAt: string
  completedAt: string
}
