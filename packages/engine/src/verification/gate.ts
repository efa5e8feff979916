/**
 * Verification Gate: runs configured check commands and decides pass/fail.
 *
 * A result passes only when every required command passed. Optional
 * commands are recorded but never change the verdict. With no applicable
 * commands the result is "skipped", which callers must not read as a pass.
 */

import { spawn } from "node:child_process"
import { isAbsolute, join } from "node:path"

import type { Step, StepKind } from "@waveline/shared/plan"
import { type TracingLogger, WavelineAttributes, withSpan } from "@waveline/shared/tracing"

import { command as makeCommand, resolveVerificationConfig } from "./config.js"
import type {
  CommandResult,
  VerificationCommand,
  VerificationConfig,
  VerificationResult,
  VerificationStatus,
} from "./types.js"

/** Captured output beyond this many characters keeps only its tail. */
const MAX_OUTPUT_CHARS = 256 * 1024

/** Grace period between SIGTERM and SIGKILL for a timed-out command. */
const KILL_GRACE_MS = 2_000

export interface VerificationGateOptions {
  config: VerificationConfig
  /** Working directory for commands; relative `workingDir`s resolve against it. */
  projectDir: string
  logger?: TracingLogger
  now?: () => Date
  /** Signals a timed-out command's process group. Default: process.kill */
  kill?: (pid: number, signal: NodeJS.Signals) => void
}

export interface RunVerificationOptions {
  /** Filters commands by their `runOn` list. Omitted means every command applies. */
  stepKind?: StepKind
  /** Appended after the configured commands. */
  extraCommands?: readonly VerificationCommand[]
}

function appendCapped(buffer: string, chunk: string): string {
  const next = buffer + chunk
  return next.length > MAX_OUTPUT_CHARS ? next.slice(next.length - MAX_OUTPUT_CHARS) : next
}

function overallStatus(results: readonly CommandResult[]): VerificationStatus {
  if (results.length === 0) return "skipped"
  const blocking = results.find((r) => r.required && r.status !== "passed")
  if (!blocking) return "passed"
  return blocking.status === "error" ? "error" : "failed"
}

export class VerificationGate {
  readonly config: VerificationConfig
  private readonly projectDir: string
  private readonly logger: TracingLogger | undefined
  private readonly now: () => Date
  private readonly kill: (pid: number, signal: NodeJS.Signals) => void

  constructor(options: VerificationGateOptions) {
    this.config = options.config
    this.projectDir = options.projectDir
    this.logger = options.logger
    this.now = options.now ?? (() => new Date())
    this.kill = options.kill ?? ((pid, signal) => process.kill(pid, signal))
  }

  commandsFor(stepKind?: StepKind): VerificationCommand[] {
    if (stepKind === undefined) return [...this.config.commands]
    return this.config.commands.filter((cmd) => cmd.runOn.length === 0 || cmd.runOn.includes(stepKind))
  }

  /** Whether the executor should verify after a step: every step, or only checkpoint steps. */
  shouldRunForStep(isCheckpoint: boolean): boolean {
    if (this.config.runAfterEachStep) return true
    return isCheckpoint && this.config.runAtCheckpoints
  }

  /**
   * Run applicable commands in order. After a required command fails, the
   * rest are recorded as skipped when `stopOnFailure` is set.
   */
  async run(stepId: string, options: RunVerificationOptions = {}): Promise<VerificationResult> {
    const commands = [...this.commandsFor(options.stepKind), ...(options.extraCommands ?? [])]

    return withSpan(
      "waveline.verification.run",
      { [WavelineAttributes.STEP_ID]: stepId },
      async () => {
        const startedAt = this.now().toISOString()
        const results: CommandResult[] = []
        let halted = false

        for (const cmd of commands) {
          if (halted) {
            results.push(this.skippedResult(cmd))
            continue
          }
          const result = await this.runCommand(cmd)
          results.push(result)
          if (cmd.required && result.status !== "passed" && this.config.stopOnFailure) {
            halted = true
          }
        }

        const status = overallStatus(results)
        this.logger?.info("Verification finished", {
          stepId,
          status,
          commands: results.map((r) => `${r.name}:${r.status}`),
        })
        return { stepId, status, commands: results, startedAt, completedAt: this.now().toISOString() }
      },
      { resultAttributes: (result) => ({ [WavelineAttributes.VERIFICATION_STATUS]: result.status }) },
    )
  }

  /** Verify a step: the configured commands for its kind, then its own verify command as `step:<id>`. */
  async verifyStep(step: Step): Promise<VerificationResult> {
    const extra =
      step.kind !== "checkpoint" && step.verifyCommand
        ? [makeCommand(`step:${step.id}`, step.verifyCommand)]
        : []
    return this.run(step.id, { stepKind: step.kind, extraCommands: extra })
  }

  async runCommand(cmd: VerificationCommand): Promise<CommandResult> {
    const cwd = cmd.workingDir
      ? isAbsolute(cmd.workingDir)
        ? cmd.workingDir
        : join(this.projectDir, cmd.workingDir)
      : this.projectDir
    const startedAt = this.now()
    const started = Date.now()

    const finish = (
      fields: Pick<CommandResult, "status" | "exitCode" | "stdout" | "stderr" | "error">,
    ): CommandResult => ({
      name: cmd.name,
      command: cmd.command,
      required: cmd.required,
      startedAt: startedAt.toISOString(),
      completedAt: this.now().toISOString(),
      durationMs: Date.now() - started,
      ...fields,
    })

    return new Promise<CommandResult>((resolve) => {
      let stdout = ""
      let stderr = ""
      let timedOut = false
      let settled = false
      const useGroup = process.platform !== "win32"

      const child = spawn(cmd.command, {
        cwd,
        shell: true,
        detached: useGroup,
        stdio: ["ignore", "pipe", "pipe"],
      })

      // Runs inside timer callbacks, so a failure settles the command instead of throwing.
      const signal = (name: NodeJS.Signals): void => {
        if (child.pid === undefined) return
        try {
          if (useGroup) this.kill(-child.pid, name)
          else child.kill(name)
        } catch (err) {
          // ESRCH: the process group already exited.
          if (err instanceof Error && "code" in err && err.code === "ESRCH") return
          const message = err instanceof Error ? err.message : String(err)
          this.logger?.warn("Could not stop timed-out command", { command: cmd.name, signal: name, error: message })
          settle(
            finish({
              status: "error",
              exitCode: null,
              stdout,
              stderr,
              error: `Command timed out after ${cmd.timeoutSeconds} seconds and could not be stopped: ${message}`,
            }),
          )
        }
      }

      let killTimer: NodeJS.Timeout | undefined
      const timeoutTimer = setTimeout(() => {
        timedOut = true
        signal("SIGTERM")
        if (!settled) killTimer = setTimeout(() => signal("SIGKILL"), KILL_GRACE_MS)
      }, cmd.timeoutSeconds * 1000)

      const settle = (result: CommandResult): void => {
        if (settled) return
        settled = true
        clearTimeout(timeoutTimer)
        clearTimeout(killTimer)
        resolve(result)
      }

      child.stdout.setEncoding("utf-8")
      child.stderr.setEncoding("utf-8")
      child.stdout.on("data", (chunk: string) => {
        stdout = appendCapped(stdout, chunk)
      })
      child.stderr.on("data", (chunk: string) => {
        stderr = appendCapped(stderr, chunk)
      })

      child.on("error", (err) => {
        settle(finish({ status: "error", exitCode: null, stdout, stderr, error: err.message }))
      })

      child.on("close", (code) => {
        if (timedOut) {
          settle(
            finish({
              status: "error",
              exitCode: code,
              stdout,
              stderr,
              error: `Command timed out after ${cmd.timeoutSeconds} seconds`,
            }),
          )
          return
        }
        settle(
          finish({
            status: code === 0 ? "passed" : "failed",
            exitCode: code,
            stdout,
            stderr,
            error: null,
          }),
        )
      })
    })
  }

  private skippedResult(cmd: VerificationCommand): CommandResult {
    const at = this.now().toISOString()
    return {
      name: cmd.name,
      command: cmd.command,
      status: "skipped",
      exitCode: null,
      stdout: "",
      stderr: "",
      startedAt: null,
      completedAt: at,
      durationMs: 0,
      required: cmd.required,
      error: "skipped after a required command failed",
    }
  }
}

/** Resolves the gate for a project directory; null disables verification. */
export type GateProvider = (project: string) => Promise<VerificationGate | null>

/**
 * Gates built from each project's own verification config, read fresh on
 * every call so edits take effect on the next execution.
 */
export function projectGates(options: Omit<VerificationGateOptions, "config" | "projectDir"> = {}): GateProvider {
  return async (project) => {
    const config = await resolveVerificationConfig(project)
    return new VerificationGate({ ...options, config, projectDir: project })
  }
}

// ──────────────────────────────────────────────────
// Reports
// ──────────────────────────────────────────────────

const COMMAND_ICONS: Record<CommandResult["status"], string> = {
  passed: "✓",
  failed: "✗",
  skipped: "○",
  error: "!",
  pending: "?",
}

function excerpt(label: string, text: string): string[] {
  const lines = text.trim().split("\n")
  if (lines.length === 1 && lines[0] === "") return []
  const shown = lines.slice(0, 10).map((line) => `      ${line}`)
  if (lines.length > 10) shown.push("      ... (truncated)")
  return [`    ${label}:`, ...shown]
}

export function formatVerificationReport(result: VerificationResult): string {
  const lines = [`Verification Report: ${result.stepId}`, "=".repeat(50), `Status: ${result.status}`]
  lines.push(`Started: ${result.startedAt}`, `Completed: ${result.completedAt}`, "", "Commands:")
  for (const cmd of result.commands) {
    lines.push(`  ${COMMAND_ICONS[cmd.status]} ${cmd.name}${cmd.required ? "" : " (optional)"}`)
    lines.push(`    Command: ${cmd.command}`)
    lines.push(`    Exit code: ${cmd.exitCode ?? "-"}`)
    if (cmd.durationMs > 0) lines.push(`    Duration: ${(cmd.durationMs / 1000).toFixed(2)}s`)
    if (cmd.error) lines.push(`    Error: ${cmd.error}`)
    lines.push(...excerpt("Output", cmd.stdout), ...excerpt("Errors", cmd.stderr))
  }
  return lines.join("\n")
}

export function formatVerificationSummary(results: readonly VerificationResult[]): string {
  if (results.length === 0) return "No verification results."
  const count = (status: VerificationStatus) => results.filter((r) => r.status === status).length
  const failed = results.filter((r) => r.status === "failed" || r.status === "error")
  const lines = [
    "Verification Summary",
    "=".repeat(40),
    `Total: ${results.length}`,
    `Passed: ${count("passed")}`,
    `Failed: ${failed.length}`,
    `Skipped: ${count("skipped")}`,
  ]
  if (failed.length > 0) {
    lines.push("", "Failed Steps:")
    for (const result of failed) {
      lines.push(`  • ${result.stepId}`)
      for (const cmd of result.commands) {
        if (cmd.status === "failed" || cmd.status === "error") {
          lines.push(`    - ${cmd.name}: ${cmd.error ?? `exit code ${cmd.exitCode ?? "-"}`}`)
        }
      }
    }
  }
  return lines.join("\n")
}
