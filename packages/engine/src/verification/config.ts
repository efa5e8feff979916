/**
 * Verification config loading.
 *
 * Looked up in `<project>/.waveline/verification.json`, then under the
 * `verification` key of `<project>/.waveline/config.json`. Files use the
 * same snake_case style as plan documents.
 */

import { access, mkdir, readFile, writeFile } from "node:fs/promises"
import { join } from "node:path"

import { STEP_KINDS, type StepKind } from "@waveline/shared/plan"
import { z } from "zod"

import type { VerificationCommand, VerificationConfig } from "./types.js"

export const CONFIG_DIR = ".waveline"

const StepKindSchema = z.custom<StepKind>(
  (value) => typeof value === "string" && STEP_KINDS.some((kind) => kind === value),
  { message: "unknown step kind" },
)

const CommandFileSchema = z.object({
  name: z.string().default(""),
  command: z.string().default(""),
  working_dir: z.string().nullable().default(null),
  /** Seconds. */
  timeout: z.number().default(300),
  required: z.boolean().default(true),
  run_on: z.array(StepKindSchema).default([]),
})

export const VerificationConfigFileSchema = z.object({
  commands: z.array(CommandFileSchema).default([]),
  run_after_each_step: z.boolean().default(false),
  run_at_checkpoints: z.boolean().default(true),
  stop_on_failure: z.boolean().default(true),
})

export type VerificationConfigFile = z.input<typeof VerificationConfigFileSchema>

const ProjectConfigFileSchema = z.object({ verification: z.unknown().optional() }).passthrough()

export class VerificationConfigError extends Error {
  readonly errors: readonly string[]

  constructor(source: string, errors: readonly string[]) {
    super(`Invalid verification config in ${source}: ${errors.join("; ")}`)
    this.name = "VerificationConfigError"
    this.errors = errors
  }
}

export const EMPTY_VERIFICATION_CONFIG: VerificationConfig = {
  commands: [],
  runAfterEachStep: false,
  runAtCheckpoints: true,
  stopOnFailure: true,
}

export function command(
  name: string,
  commandLine: string,
  options: Partial<Omit<VerificationCommand, "name" | "command">> = {},
): VerificationCommand {
  return {
    name,
    command: commandLine,
    workingDir: options.workingDir ?? null,
    timeoutSeconds: options.timeoutSeconds ?? 300,
    required: options.required ?? true,
    runOn: options.runOn ?? [],
  }
}

/** lint and typecheck are advisory; the test suite gates. */
export function defaultNodeConfig(): VerificationConfig {
  return {
    ...EMPTY_VERIFICATION_CONFIG,
    commands: [
      command("lint", "npm run lint", { required: false }),
      command("type-check", "npm run typecheck", { required: false }),
      command("test", "npm test"),
    ],
  }
}

export function validateConfig(config: VerificationConfig): string[] {
  const errors: string[] = []
  config.commands.forEach((cmd, i) => {
    if (!cmd.name.trim()) errors.push(`Command ${i}: name is required`)
    if (!cmd.command.trim()) errors.push(`Command ${i}: command is required`)
    if (!(cmd.timeoutSeconds > 0)) errors.push(`Command ${i}: timeout must be positive`)
  })
  return errors
}

/** Parse and validate a config document. Throws VerificationConfigError. */
export function parseVerificationConfig(input: unknown, source = "config"): VerificationConfig {
  const parsed = VerificationConfigFileSchema.safeParse(input)
  if (!parsed.success) {
    throw new VerificationConfigError(
      source,
      parsed.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`),
    )
  }
  const file = parsed.data
  const config: VerificationConfig = {
    commands: file.commands.map((cmd) => ({
      name: cmd.name,
      command: cmd.command,
      workingDir: cmd.working_dir,
      timeoutSeconds: cmd.timeout,
      required: cmd.required,
      runOn: cmd.run_on,
    })),
    runAfterEachStep: file.run_after_each_step,
    runAtCheckpoints: file.run_at_checkpoints,
    stopOnFailure: file.stop_on_failure,
  }
  const errors = validateConfig(config)
  if (errors.length > 0) throw new VerificationConfigError(source, errors)
  return config
}

export function toConfigFile(config: VerificationConfig): VerificationConfigFile {
  return {
    commands: config.commands.map((cmd) => ({
      name: cmd.name,
      command: cmd.command,
      working_dir: cmd.workingDir,
      timeout: cmd.timeoutSeconds,
      required: cmd.required,
      run_on: cmd.runOn,
    })),
    run_after_each_step: config.runAfterEachStep,
    run_at_checkpoints: config.runAtCheckpoints,
    stop_on_failure: config.stopOnFailure,
  }
}

async function exists(path: string): Promise<boolean> {
  try {
    await access(path)
    return true
  } catch {
    return false
  }
}

async function readJson(path: string): Promise<unknown> {
  return JSON.parse(await readFile(path, "utf-8"))
}

/** Returns null when the project configures no verification. */
export async function loadVerificationConfig(projectDir: string): Promise<VerificationConfig | null> {
  const dedicated = join(projectDir, CONFIG_DIR, "verification.json")
  if (await exists(dedicated)) {
    return parseVerificationConfig(await readJson(dedicated), dedicated)
  }

  const projectConfig = join(projectDir, CONFIG_DIR, "config.json")
  if (await exists(projectConfig)) {
    const parsed = ProjectConfigFileSchema.parse(await readJson(projectConfig))
    if (parsed.verification !== undefined) {
      return parseVerificationConfig(parsed.verification, `${projectConfig} (verification)`)
    }
  }
  return null
}

/**
 * The project's own config, else the Node defaults when the project has a
 * package.json, else no commands at all.
 */
export async function resolveVerificationConfig(projectDir: string): Promise<VerificationConfig> {
  const loaded = await loadVerificationConfig(projectDir)
  if (loaded) return loaded
  if (await exists(join(projectDir, "package.json"))) return defaultNodeConfig()
  return { ...EMPTY_VERIFICATION_CONFIG, commands: [] }
}

export async function saveVerificationConfig(projectDir: string, config: VerificationConfig): Promise<string> {
  const dir = join(projectDir, CONFIG_DIR)
  await mkdir(dir, { recursive: true })
  const path = join(dir, "verification.json")
  await writeFile(path, JSON.stringify(toConfigFile(config), null, 2) + "\n", "utf-8")
  return path
}
