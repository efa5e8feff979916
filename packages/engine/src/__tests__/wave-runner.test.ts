import { join } from "node:path"

import type { StepDocument } from "@waveline/shared/plan"
import { WorkerPool } from "@waveline/shared/pool"
import { afterEach, beforeEach, describe, expect, it } from "vitest"

import { DeviationLog } from "../deviation/audit.js"
import { ConflictError } from "../errors.js"
import { WaveRunner, type WaveRunnerDeps } from "../executor/wave-runner.js"
import { EchoStepWorker, type EchoStepWorkerConfig, type StepWorker } from "../executor/worker.js"
import { findStepResult, patchStepResult, type Run } from "../run/types.js"
import { command, EMPTY_VERIFICATION_CONFIG } from "../verification/config.js"
import { type GateProvider, VerificationGate } from "../verification/gate.js"
import type { VerificationCommand } from "../verification/types.js"
import { buildPlan, check, createTestEnv, humanGate, type TestEnv, work } from "./fixtures.js"

let env: TestEnv
let pool: WorkerPool

beforeEach(async () => {
  env = await createTestEnv()
})

afterEach(async () => {
  await pool.shutdown({ wait: true })
  await env.cleanup()
})

interface SetupOptions extends Partial<Omit<WaveRunnerDeps, "store" | "checkpoints" | "deviations" | "pool" | "worker">> {
  maxParallel?: number
  echo?: EchoStepWorkerConfig
}

async function setup(steps: StepDocument[], options: SetupOptions = {}) {
  const { maxParallel = 4, echo, ...deps } = options
  const worker = new EchoStepWorker(echo)
  const deviations = new DeviationLog(env.db, env.now)
  pool = new WorkerPool({ maxParallel })
  const runner = new WaveRunner({
    store: env.store,
    checkpoints: env.checkpoints,
    deviations,
    pool,
    worker,
    now: env.now,
    ...deps,
  })
  const run = await env.store.create(buildPlan(steps), env.dataDir)
  return { worker, runner, run, deviations }
}

function gates(commands: VerificationCommand[]): GateProvider {
  return async (project) =>
    new VerificationGate({ config: { ...EMPTY_VERIFICATION_CONFIG, commands }, projectDir: project })
}

function resultOf(run: Run, stepId: string) {
  const result = findStepResult(run, stepId)
  if (!result) throw new Error(`No result for ${stepId}`)
  return result
}

// ──────────────────────────────────────────────────
// Waves
// ──────────────────────────────────────────────────

describe("WaveRunner waves", () => {
  it("runs a dependency before its dependents and the dependents in parallel", async () => {
    const { worker, runner, run } = await setup(
      [work("A"), work("B", { depends_on: ["A"] }), work("C", { depends_on: ["A"] })],
      { maxParallel: 2, echo: { latencyMs: 30 } },
    )

    const outcome = await runner.execute(run.id)

    expect(outcome).toEqual({ status: "completed", runId: run.id, verification: null })
    expect(worker.executedStepIds[0]).toBe("A")
    expect([...worker.executedStepIds.slice(1)].sort()).toEqual(["B", "C"])
    expect(worker.maxConcurrent).toBe(2)

    const stored = await env.store.get(run.id)
    expect(stored.status).toBe("completed")
    expect(stored.currentStep).toBeNull()
    expect(stored.stepResults.map((r) => [r.stepId, r.status, r.output])).toEqual([
      ["A", "completed", "create A"],
      ["B", "completed", "create B"],
      ["C", "completed", "create C"],
    ])
  })

  it("stores a wave's results before dispatching the next wave", async () => {
    pool = new WorkerPool({ maxParallel: 2 })
    const run = await env.store.create(
      buildPlan([work("A"), work("B", { depends_on: ["A"] }), work("C", { depends_on: ["A"] })]),
      env.dataDir,
    )
    const storedStatusOfA: Record<string, string | undefined> = {}
    const worker: StepWorker = {
      async execute(context) {
        if (context.step.id !== "A") {
          const stored = await env.store.get(context.runId)
          storedStatusOfA[context.step.id] = findStepResult(stored, "A")?.status
        }
        return { status: "completed", output: context.step.action }
      },
    }
    const runner = new WaveRunner({
      store: env.store,
      checkpoints: env.checkpoints,
      deviations: new DeviationLog(env.db, env.now),
      pool,
      worker,
      now: env.now,
    })

    expect((await runner.execute(run.id)).status).toBe("completed")
    expect(storedStatusOfA).toEqual({ B: "completed", C: "completed" })
  })

  it("starts each step's timeout when it gets a pool slot", async () => {
    const { worker, runner, run } = await setup([work("A"), work("B"), work("C")], {
      maxParallel: 1,
      stepTimeoutMs: 150,
      echo: { latencyMs: 60 },
    })

    const outcome = await runner.execute(run.id)

    expect(outcome).toEqual({ status: "completed", runId: run.id, verification: null })
    expect(worker.executedStepIds).toEqual(["A", "B", "C"])
  })

  it("never runs more steps at once than the pool allows", async () => {
    const { worker, runner, run } = await setup([work("A"), work("B"), work("C"), work("D")], {
      maxParallel: 2,
      echo: { latencyMs: 20 },
    })
    await runner.execute(run.id)
    expect(worker.executedStepIds).toHaveLength(4)
    expect(worker.maxConcurrent).toBe(2)
  })

  it("hands each step the tasks completed before it", async () => {
    const { worker, runner, run } = await setup([work("A"), work("B", { depends_on: ["A"] })])
    await runner.execute(run.id)

    const contextB = worker.calls[1]
    expect(contextB?.step.id).toBe("B")
    expect(contextB?.completedTasks.map((t) => [t.stepId, t.output])).toEqual([["A", "create A"]])
    expect(contextB?.continuation).toBeNull()
    expect(resultOf(await env.store.get(run.id), "B").contextFile).toBe(join("contexts", "B.json"))
  })

  it("passes knowledge for the step target", async () => {
    const { worker, runner, run } = await setup([work("A"), work("B")], {
      knowledge: {
        lookup: async (target) => {
          if (target === "src/B.ts") throw new Error("index unavailable")
          return target === "src/A.ts" ? "A exports a default function" : null
        },
      },
    })
    await runner.execute(run.id)

    const byId = new Map(worker.calls.map((c) => [c.step.id, c.knowledge]))
    expect(byId.get("A")).toBe("A exports a default function")
    expect(byId.get("B")).toBeNull()
  })

  it("saves artifacts the worker returns", async () => {
    const { runner, run } = await setup([work("A")], {
      echo: {
        outcomes: { A: { status: "completed", output: "wrote notes", artifacts: [{ name: "notes.md", content: "# A\n" }] } },
      },
    })
    await runner.execute(run.id)
    expect(resultOf(await env.store.get(run.id), "A").artifacts).toEqual([join("artifacts", "A", "notes.md")])
  })

  it("skips steps downstream of a skipped step", async () => {
    const { worker, runner, run } = await setup([
      work("A"),
      work("B", { depends_on: ["A"] }),
      work("C", { depends_on: ["B"] }),
    ])
    patchStepResult(run, "A", { status: "skipped" })
    await env.store.save(run)

    const outcome = await runner.execute(run.id)

    expect(outcome.status).toBe("completed")
    expect(worker.executedStepIds).toEqual([])
    const stored = await env.store.get(run.id)
    expect(resultOf(stored, "B")).toMatchObject({ status: "skipped", error: "dependency A was skipped" })
    expect(resultOf(stored, "C")).toMatchObject({ status: "skipped", error: "dependency B was skipped" })
  })

  it("refuses to execute a run twice at once", async () => {
    const { runner, run } = await setup([work("A")], { echo: { latencyMs: 30 } })

    const first = runner.execute(run.id)
    expect(runner.isExecuting(run.id)).toBe(true)
    await expect(runner.execute(run.id)).rejects.toThrow(ConflictError)
    await first
    expect(runner.isExecuting(run.id)).toBe(false)
  })

  it("returns a completed run as is", async () => {
    const { worker, runner, run } = await setup([work("A")])
    await runner.execute(run.id)
    const again = await runner.execute(run.id)

    expect(again).toEqual({ status: "completed", runId: run.id, verification: null })
    expect(worker.executedStepIds).toEqual(["A"])
  })
})

// ──────────────────────────────────────────────────
// Failures
// ──────────────────────────────────────────────────

describe("WaveRunner failures", () => {
  it("fails the run at the failing step and retries it on the next execution", async () => {
    const { worker, runner, run } = await setup([work("A"), work("B", { depends_on: ["A"] })], {
      echo: { outcomes: { B: { status: "failed", error: "compile error", output: "tsc output" } } },
    })

    const failed = await runner.execute(run.id)
    expect(failed).toEqual({ status: "failed", runId: run.id, stepId: "B", reason: "Step B failed: compile error" })

    const stored = await env.store.get(run.id)
    expect(stored.status).toBe("failed")
    expect(stored.error).toBe("Step B failed: compile error")
    expect(stored.currentStep).toBe("B")
    expect(resultOf(stored, "B")).toMatchObject({ status: "failed", error: "compile error", output: "tsc output" })

    worker.unscript("B")
    const retried = await runner.execute(run.id)
    expect(retried.status).toBe("completed")
    expect(worker.executedStepIds).toEqual(["A", "B", "B"])
  })

  it("lets a failure outrank a checkpoint raised in the same wave", async () => {
    const { runner, run } = await setup([work("A"), humanGate("R", "Confirm the layout")], {
      echo: { outcomes: { A: { status: "failed", error: "boom" } } },
    })
    const outcome = await runner.execute(run.id)
    expect(outcome).toEqual({ status: "failed", runId: run.id, stepId: "A", reason: "Step A failed: boom" })
  })

  it("fails a step whose worker outlives the step timeout", async () => {
    const { runner, run } = await setup([work("A")], { stepTimeoutMs: 20, echo: { latencyMs: 500 } })
    const outcome = await runner.execute(run.id)
    expect(outcome).toEqual({
      status: "failed",
      runId: run.id,
      stepId: "A",
      reason: "Step A failed: Timed out after 20ms",
    })
  })
})

// ──────────────────────────────────────────────────
// Checkpoints
// ──────────────────────────────────────────────────

describe("WaveRunner checkpoints", () => {
  it("pauses at a checkpoint step and continues after it is resolved", async () => {
    const { worker, runner, run } = await setup([
      work("A"),
      humanGate("R", "Confirm the layout", { depends_on: ["A"] }),
      work("B", { depends_on: ["R"] }),
    ])

    const paused = await runner.execute(run.id)
    expect(paused).toEqual({
      status: "paused",
      runId: run.id,
      stepId: "R",
      checkpointId: expect.any(String),
      checkpointType: "human-verify",
      reason: "review R",
      awaiting: "Confirm the layout",
    })
    expect(worker.executedStepIds).toEqual(["A"])
    const stored = await env.store.get(run.id)
    expect(stored.status).toBe("paused")
    expect(stored.error).toBe("review R")

    const [pending] = await env.checkpoints.listPending(env.dataDir)
    if (!pending) throw new Error("expected a pending checkpoint")
    expect(pending.completedTasks.map((t) => t.stepId)).toEqual(["A"])
    expect(pending.currentTask).toBe("R: review R")

    await env.checkpoints.resolve(pending.id, "looks good")
    const completed = await runner.execute(run.id)

    expect(completed.status).toBe("completed")
    expect(worker.executedStepIds).toEqual(["A", "B"])
    const final = await env.store.get(run.id)
    expect(resultOf(final, "R")).toMatchObject({ status: "completed", output: "looks good" })
  })

  it("does not raise a second checkpoint while one is pending", async () => {
    const { runner, run } = await setup([humanGate("R", "Confirm the layout")])
    const first = await runner.execute(run.id)
    const second = await runner.execute(run.id)

    expect(first.status).toBe("paused")
    expect(second).toEqual(first)
    expect(await env.checkpoints.listForRun(run.id)).toHaveLength(1)
  })

  it("records checkpoint verification in the execution context", async () => {
    const { runner, run } = await setup([humanGate("R", "Confirm the layout")], {
      gates: gates([command("suite", "true")]),
    })
    await runner.execute(run.id)

    const [checkpoint] = await env.checkpoints.listForRun(run.id)
    expect(checkpoint?.executionContext).toEqual({ wave: 1, verification: "passed" })
  })

  it("resumes a worker checkpoint with the human response", async () => {
    const { worker, runner, run } = await setup([work("A")], {
      echo: {
        outcomes: {
          A: { status: "checkpoint", checkpointType: "human-action", blocker: "Need an API key", awaiting: "Add the key" },
        },
      },
    })

    const paused = await runner.execute(run.id)
    expect(paused).toMatchObject({ status: "paused", stepId: "A", checkpointType: "human-action" })
    expect(resultOf(await env.store.get(run.id), "A").status).toBe("pending")

    if (paused.status !== "paused") throw new Error("expected a pause")
    await env.checkpoints.resolve(paused.checkpointId, "added to .env")
    worker.configure({
      outcomes: {
        A: (ctx) => ({ status: "completed", output: ctx.continuation?.userResponse ?? "no continuation" }),
      },
    })

    const completed = await runner.execute(run.id)
    expect(completed.status).toBe("completed")
    expect(resultOf(await env.store.get(run.id), "A").output).toBe("added to .env")
  })

  it("holds critical steps for approval when configured", async () => {
    const { worker, runner, run } = await setup([work("A", { risk: "critical", risk_reason: "drops data" })], {
      approveCriticalSteps: true,
    })

    const paused = await runner.execute(run.id)
    expect(paused).toMatchObject({
      status: "paused",
      stepId: "A",
      checkpointType: "decision",
      reason: "Step A is critical risk: drops data",
      awaiting: "Approval to execute this critical step",
    })
    expect(worker.executedStepIds).toEqual([])

    if (paused.status !== "paused") throw new Error("expected a pause")
    await env.checkpoints.resolve(paused.checkpointId, "approved")
    expect((await runner.execute(run.id)).status).toBe("completed")
    expect(worker.executedStepIds).toEqual(["A"])
  })
})

// ──────────────────────────────────────────────────
// Deviations
// ──────────────────────────────────────────────────

describe("WaveRunner deviations", () => {
  it("auto-fixes a bug deviation and completes the step", async () => {
    const { runner, run, deviations } = await setup([work("A")], {
      echo: {
        outcomes: {
          A: { status: "completed", output: "done", deviations: [{ description: "fix off-by-one in pager" }] },
        },
      },
    })

    expect((await runner.execute(run.id)).status).toBe("completed")
    const [entry] = await deviations.listForRun(run.id)
    expect(entry).toMatchObject({
      stepId: "A",
      category: "bug",
      action: "auto_fix",
      targets: ["src/A.ts"],
      resolution: "fixed inline",
    })
  })

  it("pauses on an architectural deviation until a human approves it", async () => {
    const { worker, runner, run, deviations } = await setup([work("A")], {
      echo: {
        outcomes: {
          A: { status: "completed", output: "done", deviations: [{ description: "ALTER TABLE users add column" }] },
        },
      },
    })

    const paused = await runner.execute(run.id)
    expect(paused).toMatchObject({
      status: "paused",
      stepId: "A",
      checkpointType: "decision",
      reason: "ALTER TABLE users add column",
    })
    expect(resultOf(await env.store.get(run.id), "A").status).toBe("pending")

    if (paused.status !== "paused") throw new Error("expected a pause")
    await env.checkpoints.resolve(paused.checkpointId, "go ahead")

    expect((await runner.execute(run.id)).status).toBe("completed")
    expect(worker.calls[1]?.continuation?.userResponse).toBe("go ahead")
    expect((await deviations.listForRun(run.id)).map((d) => [d.action, d.resolution])).toEqual([
      ["checkpoint", ""],
      ["checkpoint", "approved: go ahead"],
    ])
  })
})

// ──────────────────────────────────────────────────
// Verification
// ──────────────────────────────────────────────────

describe("WaveRunner verification", () => {
  it("fails a step whose own verify command fails", async () => {
    const { runner, run } = await setup([check("T", "exit 1")], { gates: gates([]) })

    const outcome = await runner.execute(run.id)
    expect(outcome).toEqual({
      status: "failed",
      runId: run.id,
      stepId: "T",
      reason: "Step T failed: Verification failed: step:T",
    })
    expect((await env.store.loadVerification(run.id, "T"))?.status).toBe("failed")
  })

  it("verifies the whole run before completing it", async () => {
    const { runner, run } = await setup([work("A")], { gates: gates([command("suite", "true")]) })

    const outcome = await runner.execute(run.id)
    expect(outcome.status).toBe("completed")
    if (outcome.status !== "completed") throw new Error("expected completion")
    expect(outcome.verification?.stepId).toBe("@run")
    expect(outcome.verification?.status).toBe("passed")
  })

  it("fails the run when run verification fails", async () => {
    const { runner, run } = await setup([work("A")], { gates: gates([command("suite", "exit 2")]) })

    const outcome = await runner.execute(run.id)
    expect(outcome).toEqual({
      status: "failed",
      runId: run.id,
      stepId: null,
      reason: "Run verification failed: suite",
    })
    expect((await env.store.loadVerification(run.id, "@run"))?.status).toBe("failed")
  })

  it("returns null from verifyRun without a gate provider", async () => {
    const { runner, run } = await setup([work("A")])
    expect(await runner.verifyRun(run.id)).toBeNull()
  })
})
