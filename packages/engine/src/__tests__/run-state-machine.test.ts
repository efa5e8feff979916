import { describe, expect, it } from "vitest"

import {
  assertValidTransition,
  InvalidRunTransitionError,
  isTerminal,
  isValidTransition,
  transitionRun,
} from "../run/state-machine.js"
import type { Run } from "../run/types.js"

function makeRun(overrides: Partial<Run> = {}): Run {
  return {
    id: "run-1",
    planId: "demo-plan",
    project: "/tmp/project",
    planPath: "/tmp/plan.json",
    status: "pending",
    currentStep: null,
    stepResults: [],
    createdAt: "2026-03-02T09:00:00.000Z",
    startedAt: null,
    completedAt: null,
    updatedAt: "2026-03-02T09:00:00.000Z",
    error: null,
    ...overrides,
  }
}

describe("run state machine", () => {
  it("allows the forward path", () => {
    expect(isValidTransition("pending", "in_progress")).toBe(true)
    expect(isValidTransition("in_progress", "paused")).toBe(true)
    expect(isValidTransition("paused", "in_progress")).toBe(true)
    expect(isValidTransition("in_progress", "completed")).toBe(true)
  })

  it("lets a failed run be retried but not a completed one", () => {
    expect(isValidTransition("failed", "in_progress")).toBe(true)
    expect(isValidTransition("completed", "in_progress")).toBe(false)
  })

  it("rejects skipping in_progress", () => {
    expect(isValidTransition("pending", "completed")).toBe(false)
    expect(() => assertValidTransition("pending", "completed", "run-1")).toThrow(
      "Invalid run transition for run-1: pending → completed",
    )
  })

  it("treats completed and cancelled as terminal", () => {
    expect(isTerminal("completed")).toBe(true)
    expect(isTerminal("cancelled")).toBe(true)
    expect(isTerminal("failed")).toBe(false)
    expect(isTerminal("paused")).toBe(false)
  })

  describe("transitionRun", () => {
    it("stamps startedAt on first entry only", () => {
      const run = makeRun()
      transitionRun(run, "in_progress", "2026-03-02T09:00:01.000Z")
      transitionRun(run, "paused", "2026-03-02T09:00:02.000Z", "waiting")
      transitionRun(run, "in_progress", "2026-03-02T09:00:03.000Z")
      expect(run.startedAt).toBe("2026-03-02T09:00:01.000Z")
    })

    it("records the pause reason and clears it on resume", () => {
      const run = makeRun({ status: "in_progress" })
      transitionRun(run, "paused", "2026-03-02T09:00:02.000Z", "Need approval")
      expect(run.error).toBe("Need approval")
      transitionRun(run, "in_progress", "2026-03-02T09:00:03.000Z")
      expect(run.error).toBeNull()
    })

    it("clears completedAt when a failed run is retried", () => {
      const run = makeRun({ status: "in_progress" })
      transitionRun(run, "failed", "2026-03-02T09:00:04.000Z", "boom")
      expect(run.completedAt).toBe("2026-03-02T09:00:04.000Z")
      expect(run.error).toBe("boom")

      transitionRun(run, "in_progress", "2026-03-02T09:00:05.000Z")
      expect(run.completedAt).toBeNull()
      expect(run.error).toBeNull()
    })

    it("clears the current step on completion", () => {
      const run = makeRun({ status: "in_progress", currentStep: "A" })
      transitionRun(run, "completed", "2026-03-02T09:00:06.000Z")
      expect(run.currentStep).toBeNull()
      expect(run.completedAt).toBe("2026-03-02T09:00:06.000Z")
    })

    it("throws an InvalidRunTransitionError and leaves the run untouched", () => {
      const run = makeRun({ status: "completed" })
      expect(() => transitionRun(run, "in_progress", "2026-03-02T09:00:07.000Z")).toThrow(
        InvalidRunTransitionError,
      )
      expect(run.status).toBe("completed")
    })
  })
})
