import { describe, expect, it } from "vitest"

import {
  assignWaves,
  assignWavesKahn,
  estimateExecution,
  groupByWave,
  validateWaveAssignment,
} from "../plan/waves.js"

interface Node {
  id: string
  dependsOn: string[]
}

function node(id: string, ...dependsOn: string[]): Node {
  return { id, dependsOn }
}

function asObject(waves: Map<string, number>): Record<string, number> {
  return Object.fromEntries(waves)
}

/** mulberry32: small seeded PRNG so random plans are reproducible. */
function prng(seed: number): () => number {
  let state = seed >>> 0
  return () => {
    state = (state + 0x6d2b79f5) >>> 0
    let t = state
    t = Math.imul(t ^ (t >>> 15), t | 1)
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61)
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296
  }
}

/** Random acyclic plan: edges only point at lower indices, then declared order is shuffled. */
function randomDag(random: () => number): Node[] {
  const size = 1 + Math.floor(random() * 30)
  const nodes: Node[] = []
  for (let i = 0; i < size; i++) {
    const deps: string[] = []
    for (let j = 0; j < i; j++) {
      if (random() < 0.15) deps.push(`s${j}`)
    }
    nodes.push(node(`s${i}`, ...deps))
  }
  for (let i = nodes.length - 1; i > 0; i--) {
    const j = Math.floor(random() * (i + 1))
    const a = nodes[i]
    const b = nodes[j]
    if (a && b) {
      nodes[i] = b
      nodes[j] = a
    }
  }
  return nodes
}

// ──────────────────────────────────────────────────
// assignWaves
// ──────────────────────────────────────────────────

describe("assignWaves", () => {
  it("puts a linear chain one step per wave", () => {
    const { waves, needsValidation } = assignWaves([node("a"), node("b", "a"), node("c", "b")])
    expect(asObject(waves)).toEqual({ a: 1, b: 2, c: 3 })
    expect(needsValidation).toBe(false)
  })

  it("runs both sides of a diamond in the same wave", () => {
    const { waves } = assignWaves([node("d", "b", "c"), node("b", "a"), node("c", "a"), node("a")])
    expect(asObject(waves)).toEqual({ a: 1, b: 2, c: 2, d: 3 })
  })

  it("places a step one past its deepest dependency", () => {
    const { waves } = assignWaves([node("a"), node("b", "a"), node("c", "b"), node("x", "a", "c")])
    expect(waves.get("x")).toBe(4)
  })

  it("tolerates repeated dependency ids", () => {
    const { waves, needsValidation } = assignWaves([node("a"), node("b", "a", "a")])
    expect(asObject(waves)).toEqual({ a: 1, b: 2 })
    expect(needsValidation).toBe(false)
  })

  it("dumps cyclic steps into one trailing wave", () => {
    const { waves, needsValidation } = assignWaves([node("a"), node("b", "c"), node("c", "b")])
    expect(asObject(waves)).toEqual({ a: 1, b: 2, c: 2 })
    expect(needsValidation).toBe(true)
  })

  it("flags a dangling dependency", () => {
    const { waves, needsValidation } = assignWaves([node("a"), node("b", "ghost")])
    expect(asObject(waves)).toEqual({ a: 1, b: 2 })
    expect(needsValidation).toBe(true)
  })

  it("returns an empty assignment for an empty plan", () => {
    const { waves, needsValidation } = assignWaves([])
    expect(waves.size).toBe(0)
    expect(needsValidation).toBe(false)
  })
})

// ──────────────────────────────────────────────────
// assignWavesKahn
// ──────────────────────────────────────────────────

describe("assignWavesKahn", () => {
  it("matches the iterative assignment on a diamond", () => {
    const nodes = [node("d", "b", "c"), node("b", "a"), node("c", "a"), node("a")]
    expect(asObject(assignWavesKahn(nodes).waves)).toEqual(asObject(assignWaves(nodes).waves))
  })

  it("degrades the same way on a cycle", () => {
    const { waves, needsValidation } = assignWavesKahn([node("a"), node("b", "c"), node("c", "b")])
    expect(asObject(waves)).toEqual({ a: 1, b: 2, c: 2 })
    expect(needsValidation).toBe(true)
  })

  it("agrees with the iterative method on random acyclic plans", () => {
    const random = prng(20240611)
    for (let trial = 0; trial < 200; trial++) {
      const nodes = randomDag(random)
      const iterative = assignWaves(nodes)
      const kahn = assignWavesKahn(nodes)

      expect(asObject(kahn.waves)).toEqual(asObject(iterative.waves))
      expect(iterative.needsValidation).toBe(false)
      expect(validateWaveAssignment(nodes, iterative.waves)).toEqual([])

      for (const n of nodes) {
        const deepest = Math.max(0, ...n.dependsOn.map((dep) => iterative.waves.get(dep) ?? 0))
        expect(iterative.waves.get(n.id)).toBe(deepest + 1)
      }
    }
  })
})

// ──────────────────────────────────────────────────
// Helpers
// ──────────────────────────────────────────────────

describe("validateWaveAssignment", () => {
  it("reports ordering violations and missing waves", () => {
    const nodes = [node("a"), node("b", "a"), node("c")]
    const waves = new Map([
      ["a", 2],
      ["b", 2],
    ])

    expect(validateWaveAssignment(nodes, waves)).toEqual([
      "step b (wave 2) depends on a (wave 2)",
      "step c has no wave assigned",
    ])
  })

  it("reports a wave below one", () => {
    expect(validateWaveAssignment([node("a")], new Map([["a", 0]]))).toEqual(["step a has invalid wave 0"])
  })
})

describe("groupByWave", () => {
  it("groups ids by ascending wave in declared order", () => {
    const nodes = [node("c", "a"), node("a"), node("b", "a"), node("d", "c")]
    const { waves } = assignWaves(nodes)

    expect(groupByWave(nodes, waves)).toEqual([
      { wave: 1, stepIds: ["a"] },
      { wave: 2, stepIds: ["c", "b"] },
      { wave: 3, stepIds: ["d"] },
    ])
  })
})

describe("estimateExecution", () => {
  it("compares sequential and per-wave time", () => {
    const { waves } = assignWaves([node("a"), node("b", "a"), node("c", "a"), node("d", "b", "c")])
    const estimate = estimateExecution(waves, 5)

    expect(estimate.waveCount).toBe(3)
    expect(estimate.sequentialMinutes).toBe(20)
    expect(estimate.parallelMinutes).toBe(15)
    expect(estimate.speedup).toBeCloseTo(20 / 15)
  })

  it("reports a speedup of one for an empty plan", () => {
    expect(estimateExecution(new Map()).speedup).toBe(1)
  })
})
