import type { StepSpec } from "./types.js"

type WaveInput = Pick<StepSpec, "id" | "dependsOn">

export interface WaveAssignment {
  /** Step id to 1-based wave number. */
  waves: Map<string, number>
  /**
   * True when some steps could not be placed by dependency order (a cycle or
   * a dangling dependency) and were dumped into one trailing wave.
   */
  needsValidation: boolean
}

export interface ExecutionEstimate {
  waveCount: number
  sequentialMinutes: number
  parallelMinutes: number
  /** sequential / parallel; 1 for an empty plan. */
  speedup: number
}

function dedupe(ids: readonly string[]): string[] {
  return [...new Set(ids)]
}

/**
 * Fixed-point assignment: each round places every step whose dependencies
 * are all placed, at one past the deepest of them. Stops when a round makes
 * no progress.
 */
export function assignWaves(steps: readonly WaveInput[]): WaveAssignment {
  const waves = new Map<string, number>()
  let remaining = steps.filter((s, i) => steps.findIndex((o) => o.id === s.id) === i)
  const maxRounds = remaining.length + 1

  for (let round = 0; round < maxRounds && remaining.length > 0; round++) {
    const next: WaveInput[] = []
    for (const step of remaining) {
      const deps = dedupe(step.dependsOn)
      if (deps.every((dep) => waves.has(dep))) {
        let wave = 1
        for (const dep of deps) wave = Math.max(wave, (waves.get(dep) ?? 0) + 1)
        waves.set(step.id, wave)
      } else {
        next.push(step)
      }
    }
    if (next.length === remaining.length) break
    remaining = next
  }

  if (remaining.length === 0) return { waves, needsValidation: false }

  const trailing = maxWave(waves) + 1
  for (const step of remaining) waves.set(step.id, trailing)
  return { waves, needsValidation: true }
}

/**
 * Kahn's algorithm: peel off zero in-degree steps one layer at a time.
 * Dependencies on ids outside the plan are ignored. Yields the same waves as
 * assignWaves for any acyclic plan without dangling dependencies.
 */
export function assignWavesKahn(steps: readonly WaveInput[]): WaveAssignment {
  const known = new Set(steps.map((s) => s.id))
  const inDegree = new Map<string, number>()
  const dependents = new Map<string, string[]>()

  for (const step of steps) {
    if (inDegree.has(step.id)) continue
    const deps = dedupe(step.dependsOn).filter((dep) => known.has(dep))
    inDegree.set(step.id, deps.length)
    for (const dep of deps) {
      const list = dependents.get(dep)
      if (list) list.push(step.id)
      else dependents.set(dep, [step.id])
    }
  }

  const waves = new Map<string, number>()
  let frontier = [...inDegree].filter(([, degree]) => degree === 0).map(([id]) => id)
  let wave = 1

  while (frontier.length > 0) {
    const next: string[] = []
    for (const id of frontier) {
      waves.set(id, wave)
      for (const dependent of dependents.get(id) ?? []) {
        const degree = (inDegree.get(dependent) ?? 0) - 1
        inDegree.set(dependent, degree)
        if (degree === 0) next.push(dependent)
      }
    }
    frontier = next
    wave++
  }

  if (waves.size === inDegree.size) return { waves, needsValidation: false }

  for (const id of inDegree.keys()) {
    if (!waves.has(id)) waves.set(id, wave)
  }
  return { waves, needsValidation: true }
}

/** Returns one message per violated constraint; empty when the assignment is sound. */
export function validateWaveAssignment(
  steps: readonly WaveInput[],
  waves: ReadonlyMap<string, number>,
): string[] {
  const errors: string[] = []
  for (const step of steps) {
    const wave = waves.get(step.id)
    if (wave === undefined) {
      errors.push(`step ${step.id} has no wave assigned`)
      continue
    }
    if (!Number.isInteger(wave) || wave < 1) {
      errors.push(`step ${step.id} has invalid wave ${wave}`)
      continue
    }
    for (const dep of dedupe(step.dependsOn)) {
      const depWave = waves.get(dep)
      if (depWave === undefined) {
        errors.push(`step ${step.id} depends on ${dep}, which has no wave`)
      } else if (depWave >= wave) {
        errors.push(`step ${step.id} (wave ${wave}) depends on ${dep} (wave ${depWave})`)
      }
    }
  }
  return errors
}

export function maxWave(waves: ReadonlyMap<string, number>): number {
  let max = 0
  for (const wave of waves.values()) max = Math.max(max, wave)
  return max
}

/** Step ids grouped by wave, ascending, each group in the input order. */
export function groupByWave(
  steps: readonly WaveInput[],
  waves: ReadonlyMap<string, number>,
): Array<{ wave: number; stepIds: string[] }> {
  const groups = new Map<number, string[]>()
  for (const step of steps) {
    const wave = waves.get(step.id)
    if (wave === undefined) continue
    const group = groups.get(wave)
    if (group) {
      if (!group.includes(step.id)) group.push(step.id)
    } else {
      groups.set(wave, [step.id])
    }
  }
  return [...groups.entries()]
    .sort(([a], [b]) => a - b)
    .map(([wave, stepIds]) => ({ wave, stepIds }))
}

export function estimateExecution(
  waves: ReadonlyMap<string, number>,
  minutesPerStep = 5,
): ExecutionEstimate {
  const waveCount = maxWave(waves)
  const sequentialMinutes = waves.size * minutesPerStep
  const parallelMinutes = waveCount * minutesPerStep
  return {
    waveCount,
    sequentialMinutes,
    parallelMinutes,
    speedup: parallelMinutes > 0 ? sequentialMinutes / parallelMinutes : 1,
  }
}
