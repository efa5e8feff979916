/**
 * Bounded in-process worker pool.
 *
 * Units run with at most `maxParallel` in flight; the rest queue in
 * submission order. Every unit receives a structured clone of its input, so
 * no two units share mutable state, and an AbortSignal that fires when the
 * caller gives up on it. Results are values, never rejections: a unit that
 * throws, times out or is dropped at shutdown yields a failed result.
 *
 * A unit's own timeout (`SubmitOptions.timeoutMs`) starts when it leaves
 * the queue, so time spent waiting for a slot never counts against it.
 */

export type PoolUnit<I, O> = (input: I, signal: AbortSignal) => Promise<O>

export type PoolResult<O> =
  | { status: "completed"; value: O; durationMs: number }
  | { status: "failed"; error: string; timedOut: boolean; durationMs: number }

export interface PoolHandle<O> {
  readonly id: number
  readonly label: string
  /** Settles when the unit finishes or is dropped. Never rejects. */
  readonly settled: Promise<PoolResult<O>>
  /**
   * Signal the unit to stop. A queued unit is removed and settles as failed
   * without ever running; a running one keeps its slot until it returns.
   */
  cancel(reason: string): void
}

export interface SubmitOptions {
  label?: string
  /** Limit on the unit's running time, measured from when it starts. */
  timeoutMs?: number
}

export interface WorkerPoolOptions {
  maxParallel: number
}

export interface ShutdownOptions {
  /** Wait for queued and in-flight units. Otherwise queued units are dropped. */
  wait?: boolean
}

export class PoolClosedError extends Error {
  constructor() {
    super("Worker pool is shut down")
    this.name = "PoolClosedError"
  }
}

interface QueuedUnit {
  start: () => void
  drop: () => void
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}

export class WorkerPool {
  readonly maxParallel: number
  private active = 0
  private closed = false
  private nextId = 1
  private readonly queue: QueuedUnit[] = []
  private readonly pending = new Set<Promise<unknown>>()

  constructor(options: WorkerPoolOptions) {
    if (!Number.isInteger(options.maxParallel) || options.maxParallel < 1) {
      throw new RangeError(`maxParallel must be a positive integer, got ${options.maxParallel}`)
    }
    this.maxParallel = options.maxParallel
  }

  get activeCount(): number {
    return this.active
  }

  get queuedCount(): number {
    return this.queue.length
  }

  get isClosed(): boolean {
    return this.closed
  }

  submit<I, O>(unit: PoolUnit<I, O>, input: I, options: SubmitOptions = {}): PoolHandle<O> {
    if (this.closed) throw new PoolClosedError()

    const id = this.nextId++
    const { timeoutMs } = options
    const controller = new AbortController()
    const isolated = structuredClone(input)

    let resolve: (result: PoolResult<O>) => void = () => {}
    const settled = new Promise<PoolResult<O>>((r) => {
      resolve = r
    })
    let done = false
    const finish = (result: PoolResult<O>): void => {
      if (done) return
      done = true
      resolve(result)
    }

    const entry: QueuedUnit = {
      start: () => {
        this.active++
        const startedAt = Date.now()
        let timer: NodeJS.Timeout | undefined
        if (timeoutMs !== undefined) {
          timer = setTimeout(() => {
            const error = `Timed out after ${timeoutMs}ms`
            controller.abort(new Error(error))
            finish({ status: "failed", error, timedOut: true, durationMs: timeoutMs })
          }, timeoutMs)
        }
        const run = Promise.resolve()
          .then(() => unit(isolated, controller.signal))
          .then(
            (value) => finish({ status: "completed", value, durationMs: Date.now() - startedAt }),
            (err: unknown) =>
              finish({ status: "failed", error: errorMessage(err), timedOut: false, durationMs: Date.now() - startedAt }),
          )
          .finally(() => {
            clearTimeout(timer)
            this.active--
            this.pump()
          })
        // A timed-out unit keeps its slot until it returns; shutdown waits for it.
        this.track(run)
      },
      drop: () => {
        finish({ status: "failed", error: "pool shut down", timedOut: false, durationMs: 0 })
      },
    }

    this.track(settled)
    if (this.active < this.maxParallel) entry.start()
    else this.queue.push(entry)

    return {
      id,
      label: options.label ?? `unit-${id}`,
      settled,
      cancel: (reason: string) => {
        controller.abort(new Error(reason))
        const queuedAt = this.queue.indexOf(entry)
        if (queuedAt === -1) return
        this.queue.splice(queuedAt, 1)
        finish({ status: "failed", error: reason, timedOut: false, durationMs: 0 })
      },
    }
  }

  /**
   * Await a unit's result. `timeoutMs` here is the caller's deadline and
   * includes queue time: when it elapses the unit is cancelled (a queued
   * unit never starts) and reported as a timed-out failure. For a limit on
   * running time alone, pass `timeoutMs` to `submit`.
   */
  async wait<O>(handle: PoolHandle<O>, timeoutMs?: number): Promise<PoolResult<O>> {
    if (timeoutMs === undefined) return handle.settled

    let timer: NodeJS.Timeout | undefined
    const timeout = new Promise<PoolResult<O>>((resolve) => {
      timer = setTimeout(() => {
        const error = `Timed out after ${timeoutMs}ms`
        // Settle the race before cancelling: a queued unit settles synchronously on cancel.
        resolve({ status: "failed", error, timedOut: true, durationMs: timeoutMs })
        handle.cancel(error)
      }, timeoutMs)
    })
    try {
      return await Promise.race([handle.settled, timeout])
    } finally {
      clearTimeout(timer)
    }
  }

  async shutdown(options: ShutdownOptions = {}): Promise<void> {
    this.closed = true
    if (!options.wait) {
      for (const queued of this.queue.splice(0)) queued.drop()
      return
    }
    while (this.pending.size > 0) {
      await Promise.all([...this.pending])
    }
  }

  private track(promise: Promise<unknown>): void {
    this.pending.add(promise)
    void promise.finally(() => this.pending.delete(promise))
  }

  private pump(): void {
    while (this.active < this.maxParallel) {
      const next = this.queue.shift()
      if (!next) return
      next.start()
    }
  }
}
