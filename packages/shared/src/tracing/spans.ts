/**
 * Span helpers for the engine's three levels of work: a run execution,
 * a wave, and a single step. Verification and checkpoint resolution get
 * their own spans; deviations and raised checkpoints are span events on
 * the step or wave that produced them.
 */

import { type Attributes, type Span, SpanStatusCode, trace } from "@opentelemetry/api"

// ──────────────────────────────────────────────────
// Attribute keys
// ──────────────────────────────────────────────────

export const WavelineAttributes = {
  RUN_ID: "waveline.run.id",
  RUN_STATUS: "waveline.run.status",
  STEP_ID: "waveline.step.id",
  STEP_KIND: "waveline.step.kind",
  WAVE: "waveline.wave",
  WAVE_SIZE: "waveline.wave.size",
  CHECKPOINT_ID: "waveline.checkpoint.id",
  CHECKPOINT_ORIGIN: "waveline.checkpoint.origin",
  DEVIATION_ACTION: "waveline.deviation.action",
  DEVIATION_RULE: "waveline.deviation.rule",
  VERIFICATION_STATUS: "waveline.verification.status",
} as const

export const WavelineEvents = {
  DEVIATION: "waveline.deviation",
  CHECKPOINT_RAISED: "waveline.checkpoint.raised",
} as const

const tracer = () => trace.getTracer("waveline")

export interface SpanOptions<T> {
  /** Attributes derived from the result, set before the span ends. */
  resultAttributes?: (result: T) => Attributes
}

/**
 * Run `fn` inside a new active span. The span ends OK with any
 * `resultAttributes` applied, or ERROR with the exception recorded, in
 * which case the error is re-thrown.
 *
 * ```ts
 * const outcome = await withSpan(
 *   "waveline.run.execute",
 *   { [WavelineAttributes.RUN_ID]: runId },
 *   () => drive(runId),
 *   { resultAttributes: (o) => ({ [WavelineAttributes.RUN_STATUS]: o.status }) },
 * )
 * ```
 */
export async function withSpan<T>(
  name: string,
  attributes: Attributes,
  fn: (span: Span) => Promise<T>,
  options: SpanOptions<T> = {},
): Promise<T> {
  return tracer().startActiveSpan(name, { attributes }, async (span) => {
    try {
      const result = await fn(span)
      if (options.resultAttributes) span.setAttributes(options.resultAttributes(result))
      span.setStatus({ code: SpanStatusCode.OK })
      return result
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err)
      span.setStatus({ code: SpanStatusCode.ERROR, message })
      span.recordException(err instanceof Error ? err : message)
      throw err
    } finally {
      span.end()
    }
  })
}

/** Annotate the active span, if there is one. */
export function addSpanEvent(name: string, attributes?: Attributes): void {
  trace.getActiveSpan()?.addEvent(name, attributes)
}
