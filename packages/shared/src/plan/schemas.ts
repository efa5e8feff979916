import { z } from "zod"

// ──────────────────────────────────────────────────
// Enumerations
// ──────────────────────────────────────────────────

export const StepStatusSchema = z.enum(["pending", "in_progress", "completed", "failed", "skipped"])

export const RiskLevelSchema = z.enum(["low", "medium", "high", "critical"])

export const CheckpointTypeSchema = z.enum(["human-verify", "decision", "human-action"])

// ──────────────────────────────────────────────────
// Plan document (wire format, schema v1)
// ──────────────────────────────────────────────────

const stepDocumentBase = {
  id: z.string(),
  target: z.string().default(""),
  action: z.string().default(""),
  details: z.string().default(""),
  depends_on: z.array(z.string()).default([]),
  order: z.number().int().default(0),
  risk: RiskLevelSchema.default("low"),
  risk_reason: z.string().default(""),
  inputs: z.array(z.string()).default([]),
  outputs: z.array(z.string()).default([]),
}

export const WorkStepDocumentSchema = z.object({
  ...stepDocumentBase,
  kind: z.enum(["read", "extract", "create", "modify", "wire"]),
  verify_command: z.string().min(1).optional(),
})

export const CheckStepDocumentSchema = z.object({
  ...stepDocumentBase,
  kind: z.enum(["verify", "test"]),
  verify_command: z.string().min(1),
})

export const CheckpointStepDocumentSchema = z.object({
  ...stepDocumentBase,
  kind: z.literal("checkpoint"),
  checkpoint_type: CheckpointTypeSchema.default("human-verify"),
  awaiting: z.string().min(1),
})

export const StepDocumentSchema = z.discriminatedUnion("kind", [
  WorkStepDocumentSchema,
  CheckStepDocumentSchema,
  CheckpointStepDocumentSchema,
])

export type StepDocument = z.input<typeof StepDocumentSchema>
export type WorkStepDocument = z.input<typeof WorkStepDocumentSchema>
export type CheckStepDocument = z.input<typeof CheckStepDocumentSchema>
export type CheckpointStepDocument = z.input<typeof CheckpointStepDocumentSchema>

export const PlanDocumentSchema = z.object({
  schema_version: z.literal("v1"),
  plan_id: z.string(),
  title: z.string().default(""),
  description: z.string().default(""),
  metadata: z.record(z.unknown()).default({}),
  steps: z.array(StepDocumentSchema),
})

/** What a Plan Source hands over. Defaults are filled in on parse. */
export type PlanDocumentInput = z.input<typeof PlanDocumentSchema>
export type PlanDocument = z.output<typeof PlanDocumentSchema>
