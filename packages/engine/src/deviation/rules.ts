import { z } from "zod"

import rulesDocument from "./deviation-rules.json" with { type: "json" }

export type DeviationCategory = "bug" | "missing_critical" | "blocking" | "architectural"
export type DeviationAction = "auto_fix" | "checkpoint"

export const DeviationCategorySchema = z.enum(["bug", "missing_critical", "blocking", "architectural"])
export const DeviationActionSchema = z.enum(["auto_fix", "checkpoint"])

const RuleDocumentSchema = z
  .object({
    name: z.string().min(1),
    category: DeviationCategorySchema,
    action: DeviationActionSchema,
    description: z.string(),
    patterns: z.array(z.string().min(1)).min(1),
  })
  .refine((rule) => rule.category !== "architectural" || rule.action === "checkpoint", {
    message: "architectural rules must route to checkpoint",
  })

export const RulesDocumentSchema = z.object({
  version: z.literal(1),
  rules: z.array(RuleDocumentSchema),
})

export type RulesDocument = z.input<typeof RulesDocumentSchema>

export interface DeviationRule {
  name: string
  category: DeviationCategory
  action: DeviationAction
  description: string
  patterns: RegExp[]
}

/**
 * Validate a rules document and compile its patterns (case-insensitive).
 * Architectural rules are moved ahead of everything else, keeping their
 * relative order, so an architectural match always wins.
 */
export function compileRules(document: unknown): DeviationRule[] {
  const parsed = RulesDocumentSchema.parse(document)
  const compiled = parsed.rules.map((rule) => ({
    name: rule.name,
    category: rule.category,
    action: rule.action,
    description: rule.description,
    patterns: rule.patterns.map((pattern) => new RegExp(pattern, "i")),
  }))
  return [
    ...compiled.filter((rule) => rule.category === "architectural"),
    ...compiled.filter((rule) => rule.category !== "architectural"),
  ]
}

export const DEFAULT_RULES: readonly DeviationRule[] = compileRules(rulesDocument)
