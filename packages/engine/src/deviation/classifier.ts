import {
  DEFAULT_RULES,
  type DeviationAction,
  type DeviationCategory,
  type DeviationRule,
} from "./rules.js"

export interface Classification {
  rule: DeviationRule | null
  action: DeviationAction
}

/** Audit entry for an anomaly reported while executing a step. */
export interface DeviationRecord {
  category: DeviationCategory
  description: string
  /** Name of the matched rule, or null when none matched. */
  rule: string | null
  action: DeviationAction
  targets: string[]
  resolution: string
}

export interface DeviationClassifierOptions {
  rules?: readonly DeviationRule[]
  /** Verdict when no rule matches. Defaults to "auto_fix". */
  defaultAction?: DeviationAction
}

export class DeviationClassifier {
  private readonly rules: readonly DeviationRule[]
  readonly defaultAction: DeviationAction

  constructor(options: DeviationClassifierOptions = {}) {
    this.rules = options.rules ?? DEFAULT_RULES
    this.defaultAction = options.defaultAction ?? "auto_fix"
  }

  /** First matching rule wins; description and context are searched together. */
  classify(description: string, context = ""): Classification {
    const text = `${description} ${context}`
    for (const rule of this.rules) {
      if (rule.patterns.some((pattern) => pattern.test(text))) {
        return { rule, action: rule.action }
      }
    }
    return { rule: null, action: this.defaultAction }
  }

  shouldAutoFix(description: string, context = ""): boolean {
    return this.classify(description, context).action === "auto_fix"
  }

  shouldCheckpoint(description: string, context = ""): boolean {
    return this.classify(description, context).action === "checkpoint"
  }

  createRecord(description: string, targets: readonly string[], resolution = "", context = ""): DeviationRecord {
    const { rule, action } = this.classify(description, context)
    return {
      category: rule?.category ?? "bug",
      description,
      rule: rule?.name ?? null,
      action,
      targets: [...targets],
      resolution,
    }
  }
}

const defaultClassifier = new DeviationClassifier()

export function classifyDeviation(description: string, context = ""): Classification {
  return defaultClassifier.classify(description, context)
}

export function shouldAutoFix(description: string, context = ""): boolean {
  return defaultClassifier.shouldAutoFix(description, context)
}

export function shouldCheckpoint(description: string, context = ""): boolean {
  return defaultClassifier.shouldCheckpoint(description, context)
}

export function createDeviationRecord(
  description: string,
  targets: readonly string[],
  resolution = "",
  context = "",
): DeviationRecord {
  return defaultClassifier.createRecord(description, targets, resolution, context)
}

export function formatDeviation(record: DeviationRecord): string {
  const icon = record.action === "auto_fix" ? "🔧" : "⏸️"
  return [
    `- ${icon} [${record.category}] ${record.description}`,
    `  Targets: ${record.targets.length > 0 ? record.targets.join(", ") : "(none)"}`,
    `  Resolution: ${record.resolution || "(pending)"}`,
  ].join("\n")
}
