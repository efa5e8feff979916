import { randomUUID } from "node:crypto"

import type { Kysely } from "kysely"
import { z } from "zod"

import type { Database } from "../db/types.js"
import type { DeviationRecord } from "./classifier.js"

export interface AuditedDeviation extends DeviationRecord {
  id: string
  runId: string
  stepId: string
  createdAt: string
}

const TargetsSchema = z.array(z.string())

/** Append-only deviation trail. Never read by the scheduler. */
export class DeviationLog {
  constructor(
    private readonly db: Kysely<Database>,
    private readonly now: () => Date = () => new Date(),
  ) {}

  async append(runId: string, stepId: string, record: DeviationRecord): Promise<AuditedDeviation> {
    const entry: AuditedDeviation = {
      ...record,
      id: randomUUID(),
      runId,
      stepId,
      createdAt: this.now().toISOString(),
    }
    await this.db
      .insertInto("deviation")
      .values({
        id: entry.id,
        run_id: runId,
        step_id: stepId,
        category: entry.category,
        rule: entry.rule,
        action: entry.action,
        description: entry.description,
        targets: JSON.stringify(entry.targets),
        resolution: entry.resolution,
        created_at: entry.createdAt,
      })
      .execute()
    return entry
  }

  async listForRun(runId: string): Promise<AuditedDeviation[]> {
    const rows = await this.db
      .selectFrom("deviation")
      .selectAll()
      .where("run_id", "=", runId)
      .orderBy("created_at", "asc")
      .execute()
    return rows.map((row) => ({
      id: row.id,
      runId: row.run_id,
      stepId: row.step_id,
      category: row.category,
      rule: row.rule,
      action: row.action,
      description: row.description,
      targets: TargetsSchema.parse(JSON.parse(row.targets)),
      resolution: row.resolution,
      createdAt: row.created_at,
    }))
  }
}
