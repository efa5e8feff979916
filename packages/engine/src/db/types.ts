import type { CheckpointType } from "@waveline/shared/plan"
import type { ColumnType, Insertable, Selectable } from "kysely"

import type { CheckpointOrigin } from "../checkpoint/types.js"
import type { DeviationAction, DeviationCategory } from "../deviation/rules.js"
import type { RunStatus } from "../run/types.js"
import type { VerificationStatus } from "../verification/types.js"

// Timestamps are ISO-8601 text and structured columns are JSON text, so the
// same schema runs on SQLite and PostgreSQL.

// ---------------------------------------------------------------------------
// Table: run
// ---------------------------------------------------------------------------
export interface RunTable {
  id: string
  plan_id: string
  project: string
  plan_path: string
  status: RunStatus
  current_step: string | null
  /** JSON: StepResult[] */
  step_results: string
  error: string | null
  created_at: string
  started_at: string | null
  completed_at: string | null
  updated_at: string
}

export type RunRow = Selectable<RunTable>
export type NewRunRow = Insertable<RunTable>

// ---------------------------------------------------------------------------
// Table: checkpoint
// ---------------------------------------------------------------------------
export interface CheckpointTable {
  id: string
  run_id: string
  plan_id: string
  project: string
  step_id: string
  type: CheckpointType
  origin: CheckpointOrigin
  /** JSON: CompletedTask[] */
  completed_tasks: string
  current_task: string
  blocker: string
  awaiting: string
  /** JSON object */
  execution_context: string
  created_at: string
  resolved_at: string | null
  user_response: string | null
}

export type CheckpointRow = Selectable<CheckpointTable>
export type NewCheckpointRow = Insertable<CheckpointTable>

// ---------------------------------------------------------------------------
// Table: verification_result (one row per run and step key)
// ---------------------------------------------------------------------------
export interface VerificationResultTable {
  run_id: string
  step_id: string
  status: VerificationStatus
  /** JSON: CommandResult[] */
  commands: string
  started_at: string
  completed_at: string
}

export type VerificationResultRow = Selectable<VerificationResultTable>

// ---------------------------------------------------------------------------
// Table: deviation (append-only audit trail)
// ---------------------------------------------------------------------------
export interface DeviationTable {
  id: string
  run_id: string
  step_id: string
  category: DeviationCategory
  rule: string | null
  action: DeviationAction
  description: string
  /** JSON: string[] */
  targets: string
  resolution: string
  created_at: string
}

export type DeviationRow = Selectable<DeviationTable>

// ---------------------------------------------------------------------------
// Table: schema_migrations
// ---------------------------------------------------------------------------
export interface SchemaMigrationTable {
  version: number
  name: string
  applied_at: ColumnType<string, string, never>
}

export interface Database {
  run: RunTable
  checkpoint: CheckpointTable
  verification_result: VerificationResultTable
  deviation: DeviationTable
  schema_migrations: SchemaMigrationTable
}
