import type { Kysely } from "kysely"

import type { Database } from "./types.js"

export interface Migration {
  version: number
  name: string
  up: (db: Kysely<Database>) => Promise<void>
}

export const MIGRATIONS: readonly Migration[] = [
  {
    version: 1,
    name: "runs_and_checkpoints",
    async up(db) {
      await db.schema
        .createTable("run")
        .addColumn("id", "text", (col) => col.primaryKey())
        .addColumn("plan_id", "text", (col) => col.notNull())
        .addColumn("project", "text", (col) => col.notNull())
        .addColumn("plan_path", "text", (col) => col.notNull())
        .addColumn("status", "text", (col) => col.notNull())
        .addColumn("current_step", "text")
        .addColumn("step_results", "text", (col) => col.notNull().defaultTo("[]"))
        .addColumn("error", "text")
        .addColumn("created_at", "text", (col) => col.notNull())
        .addColumn("started_at", "text")
        .addColumn("completed_at", "text")
        .addColumn("updated_at", "text", (col) => col.notNull())
        .execute()
      await db.schema.createIndex("idx_run_project_created").on("run").columns(["project", "created_at"]).execute()

      await db.schema
        .createTable("checkpoint")
        .addColumn("id", "text", (col) => col.primaryKey())
        .addColumn("run_id", "text", (col) => col.notNull().references("run.id"))
        .addColumn("plan_id", "text", (col) => col.notNull())
        .addColumn("project", "text", (col) => col.notNull())
        .addColumn("step_id", "text", (col) => col.notNull())
        .addColumn("type", "text", (col) => col.notNull())
        .addColumn("origin", "text", (col) => col.notNull())
        .addColumn("completed_tasks", "text", (col) => col.notNull().defaultTo("[]"))
        .addColumn("current_task", "text", (col) => col.notNull())
        .addColumn("blocker", "text", (col) => col.notNull())
        .addColumn("awaiting", "text", (col) => col.notNull())
        .addColumn("execution_context", "text", (col) => col.notNull().defaultTo("{}"))
        .addColumn("created_at", "text", (col) => col.notNull())
        .addColumn("resolved_at", "text")
        .addColumn("user_response", "text")
        .execute()
      await db.schema
        .createIndex("idx_checkpoint_project_resolved")
        .on("checkpoint")
        .columns(["project", "resolved_at"])
        .execute()
      await db.schema.createIndex("idx_checkpoint_run").on("checkpoint").column("run_id").execute()
    },
  },
  {
    version: 2,
    name: "verification_results",
    async up(db) {
      await db.schema
        .createTable("verification_result")
        .addColumn("run_id", "text", (col) => col.notNull().references("run.id"))
        .addColumn("step_id", "text", (col) => col.notNull())
        .addColumn("status", "text", (col) => col.notNull())
        .addColumn("commands", "text", (col) => col.notNull().defaultTo("[]"))
        .addColumn("started_at", "text", (col) => col.notNull())
        .addColumn("completed_at", "text", (col) => col.notNull())
        .addPrimaryKeyConstraint("verification_result_pkey", ["run_id", "step_id"])
        .execute()
    },
  },
  {
    version: 3,
    name: "deviation_audit",
    async up(db) {
      await db.schema
        .createTable("deviation")
        .addColumn("id", "text", (col) => col.primaryKey())
        .addColumn("run_id", "text", (col) => col.notNull().references("run.id"))
        .addColumn("step_id", "text", (col) => col.notNull())
        .addColumn("category", "text", (col) => col.notNull())
        .addColumn("rule", "text")
        .addColumn("action", "text", (col) => col.notNull())
        .addColumn("description", "text", (col) => col.notNull())
        .addColumn("targets", "text", (col) => col.notNull().defaultTo("[]"))
        .addColumn("resolution", "text", (col) => col.notNull().defaultTo(""))
        .addColumn("created_at", "text", (col) => col.notNull())
        .execute()
      await db.schema.createIndex("idx_deviation_run").on("deviation").columns(["run_id", "created_at"]).execute()
    },
  },
]
