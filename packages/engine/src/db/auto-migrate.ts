/**
 * Auto-migration: applies pending migrations on startup, each in its own
 * transaction together with its schema_migrations row.
 */

import type { TracingLogger } from "@waveline/shared/tracing"
import type { Kysely } from "kysely"

import { type Migration, MIGRATIONS } from "./migrations.js"
import type { Database } from "./types.js"

export async function runMigrations(
  db: Kysely<Database>,
  logger?: TracingLogger,
  migrations: readonly Migration[] = MIGRATIONS,
): Promise<number[]> {
  await db.schema
    .createTable("schema_migrations")
    .ifNotExists()
    .addColumn("version", "integer", (col) => col.primaryKey())
    .addColumn("name", "text", (col) => col.notNull())
    .addColumn("applied_at", "text", (col) => col.notNull())
    .execute()

  const applied = await db.selectFrom("schema_migrations").select("version").execute()
  const appliedSet = new Set(applied.map((r) => Number(r.version)))

  const pending = migrations
    .filter((m) => !appliedSet.has(m.version))
    .sort((a, b) => a.version - b.version)

  if (pending.length === 0) {
    logger?.debug("No pending migrations")
    return []
  }

  for (const migration of pending) {
    logger?.info("Applying migration", { version: migration.version, name: migration.name })
    await db.transaction().execute(async (trx) => {
      await migration.up(trx)
      await trx
        .insertInto("schema_migrations")
        .values({
          version: migration.version,
          name: migration.name,
          applied_at: new Date().toISOString(),
        })
        .execute()
    })
  }

  logger?.info("Migrations applied", { count: pending.length })
  return pending.map((m) => m.version)
}
