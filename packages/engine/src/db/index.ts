import { mkdirSync } from "node:fs"
import { dirname } from "node:path"

import SqliteDatabase from "better-sqlite3"
import { Kysely, PostgresDialect, SqliteDialect } from "kysely"
import pg from "pg"

import type { DatabaseTarget } from "../config.js"
import type { Database } from "./types.js"

export interface DatabaseConnection {
  db: Kysely<Database>
  dialect: DatabaseTarget["kind"]
  /** Closes the Kysely instance and the driver beneath it. */
  close: () => Promise<void>
}

export function createDatabase(target: DatabaseTarget): DatabaseConnection {
  if (target.kind === "postgres") {
    const pool = new pg.Pool({ connectionString: target.connectionString })
    const db = new Kysely<Database>({ dialect: new PostgresDialect({ pool }) })
    return { db, dialect: "postgres", close: () => db.destroy() }
  }

  if (target.filename !== ":memory:") {
    mkdirSync(dirname(target.filename), { recursive: true })
  }
  const sqlite = new SqliteDatabase(target.filename)
  sqlite.pragma("journal_mode = WAL")
  sqlite.pragma("foreign_keys = ON")
  sqlite.pragma("busy_timeout = 5000")

  const db = new Kysely<Database>({ dialect: new SqliteDialect({ database: sqlite }) })
  return { db, dialect: "sqlite", close: () => db.destroy() }
}

export type { Database } from "./types.js"
