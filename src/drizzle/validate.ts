// src/drizzle/validate.ts — Database startup validation gate
// On boot (when USDT_POSTGRES_ENABLED=true), verify required tables exist.

import type { Sql } from "postgres"
import { consoleLogger, type Logger } from "../shared/logger.js"

const REQUIRED_TABLES = [
  "payments",
  "pending_transactions",
  "wallet_addresses",
] as const

export class DatabaseValidationError extends Error {
  constructor(public readonly missing: string[]) {
    super(`Required tables missing from usdt schema: ${missing.join(", ")}`)
    this.name = "DatabaseValidationError"
  }
}

/**
 * Validate that all required tables exist in the usdt schema.
 * @throws DatabaseValidationError listing the missing tables
 */
export async function validateDatabase(sql: Sql, logger: Logger = consoleLogger): Promise<void> {
  const result = await sql<{ table_name: string }[]>`
    SELECT table_name
    FROM information_schema.tables
    WHERE table_schema = 'usdt'
      AND table_type = 'BASE TABLE'
  `

  const existingTables = new Set(result.map((row) => row.table_name))
  const missing = REQUIRED_TABLES.filter((t) => !existingTables.has(t))

  if (missing.length > 0) {
    logger.error("[usdt] required tables missing, run migrations first: npm run migrate", { missing })
    throw new DatabaseValidationError(missing)
  }

  logger.info(`[usdt] database validated: ${REQUIRED_TABLES.length} tables present in usdt schema`)
}
