// src/drizzle/migrate.ts — Migration runner entrypoint
// Applies the drizzle-kit output in ./drizzle (npm run db:generate), invoked as:
//   npm run migrate

import { drizzle } from "drizzle-orm/postgres-js"
import { migrate } from "drizzle-orm/postgres-js/migrator"
import postgres from "postgres"

async function runMigrations(): Promise<void> {
  const connectionString = process.env.DATABASE_URL
  if (!connectionString) {
    console.error("[usdt-migrate] DATABASE_URL is required")
    process.exit(1)
  }

  console.log("[usdt-migrate] connecting to database...")
  const sql = postgres(connectionString, { max: 1 })

  try {
    const db = drizzle(sql)
    console.log("[usdt-migrate] running migrations...")
    await migrate(db, { migrationsFolder: "drizzle" })
    console.log("[usdt-migrate] migrations complete")
  } catch (err) {
    console.error("[usdt-migrate] migration failed:", err)
    process.exitCode = 1
  } finally {
    await sql.end()
  }
}

runMigrations().catch((err: unknown) => {
  console.error("[usdt-migrate] fatal:", err)
  process.exit(1)
})
