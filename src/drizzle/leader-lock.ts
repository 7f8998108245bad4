// src/drizzle/leader-lock.ts — Postgres advisory lock for the verification leader
//
// Only one replica runs the verification scheduler. The lock is a session-level
// pg_try_advisory_lock held on a reserved connection; it is released by
// pg_advisory_unlock on shutdown or by Postgres when the session dies. A
// keepalive probes the session so a dropped connection is noticed and the
// scheduler can stop (onLockLost).

import type { ReservedSql, Sql } from "postgres"
import { consoleLogger, errorMessage, type Logger } from "../shared/logger.js"

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

/** "usdt" as a 32-bit key */
export const VERIFICATION_LOCK_KEY = 0x75736474
const KEEPALIVE_INTERVAL_MS = 10_000

// ---------------------------------------------------------------------------
// Port
// ---------------------------------------------------------------------------

export interface AdvisoryLockSession {
  tryLock(key: number): Promise<boolean>
  unlock(key: number): Promise<void>
  /** Resolves when the session is alive, rejects otherwise */
  ping(): Promise<void>
  close(): Promise<void>
}

/** Opens one dedicated session per lock attempt. */
export type AdvisoryLockSessionFactory = () => Promise<AdvisoryLockSession>

export function pgAdvisoryLockSessions(sql: Sql): AdvisoryLockSessionFactory {
  return async () => new PgAdvisoryLockSession(await sql.reserve())
}

class PgAdvisoryLockSession implements AdvisoryLockSession {
  constructor(private readonly conn: ReservedSql) {}

  async tryLock(key: number): Promise<boolean> {
    const rows = await this.conn<{ locked: boolean }[]>`SELECT pg_try_advisory_lock(${key}) AS locked`
    return rows[0]?.locked === true
  }

  async unlock(key: number): Promise<void> {
    await this.conn`SELECT pg_advisory_unlock(${key})`
  }

  async ping(): Promise<void> {
    await this.conn`SELECT 1`
  }

  async close(): Promise<void> {
    this.conn.release()
  }
}

// ---------------------------------------------------------------------------
// Leader Lock
// ---------------------------------------------------------------------------

export interface LeaderLockDeps {
  sessions: AdvisoryLockSessionFactory
  key?: number
  keepaliveIntervalMs?: number
  onLockLost?: () => void
  logger?: Logger
}

export class LeaderLock {
  private readonly sessions: AdvisoryLockSessionFactory
  private readonly key: number
  private readonly keepaliveIntervalMs: number
  private readonly onLockLost: (() => void) | undefined
  private readonly logger: Logger
  private session: AdvisoryLockSession | null = null
  private keepaliveTimer: ReturnType<typeof setInterval> | null = null

  constructor(deps: LeaderLockDeps) {
    this.sessions = deps.sessions
    this.key = deps.key ?? VERIFICATION_LOCK_KEY
    this.keepaliveIntervalMs = deps.keepaliveIntervalMs ?? KEEPALIVE_INTERVAL_MS
    this.onLockLost = deps.onLockLost
    this.logger = deps.logger ?? consoleLogger
  }

  get isHolder(): boolean {
    return this.session !== null
  }

  /** Returns true when this process now holds the lock. */
  async acquire(): Promise<boolean> {
    if (this.session) return true

    const session = await this.sessions()
    let locked = false
    try {
      locked = await session.tryLock(this.key)
    } finally {
      if (!locked) await session.close()
    }
    if (!locked) {
      this.logger.info("[usdt] verification lock held by another instance")
      return false
    }

    this.session = session
    this.startKeepalive()
    this.logger.info("[usdt] verification lock acquired", { key: this.key })
    return true
  }

  /** Release the lock (graceful shutdown). */
  async release(): Promise<void> {
    this.stopKeepalive()
    const session = this.session
    if (!session) return
    this.session = null

    try {
      await session.unlock(this.key)
    } finally {
      await session.close()
    }
  }

  // ---------------------------------------------------------------------------
  // Keepalive
  // ---------------------------------------------------------------------------

  /** One keepalive probe; exposed for tests. */
  async checkSession(): Promise<boolean> {
    const session = this.session
    if (!session) return false
    try {
      await session.ping()
      return true
    } catch (err) {
      this.logger.error("[usdt] verification lock session lost", { error: errorMessage(err) })
      this.stopKeepalive()
      this.session = null
      await session.close().catch((closeErr: unknown) => {
        this.logger.warn("[usdt] closing lost lock session failed", { error: errorMessage(closeErr) })
      })
      this.onLockLost?.()
      return false
    }
  }

  private startKeepalive(): void {
    this.stopKeepalive()
    this.keepaliveTimer = setInterval(() => {
      void this.checkSession()
    }, this.keepaliveIntervalMs)
    this.keepaliveTimer.unref()
  }

  private stopKeepalive(): void {
    if (this.keepaliveTimer) {
      clearInterval(this.keepaliveTimer)
      this.keepaliveTimer = null
    }
  }
}
