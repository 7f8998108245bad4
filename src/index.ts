// src/index.ts — USDT payment service entry point
// Boot sequence: config → store → chain → activation → job → leader lock → scheduler → serve

import { serve } from "@hono/node-server"
import { bsc, bscTestnet } from "viem/chains"
import { loadConfig } from "./config.js"
import { createDb } from "./drizzle/db.js"
import { validateDatabase } from "./drizzle/validate.js"
import { LeaderLock, pgAdvisoryLockSessions } from "./drizzle/leader-lock.js"
import { RpcPool } from "./chain/rpc-pool.js"
import { BscChainReader } from "./chain/chain-reader.js"
import { HttpPointsService, HttpSubscriptionService } from "./activation/collaborators.js"
import { ActivationDispatcher } from "./activation/dispatcher.js"
import { NoopNotifier, WebhookNotifier } from "./notify/webhook-notifier.js"
import { InMemoryPaymentStore, type PaymentStore } from "./payments/store.js"
import { PgPaymentStore } from "./payments/pg-payment-store.js"
import { Pricing } from "./payments/pricing.js"
import { PaymentService } from "./payments/service.js"
import { VerificationJob } from "./verification/verification-job.js"
import { Scheduler } from "./scheduler/scheduler.js"
import { ResilientHttpClient } from "./shared/http-client.js"
import { errorMessage } from "./shared/logger.js"
import { createApp } from "./server.js"

const VERIFICATION_TASK_ID = "usdt-verification"
const LEADER_RETRY_MS = 60_000

function requireUrl(name: string, value: string): string {
  if (!value) throw new Error(`${name} is required`)
  return value
}

async function main() {
  const bootStart = Date.now()
  console.log("[usdt] booting payment service...")

  // 1. Load config
  const config = loadConfig()
  console.log(`[usdt] config loaded: port=${config.port}, testnet=${config.chain.testnet}, postgres=${config.postgres.enabled}`)

  // 2. Store (Postgres when enabled, in-memory otherwise)
  const storeOptions = {
    paymentTtlMinutes: config.verification.paymentTtlMinutes,
    requiredConfirmations: config.verification.requiredConfirmations,
  }
  let store: PaymentStore
  let database: ReturnType<typeof createDb> | undefined
  if (config.postgres.enabled) {
    database = createDb({
      connectionString: config.postgres.connectionString,
      maxConnections: config.postgres.maxConnections,
    })
    await validateDatabase(database.sql)
    store = new PgPaymentStore({ db: database.db, ...storeOptions })
  } else {
    console.warn("[usdt] USDT_POSTGRES_ENABLED is not set: payments are kept in memory only")
    store = new InMemoryPaymentStore(storeOptions)
  }

  // 3. Chain access
  const rpcPool = new RpcPool({
    rpcUrls: config.chain.rpcUrls,
    chain: config.chain.testnet ? bscTestnet : bsc,
    timeoutMs: config.chain.rpcTimeoutMs,
  })
  const chain = new BscChainReader({
    rpcPool,
    tokenAddress: config.chain.tokenAddress,
    logChunkSize: config.chain.logChunkSize,
  })
  console.log(`[usdt] rpc providers: ${rpcPool.getHealth().map((p) => p.name).join(", ")}`)

  // 4. Collaborators + activation
  const http = new ResilientHttpClient({ maxRetries: 2, baseDelayMs: 500, timeoutMs: 10_000 })
  const dispatcher = new ActivationDispatcher({
    store,
    subscriptions: new HttpSubscriptionService({
      baseUrl: requireUrl("SUBSCRIPTION_SERVICE_URL", config.collaborators.subscriptionServiceUrl),
      serviceToken: config.collaborators.serviceToken,
      http,
    }),
    points: new HttpPointsService({
      baseUrl: requireUrl("POINTS_SERVICE_URL", config.collaborators.pointsServiceUrl),
      serviceToken: config.collaborators.serviceToken,
      http,
    }),
  })

  const webhook = config.webhook.url
    ? new WebhookNotifier({
      url: config.webhook.url,
      secret: config.webhook.secret,
      http: new ResilientHttpClient({ maxRetries: config.webhook.maxRetries, baseDelayMs: 1_000, timeoutMs: 5_000 }),
    })
    : undefined
  const notifier = webhook ?? new NoopNotifier()

  // 5. Payment service
  const service = new PaymentService({
    store,
    pricing: new Pricing(config.pricing.usdtVndRate),
    chain,
    dispatcher,
    notifier,
    config: {
      receivingAddress: config.chain.receivingAddress,
      tokenAddress: config.chain.tokenAddress,
      requiredConfirmations: config.verification.requiredConfirmations,
    },
  })

  // 6. Verification job on the scheduler
  const job = new VerificationJob({
    store,
    chain,
    dispatcher,
    notifier,
    config: {
      maxRetries: config.verification.maxRetries,
      paymentTtlMinutes: config.verification.paymentTtlMinutes,
      amountToleranceUsdt: config.verification.amountToleranceUsdt,
      scanToleranceFraction: config.verification.scanToleranceFraction,
      maxBlocksToScan: config.verification.maxBlocksToScan,
      sweepConcurrency: config.verification.sweepConcurrency,
      tokenAddress: config.chain.tokenAddress,
    },
  })

  const scheduler = new Scheduler()
  scheduler.register({
    id: VERIFICATION_TASK_ID,
    name: "USDT payment verification",
    intervalMs: config.verification.checkIntervalSeconds * 1000,
    jitterMs: 0,
    handler: async () => {
      const stats = await job.runOnce()
      if (stats.expired + stats.found + stats.completed + stats.failed + stats.cancelled + stats.errors > 0) {
        console.log("[verification] sweep finished", stats)
      }
    },
  })

  // 7. Leader election: one replica runs the scheduler
  let leaderRetry: ReturnType<typeof setInterval> | undefined
  const lock = database
    ? new LeaderLock({
      sessions: pgAdvisoryLockSessions(database.sql),
      onLockLost: () => {
        void scheduler.stop().then(() => {
          console.error("[usdt] verification lock lost: scheduler stopped, retrying election")
          startElection()
        })
      },
    })
    : undefined

  const tryLead = async () => {
    if (lock && !(await lock.acquire())) return false
    if (leaderRetry) {
      clearInterval(leaderRetry)
      leaderRetry = undefined
    }
    scheduler.start()
    console.log(`[usdt] verification scheduler started (every ${config.verification.checkIntervalSeconds}s)`)
    return true
  }

  function startElection() {
    if (leaderRetry) return
    leaderRetry = setInterval(() => {
      tryLead().catch((err: unknown) => {
        console.error("[usdt] leader election failed:", errorMessage(err))
      })
    }, LEADER_RETRY_MS)
    leaderRetry.unref()
  }

  if (!(await tryLead())) {
    console.log("[usdt] another instance runs verification; serving HTTP only")
    startElection()
  }

  // 8. Start HTTP server
  const app = createApp({
    service,
    adminToken: config.adminToken,
    storeKind: database ? "postgres" : "memory",
    isLeader: () => lock?.isHolder ?? true,
    schedulerStatus: () => scheduler.getStatus(),
    rpcHealth: () => rpcPool.getHealth(),
  })

  const bootDuration = Date.now() - bootStart
  const server = serve({ fetch: app.fetch, port: config.port, hostname: config.host }, (info) => {
    console.log(`[usdt] payment service ready on :${info.port} (boot: ${bootDuration}ms)`)
  })

  // 9. Graceful shutdown
  // Order: stop accepting requests, finish the in-flight sweep, release the
  // lock, flush webhooks, close the database.
  let shuttingDown = false
  const gracefulShutdown = async (signal: string) => {
    if (shuttingDown) return
    shuttingDown = true
    const start = Date.now()
    console.log(`[usdt] ${signal} received, shutting down gracefully...`)

    if (leaderRetry) clearInterval(leaderRetry)
    server.close()
    await scheduler.stop()

    if (lock) {
      try { await lock.release() } catch (err) { console.error("[usdt] lock release failed:", errorMessage(err)) }
    }
    if (webhook) await webhook.flush()
    if (database) await database.sql.end({ timeout: 5 })

    console.log(`[usdt] shutdown complete in ${Date.now() - start}ms`)
    process.exit(0)
  }

  const handleSignal = (signal: string) => {
    setTimeout(() => {
      console.error("[usdt] forced shutdown after 30s timeout")
      process.exit(1)
    }, 30_000).unref()

    gracefulShutdown(signal).catch((err: unknown) => {
      console.error("[usdt] shutdown failed:", errorMessage(err))
      process.exit(1)
    })
  }

  process.on("SIGTERM", () => handleSignal("SIGTERM"))
  process.on("SIGINT", () => handleSignal("SIGINT"))
}

main().catch((err) => {
  console.error("[usdt] fatal:", err)
  process.exit(1)
})
