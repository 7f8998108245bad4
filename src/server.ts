// src/server.ts — Hono application (health + USDT payment API)

import { Hono } from "hono"
import type { TaskStatus } from "./scheduler/scheduler.js"
import type { PaymentService } from "./payments/service.js"
import { paymentRoutes } from "./payments/routes.js"
import type { Logger } from "./shared/logger.js"

export interface AppOptions {
  service: PaymentService
  adminToken: string
  /** "postgres" or "memory" */
  storeKind: string
  /** Whether this replica runs the verification scheduler */
  isLeader: () => boolean
  schedulerStatus?: () => TaskStatus[]
  rpcHealth?: () => Array<{ name: string; state: string; priority: number }>
  logger?: Logger
}

export function createApp(options: AppOptions): Hono {
  const app = new Hono()

  // Health endpoint (no auth required)
  app.get("/health", (c) => {
    const tasks = options.schedulerStatus?.() ?? []
    const providers = options.rpcHealth?.() ?? []
    const degraded =
      tasks.some((t) => t.state === "error") ||
      (providers.length > 0 && providers.every((p) => p.state === "open"))

    return c.json({
      status: degraded ? "degraded" : "healthy",
      uptime: process.uptime(),
      checks: {
        store: options.storeKind,
        verification: {
          leader: options.isLeader(),
          tasks: tasks.map((t) => ({
            id: t.id,
            state: t.state,
            last_run: t.lastRun ?? null,
            last_error: t.lastError ?? null,
            circuit: t.circuitBreakerState,
          })),
        },
        rpc: providers,
      },
    })
  })

  app.route("/api/v1/usdt", paymentRoutes({
    service: options.service,
    adminToken: options.adminToken,
    logger: options.logger,
  }))

  return app
}
