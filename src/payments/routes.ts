// src/payments/routes.ts — USDT payment API (mounted at /api/v1/usdt)
//
// GET  /pricing                        — plan and points prices in VND and USDT
// POST /payments                       — create a subscription or points payment
// GET  /payments                       — caller's history
// GET  /payments/:id                   — status with a human-readable message
// POST /payments/:id/transaction       — submit the transfer hash
// POST /payments/:id/confirm-sent      — start scanning for the transfer
// GET  /admin/payments                 — all payments (bearer ADMIN_TOKEN)
// GET  /admin/stats                    — counts by status
// POST /admin/payments/:id/confirm     — manual confirm + activation
//
// The caller's identity arrives in the x-user-id header, set by the API layer
// in front of this service.

import { createHash, timingSafeEqual } from "node:crypto"
import { Type, type Static, type TSchema } from "@sinclair/typebox"
import { Value } from "@sinclair/typebox/value"
import { Hono, type Context, type Next } from "hono"
import type { ContentfulStatusCode } from "hono/utils/http-status"
import { ActivationError } from "../activation/types.js"
import { ChainUnavailableError } from "../chain/types.js"
import { consoleLogger, type Logger } from "../shared/logger.js"
import type { PaymentService } from "./service.js"
import {
  DURATIONS,
  PAYMENT_STATUSES,
  PLAN_IDS,
  PaymentError,
  PaymentStoreError,
  type Payment,
  type PaymentFilters,
  type PaymentStatus,
  type PaymentType,
} from "./types.js"

// ---------------------------------------------------------------------------
// Request schemas
// ---------------------------------------------------------------------------

const EvmAddress = Type.String({ pattern: "^0x[0-9a-fA-F]{40}$" })

const CreatePaymentBody = Type.Union([
  Type.Object({
    payment_type: Type.Literal("subscription"),
    plan: Type.Union(PLAN_IDS.map((p) => Type.Literal(p))),
    duration: Type.Union(DURATIONS.map((d) => Type.Literal(d))),
    from_address: Type.Optional(EvmAddress),
    user_email: Type.Optional(Type.String({ maxLength: 255 })),
    user_name: Type.Optional(Type.String({ maxLength: 255 })),
  }),
  Type.Object({
    payment_type: Type.Literal("points"),
    points: Type.Integer({ minimum: 1 }),
    from_address: Type.Optional(EvmAddress),
    user_email: Type.Optional(Type.String({ maxLength: 255 })),
    user_name: Type.Optional(Type.String({ maxLength: 255 })),
  }),
])

const SubmitTransactionBody = Type.Object({
  transaction_hash: Type.String({ minLength: 1 }),
})

const ManualConfirmBody = Type.Object({
  admin_id: Type.String({ minLength: 1, maxLength: 128 }),
  notes: Type.Optional(Type.String({ maxLength: 2000 })),
})

// ---------------------------------------------------------------------------
// Serialization
// ---------------------------------------------------------------------------

function iso(date: Date | null): string | null {
  return date ? date.toISOString() : null
}

/** Wire shape of a payment (snake_case, ISO timestamps). */
export function toPaymentJson(p: Payment) {
  return {
    payment_id: p.paymentId,
    order_invoice_number: p.orderInvoiceNumber,
    user_id: p.userId,
    payment_type: p.paymentType,
    plan: p.plan,
    duration: p.duration,
    points_amount: p.pointsAmount,
    amount_usdt: p.amountUsdt,
    amount_vnd: p.amountVnd,
    usdt_rate: p.usdtRate,
    from_address: p.fromAddress,
    to_address: p.toAddress,
    transaction_hash: p.transactionHash,
    block_number: p.blockNumber,
    confirmation_count: p.confirmationCount,
    required_confirmations: p.requiredConfirmations,
    status: p.status,
    subscription_id: p.subscriptionId,
    points_transaction_id: p.pointsTransactionId,
    error_message: p.errorMessage,
    manually_processed: p.manuallyProcessed,
    created_at: p.createdAt.toISOString(),
    expires_at: p.expiresAt.toISOString(),
    payment_received_at: iso(p.paymentReceivedAt),
    confirmed_at: iso(p.confirmedAt),
    completed_at: iso(p.completedAt),
  }
}

// ---------------------------------------------------------------------------
// Errors
// ---------------------------------------------------------------------------

const STATUS_MAP: Record<number, ContentfulStatusCode> = {
  400: 400,
  401: 401,
  402: 402,
  403: 403,
  404: 404,
  409: 409,
  410: 410,
  422: 422,
  500: 500,
  502: 502,
  503: 503,
}

/** Maps domain errors to `{ error, code }` responses; anything else is a 500. */
export function errorResponse(c: Context, err: unknown, logger: Logger = consoleLogger): Response {
  if (
    err instanceof PaymentError ||
    err instanceof PaymentStoreError ||
    err instanceof ActivationError ||
    err instanceof ChainUnavailableError
  ) {
    return c.json({ error: err.message, code: err.code }, STATUS_MAP[err.httpStatus] ?? 500)
  }
  logger.error("[usdt] unexpected error", { path: c.req.path, error: String(err) })
  return c.json({ error: "Internal error", code: "INTERNAL_ERROR" }, 500)
}

async function readBody<T extends TSchema>(c: Context, schema: T): Promise<Static<T>> {
  let body: unknown
  try {
    body = await c.req.json()
  } catch {
    throw new PaymentError("INVALID_REQUEST", "Invalid JSON body")
  }
  if (!Value.Check(schema, body)) {
    const first = Value.Errors(schema, body).First()
    throw new PaymentError(
      "INVALID_REQUEST",
      first ? `Invalid request body at ${first.path || "/"}: ${first.message}` : "Invalid request body",
    )
  }
  return body
}

function requireUser(c: Context): string {
  const userId = c.req.header("x-user-id")
  if (!userId) {
    throw new PaymentError("UNAUTHORIZED", "Missing x-user-id header")
  }
  return userId
}

function parseLimit(raw: string | undefined, fallback: number): number {
  const value = parseInt(raw ?? String(fallback), 10)
  if (isNaN(value) || value < 1) return fallback
  return Math.min(value, 100)
}

function parseOffset(raw: string | undefined): number {
  const value = parseInt(raw ?? "0", 10)
  return isNaN(value) || value < 0 ? 0 : value
}

function parseStatus(raw: string | undefined): PaymentStatus | undefined {
  if (raw === undefined) return undefined
  const match = PAYMENT_STATUSES.find((s) => s === raw)
  if (!match) throw new PaymentError("INVALID_REQUEST", `Unknown status: ${raw}`)
  return match
}

function parsePaymentType(raw: string | undefined): PaymentType | undefined {
  if (raw === undefined) return undefined
  if (raw === "subscription" || raw === "points") return raw
  throw new PaymentError("INVALID_REQUEST", `Unknown payment type: ${raw}`)
}

function filtersFrom(c: Context): Omit<PaymentFilters, "userId"> {
  return {
    status: parseStatus(c.req.query("status")),
    paymentType: parsePaymentType(c.req.query("payment_type")),
    limit: parseLimit(c.req.query("limit"), 20),
    offset: parseOffset(c.req.query("offset")),
  }
}

/** Timing-safe string comparison (constant-time even for different lengths) */
function safeCompare(a: string, b: string): boolean {
  const bufA = createHash("sha256").update(a).digest()
  const bufB = createHash("sha256").update(b).digest()
  return timingSafeEqual(bufA, bufB)
}

/** Bearer token auth for the admin routes; disabled without a configured token. */
export function adminAuth(adminToken: string) {
  return async (c: Context, next: Next) => {
    if (!adminToken) {
      return c.json({ error: "Admin API is not configured", code: "ADMIN_DISABLED" }, 503)
    }
    const authHeader = c.req.header("Authorization")
    if (!authHeader?.startsWith("Bearer ")) {
      return c.json({ error: "Unauthorized", code: "AUTH_REQUIRED" }, 401)
    }
    if (!safeCompare(authHeader.slice(7), adminToken)) {
      return c.json({ error: "Unauthorized", code: "AUTH_INVALID" }, 401)
    }
    return next()
  }
}

// ---------------------------------------------------------------------------
// Route Factory
// ---------------------------------------------------------------------------

export interface PaymentRouteDeps {
  service: PaymentService
  adminToken: string
  logger?: Logger
}

export function paymentRoutes(deps: PaymentRouteDeps): Hono {
  const { service } = deps
  const logger = deps.logger ?? consoleLogger
  const app = new Hono()

  app.onError((err, c) => errorResponse(c, err, logger))

  app.get("/pricing", (c) => {
    const table = service.pricingTable()
    return c.json({
      usdt_rate: table.usdtRate,
      plans: table.plans.map((p) => ({
        plan: p.plan,
        duration: p.duration,
        amount_vnd: p.amountVnd,
        amount_usdt: p.amountUsdt,
      })),
      points_packages: table.pointsPackages.map((p) => ({
        points: p.points,
        discount_percent: p.discountPercent,
        amount_vnd: p.amountVnd,
        amount_usdt: p.amountUsdt,
      })),
    })
  })

  app.post("/payments", async (c) => {
    const userId = requireUser(c)
    const body = await readBody(c, CreatePaymentBody)
    const payer = {
      userId,
      userEmail: body.user_email,
      userName: body.user_name,
      fromAddress: body.from_address,
    }
    const created = body.payment_type === "subscription"
      ? await service.createSubscriptionPayment({ ...payer, plan: body.plan, duration: body.duration })
      : await service.createPointsPayment({ ...payer, points: body.points })

    return c.json({
      ...toPaymentJson(created.payment),
      network: created.network,
      token_contract: created.tokenContract,
      instructions: created.instructions,
    }, 201)
  })

  app.get("/payments", async (c) => {
    const userId = requireUser(c)
    const filters = filtersFrom(c)
    const payments = await service.getUserPayments(userId, filters)
    return c.json({
      payments: payments.map(toPaymentJson),
      pagination: { limit: filters.limit, offset: filters.offset, count: payments.length },
    })
  })

  app.get("/payments/:id", async (c) => {
    const userId = requireUser(c)
    const view = await service.getPayment(c.req.param("id"), userId)
    return c.json({ ...toPaymentJson(view.payment), message: view.message })
  })

  app.post("/payments/:id/transaction", async (c) => {
    const userId = requireUser(c)
    const body = await readBody(c, SubmitTransactionBody)
    const result = await service.submitTransactionHash(c.req.param("id"), userId, body.transaction_hash)
    return c.json({
      message: result.alreadyRegistered
        ? "Transaction already registered"
        : "Transaction hash registered. Waiting for blockchain confirmations.",
      payment_id: result.payment.paymentId,
      transaction_hash: result.payment.transactionHash,
      status: result.payment.status,
      required_confirmations: result.payment.requiredConfirmations,
    })
  })

  app.post("/payments/:id/confirm-sent", async (c) => {
    const userId = requireUser(c)
    const result = await service.confirmSent(c.req.param("id"), userId)
    return c.json({
      message: result.unchanged
        ? `Payment is already ${result.payment.status}`
        : "Blockchain scanning started. We will automatically detect your transaction.",
      payment_id: result.payment.paymentId,
      status: result.payment.status,
    })
  })

  // --- Admin ---

  app.use("/admin/*", adminAuth(deps.adminToken))

  app.get("/admin/payments", async (c) => {
    const filters: PaymentFilters = { ...filtersFrom(c), userId: c.req.query("user_id") }
    const payments = await service.listPayments(filters)
    return c.json({ payments: payments.map(toPaymentJson) })
  })

  app.get("/admin/stats", async (c) => {
    const stats = await service.getStats()
    return c.json({
      total: stats.total,
      by_status: stats.byStatus,
      total_completed_usdt: stats.totalCompletedUsdt,
    })
  })

  app.post("/admin/payments/:id/confirm", async (c) => {
    const body = await readBody(c, ManualConfirmBody)
    const result = await service.manualConfirm(c.req.param("id"), body.admin_id, body.notes ?? null)
    return c.json({
      ...toPaymentJson(result.payment),
      already_completed: result.alreadyCompleted,
      already_applied: result.activation?.alreadyApplied ?? null,
    })
  })

  return app
}
