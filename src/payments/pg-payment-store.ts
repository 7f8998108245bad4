// src/payments/pg-payment-store.ts — Postgres-backed PaymentStore
//
// Implements PaymentStore with:
// - Status transitions via conditional UPDATE ... WHERE status = <read status>
//   RETURNING (a concurrent writer makes the update a no-op, never a lost write)
// - Terminal transitions and batch expiry in one transaction with the queue delete
// - Set-once activation links via UPDATE ... WHERE link IS NULL OR link = <same>
// - Wallet usage as a single INSERT ... ON CONFLICT DO UPDATE

import { and, asc, desc, eq, inArray, isNull, lt, or, sql, type SQL } from "drizzle-orm"
import postgres from "postgres"
import { ulid } from "ulid"
import type { Db } from "../drizzle/db.js"
import { usdtPayments, usdtPendingTransactions, usdtWalletAddresses } from "../drizzle/schema.js"
import { formatUsdt, parseUsdt } from "../chain/denomination.js"
import { newPaymentIds } from "./ids.js"
import {
  emptyStatusCounts,
  validateCreatePaymentInput,
  type PaymentStore,
  type PaymentStoreOptions,
} from "./store.js"
import {
  EXPIRABLE_STATUSES,
  canTransition,
  hasActivationLink,
  isTerminal,
  timestampsFor,
} from "./transitions.js"
import {
  PaymentStoreError,
  type CreatePaymentInput,
  type Payment,
  type PaymentFilters,
  type PaymentStats,
  type PaymentStatus,
  type PaymentStatusFields,
  type PendingTransaction,
  type PendingTransactionInput,
  type PendingTransactionUpdate,
  type QueueStatus,
  type StatusUpdateResult,
  type WalletAddress,
} from "./types.js"

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface PgPaymentStoreDeps extends PaymentStoreOptions {
  db: Db
}

type WalletRow = typeof usdtWalletAddresses.$inferSelect

const DEFAULT_LIMIT = 50
const EXPIRED_MESSAGE = "Payment expired before a transfer was found"

// ---------------------------------------------------------------------------
// Postgres-Backed Payment Store
// ---------------------------------------------------------------------------

export class PgPaymentStore implements PaymentStore {
  private readonly db: Db
  private readonly ttlMs: number
  private readonly requiredConfirmations: number
  private readonly now: () => Date

  constructor(deps: PgPaymentStoreDeps) {
    this.db = deps.db
    this.ttlMs = (deps.paymentTtlMinutes ?? 30) * 60_000
    this.requiredConfirmations = deps.requiredConfirmations ?? 12
    this.now = deps.now ?? (() => new Date())
  }

  // -------------------------------------------------------------------------
  // Payments
  // -------------------------------------------------------------------------

  async createPayment(raw: CreatePaymentInput): Promise<Payment> {
    const input = validateCreatePaymentInput(raw)
    const now = this.now()
    const ids = newPaymentIds(input.userId, now)
    const isSubscription = input.paymentType === "subscription"

    try {
      const rows = await this.db
        .insert(usdtPayments)
        .values({
          ...ids,
          userId: input.userId,
          userEmail: input.userEmail ?? null,
          userName: input.userName ?? null,
          paymentType: input.paymentType,
          plan: isSubscription ? input.plan ?? null : null,
          duration: isSubscription ? input.duration ?? null : null,
          pointsAmount: isSubscription ? null : input.pointsAmount ?? null,
          amountUsdt: input.amountUsdt,
          amountVnd: input.amountVnd,
          usdtRate: input.usdtRate,
          fromAddress: input.fromAddress?.toLowerCase() ?? null,
          toAddress: input.toAddress.toLowerCase(),
          requiredConfirmations: input.requiredConfirmations ?? this.requiredConfirmations,
          status: "pending",
          createdAt: now,
          updatedAt: now,
          expiresAt: new Date(now.getTime() + this.ttlMs),
        })
        .returning()
      return rows[0]
    } catch (err) {
      if (isUniqueViolation(err)) {
        throw new PaymentStoreError("DUPLICATE", `Payment ${ids.paymentId} already exists`)
      }
      throw err
    }
  }

  async getPayment(paymentId: string): Promise<Payment | null> {
    return this.findOne(eq(usdtPayments.paymentId, paymentId))
  }

  async getPaymentByInvoice(orderInvoiceNumber: string): Promise<Payment | null> {
    return this.findOne(eq(usdtPayments.orderInvoiceNumber, orderInvoiceNumber))
  }

  async getPaymentByTxHash(transactionHash: string): Promise<Payment | null> {
    return this.findOne(eq(usdtPayments.transactionHash, transactionHash.toLowerCase()))
  }

  async updatePaymentStatus(
    paymentId: string,
    status: PaymentStatus,
    fields: PaymentStatusFields = {},
  ): Promise<StatusUpdateResult> {
    const current = await this.getPayment(paymentId)
    if (!current) return { applied: false, payment: null }
    if (!canTransition(current.status, status)) return { applied: false, payment: current }
    if (status === "completed" && !hasActivationLink(current)) {
      throw new PaymentStoreError(
        "UNLINKED_COMPLETION",
        `Payment ${paymentId} cannot complete without its activation link`,
      )
    }

    const now = this.now()
    const set = {
      ...timestampsFor(current, status, now),
      status,
      updatedAt: now,
      ...(fields.transactionHash !== undefined && { transactionHash: fields.transactionHash.toLowerCase() }),
      ...(fields.blockNumber !== undefined && { blockNumber: fields.blockNumber }),
      ...(fields.confirmationCount !== undefined && { confirmationCount: fields.confirmationCount }),
      ...(fields.fromAddress !== undefined && { fromAddress: fields.fromAddress.toLowerCase() }),
      ...(fields.errorMessage !== undefined && { errorMessage: fields.errorMessage }),
    }

    try {
      const updated = await this.db.transaction(async (tx) => {
        const rows = await tx
          .update(usdtPayments)
          .set(set)
          .where(and(eq(usdtPayments.paymentId, paymentId), eq(usdtPayments.status, current.status)))
          .returning()
        if (rows.length === 0) return null
        if (isTerminal(status)) {
          await tx.delete(usdtPendingTransactions).where(eq(usdtPendingTransactions.paymentId, paymentId))
        }
        return rows[0]
      })

      if (!updated) {
        // Lost the race to another writer
        return { applied: false, payment: await this.getPayment(paymentId) }
      }
      return { applied: true, payment: updated }
    } catch (err) {
      if (isUniqueViolation(err)) {
        throw new PaymentStoreError(
          "DUPLICATE",
          `Transaction ${fields.transactionHash ?? ""} already belongs to another payment`,
        )
      }
      throw err
    }
  }

  async linkSubscription(paymentId: string, subscriptionId: string): Promise<Payment> {
    const rows = await this.db
      .update(usdtPayments)
      .set({ subscriptionId, updatedAt: this.now() })
      .where(
        and(
          eq(usdtPayments.paymentId, paymentId),
          or(isNull(usdtPayments.subscriptionId), eq(usdtPayments.subscriptionId, subscriptionId)),
        ),
      )
      .returning()
    if (rows.length > 0) return rows[0]

    const existing = await this.getPayment(paymentId)
    if (!existing) throw new PaymentStoreError("NOT_FOUND", `Payment ${paymentId} not found`)
    throw new PaymentStoreError(
      "LINK_CONFLICT",
      `Payment ${paymentId} already linked to subscription ${existing.subscriptionId ?? ""}`,
    )
  }

  async linkPointsTransaction(paymentId: string, pointsTransactionId: string): Promise<Payment> {
    const rows = await this.db
      .update(usdtPayments)
      .set({ pointsTransactionId, updatedAt: this.now() })
      .where(
        and(
          eq(usdtPayments.paymentId, paymentId),
          or(
            isNull(usdtPayments.pointsTransactionId),
            eq(usdtPayments.pointsTransactionId, pointsTransactionId),
          ),
        ),
      )
      .returning()
    if (rows.length > 0) return rows[0]

    const existing = await this.getPayment(paymentId)
    if (!existing) throw new PaymentStoreError("NOT_FOUND", `Payment ${paymentId} not found`)
    throw new PaymentStoreError(
      "LINK_CONFLICT",
      `Payment ${paymentId} already linked to points transaction ${existing.pointsTransactionId ?? ""}`,
    )
  }

  async manualConfirmPayment(
    paymentId: string,
    adminId: string,
    notes: string | null,
  ): Promise<StatusUpdateResult> {
    const current = await this.getPayment(paymentId)
    if (!current) return { applied: false, payment: null }
    if (isTerminal(current.status)) return { applied: false, payment: current }

    const now = this.now()
    const rows = await this.db
      .update(usdtPayments)
      .set({
        ...timestampsFor(current, "confirmed", now),
        status: "confirmed",
        manuallyProcessed: true,
        processedByAdmin: adminId,
        adminNotes: notes,
        updatedAt: now,
      })
      .where(and(eq(usdtPayments.paymentId, paymentId), eq(usdtPayments.status, current.status)))
      .returning()

    if (rows.length === 0) return { applied: false, payment: await this.getPayment(paymentId) }
    return { applied: true, payment: rows[0] }
  }

  // -------------------------------------------------------------------------
  // Pending queue
  // -------------------------------------------------------------------------

  async addPendingTransaction(input: PendingTransactionInput): Promise<PendingTransaction> {
    const now = this.now()
    const values = {
      paymentId: input.paymentId,
      userId: input.userId,
      transactionHash: input.transactionHash?.toLowerCase() ?? null,
      fromAddress: input.fromAddress?.toLowerCase() ?? null,
      toAddress: input.toAddress.toLowerCase(),
      amountUsdt: input.amountUsdt,
      requiredConfirmations: input.requiredConfirmations,
      status: input.status,
    }
    const rows = await this.db
      .insert(usdtPendingTransactions)
      .values({ ...values, firstSeenAt: now, lastCheckedAt: now })
      .onConflictDoUpdate({ target: usdtPendingTransactions.paymentId, set: values })
      .returning()
    return rows[0]
  }

  async getPendingTransaction(paymentId: string): Promise<PendingTransaction | null> {
    const rows = await this.db
      .select()
      .from(usdtPendingTransactions)
      .where(eq(usdtPendingTransactions.paymentId, paymentId))
    return rows[0] ?? null
  }

  async getPendingTransactions(status: QueueStatus, limit: number): Promise<PendingTransaction[]> {
    return this.db
      .select()
      .from(usdtPendingTransactions)
      .where(eq(usdtPendingTransactions.status, status))
      .orderBy(asc(usdtPendingTransactions.lastCheckedAt))
      .limit(limit)
  }

  async updatePendingTransaction(
    paymentId: string,
    update: PendingTransactionUpdate,
  ): Promise<PendingTransaction | null> {
    const rows = await this.db
      .update(usdtPendingTransactions)
      .set({
        lastCheckedAt: this.now(),
        ...(update.retryCount !== undefined && { retryCount: update.retryCount }),
        ...(update.confirmationCount !== undefined && { confirmationCount: update.confirmationCount }),
        ...(update.transactionHash !== undefined && { transactionHash: update.transactionHash.toLowerCase() }),
        ...(update.fromAddress !== undefined && { fromAddress: update.fromAddress.toLowerCase() }),
        ...(update.status !== undefined && { status: update.status }),
      })
      .where(eq(usdtPendingTransactions.paymentId, paymentId))
      .returning()
    return rows[0] ?? null
  }

  async removePendingTransaction(paymentIdOrHash: string): Promise<boolean> {
    const rows = await this.db
      .delete(usdtPendingTransactions)
      .where(
        or(
          eq(usdtPendingTransactions.paymentId, paymentIdOrHash),
          eq(usdtPendingTransactions.transactionHash, paymentIdOrHash.toLowerCase()),
        ),
      )
      .returning({ paymentId: usdtPendingTransactions.paymentId })
    return rows.length > 0
  }

  // -------------------------------------------------------------------------
  // Wallets
  // -------------------------------------------------------------------------

  async registerWallet(userId: string, walletAddress: string, label?: string): Promise<WalletAddress> {
    const address = walletAddress.toLowerCase()
    const now = this.now()
    const insert = this.db
      .insert(usdtWalletAddresses)
      .values({
        id: ulid(now.getTime()),
        userId,
        walletAddress: address,
        label: label ?? null,
        firstUsedAt: now,
        lastUsedAt: now,
      })
    const target = [usdtWalletAddresses.userId, usdtWalletAddresses.walletAddress]

    if (label !== undefined) {
      await insert.onConflictDoUpdate({ target, set: { label } })
    } else {
      await insert.onConflictDoNothing({ target })
    }

    const rows = await this.db
      .select()
      .from(usdtWalletAddresses)
      .where(and(eq(usdtWalletAddresses.userId, userId), eq(usdtWalletAddresses.walletAddress, address)))
    return toWallet(rows[0])
  }

  async updateWalletUsage(userId: string, walletAddress: string, amountUsdt: string): Promise<WalletAddress> {
    const now = this.now()
    const amount = formatUsdt(parseUsdt(amountUsdt))
    const rows = await this.db
      .insert(usdtWalletAddresses)
      .values({
        id: ulid(now.getTime()),
        userId,
        walletAddress: walletAddress.toLowerCase(),
        isVerified: true,
        firstUsedAt: now,
        lastUsedAt: now,
        paymentCount: 1,
        totalAmountUsdt: amount,
      })
      .onConflictDoUpdate({
        target: [usdtWalletAddresses.userId, usdtWalletAddresses.walletAddress],
        set: {
          paymentCount: sql`${usdtWalletAddresses.paymentCount} + 1`,
          totalAmountUsdt: sql`${usdtWalletAddresses.totalAmountUsdt} + ${amount}::numeric`,
          lastUsedAt: now,
          isVerified: true,
        },
      })
      .returning()
    return toWallet(rows[0])
  }

  async getUserWallets(userId: string): Promise<WalletAddress[]> {
    const rows = await this.db
      .select()
      .from(usdtWalletAddresses)
      .where(eq(usdtWalletAddresses.userId, userId))
      .orderBy(desc(usdtWalletAddresses.lastUsedAt))
    return rows.map(toWallet)
  }

  // -------------------------------------------------------------------------
  // Queries
  // -------------------------------------------------------------------------

  async getAllPayments(filters: PaymentFilters = {}): Promise<Payment[]> {
    const conditions: SQL[] = []
    if (filters.status !== undefined) conditions.push(eq(usdtPayments.status, filters.status))
    if (filters.paymentType !== undefined) conditions.push(eq(usdtPayments.paymentType, filters.paymentType))
    if (filters.userId !== undefined) conditions.push(eq(usdtPayments.userId, filters.userId))

    return this.db
      .select()
      .from(usdtPayments)
      .where(conditions.length > 0 ? and(...conditions) : undefined)
      .orderBy(desc(usdtPayments.createdAt))
      .limit(filters.limit ?? DEFAULT_LIMIT)
      .offset(filters.offset ?? 0)
  }

  async getUserPayments(
    userId: string,
    filters: Omit<PaymentFilters, "userId"> = {},
  ): Promise<Payment[]> {
    return this.getAllPayments({ ...filters, userId })
  }

  async getPaymentStats(): Promise<PaymentStats> {
    const counts = await this.db
      .select({ status: usdtPayments.status, count: sql<number>`count(*)::int` })
      .from(usdtPayments)
      .groupBy(usdtPayments.status)

    const byStatus = emptyStatusCounts()
    let total = 0
    for (const row of counts) {
      byStatus[row.status] = row.count
      total += row.count
    }

    const sums = await this.db
      .select({ total: sql<string | null>`sum(${usdtPayments.amountUsdt}::numeric)::text` })
      .from(usdtPayments)
      .where(eq(usdtPayments.status, "completed"))

    return { total, byStatus, totalCompletedUsdt: normalizeDecimal(sums[0]?.total ?? null) }
  }

  async findExpiredPayments(cutoff: Date): Promise<Payment[]> {
    return this.db
      .select()
      .from(usdtPayments)
      .where(and(inArray(usdtPayments.status, [...EXPIRABLE_STATUSES]), lt(usdtPayments.createdAt, cutoff)))
  }

  async expirePayments(paymentIds: string[]): Promise<string[]> {
    if (paymentIds.length === 0) return []
    const now = this.now()

    return this.db.transaction(async (tx) => {
      const rows = await tx
        .update(usdtPayments)
        .set({ status: "expired", expiredAt: now, updatedAt: now, errorMessage: EXPIRED_MESSAGE })
        .where(
          and(
            inArray(usdtPayments.paymentId, paymentIds),
            inArray(usdtPayments.status, [...EXPIRABLE_STATUSES]),
          ),
        )
        .returning({ paymentId: usdtPayments.paymentId })

      const moved = rows.map((r) => r.paymentId)
      if (moved.length > 0) {
        await tx.delete(usdtPendingTransactions).where(inArray(usdtPendingTransactions.paymentId, moved))
      }
      return moved
    })
  }

  // -------------------------------------------------------------------------
  // Internals
  // -------------------------------------------------------------------------

  private async findOne(where: SQL): Promise<Payment | null> {
    const rows = await this.db.select().from(usdtPayments).where(where).limit(1)
    return rows[0] ?? null
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function toWallet(row: WalletRow): WalletAddress {
  return { ...row, totalAmountUsdt: normalizeDecimal(row.totalAmountUsdt) }
}

/** numeric(38,18) text → shortest decimal string ("12.500…0" → "12.5") */
function normalizeDecimal(value: string | null): string {
  return value === null ? "0" : formatUsdt(parseUsdt(value))
}

function isUniqueViolation(err: unknown): boolean {
  for (let e: unknown = err, depth = 0; e instanceof Error && depth < 3; e = e.cause, depth++) {
    if (e instanceof postgres.PostgresError && e.code === "23505") return true
  }
  return false
}
