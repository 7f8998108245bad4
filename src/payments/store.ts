// src/payments/store.ts — PaymentStore port interface + InMemoryPaymentStore
//
// Two adapters: InMemoryPaymentStore (tests, no-database dev mode) and
// PgPaymentStore (durable, in pg-payment-store.ts). Every status change is a
// single conditional write; reaching a terminal status drops the queue entry
// in the same step.

import { Value } from "@sinclair/typebox/value"
import { ulid } from "ulid"
import { formatUsdt, parseUsdt } from "../chain/denomination.js"
import { newPaymentIds } from "./ids.js"
import {
  EXPIRABLE_STATUSES,
  canTransition,
  hasActivationLink,
  isTerminal,
  timestampsFor,
} from "./transitions.js"
import {
  CreatePaymentInputSchema,
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

// --- Port Interface ---

export interface PaymentStore {
  createPayment(input: CreatePaymentInput): Promise<Payment>
  getPayment(paymentId: string): Promise<Payment | null>
  getPaymentByInvoice(orderInvoiceNumber: string): Promise<Payment | null>
  getPaymentByTxHash(transactionHash: string): Promise<Payment | null>
  /** No-op ({ applied: false }) on terminal rows and backward moves. */
  updatePaymentStatus(
    paymentId: string,
    status: PaymentStatus,
    fields?: PaymentStatusFields,
  ): Promise<StatusUpdateResult>
  linkSubscription(paymentId: string, subscriptionId: string): Promise<Payment>
  linkPointsTransaction(paymentId: string, pointsTransactionId: string): Promise<Payment>
  /** Marks the admin override and moves the row to confirmed. */
  manualConfirmPayment(paymentId: string, adminId: string, notes: string | null): Promise<StatusUpdateResult>

  /** Upsert keyed by payment_id */
  addPendingTransaction(input: PendingTransactionInput): Promise<PendingTransaction>
  getPendingTransaction(paymentId: string): Promise<PendingTransaction | null>
  /** Oldest last_checked_at first */
  getPendingTransactions(status: QueueStatus, limit: number): Promise<PendingTransaction[]>
  /** Applies the update and stamps last_checked_at. */
  updatePendingTransaction(
    paymentId: string,
    update: PendingTransactionUpdate,
  ): Promise<PendingTransaction | null>
  removePendingTransaction(paymentIdOrHash: string): Promise<boolean>

  registerWallet(userId: string, walletAddress: string, label?: string): Promise<WalletAddress>
  /** Upsert, then count one more successful payment from the wallet */
  updateWalletUsage(userId: string, walletAddress: string, amountUsdt: string): Promise<WalletAddress>
  getUserWallets(userId: string): Promise<WalletAddress[]>

  getAllPayments(filters?: PaymentFilters): Promise<Payment[]>
  getUserPayments(userId: string, filters?: Omit<PaymentFilters, "userId">): Promise<Payment[]>
  getPaymentStats(): Promise<PaymentStats>
  /** pending/scanning rows created before the cutoff */
  findExpiredPayments(cutoff: Date): Promise<Payment[]>
  /** Moves each row to expired and drops its queue entry; returns the ids that moved */
  expirePayments(paymentIds: string[]): Promise<string[]>
}

export interface PaymentStoreOptions {
  /** Minutes until an unpaid payment expires (default: 30) */
  paymentTtlMinutes?: number
  /** Default required confirmations (default: 12) */
  requiredConfirmations?: number
  now?: () => Date
}

// --- Shared helpers ---

/**
 * Validate create input at the store boundary.
 * @throws PaymentStoreError INVALID_INPUT
 */
export function validateCreatePaymentInput(input: unknown): CreatePaymentInput {
  if (!Value.Check(CreatePaymentInputSchema, input)) {
    const first = Value.Errors(CreatePaymentInputSchema, input).First()
    const where = first ? `${first.path || "/"}: ${first.message}` : "schema mismatch"
    throw new PaymentStoreError("INVALID_INPUT", `Invalid payment input (${where})`)
  }
  if (input.paymentType === "subscription" && (!input.plan || !input.duration)) {
    throw new PaymentStoreError("INVALID_INPUT", "Subscription payment requires plan and duration")
  }
  if (input.paymentType === "points" && input.pointsAmount === undefined) {
    throw new PaymentStoreError("INVALID_INPUT", "Points payment requires pointsAmount")
  }
  return input
}

export function emptyStatusCounts(): Record<PaymentStatus, number> {
  return {
    pending: 0,
    scanning: 0,
    verifying: 0,
    processing: 0,
    confirmed: 0,
    completed: 0,
    failed: 0,
    cancelled: 0,
    expired: 0,
  }
}

export function sumUsdt(amounts: string[]): string {
  return formatUsdt(amounts.reduce((acc, a) => acc + parseUsdt(a), 0n))
}

const DEFAULT_LIMIT = 50

// --- InMemory Adapter ---

export class InMemoryPaymentStore implements PaymentStore {
  private readonly payments = new Map<string, Payment>()
  private readonly queue = new Map<string, PendingTransaction>()
  private readonly wallets = new Map<string, WalletAddress>()
  private readonly ttlMs: number
  private readonly requiredConfirmations: number
  private readonly now: () => Date

  constructor(options?: PaymentStoreOptions) {
    this.ttlMs = (options?.paymentTtlMinutes ?? 30) * 60_000
    this.requiredConfirmations = options?.requiredConfirmations ?? 12
    this.now = options?.now ?? (() => new Date())
  }

  // -------------------------------------------------------------------------
  // Payments
  // -------------------------------------------------------------------------

  async createPayment(raw: CreatePaymentInput): Promise<Payment> {
    const input = validateCreatePaymentInput(raw)
    const now = this.now()
    const ids = newPaymentIds(input.userId, now)
    if (this.payments.has(ids.paymentId)) {
      throw new PaymentStoreError("DUPLICATE", `Payment ${ids.paymentId} already exists`)
    }

    const payment: Payment = {
      ...ids,
      userId: input.userId,
      userEmail: input.userEmail ?? null,
      userName: input.userName ?? null,
      paymentType: input.paymentType,
      plan: input.paymentType === "subscription" ? input.plan ?? null : null,
      duration: input.paymentType === "subscription" ? input.duration ?? null : null,
      pointsAmount: input.paymentType === "points" ? input.pointsAmount ?? null : null,
      amountUsdt: input.amountUsdt,
      amountVnd: input.amountVnd,
      usdtRate: input.usdtRate,
      fromAddress: input.fromAddress?.toLowerCase() ?? null,
      toAddress: input.toAddress.toLowerCase(),
      transactionHash: null,
      blockNumber: null,
      confirmationCount: 0,
      requiredConfirmations: input.requiredConfirmations ?? this.requiredConfirmations,
      status: "pending",
      subscriptionId: null,
      pointsTransactionId: null,
      errorMessage: null,
      manuallyProcessed: false,
      processedByAdmin: null,
      adminNotes: null,
      createdAt: now,
      updatedAt: now,
      expiresAt: new Date(now.getTime() + this.ttlMs),
      paymentReceivedAt: null,
      confirmedAt: null,
      completedAt: null,
      failedAt: null,
      cancelledAt: null,
      expiredAt: null,
    }
    this.payments.set(payment.paymentId, payment)
    return { ...payment }
  }

  async getPayment(paymentId: string): Promise<Payment | null> {
    const row = this.payments.get(paymentId)
    return row ? { ...row } : null
  }

  async getPaymentByInvoice(orderInvoiceNumber: string): Promise<Payment | null> {
    for (const row of this.payments.values()) {
      if (row.orderInvoiceNumber === orderInvoiceNumber) return { ...row }
    }
    return null
  }

  async getPaymentByTxHash(transactionHash: string): Promise<Payment | null> {
    const hash = transactionHash.toLowerCase()
    for (const row of this.payments.values()) {
      if (row.transactionHash === hash) return { ...row }
    }
    return null
  }

  async updatePaymentStatus(
    paymentId: string,
    status: PaymentStatus,
    fields: PaymentStatusFields = {},
  ): Promise<StatusUpdateResult> {
    const row = this.payments.get(paymentId)
    if (!row) return { applied: false, payment: null }
    if (!canTransition(row.status, status)) return { applied: false, payment: { ...row } }
    if (status === "completed" && !hasActivationLink(row)) {
      throw new PaymentStoreError(
        "UNLINKED_COMPLETION",
        `Payment ${paymentId} cannot complete without its activation link`,
      )
    }

    const hash = fields.transactionHash?.toLowerCase()
    if (hash !== undefined) this.assertHashFree(hash, paymentId)

    const now = this.now()
    Object.assign(row, {
      ...timestampsFor(row, status, now),
      status,
      updatedAt: now,
      ...(hash !== undefined && { transactionHash: hash }),
      ...(fields.blockNumber !== undefined && { blockNumber: fields.blockNumber }),
      ...(fields.confirmationCount !== undefined && { confirmationCount: fields.confirmationCount }),
      ...(fields.fromAddress !== undefined && { fromAddress: fields.fromAddress.toLowerCase() }),
      ...(fields.errorMessage !== undefined && { errorMessage: fields.errorMessage }),
    })
    if (isTerminal(status)) this.queue.delete(paymentId)
    return { applied: true, payment: { ...row } }
  }

  async linkSubscription(paymentId: string, subscriptionId: string): Promise<Payment> {
    const row = this.requirePayment(paymentId)
    if (row.subscriptionId !== null && row.subscriptionId !== subscriptionId) {
      throw new PaymentStoreError(
        "LINK_CONFLICT",
        `Payment ${paymentId} already linked to subscription ${row.subscriptionId}`,
      )
    }
    if (row.subscriptionId === null) {
      row.subscriptionId = subscriptionId
      row.updatedAt = this.now()
    }
    return { ...row }
  }

  async linkPointsTransaction(paymentId: string, pointsTransactionId: string): Promise<Payment> {
    const row = this.requirePayment(paymentId)
    if (row.pointsTransactionId !== null && row.pointsTransactionId !== pointsTransactionId) {
      throw new PaymentStoreError(
        "LINK_CONFLICT",
        `Payment ${paymentId} already linked to points transaction ${row.pointsTransactionId}`,
      )
    }
    if (row.pointsTransactionId === null) {
      row.pointsTransactionId = pointsTransactionId
      row.updatedAt = this.now()
    }
    return { ...row }
  }

  async manualConfirmPayment(
    paymentId: string,
    adminId: string,
    notes: string | null,
  ): Promise<StatusUpdateResult> {
    const row = this.payments.get(paymentId)
    if (!row) return { applied: false, payment: null }
    if (isTerminal(row.status)) return { applied: false, payment: { ...row } }

    const now = this.now()
    Object.assign(row, timestampsFor(row, "confirmed", now))
    row.status = "confirmed"
    row.manuallyProcessed = true
    row.processedByAdmin = adminId
    row.adminNotes = notes
    row.updatedAt = now
    return { applied: true, payment: { ...row } }
  }

  // -------------------------------------------------------------------------
  // Pending queue
  // -------------------------------------------------------------------------

  async addPendingTransaction(input: PendingTransactionInput): Promise<PendingTransaction> {
    const now = this.now()
    const existing = this.queue.get(input.paymentId)
    const entry: PendingTransaction = {
      paymentId: input.paymentId,
      userId: input.userId,
      transactionHash: input.transactionHash?.toLowerCase() ?? null,
      fromAddress: input.fromAddress?.toLowerCase() ?? null,
      toAddress: input.toAddress.toLowerCase(),
      amountUsdt: input.amountUsdt,
      firstSeenAt: existing?.firstSeenAt ?? now,
      lastCheckedAt: existing?.lastCheckedAt ?? now,
      confirmationCount: existing?.confirmationCount ?? 0,
      requiredConfirmations: input.requiredConfirmations,
      retryCount: existing?.retryCount ?? 0,
      status: input.status,
    }
    this.queue.set(input.paymentId, entry)
    return { ...entry }
  }

  async getPendingTransaction(paymentId: string): Promise<PendingTransaction | null> {
    const entry = this.queue.get(paymentId)
    return entry ? { ...entry } : null
  }

  async getPendingTransactions(status: QueueStatus, limit: number): Promise<PendingTransaction[]> {
    return [...this.queue.values()]
      .filter((e) => e.status === status)
      .sort((a, b) => a.lastCheckedAt.getTime() - b.lastCheckedAt.getTime())
      .slice(0, limit)
      .map((e) => ({ ...e }))
  }

  async updatePendingTransaction(
    paymentId: string,
    update: PendingTransactionUpdate,
  ): Promise<PendingTransaction | null> {
    const entry = this.queue.get(paymentId)
    if (!entry) return null
    Object.assign(entry, {
      lastCheckedAt: this.now(),
      ...(update.retryCount !== undefined && { retryCount: update.retryCount }),
      ...(update.confirmationCount !== undefined && { confirmationCount: update.confirmationCount }),
      ...(update.transactionHash !== undefined && { transactionHash: update.transactionHash.toLowerCase() }),
      ...(update.fromAddress !== undefined && { fromAddress: update.fromAddress.toLowerCase() }),
      ...(update.status !== undefined && { status: update.status }),
    })
    return { ...entry }
  }

  async removePendingTransaction(paymentIdOrHash: string): Promise<boolean> {
    if (this.queue.delete(paymentIdOrHash)) return true
    const hash = paymentIdOrHash.toLowerCase()
    for (const [id, entry] of this.queue) {
      if (entry.transactionHash === hash) return this.queue.delete(id)
    }
    return false
  }

  // -------------------------------------------------------------------------
  // Wallets
  // -------------------------------------------------------------------------

  async registerWallet(userId: string, walletAddress: string, label?: string): Promise<WalletAddress> {
    const address = walletAddress.toLowerCase()
    const key = walletKey(userId, address)
    const existing = this.wallets.get(key)
    if (existing) {
      if (label !== undefined) existing.label = label
      return { ...existing }
    }
    const now = this.now()
    const wallet: WalletAddress = {
      id: ulid(now.getTime()),
      userId,
      walletAddress: address,
      isVerified: false,
      label: label ?? null,
      firstUsedAt: now,
      lastUsedAt: now,
      paymentCount: 0,
      totalAmountUsdt: "0",
    }
    this.wallets.set(key, wallet)
    return { ...wallet }
  }

  async updateWalletUsage(userId: string, walletAddress: string, amountUsdt: string): Promise<WalletAddress> {
    await this.registerWallet(userId, walletAddress)
    const key = walletKey(userId, walletAddress.toLowerCase())
    const wallet = this.wallets.get(key)
    if (!wallet) throw new PaymentStoreError("NOT_FOUND", `Wallet ${walletAddress} not found`)
    wallet.paymentCount += 1
    wallet.totalAmountUsdt = sumUsdt([wallet.totalAmountUsdt, amountUsdt])
    wallet.lastUsedAt = this.now()
    wallet.isVerified = true
    return { ...wallet }
  }

  async getUserWallets(userId: string): Promise<WalletAddress[]> {
    return [...this.wallets.values()]
      .filter((w) => w.userId === userId)
      .sort((a, b) => b.lastUsedAt.getTime() - a.lastUsedAt.getTime())
      .map((w) => ({ ...w }))
  }

  // -------------------------------------------------------------------------
  // Queries
  // -------------------------------------------------------------------------

  async getAllPayments(filters: PaymentFilters = {}): Promise<Payment[]> {
    const offset = filters.offset ?? 0
    const limit = filters.limit ?? DEFAULT_LIMIT
    return [...this.payments.values()]
      .filter((p) => filters.status === undefined || p.status === filters.status)
      .filter((p) => filters.paymentType === undefined || p.paymentType === filters.paymentType)
      .filter((p) => filters.userId === undefined || p.userId === filters.userId)
      .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime())
      .slice(offset, offset + limit)
      .map((p) => ({ ...p }))
  }

  async getUserPayments(
    userId: string,
    filters: Omit<PaymentFilters, "userId"> = {},
  ): Promise<Payment[]> {
    return this.getAllPayments({ ...filters, userId })
  }

  async getPaymentStats(): Promise<PaymentStats> {
    const byStatus = emptyStatusCounts()
    const completed: string[] = []
    for (const p of this.payments.values()) {
      byStatus[p.status] += 1
      if (p.status === "completed") completed.push(p.amountUsdt)
    }
    return { total: this.payments.size, byStatus, totalCompletedUsdt: sumUsdt(completed) }
  }

  async findExpiredPayments(cutoff: Date): Promise<Payment[]> {
    return [...this.payments.values()]
      .filter((p) => EXPIRABLE_STATUSES.includes(p.status) && p.createdAt.getTime() < cutoff.getTime())
      .map((p) => ({ ...p }))
  }

  async expirePayments(paymentIds: string[]): Promise<string[]> {
    const moved: string[] = []
    for (const id of paymentIds) {
      const row = this.payments.get(id)
      if (!row || !EXPIRABLE_STATUSES.includes(row.status)) continue
      const result = await this.updatePaymentStatus(id, "expired", {
        errorMessage: "Payment expired before a transfer was found",
      })
      if (result.applied) moved.push(id)
    }
    return moved
  }

  // -------------------------------------------------------------------------
  // Internals
  // -------------------------------------------------------------------------

  private requirePayment(paymentId: string): Payment {
    const row = this.payments.get(paymentId)
    if (!row) throw new PaymentStoreError("NOT_FOUND", `Payment ${paymentId} not found`)
    return row
  }

  private assertHashFree(hash: string, paymentId: string): void {
    for (const row of this.payments.values()) {
      if (row.transactionHash === hash && row.paymentId !== paymentId) {
        throw new PaymentStoreError(
          "DUPLICATE",
          `Transaction ${hash} already belongs to payment ${row.paymentId}`,
        )
      }
    }
  }
}

function walletKey(userId: string, address: string): string {
  return `${userId}:${address}`
}
