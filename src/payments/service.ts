// src/payments/service.ts — Inbound payment operations (create, status, hash, scan, admin)
//
// Sits between the HTTP routes and the PaymentStore. Prices come from
// Pricing and are frozen on the payment; the verification job does all chain
// verification, this service only registers work for it. The admin override
// goes through the ActivationDispatcher like every other completion.

import type { ActivationDispatcher } from "../activation/dispatcher.js"
import type { ActivationResult } from "../activation/types.js"
import type { ChainReader } from "../chain/chain-reader.js"
import { parseUsdt } from "../chain/denomination.js"
import { USDT_BSC_ADDRESS } from "../chain/types.js"
import type { PaymentNotifier } from "../notify/webhook-notifier.js"
import { consoleLogger, errorMessage, type Logger } from "../shared/logger.js"
import type { Pricing, PlanPrice, PointsPackage, Quote } from "./pricing.js"
import type { PaymentStore } from "./store.js"
import { isTerminal } from "./transitions.js"
import {
  PaymentError,
  PaymentStoreError,
  type CreatePaymentInput,
  type Duration,
  type Payment,
  type PaymentFilters,
  type PaymentStats,
  type PaymentStatus,
  type PlanId,
} from "./types.js"

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

const TX_HASH_PATTERN = /^0x[0-9a-fA-F]{64}$/

export const NETWORK = "BSC"

export interface PaymentServiceConfig {
  /** Platform wallet that receives every payment */
  receivingAddress: string
  tokenAddress?: string
  requiredConfirmations: number
  /** Reject creation when the declared wallet holds less than the amount (default: true) */
  checkBalance?: boolean
}

export interface PaymentServiceDeps {
  store: PaymentStore
  pricing: Pricing
  chain: Pick<ChainReader, "getBalance">
  dispatcher: Pick<ActivationDispatcher, "activate">
  notifier?: PaymentNotifier
  config: PaymentServiceConfig
  logger?: Logger
  now?: () => Date
}

interface Payer {
  userId: string
  userEmail?: string
  userName?: string
  fromAddress?: string
}

export interface CreateSubscriptionPaymentRequest extends Payer {
  plan: PlanId
  duration: Duration
}

export interface CreatePointsPaymentRequest extends Payer {
  points: number
}

export interface CreatedPayment {
  payment: Payment
  network: typeof NETWORK
  tokenContract: string
  instructions: string
}

export interface PaymentStatusView {
  payment: Payment
  message: string
}

export interface SubmitHashResult {
  payment: Payment
  /** The payment already carried a hash; nothing changed */
  alreadyRegistered: boolean
}

export interface ConfirmSentResult {
  payment: Payment
  /** Nothing changed: the payment was already scanning or further along */
  unchanged: boolean
}

export interface ManualConfirmResult {
  payment: Payment
  activation: ActivationResult | null
  alreadyCompleted: boolean
}

/** Human-readable line shown next to a payment's status. */
export function statusMessage(payment: Payment): string {
  switch (payment.status) {
    case "pending":
      return "Awaiting payment. Please send USDT to the provided address."
    case "scanning":
      return "Scanning the blockchain for your transfer."
    case "verifying":
    case "processing":
      return `Transaction detected! Confirmations: ${payment.confirmationCount}/${payment.requiredConfirmations}`
    case "confirmed":
      return payment.paymentType === "subscription"
        ? "Payment confirmed! Activating subscription..."
        : "Payment confirmed! Adding points..."
    case "completed":
      return payment.paymentType === "subscription"
        ? "Payment completed and subscription activated!"
        : "Payment completed and points added!"
    case "failed":
      return `Payment failed: ${payment.errorMessage ?? "Unknown error"}`
    case "cancelled":
    case "expired":
      return "Payment cancelled or expired"
  }
}

// ---------------------------------------------------------------------------
// Payment Service
// ---------------------------------------------------------------------------

export class PaymentService {
  private readonly store: PaymentStore
  private readonly pricing: Pricing
  private readonly chain: Pick<ChainReader, "getBalance">
  private readonly dispatcher: Pick<ActivationDispatcher, "activate">
  private readonly notifier: PaymentNotifier | undefined
  private readonly config: PaymentServiceConfig
  private readonly tokenAddress: string
  private readonly logger: Logger
  private readonly now: () => Date

  constructor(deps: PaymentServiceDeps) {
    this.store = deps.store
    this.pricing = deps.pricing
    this.chain = deps.chain
    this.dispatcher = deps.dispatcher
    this.notifier = deps.notifier
    this.config = deps.config
    this.tokenAddress = deps.config.tokenAddress ?? USDT_BSC_ADDRESS
    this.logger = deps.logger ?? consoleLogger
    this.now = deps.now ?? (() => new Date())
  }

  // --- Create ---

  async createSubscriptionPayment(req: CreateSubscriptionPaymentRequest): Promise<CreatedPayment> {
    const quote = this.pricing.quotePlan(req.plan, req.duration)
    return this.create(req, quote, {
      paymentType: "subscription",
      plan: req.plan,
      duration: req.duration,
    })
  }

  async createPointsPayment(req: CreatePointsPaymentRequest): Promise<CreatedPayment> {
    const quote = this.pricing.quotePoints(req.points)
    return this.create(req, quote, { paymentType: "points", pointsAmount: req.points })
  }

  pricingTable(): { usdtRate: number; plans: PlanPrice[]; pointsPackages: PointsPackage[] } {
    return {
      usdtRate: this.pricing.rate,
      plans: this.pricing.planPrices(),
      pointsPackages: this.pricing.pointsPackages(),
    }
  }

  // --- Read ---

  /** @throws PaymentError PAYMENT_NOT_FOUND / FORBIDDEN */
  async getPayment(paymentId: string, userId: string): Promise<PaymentStatusView> {
    const payment = await this.ownedPayment(paymentId, userId)
    return { payment, message: statusMessage(payment) }
  }

  async getUserPayments(userId: string, filters?: Omit<PaymentFilters, "userId">): Promise<Payment[]> {
    return this.store.getUserPayments(userId, filters)
  }

  async listPayments(filters?: PaymentFilters): Promise<Payment[]> {
    return this.store.getAllPayments(filters)
  }

  async getStats(): Promise<PaymentStats> {
    return this.store.getPaymentStats()
  }

  // --- User actions ---

  /**
   * Register the hash the user pasted; the verification job takes it from here.
   * Re-submitting for a payment that already has a hash is a no-op.
   */
  async submitTransactionHash(paymentId: string, userId: string, rawHash: string): Promise<SubmitHashResult> {
    if (!TX_HASH_PATTERN.test(rawHash)) {
      throw new PaymentError("INVALID_TRANSACTION_HASH", "Transaction hash must be 0x followed by 64 hex characters")
    }
    const hash = rawHash.toLowerCase()

    const payment = await this.ownedPayment(paymentId, userId)
    if (payment.transactionHash) {
      return { payment, alreadyRegistered: true }
    }
    this.assertOpen(payment)

    const other = await this.store.getPaymentByTxHash(hash)
    if (other && other.paymentId !== paymentId) {
      throw new PaymentError("DUPLICATE_TRANSACTION", "Transaction already used for another payment")
    }

    let updated: Payment
    try {
      updated = await this.transition(payment, "verifying", { transactionHash: hash })
    } catch (err) {
      if (err instanceof PaymentStoreError && err.code === "DUPLICATE") {
        throw new PaymentError("DUPLICATE_TRANSACTION", "Transaction already used for another payment")
      }
      throw err
    }

    const entry = await this.store.getPendingTransaction(paymentId)
    if (entry) {
      await this.store.updatePendingTransaction(paymentId, {
        transactionHash: hash,
        status: "pending",
        retryCount: 0,
      })
    } else {
      await this.store.addPendingTransaction({
        paymentId,
        userId: payment.userId,
        transactionHash: hash,
        fromAddress: payment.fromAddress,
        toAddress: payment.toAddress,
        amountUsdt: payment.amountUsdt,
        requiredConfirmations: payment.requiredConfirmations,
        status: "pending",
      })
    }

    this.logger.info("[usdt] transaction hash registered", { paymentId, transactionHash: hash })
    return { payment: updated, alreadyRegistered: false }
  }

  /** The user says the transfer was sent: start scanning recent blocks for it. */
  async confirmSent(paymentId: string, userId: string): Promise<ConfirmSentResult> {
    const payment = await this.ownedPayment(paymentId, userId)
    if (payment.status !== "pending") {
      if (payment.status === "completed" || payment.status === "scanning" || payment.transactionHash) {
        return { payment, unchanged: true }
      }
      this.assertOpen(payment)
      throw new PaymentError("INVALID_STATE", `Cannot start scanning a payment in status: ${payment.status}`)
    }
    this.assertOpen(payment)

    const updated = await this.transition(payment, "scanning")
    await this.store.addPendingTransaction({
      paymentId,
      userId: payment.userId,
      transactionHash: null,
      fromAddress: payment.fromAddress,
      toAddress: payment.toAddress,
      amountUsdt: payment.amountUsdt,
      requiredConfirmations: payment.requiredConfirmations,
      status: "scanning",
    })

    this.logger.info("[usdt] blockchain scanning started", { paymentId })
    return { payment: updated, unchanged: false }
  }

  // --- Admin ---

  /**
   * Admin override: mark confirmed, activate once, complete.
   * @throws ActivationError when the collaborator fails; the payment stays confirmed
   * with a queue entry, so the verification job retries the activation
   */
  async manualConfirm(paymentId: string, adminId: string, notes: string | null): Promise<ManualConfirmResult> {
    const before = await this.store.getPayment(paymentId)
    if (!before) {
      throw new PaymentError("PAYMENT_NOT_FOUND", "Payment not found")
    }
    if (before.status === "completed") {
      return { payment: before, activation: null, alreadyCompleted: true }
    }
    if (isTerminal(before.status)) {
      throw new PaymentError("INVALID_STATE", `Cannot confirm a payment in status: ${before.status}`)
    }

    const confirmed = await this.store.manualConfirmPayment(paymentId, adminId, notes)
    if (!confirmed.payment) {
      throw new PaymentError("PAYMENT_NOT_FOUND", "Payment not found")
    }
    if (!confirmed.applied) {
      if (confirmed.payment.status === "completed") {
        return { payment: confirmed.payment, activation: null, alreadyCompleted: true }
      }
      throw new PaymentError("INVALID_STATE", `Cannot confirm a payment in status: ${confirmed.payment.status}`)
    }
    if (before.status !== "confirmed") this.notifier?.notify(confirmed.payment, before.status)
    this.logger.info("[usdt] payment manually confirmed", { paymentId, adminId })

    await this.ensureQueued(confirmed.payment)
    const activation = await this.dispatcher.activate(paymentId)
    const completed = await this.transition(confirmed.payment, "completed")
    if (completed.fromAddress) {
      try {
        await this.store.updateWalletUsage(completed.userId, completed.fromAddress, completed.amountUsdt)
      } catch (err) {
        this.logger.error("[usdt] wallet usage update failed", { paymentId, error: errorMessage(err) })
      }
    }

    return { payment: completed, activation, alreadyCompleted: false }
  }

  // ---------------------------------------------------------------------------
  // Internals
  // ---------------------------------------------------------------------------

  private async create(
    payer: Payer,
    quote: Quote,
    product: Pick<CreatePaymentInput, "paymentType" | "plan" | "duration" | "pointsAmount">,
  ): Promise<CreatedPayment> {
    if (payer.fromAddress && this.config.checkBalance !== false) {
      await this.assertBalance(payer.fromAddress, quote.amountUsdt)
    }

    const payment = await this.store.createPayment({
      userId: payer.userId,
      userEmail: payer.userEmail,
      userName: payer.userName,
      ...product,
      amountUsdt: quote.amountUsdt,
      amountVnd: quote.amountVnd,
      usdtRate: quote.usdtRate,
      fromAddress: payer.fromAddress,
      toAddress: this.config.receivingAddress,
      requiredConfirmations: this.config.requiredConfirmations,
    })

    if (payer.fromAddress) {
      try {
        await this.store.registerWallet(payer.userId, payer.fromAddress)
      } catch (err) {
        this.logger.warn("[usdt] wallet registration failed", {
          paymentId: payment.paymentId,
          error: errorMessage(err),
        })
      }
    }

    this.logger.info("[usdt] payment created", {
      paymentId: payment.paymentId,
      paymentType: payment.paymentType,
      amountUsdt: payment.amountUsdt,
    })
    this.notifier?.notify(payment, null)

    return {
      payment,
      network: NETWORK,
      tokenContract: this.tokenAddress,
      instructions:
        `Send exactly ${payment.amountUsdt} USDT (BEP20) to ${payment.toAddress}. ` +
        `Payment is confirmed after ${payment.requiredConfirmations} block confirmations.`,
    }
  }

  /** @throws ChainUnavailableError when the balance cannot be read */
  private async assertBalance(fromAddress: string, amountUsdt: string): Promise<void> {
    const balance = await this.chain.getBalance(fromAddress)
    if (parseUsdt(balance) < parseUsdt(amountUsdt)) {
      throw new PaymentError(
        "INSUFFICIENT_BALANCE",
        `Insufficient USDT balance in wallet ${fromAddress}: required ${amountUsdt}, available ${balance}`,
      )
    }
  }

  private async ownedPayment(paymentId: string, userId: string): Promise<Payment> {
    const payment = await this.store.getPayment(paymentId)
    if (!payment) {
      throw new PaymentError("PAYMENT_NOT_FOUND", "Payment not found")
    }
    if (payment.userId !== userId) {
      throw new PaymentError("FORBIDDEN", "Not authorized to access this payment")
    }
    return payment
  }

  /** @throws PaymentError PAYMENT_EXPIRED / INVALID_STATE for closed payments */
  private assertOpen(payment: Payment): void {
    if (payment.status === "expired" || (payment.status === "pending" && this.now() > payment.expiresAt)) {
      throw new PaymentError("PAYMENT_EXPIRED", "Payment has expired")
    }
    if (isTerminal(payment.status)) {
      throw new PaymentError("INVALID_STATE", `Payment is already ${payment.status}`)
    }
  }

  /** A confirmed payment needs a queue entry for the sweep to retry its activation. */
  private async ensureQueued(payment: Payment): Promise<void> {
    if (await this.store.getPendingTransaction(payment.paymentId)) return
    await this.store.addPendingTransaction({
      paymentId: payment.paymentId,
      userId: payment.userId,
      transactionHash: payment.transactionHash,
      fromAddress: payment.fromAddress,
      toAddress: payment.toAddress,
      amountUsdt: payment.amountUsdt,
      requiredConfirmations: payment.requiredConfirmations,
      status: payment.transactionHash ? "pending" : "scanning",
    })
  }

  private async transition(
    payment: Payment,
    status: PaymentStatus,
    fields?: { transactionHash?: string },
  ): Promise<Payment> {
    const result = await this.store.updatePaymentStatus(payment.paymentId, status, fields)
    if (!result.payment) {
      throw new PaymentError("PAYMENT_NOT_FOUND", "Payment not found")
    }
    if (!result.applied) {
      throw new PaymentError("INVALID_STATE", `Cannot move payment from ${result.payment.status} to ${status}`)
    }
    if (result.payment.status !== payment.status) {
      this.notifier?.notify(result.payment, payment.status)
    }
    return result.payment
  }
}
