// src/verification/verification-job.ts — Periodic USDT payment verification sweep
//
// One run = three sweeps in order:
// 1. expiry    pending/scanning payments older than the TTL → expired
// 2. scanning  find an on-chain transfer for payments without a hash
// 3. pending   wait for confirmations, verify the receipt, activate
//
// Only "not found" and "not mined" outcomes consume the per-payment retry
// budget. Chain-unavailable outcomes leave the entry untouched apart from
// last_checked_at and are counted per run; expiry still bounds the wait.
// Items run in batches of `sweepConcurrency`; an item failure is logged and
// never aborts the sweep. A store failure outside an item fails the run.

import type { ChainReader } from "../chain/chain-reader.js"
import type { ActivationDispatcher } from "../activation/dispatcher.js"
import type { PaymentNotifier } from "../notify/webhook-notifier.js"
import type { PaymentStore } from "../payments/store.js"
import { isTerminal } from "../payments/transitions.js"
import {
  PaymentStoreError,
  type Payment,
  type PaymentStatus,
  type PaymentStatusFields,
  type PendingTransaction,
} from "../payments/types.js"
import { consoleLogger, errorMessage, type Logger } from "../shared/logger.js"
import { verifyTransfer } from "./transfer-verifier.js"

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface VerificationJobConfig {
  /** Business retry budget per payment phase (default: 20) */
  maxRetries: number
  /** Minutes before an unpaid payment expires (default: 30) */
  paymentTtlMinutes: number
  /** Absolute receipt tolerance in USDT (default: "0.01") */
  amountToleranceUsdt: string
  /** Relative tolerance when scanning for a transfer (default: 0.01) */
  scanToleranceFraction: number
  /** Blocks searched back from the chain head (default: 1000) */
  maxBlocksToScan: number
  /** Items processed in parallel within a sweep (default: 4) */
  sweepConcurrency: number
  /** Queue entries loaded per sweep (default: 100) */
  batchSize: number
  /** USDT contract (default: BSC mainnet USDT) */
  tokenAddress?: string
}

export const DEFAULT_VERIFICATION_CONFIG: VerificationJobConfig = {
  maxRetries: 20,
  paymentTtlMinutes: 30,
  amountToleranceUsdt: "0.01",
  scanToleranceFraction: 0.01,
  maxBlocksToScan: 1000,
  sweepConcurrency: 4,
  batchSize: 100,
}

export interface VerificationJobDeps {
  store: PaymentStore
  chain: ChainReader
  dispatcher: Pick<ActivationDispatcher, "activate">
  notifier?: PaymentNotifier
  config?: Partial<VerificationJobConfig>
  logger?: Logger
  now?: () => Date
}

export interface SweepStats {
  expired: number
  scanned: number
  found: number
  checked: number
  confirmed: number
  completed: number
  failed: number
  cancelled: number
  retried: number
  /** Chain reads that came back unavailable */
  unavailable: number
  activationFailures: number
  /** Items that threw */
  errors: number
}

export const FAILURE_MESSAGES = {
  noTransferFound: "No matching transaction found after maximum retries",
  notMined: "Transaction not mined after maximum retries",
  expiredNotMined: "Payment expired - transaction not mined",
} as const

function emptyStats(): SweepStats {
  return {
    expired: 0,
    scanned: 0,
    found: 0,
    checked: 0,
    confirmed: 0,
    completed: 0,
    failed: 0,
    cancelled: 0,
    retried: 0,
    unavailable: 0,
    activationFailures: 0,
    errors: 0,
  }
}

// ---------------------------------------------------------------------------
// Verification Job
// ---------------------------------------------------------------------------

export class VerificationJob {
  private readonly store: PaymentStore
  private readonly chain: ChainReader
  private readonly dispatcher: Pick<ActivationDispatcher, "activate">
  private readonly notifier: PaymentNotifier | undefined
  private readonly config: VerificationJobConfig
  private readonly logger: Logger
  private readonly now: () => Date

  constructor(deps: VerificationJobDeps) {
    this.store = deps.store
    this.chain = deps.chain
    this.dispatcher = deps.dispatcher
    this.notifier = deps.notifier
    this.config = { ...DEFAULT_VERIFICATION_CONFIG, ...deps.config }
    this.logger = deps.logger ?? consoleLogger
    this.now = deps.now ?? (() => new Date())
  }

  /** Run one full sweep. Throws only when the store fails outside an item. */
  async runOnce(): Promise<SweepStats> {
    const stats = emptyStats()
    await this.expireSweep(stats)
    await this.scanningSweep(stats)
    await this.pendingSweep(stats)

    const touched = stats.expired + stats.scanned + stats.checked
    if (touched > 0) {
      this.logger.info("[verification] sweep complete", { ...stats })
    }
    return stats
  }

  // -------------------------------------------------------------------------
  // Sweeps
  // -------------------------------------------------------------------------

  async expireSweep(stats: SweepStats = emptyStats()): Promise<SweepStats> {
    const cutoff = new Date(this.now().getTime() - this.config.paymentTtlMinutes * 60_000)
    const candidates = await this.store.findExpiredPayments(cutoff)
    if (candidates.length === 0) return stats

    const moved = await this.store.expirePayments(candidates.map((p) => p.paymentId))
    stats.expired += moved.length

    for (const id of moved) {
      const before = candidates.find((p) => p.paymentId === id)
      const after = await this.store.getPayment(id)
      if (before && after) this.notifier?.notify(after, before.status)
    }
    if (moved.length > 0) {
      this.logger.info("[verification] expired unpaid payments", { count: moved.length, paymentIds: moved })
    }
    return stats
  }

  async scanningSweep(stats: SweepStats = emptyStats()): Promise<SweepStats> {
    const entries = await this.store.getPendingTransactions("scanning", this.config.batchSize)
    await this.forEachBounded(entries, stats, (entry) => this.processScanning(entry, stats))
    return stats
  }

  async pendingSweep(stats: SweepStats = emptyStats()): Promise<SweepStats> {
    const entries = await this.store.getPendingTransactions("pending", this.config.batchSize)
    await this.forEachBounded(entries, stats, (entry) => this.processPending(entry, stats))
    return stats
  }

  // -------------------------------------------------------------------------
  // Scanning
  // -------------------------------------------------------------------------

  private async processScanning(entry: PendingTransaction, stats: SweepStats): Promise<void> {
    const payment = await this.loadActive(entry, stats)
    if (!payment) return
    stats.scanned++

    // A hash recorded on the payment but not the entry means the previous
    // sweep stopped between the two writes
    if (payment.transactionHash !== null) {
      await this.store.updatePendingTransaction(entry.paymentId, {
        transactionHash: payment.transactionHash,
        status: "pending",
        retryCount: 0,
      })
      return
    }

    const result = await this.chain.findTransfer({
      fromAddress: entry.fromAddress,
      toAddress: entry.toAddress,
      expectedAmountUsdt: entry.amountUsdt,
      toleranceFraction: this.config.scanToleranceFraction,
      maxBlocksToScan: this.config.maxBlocksToScan,
      isClaimed: async (txHash) => {
        const owner = await this.store.getPaymentByTxHash(txHash)
        return owner !== null && owner.paymentId !== entry.paymentId
      },
    })

    if (result.kind === "unavailable") {
      stats.unavailable++
      await this.store.updatePendingTransaction(entry.paymentId, {})
      this.logger.warn("[verification] chain unavailable while scanning", {
        paymentId: entry.paymentId,
        error: result.error,
      })
      return
    }

    if (result.kind === "not_found") {
      await this.consumeRetry(payment, entry, stats, FAILURE_MESSAGES.noTransferFound)
      return
    }

    const match = result.value
    let updated: Payment | null
    try {
      updated = await this.transition(payment, "verifying", {
        transactionHash: match.transactionHash,
        blockNumber: Number(match.blockNumber),
        confirmationCount: match.confirmations,
        fromAddress: match.from,
      })
    } catch (err) {
      // Claimed by another payment between the scan and the write
      if (err instanceof PaymentStoreError && err.code === "DUPLICATE") {
        await this.consumeRetry(payment, entry, stats, FAILURE_MESSAGES.noTransferFound)
        return
      }
      throw err
    }
    if (!updated) return

    await this.store.updatePendingTransaction(entry.paymentId, {
      transactionHash: match.transactionHash,
      fromAddress: match.from,
      confirmationCount: match.confirmations,
      status: "pending",
      retryCount: 0,
    })
    stats.found++
    this.logger.info("[verification] transfer found", {
      paymentId: entry.paymentId,
      txHash: match.transactionHash,
      amountUsdt: match.amountUsdt,
      confirmations: match.confirmations,
    })
  }

  // -------------------------------------------------------------------------
  // Pending / verifying
  // -------------------------------------------------------------------------

  private async processPending(entry: PendingTransaction, stats: SweepStats): Promise<void> {
    const loaded = await this.loadActive(entry, stats)
    if (!loaded) return
    let payment: Payment = loaded
    stats.checked++

    const txHash = entry.transactionHash ?? payment.transactionHash
    if (txHash === null) {
      // Nothing to confirm: send it back to scanning
      await this.store.updatePendingTransaction(entry.paymentId, { status: "scanning", retryCount: 0 })
      return
    }

    const confirmations = await this.chain.getConfirmations(txHash)
    if (confirmations < 0) {
      stats.unavailable++
      await this.store.updatePendingTransaction(entry.paymentId, {})
      return
    }
    if (confirmations === 0) {
      await this.handleNotMined(payment, entry, stats)
      return
    }

    const receipt = await this.chain.getReceipt(txHash)
    if (receipt.kind === "unavailable") {
      stats.unavailable++
      await this.store.updatePendingTransaction(entry.paymentId, {})
      return
    }
    if (receipt.kind === "not_found") {
      // Dropped between the two reads (reorg)
      await this.handleNotMined(payment, entry, stats)
      return
    }

    if (receipt.value.status === "reverted") {
      await this.fail(payment, stats, "Blockchain transaction failed: transaction reverted", {
        confirmationCount: confirmations,
        blockNumber: Number(receipt.value.blockNumber),
      })
      return
    }

    const blockNumber = Number(receipt.value.blockNumber)

    if (payment.status === "verifying") {
      const received = await this.transition(payment, "processing", {
        confirmationCount: confirmations,
        blockNumber,
        transactionHash: txHash,
      })
      if (!received) return
      payment = received
    }

    if (confirmations < entry.requiredConfirmations) {
      if (payment.confirmationCount !== confirmations) {
        await this.store.updatePaymentStatus(payment.paymentId, payment.status, {
          confirmationCount: confirmations,
        })
      }
      await this.store.updatePendingTransaction(entry.paymentId, { confirmationCount: confirmations })
      return
    }

    const verdict = verifyTransfer(receipt.value, {
      recipient: payment.toAddress,
      amountUsdt: payment.amountUsdt,
      toleranceUsdt: this.config.amountToleranceUsdt,
      tokenAddress: this.config.tokenAddress,
    })
    if (!verdict.valid) {
      await this.fail(payment, stats, `Invalid transfer: ${verdict.reason}`, {
        confirmationCount: confirmations,
        blockNumber,
      })
      return
    }

    const confirmed = await this.transition(payment, "confirmed", {
      confirmationCount: confirmations,
      blockNumber,
      fromAddress: verdict.details.sender,
    })
    if (!confirmed) return
    stats.confirmed++
    await this.store.updatePendingTransaction(entry.paymentId, { confirmationCount: confirmations })

    await this.finishActivation(confirmed, stats)
  }

  private async handleNotMined(payment: Payment, entry: PendingTransaction, stats: SweepStats): Promise<void> {
    if (this.now().getTime() > payment.expiresAt.getTime()) {
      const cancelled = await this.transition(payment, "cancelled", {
        errorMessage: FAILURE_MESSAGES.expiredNotMined,
      })
      if (cancelled) stats.cancelled++
      return
    }
    await this.consumeRetry(payment, entry, stats, FAILURE_MESSAGES.notMined)
  }

  // -------------------------------------------------------------------------
  // Activation
  // -------------------------------------------------------------------------

  /** Dispatch and complete; on dispatch failure the payment stays confirmed. */
  private async finishActivation(payment: Payment, stats: SweepStats): Promise<void> {
    try {
      await this.dispatcher.activate(payment.paymentId)
    } catch (err) {
      stats.activationFailures++
      await this.store.updatePendingTransaction(payment.paymentId, {})
      this.logger.warn("[verification] activation failed, will retry next sweep", {
        paymentId: payment.paymentId,
        error: errorMessage(err),
      })
      return
    }

    // Re-read: the dispatcher linked the side effect
    const linked = await this.store.getPayment(payment.paymentId)
    if (!linked) return
    const completed = await this.transition(linked, "completed")
    if (!completed) return
    stats.completed++
    this.logger.info("[verification] payment completed", {
      paymentId: completed.paymentId,
      userId: completed.userId,
      paymentType: completed.paymentType,
      txHash: completed.transactionHash,
    })

    if (completed.fromAddress !== null) {
      try {
        await this.store.updateWalletUsage(completed.userId, completed.fromAddress, completed.amountUsdt)
      } catch (err) {
        this.logger.error("[verification] wallet usage update failed", {
          paymentId: completed.paymentId,
          error: errorMessage(err),
        })
      }
    }
  }

  // -------------------------------------------------------------------------
  // Helpers
  // -------------------------------------------------------------------------

  /**
   * Load the entry's payment. Missing or terminal payments lose their entry;
   * confirmed payments retry activation without chain reads. Returns the
   * payment only when chain work is still needed.
   */
  private async loadActive(entry: PendingTransaction, stats: SweepStats): Promise<Payment | null> {
    const payment = await this.store.getPayment(entry.paymentId)
    if (!payment || isTerminal(payment.status)) {
      await this.store.removePendingTransaction(entry.paymentId)
      return null
    }
    if (payment.status === "confirmed") {
      await this.finishActivation(payment, stats)
      return null
    }
    return payment
  }

  private async consumeRetry(
    payment: Payment,
    entry: PendingTransaction,
    stats: SweepStats,
    message: string,
  ): Promise<void> {
    const retryCount = entry.retryCount + 1
    if (retryCount >= this.config.maxRetries) {
      await this.fail(payment, stats, message)
      return
    }
    stats.retried++
    await this.store.updatePendingTransaction(entry.paymentId, { retryCount })
  }

  private async fail(
    payment: Payment,
    stats: SweepStats,
    message: string,
    fields: PaymentStatusFields = {},
  ): Promise<void> {
    const failed = await this.transition(payment, "failed", { ...fields, errorMessage: message })
    if (!failed) return
    stats.failed++
    this.logger.warn("[verification] payment failed", {
      paymentId: payment.paymentId,
      txHash: failed.transactionHash,
      reason: message,
    })
  }

  /** Status update + webhook. Returns the new row, or null when the store declined. */
  private async transition(
    payment: Payment,
    status: PaymentStatus,
    fields?: PaymentStatusFields,
  ): Promise<Payment | null> {
    const result = await this.store.updatePaymentStatus(payment.paymentId, status, fields)
    if (!result.applied || !result.payment) return null
    if (payment.status !== status) {
      this.notifier?.notify(result.payment, payment.status)
    }
    return result.payment
  }

  private async forEachBounded(
    entries: PendingTransaction[],
    stats: SweepStats,
    fn: (entry: PendingTransaction) => Promise<void>,
  ): Promise<void> {
    const cap = Math.max(1, this.config.sweepConcurrency)
    for (let i = 0; i < entries.length; i += cap) {
      const batch = entries.slice(i, i + cap)
      const results = await Promise.allSettled(batch.map((entry) => fn(entry)))

      results.forEach((result, idx) => {
        if (result.status === "rejected") {
          stats.errors++
          this.logger.error("[verification] item failed", {
            paymentId: batch[idx].paymentId,
            error: errorMessage(result.reason),
          })
        }
      })
    }
  }
}
