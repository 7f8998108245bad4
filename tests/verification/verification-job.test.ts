// tests/verification/verification-job.test.ts — Sweep scenarios against the in-memory store and a fake chain

import { describe, it, expect } from "vitest"
import { ActivationDispatcher } from "../../src/activation/dispatcher.js"
import { InMemoryPaymentStore } from "../../src/payments/store.js"
import type { Payment } from "../../src/payments/types.js"
import { FAILURE_MESSAGES, VerificationJob } from "../../src/verification/verification-job.js"
import {
  FakeChainReader,
  FakePointsService,
  FakeSubscriptionService,
  ManualClock,
  PAYER,
  PLATFORM,
  RecordingNotifier,
  createRecordingLogger,
  txHash,
  usdtReceipt,
} from "../helpers/fakes.js"

// ---------------------------------------------------------------------------
// Harness
// ---------------------------------------------------------------------------

function setup() {
  const clock = new ManualClock()
  const store = new InMemoryPaymentStore({ now: clock.now, requiredConfirmations: 3 })
  const chain = new FakeChainReader()
  const subscriptions = new FakeSubscriptionService()
  const points = new FakePointsService()
  const logger = createRecordingLogger()
  const notifier = new RecordingNotifier()
  const dispatcher = new ActivationDispatcher({ store, subscriptions, points, logger })
  const job = new VerificationJob({
    store,
    chain,
    dispatcher,
    notifier,
    logger,
    now: clock.now,
    config: { maxRetries: 3 },
  })
  return { clock, store, chain, subscriptions, points, logger, notifier, job }
}

type Harness = ReturnType<typeof setup>

function subscriptionPayment(h: Harness): Promise<Payment> {
  return h.store.createPayment({
    userId: "user-1",
    paymentType: "subscription",
    plan: "premium",
    duration: "3_months",
    amountUsdt: "12.50",
    amountVnd: 279000,
    usdtRate: 22320,
    toAddress: PLATFORM,
  })
}

function pointsPayment(h: Harness): Promise<Payment> {
  return h.store.createPayment({
    userId: "user-2",
    paymentType: "points",
    pointsAmount: 100,
    amountUsdt: "4.25",
    amountVnd: 95000,
    usdtRate: 22320,
    toAddress: PLATFORM,
  })
}

async function startScanning(h: Harness, payment: Payment): Promise<void> {
  await h.store.updatePaymentStatus(payment.paymentId, "scanning")
  await h.store.addPendingTransaction({
    paymentId: payment.paymentId,
    userId: payment.userId,
    transactionHash: null,
    fromAddress: null,
    toAddress: payment.toAddress,
    amountUsdt: payment.amountUsdt,
    requiredConfirmations: payment.requiredConfirmations,
    status: "scanning",
  })
}

async function submitHash(h: Harness, payment: Payment, hash: string): Promise<void> {
  await h.store.updatePaymentStatus(payment.paymentId, "verifying", { transactionHash: hash })
  await h.store.addPendingTransaction({
    paymentId: payment.paymentId,
    userId: payment.userId,
    transactionHash: hash,
    fromAddress: null,
    toAddress: payment.toAddress,
    amountUsdt: payment.amountUsdt,
    requiredConfirmations: payment.requiredConfirmations,
    status: "pending",
  })
}

async function reload(h: Harness, payment: Payment): Promise<Payment> {
  const row = await h.store.getPayment(payment.paymentId)
  if (!row) throw new Error(`payment ${payment.paymentId} vanished`)
  return row
}

// ---------------------------------------------------------------------------
// Happy paths
// ---------------------------------------------------------------------------

describe("VerificationJob: scanning path", () => {
  it("finds, confirms and completes a subscription payment in one run", async () => {
    const h = setup()
    const payment = await subscriptionPayment(h)
    await startScanning(h, payment)
    h.chain.mine(
      usdtReceipt({ hash: txHash(1), amountUsdt: "12.5", blockNumber: 990n }),
      { from: PAYER, to: PLATFORM, amountUsdt: "12.5" },
    )

    const stats = await h.job.runOnce()

    expect(stats).toEqual({
      expired: 0,
      scanned: 1,
      found: 1,
      checked: 1,
      confirmed: 1,
      completed: 1,
      failed: 0,
      cancelled: 0,
      retried: 0,
      unavailable: 0,
      activationFailures: 0,
      errors: 0,
    })

    const row = await reload(h, payment)
    expect(row.status).toBe("completed")
    expect(row.transactionHash).toBe(txHash(1))
    expect(row.blockNumber).toBe(990)
    expect(row.confirmationCount).toBe(11)
    expect(row.fromAddress).toBe(PAYER)
    expect(row.subscriptionId).toBe(`sub-${payment.paymentId}`)
    expect(row.completedAt).toEqual(h.clock.now())
    expect(row.confirmedAt).toEqual(h.clock.now())
    expect(row.paymentReceivedAt).toEqual(h.clock.now())

    expect(await h.store.getPendingTransaction(payment.paymentId)).toBeNull()
    expect(h.subscriptions.calls).toEqual([
      {
        userId: "user-1",
        plan: "premium",
        duration: "3_months",
        paymentId: payment.paymentId,
        paymentMethod: "USDT_BEP20",
      },
    ])
    expect(h.notifier.events.map((e) => `${e.from}->${e.to}`)).toEqual([
      "scanning->verifying",
      "verifying->processing",
      "processing->confirmed",
      "confirmed->completed",
    ])

    const wallets = await h.store.getUserWallets("user-1")
    expect(wallets).toHaveLength(1)
    expect(wallets[0].walletAddress).toBe(PAYER)
    expect(wallets[0].paymentCount).toBe(1)
    expect(wallets[0].totalAmountUsdt).toBe("12.5")
    expect(wallets[0].isVerified).toBe(true)
  })

  it("retries a scan with no matching transfer, then fails after the budget", async () => {
    const h = setup()
    const payment = await subscriptionPayment(h)
    await startScanning(h, payment)

    const first = await h.job.runOnce()
    expect(first.retried).toBe(1)
    expect((await h.store.getPendingTransaction(payment.paymentId))?.retryCount).toBe(1)

    await h.job.runOnce()
    const third = await h.job.runOnce()

    expect(third.failed).toBe(1)
    expect(h.chain.calls.findTransfer).toBe(3)
    const row = await reload(h, payment)
    expect(row.status).toBe("failed")
    expect(row.errorMessage).toBe(FAILURE_MESSAGES.noTransferFound)
    expect(await h.store.getPendingTransaction(payment.paymentId)).toBeNull()
  })

  it("skips a transfer already claimed by another payment", async () => {
    const h = setup()
    const owner = await subscriptionPayment(h)
    const other = await subscriptionPayment(h)
    h.chain.mine(
      usdtReceipt({ hash: txHash(5), amountUsdt: "12.5", blockNumber: 995n }),
      { from: PAYER, to: PLATFORM, amountUsdt: "12.5" },
    )
    await submitHash(h, owner, txHash(5))
    await startScanning(h, other)

    await h.job.runOnce()

    expect((await reload(h, owner)).status).toBe("completed")
    const row = await reload(h, other)
    expect(row.status).toBe("scanning")
    expect(row.transactionHash).toBeNull()
    expect((await h.store.getPendingTransaction(other.paymentId))?.retryCount).toBe(1)
  })
})

describe("VerificationJob: submitted hash path", () => {
  it("waits for confirmations, then credits points", async () => {
    const h = setup()
    const payment = await pointsPayment(h)
    await submitHash(h, payment, txHash(2))
    h.chain.mine(usdtReceipt({ hash: txHash(2), amountUsdt: "4.25", blockNumber: 999n }))

    const first = await h.job.runOnce()
    expect(first.checked).toBe(1)
    expect(first.confirmed).toBe(0)
    let row = await reload(h, payment)
    expect(row.status).toBe("processing")
    expect(row.confirmationCount).toBe(2)
    expect((await h.store.getPendingTransaction(payment.paymentId))?.confirmationCount).toBe(2)

    h.chain.head = 1_001n
    const second = await h.job.runOnce()
    expect(second.completed).toBe(1)

    row = await reload(h, payment)
    expect(row.status).toBe("completed")
    expect(row.pointsTransactionId).toBe(`pts-${payment.paymentId}`)
    expect(h.points.calls).toEqual([
      {
        userId: "user-2",
        amount: 100,
        reason: `Points purchase via USDT: ${payment.paymentId}`,
        metadata: {
          payment_id: payment.paymentId,
          payment_method: "USDT_BEP20",
          amount_usdt: "4.25",
          amount_vnd: 95000,
          transaction_hash: txHash(2),
        },
      },
    ])
  })

  it("fails a reverted transaction", async () => {
    const h = setup()
    const payment = await subscriptionPayment(h)
    await submitHash(h, payment, txHash(3))
    h.chain.mine(usdtReceipt({ hash: txHash(3), amountUsdt: "12.5", blockNumber: 900n, status: "reverted" }))

    const stats = await h.job.runOnce()

    expect(stats.failed).toBe(1)
    const row = await reload(h, payment)
    expect(row.status).toBe("failed")
    expect(row.errorMessage).toBe("Blockchain transaction failed: transaction reverted")
    expect(h.subscriptions.calls).toHaveLength(0)
  })

  it("fails a receipt whose amount is off", async () => {
    const h = setup()
    const payment = await subscriptionPayment(h)
    await submitHash(h, payment, txHash(4))
    h.chain.mine(usdtReceipt({ hash: txHash(4), amountUsdt: "10", blockNumber: 900n }))

    await h.job.runOnce()

    const row = await reload(h, payment)
    expect(row.status).toBe("failed")
    expect(row.errorMessage).toBe("Invalid transfer: amount mismatch")
    expect(row.confirmationCount).toBe(101)
  })

  it("fails a transaction that never gets mined", async () => {
    const h = setup()
    const payment = await subscriptionPayment(h)
    await submitHash(h, payment, txHash(6))

    expect((await h.job.runOnce()).retried).toBe(1)
    expect((await h.job.runOnce()).retried).toBe(1)
    expect((await h.job.runOnce()).failed).toBe(1)

    const row = await reload(h, payment)
    expect(row.status).toBe("failed")
    expect(row.errorMessage).toBe(FAILURE_MESSAGES.notMined)
  })

  it("cancels an unmined transaction once the payment window has passed", async () => {
    const h = setup()
    const payment = await subscriptionPayment(h)
    await submitHash(h, payment, txHash(7))
    h.clock.advanceMinutes(31)

    const stats = await h.job.runOnce()

    expect(stats.cancelled).toBe(1)
    expect(stats.expired).toBe(0)
    const row = await reload(h, payment)
    expect(row.status).toBe("cancelled")
    expect(row.errorMessage).toBe(FAILURE_MESSAGES.expiredNotMined)
    expect(row.cancelledAt).toEqual(h.clock.now())
  })
})

// ---------------------------------------------------------------------------
// Expiry, outages, activation retries
// ---------------------------------------------------------------------------

describe("VerificationJob: expiry", () => {
  it("expires unpaid payments past the TTL and drops their queue entries", async () => {
    const h = setup()
    const idle = await subscriptionPayment(h)
    const scanning = await subscriptionPayment(h)
    await startScanning(h, scanning)
    h.clock.advanceMinutes(31)

    const stats = await h.job.runOnce()

    expect(stats.expired).toBe(2)
    expect(stats.scanned).toBe(0)
    for (const p of [idle, scanning]) {
      const row = await reload(h, p)
      expect(row.status).toBe("expired")
      expect(row.errorMessage).toBe("Payment expired before a transfer was found")
    }
    expect(await h.store.getPendingTransaction(scanning.paymentId)).toBeNull()
    expect(h.notifier.events).toContainEqual({ paymentId: scanning.paymentId, from: "scanning", to: "expired" })
    expect(h.notifier.events).toContainEqual({ paymentId: idle.paymentId, from: "pending", to: "expired" })
  })

  it("leaves payments inside the TTL alone", async () => {
    const h = setup()
    const payment = await subscriptionPayment(h)
    h.clock.advanceMinutes(29)

    expect((await h.job.runOnce()).expired).toBe(0)
    expect((await reload(h, payment)).status).toBe("pending")
  })
})

describe("VerificationJob: chain outages", () => {
  it("does not spend the retry budget while the chain is unavailable", async () => {
    const h = setup()
    const payment = await subscriptionPayment(h)
    await startScanning(h, payment)
    h.chain.down = true

    for (let i = 0; i < 5; i++) {
      const stats = await h.job.runOnce()
      expect(stats.unavailable).toBe(1)
      expect(stats.retried).toBe(0)
    }
    expect((await h.store.getPendingTransaction(payment.paymentId))?.retryCount).toBe(0)
    expect((await reload(h, payment)).status).toBe("scanning")

    h.chain.down = false
    h.chain.mine(
      usdtReceipt({ hash: txHash(8), amountUsdt: "12.5", blockNumber: 950n }),
      { from: PAYER, to: PLATFORM, amountUsdt: "12.5" },
    )
    expect((await h.job.runOnce()).completed).toBe(1)
  })

  it("keeps a verifying payment untouched when confirmations cannot be read", async () => {
    const h = setup()
    const payment = await subscriptionPayment(h)
    await submitHash(h, payment, txHash(9))
    h.chain.down = true

    const stats = await h.job.runOnce()

    expect(stats.unavailable).toBe(1)
    expect((await reload(h, payment)).status).toBe("verifying")
    expect((await h.store.getPendingTransaction(payment.paymentId))?.retryCount).toBe(0)
  })
})

describe("VerificationJob: activation", () => {
  it("keeps a confirmed payment queued when activation fails and retries it once", async () => {
    const h = setup()
    h.subscriptions.failures = 1
    const payment = await subscriptionPayment(h)
    await submitHash(h, payment, txHash(10))
    h.chain.mine(usdtReceipt({ hash: txHash(10), amountUsdt: "12.5", blockNumber: 900n }))

    const first = await h.job.runOnce()
    expect(first.confirmed).toBe(1)
    expect(first.activationFailures).toBe(1)
    expect((await reload(h, payment)).status).toBe("confirmed")
    expect(await h.store.getPendingTransaction(payment.paymentId)).not.toBeNull()
    const readsAfterFirst = h.chain.calls.getConfirmations

    const second = await h.job.runOnce()
    expect(second.completed).toBe(1)
    expect(h.chain.calls.getConfirmations).toBe(readsAfterFirst)
    const row = await reload(h, payment)
    expect(row.status).toBe("completed")
    expect(row.subscriptionId).toBe(`sub-${payment.paymentId}`)

    await h.job.runOnce()
    expect(h.subscriptions.calls).toHaveLength(2)
  })

  it("logs an item failure and carries on with the rest of the sweep", async () => {
    const h = setup()
    const broken = await subscriptionPayment(h)
    const healthy = await pointsPayment(h)
    await submitHash(h, broken, txHash(11))
    await submitHash(h, healthy, txHash(12))
    h.chain.mine(usdtReceipt({ hash: txHash(12), amountUsdt: "4.25", blockNumber: 900n }))
    const originalGetPayment = h.store.getPayment.bind(h.store)
    h.store.getPayment = async (id: string) => {
      if (id === broken.paymentId) throw new Error("connection reset")
      return originalGetPayment(id)
    }

    const stats = await h.job.runOnce()

    expect(stats.errors).toBe(1)
    expect(stats.completed).toBe(1)
    expect(h.logger.entries).toContainEqual({
      level: "error",
      msg: "[verification] item failed",
      meta: { paymentId: broken.paymentId, error: "connection reset" },
    })
  })
})
