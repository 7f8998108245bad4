// tests/payments/service.test.ts — Inbound payment operations

import { describe, it, expect } from "vitest"
import { ActivationDispatcher } from "../../src/activation/dispatcher.js"
import { ActivationError } from "../../src/activation/types.js"
import { USDT_BSC_ADDRESS } from "../../src/chain/types.js"
import { Pricing } from "../../src/payments/pricing.js"
import { PaymentService, statusMessage } from "../../src/payments/service.js"
import { InMemoryPaymentStore } from "../../src/payments/store.js"
import { VerificationJob } from "../../src/verification/verification-job.js"
import { PaymentError, type Payment } from "../../src/payments/types.js"
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
} from "../helpers/fakes.js"

function setup() {
  const clock = new ManualClock()
  const store = new InMemoryPaymentStore({ now: clock.now })
  const chain = new FakeChainReader()
  const subscriptions = new FakeSubscriptionService()
  const points = new FakePointsService()
  const logger = createRecordingLogger()
  const notifier = new RecordingNotifier()
  const dispatcher = new ActivationDispatcher({ store, subscriptions, points, logger })
  const service = new PaymentService({
    store,
    pricing: new Pricing(22_320),
    chain,
    dispatcher,
    notifier,
    logger,
    now: clock.now,
    config: { receivingAddress: PLATFORM, requiredConfirmations: 12 },
  })
  return { clock, store, chain, subscriptions, points, notifier, logger, dispatcher, service }
}

async function newPayment(service: PaymentService, userId = "user-1"): Promise<Payment> {
  const created = await service.createSubscriptionPayment({ userId, plan: "premium", duration: "3_months" })
  return created.payment
}

describe("PaymentService: create", () => {
  it("creates a subscription payment with transfer instructions", async () => {
    const { service, notifier } = setup()

    const created = await service.createSubscriptionPayment({ userId: "user-1", plan: "premium", duration: "3_months" })

    expect(created.network).toBe("BSC")
    expect(created.tokenContract).toBe(USDT_BSC_ADDRESS)
    expect(created.instructions).toBe(
      `Send exactly 12.50 USDT (BEP20) to ${PLATFORM}. Payment is confirmed after 12 block confirmations.`,
    )
    expect(created.payment).toMatchObject({
      paymentType: "subscription",
      plan: "premium",
      duration: "3_months",
      amountUsdt: "12.50",
      amountVnd: 279_000,
      usdtRate: 22_320,
      toAddress: PLATFORM,
      status: "pending",
      requiredConfirmations: 12,
    })
    expect(notifier.events).toEqual([{ paymentId: created.payment.paymentId, from: null, to: "pending" }])
  })

  it("checks the declared wallet's balance and registers it", async () => {
    const { service, store, chain } = setup()
    chain.balances.set(PAYER, "20")

    const created = await service.createPointsPayment({ userId: "user-1", points: 200, fromAddress: PAYER })

    expect(created.payment.amountUsdt).toBe("8.06")
    expect(created.payment.pointsAmount).toBe(200)
    expect(created.payment.fromAddress).toBe(PAYER)
    const wallets = await store.getUserWallets("user-1")
    expect(wallets.map((w) => [w.walletAddress, w.isVerified])).toEqual([[PAYER, false]])
  })

  it("rejects a wallet that cannot cover the amount", async () => {
    const { service, store, chain } = setup()
    chain.balances.set(PAYER, "10")

    await expect(
      service.createSubscriptionPayment({ userId: "user-1", plan: "premium", duration: "3_months", fromAddress: PAYER }),
    ).rejects.toMatchObject({
      code: "INSUFFICIENT_BALANCE",
      message: `Insufficient USDT balance in wallet ${PAYER}: required 12.50, available 10`,
    })
    expect(await store.getAllPayments()).toEqual([])
  })

  it("rejects a points purchase below the minimum", async () => {
    const { service } = setup()
    await expect(service.createPointsPayment({ userId: "user-1", points: 40 })).rejects.toThrow(PaymentError)
  })
})

describe("PaymentService: reads", () => {
  it("returns the owner's payment with a status message", async () => {
    const { service } = setup()
    const payment = await newPayment(service)

    const view = await service.getPayment(payment.paymentId, "user-1")

    expect(view.payment.paymentId).toBe(payment.paymentId)
    expect(view.message).toBe("Awaiting payment. Please send USDT to the provided address.")
  })

  it("hides other users' payments", async () => {
    const { service } = setup()
    const payment = await newPayment(service)

    await expect(service.getPayment(payment.paymentId, "user-2")).rejects.toMatchObject({
      code: "FORBIDDEN",
      message: "Not authorized to access this payment",
    })
    await expect(service.getPayment("USDT-0-NOPE", "user-1")).rejects.toMatchObject({
      code: "PAYMENT_NOT_FOUND",
      httpStatus: 404,
    })
  })

  it("describes each status", async () => {
    const { service } = setup()
    const payment = await newPayment(service)

    expect(statusMessage({ ...payment, status: "processing", confirmationCount: 5 })).toBe(
      "Transaction detected! Confirmations: 5/12",
    )
    expect(statusMessage({ ...payment, status: "confirmed" })).toBe("Payment confirmed! Activating subscription...")
    expect(statusMessage({ ...payment, status: "completed", paymentType: "points" })).toBe(
      "Payment completed and points added!",
    )
    expect(statusMessage({ ...payment, status: "failed", errorMessage: null })).toBe("Payment failed: Unknown error")
    expect(statusMessage({ ...payment, status: "expired" })).toBe("Payment cancelled or expired")
  })
})

describe("PaymentService: submitTransactionHash", () => {
  it("registers a hash and queues the payment for confirmation", async () => {
    const { service, store } = setup()
    const payment = await newPayment(service)
    const upper = `0x${"AB".repeat(32)}`

    const result = await service.submitTransactionHash(payment.paymentId, "user-1", upper)

    expect(result.alreadyRegistered).toBe(false)
    expect(result.payment.status).toBe("verifying")
    expect(result.payment.transactionHash).toBe(`0x${"ab".repeat(32)}`)
    const entry = await store.getPendingTransaction(payment.paymentId)
    expect(entry?.status).toBe("pending")
    expect(entry?.transactionHash).toBe(`0x${"ab".repeat(32)}`)
    expect(entry?.requiredConfirmations).toBe(12)
  })

  it("treats a second submission as already registered", async () => {
    const { service } = setup()
    const payment = await newPayment(service)
    await service.submitTransactionHash(payment.paymentId, "user-1", txHash(1))

    const again = await service.submitTransactionHash(payment.paymentId, "user-1", txHash(2))

    expect(again.alreadyRegistered).toBe(true)
    expect(again.payment.transactionHash).toBe(txHash(1))
  })

  it("rejects a malformed hash", async () => {
    const { service } = setup()
    const payment = await newPayment(service)
    await expect(service.submitTransactionHash(payment.paymentId, "user-1", "0x1234")).rejects.toMatchObject({
      code: "INVALID_TRANSACTION_HASH",
    })
  })

  it("rejects a hash already used by another payment", async () => {
    const { service } = setup()
    const first = await newPayment(service)
    const second = await newPayment(service)
    await service.submitTransactionHash(first.paymentId, "user-1", txHash(3))

    await expect(service.submitTransactionHash(second.paymentId, "user-1", txHash(3))).rejects.toMatchObject({
      code: "DUPLICATE_TRANSACTION",
      message: "Transaction already used for another payment",
    })
  })

  it("rejects a hash for an expired payment", async () => {
    const { service, clock } = setup()
    const payment = await newPayment(service)
    clock.advanceMinutes(31)

    await expect(service.submitTransactionHash(payment.paymentId, "user-1", txHash(4))).rejects.toMatchObject({
      code: "PAYMENT_EXPIRED",
      httpStatus: 410,
    })
  })

  it("moves a scanning payment's queue entry to pending", async () => {
    const { service, store } = setup()
    const payment = await newPayment(service)
    await service.confirmSent(payment.paymentId, "user-1")
    await store.updatePendingTransaction(payment.paymentId, { retryCount: 4 })

    await service.submitTransactionHash(payment.paymentId, "user-1", txHash(5))

    const entry = await store.getPendingTransaction(payment.paymentId)
    expect(entry?.status).toBe("pending")
    expect(entry?.retryCount).toBe(0)
    expect(entry?.transactionHash).toBe(txHash(5))
  })
})

describe("PaymentService: confirmSent", () => {
  it("starts scanning once", async () => {
    const { service, store, notifier } = setup()
    const payment = await newPayment(service)

    const first = await service.confirmSent(payment.paymentId, "user-1")
    expect(first.unchanged).toBe(false)
    expect(first.payment.status).toBe("scanning")
    expect((await store.getPendingTransaction(payment.paymentId))?.status).toBe("scanning")
    expect(notifier.events.at(-1)).toEqual({ paymentId: payment.paymentId, from: "pending", to: "scanning" })

    const second = await service.confirmSent(payment.paymentId, "user-1")
    expect(second.unchanged).toBe(true)
    expect(second.payment.status).toBe("scanning")
  })

  it("refuses to scan for a failed payment", async () => {
    const { service, store } = setup()
    const payment = await newPayment(service)
    await store.updatePaymentStatus(payment.paymentId, "failed", { errorMessage: "reverted" })

    await expect(service.confirmSent(payment.paymentId, "user-1")).rejects.toMatchObject({
      code: "INVALID_STATE",
      message: "Payment is already failed",
    })
  })

  it("refuses to scan past the payment window", async () => {
    const { service, clock } = setup()
    const payment = await newPayment(service)
    clock.advanceMinutes(45)

    await expect(service.confirmSent(payment.paymentId, "user-1")).rejects.toMatchObject({ code: "PAYMENT_EXPIRED" })
  })
})

describe("PaymentService: manualConfirm", () => {
  it("confirms, activates and completes", async () => {
    const { service, store, chain, subscriptions } = setup()
    chain.balances.set(PAYER, "50")
    const { payment } = await service.createSubscriptionPayment({
      userId: "user-1",
      plan: "premium",
      duration: "3_months",
      fromAddress: PAYER,
    })

    const result = await service.manualConfirm(payment.paymentId, "admin-1", "verified on explorer")

    expect(result.alreadyCompleted).toBe(false)
    expect(result.activation).toEqual({
      kind: "subscription",
      subscriptionId: `sub-${payment.paymentId}`,
      alreadyApplied: false,
    })
    expect(result.payment.status).toBe("completed")
    expect(result.payment.manuallyProcessed).toBe(true)
    expect(result.payment.processedByAdmin).toBe("admin-1")
    expect(result.payment.adminNotes).toBe("verified on explorer")
    expect(subscriptions.calls).toHaveLength(1)
    const wallets = await store.getUserWallets("user-1")
    expect(wallets[0].paymentCount).toBe(1)
  })

  it("is a no-op on a completed payment", async () => {
    const { service, subscriptions } = setup()
    const payment = await newPayment(service)
    await service.manualConfirm(payment.paymentId, "admin-1", null)

    const again = await service.manualConfirm(payment.paymentId, "admin-2", null)

    expect(again.alreadyCompleted).toBe(true)
    expect(again.activation).toBeNull()
    expect(again.payment.processedByAdmin).toBe("admin-1")
    expect(subscriptions.calls).toHaveLength(1)
  })

  it("refuses other terminal payments", async () => {
    const { service, store } = setup()
    const payment = await newPayment(service)
    await store.updatePaymentStatus(payment.paymentId, "cancelled")

    await expect(service.manualConfirm(payment.paymentId, "admin-1", null)).rejects.toMatchObject({
      code: "INVALID_STATE",
      message: "Cannot confirm a payment in status: cancelled",
    })
  })

  it("leaves the payment confirmed and queued when activation fails", async () => {
    const { service, store, subscriptions } = setup()
    subscriptions.failures = 1
    const payment = await newPayment(service)

    await expect(service.manualConfirm(payment.paymentId, "admin-1", null)).rejects.toThrow(ActivationError)

    const row = await store.getPayment(payment.paymentId)
    expect(row?.status).toBe("confirmed")
    expect(row?.manuallyProcessed).toBe(true)
    const entry = await store.getPendingTransaction(payment.paymentId)
    expect(entry?.status).toBe("scanning")
    expect(entry?.transactionHash).toBeNull()
  })

  it("completes a failed manual confirm on the next verification sweep", async () => {
    const { service, store, chain, subscriptions, dispatcher, clock } = setup()
    subscriptions.failures = 1
    const payment = await newPayment(service)
    await expect(service.manualConfirm(payment.paymentId, "admin-1", null)).rejects.toThrow(ActivationError)

    const job = new VerificationJob({ store, chain, dispatcher, now: clock.now, logger: createRecordingLogger() })
    await job.runOnce()

    const row = await store.getPayment(payment.paymentId)
    expect(row?.status).toBe("completed")
    expect(row?.subscriptionId).toBe(`sub-${payment.paymentId}`)
    expect(subscriptions.calls).toHaveLength(2)
    expect(await store.getPendingTransaction(payment.paymentId)).toBeNull()
    expect(chain.calls).toEqual({ findTransfer: 0, getConfirmations: 0, getReceipt: 0 })
  })

  it("queues a hash-bearing payment for the pending sweep", async () => {
    const { service, store, subscriptions } = setup()
    subscriptions.failures = 1
    const payment = await newPayment(service)
    await service.submitTransactionHash(payment.paymentId, "user-1", txHash(7))

    await expect(service.manualConfirm(payment.paymentId, "admin-1", null)).rejects.toThrow(ActivationError)

    const entry = await store.getPendingTransaction(payment.paymentId)
    expect(entry?.status).toBe("pending")
    expect(entry?.transactionHash).toBe(txHash(7))
  })

  it("completes the payment even when the wallet stats write fails", async () => {
    const { service, store, chain, logger } = setup()
    chain.balances.set(PAYER, "20")
    const created = await service.createSubscriptionPayment({
      userId: "user-1",
      plan: "premium",
      duration: "3_months",
      fromAddress: PAYER,
    })
    store.updateWalletUsage = async () => {
      throw new Error("db gone")
    }

    const result = await service.manualConfirm(created.payment.paymentId, "admin-1", null)

    expect(result.payment.status).toBe("completed")
    expect(logger.entries).toContainEqual({
      level: "error",
      msg: "[usdt] wallet usage update failed",
      meta: { paymentId: created.payment.paymentId, error: "db gone" },
    })
  })

  it("reports an unknown payment", async () => {
    const { service } = setup()
    await expect(service.manualConfirm("USDT-0-NOPE", "admin-1", null)).rejects.toMatchObject({
      code: "PAYMENT_NOT_FOUND",
    })
  })
})
