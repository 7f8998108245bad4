// tests/activation/dispatcher.test.ts — Exactly-once activation

import { describe, it, expect } from "vitest"
import { ActivationDispatcher } from "../../src/activation/dispatcher.js"
import { ActivationError } from "../../src/activation/types.js"
import { InMemoryPaymentStore } from "../../src/payments/store.js"
import type { Payment } from "../../src/payments/types.js"
import {
  FakePointsService,
  FakeSubscriptionService,
  PLATFORM,
  createRecordingLogger,
  txHash,
} from "../helpers/fakes.js"

function setup() {
  const store = new InMemoryPaymentStore()
  const subscriptions = new FakeSubscriptionService()
  const points = new FakePointsService()
  const logger = createRecordingLogger()
  const dispatcher = new ActivationDispatcher({ store, subscriptions, points, logger })
  return { store, subscriptions, points, logger, dispatcher }
}

async function confirmedSubscription(store: InMemoryPaymentStore): Promise<Payment> {
  const payment = await store.createPayment({
    userId: "user-1",
    paymentType: "subscription",
    plan: "pro",
    duration: "12_months",
    amountUsdt: "40.00",
    amountVnd: 892800,
    usdtRate: 22320,
    toAddress: PLATFORM,
  })
  await store.updatePaymentStatus(payment.paymentId, "confirmed", { transactionHash: txHash(1) })
  return payment
}

async function confirmedPoints(store: InMemoryPaymentStore): Promise<Payment> {
  const payment = await store.createPayment({
    userId: "user-2",
    paymentType: "points",
    pointsAmount: 200,
    amountUsdt: "8.06",
    amountVnd: 180000,
    usdtRate: 22320,
    toAddress: PLATFORM,
  })
  await store.updatePaymentStatus(payment.paymentId, "confirmed", { transactionHash: txHash(2) })
  return payment
}

async function activationError(fn: () => Promise<unknown>): Promise<ActivationError> {
  try {
    await fn()
  } catch (err) {
    if (err instanceof ActivationError) return err
    throw err
  }
  throw new Error("expected an ActivationError")
}

describe("ActivationDispatcher", () => {
  it("activates a subscription and links its id", async () => {
    const { store, subscriptions, dispatcher } = setup()
    const payment = await confirmedSubscription(store)

    const result = await dispatcher.activate(payment.paymentId)

    expect(result).toEqual({
      kind: "subscription",
      subscriptionId: `sub-${payment.paymentId}`,
      alreadyApplied: false,
    })
    expect(subscriptions.calls).toEqual([
      { userId: "user-1", plan: "pro", duration: "12_months", paymentId: payment.paymentId, paymentMethod: "USDT_BEP20" },
    ])
    expect((await store.getPayment(payment.paymentId))?.subscriptionId).toBe(`sub-${payment.paymentId}`)
  })

  it("returns the existing link without calling the service again", async () => {
    const { store, subscriptions, dispatcher } = setup()
    const payment = await confirmedSubscription(store)
    await dispatcher.activate(payment.paymentId)

    const again = await dispatcher.activate(payment.paymentId)

    expect(again).toEqual({
      kind: "subscription",
      subscriptionId: `sub-${payment.paymentId}`,
      alreadyApplied: true,
    })
    expect(subscriptions.calls).toHaveLength(1)
  })

  it("credits points with the payment metadata", async () => {
    const { store, points, dispatcher } = setup()
    const payment = await confirmedPoints(store)

    const result = await dispatcher.activate(payment.paymentId)

    expect(result).toEqual({
      kind: "points",
      pointsTransactionId: `pts-${payment.paymentId}`,
      alreadyApplied: false,
    })
    expect(points.calls).toEqual([
      {
        userId: "user-2",
        amount: 200,
        reason: `Points purchase via USDT: ${payment.paymentId}`,
        metadata: {
          payment_id: payment.paymentId,
          payment_method: "USDT_BEP20",
          amount_usdt: "8.06",
          amount_vnd: 180000,
          transaction_hash: txHash(2),
        },
      },
    ])
    expect((await store.getPayment(payment.paymentId))?.pointsTransactionId).toBe(`pts-${payment.paymentId}`)
  })

  it("rejects an unknown payment", async () => {
    const { dispatcher } = setup()
    const err = await activationError(() => dispatcher.activate("USDT-0-missing"))
    expect(err.code).toBe("PAYMENT_NOT_FOUND")
    expect(err.httpStatus).toBe(404)
    expect(err.message).toBe("Payment USDT-0-missing not found")
  })

  it("refuses to activate a failed payment", async () => {
    const { store, subscriptions, dispatcher } = setup()
    const payment = await confirmedSubscription(store)
    await store.updatePaymentStatus(payment.paymentId, "failed", { errorMessage: "boom" })

    const err = await activationError(() => dispatcher.activate(payment.paymentId))

    expect(err.code).toBe("INVALID_STATE")
    expect(err.message).toBe(`Payment ${payment.paymentId} is failed and cannot be activated`)
    expect(subscriptions.calls).toHaveLength(0)
  })

  it("wraps a collaborator failure and leaves the payment unlinked", async () => {
    const { store, subscriptions, logger, dispatcher } = setup()
    subscriptions.failures = 1
    const payment = await confirmedSubscription(store)

    const err = await activationError(() => dispatcher.activate(payment.paymentId))

    expect(err.code).toBe("COLLABORATOR_FAILED")
    expect(err.httpStatus).toBe(502)
    expect(err.message).toBe("Subscription activation failed: subscription service unavailable")
    expect((await store.getPayment(payment.paymentId))?.subscriptionId).toBeNull()
    expect(logger.entries[0]).toEqual({
      level: "error",
      msg: "[activation] subscription activation failed",
      meta: { paymentId: payment.paymentId, error: "subscription service unavailable" },
    })
  })

  it("reports a points failure with its own prefix", async () => {
    const { store, points, dispatcher } = setup()
    points.failures = 1
    const payment = await confirmedPoints(store)

    const err = await activationError(() => dispatcher.activate(payment.paymentId))

    expect(err.message).toBe("Points credit failed: points service unavailable")
  })
})
