// src/activation/dispatcher.ts — Exactly-once business effect for a paid payment
//
// The payment row is the source of truth: the dispatcher re-reads it, returns
// an existing link without calling out, and otherwise calls the collaborator
// (idempotent on payment_id) and records the returned id with a set-once link.
// A crash between the call and the link is healed by the collaborator's
// idempotency on the next attempt.

import type { PaymentStore } from "../payments/store.js"
import { PAYMENT_METHOD, type Payment } from "../payments/types.js"
import { consoleLogger, errorMessage, type Logger } from "../shared/logger.js"
import {
  ActivationError,
  type ActivationResult,
  type PointsService,
  type SubscriptionService,
} from "./types.js"

export interface ActivationDispatcherDeps {
  store: PaymentStore
  subscriptions: SubscriptionService
  points: PointsService
  logger?: Logger
}

const NON_ACTIVATABLE = new Set(["failed", "cancelled", "expired"])

export class ActivationDispatcher {
  private readonly store: PaymentStore
  private readonly subscriptions: SubscriptionService
  private readonly points: PointsService
  private readonly logger: Logger

  constructor(deps: ActivationDispatcherDeps) {
    this.store = deps.store
    this.subscriptions = deps.subscriptions
    this.points = deps.points
    this.logger = deps.logger ?? consoleLogger
  }

  /**
   * Apply the payment's effect once.
   * @throws ActivationError; the payment row is left untouched
   */
  async activate(paymentId: string): Promise<ActivationResult> {
    const payment = await this.store.getPayment(paymentId)
    if (!payment) {
      throw new ActivationError("PAYMENT_NOT_FOUND", `Payment ${paymentId} not found`)
    }
    if (NON_ACTIVATABLE.has(payment.status)) {
      throw new ActivationError(
        "INVALID_STATE",
        `Payment ${paymentId} is ${payment.status} and cannot be activated`,
      )
    }

    return payment.paymentType === "subscription"
      ? this.activateSubscription(payment)
      : this.creditPoints(payment)
  }

  private async activateSubscription(payment: Payment): Promise<ActivationResult> {
    if (payment.subscriptionId !== null) {
      return { kind: "subscription", subscriptionId: payment.subscriptionId, alreadyApplied: true }
    }
    if (payment.plan === null || payment.duration === null) {
      throw new ActivationError("INVALID_PAYMENT", `Payment ${payment.paymentId} has no plan or duration`)
    }

    let subscriptionId: string
    try {
      const res = await this.subscriptions.createOrUpgrade({
        userId: payment.userId,
        plan: payment.plan,
        duration: payment.duration,
        paymentId: payment.paymentId,
        paymentMethod: PAYMENT_METHOD,
      })
      subscriptionId = res.subscriptionId
    } catch (err) {
      this.logger.error("[activation] subscription activation failed", {
        paymentId: payment.paymentId,
        error: errorMessage(err),
      })
      throw new ActivationError(
        "COLLABORATOR_FAILED",
        `Subscription activation failed: ${errorMessage(err)}`,
        { cause: err },
      )
    }

    await this.store.linkSubscription(payment.paymentId, subscriptionId)
    this.logger.info("[activation] subscription activated", {
      paymentId: payment.paymentId,
      userId: payment.userId,
      plan: payment.plan,
      duration: payment.duration,
      subscriptionId,
    })
    return { kind: "subscription", subscriptionId, alreadyApplied: false }
  }

  private async creditPoints(payment: Payment): Promise<ActivationResult> {
    if (payment.pointsTransactionId !== null) {
      return { kind: "points", pointsTransactionId: payment.pointsTransactionId, alreadyApplied: true }
    }
    if (payment.pointsAmount === null) {
      throw new ActivationError("INVALID_PAYMENT", `Payment ${payment.paymentId} has no points amount`)
    }

    let transactionId: string
    try {
      const res = await this.points.addPoints({
        userId: payment.userId,
        amount: payment.pointsAmount,
        reason: `Points purchase via USDT: ${payment.paymentId}`,
        metadata: {
          payment_id: payment.paymentId,
          payment_method: PAYMENT_METHOD,
          amount_usdt: payment.amountUsdt,
          amount_vnd: payment.amountVnd,
          transaction_hash: payment.transactionHash,
        },
      })
      transactionId = res.transactionId
    } catch (err) {
      this.logger.error("[activation] points credit failed", {
        paymentId: payment.paymentId,
        error: errorMessage(err),
      })
      throw new ActivationError(
        "COLLABORATOR_FAILED",
        `Points credit failed: ${errorMessage(err)}`,
        { cause: err },
      )
    }

    await this.store.linkPointsTransaction(payment.paymentId, transactionId)
    this.logger.info("[activation] points credited", {
      paymentId: payment.paymentId,
      userId: payment.userId,
      points: payment.pointsAmount,
      transactionId,
    })
    return { kind: "points", pointsTransactionId: transactionId, alreadyApplied: false }
  }
}
