// src/activation/types.ts — Business-effect collaborators and activation errors

import type { Duration, PlanId } from "../payments/types.js"

// ---------------------------------------------------------------------------
// Collaborators (idempotent on paymentId)
// ---------------------------------------------------------------------------

export interface SubscriptionActivation {
  userId: string
  plan: PlanId
  duration: Duration
  /** Idempotency key */
  paymentId: string
  paymentMethod: string
}

export interface SubscriptionService {
  createOrUpgrade(req: SubscriptionActivation): Promise<{ subscriptionId: string }>
}

export interface PointsCredit {
  userId: string
  amount: number
  reason: string
  /** Carries payment_id, the idempotency key */
  metadata: PointsMetadata
}

export interface PointsMetadata {
  payment_id: string
  payment_method: string
  amount_usdt: string
  amount_vnd: number
  transaction_hash: string | null
}

export interface PointsService {
  addPoints(req: PointsCredit): Promise<{ transactionId: string }>
}

// ---------------------------------------------------------------------------
// Result
// ---------------------------------------------------------------------------

export type ActivationResult =
  | { kind: "subscription"; subscriptionId: string; alreadyApplied: boolean }
  | { kind: "points"; pointsTransactionId: string; alreadyApplied: boolean }

// ---------------------------------------------------------------------------
// Error
// ---------------------------------------------------------------------------

export type ActivationErrorCode =
  | "PAYMENT_NOT_FOUND"
  | "INVALID_STATE"
  | "INVALID_PAYMENT"
  | "COLLABORATOR_FAILED"

export class ActivationError extends Error {
  public readonly httpStatus: number

  constructor(
    public readonly code: ActivationErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options)
    this.name = "ActivationError"
    this.httpStatus = CODE_TO_STATUS[code]
  }
}

const CODE_TO_STATUS: Record<ActivationErrorCode, number> = {
  PAYMENT_NOT_FOUND: 404,
  INVALID_STATE: 409,
  INVALID_PAYMENT: 422,
  COLLABORATOR_FAILED: 502,
}
