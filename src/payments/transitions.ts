// src/payments/transitions.ts — Payment status ordering
//
// Forward-only ladder with three failure exits. Terminal rows never move.

import type { Payment, PaymentStatus } from "./types.js"

const STATUS_RANK: Record<PaymentStatus, number> = {
  pending: 0,
  scanning: 1,
  verifying: 2,
  processing: 3,
  confirmed: 4,
  completed: 5,
  failed: 5,
  cancelled: 5,
  expired: 5,
}

export const TERMINAL_STATUSES: ReadonlySet<PaymentStatus> = new Set([
  "completed",
  "failed",
  "cancelled",
  "expired",
])

const FAILURE_EXITS: ReadonlySet<PaymentStatus> = new Set(["failed", "cancelled", "expired"])

/** Statuses the expiry sweep may move to "expired" */
export const EXPIRABLE_STATUSES: readonly PaymentStatus[] = ["pending", "scanning"]

export function isTerminal(status: PaymentStatus): boolean {
  return TERMINAL_STATUSES.has(status)
}

/**
 * Whether `from → to` is allowed. A same-status move is allowed on a
 * non-terminal row (field refresh, e.g. confirmation count).
 */
export function canTransition(from: PaymentStatus, to: PaymentStatus): boolean {
  if (isTerminal(from)) return false
  if (FAILURE_EXITS.has(to)) return true
  return STATUS_RANK[to] >= STATUS_RANK[from]
}

type TimestampField =
  | "paymentReceivedAt"
  | "confirmedAt"
  | "completedAt"
  | "failedAt"
  | "cancelledAt"
  | "expiredAt"

const TIMESTAMP_FIELD: Partial<Record<PaymentStatus, TimestampField>> = {
  processing: "paymentReceivedAt",
  confirmed: "confirmedAt",
  completed: "completedAt",
  failed: "failedAt",
  cancelled: "cancelledAt",
  expired: "expiredAt",
}

/**
 * Timestamps to stamp when a row enters `status`. Only unset fields are
 * returned; completion also backfills confirmed_at.
 */
export function timestampsFor(
  payment: Pick<Payment, TimestampField>,
  status: PaymentStatus,
  now: Date,
): Partial<Record<TimestampField, Date>> {
  const stamps: Partial<Record<TimestampField, Date>> = {}
  const field = TIMESTAMP_FIELD[status]
  if (field && payment[field] === null) stamps[field] = now
  if (status === "completed" && payment.confirmedAt === null) stamps.confirmedAt = now
  return stamps
}

/** completed requires the side-effect link that matches payment_type. */
export function hasActivationLink(
  payment: Pick<Payment, "paymentType" | "subscriptionId" | "pointsTransactionId">,
): boolean {
  return payment.paymentType === "subscription"
    ? payment.subscriptionId !== null
    : payment.pointsTransactionId !== null
}
