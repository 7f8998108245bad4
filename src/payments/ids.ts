// src/payments/ids.ts — Payment and invoice identifiers

import { ulid } from "ulid"

export interface PaymentIds {
  paymentId: string
  orderInvoiceNumber: string
}

/**
 * USDT-{unixSeconds}-{suffix} and INV-USDT-{unixSeconds}-{userShort}-{suffix}.
 * The suffix is the random tail of a ULID.
 */
export function newPaymentIds(userId: string, now: Date): PaymentIds {
  const seconds = Math.floor(now.getTime() / 1000)
  const suffix = ulid(now.getTime()).slice(-8)
  const userShort = userId.replace(/[^A-Za-z0-9]/g, "").slice(0, 8).toUpperCase() || "ANON"
  return {
    paymentId: `USDT-${seconds}-${suffix}`,
    orderInvoiceNumber: `INV-USDT-${seconds}-${userShort}-${suffix}`,
  }
}
