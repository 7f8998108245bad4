// src/notify/webhook-notifier.ts — Best-effort payment.status_changed delivery
//
// notify() returns immediately; delivery runs in the background through
// ResilientHttpClient (bounded retries, exponential backoff). Failures are
// logged and never reach the verification pipeline.

import { createHmac } from "node:crypto"
import type { IHttpClient } from "../shared/http-client.js"
import { consoleLogger, errorMessage, type Logger } from "../shared/logger.js"
import type { Payment, PaymentStatus } from "../payments/types.js"

export const STATUS_CHANGED_EVENT = "payment.status_changed"
export const SIGNATURE_HEADER = "x-usdt-signature"

export interface StatusChangedEvent {
  event: typeof STATUS_CHANGED_EVENT
  payment_id: string
  order_invoice_number: string
  user_id: string
  payment_type: Payment["paymentType"]
  previous_status: PaymentStatus | null
  status: PaymentStatus
  transaction_hash: string | null
  confirmation_count: number
  error_message: string | null
  timestamp: string
}

export interface PaymentNotifier {
  /** Fire-and-forget */
  notify(payment: Payment, previousStatus: PaymentStatus | null): void
}

export interface WebhookNotifierDeps {
  url: string
  /** HMAC-SHA256 key; no signature header when empty */
  secret?: string
  http: IHttpClient
  logger?: Logger
  now?: () => Date
}

export function signPayload(body: string, secret: string): string {
  return `sha256=${createHmac("sha256", secret).update(body).digest("hex")}`
}

export class WebhookNotifier implements PaymentNotifier {
  private readonly url: string
  private readonly secret: string | undefined
  private readonly http: IHttpClient
  private readonly logger: Logger
  private readonly now: () => Date
  private readonly inFlight = new Set<Promise<void>>()

  constructor(deps: WebhookNotifierDeps) {
    this.url = deps.url
    this.secret = deps.secret || undefined
    this.http = deps.http
    this.logger = deps.logger ?? consoleLogger
    this.now = deps.now ?? (() => new Date())
  }

  notify(payment: Payment, previousStatus: PaymentStatus | null): void {
    const event: StatusChangedEvent = {
      event: STATUS_CHANGED_EVENT,
      payment_id: payment.paymentId,
      order_invoice_number: payment.orderInvoiceNumber,
      user_id: payment.userId,
      payment_type: payment.paymentType,
      previous_status: previousStatus,
      status: payment.status,
      transaction_hash: payment.transactionHash,
      confirmation_count: payment.confirmationCount,
      error_message: payment.errorMessage,
      timestamp: this.now().toISOString(),
    }

    const delivery = this.deliver(event).finally(() => {
      this.inFlight.delete(delivery)
    })
    this.inFlight.add(delivery)
  }

  /** Resolves once every delivery started so far has settled (shutdown, tests). */
  async flush(): Promise<void> {
    await Promise.all([...this.inFlight])
  }

  private async deliver(event: StatusChangedEvent): Promise<void> {
    const body = JSON.stringify(event)
    const headers: Record<string, string> = { "content-type": "application/json" }
    if (this.secret) headers[SIGNATURE_HEADER] = signPayload(body, this.secret)

    try {
      const res = await this.http.request({ url: this.url, method: "POST", headers, body })
      if (res.status >= 200 && res.status < 300) return
      this.logger.warn("[webhook] delivery rejected", {
        paymentId: event.payment_id,
        status: event.status,
        httpStatus: res.status,
      })
    } catch (err) {
      this.logger.warn("[webhook] delivery failed", {
        paymentId: event.payment_id,
        status: event.status,
        error: errorMessage(err),
      })
    }
  }
}

/** Used when no webhook URL is configured. */
export class NoopNotifier implements PaymentNotifier {
  notify(): void {}
}
