// tests/notify/webhook-notifier.test.ts — Signed, fire-and-forget status webhooks

import { createHmac } from "node:crypto"
import { describe, it, expect } from "vitest"
import { SIGNATURE_HEADER, WebhookNotifier, signPayload } from "../../src/notify/webhook-notifier.js"
import { InMemoryPaymentStore } from "../../src/payments/store.js"
import type { Payment } from "../../src/payments/types.js"
import type { HttpRequest, HttpResponse, IHttpClient } from "../../src/shared/http-client.js"
import { ManualClock, PLATFORM, createRecordingLogger } from "../helpers/fakes.js"

class CapturingHttp implements IHttpClient {
  readonly requests: HttpRequest[] = []
  status = 200
  error: Error | null = null

  async request(req: HttpRequest): Promise<HttpResponse> {
    this.requests.push(req)
    if (this.error) throw this.error
    return { status: this.status, headers: {}, body: "" }
  }
}

async function makePayment(clock: ManualClock): Promise<Payment> {
  const store = new InMemoryPaymentStore({ now: clock.now })
  return store.createPayment({
    userId: "user-1",
    paymentType: "points",
    pointsAmount: 50,
    amountUsdt: "2.24",
    amountVnd: 50000,
    usdtRate: 22320,
    toAddress: PLATFORM,
  })
}

describe("signPayload", () => {
  it("is an HMAC-SHA256 hex digest with a sha256= prefix", () => {
    const expected = createHmac("sha256", "test-secret").update("{\"a\":1}").digest("hex")
    expect(signPayload("{\"a\":1}", "test-secret")).toBe(`sha256=${expected}`)
  })
})

describe("WebhookNotifier", () => {
  it("posts a signed status_changed event", async () => {
    const clock = new ManualClock()
    const http = new CapturingHttp()
    const notifier = new WebhookNotifier({ url: "http://hooks.internal/usdt", secret: "test-secret", http, now: clock.now })
    const payment = await makePayment(clock)

    notifier.notify({ ...payment, status: "scanning" }, "pending")
    await notifier.flush()

    expect(http.requests).toHaveLength(1)
    const req = http.requests[0]
    const body = req.body ?? ""
    expect(req.url).toBe("http://hooks.internal/usdt")
    expect(req.method).toBe("POST")
    expect(req.headers?.[SIGNATURE_HEADER]).toBe(signPayload(body, "test-secret"))
    expect(JSON.parse(body)).toEqual({
      event: "payment.status_changed",
      payment_id: payment.paymentId,
      order_invoice_number: payment.orderInvoiceNumber,
      user_id: "user-1",
      payment_type: "points",
      previous_status: "pending",
      status: "scanning",
      transaction_hash: null,
      confirmation_count: 0,
      error_message: null,
      timestamp: "2026-03-01T10:00:00.000Z",
    })
  })

  it("sends no signature header without a secret", async () => {
    const clock = new ManualClock()
    const http = new CapturingHttp()
    const notifier = new WebhookNotifier({ url: "http://hooks.internal/usdt", http })

    notifier.notify(await makePayment(clock), null)
    await notifier.flush()

    expect(http.requests[0].headers).toEqual({ "content-type": "application/json" })
  })

  it("logs a rejected delivery", async () => {
    const clock = new ManualClock()
    const http = new CapturingHttp()
    http.status = 410
    const logger = createRecordingLogger()
    const notifier = new WebhookNotifier({ url: "http://hooks.internal/usdt", http, logger })
    const payment = await makePayment(clock)

    notifier.notify(payment, null)
    await notifier.flush()

    expect(logger.entries).toEqual([
      {
        level: "warn",
        msg: "[webhook] delivery rejected",
        meta: { paymentId: payment.paymentId, status: "pending", httpStatus: 410 },
      },
    ])
  })

  it("logs a failed delivery without throwing", async () => {
    const clock = new ManualClock()
    const http = new CapturingHttp()
    http.error = new Error("ECONNRESET")
    const logger = createRecordingLogger()
    const notifier = new WebhookNotifier({ url: "http://hooks.internal/usdt", http, logger })
    const payment = await makePayment(clock)

    notifier.notify(payment, null)
    await notifier.flush()

    expect(logger.entries).toEqual([
      {
        level: "warn",
        msg: "[webhook] delivery failed",
        meta: { paymentId: payment.paymentId, status: "pending", error: "ECONNRESET" },
      },
    ])
  })

  it("flush waits for every delivery in flight", async () => {
    const clock = new ManualClock()
    const http = new CapturingHttp()
    const notifier = new WebhookNotifier({ url: "http://hooks.internal/usdt", http })
    const payment = await makePayment(clock)

    notifier.notify(payment, null)
    notifier.notify({ ...payment, status: "scanning" }, "pending")
    notifier.notify({ ...payment, status: "expired" }, "scanning")
    await notifier.flush()

    expect(http.requests.map((r) => JSON.parse(r.body ?? "").status)).toEqual(["pending", "scanning", "expired"])
  })
})
