// tests/activation/collaborators.test.ts — HTTP adapters for subscription and points services

import { describe, it, expect } from "vitest"
import { HttpPointsService, HttpSubscriptionService } from "../../src/activation/collaborators.js"
import type { HttpRequest, HttpResponse, IHttpClient } from "../../src/shared/http-client.js"

class ScriptedHttp implements IHttpClient {
  readonly requests: HttpRequest[] = []
  constructor(private readonly response: HttpResponse) {}

  async request(req: HttpRequest): Promise<HttpResponse> {
    this.requests.push(req)
    return this.response
  }
}

function respond(status: number, body: unknown): HttpResponse {
  return { status, headers: {}, body: typeof body === "string" ? body : JSON.stringify(body) }
}

const ACTIVATION = {
  userId: "user-1",
  plan: "vip" as const,
  duration: "3_months" as const,
  paymentId: "USDT-1772359200-ABCDEFGH",
  paymentMethod: "USDT_BEP20",
}

const CREDIT = {
  userId: "user-2",
  amount: 100,
  reason: "Points purchase via USDT: USDT-1772359200-ZYXWVUTS",
  metadata: {
    payment_id: "USDT-1772359200-ZYXWVUTS",
    payment_method: "USDT_BEP20",
    amount_usdt: "4.25",
    amount_vnd: 95000,
    transaction_hash: null,
  },
}

describe("HttpSubscriptionService", () => {
  it("posts the activation with the payment id as idempotency key", async () => {
    const http = new ScriptedHttp(respond(200, { subscription_id: "sub-42" }))
    const service = new HttpSubscriptionService({ baseUrl: "http://subs.internal/", serviceToken: "test-secret", http })

    const result = await service.createOrUpgrade(ACTIVATION)

    expect(result).toEqual({ subscriptionId: "sub-42" })
    expect(http.requests).toEqual([
      {
        url: "http://subs.internal/subscriptions/activate",
        method: "POST",
        headers: {
          "content-type": "application/json",
          "idempotency-key": "USDT-1772359200-ABCDEFGH",
          authorization: "Bearer test-secret",
        },
        body: JSON.stringify({
          user_id: "user-1",
          plan: "vip",
          duration: "3_months",
          payment_id: "USDT-1772359200-ABCDEFGH",
          payment_method: "USDT_BEP20",
        }),
      },
    ])
  })

  it("omits the authorization header without a service token", async () => {
    const http = new ScriptedHttp(respond(201, { subscription_id: "sub-1" }))
    const service = new HttpSubscriptionService({ baseUrl: "http://subs.internal", http })

    await service.createOrUpgrade(ACTIVATION)

    expect(http.requests[0].headers).toEqual({
      "content-type": "application/json",
      "idempotency-key": "USDT-1772359200-ABCDEFGH",
    })
  })

  it("throws on a non-2xx status", async () => {
    const http = new ScriptedHttp(respond(409, "plan downgrade not allowed"))
    const service = new HttpSubscriptionService({ baseUrl: "http://subs.internal", http })

    await expect(service.createOrUpgrade(ACTIVATION)).rejects.toThrow(
      "subscription service returned HTTP 409: plan downgrade not allowed",
    )
  })

  it("throws on a body without subscription_id", async () => {
    const http = new ScriptedHttp(respond(200, { id: "sub-1" }))
    const service = new HttpSubscriptionService({ baseUrl: "http://subs.internal", http })

    await expect(service.createOrUpgrade(ACTIVATION)).rejects.toThrow(
      "subscription service returned an unexpected body",
    )
  })
})

describe("HttpPointsService", () => {
  it("posts the credit keyed by metadata.payment_id", async () => {
    const http = new ScriptedHttp(respond(200, { transaction_id: "pts-7" }))
    const service = new HttpPointsService({ baseUrl: "http://points.internal", http })

    const result = await service.addPoints(CREDIT)

    expect(result).toEqual({ transactionId: "pts-7" })
    expect(http.requests[0].url).toBe("http://points.internal/points/add")
    expect(http.requests[0].headers?.["idempotency-key"]).toBe("USDT-1772359200-ZYXWVUTS")
    expect(JSON.parse(http.requests[0].body ?? "")).toEqual({
      user_id: "user-2",
      amount: 100,
      reason: "Points purchase via USDT: USDT-1772359200-ZYXWVUTS",
      metadata: CREDIT.metadata,
    })
  })

  it("throws on a non-JSON body", async () => {
    const http = new ScriptedHttp(respond(200, "ok"))
    const service = new HttpPointsService({ baseUrl: "http://points.internal", http })

    await expect(service.addPoints(CREDIT)).rejects.toThrow("points service returned an unexpected body")
  })

  it("throws on a server error", async () => {
    const http = new ScriptedHttp(respond(503, "maintenance"))
    const service = new HttpPointsService({ baseUrl: "http://points.internal", http })

    await expect(service.addPoints(CREDIT)).rejects.toThrow("points service returned HTTP 503: maintenance")
  })
})
