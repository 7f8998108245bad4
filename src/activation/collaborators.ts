// src/activation/collaborators.ts — HTTP adapters for the subscription and points services
//
// Both send payment_id as the Idempotency-Key header so a replayed activation
// returns the original id instead of applying the effect twice.

import { Type } from "@sinclair/typebox"
import { Value } from "@sinclair/typebox/value"
import type { IHttpClient } from "../shared/http-client.js"
import type {
  PointsCredit,
  PointsService,
  SubscriptionActivation,
  SubscriptionService,
} from "./types.js"

const SubscriptionResponse = Type.Object({ subscription_id: Type.String({ minLength: 1 }) })
const PointsResponse = Type.Object({ transaction_id: Type.String({ minLength: 1 }) })

export interface HttpCollaboratorConfig {
  baseUrl: string
  /** Bearer token for service-to-service calls */
  serviceToken?: string
  http: IHttpClient
}

function headers(config: HttpCollaboratorConfig, idempotencyKey: string): Record<string, string> {
  const h: Record<string, string> = {
    "content-type": "application/json",
    "idempotency-key": idempotencyKey,
  }
  if (config.serviceToken) h.authorization = `Bearer ${config.serviceToken}`
  return h
}

function parseJson(body: string): unknown {
  try {
    return JSON.parse(body)
  } catch {
    return undefined
  }
}

export class HttpSubscriptionService implements SubscriptionService {
  constructor(private readonly config: HttpCollaboratorConfig) {}

  async createOrUpgrade(req: SubscriptionActivation): Promise<{ subscriptionId: string }> {
    const res = await this.config.http.request({
      url: `${this.config.baseUrl.replace(/\/+$/, "")}/subscriptions/activate`,
      method: "POST",
      headers: headers(this.config, req.paymentId),
      body: JSON.stringify({
        user_id: req.userId,
        plan: req.plan,
        duration: req.duration,
        payment_id: req.paymentId,
        payment_method: req.paymentMethod,
      }),
    })

    if (res.status < 200 || res.status >= 300) {
      throw new Error(`subscription service returned HTTP ${res.status}: ${res.body.slice(0, 200)}`)
    }
    const parsed = parseJson(res.body)
    if (!Value.Check(SubscriptionResponse, parsed)) {
      throw new Error("subscription service returned an unexpected body")
    }
    return { subscriptionId: parsed.subscription_id }
  }
}

export class HttpPointsService implements PointsService {
  constructor(private readonly config: HttpCollaboratorConfig) {}

  async addPoints(req: PointsCredit): Promise<{ transactionId: string }> {
    const res = await this.config.http.request({
      url: `${this.config.baseUrl.replace(/\/+$/, "")}/points/add`,
      method: "POST",
      headers: headers(this.config, req.metadata.payment_id),
      body: JSON.stringify({
        user_id: req.userId,
        amount: req.amount,
        reason: req.reason,
        metadata: req.metadata,
      }),
    })

    if (res.status < 200 || res.status >= 300) {
      throw new Error(`points service returned HTTP ${res.status}: ${res.body.slice(0, 200)}`)
    }
    const parsed = parseJson(res.body)
    if (!Value.Check(PointsResponse, parsed)) {
      throw new Error("points service returned an unexpected body")
    }
    return { transactionId: parsed.transaction_id }
  }
}
