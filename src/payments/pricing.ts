// src/payments/pricing.ts — VND price tables and USDT quotes
//
// Prices are fixed in VND; the USDT amount is derived at creation time from
// the configured rate and frozen on the payment together with the rate.

import { vndToUsdt } from "../chain/denomination.js"
import { PaymentError, type Duration, type PlanId } from "./types.js"

// ---------------------------------------------------------------------------
// Price tables
// ---------------------------------------------------------------------------

export const PLAN_PRICES_VND: Record<PlanId, Record<Duration, number>> = {
  premium: { "3_months": 279_000, "12_months": 990_000 },
  pro: { "3_months": 447_000, "12_months": 1_699_000 },
  vip: { "3_months": 747_000, "12_months": 2_799_000 },
}

export const POINTS_PACKAGES_VND: Record<number, number> = {
  50: 50_000,
  100: 95_000, // 5% off
  200: 180_000, // 10% off
}

/** Custom amounts outside the packages */
export const POINT_PRICE_VND = 1_000
export const MIN_POINTS_PURCHASE = 50

export const DEFAULT_USDT_VND_RATE = 22_320

// ---------------------------------------------------------------------------
// Quotes
// ---------------------------------------------------------------------------

export interface Quote {
  amountVnd: number
  amountUsdt: string
  usdtRate: number
}

export interface PointsPackage extends Quote {
  points: number
  discountPercent: number
}

export interface PlanPrice extends Quote {
  plan: PlanId
  duration: Duration
}

export class Pricing {
  constructor(private readonly usdtRate: number = DEFAULT_USDT_VND_RATE) {
    if (!Number.isFinite(usdtRate) || usdtRate <= 0) {
      throw new Error(`USDT rate must be positive, got ${usdtRate}`)
    }
  }

  get rate(): number {
    return this.usdtRate
  }

  quotePlan(plan: PlanId, duration: Duration): Quote {
    return this.quote(PLAN_PRICES_VND[plan][duration])
  }

  /** @throws PaymentError INVALID_REQUEST below the minimum purchase */
  quotePoints(points: number): Quote {
    if (!Number.isInteger(points) || points < MIN_POINTS_PURCHASE) {
      throw new PaymentError(
        "INVALID_REQUEST",
        `Minimum points purchase is ${MIN_POINTS_PURCHASE} points`,
      )
    }
    return this.quote(POINTS_PACKAGES_VND[points] ?? points * POINT_PRICE_VND)
  }

  pointsPackages(): PointsPackage[] {
    return Object.entries(POINTS_PACKAGES_VND).map(([points, vnd]) => {
      const count = Number(points)
      const listPrice = count * POINT_PRICE_VND
      return {
        points: count,
        discountPercent: Math.round(((listPrice - vnd) / listPrice) * 100),
        ...this.quote(vnd),
      }
    })
  }

  planPrices(): PlanPrice[] {
    const prices: PlanPrice[] = []
    for (const [plan, durations] of Object.entries(PLAN_PRICES_VND)) {
      for (const [duration, vnd] of Object.entries(durations)) {
        if (!isPlanId(plan) || !isDuration(duration)) continue
        prices.push({ plan, duration, ...this.quote(vnd) })
      }
    }
    return prices
  }

  private quote(amountVnd: number): Quote {
    return { amountVnd, amountUsdt: vndToUsdt(amountVnd, this.usdtRate), usdtRate: this.usdtRate }
  }
}

function isPlanId(value: string): value is PlanId {
  return value === "premium" || value === "pro" || value === "vip"
}

function isDuration(value: string): value is Duration {
  return value === "3_months" || value === "12_months"
}
