// src/payments/types.ts — Payment, queue and wallet records; store input schema

import { Type, type Static } from "@sinclair/typebox"

// ---------------------------------------------------------------------------
// Enumerations
// ---------------------------------------------------------------------------

export const PAYMENT_STATUSES = [
  "pending",
  "scanning",
  "verifying",
  "processing",
  "confirmed",
  "completed",
  "failed",
  "cancelled",
  "expired",
] as const

export type PaymentStatus = (typeof PAYMENT_STATUSES)[number]

export type PaymentType = "subscription" | "points"

export const PLAN_IDS = ["premium", "pro", "vip"] as const
export type PlanId = (typeof PLAN_IDS)[number]

export const DURATIONS = ["3_months", "12_months"] as const
export type Duration = (typeof DURATIONS)[number]

/** Queue entry state: "scanning" has no hash yet, "pending" waits on confirmations */
export type QueueStatus = "scanning" | "pending"

export const PAYMENT_METHOD = "USDT_BEP20"

// ---------------------------------------------------------------------------
// Records
// ---------------------------------------------------------------------------

export interface Payment {
  paymentId: string
  orderInvoiceNumber: string
  userId: string
  userEmail: string | null
  userName: string | null

  paymentType: PaymentType
  plan: PlanId | null
  duration: Duration | null
  pointsAmount: number | null

  /** Decimal USDT string */
  amountUsdt: string
  amountVnd: number
  /** VND per USDT at creation */
  usdtRate: number

  fromAddress: string | null
  toAddress: string

  transactionHash: string | null
  blockNumber: number | null
  confirmationCount: number
  requiredConfirmations: number

  status: PaymentStatus
  subscriptionId: string | null
  pointsTransactionId: string | null
  errorMessage: string | null

  manuallyProcessed: boolean
  processedByAdmin: string | null
  adminNotes: string | null

  createdAt: Date
  updatedAt: Date
  expiresAt: Date
  paymentReceivedAt: Date | null
  confirmedAt: Date | null
  completedAt: Date | null
  failedAt: Date | null
  cancelledAt: Date | null
  expiredAt: Date | null
}

export interface PendingTransaction {
  paymentId: string
  userId: string
  transactionHash: string | null
  fromAddress: string | null
  toAddress: string
  amountUsdt: string
  firstSeenAt: Date
  lastCheckedAt: Date
  confirmationCount: number
  requiredConfirmations: number
  retryCount: number
  status: QueueStatus
}

export interface WalletAddress {
  id: string
  userId: string
  /** Always lowercase */
  walletAddress: string
  isVerified: boolean
  label: string | null
  firstUsedAt: Date
  lastUsedAt: Date
  paymentCount: number
  totalAmountUsdt: string
}

// ---------------------------------------------------------------------------
// Store inputs
// ---------------------------------------------------------------------------

const DecimalString = Type.String({ pattern: "^\\d+(\\.\\d+)?$" })
const EvmAddress = Type.String({ pattern: "^0x[0-9a-fA-F]{40}$" })

export const CreatePaymentInputSchema = Type.Object({
  userId: Type.String({ minLength: 1, maxLength: 128 }),
  userEmail: Type.Optional(Type.String({ maxLength: 255 })),
  userName: Type.Optional(Type.String({ maxLength: 255 })),
  paymentType: Type.Union([Type.Literal("subscription"), Type.Literal("points")]),
  plan: Type.Optional(
    Type.Union([Type.Literal("premium"), Type.Literal("pro"), Type.Literal("vip")]),
  ),
  duration: Type.Optional(Type.Union([Type.Literal("3_months"), Type.Literal("12_months")])),
  pointsAmount: Type.Optional(Type.Integer({ minimum: 1 })),
  amountUsdt: DecimalString,
  amountVnd: Type.Integer({ minimum: 0 }),
  usdtRate: Type.Number({ exclusiveMinimum: 0 }),
  fromAddress: Type.Optional(EvmAddress),
  toAddress: EvmAddress,
  requiredConfirmations: Type.Optional(Type.Integer({ minimum: 1 })),
})

export type CreatePaymentInput = Static<typeof CreatePaymentInputSchema>

/** Fields updatePaymentStatus may set alongside the status. */
export interface PaymentStatusFields {
  transactionHash?: string
  blockNumber?: number
  confirmationCount?: number
  fromAddress?: string
  errorMessage?: string
}

export interface PendingTransactionInput {
  paymentId: string
  userId: string
  transactionHash: string | null
  fromAddress: string | null
  toAddress: string
  amountUsdt: string
  requiredConfirmations: number
  status: QueueStatus
}

export interface PendingTransactionUpdate {
  retryCount?: number
  confirmationCount?: number
  transactionHash?: string
  fromAddress?: string
  status?: QueueStatus
}

export interface PaymentFilters {
  status?: PaymentStatus
  paymentType?: PaymentType
  userId?: string
  limit?: number
  offset?: number
}

export interface StatusUpdateResult {
  applied: boolean
  /** Current row after the attempt; null when the payment does not exist */
  payment: Payment | null
}

export interface PaymentStats {
  total: number
  byStatus: Record<PaymentStatus, number>
  /** Sum of amount_usdt over completed payments, decimal string */
  totalCompletedUsdt: string
}

// ---------------------------------------------------------------------------
// Errors
// ---------------------------------------------------------------------------

export type PaymentStoreErrorCode =
  | "INVALID_INPUT"
  | "NOT_FOUND"
  | "DUPLICATE"
  | "LINK_CONFLICT"
  | "UNLINKED_COMPLETION"

export class PaymentStoreError extends Error {
  public readonly httpStatus: number

  constructor(
    public readonly code: PaymentStoreErrorCode,
    message: string,
  ) {
    super(message)
    this.name = "PaymentStoreError"
    this.httpStatus = STORE_CODE_TO_STATUS[code]
  }
}

const STORE_CODE_TO_STATUS: Record<PaymentStoreErrorCode, number> = {
  INVALID_INPUT: 400,
  NOT_FOUND: 404,
  DUPLICATE: 409,
  LINK_CONFLICT: 409,
  UNLINKED_COMPLETION: 500,
}

export type PaymentErrorCode =
  | "INVALID_REQUEST"
  | "UNAUTHORIZED"
  | "FORBIDDEN"
  | "PAYMENT_NOT_FOUND"
  | "INVALID_STATE"
  | "PAYMENT_EXPIRED"
  | "INVALID_TRANSACTION_HASH"
  | "DUPLICATE_TRANSACTION"
  | "INSUFFICIENT_BALANCE"

export class PaymentError extends Error {
  public readonly httpStatus: number

  constructor(
    public readonly code: PaymentErrorCode,
    message: string,
  ) {
    super(message)
    this.name = "PaymentError"
    this.httpStatus = CODE_TO_STATUS[code]
  }
}

const CODE_TO_STATUS: Record<PaymentErrorCode, number> = {
  INVALID_REQUEST: 400,
  UNAUTHORIZED: 401,
  FORBIDDEN: 403,
  PAYMENT_NOT_FOUND: 404,
  INVALID_STATE: 409,
  PAYMENT_EXPIRED: 410,
  INVALID_TRANSACTION_HASH: 400,
  DUPLICATE_TRANSACTION: 409,
  INSUFFICIENT_BALANCE: 402,
}
