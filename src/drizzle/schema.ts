// src/drizzle/schema.ts — USDT payment database schema
// All tables live in the `usdt` schema, isolated from other services.

import {
  pgSchema,
  text,
  timestamp,
  bigint,
  integer,
  numeric,
  boolean,
  doublePrecision,
  index,
  uniqueIndex,
} from "drizzle-orm/pg-core"
import type {
  Duration,
  PaymentStatus,
  PaymentType,
  PlanId,
  QueueStatus,
} from "../payments/types.js"

export const usdtSchema = pgSchema("usdt")

// --- payments ---
// One row per payment intent; never deleted
export const usdtPayments = usdtSchema.table("payments", {
  paymentId: text("payment_id").primaryKey(),                  // USDT-{unixSeconds}-{suffix}
  orderInvoiceNumber: text("order_invoice_number").notNull(),
  userId: text("user_id").notNull(),
  userEmail: text("user_email"),
  userName: text("user_name"),
  paymentType: text("payment_type").$type<PaymentType>().notNull(),
  plan: text("plan").$type<PlanId>(),
  duration: text("duration").$type<Duration>(),
  pointsAmount: integer("points_amount"),
  amountUsdt: text("amount_usdt").notNull(),                   // decimal string as priced
  amountVnd: bigint("amount_vnd", { mode: "number" }).notNull(),
  usdtRate: doublePrecision("usdt_rate").notNull(),            // VND per USDT snapshot
  fromAddress: text("from_address"),                           // lowercase
  toAddress: text("to_address").notNull(),                     // lowercase
  transactionHash: text("transaction_hash"),                   // lowercase
  blockNumber: bigint("block_number", { mode: "number" }),
  confirmationCount: integer("confirmation_count").notNull().default(0),
  requiredConfirmations: integer("required_confirmations").notNull().default(12),
  status: text("status").$type<PaymentStatus>().notNull().default("pending"),
  subscriptionId: text("subscription_id"),
  pointsTransactionId: text("points_transaction_id"),
  errorMessage: text("error_message"),
  manuallyProcessed: boolean("manually_processed").notNull().default(false),
  processedByAdmin: text("processed_by_admin"),
  adminNotes: text("admin_notes"),
  createdAt: timestamp("created_at", { withTimezone: true }).notNull().defaultNow(),
  updatedAt: timestamp("updated_at", { withTimezone: true }).notNull().defaultNow(),
  expiresAt: timestamp("expires_at", { withTimezone: true }).notNull(),
  paymentReceivedAt: timestamp("payment_received_at", { withTimezone: true }),
  confirmedAt: timestamp("confirmed_at", { withTimezone: true }),
  completedAt: timestamp("completed_at", { withTimezone: true }),
  failedAt: timestamp("failed_at", { withTimezone: true }),
  cancelledAt: timestamp("cancelled_at", { withTimezone: true }),
  expiredAt: timestamp("expired_at", { withTimezone: true }),
}, (table) => [
  uniqueIndex("idx_payments_invoice").on(table.orderInvoiceNumber),
  uniqueIndex("idx_payments_tx_hash").on(table.transactionHash),
  index("idx_payments_user_status").on(table.userId, table.status),
  index("idx_payments_status_created").on(table.status, table.createdAt),
])

// --- pending_transactions ---
// Verification queue; a row exists only while its payment is non-terminal
export const usdtPendingTransactions = usdtSchema.table("pending_transactions", {
  paymentId: text("payment_id").primaryKey(),
  userId: text("user_id").notNull(),
  transactionHash: text("transaction_hash"),                   // null while scanning
  fromAddress: text("from_address"),
  toAddress: text("to_address").notNull(),
  amountUsdt: text("amount_usdt").notNull(),
  firstSeenAt: timestamp("first_seen_at", { withTimezone: true }).notNull().defaultNow(),
  lastCheckedAt: timestamp("last_checked_at", { withTimezone: true }).notNull().defaultNow(),
  confirmationCount: integer("confirmation_count").notNull().default(0),
  requiredConfirmations: integer("required_confirmations").notNull().default(12),
  retryCount: integer("retry_count").notNull().default(0),
  status: text("status").$type<QueueStatus>().notNull(),
}, (table) => [
  index("idx_pending_status_checked").on(table.status, table.lastCheckedAt),
  index("idx_pending_tx_hash").on(table.transactionHash),
])

// --- wallet_addresses ---
// Wallets users have paid from
export const usdtWalletAddresses = usdtSchema.table("wallet_addresses", {
  id: text("id").primaryKey(),                                 // ULID
  userId: text("user_id").notNull(),
  walletAddress: text("wallet_address").notNull(),             // lowercase
  isVerified: boolean("is_verified").notNull().default(false),
  label: text("label"),
  firstUsedAt: timestamp("first_used_at", { withTimezone: true }).notNull().defaultNow(),
  lastUsedAt: timestamp("last_used_at", { withTimezone: true }).notNull().defaultNow(),
  paymentCount: integer("payment_count").notNull().default(0),
  totalAmountUsdt: numeric("total_amount_usdt", { precision: 38, scale: 18 }).notNull().default("0"),
}, (table) => [
  uniqueIndex("idx_wallets_user_address").on(table.userId, table.walletAddress),
  index("idx_wallets_address").on(table.walletAddress),
])
