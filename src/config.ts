// src/config.ts — Configuration loader from environment variables

import { isAddress } from "viem"
import { parseUsdt } from "./chain/denomination.js"
import { USDT_BSC_ADDRESS } from "./chain/types.js"

export interface ServiceConfig {
  // HTTP
  port: number
  host: string

  /** Bearer token for /api/v1/usdt/admin/* (admin routes disabled when empty) */
  adminToken: string

  /** PostgreSQL database (usdt schema); in-memory store when disabled */
  postgres: {
    enabled: boolean
    connectionString: string
    maxConnections: number
  }

  chain: {
    /** Priority order; the public BSC endpoint is always appended last */
    rpcUrls: string[]
    testnet: boolean
    tokenAddress: string
    receivingAddress: string
    rpcTimeoutMs: number
    logChunkSize: number
  }

  verification: {
    checkIntervalSeconds: number
    maxRetries: number
    requiredConfirmations: number
    paymentTtlMinutes: number
    amountToleranceUsdt: string
    scanToleranceFraction: number
    maxBlocksToScan: number
    sweepConcurrency: number
  }

  pricing: {
    /** VND per USDT */
    usdtVndRate: number
  }

  collaborators: {
    subscriptionServiceUrl: string
    pointsServiceUrl: string
    serviceToken: string
  }

  webhook: {
    url: string
    secret: string
    maxRetries: number
  }
}

/** Parse an integer from an environment variable, failing fast on NaN. */
function parseIntEnv(envKey: string, fallback: string): number {
  const raw = process.env[envKey] ?? fallback
  const value = parseInt(raw, 10)
  if (isNaN(value)) {
    throw new Error(`${envKey} must be a valid integer (got "${raw}")`)
  }
  return value
}

function parsePositiveNumberEnv(envKey: string, fallback: string): number {
  const raw = process.env[envKey] ?? fallback
  const value = Number(raw)
  if (!Number.isFinite(value) || value <= 0) {
    throw new Error(`${envKey} must be a positive number (got "${raw}")`)
  }
  return value
}

function parseUsdtEnv(envKey: string, fallback: string): string {
  const raw = process.env[envKey] ?? fallback
  try {
    parseUsdt(raw)
  } catch {
    throw new Error(`${envKey} must be a decimal USDT amount (got "${raw}")`)
  }
  return raw
}

function parseAddressEnv(envKey: string, fallback?: string): string {
  const raw = process.env[envKey] ?? fallback
  if (!raw) {
    throw new Error(`${envKey} is required`)
  }
  if (!isAddress(raw, { strict: false })) {
    throw new Error(`${envKey} must be a 0x-prefixed EVM address (got "${raw}")`)
  }
  return raw
}

export function loadConfig(): ServiceConfig {
  const postgresEnabled = process.env.USDT_POSTGRES_ENABLED === "true"
  const connectionString = process.env.DATABASE_URL ?? ""
  if (postgresEnabled && !connectionString) {
    throw new Error("DATABASE_URL is required when USDT_POSTGRES_ENABLED=true")
  }

  const scanToleranceFraction = parsePositiveNumberEnv("USDT_SCAN_TOLERANCE_FRACTION", "0.01")
  if (scanToleranceFraction >= 1) {
    throw new Error(`USDT_SCAN_TOLERANCE_FRACTION must be below 1 (got ${scanToleranceFraction})`)
  }

  return {
    port: parseIntEnv("PORT", "3000"),
    host: process.env.HOST ?? "0.0.0.0",

    adminToken: process.env.ADMIN_TOKEN ?? "",

    postgres: {
      enabled: postgresEnabled,
      connectionString,
      maxConnections: parseIntEnv("USDT_PG_MAX_CONNECTIONS", "10"),
    },

    chain: {
      rpcUrls: (process.env.BSC_RPC_URLS ?? "").split(",").map((u) => u.trim()).filter(Boolean),
      testnet: process.env.BSC_USE_TESTNET === "true",
      tokenAddress: parseAddressEnv("USDT_CONTRACT_ADDRESS", USDT_BSC_ADDRESS),
      receivingAddress: parseAddressEnv("USDT_RECEIVING_ADDRESS"),
      rpcTimeoutMs: parseIntEnv("USDT_RPC_TIMEOUT_MS", "8000"),
      logChunkSize: parseIntEnv("USDT_LOG_CHUNK_SIZE", "200"),
    },

    verification: {
      checkIntervalSeconds: parseIntEnv("USDT_CHECK_INTERVAL_SECONDS", "30"),
      maxRetries: parseIntEnv("USDT_MAX_RETRIES", "20"),
      requiredConfirmations: parseIntEnv("USDT_REQUIRED_CONFIRMATIONS", "12"),
      paymentTtlMinutes: parseIntEnv("USDT_PAYMENT_TTL_MINUTES", "30"),
      amountToleranceUsdt: parseUsdtEnv("USDT_AMOUNT_TOLERANCE", "0.01"),
      scanToleranceFraction,
      maxBlocksToScan: parseIntEnv("USDT_MAX_BLOCKS_TO_SCAN", "1000"),
      sweepConcurrency: Math.max(1, parseIntEnv("USDT_SWEEP_CONCURRENCY", "4")),
    },

    pricing: {
      usdtVndRate: parsePositiveNumberEnv("USDT_VND_RATE", "22320"),
    },

    collaborators: {
      subscriptionServiceUrl: process.env.SUBSCRIPTION_SERVICE_URL ?? "",
      pointsServiceUrl: process.env.POINTS_SERVICE_URL ?? "",
      serviceToken: process.env.SERVICE_TOKEN ?? "",
    },

    webhook: {
      url: process.env.WEBHOOK_URL ?? "",
      secret: process.env.WEBHOOK_SECRET ?? "",
      maxRetries: parseIntEnv("WEBHOOK_MAX_RETRIES", "3"),
    },
  }
}
