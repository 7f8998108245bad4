// tests/config.test.ts — Environment configuration

import { afterEach, beforeEach, describe, it, expect } from "vitest"
import { loadConfig } from "../src/config.js"
import { USDT_BSC_ADDRESS } from "../src/chain/types.js"

const RECEIVER = "0x1111111111111111111111111111111111111111"

const KEYS = [
  "PORT", "HOST", "ADMIN_TOKEN", "USDT_POSTGRES_ENABLED", "DATABASE_URL", "USDT_PG_MAX_CONNECTIONS",
  "BSC_RPC_URLS", "BSC_USE_TESTNET", "USDT_CONTRACT_ADDRESS", "USDT_RECEIVING_ADDRESS",
  "USDT_RPC_TIMEOUT_MS", "USDT_LOG_CHUNK_SIZE", "USDT_CHECK_INTERVAL_SECONDS", "USDT_MAX_RETRIES",
  "USDT_REQUIRED_CONFIRMATIONS", "USDT_PAYMENT_TTL_MINUTES", "USDT_AMOUNT_TOLERANCE",
  "USDT_SCAN_TOLERANCE_FRACTION", "USDT_MAX_BLOCKS_TO_SCAN", "USDT_SWEEP_CONCURRENCY", "USDT_VND_RATE",
  "SUBSCRIPTION_SERVICE_URL", "POINTS_SERVICE_URL", "SERVICE_TOKEN", "WEBHOOK_URL", "WEBHOOK_SECRET",
  "WEBHOOK_MAX_RETRIES",
]

describe("loadConfig", () => {
  const saved = new Map<string, string | undefined>()

  beforeEach(() => {
    for (const key of KEYS) {
      saved.set(key, process.env[key])
      delete process.env[key]
    }
    process.env.USDT_RECEIVING_ADDRESS = RECEIVER
  })

  afterEach(() => {
    for (const [key, value] of saved) {
      if (value === undefined) delete process.env[key]
      else process.env[key] = value
    }
  })

  it("applies defaults", () => {
    const config = loadConfig()

    expect(config.port).toBe(3000)
    expect(config.adminToken).toBe("")
    expect(config.postgres.enabled).toBe(false)
    expect(config.chain).toEqual({
      rpcUrls: [],
      testnet: false,
      tokenAddress: USDT_BSC_ADDRESS,
      receivingAddress: RECEIVER,
      rpcTimeoutMs: 8000,
      logChunkSize: 200,
    })
    expect(config.verification).toEqual({
      checkIntervalSeconds: 30,
      maxRetries: 20,
      requiredConfirmations: 12,
      paymentTtlMinutes: 30,
      amountToleranceUsdt: "0.01",
      scanToleranceFraction: 0.01,
      maxBlocksToScan: 1000,
      sweepConcurrency: 4,
    })
    expect(config.pricing.usdtVndRate).toBe(22320)
  })

  it("reads overrides and splits RPC URLs", () => {
    process.env.BSC_RPC_URLS = "https://rpc-a.example, https://rpc-b.example ,"
    process.env.USDT_REQUIRED_CONFIRMATIONS = "15"
    process.env.USDT_VND_RATE = "25000"
    process.env.BSC_USE_TESTNET = "true"

    const config = loadConfig()

    expect(config.chain.rpcUrls).toEqual(["https://rpc-a.example", "https://rpc-b.example"])
    expect(config.chain.testnet).toBe(true)
    expect(config.verification.requiredConfirmations).toBe(15)
    expect(config.pricing.usdtVndRate).toBe(25000)
  })

  it("requires the receiving address", () => {
    delete process.env.USDT_RECEIVING_ADDRESS
    expect(() => loadConfig()).toThrow("USDT_RECEIVING_ADDRESS is required")
  })

  it("rejects a malformed receiving address", () => {
    process.env.USDT_RECEIVING_ADDRESS = "0x1234"
    expect(() => loadConfig()).toThrow('USDT_RECEIVING_ADDRESS must be a 0x-prefixed EVM address (got "0x1234")')
  })

  it("rejects non-numeric integers", () => {
    process.env.USDT_MAX_RETRIES = "many"
    expect(() => loadConfig()).toThrow('USDT_MAX_RETRIES must be a valid integer (got "many")')
  })

  it("rejects a malformed tolerance", () => {
    process.env.USDT_AMOUNT_TOLERANCE = "-1"
    expect(() => loadConfig()).toThrow('USDT_AMOUNT_TOLERANCE must be a decimal USDT amount (got "-1")')
  })

  it("requires DATABASE_URL when Postgres is enabled", () => {
    process.env.USDT_POSTGRES_ENABLED = "true"
    expect(() => loadConfig()).toThrow("DATABASE_URL is required when USDT_POSTGRES_ENABLED=true")
  })

  it("rejects a scan tolerance of 100% or more", () => {
    process.env.USDT_SCAN_TOLERANCE_FRACTION = "1"
    expect(() => loadConfig()).toThrow("USDT_SCAN_TOLERANCE_FRACTION must be below 1 (got 1)")
  })
})
