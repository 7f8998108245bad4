// src/chain/types.ts — Chain read types and BSC / USDT-BEP20 constants
//
// Every chain read resolves to one of three outcomes. "not_found" means the
// entity does not exist yet (not mined, no matching transfer); "unavailable"
// means the RPC layer could not answer. Callers branch on `kind` and never
// collapse the two.

import type { Hex } from "viem"

// ---------------------------------------------------------------------------
// Result type
// ---------------------------------------------------------------------------

export type ChainResult<T> =
  | { kind: "found"; value: T }
  | { kind: "not_found" }
  | { kind: "unavailable"; error: string }

export function found<T>(value: T): ChainResult<T> {
  return { kind: "found", value }
}

export const NOT_FOUND = { kind: "not_found" } as const

export function unavailable(err: unknown): { kind: "unavailable"; error: string } {
  return { kind: "unavailable", error: err instanceof Error ? err.message : String(err) }
}

// ---------------------------------------------------------------------------
// Chain entities
// ---------------------------------------------------------------------------

export interface ChainTransaction {
  hash: string
  from: string
  /** Contract or recipient address; null for contract creation */
  to: string | null
  blockNumber: bigint | null
  value: bigint
}

export interface ReceiptLog {
  address: string
  topics: Hex[]
  data: Hex
  logIndex: number
}

export interface ChainReceipt {
  transactionHash: string
  status: "success" | "reverted"
  blockNumber: bigint
  from: string
  to: string | null
  logs: ReceiptLog[]
  gasUsed: bigint
}

export interface TransferMatch {
  transactionHash: string
  from: string
  to: string
  /** Amount in token base units (18 decimals) */
  value: bigint
  /** Decimal USDT string */
  amountUsdt: string
  blockNumber: bigint
  logIndex: number
  confirmations: number
}

export interface FindTransferCriteria {
  /** Sender filter; omitted while the paying wallet is unknown */
  fromAddress?: string | null
  toAddress: string
  /** Decimal USDT string */
  expectedAmountUsdt: string
  /** Relative tolerance, e.g. 0.01 for 1 % */
  toleranceFraction: number
  maxBlocksToScan: number
  /** Skip transfers already claimed by another payment */
  isClaimed?: (txHash: string) => Promise<boolean>
}

// ---------------------------------------------------------------------------
// Errors
// ---------------------------------------------------------------------------

/** Raised by reads that have no "not found" outcome (balance, block number). */
export class ChainUnavailableError extends Error {
  public readonly code = "chain_unavailable"
  public readonly httpStatus = 503

  constructor(message: string) {
    super(message)
    this.name = "ChainUnavailableError"
  }
}

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

/** BNB Smart Chain mainnet */
export const BSC_CHAIN_ID = 56

/** USDT (BEP20) on BSC mainnet */
export const USDT_BSC_ADDRESS = "0x55d398326f99059fF775485246999027B3197955"

/** USDT uses 18 decimals on BSC (unlike 6 on Ethereum) */
export const USDT_DECIMALS = 18

/** keccak256("Transfer(address,address,uint256)") */
export const TRANSFER_TOPIC = "0xddf252ad1be2c89b69c2b068fc378daa952ba7f163c4a11628f55a4df523b3ef"
