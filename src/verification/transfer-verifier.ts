// src/verification/transfer-verifier.ts — USDT Transfer receipt verification
//
// Pure decision over an already-fetched receipt:
// 1. receipt.status === "success"
// 2. receipt.to is the token contract
// 3. Transfer logs emitted by the token contract
// 4. one of them pays the recipient (case-insensitive)
// 5. |actual − expected| <= tolerance, compared in base units
//
// Payer identity is reported, not enforced: the scheduler records it as the
// payment's from_address.

import { decodeEventLog } from "viem"
import { TRANSFER_EVENT } from "../chain/chain-reader.js"
import { absDiff, formatUsdt, parseUsdt } from "../chain/denomination.js"
import { USDT_BSC_ADDRESS, type ChainReceipt } from "../chain/types.js"

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type TransferRejection =
  | "transaction reverted"
  | "not a token contract call"
  | "no transfer event"
  | "recipient mismatch"
  | "amount mismatch"

export interface TransferDetails {
  sender: string
  recipient: string
  /** Base units */
  amount: bigint
  amountUsdt: string
  blockNumber: bigint
  logIndex: number
}

export type TransferVerdict =
  | { valid: true; details: TransferDetails }
  | { valid: false; reason: TransferRejection; details?: Partial<TransferDetails> }

export interface VerifyTransferParams {
  recipient: string
  /** Expected amount, decimal USDT */
  amountUsdt: string
  /** Absolute tolerance, decimal USDT (default: "0.01") */
  toleranceUsdt?: string
  tokenAddress?: string
}

interface DecodedTransfer {
  from: string
  to: string
  value: bigint
  logIndex: number
}

// ---------------------------------------------------------------------------
// Verifier
// ---------------------------------------------------------------------------

export function verifyTransfer(receipt: ChainReceipt, params: VerifyTransferParams): TransferVerdict {
  const token = (params.tokenAddress ?? USDT_BSC_ADDRESS).toLowerCase()
  const recipient = params.recipient.toLowerCase()
  const expected = parseUsdt(params.amountUsdt)
  const tolerance = parseUsdt(params.toleranceUsdt ?? "0.01")

  if (receipt.status !== "success") {
    return { valid: false, reason: "transaction reverted", details: { blockNumber: receipt.blockNumber } }
  }

  if (receipt.to === null || receipt.to.toLowerCase() !== token) {
    return { valid: false, reason: "not a token contract call" }
  }

  const transfers = decodeTransfers(receipt, token)
  if (transfers.length === 0) {
    return { valid: false, reason: "no transfer event" }
  }

  const toRecipient = transfers.filter((t) => t.to.toLowerCase() === recipient)
  if (toRecipient.length === 0) {
    return { valid: false, reason: "recipient mismatch", details: { recipient: transfers[0].to } }
  }

  const match = toRecipient.find((t) => absDiff(t.value, expected) <= tolerance)
  if (!match) {
    const first = toRecipient[0]
    return {
      valid: false,
      reason: "amount mismatch",
      details: { amount: first.value, amountUsdt: formatUsdt(first.value) },
    }
  }

  return {
    valid: true,
    details: {
      sender: match.from,
      recipient: match.to,
      amount: match.value,
      amountUsdt: formatUsdt(match.value),
      blockNumber: receipt.blockNumber,
      logIndex: match.logIndex,
    },
  }
}

function decodeTransfers(receipt: ChainReceipt, token: string): DecodedTransfer[] {
  const transfers: DecodedTransfer[] = []

  for (const log of receipt.logs) {
    if (log.address.toLowerCase() !== token) continue
    const [signature, ...args] = log.topics
    if (!signature) continue

    try {
      const decoded = decodeEventLog({
        abi: [TRANSFER_EVENT],
        data: log.data,
        topics: [signature, ...args],
        strict: true,
      })
      transfers.push({
        from: decoded.args.from,
        to: decoded.args.to,
        value: decoded.args.value,
        logIndex: log.logIndex,
      })
    } catch {
      // Not a Transfer event
      continue
    }
  }

  return transfers
}
