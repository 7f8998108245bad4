// src/chain/chain-reader.ts — BSC JSON-RPC reads for USDT-BEP20 payments
//
// Thin adapter over RpcPool. Lookups that can legitimately miss return a
// ChainResult; "not found" is mapped inside the pool callback so a missing
// receipt never counts as a provider failure.

import {
  TransactionNotFoundError,
  TransactionReceiptNotFoundError,
  erc20Abi,
  getAddress,
  isHash,
  parseAbiItem,
  type Address,
  type Hash,
} from "viem"
import type { RpcPool } from "./rpc-pool.js"
import { formatUsdt, fractionOf, parseUsdt } from "./denomination.js"
import {
  ChainUnavailableError,
  NOT_FOUND,
  USDT_BSC_ADDRESS,
  found,
  unavailable,
  type ChainReceipt,
  type ChainResult,
  type ChainTransaction,
  type FindTransferCriteria,
  type TransferMatch,
} from "./types.js"

// ---------------------------------------------------------------------------
// Interface
// ---------------------------------------------------------------------------

export interface ChainReader {
  getTransaction(hash: string): Promise<ChainResult<ChainTransaction>>
  getReceipt(hash: string): Promise<ChainResult<ChainReceipt>>
  /** current − receipt block + 1; 0 when not mined; −1 when the chain is unreachable */
  getConfirmations(hash: string): Promise<number>
  findTransfer(criteria: FindTransferCriteria): Promise<ChainResult<TransferMatch>>
  /** USDT balance as a decimal string */
  getBalance(address: string): Promise<string>
  getCurrentBlock(): Promise<bigint>
}

export const TRANSFER_EVENT = parseAbiItem(
  "event Transfer(address indexed from, address indexed to, uint256 value)",
)

type TransferLogEntry = Omit<TransferMatch, "amountUsdt" | "confirmations">

export interface BscChainReaderDeps {
  rpcPool: Pick<RpcPool, "execute">
  /** USDT contract (default: BSC mainnet USDT) */
  tokenAddress?: string
  /** Blocks per eth_getLogs request (default: 200) */
  logChunkSize?: number
}

// ---------------------------------------------------------------------------
// Implementation
// ---------------------------------------------------------------------------

export class BscChainReader implements ChainReader {
  private readonly pool: Pick<RpcPool, "execute">
  private readonly token: Address
  private readonly logChunkSize: bigint

  constructor(deps: BscChainReaderDeps) {
    this.pool = deps.rpcPool
    this.token = getAddress(deps.tokenAddress ?? USDT_BSC_ADDRESS)
    const chunk = deps.logChunkSize ?? 200
    if (!Number.isInteger(chunk) || chunk < 1) {
      throw new Error(`logChunkSize must be a positive integer, got ${chunk}`)
    }
    this.logChunkSize = BigInt(chunk)
  }

  async getTransaction(hash: string): Promise<ChainResult<ChainTransaction>> {
    const txHash = toHash(hash)
    if (!txHash) return NOT_FOUND

    try {
      const tx = await this.pool.execute(async (client) => {
        try {
          return await client.getTransaction({ hash: txHash })
        } catch (err) {
          if (err instanceof TransactionNotFoundError) return null
          throw err
        }
      })
      if (!tx) return NOT_FOUND
      return found({
        hash: tx.hash,
        from: tx.from,
        to: tx.to,
        blockNumber: tx.blockNumber,
        value: tx.value,
      })
    } catch (err) {
      return unavailable(err)
    }
  }

  async getReceipt(hash: string): Promise<ChainResult<ChainReceipt>> {
    const txHash = toHash(hash)
    if (!txHash) return NOT_FOUND

    try {
      const receipt = await this.pool.execute(async (client) => {
        try {
          return await client.getTransactionReceipt({ hash: txHash })
        } catch (err) {
          if (err instanceof TransactionReceiptNotFoundError) return null
          throw err
        }
      })
      if (!receipt) return NOT_FOUND
      return found({
        transactionHash: receipt.transactionHash,
        status: receipt.status,
        blockNumber: receipt.blockNumber,
        from: receipt.from,
        to: receipt.to,
        gasUsed: receipt.gasUsed,
        logs: receipt.logs.map((log) => ({
          address: log.address,
          topics: [...log.topics],
          data: log.data,
          logIndex: log.logIndex,
        })),
      })
    } catch (err) {
      return unavailable(err)
    }
  }

  async getConfirmations(hash: string): Promise<number> {
    const receipt = await this.getReceipt(hash)
    if (receipt.kind === "unavailable") return -1
    if (receipt.kind === "not_found") return 0

    let current: bigint
    try {
      current = await this.getCurrentBlock()
    } catch {
      return -1
    }
    const confirmations = current - receipt.value.blockNumber + 1n
    return confirmations > 0n ? Number(confirmations) : 0
  }

  async findTransfer(criteria: FindTransferCriteria): Promise<ChainResult<TransferMatch>> {
    const expected = parseUsdt(criteria.expectedAmountUsdt)
    const slack = fractionOf(expected, criteria.toleranceFraction)
    const min = expected - slack
    const max = expected + slack
    const to = getAddress(criteria.toAddress)
    const from = criteria.fromAddress ? getAddress(criteria.fromAddress) : undefined

    let current: bigint
    try {
      current = await this.getCurrentBlock()
    } catch (err) {
      if (err instanceof ChainUnavailableError) return unavailable(err)
      throw err
    }

    const span = BigInt(Math.max(1, criteria.maxBlocksToScan))
    const floor = current - span + 1n > 0n ? current - span + 1n : 0n

    // Newest chunk first; within a chunk newest log first
    for (let toBlock = current; toBlock >= floor; toBlock -= this.logChunkSize) {
      const fromBlock = toBlock - this.logChunkSize + 1n > floor ? toBlock - this.logChunkSize + 1n : floor

      let logs: TransferLogEntry[]
      try {
        logs = await this.transferLogs(from, to, fromBlock, toBlock)
      } catch (err) {
        return unavailable(err)
      }

      for (const log of logs) {
        if (log.value < min || log.value > max) continue
        if (criteria.isClaimed && (await criteria.isClaimed(log.transactionHash))) continue

        return found({
          ...log,
          amountUsdt: formatUsdt(log.value),
          confirmations: Number(current - log.blockNumber + 1n),
        })
      }

      if (fromBlock === floor) break
    }

    return NOT_FOUND
  }

  /** Transfer logs in [fromBlock, toBlock], newest first. */
  private async transferLogs(
    from: Address | undefined,
    to: Address,
    fromBlock: bigint,
    toBlock: bigint,
  ): Promise<TransferLogEntry[]> {
    const logs = await this.pool.execute((client) =>
      client.getLogs({
        address: this.token,
        event: TRANSFER_EVENT,
        args: from ? { from, to } : { to },
        fromBlock,
        toBlock,
        strict: true,
      }),
    )

    const entries: TransferLogEntry[] = []
    for (const log of logs) {
      // Pending logs carry no position
      if (log.transactionHash === null || log.blockNumber === null || log.logIndex === null) continue
      entries.push({
        transactionHash: log.transactionHash,
        from: log.args.from,
        to: log.args.to,
        value: log.args.value,
        blockNumber: log.blockNumber,
        logIndex: log.logIndex,
      })
    }
    return entries.sort((a, b) =>
      a.blockNumber === b.blockNumber
        ? b.logIndex - a.logIndex
        : a.blockNumber > b.blockNumber ? -1 : 1,
    )
  }

  async getBalance(address: string): Promise<string> {
    const owner = getAddress(address)
    const raw = await this.pool.execute((client) =>
      client.readContract({
        address: this.token,
        abi: erc20Abi,
        functionName: "balanceOf",
        args: [owner],
      }),
    )
    return formatUsdt(raw)
  }

  /** @throws ChainUnavailableError */
  async getCurrentBlock(): Promise<bigint> {
    return this.pool.execute((client) => client.getBlockNumber())
  }
}

function toHash(value: string): Hash | null {
  const normalized = value.trim().toLowerCase()
  return isHash(normalized) ? normalized : null
}
