// src/chain/rpc-pool.ts — RPC Pool with Circuit Breaker
//
// Multi-provider RPC pool for BSC reads.
// Configured endpoints in priority order + public BSC dataseed (fallback).
// Per-provider circuit breaker: closed/open/half-open.
// Rate-limit responses are retried on the same provider with exponential
// backoff before the provider is charged a failure.

import {
  BaseError,
  HttpRequestError,
  LimitExceededRpcError,
  createPublicClient,
  http,
  type Chain,
  type PublicClient,
} from "viem"
import { bsc } from "viem/chains"
import { ChainUnavailableError } from "./types.js"

// ---------------------------------------------------------------------------
// Circuit Breaker (per-provider)
// ---------------------------------------------------------------------------

type CircuitState = "closed" | "open" | "half_open"

interface CircuitBreakerConfig {
  /** Failures before opening (default: 5) */
  failureThreshold: number
  /** Window in ms for failure counting (default: 30_000) */
  failureWindowMs: number
  /** Time in ms before probe attempt (default: 15_000) */
  probeDelayMs: number
}

const DEFAULT_CB_CONFIG: CircuitBreakerConfig = {
  failureThreshold: 5,
  failureWindowMs: 30_000,
  probeDelayMs: 15_000,
}

class ProviderCircuitBreaker {
  private state: CircuitState = "closed"
  private failures: number[] = [] // timestamps of failures
  private lastOpenedAt = 0
  private readonly config: CircuitBreakerConfig

  constructor(config?: Partial<CircuitBreakerConfig>) {
    this.config = { ...DEFAULT_CB_CONFIG, ...config }
  }

  get currentState(): CircuitState {
    if (this.state === "open") {
      const elapsed = Date.now() - this.lastOpenedAt
      if (elapsed >= this.config.probeDelayMs) {
        this.state = "half_open"
      }
    }
    return this.state
  }

  get isAvailable(): boolean {
    return this.currentState !== "open"
  }

  recordSuccess(): void {
    this.failures = []
    this.state = "closed"
  }

  recordFailure(): void {
    const now = Date.now()
    const cutoff = now - this.config.failureWindowMs
    this.failures = this.failures.filter((t) => t > cutoff)
    this.failures.push(now)

    if (this.state === "half_open" || this.failures.length >= this.config.failureThreshold) {
      this.state = "open"
      this.lastOpenedAt = now
    }
  }
}

// ---------------------------------------------------------------------------
// RPC Provider
// ---------------------------------------------------------------------------

interface RpcProvider {
  name: string
  client: PublicClient
  circuitBreaker: ProviderCircuitBreaker
  priority: number // lower = preferred
}

// ---------------------------------------------------------------------------
// RPC Pool
// ---------------------------------------------------------------------------

export interface RateLimitBackoffConfig {
  /** Extra attempts on the same provider after a rate-limit response (default: 3) */
  maxRetries: number
  /** First backoff delay, doubled per attempt (default: 500) */
  baseDelayMs: number
}

export interface RpcPoolConfig {
  /** RPC URLs in priority order */
  rpcUrls?: string[]
  /** Chain to use (default: BSC mainnet) */
  chain?: Chain
  /** Per-call timeout in ms (default: 8_000) */
  timeoutMs?: number
  /** Circuit breaker config per provider */
  circuitBreaker?: Partial<CircuitBreakerConfig>
  rateLimitBackoff?: Partial<RateLimitBackoffConfig>
  /** Injectable sleep for tests */
  sleep?: (ms: number) => Promise<void>
}

export class RpcPool {
  private providers: RpcProvider[] = []
  private readonly timeoutMs: number
  private readonly backoff: RateLimitBackoffConfig
  private readonly sleep: (ms: number) => Promise<void>

  constructor(config: RpcPoolConfig) {
    const chain = config.chain ?? bsc
    const cbConfig = config.circuitBreaker
    this.timeoutMs = config.timeoutMs ?? 8_000
    this.backoff = { maxRetries: 3, baseDelayMs: 500, ...config.rateLimitBackoff }
    this.sleep = config.sleep ?? ((ms) => new Promise((r) => setTimeout(r, ms)))

    // Configured RPC URLs
    if (config.rpcUrls) {
      for (let i = 0; i < config.rpcUrls.length; i++) {
        this.providers.push({
          name: `custom-${i}`,
          client: createPublicClient({
            chain,
            transport: http(config.rpcUrls[i], { timeout: this.timeoutMs, retryCount: 0 }),
          }),
          circuitBreaker: new ProviderCircuitBreaker(cbConfig),
          priority: i,
        })
      }
    }

    // Fallback: the chain's default public RPC (always last)
    this.providers.push({
      name: "public",
      client: createPublicClient({
        chain,
        transport: http(undefined, { timeout: this.timeoutMs, retryCount: 0 }),
      }),
      circuitBreaker: new ProviderCircuitBreaker(cbConfig),
      priority: 999,
    })
  }

  /**
   * Execute an RPC call against available providers.
   * Tries providers in priority order, skipping those with open circuits.
   * A rate-limited call is retried on the same provider with backoff first.
   *
   * `fn` must map legitimate absence (receipt not found, etc.) to a value
   * rather than throwing: every throw counts against the provider.
   *
   * @throws ChainUnavailableError if all providers fail.
   */
  async execute<T>(fn: (client: PublicClient) => Promise<T>): Promise<T> {
    const sorted = [...this.providers].sort((a, b) => a.priority - b.priority)
    const errors: Array<{ name: string; error: Error }> = []

    for (const provider of sorted) {
      if (!provider.circuitBreaker.isAvailable) {
        errors.push({ name: provider.name, error: new Error("circuit open") })
        continue
      }

      try {
        const result = await this.attemptWithBackoff(provider, fn)
        provider.circuitBreaker.recordSuccess()
        return result
      } catch (err) {
        provider.circuitBreaker.recordFailure()
        errors.push({
          name: provider.name,
          error: err instanceof Error ? err : new Error(String(err)),
        })
      }
    }

    // All providers failed
    const details = errors.map((e) => `${e.name}: ${e.error.message}`).join("; ")
    throw new ChainUnavailableError(`All RPC providers failed: ${details}`)
  }

  /**
   * Get health status of all providers.
   */
  getHealth(): Array<{ name: string; state: CircuitState; priority: number }> {
    return this.providers.map((p) => ({
      name: p.name,
      state: p.circuitBreaker.currentState,
      priority: p.priority,
    }))
  }

  // -------------------------------------------------------------------------
  // Internals
  // -------------------------------------------------------------------------

  private async attemptWithBackoff<T>(
    provider: RpcProvider,
    fn: (client: PublicClient) => Promise<T>,
  ): Promise<T> {
    for (let attempt = 0; ; attempt++) {
      try {
        return await this.withTimeout(fn(provider.client), provider.name)
      } catch (err) {
        if (!isRateLimitError(err) || attempt >= this.backoff.maxRetries) throw err
        await this.sleep(this.backoff.baseDelayMs * Math.pow(2, attempt))
      }
    }
  }

  private withTimeout<T>(promise: Promise<T>, name: string): Promise<T> {
    let timer: ReturnType<typeof setTimeout> | undefined
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(
        () => reject(new Error(`${name}: RPC call timed out after ${this.timeoutMs}ms`)),
        this.timeoutMs,
      )
    })
    return Promise.race([promise, timeout]).finally(() => clearTimeout(timer))
  }
}

// ---------------------------------------------------------------------------
// Rate-limit classification
// ---------------------------------------------------------------------------

const RATE_LIMIT_MESSAGE = /rate limit|limit exceeded|too many requests/i

export function isRateLimitError(err: unknown): boolean {
  if (err instanceof BaseError) {
    const hit = err.walk(
      (e) =>
        (e instanceof HttpRequestError && e.status === 429) ||
        e instanceof LimitExceededRpcError,
    )
    if (hit) return true
  }
  return err instanceof Error && RATE_LIMIT_MESSAGE.test(err.message)
}
