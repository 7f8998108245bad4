// src/scheduler/circuit-breaker.ts — Three-state circuit breaker for scheduled tasks
//
// closed → open after `failureThreshold` consecutive failures; open → half-open
// once `cooldownMs` has passed since the last failure; a half-open probe
// closes the circuit on success and re-opens it on failure.

export type CircuitState = "closed" | "open" | "half-open"

export interface CircuitBreakerConfig {
  failureThreshold: number  // Default: 3
  cooldownMs: number        // Default: 300_000 (5 min)
}

export interface CircuitBreakerStats {
  state: CircuitState
  failureCount: number
  successCount: number
  lastFailure?: number
  lastSuccess?: number
  probes: number
}

export class CircuitBreakerOpenError extends Error {
  constructor(taskId: string, public readonly retryAfterMs: number) {
    super(`Circuit breaker OPEN for ${taskId}, retry after ${retryAfterMs}ms`)
    this.name = "CircuitBreakerOpenError"
  }
}

export const DEFAULT_BREAKER_CONFIG: CircuitBreakerConfig = {
  failureThreshold: 3,
  cooldownMs: 300_000,
}

export class CircuitBreaker {
  private state: CircuitState = "closed"
  private failureCount = 0
  private successCount = 0
  private lastFailure: number | undefined
  private lastSuccess: number | undefined
  private probes = 0
  private onStateChange?: (taskId: string, from: CircuitState, to: CircuitState) => void
  private readonly config: CircuitBreakerConfig

  constructor(
    private readonly taskId: string,
    config?: Partial<CircuitBreakerConfig>,
    private readonly now: () => number = Date.now,
  ) {
    this.config = { ...DEFAULT_BREAKER_CONFIG, ...config }
  }

  /** Register a callback for state changes. */
  onTransition(cb: (taskId: string, from: CircuitState, to: CircuitState) => void): void {
    this.onStateChange = cb
  }

  /** Execute a function with circuit breaker protection. */
  async execute<T>(fn: () => Promise<T>): Promise<T> {
    switch (this.getState()) {
      case "closed":
        return this.executeClosed(fn)
      case "open":
        throw new CircuitBreakerOpenError(this.taskId, this.retryAfterMs())
      case "half-open":
        return this.executeHalfOpen(fn)
    }
  }

  getState(): CircuitState {
    if (
      this.state === "open" &&
      this.lastFailure !== undefined &&
      this.now() - this.lastFailure >= this.config.cooldownMs
    ) {
      this.transition("half-open")
    }
    return this.state
  }

  getStats(): CircuitBreakerStats {
    return {
      state: this.getState(),
      failureCount: this.failureCount,
      successCount: this.successCount,
      lastFailure: this.lastFailure,
      lastSuccess: this.lastSuccess,
      probes: this.probes,
    }
  }

  /** Manual reset to closed state. */
  reset(): void {
    this.transition("closed")
    this.failureCount = 0
  }

  private retryAfterMs(): number {
    if (this.lastFailure === undefined) return this.config.cooldownMs
    return Math.max(0, this.config.cooldownMs - (this.now() - this.lastFailure))
  }

  private async executeClosed<T>(fn: () => Promise<T>): Promise<T> {
    try {
      const result = await fn()
      this.failureCount = 0
      this.successCount++
      this.lastSuccess = this.now()
      return result
    } catch (err) {
      this.failureCount++
      this.lastFailure = this.now()
      if (this.failureCount >= this.config.failureThreshold) {
        this.transition("open")
      }
      throw err
    }
  }

  private async executeHalfOpen<T>(fn: () => Promise<T>): Promise<T> {
    this.probes++
    try {
      const result = await fn()
      this.transition("closed")
      this.failureCount = 0
      this.successCount++
      this.lastSuccess = this.now()
      return result
    } catch (err) {
      this.failureCount++
      this.lastFailure = this.now()
      this.transition("open")
      throw err
    }
  }

  private transition(to: CircuitState): void {
    const from = this.state
    if (from === to) return
    this.state = to
    this.onStateChange?.(this.taskId, from, to)
  }
}
