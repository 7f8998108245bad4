// src/scheduler/scheduler.ts — Non-overlapping periodic task execution
//
// Each task's next tick is armed only after the previous run resolves, so a
// slow sweep delays the next one instead of overlapping it. stop() disarms the
// timers and resolves once in-flight runs have finished.

import { CircuitBreaker, type CircuitBreakerConfig, type CircuitState } from "./circuit-breaker.js"
import { consoleLogger, errorMessage, type Logger } from "../shared/logger.js"

export interface ScheduledTaskDef {
  id: string
  name: string
  intervalMs: number
  jitterMs: number
  handler: () => Promise<unknown>
  circuitBreakerConfig?: Partial<CircuitBreakerConfig>
}

interface RunningTask {
  def: ScheduledTaskDef
  timer: ReturnType<typeof setTimeout> | undefined
  circuitBreaker: CircuitBreaker
  lastRun: number | undefined
  lastError: string | undefined
  inFlight: Promise<void> | undefined
}

export interface TaskStatus {
  id: string
  name: string
  state: "running" | "waiting" | "error"
  lastRun: number | undefined
  lastError: string | undefined
  circuitBreakerState: CircuitState
  circuitBreakerFailures: number
}

export interface SchedulerOptions {
  logger?: Logger
  /** Lower bound on the delay between runs (default: 1000) */
  minDelayMs?: number
  random?: () => number
}

export class Scheduler {
  private tasks = new Map<string, RunningTask>()
  private started = false
  private onCircuitChange?: (taskId: string, from: CircuitState, to: CircuitState) => void
  private readonly logger: Logger
  private readonly minDelayMs: number
  private readonly random: () => number

  constructor(options?: SchedulerOptions) {
    this.logger = options?.logger ?? consoleLogger
    this.minDelayMs = options?.minDelayMs ?? 1000
    this.random = options?.random ?? Math.random
  }

  /** Register a callback for circuit breaker state changes. */
  onCircuitTransition(cb: (taskId: string, from: CircuitState, to: CircuitState) => void): void {
    this.onCircuitChange = cb
  }

  register(def: ScheduledTaskDef): void {
    if (this.tasks.has(def.id)) {
      throw new Error(`Task ${def.id} is already registered`)
    }
    const cb = new CircuitBreaker(def.id, def.circuitBreakerConfig)
    cb.onTransition((taskId, from, to) => {
      this.logger.warn("[scheduler] circuit breaker transition", { taskId, from, to })
      this.onCircuitChange?.(taskId, from, to)
    })

    this.tasks.set(def.id, {
      def,
      timer: undefined,
      circuitBreaker: cb,
      lastRun: undefined,
      lastError: undefined,
      inFlight: undefined,
    })
  }

  start(): void {
    if (this.started) return
    this.started = true

    for (const task of this.tasks.values()) {
      this.scheduleNext(task)
    }
  }

  /** Disarm every timer, then wait for runs already in progress. */
  async stop(): Promise<void> {
    this.started = false
    const inFlight: Promise<void>[] = []
    for (const task of this.tasks.values()) {
      if (task.timer) {
        clearTimeout(task.timer)
        task.timer = undefined
      }
      if (task.inFlight) inFlight.push(task.inFlight)
    }
    await Promise.all(inFlight)
  }

  /** Run a task immediately, outside its timer (boot, tests). Joins an in-flight run. */
  async runNow(taskId: string): Promise<void> {
    const task = this.tasks.get(taskId)
    if (!task) throw new Error(`Unknown task ${taskId}`)
    await this.runTask(task)
  }

  getStatus(): TaskStatus[] {
    return Array.from(this.tasks.values()).map((t) => {
      const cbState = t.circuitBreaker.getState()
      let state: "running" | "waiting" | "error" = "waiting"
      if (t.inFlight) state = "running"
      else if (t.lastError && cbState === "open") state = "error"

      return {
        id: t.def.id,
        name: t.def.name,
        state,
        lastRun: t.lastRun,
        lastError: t.lastError,
        circuitBreakerState: cbState,
        circuitBreakerFailures: t.circuitBreaker.getStats().failureCount,
      }
    })
  }

  /** Get a specific task's circuit breaker (for testing). */
  getCircuitBreaker(taskId: string): CircuitBreaker | undefined {
    return this.tasks.get(taskId)?.circuitBreaker
  }

  private scheduleNext(task: RunningTask): void {
    if (!this.started) return

    const jitter = task.def.jitterMs * (2 * this.random() - 1) // ±jitter
    const delay = Math.max(this.minDelayMs, task.def.intervalMs + jitter)

    // stop() then start() during a run can arm a timer before the run re-arms
    if (task.timer) clearTimeout(task.timer)
    task.timer = setTimeout(() => {
      task.timer = undefined
      void this.runTask(task).then(() => this.scheduleNext(task))
    }, delay)

    // Allow Node to exit cleanly if only timers remain
    task.timer.unref()
  }

  private runTask(task: RunningTask): Promise<void> {
    if (task.inFlight) return task.inFlight

    const run = (async () => {
      try {
        await task.circuitBreaker.execute(task.def.handler)
        task.lastError = undefined
      } catch (err) {
        task.lastError = errorMessage(err)
        this.logger.error(`[scheduler] task ${task.def.id} failed`, { error: task.lastError })
      } finally {
        task.lastRun = Date.now()
        task.inFlight = undefined
      }
    })()
    task.inFlight = run
    return run
  }
}
