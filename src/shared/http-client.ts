// src/shared/http-client.ts
// ResilientHttpClient: HTTP client with exponential backoff retry and a per-attempt timeout.
// Shared by the activation collaborators and the webhook notifier.

export interface HttpRequest {
  url: string
  method: "GET" | "POST" | "PUT" | "DELETE"
  headers?: Record<string, string>
  body?: string
}

export interface HttpResponse {
  status: number
  headers: Record<string, string>
  body: string
}

export interface IHttpClient {
  request(req: HttpRequest): Promise<HttpResponse>
}

export interface ResilientHttpConfig {
  /** Retries after the first attempt */
  maxRetries: number
  baseDelayMs: number
  /** Per-attempt timeout (default: 10_000) */
  timeoutMs?: number
}

export type FetchFn = (url: string, init: RequestInit) => Promise<Response>

export class ResilientHttpClient implements IHttpClient {
  constructor(
    private readonly config: ResilientHttpConfig,
    private readonly sleep: (ms: number) => Promise<void> = (ms) => new Promise(r => setTimeout(r, ms)),
    private readonly fetchFn: FetchFn = (url, init) => fetch(url, init),
  ) {}

  /**
   * Retries network errors, timeouts, 429 and 5xx. Other statuses are
   * returned to the caller as-is; the last retryable response is returned
   * once the budget is spent.
   */
  async request(req: HttpRequest): Promise<HttpResponse> {
    let lastError: Error | undefined

    for (let attempt = 0; attempt <= this.config.maxRetries; attempt++) {
      if (attempt > 0) {
        const delay = this.config.baseDelayMs * Math.pow(2, attempt - 1)
        await this.sleep(delay)
      }

      try {
        const resp = await this.fetchFn(req.url, {
          method: req.method,
          headers: req.headers,
          body: req.body,
          signal: AbortSignal.timeout(this.config.timeoutMs ?? 10_000),
        })

        const body = await resp.text()
        const headers: Record<string, string> = {}
        resp.headers.forEach((v, k) => { headers[k] = v })

        const response: HttpResponse = { status: resp.status, headers, body }

        if ((resp.status >= 500 || resp.status === 429) && attempt < this.config.maxRetries) {
          lastError = new Error(`HTTP ${resp.status}: ${body.slice(0, 200)}`)
          continue
        }

        return response
      } catch (err) {
        lastError = err instanceof Error ? err : new Error(String(err))
        if (attempt >= this.config.maxRetries) break
      }
    }

    throw lastError ?? new Error("Request failed after retries")
  }
}
