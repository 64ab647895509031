/**
 * Request pacing and retry policy for the Threads Graph API
 *
 * - Fixed spacing between consecutive calls (requestDelayMs)
 * - Retry on 429 and 5xx, honoring Retry-After, else 2^n seconds ±25% jitter
 * - Circuit breaker after N consecutive failures, reset after a cool-down
 */

export interface RateLimitConfig {
  /** ms between API calls */
  requestDelayMs: number
  /** retries for 429/5xx responses */
  maxRetries: number
  /** consecutive failures before the circuit opens */
  circuitBreakerThreshold: number
  /** ms before an open circuit closes again */
  circuitBreakerResetMs: number
}

export interface RateLimitState {
  consecutiveFailures: number
  circuitOpen: boolean
  circuitOpenedAt: number | null
  lastCallTime: number | null
}

export type RetryDecision = { shouldRetry: boolean; delayMs: number }

const DEFAULT_RATE_LIMIT: RateLimitConfig = {
  requestDelayMs: 500,
  maxRetries: 3,
  circuitBreakerThreshold: 5,
  circuitBreakerResetMs: 60_000,
}

function initialState(): RateLimitState {
  return {
    consecutiveFailures: 0,
    circuitOpen: false,
    circuitOpenedAt: null,
    lastCallTime: null,
  }
}

export class RateLimiter {
  private readonly config: RateLimitConfig
  private state: RateLimitState = initialState()
  private readonly now: () => number
  private readonly random: () => number

  constructor(
    partialConfig: Partial<RateLimitConfig> = {},
    clock: { now?: () => number; random?: () => number } = {},
  ) {
    this.config = { ...DEFAULT_RATE_LIMIT, ...partialConfig }
    if (this.config.requestDelayMs < 0)
      throw new Error('requestDelayMs must be non-negative')
    if (this.config.maxRetries < 0)
      throw new Error('maxRetries must be non-negative')
    if (this.config.circuitBreakerThreshold < 1)
      throw new Error('circuitBreakerThreshold must be >= 1')
    this.now = clock.now ?? Date.now
    this.random = clock.random ?? Math.random
  }

  /** ms to wait before the next call may go out */
  public delayBeforeNextCall(): number {
    if (this.state.lastCallTime === null) return 0
    const elapsed = this.now() - this.state.lastCallTime
    return Math.max(0, this.config.requestDelayMs - elapsed)
  }

  public recordCall(): void {
    this.state.lastCallTime = this.now()
  }

  /**
   * Retry decision for a failed response on the given attempt (1-based)
   */
  public getRetryStrategy(
    status: number,
    attempt: number,
    retryAfter?: string | null,
  ): RetryDecision {
    if (!isRetryableStatus(status) || attempt > this.config.maxRetries) {
      return { shouldRetry: false, delayMs: 0 }
    }

    const retryAfterMs = parseRetryAfter(retryAfter, this.now())
    if (retryAfterMs !== null) {
      return { shouldRetry: true, delayMs: retryAfterMs }
    }

    const baseMs = 2 ** attempt * 1000
    const jitter = (this.random() - 0.5) * 2 * baseMs * 0.25
    return { shouldRetry: true, delayMs: Math.round(baseMs + jitter) }
  }

  public isCircuitOpen(): boolean {
    if (!this.state.circuitOpen) return false
    const openFor = this.now() - (this.state.circuitOpenedAt ?? 0)
    if (openFor >= this.config.circuitBreakerResetMs) {
      this.state.consecutiveFailures = 0
      this.state.circuitOpen = false
      this.state.circuitOpenedAt = null
      return false
    }
    return true
  }

  public recordFailure(): void {
    this.state.consecutiveFailures += 1
    if (this.state.consecutiveFailures >= this.config.circuitBreakerThreshold) {
      this.state.circuitOpen = true
      this.state.circuitOpenedAt = this.now()
    }
  }

  public recordSuccess(): void {
    this.state.consecutiveFailures = 0
    this.state.circuitOpen = false
    this.state.circuitOpenedAt = null
  }

  public getState(): RateLimitState {
    return { ...this.state }
  }

  public getConfig(): RateLimitConfig {
    return { ...this.config }
  }
}

/**
 * Retry-After is either integer seconds or an HTTP date
 */
export function parseRetryAfter(
  value: string | null | undefined,
  now: number = Date.now(),
): number | null {
  if (value === undefined || value === null) return null
  const trimmed = value.trim()
  if (trimmed === '') return null

  if (/^\d+$/.test(trimmed)) {
    return Number.parseInt(trimmed, 10) * 1000
  }

  const date = Date.parse(trimmed)
  if (Number.isNaN(date)) return null
  return Math.max(0, date - now)
}

export function is5xx(status: number): boolean {
  return status >= 500 && status < 600
}

export function isRetryableStatus(status: number): boolean {
  return status === 429 || is5xx(status)
}
