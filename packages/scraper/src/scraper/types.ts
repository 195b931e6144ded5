/**
 * Scraper Core Types
 *
 * Fetch contracts, retry policy, pacing and pool configuration shared by the
 * fetch and query modules.
 */

import type { FetchError } from './errors.js'

// ═══════════════════════════════════════════════════════════════════════════════
// HTTP Methods
// ═══════════════════════════════════════════════════════════════════════════════

export type HttpMethod = 'GET' | 'HEAD' | 'OPTIONS' | 'POST' | 'PUT' | 'PATCH' | 'DELETE'

// ═══════════════════════════════════════════════════════════════════════════════
// Retry Policy
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Retry policy applied inside the connection pool.
 * The fetcher never retries on its own.
 */
export interface RetryPolicy {
  /** Retries after the first attempt (0 disables retry) */
  maxRetries: number

  /** Seconds; retry n waits backoffFactor * 2^(n-1) */
  backoffFactor: number

  /** Response statuses that trigger a retry */
  retryableStatusCodes: readonly number[]

  /** Only these methods are ever retried */
  retryableMethods: readonly HttpMethod[]

  /** Transport error codes (mid-connection resets) that trigger a retry */
  retryableErrorCodes: readonly string[]

  /** Statuses whose Retry-After header is honoured, capped at the backoff */
  retryAfterStatusCodes: readonly number[]
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxRetries: 2,
  backoffFactor: 1,
  retryableStatusCodes: [429, 500, 502, 503, 504],
  retryableMethods: ['HEAD', 'GET', 'OPTIONS'],
  retryableErrorCodes: ['ECONNRESET', 'EPIPE'],
  retryAfterStatusCodes: [429, 503],
}

// ═══════════════════════════════════════════════════════════════════════════════
// Connection Pool
// ═══════════════════════════════════════════════════════════════════════════════

export interface PoolLimits {
  /** Max sockets open to a single host */
  maxConnectionsPerHost: number

  /** Max sockets open across all hosts */
  maxTotalConnections: number

  /** Idle keep-alive sockets kept per host */
  maxIdlePerHost: number
}

export interface PoolRequestOptions {
  headers?: Record<string, string>
  timeoutMs: number
  maxRedirects?: number
}

/**
 * Final response handed back by the pool after any retries.
 */
export interface PoolResponse {
  status: number
  statusText: string
  body: string
  /** URL after redirects */
  url: string
  /** Attempts made, including the first */
  attempts: number
}

// ═══════════════════════════════════════════════════════════════════════════════
// Rate Pacing
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Time source used by the pacer and the pool's backoff sleeps.
 * Injected in tests to avoid real waits.
 */
export interface Clock {
  now(): number
  sleep(ms: number): Promise<void>
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: ms => new Promise(resolve => setTimeout(resolve, ms)),
}

export interface Pacer {
  /** Suspend until the minimum interval allows another request */
  awaitTurn(): Promise<void>

  /** Record that the admitted request finished (success or failure) */
  markComplete(): void
}

// ═══════════════════════════════════════════════════════════════════════════════
// Fetcher Interface
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Desktop browser headers; the target site rejects unknown agents.
 */
export const DEFAULT_FETCH_HEADERS: Readonly<Record<string, string>> = {
  'User-Agent':
    'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/113.0.0.0 Safari/537.36',
}

export interface FetchedPage {
  url: string
  status: number
  body: string
  durationMs: number
}

/**
 * Explicit fetch outcome. Callers switch on `ok`, then on `error.kind`.
 */
export type FetchOutcome =
  | { ok: true; page: FetchedPage }
  | { ok: false; error: FetchError }

export interface Fetcher {
  fetch(url: string): Promise<FetchOutcome>
}
