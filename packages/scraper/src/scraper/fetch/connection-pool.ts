/**
 * Connection Pool
 *
 * Owns the keep-alive agents every outbound request goes through, and the
 * retry policy applied to them. One instance per process (getConnectionPool);
 * tests build their own with an injected axios adapter.
 *
 * Retries happen here and only here: idempotent methods, retryable statuses
 * or mid-connection resets, bounded by maxRetries with exponential backoff.
 * A Retry-After header on 429/503 can shorten a backoff step.
 * When the budget runs out the last response is returned (or the last error
 * rethrown) for the fetcher to classify.
 */

import { Agent as HttpAgent } from 'http'
import { Agent as HttpsAgent } from 'https'
import axios, { type AxiosAdapter, type AxiosInstance, type AxiosResponse } from 'axios'
import type { ILogger } from '@pagequery/logger'
import { loggers } from '../../config/logger.js'
import { BACKOFF_FACTOR, POOL_LIMITS, getSettings } from '../../config/settings.js'
import type {
  Clock,
  HttpMethod,
  PoolLimits,
  PoolRequestOptions,
  PoolResponse,
  RetryPolicy,
} from '../types.js'
import { DEFAULT_RETRY_POLICY, systemClock } from '../types.js'

/** Redirects followed before the request fails with TooManyRedirects */
const DEFAULT_MAX_REDIRECTS = 30

export interface ConnectionPoolOptions {
  limits?: PoolLimits
  retryPolicy?: RetryPolicy
  /** Backoff sleeps go through this clock */
  clock?: Clock
  /** Replaces the network adapter (tests) */
  adapter?: AxiosAdapter
  logger?: ILogger
}

/**
 * Transport error code of a failed request, if it carries one.
 */
export function transportErrorCode(error: unknown): string | undefined {
  if (axios.isAxiosError(error)) {
    return error.code
  }
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code
  }
  return undefined
}

/**
 * Delay requested by a Retry-After header value (delta-seconds or HTTP date),
 * relative to `now`. Undefined when absent or unparseable.
 */
export function parseRetryAfter(value: unknown, now: number): number | undefined {
  if (typeof value !== 'string' || value.trim() === '') {
    return undefined
  }
  const trimmed = value.trim()
  if (/^\d+$/.test(trimmed)) {
    return Number.parseInt(trimmed, 10) * 1000
  }
  const date = Date.parse(trimmed)
  if (Number.isNaN(date)) {
    return undefined
  }
  return Math.max(0, date - now)
}

function finalUrlOf(response: AxiosResponse<string>, requestedUrl: string): string {
  // Node's http adapter exposes the post-redirect URL on the raw response
  const responseUrl: unknown = response.request?.res?.responseUrl
  return typeof responseUrl === 'string' && responseUrl !== '' ? responseUrl : requestedUrl
}

export class ConnectionPool {
  readonly limits: PoolLimits
  readonly retryPolicy: RetryPolicy
  private readonly clock: Clock
  private readonly log: ILogger
  private readonly httpAgent: HttpAgent
  private readonly httpsAgent: HttpsAgent
  private readonly client: AxiosInstance

  constructor(options: ConnectionPoolOptions = {}) {
    this.limits = options.limits ?? POOL_LIMITS
    this.retryPolicy = options.retryPolicy ?? DEFAULT_RETRY_POLICY
    this.clock = options.clock ?? systemClock
    this.log = options.logger ?? loggers.pool

    const agentOptions = {
      keepAlive: true,
      maxSockets: this.limits.maxConnectionsPerHost,
      maxTotalSockets: this.limits.maxTotalConnections,
      maxFreeSockets: this.limits.maxIdlePerHost,
    }
    this.httpAgent = new HttpAgent(agentOptions)
    this.httpsAgent = new HttpsAgent(agentOptions)

    this.client = axios.create({
      httpAgent: this.httpAgent,
      httpsAgent: this.httpsAgent,
      responseType: 'text',
      // Status classification belongs to the fetcher
      validateStatus: () => true,
      transitional: { clarifyTimeoutError: true },
      ...(options.adapter ? { adapter: options.adapter } : {}),
    })
  }

  isRetryableMethod(method: HttpMethod): boolean {
    return this.retryPolicy.retryableMethods.includes(method)
  }

  isRetryableStatus(status: number): boolean {
    return this.retryPolicy.retryableStatusCodes.includes(status)
  }

  /**
   * Delay before retry number `retry` (1-based).
   */
  backoffMs(retry: number): number {
    return this.retryPolicy.backoffFactor * Math.pow(2, retry - 1) * 1000
  }

  async request(method: HttpMethod, url: string, options: PoolRequestOptions): Promise<PoolResponse> {
    for (let attempt = 1; ; attempt++) {
      const canRetry = attempt <= this.retryPolicy.maxRetries && this.isRetryableMethod(method)

      let response: AxiosResponse<string>
      try {
        response = await this.client.request<string>({
          method,
          url,
          headers: options.headers,
          timeout: options.timeoutMs,
          maxRedirects: options.maxRedirects ?? DEFAULT_MAX_REDIRECTS,
        })
      } catch (error) {
        const code = transportErrorCode(error)
        if (canRetry && code !== undefined && this.retryPolicy.retryableErrorCodes.includes(code)) {
          await this.backoff(attempt, { url, method, code })
          continue
        }
        throw error
      }

      if (canRetry && this.isRetryableStatus(response.status)) {
        const retryAfterMs = this.retryPolicy.retryAfterStatusCodes.includes(response.status)
          ? parseRetryAfter(response.headers['retry-after'], this.clock.now())
          : undefined
        await this.backoff(attempt, { url, method, status: response.status }, retryAfterMs)
        continue
      }

      return {
        status: response.status,
        statusText: response.statusText,
        body: typeof response.data === 'string' ? response.data : String(response.data ?? ''),
        url: finalUrlOf(response, url),
        attempts: attempt,
      }
    }
  }

  /**
   * Destroy pooled sockets. The pool must not be used afterwards.
   */
  close(): void {
    this.httpAgent.destroy()
    this.httpsAgent.destroy()
  }

  // A server-requested delay may shorten the scheduled backoff, never extend it
  private async backoff(retry: number, meta: Record<string, unknown>, retryAfterMs?: number): Promise<void> {
    const scheduledMs = this.backoffMs(retry)
    const delayMs = retryAfterMs === undefined ? scheduledMs : Math.min(retryAfterMs, scheduledMs)
    this.log.warn('Retrying request', {
      ...meta,
      retry,
      maxRetries: this.retryPolicy.maxRetries,
      delayMs,
      ...(retryAfterMs === undefined ? {} : { retryAfterMs }),
    })
    await this.clock.sleep(delayMs)
  }
}

let sharedPool: ConnectionPool | null = null

/**
 * Process-wide pool, created on first use from settings.
 */
export function getConnectionPool(): ConnectionPool {
  if (!sharedPool) {
    const settings = getSettings()
    sharedPool = new ConnectionPool({
      retryPolicy: {
        ...DEFAULT_RETRY_POLICY,
        maxRetries: settings.REQUEST_MAX_RETRIES,
        backoffFactor: BACKOFF_FACTOR,
      },
    })
    loggers.pool.debug('Connection pool created', { ...POOL_LIMITS, maxRetries: settings.REQUEST_MAX_RETRIES })
  }
  return sharedPool
}

/**
 * Close and forget the process-wide pool (shutdown, tests).
 */
export function resetConnectionPool(): void {
  if (sharedPool) {
    sharedPool.close()
    sharedPool = null
  }
}
