/**
 * HTTP Document Fetcher
 *
 * Paces, sends one GET through the shared pool, then classifies whatever came
 * back into a FetchOutcome. Retrying is the pool's job; by the time a result
 * reaches this class it is final.
 */

import axios from 'axios'
import type { ILogger } from '@pagequery/logger'
import { loggers } from '../../config/logger.js'
import type { FetchError } from '../errors.js'
import type { Fetcher, FetchOutcome, Pacer, PoolResponse } from '../types.js'
import { DEFAULT_FETCH_HEADERS } from '../types.js'
import type { ConnectionPool } from './connection-pool.js'
import { transportErrorCode } from './connection-pool.js'

// The pool sets clarifyTimeoutError, so axios reports timeouts as ETIMEDOUT
const TIMEOUT_CODES = ['ETIMEDOUT']

const REDIRECT_CODES = ['ERR_FR_TOO_MANY_REDIRECTS']

// Node.js network error codes for a connection that failed or dropped
const CONNECTION_CODES = [
  'ECONNREFUSED',
  'ECONNRESET',
  'ENOTFOUND',
  'EAI_AGAIN',
  'EPIPE',
  'EHOSTUNREACH',
  'ENETUNREACH',
]

export interface HttpFetcherOptions {
  pool: ConnectionPool
  pacer: Pacer
  timeoutSeconds: number
  logger?: ILogger
}

function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}

/**
 * Classify a failed attempt (thrown by the pool) into a fetch error.
 */
export function classifyTransportError(url: string, error: unknown, timeoutSeconds: number): FetchError {
  if (!axios.isAxiosError(error)) {
    return { kind: 'UnexpectedFailure', url, cause: messageOf(error) }
  }

  const code = transportErrorCode(error)
  if (code !== undefined && TIMEOUT_CODES.includes(code)) {
    return { kind: 'Timeout', url, timeoutSeconds }
  }
  if (code !== undefined && REDIRECT_CODES.includes(code)) {
    return { kind: 'TooManyRedirects', url }
  }
  if (code !== undefined && CONNECTION_CODES.includes(code)) {
    return { kind: 'ConnectionFailure', url, cause: error.message }
  }
  return { kind: 'RequestFailure', url, cause: error.message }
}

/**
 * Classify a completed response by status. Undefined means success.
 */
export function classifyStatus(url: string, response: Pick<PoolResponse, 'status' | 'statusText'>): FetchError | undefined {
  const { status, statusText: reason } = response
  if (status >= 400 && status < 500) {
    return { kind: 'ClientError', url, status, reason }
  }
  if (status >= 500 && status < 600) {
    return { kind: 'ServerError', url, status, reason }
  }
  return undefined
}

export class HttpFetcher implements Fetcher {
  readonly pool: ConnectionPool
  readonly pacer: Pacer
  readonly timeoutSeconds: number
  private readonly log: ILogger

  constructor(options: HttpFetcherOptions) {
    this.pool = options.pool
    this.pacer = options.pacer
    this.timeoutSeconds = options.timeoutSeconds
    this.log = options.logger ?? loggers.fetcher
  }

  async fetch(url: string): Promise<FetchOutcome> {
    await this.pacer.awaitTurn()
    const startTime = Date.now()

    let response: PoolResponse
    try {
      response = await this.pool.request('GET', url, {
        headers: { ...DEFAULT_FETCH_HEADERS },
        timeoutMs: this.timeoutSeconds * 1000,
      })
    } catch (error) {
      const classified = classifyTransportError(url, error, this.timeoutSeconds)
      this.log.warn('Fetch failed', { url, kind: classified.kind, durationMs: Date.now() - startTime }, error)
      return { ok: false, error: classified }
    } finally {
      this.pacer.markComplete()
    }

    const durationMs = Date.now() - startTime
    const statusError = classifyStatus(url, response)
    if (statusError) {
      this.log.warn('Fetch returned error status', {
        url,
        kind: statusError.kind,
        status: response.status,
        attempts: response.attempts,
        durationMs,
      })
      return { ok: false, error: statusError }
    }

    this.log.debug('Fetched page', { url, status: response.status, attempts: response.attempts, durationMs })
    return {
      ok: true,
      page: {
        url: response.url,
        status: response.status,
        body: response.body,
        durationMs,
      },
    }
  }
}
