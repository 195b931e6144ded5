/**
 * Scraper context: the service objects a page scraper fetches through.
 *
 * The default context sits on top of the process-wide pool and pacer.
 * createScraperContext builds an isolated one (tests, tools).
 */

import { BACKOFF_FACTOR, getSettings, resetSettings, type Settings } from '../config/settings.js'
import { ConnectionPool, getConnectionPool, resetConnectionPool, type ConnectionPoolOptions } from './fetch/connection-pool.js'
import { HttpFetcher } from './fetch/http-fetcher.js'
import { RatePacer, getRatePacer, resetRatePacer } from './fetch/rate-pacer.js'
import type { Clock, Fetcher } from './types.js'
import { DEFAULT_RETRY_POLICY } from './types.js'

export interface ScraperContext {
  readonly fetcher: Fetcher
}

interface SharedFetcher {
  fetcher: HttpFetcher
  pool: ConnectionPool
  pacer: RatePacer
}

let sharedFetcher: SharedFetcher | null = null

// Rebuilt whenever the process-wide pool or pacer has been replaced
function currentSharedFetcher(): HttpFetcher {
  const pool = getConnectionPool()
  const pacer = getRatePacer()
  if (!sharedFetcher || sharedFetcher.pool !== pool || sharedFetcher.pacer !== pacer) {
    sharedFetcher = {
      fetcher: new HttpFetcher({ pool, pacer, timeoutSeconds: getSettings().REQUEST_TIMEOUT }),
      pool,
      pacer,
    }
  }
  return sharedFetcher.fetcher
}

const defaultContext: ScraperContext = {
  get fetcher() {
    return currentSharedFetcher()
  },
}

/**
 * Context backed by the process-wide pool and pacer. The fetcher is resolved
 * on every access, so holders of this context follow resets.
 */
export function getDefaultContext(): ScraperContext {
  return defaultContext
}

/**
 * Drop the process-wide settings, pool and pacer. The next fetch through the
 * default context rebuilds them from the current environment.
 */
export function resetScraperContext(): void {
  sharedFetcher = null
  resetConnectionPool()
  resetRatePacer()
  resetSettings()
}

export interface IsolatedContextOptions {
  clock?: Clock
  adapter?: ConnectionPoolOptions['adapter']
}

/**
 * Fresh pool, pacer and fetcher configured from the given settings.
 */
export function createScraperContext(
  settings: Settings,
  options: IsolatedContextOptions = {}
): ScraperContext & { pool: ConnectionPool; pacer: RatePacer } {
  const pool = new ConnectionPool({
    retryPolicy: {
      ...DEFAULT_RETRY_POLICY,
      maxRetries: settings.REQUEST_MAX_RETRIES,
      backoffFactor: BACKOFF_FACTOR,
    },
    clock: options.clock,
    adapter: options.adapter,
  })
  const pacer = new RatePacer({ intervalSeconds: settings.REQUEST_RATE_LIMIT, clock: options.clock })
  const fetcher = new HttpFetcher({ pool, pacer, timeoutSeconds: settings.REQUEST_TIMEOUT })
  return { fetcher, pool, pacer }
}
