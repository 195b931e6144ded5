/**
 * Scraper core: fetch, parse and query pages of a single site.
 */

export * from './types.js'
export * from './errors.js'
export * from './context.js'
export * from './page-scraper.js'
export { ConnectionPool, getConnectionPool, resetConnectionPool, transportErrorCode } from './fetch/connection-pool.js'
export type { ConnectionPoolOptions } from './fetch/connection-pool.js'
export { RatePacer, getRatePacer, resetRatePacer } from './fetch/rate-pacer.js'
export type { RatePacerOptions } from './fetch/rate-pacer.js'
export { HttpFetcher, classifyStatus, classifyTransportError } from './fetch/http-fetcher.js'
export type { HttpFetcherOptions } from './fetch/http-fetcher.js'
export { JsdomDocument, parseHtml } from './query/document.js'
export type { QueryableDocument } from './query/document.js'
export { queryList, queryText, requirePath, trim } from './query/extract.js'
export type { QueryListOptions, QueryTextOptions, RequireResult } from './query/extract.js'
export { PAGINATION_PATHS, lastPageNumber, parsePageNumber } from './query/pagination.js'
