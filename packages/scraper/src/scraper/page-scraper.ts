/**
 * Page Scraper base
 *
 * Base class for per-entity scrapers: holds the page address, loads and
 * parses it through the scraper context, and exposes the query engine on the
 * loaded page. Subclasses fill `response` with what they extract.
 */

import { loggers } from '../config/logger.js'
import { PageNotLoadedError, ScrapeFailure, type FetchError } from './errors.js'
import { getDefaultContext, type ScraperContext } from './context.js'
import { parseHtml, type QueryableDocument } from './query/document.js'
import {
  queryList,
  queryText,
  requirePath,
  type QueryListOptions,
  type QueryTextOptions,
  type RequireResult,
} from './query/extract.js'
import { lastPageNumber } from './query/pagination.js'

export type LoadResult = { ok: true; page: QueryableDocument } | { ok: false; error: FetchError }

export abstract class PageScraper<TResponse extends object = Record<string, unknown>> {
  /** Fields extracted so far */
  readonly response: Partial<TResponse> = {}

  private document: QueryableDocument | null = null

  constructor(
    readonly url: string,
    protected readonly context: ScraperContext = getDefaultContext()
  ) {}

  get isLoaded(): boolean {
    return this.document !== null
  }

  get page(): QueryableDocument {
    if (!this.document) {
      throw new PageNotLoadedError(this.url)
    }
    return this.document
  }

  /**
   * Fetch and parse a page. Defaults to this scraper's own URL. A failed
   * load discards the previously loaded page.
   */
  async load(url?: string): Promise<LoadResult> {
    const target = url ?? this.url
    const outcome = await this.context.fetcher.fetch(target)
    if (!outcome.ok) {
      this.document = null
      loggers.scraper.debug('Page load failed', { url: target, kind: outcome.error.kind })
      return outcome
    }

    this.document = parseHtml(outcome.page.body, target)
    return { ok: true, page: this.document }
  }

  /**
   * load(), throwing ScrapeFailure instead of returning the error.
   */
  async loadOrThrow(url?: string): Promise<QueryableDocument> {
    const result = await this.load(url)
    if (!result.ok) {
      throw new ScrapeFailure(result.error)
    }
    return result.page
  }

  queryList(path: string, options?: QueryListOptions): string[] {
    return queryList(this.page, path, options)
  }

  queryText(path: string, options?: QueryTextOptions): string | undefined {
    return queryText(this.page, path, options)
  }

  requirePath(path: string): RequireResult {
    return requirePath(this.page, path)
  }

  /**
   * requirePath(), throwing ScrapeFailure (NotFoundInPage) on a miss.
   */
  requireText(path: string): string {
    const result = this.requirePath(path)
    if (!result.ok) {
      throw new ScrapeFailure(result.error)
    }
    return result.value
  }

  lastPageNumber(pathPrefix = ''): number {
    return lastPageNumber(this.page, pathPrefix)
  }
}
