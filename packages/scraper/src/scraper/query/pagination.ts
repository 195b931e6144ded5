/**
 * Pagination Resolver
 *
 * Reads the last page number of a listing from its pager links.
 */

import { PageStructureError } from '../errors.js'
import type { QueryableDocument } from './document.js'
import { queryText } from './extract.js'

/** Appended to the caller's prefix, tried in this order */
export const PAGINATION_PATHS = {
  lastPage: "//li[contains(@class, 'list-item--icon-last-page')]//a/@href",
  activePage: "//li[contains(@class, 'list-item--active')]//a/@href",
} as const

/**
 * Page number from a pager href: the part after the last '=', then after the
 * last '/'. Handles both `?page=7` and `/page/7`.
 */
export function parsePageNumber(href: string, url: string): number {
  const afterEquals = href.split('=').pop() ?? ''
  const segment = (afterEquals.split('/').pop() ?? '').trim()

  if (!/^\d+$/.test(segment)) {
    throw new PageStructureError(`Unparseable page number in "${href}"`, url)
  }

  const page = Number.parseInt(segment, 10)
  if (page < 1) {
    throw new PageStructureError(`Page number out of range in "${href}"`, url)
  }
  return page
}

export function lastPageNumber(doc: QueryableDocument, pathPrefix = ''): number {
  for (const suffix of [PAGINATION_PATHS.lastPage, PAGINATION_PATHS.activePage]) {
    const href = queryText(doc, pathPrefix + suffix)
    if (href) {
      return parsePageNumber(href, doc.url)
    }
  }
  return 1
}
