/**
 * Path Query Engine
 *
 * Turns XPath matches into trimmed strings. Lookups that find nothing return
 * undefined or [] silently; requirePath is the one call that turns a missing
 * value into an error.
 */

import type { NotFoundInPage } from '../errors.js'
import type { QueryableDocument } from './document.js'

export interface QueryListOptions {
  /** Drop values that are empty after trimming. Default: true */
  removeEmpty?: boolean
}

export interface QueryTextOptions {
  /** Index returned when no `at`/`joinWith` applies. Default: 0 */
  pos?: number
  /** Single index picked after any from/to slicing */
  at?: number
  /** Inclusive slice start */
  from?: number
  /** Exclusive slice end */
  to?: number
  /** Join the (sliced) values with this separator */
  joinWith?: string
}

export type RequireResult = { ok: true; value: string } | { ok: false; error: NotFoundInPage }

/**
 * Collapse whitespace runs (including non-breaking spaces) and strip the ends.
 */
export function trim(value: string): string {
  return value.replace(/\s+/g, ' ').trim()
}

// Negative indexes count from the end
function elementAt(values: string[], index: number): string | undefined {
  return values[index < 0 ? values.length + index : index]
}

export function queryList(doc: QueryableDocument, path: string, options: QueryListOptions = {}): string[] {
  const removeEmpty = options.removeEmpty ?? true
  const values = (doc.select(path) ?? []).map(trim)
  return removeEmpty ? values.filter(value => value !== '') : values
}

/**
 * Slicing precedence: from+to, else to alone, else from alone. `at` is then
 * applied to the sliced list and wins over `joinWith` and `pos`.
 */
export function queryText(doc: QueryableDocument, path: string, options: QueryTextOptions = {}): string | undefined {
  const raw = doc.select(path)
  if (!raw) return undefined

  let values = raw.map(trim).filter(value => value !== '')
  const { from, to } = options

  if (from !== undefined && to !== undefined) {
    values = values.slice(from, to)
  } else if (to !== undefined) {
    values = values.slice(0, to)
  } else if (from !== undefined) {
    values = values.slice(from)
  }

  if (options.at !== undefined) {
    return elementAt(values, options.at)
  }

  if (options.joinWith !== undefined) {
    return values.join(options.joinWith)
  }

  return elementAt(values, options.pos ?? 0)
}

export function requirePath(doc: QueryableDocument, path: string): RequireResult {
  const value = queryText(doc, path)
  if (!value) {
    return { ok: false, error: { kind: 'NotFoundInPage', url: doc.url } }
  }
  return { ok: true, value }
}
