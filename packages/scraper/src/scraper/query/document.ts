/**
 * HTML Parser Adapter
 *
 * Wraps a parsed page behind QueryableDocument so extraction code never
 * touches the parsing backend. jsdom provides both the lenient HTML parser
 * and the XPath evaluator.
 */

import { JSDOM } from 'jsdom'
import { InvalidPathError } from '../errors.js'

export interface QueryableDocument {
  /** Address the page was fetched from */
  readonly url: string

  /**
   * Raw text of every node the path selects, in document order.
   * Undefined when nothing matches.
   */
  select(path: string): string[] | undefined
}

// XPathResult type codes
const ANY_TYPE = 0
const NUMBER_TYPE = 1
const STRING_TYPE = 2
const BOOLEAN_TYPE = 3
const ORDERED_NODE_SNAPSHOT_TYPE = 7

export class JsdomDocument implements QueryableDocument {
  private readonly dom: JSDOM

  constructor(
    html: string,
    readonly url: string
  ) {
    this.dom = new JSDOM(html)
  }

  select(path: string): string[] | undefined {
    const first = this.evaluate(path, ANY_TYPE)

    switch (first.resultType) {
      case STRING_TYPE:
        return first.stringValue === '' ? undefined : [first.stringValue]
      case NUMBER_TYPE:
        return [String(first.numberValue)]
      case BOOLEAN_TYPE:
        return [String(first.booleanValue)]
    }

    // Node-set: re-evaluate as an ordered snapshot so results follow document order
    const snapshot = this.evaluate(path, ORDERED_NODE_SNAPSHOT_TYPE)
    const values: string[] = []
    for (let i = 0; i < snapshot.snapshotLength; i++) {
      values.push(snapshot.snapshotItem(i)?.textContent ?? '')
    }
    return values.length > 0 ? values : undefined
  }

  private evaluate(path: string, type: number): XPathResult {
    const { document } = this.dom.window
    try {
      return document.evaluate(path, document, null, type, null)
    } catch (error) {
      throw new InvalidPathError(path, error)
    }
  }
}

/**
 * Parse fetched HTML into a queryable tree.
 */
export function parseHtml(html: string, url = 'about:blank'): QueryableDocument {
  return new JsdomDocument(html, url)
}
