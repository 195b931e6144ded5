/**
 * Scrape Error Taxonomy
 *
 * Fetch and require calls return these as values. ScrapeFailure wraps one
 * for callers that prefer to throw. Defects in paths, page structure or call
 * order are thrown as plain Error subclasses.
 */

export type FetchError =
  | { kind: 'Timeout'; url: string; timeoutSeconds: number }
  | { kind: 'TooManyRedirects'; url: string }
  | { kind: 'ConnectionFailure'; url: string; cause: string }
  | { kind: 'RequestFailure'; url: string; cause: string }
  | { kind: 'UnexpectedFailure'; url: string; cause: string }
  | { kind: 'ClientError'; url: string; status: number; reason: string }
  | { kind: 'ServerError'; url: string; status: number; reason: string }

export type NotFoundInPage = { kind: 'NotFoundInPage'; url: string }

export type ScrapeError = FetchError | NotFoundInPage

export type ScrapeErrorKind = ScrapeError['kind']

export interface HttpErrorMapping {
  statusCode: number
  detail: string
}

/**
 * Status code and detail message an endpoint layer should answer with.
 */
export function toHttpError(error: ScrapeError): HttpErrorMapping {
  switch (error.kind) {
    case 'Timeout':
      return {
        statusCode: 504,
        detail: `Request timeout after ${error.timeoutSeconds}s for url: ${error.url}`,
      }
    case 'TooManyRedirects':
      return { statusCode: 404, detail: `Too many redirects for url: ${error.url}` }
    case 'ConnectionFailure':
      return { statusCode: 503, detail: `Connection error for url: ${error.url}. ${error.cause}` }
    case 'RequestFailure':
      return { statusCode: 500, detail: `Request error for url: ${error.url}. ${error.cause}` }
    case 'UnexpectedFailure':
      return { statusCode: 500, detail: `Unexpected error for url: ${error.url}. ${error.cause}` }
    case 'ClientError':
      return { statusCode: error.status, detail: `Client Error. ${error.reason} for url: ${error.url}` }
    case 'ServerError':
      return { statusCode: error.status, detail: `Server Error. ${error.reason} for url: ${error.url}` }
    case 'NotFoundInPage':
      return { statusCode: 404, detail: `Invalid request (url: ${error.url})` }
  }
}

export class ScrapeFailure extends Error {
  readonly statusCode: number

  constructor(public readonly error: ScrapeError) {
    const mapped = toHttpError(error)
    super(mapped.detail)
    this.name = 'ScrapeFailure'
    this.statusCode = mapped.statusCode
  }

  get kind(): ScrapeErrorKind {
    return this.error.kind
  }
}

export class InvalidPathError extends Error {
  constructor(
    public readonly path: string,
    cause?: unknown
  ) {
    super(`Invalid path expression: ${path}`, { cause })
    this.name = 'InvalidPathError'
  }
}

/** The page parsed, but its content does not have the expected shape */
export class PageStructureError extends Error {
  constructor(
    message: string,
    public readonly url: string
  ) {
    super(`${message} (url: ${url})`)
    this.name = 'PageStructureError'
  }
}

export class PageNotLoadedError extends Error {
  constructor(public readonly url: string) {
    super(`Page not loaded; call load() first (url: ${url})`)
    this.name = 'PageNotLoadedError'
  }
}
