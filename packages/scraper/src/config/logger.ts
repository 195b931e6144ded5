import { createLogger } from '@pagequery/logger'

export const rootLogger = createLogger('scraper')

export const loggers = {
  pool: rootLogger.child('pool'),
  pacer: rootLogger.child('pacer'),
  fetcher: rootLogger.child('fetcher'),
  scraper: rootLogger.child('page'),
}
