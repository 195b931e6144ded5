/**
 * Environment loader - import before anything that reads settings
 *
 * Loads .env from the working directory in development only.
 * Production injects variables directly.
 */
import { config } from 'dotenv'

if (process.env.NODE_ENV !== 'production') {
  config()
}
