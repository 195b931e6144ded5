/**
 * Runtime settings
 *
 * Read from the process environment and validated with zod. Outside
 * production a local .env file is loaded first (see ../env.ts).
 */

import { z } from 'zod'

/** Fixed connection pool sizing (not configurable at runtime) */
export const POOL_LIMITS = {
  maxConnectionsPerHost: 20,
  maxTotalConnections: 40,
  maxIdlePerHost: 10,
} as const

/** Backoff factor: retry n waits factor * 2^(n-1) seconds */
export const BACKOFF_FACTOR = 1

const numberFromEnv = (fallback: number) =>
  z
    .string()
    .trim()
    .optional()
    .transform(value => (value === undefined || value === '' ? fallback : Number(value)))
    .pipe(z.number().finite())

export const SettingsSchema = z.object({
  REQUEST_TIMEOUT: numberFromEnv(10).pipe(z.number().positive()),
  REQUEST_RATE_LIMIT: numberFromEnv(0.5),
  REQUEST_MAX_RETRIES: numberFromEnv(2).pipe(z.number().int().nonnegative()),
})

export type Settings = z.infer<typeof SettingsSchema>

export class SettingsError extends Error {
  constructor(public readonly issues: Array<{ variable: string; message: string }>) {
    super(
      `Invalid settings: ${issues.map(issue => `${issue.variable} (${issue.message})`).join(', ')}`
    )
    this.name = 'SettingsError'
  }
}

/**
 * Parse settings from an environment record. Pure: no caching, no dotenv.
 */
export function loadSettings(env: Record<string, string | undefined> = process.env): Settings {
  const result = SettingsSchema.safeParse({
    REQUEST_TIMEOUT: env.REQUEST_TIMEOUT,
    REQUEST_RATE_LIMIT: env.REQUEST_RATE_LIMIT,
    REQUEST_MAX_RETRIES: env.REQUEST_MAX_RETRIES,
  })

  if (!result.success) {
    throw new SettingsError(
      result.error.issues.map(issue => ({
        variable: issue.path.join('.'),
        message: issue.message,
      }))
    )
  }

  return result.data
}

let cached: Settings | null = null

/**
 * Process-wide settings, parsed once on first use.
 */
export function getSettings(): Settings {
  if (!cached) {
    cached = loadSettings()
  }
  return cached
}

/**
 * Forget cached settings so the next getSettings() re-reads the environment.
 */
export function resetSettings(): void {
  cached = null
}
