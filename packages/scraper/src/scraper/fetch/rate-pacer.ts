/**
 * Rate Pacer
 *
 * Process-wide minimum spacing between outbound requests. A request is
 * admitted only once the interval has passed since both the last completed
 * request and the last admitted one.
 *
 * Admission runs under a promise-chain mutex: the elapsed check, the sleep
 * and the timestamp update form one critical section, so concurrent callers
 * are let through one interval apart. Waiters are not promised FIFO order
 * beyond what the chain gives.
 */

import type { ILogger } from '@pagequery/logger'
import { loggers } from '../../config/logger.js'
import { getSettings } from '../../config/settings.js'
import type { Clock, Pacer } from '../types.js'
import { systemClock } from '../types.js'

export interface RatePacerOptions {
  /** Minimum seconds between requests; <= 0 disables pacing */
  intervalSeconds: number
  clock?: Clock
  logger?: ILogger
}

export class RatePacer implements Pacer {
  readonly intervalMs: number
  private readonly clock: Clock
  private readonly log: ILogger

  private lastCompletedAt = Number.NEGATIVE_INFINITY
  private lastStartedAt = Number.NEGATIVE_INFINITY

  // Tail of the admission chain
  private tail: Promise<void> = Promise.resolve()

  constructor(options: RatePacerOptions) {
    this.intervalMs = options.intervalSeconds * 1000
    this.clock = options.clock ?? systemClock
    this.log = options.logger ?? loggers.pacer
  }

  get enabled(): boolean {
    return this.intervalMs > 0
  }

  async awaitTurn(): Promise<void> {
    if (!this.enabled) return

    const release = await this.acquire()
    try {
      const earliest = Math.max(this.lastCompletedAt, this.lastStartedAt) + this.intervalMs
      const waitMs = earliest - this.clock.now()
      if (waitMs > 0) {
        this.log.debug('Pacing request', { waitMs })
        await this.clock.sleep(waitMs)
      }
      this.lastStartedAt = this.clock.now()
    } finally {
      release()
    }
  }

  markComplete(): void {
    this.lastCompletedAt = this.clock.now()
  }

  private async acquire(): Promise<() => void> {
    const previous = this.tail
    let release: () => void = () => {}
    const held = new Promise<void>(resolve => {
      release = resolve
    })
    this.tail = previous.then(() => held)
    await previous
    return release
  }
}

let sharedPacer: RatePacer | null = null

/**
 * Process-wide pacer, created on first use from settings.
 */
export function getRatePacer(): RatePacer {
  if (!sharedPacer) {
    sharedPacer = new RatePacer({ intervalSeconds: getSettings().REQUEST_RATE_LIMIT })
  }
  return sharedPacer
}

export function resetRatePacer(): void {
  sharedPacer = null
}
