import { AxiosError, type AxiosAdapter, type InternalAxiosRequestConfig } from 'axios'
import type { Clock } from '../types.js'

/**
 * Clock whose sleep() advances time instantly and records the delay.
 */
export class FakeClock implements Clock {
  readonly sleeps: number[] = []

  constructor(public current = 1_000) {}

  now(): number {
    return this.current
  }

  advance(ms: number): void {
    this.current += ms
  }

  async sleep(ms: number): Promise<void> {
    this.sleeps.push(ms)
    this.current += ms
  }
}

export type FakeReply =
  | { status: number; statusText?: string; body?: string; finalUrl?: string; headers?: Record<string, string> }
  | { errorCode: string; message?: string }
  | { thrown: Error }

export interface FakeTransport {
  adapter: AxiosAdapter
  calls: InternalAxiosRequestConfig[]
}

/**
 * Axios adapter that answers each request with the next queued reply.
 */
export function fakeTransport(...replies: FakeReply[]): FakeTransport {
  const queue = [...replies]
  const calls: InternalAxiosRequestConfig[] = []

  const adapter: AxiosAdapter = async config => {
    calls.push(config)
    const reply = queue.shift()
    if (!reply) {
      throw new Error(`Unexpected request to ${config.url}`)
    }
    if ('thrown' in reply) {
      throw reply.thrown
    }
    if ('errorCode' in reply) {
      throw new AxiosError(reply.message ?? reply.errorCode, reply.errorCode, config)
    }
    return {
      data: reply.body ?? '',
      status: reply.status,
      statusText: reply.statusText ?? '',
      headers: reply.headers ?? {},
      config,
      request: reply.finalUrl ? { res: { responseUrl: reply.finalUrl } } : {},
    }
  }

  return { adapter, calls }
}
