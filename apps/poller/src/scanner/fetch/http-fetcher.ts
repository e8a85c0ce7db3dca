/**
 * Appointment Fetcher
 *
 * Fetches and parses one date's slots from the upstream API, with bounded
 * retries. Every attempt (initial and retries) waits for a rate limiter grant.
 * Failures are returned as typed outcomes; nothing is thrown past fetch().
 */

import type { ILogger } from '@slotwatch/logger'
import { loggers } from '../../config/logger.js'
import { errorMessage, findNetworkCode } from '../../errors.js'
import { sleep } from '../../utils/sleep.js'
import type {
  DateFetcher,
  FetchFailureReason,
  FetchOutcome,
  IsoDate,
  LocationRecord,
  RateLimiter,
  RetryPolicy,
} from '../types.js'
import { DEFAULT_FETCH_HEADERS, DEFAULT_REQUEST_TIMEOUT_MS, DEFAULT_RETRY_POLICY } from '../types.js'
import { MalformedResponseError, parseLocations } from './parse.js'

export interface AppointmentFetcherOptions {
  rateLimiter: RateLimiter

  /** Maps a date to the upstream request URL */
  buildUrl: (date: IsoDate) => string

  retryPolicy?: RetryPolicy

  /** Per-attempt bound on connect + response + body read */
  timeoutMs?: number

  /** Static bearer credential sent as `Authorization: Bearer …` */
  bearerToken?: string

  headers?: Record<string, string>

  logger?: ILogger
}

type AttemptResult =
  | { ok: true; records: LocationRecord[]; skippedEntries: number }
  | { ok: false; reason: FetchFailureReason; error: string; statusCode?: number }

type AttemptFailure = Extract<AttemptResult, { ok: false }>

/**
 * Build the slots URL for a date:
 * `{apiUrl}?minimum=1&filterTimestampBy=on&timestamp={date}&serviceName={serviceName}`
 */
export function createSlotsUrlBuilder(apiUrl: string, serviceName: string): (date: IsoDate) => string {
  return (date: IsoDate) => {
    const url = new URL(apiUrl)
    url.searchParams.set('minimum', '1')
    url.searchParams.set('filterTimestampBy', 'on')
    url.searchParams.set('timestamp', date)
    url.searchParams.set('serviceName', serviceName)
    return url.toString()
  }
}

export class AppointmentFetcher implements DateFetcher {
  private readonly rateLimiter: RateLimiter
  private readonly buildUrl: (date: IsoDate) => string
  private readonly retryPolicy: RetryPolicy
  private readonly timeoutMs: number
  private readonly headers: Record<string, string>
  private readonly log: ILogger

  constructor(options: AppointmentFetcherOptions) {
    this.rateLimiter = options.rateLimiter
    this.buildUrl = options.buildUrl
    this.retryPolicy = options.retryPolicy ?? DEFAULT_RETRY_POLICY
    this.timeoutMs = options.timeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS
    this.headers = {
      ...DEFAULT_FETCH_HEADERS,
      ...(options.bearerToken ? { Authorization: `Bearer ${options.bearerToken}` } : {}),
      ...(options.headers ?? {}),
    }
    this.log = options.logger ?? loggers.fetch
  }

  /**
   * Fetch one date. Makes at most retryPolicy.maxRetries + 1 attempts.
   */
  async fetch(date: IsoDate, signal?: AbortSignal): Promise<FetchOutcome> {
    const url = this.buildUrl(date)
    const maxAttempts = this.retryPolicy.maxRetries + 1
    let lastFailure: AttemptFailure | null = null
    let attempts = 0

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      const granted = await this.rateLimiter.acquire(signal)
      if (!granted || signal?.aborted) {
        return this.cancelled(date, attempts)
      }

      attempts = attempt
      this.log.debug('HTTP GET', { date, attempt, maxAttempts, url })
      const result = await this.fetchOnce(url, signal)

      if (result.ok) {
        if (result.skippedEntries > 0) {
          this.log.warn('Skipped entries that did not match the location shape', {
            date,
            skippedEntries: result.skippedEntries,
          })
        }
        this.log.debug('Fetched date', { date, attempt, count: result.records.length })
        return {
          status: 'ok',
          date,
          records: result.records,
          attempts,
          skippedEntries: result.skippedEntries,
        }
      }

      if (result.reason === 'cancelled') {
        return this.cancelled(date, attempts)
      }

      lastFailure = result
      this.log.warn('Attempt failed', {
        date,
        attempt,
        maxAttempts,
        reason: result.reason,
        statusCode: result.statusCode,
        error: result.error,
      })

      if (attempt < maxAttempts) {
        const delayMs = this.backoffDelay(attempt)
        this.log.debug('Retrying date', { date, delayMs })
        const completed = await sleep(delayMs, signal)
        if (!completed) {
          return this.cancelled(date, attempts)
        }
      }
    }

    const failure: AttemptFailure = lastFailure ?? {
      ok: false,
      reason: 'network',
      error: 'Unknown error after retries',
    }
    this.log.warn('Retries exhausted', { date, attempts, reason: failure.reason, error: failure.error })

    return {
      status: 'failed',
      date,
      reason: failure.reason,
      error: failure.error,
      ...(failure.statusCode !== undefined ? { statusCode: failure.statusCode } : {}),
      attempts,
    }
  }

  /**
   * Delay before retry number `retry` (1-based), capped at maxDelayMs.
   */
  backoffDelay(retry: number): number {
    const { initialDelayMs, backoffMultiplier, maxDelayMs } = this.retryPolicy
    return Math.min(initialDelayMs * Math.pow(backoffMultiplier, retry - 1), maxDelayMs)
  }

  /**
   * Single attempt (no retries).
   */
  private async fetchOnce(url: string, signal?: AbortSignal): Promise<AttemptResult> {
    const controller = new AbortController()
    const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs)
    const onAbort = () => controller.abort()
    signal?.addEventListener('abort', onAbort, { once: true })

    try {
      const response = await fetch(url, {
        method: 'GET',
        headers: this.headers,
        signal: controller.signal,
        redirect: 'follow',
      })

      if (!response.ok) {
        await response.body?.cancel()
        return {
          ok: false,
          reason: 'http_status',
          statusCode: response.status,
          error: `HTTP ${response.status}: ${response.statusText}`,
        }
      }

      const body = await response.text()
      const parsed = parseLocations(body)
      return { ok: true, records: parsed.records, skippedEntries: parsed.skipped.length }
    } catch (error) {
      if (signal?.aborted) {
        return { ok: false, reason: 'cancelled', error: 'Fetch cancelled' }
      }
      if (controller.signal.aborted) {
        return { ok: false, reason: 'timeout', error: `Request timed out after ${this.timeoutMs}ms` }
      }
      if (error instanceof MalformedResponseError) {
        return { ok: false, reason: 'invalid_body', error: error.message }
      }
      const code = findNetworkCode(error)
      return {
        ok: false,
        reason: 'network',
        error: code ? `${errorMessage(error)} (${code})` : errorMessage(error),
      }
    } finally {
      clearTimeout(timeoutId)
      signal?.removeEventListener('abort', onAbort)
    }
  }

  private cancelled(date: IsoDate, attempts: number): FetchOutcome {
    return { status: 'failed', date, reason: 'cancelled', error: 'Fetch cancelled', attempts }
  }
}
