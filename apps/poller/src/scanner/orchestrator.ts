/**
 * Fetch Orchestrator
 *
 * Expands a date range into one fetch task per date, runs them through a
 * bounded pool, and merges the outcomes into one AggregatedResult. A date that
 * exhausts its retries is recorded as a failure; sibling dates keep running.
 */

import type { ILogger } from '@slotwatch/logger'
import { loggers } from '../config/logger.js'
import { ConfigurationError, ERROR_CODES, errorMessage } from '../errors.js'
import { ResultAccumulator } from './accumulator.js'
import { expandDateRange } from './dates.js'
import { runPool } from './pool.js'
import type { AggregatedResult, DateFetcher, DateRange, FetchOutcome, IsoDate } from './types.js'

export class FetchOrchestrator {
  private readonly fetcher: DateFetcher
  private readonly log: ILogger

  constructor(fetcher: DateFetcher, log: ILogger = loggers.orchestrator) {
    this.fetcher = fetcher
    this.log = log
  }

  /**
   * Fetch every date in the range with at most maxConcurrency in flight.
   * Resolves once every dispatched date has a terminal outcome.
   */
  async run(range: DateRange, maxConcurrency: number, signal?: AbortSignal): Promise<AggregatedResult> {
    if (!Number.isInteger(maxConcurrency) || maxConcurrency < 1) {
      throw new ConfigurationError(
        ERROR_CODES.CONFIG_VALIDATION_FAILED,
        `maxConcurrency must be a positive integer, got ${maxConcurrency}`
      )
    }

    const dates = expandDateRange(range)
    const accumulator = new ResultAccumulator(range, dates)
    const startedAt = Date.now()

    this.log.info('Dispatching fetch tasks', {
      start: range.start,
      end: range.end,
      dates: dates.length,
      maxConcurrency,
    })

    const { notStarted } = await runPool(
      dates,
      maxConcurrency,
      date => this.fetchDate(date, signal),
      outcome => {
        accumulator.record(outcome)
        this.log.debug('Date settled', {
          date: outcome.date,
          status: outcome.status,
          settled: accumulator.settledCount,
          total: dates.length,
        })
      },
      signal
    )

    const result = accumulator.finalize(notStarted, signal?.aborted ?? false)

    this.log.info('Fetch tasks settled', {
      succeeded: result.succeededDates.length,
      failed: result.failures.length,
      skipped: result.skippedDates.length,
      entries: result.entries.length,
      cancelled: result.cancelled,
      durationMs: Date.now() - startedAt,
    })

    return result
  }

  /**
   * DateFetcher implementations return failures rather than throw; a throw here
   * is a bug in the fetcher and is still recorded against the date so the
   * remaining dates are unaffected.
   */
  private async fetchDate(date: IsoDate, signal?: AbortSignal): Promise<FetchOutcome> {
    try {
      return await this.fetcher.fetch(date, signal)
    } catch (error) {
      this.log.error('Fetcher threw instead of returning an outcome', { date }, error)
      return {
        status: 'failed',
        date,
        reason: signal?.aborted ? 'cancelled' : 'network',
        error: errorMessage(error),
        attempts: 1,
      }
    }
  }
}
