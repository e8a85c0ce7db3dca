/**
 * Cycle Metrics
 *
 * Emits structured log events only; there is no metrics backend.
 */

import { loggers } from '../config/logger.js'
import type { AggregatedResult } from './types.js'

const log = loggers.cycle

export interface CycleCompletedPayload {
  cycle: number
  datesAttempted: number
  datesSucceeded: number
  datesFailed: number
  datesSkipped: number
  recordsFetched: number
  recordsMatched: number
  durationMs: number
}

export function recordCycleStarted(payload: { cycle: number; start: string; end: string }): void {
  log.info('CYCLE_STARTED', { event_name: 'CYCLE_STARTED', ...payload })
}

export function recordCycleCompleted(payload: CycleCompletedPayload): void {
  log.info('CYCLE_COMPLETED', { event_name: 'CYCLE_COMPLETED', ...payload })
}

/**
 * Failed dates are always reported, even when the cycle still produced output.
 */
export function recordFailedDates(cycle: number, result: AggregatedResult): void {
  if (result.failures.length === 0) {
    return
  }

  log.warn('CYCLE_DATES_FAILED', {
    event_name: 'CYCLE_DATES_FAILED',
    cycle,
    failedCount: result.failures.length,
    failures: result.failures.map(failure => ({
      date: failure.date,
      reason: failure.reason,
      attempts: failure.attempts,
      error: failure.error,
    })),
  })
}

export function recordSinkFailed(payload: {
  cycle: number
  sink: string
  fatal: boolean
  code: string
  error: unknown
}): void {
  const { error, ...meta } = payload
  log.error('CYCLE_SINK_FAILED', { event_name: 'CYCLE_SINK_FAILED', ...meta }, error)
}

export function summarizeCycle(
  cycle: number,
  raw: AggregatedResult,
  filtered: AggregatedResult,
  durationMs: number
): CycleCompletedPayload {
  return {
    cycle,
    datesAttempted: raw.succeededDates.length + raw.failures.length,
    datesSucceeded: raw.succeededDates.length,
    datesFailed: raw.failures.length,
    datesSkipped: raw.skippedDates.length,
    recordsFetched: raw.entries.length,
    recordsMatched: filtered.entries.length,
    durationMs,
  }
}
