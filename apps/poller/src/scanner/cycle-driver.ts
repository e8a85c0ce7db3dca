/**
 * Cycle Driver
 *
 * Runs fetch → filter → sink once, or repeatedly on a fixed interval until the
 * signal aborts. Sink failures are logged and the loop continues unless the
 * failure is fatal (or all sink failures are configured as fatal).
 */

import type { ILogger } from '@slotwatch/logger'
import { loggers } from '../config/logger.js'
import { classifyError, ConfigurationError, ERROR_CODES } from '../errors.js'
import type { Sink } from '../sinks/types.js'
import { sleep as defaultSleep } from '../utils/sleep.js'
import { filterByRegion } from './filter.js'
import {
  recordCycleCompleted,
  recordCycleStarted,
  recordFailedDates,
  recordSinkFailed,
  summarizeCycle,
} from './metrics.js'
import type { FetchOrchestrator } from './orchestrator.js'
import type { AggregatedResult, DateRange, FilterCriteria } from './types.js'

const MS_PER_MINUTE = 60_000

export interface DriveOptions {
  dateRange: DateRange
  criteria: FilterCriteria
  maxConcurrency: number
  /** 0 runs exactly one cycle */
  intervalMinutes: number
  sink: Sink
  signal?: AbortSignal
  /** Treat every sink failure as fatal, not only those classified fatal */
  sinkFailuresFatal?: boolean
}

export interface CycleReport {
  cycle: number
  /** Filtered result handed (or not, when cancelled) to the sink */
  result: AggregatedResult
  delivered: boolean
  sinkFailed: boolean
  cancelled: boolean
  durationMs: number
}

export interface DriveSummary {
  cycles: number
  delivered: number
  sinkFailures: number
  cancelled: boolean
}

export interface CycleDriverOptions {
  orchestrator: Pick<FetchOrchestrator, 'run'>
  sleep?: (ms: number, signal?: AbortSignal) => Promise<boolean>
  now?: () => number
  logger?: ILogger
}

export class CycleDriver {
  private readonly orchestrator: Pick<FetchOrchestrator, 'run'>
  private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<boolean>
  private readonly now: () => number
  private readonly log: ILogger

  constructor(options: CycleDriverOptions) {
    this.orchestrator = options.orchestrator
    this.sleep = options.sleep ?? defaultSleep
    this.now = options.now ?? Date.now
    this.log = options.logger ?? loggers.cycle
  }

  async drive(options: DriveOptions): Promise<DriveSummary> {
    if (!Number.isFinite(options.intervalMinutes) || options.intervalMinutes < 0) {
      throw new ConfigurationError(
        ERROR_CODES.CONFIG_VALIDATION_FAILED,
        `intervalMinutes must be >= 0, got ${options.intervalMinutes}`
      )
    }

    const intervalMs = options.intervalMinutes * MS_PER_MINUTE
    const summary: DriveSummary = { cycles: 0, delivered: 0, sinkFailures: 0, cancelled: false }

    while (!options.signal?.aborted) {
      const cycleStartedAt = this.now()
      const report = await this.runCycle(summary.cycles + 1, options)

      summary.cycles = report.cycle
      if (report.delivered) summary.delivered++
      if (report.sinkFailed) summary.sinkFailures++
      if (report.cancelled || intervalMs === 0) {
        break
      }

      // Fixed rate: the interval is measured from the start of the cycle
      const waitMs = Math.max(0, intervalMs - (this.now() - cycleStartedAt))
      this.log.info('Sleeping until next cycle', {
        intervalMinutes: options.intervalMinutes,
        waitMs,
      })
      const completed = await this.sleep(waitMs, options.signal)
      if (!completed) {
        break
      }
    }

    summary.cancelled = options.signal?.aborted ?? false
    if (summary.cancelled) {
      this.log.info('Cycle loop stopped by shutdown signal', { cycles: summary.cycles })
    }
    return summary
  }

  /**
   * One fetch → filter → sink pass. Rethrows sink errors that are fatal.
   */
  async runCycle(cycle: number, options: DriveOptions): Promise<CycleReport> {
    const startedAt = this.now()
    recordCycleStarted({ cycle, start: options.dateRange.start, end: options.dateRange.end })

    const raw = await this.orchestrator.run(options.dateRange, options.maxConcurrency, options.signal)
    const filtered = filterByRegion(raw, options.criteria)
    recordFailedDates(cycle, raw)

    if (raw.cancelled) {
      this.log.warn('Cycle cancelled before completion; result not delivered', {
        cycle,
        skippedDates: raw.skippedDates.length,
      })
      return {
        cycle,
        result: filtered,
        delivered: false,
        sinkFailed: false,
        cancelled: true,
        durationMs: this.now() - startedAt,
      }
    }

    let delivered = false
    let sinkFailed = false
    try {
      await options.sink.deliver(filtered)
      delivered = true
      this.log.info('Result delivered', { cycle, sink: options.sink.name, entries: filtered.entries.length })
    } catch (error) {
      const classified = classifyError(error)
      const fatal = classified.fatal || options.sinkFailuresFatal === true
      recordSinkFailed({ cycle, sink: options.sink.name, fatal, code: classified.code, error })
      if (fatal) {
        throw error
      }
      sinkFailed = true
    }

    const durationMs = this.now() - startedAt
    recordCycleCompleted(summarizeCycle(cycle, raw, filtered, durationMs))

    return { cycle, result: filtered, delivered, sinkFailed, cancelled: false, durationMs }
  }
}
