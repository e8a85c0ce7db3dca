/**
 * Pipeline assembly: settings → rate limiter → fetcher → orchestrator → sink
 * → cycle driver.
 */

import { describeSettings, type PollerSettings } from './config/settings.js'
import { loggers } from './config/logger.js'
import { CycleDriver, type DriveSummary } from './scanner/cycle-driver.js'
import { AppointmentFetcher, createSlotsUrlBuilder } from './scanner/fetch/http-fetcher.js'
import { IntervalRateLimiter } from './scanner/fetch/rate-limiter.js'
import { createFilterCriteria } from './scanner/filter.js'
import { FetchOrchestrator } from './scanner/orchestrator.js'
import { createSink, type Sink } from './sinks/index.js'

const log = loggers.worker

export interface Poller {
  driver: CycleDriver
  sink: Sink
  run(signal?: AbortSignal): Promise<DriveSummary>
}

export function createPoller(settings: PollerSettings, sink: Sink = createSink(settings)): Poller {
  // One limiter for the whole process so the interval holds across cycles
  const rateLimiter = IntervalRateLimiter.fromSeconds(settings.rateLimitSeconds)
  const fetcher = new AppointmentFetcher({
    rateLimiter,
    buildUrl: createSlotsUrlBuilder(settings.api.url, settings.api.serviceName),
    retryPolicy: settings.retryPolicy,
    timeoutMs: settings.requestTimeoutMs,
    bearerToken: settings.api.token,
  })
  const driver = new CycleDriver({ orchestrator: new FetchOrchestrator(fetcher) })
  const criteria = createFilterCriteria(settings.regions)

  return {
    driver,
    sink,
    run: (signal?: AbortSignal) => {
      log.info('Starting poller', describeSettings(settings))
      return driver.drive({
        dateRange: settings.dateRange,
        criteria,
        maxConcurrency: settings.maxConcurrency,
        intervalMinutes: settings.intervalMinutes,
        sink,
        signal,
        sinkFailuresFatal: settings.sinkFailuresFatal,
      })
    },
  }
}
