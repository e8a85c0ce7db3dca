import type {
  AggregatedResult,
  DateFailure,
  DateRange,
  DatedLocation,
  FetchOutcome,
  IsoDate,
  LocationRecord,
} from './types.js'

/**
 * Collects per-date outcomes for one cycle, keyed by date.
 *
 * Outcomes may arrive in any order; each expected date must settle at most once.
 * A fresh accumulator is created per cycle and discarded after finalize().
 */
export class ResultAccumulator {
  private readonly expected: ReadonlySet<IsoDate>
  private readonly successes = new Map<IsoDate, LocationRecord[]>()
  private readonly failures = new Map<IsoDate, DateFailure>()
  private finalized = false

  constructor(
    private readonly range: DateRange,
    dates: readonly IsoDate[]
  ) {
    this.expected = new Set(dates)
  }

  record(outcome: FetchOutcome): void {
    if (this.finalized) {
      throw new Error(`Outcome for ${outcome.date} arrived after the result was finalized`)
    }
    if (!this.expected.has(outcome.date)) {
      throw new Error(`Outcome for unexpected date ${outcome.date}`)
    }
    if (this.successes.has(outcome.date) || this.failures.has(outcome.date)) {
      throw new Error(`Duplicate outcome for ${outcome.date}`)
    }

    if (outcome.status === 'ok') {
      this.successes.set(outcome.date, outcome.records)
      return
    }

    this.failures.set(outcome.date, {
      date: outcome.date,
      reason: outcome.reason,
      error: outcome.error,
      attempts: outcome.attempts,
    })
  }

  get settledCount(): number {
    return this.successes.size + this.failures.size
  }

  /**
   * Freeze the result. Entries are ordered by date, then upstream position.
   */
  finalize(skippedDates: readonly IsoDate[], cancelled: boolean): AggregatedResult {
    this.finalized = true

    const succeededDates = [...this.successes.keys()].sort()
    const entries: DatedLocation[] = succeededDates.flatMap(date =>
      (this.successes.get(date) ?? []).map(location => ({ date, location }))
    )
    const failures = [...this.failures.values()].sort((a, b) => a.date.localeCompare(b.date))

    return {
      range: { ...this.range },
      entries,
      failures,
      skippedDates: [...skippedDates].sort(),
      succeededDates,
      cancelled,
    }
  }
}
