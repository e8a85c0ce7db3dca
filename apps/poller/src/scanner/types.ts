/**
 * Scanner Core Types
 *
 * Everything the fetch orchestration engine passes between its stages:
 * date ranges, parsed locations, per-date outcomes and the merged result.
 */

// ═══════════════════════════════════════════════════════════════════════════════
// Dates
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Calendar date in `YYYY-MM-DD` form. Dates are compared and keyed as strings;
 * lexical order equals calendar order for this format.
 */
export type IsoDate = string

/** Inclusive calendar range. Invariant: start <= end. */
export interface DateRange {
  start: IsoDate
  end: IsoDate
}

// ═══════════════════════════════════════════════════════════════════════════════
// Locations
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * One appointment location returned by the upstream API for a date.
 * Immutable once parsed.
 */
export interface LocationRecord {
  readonly id: number
  readonly name: string
  /** Two-letter region code (upstream `state`) */
  readonly regionCode: string
  readonly city: string
  readonly address: string
  readonly addressAdditional?: string
  readonly postalCode: string
  readonly phoneNumber?: string
  /** The upstream JSON for this entry, serialized verbatim */
  readonly raw: string
}

/** A location paired with the search date it was returned for. */
export interface DatedLocation {
  readonly date: IsoDate
  readonly location: LocationRecord
}

// ═══════════════════════════════════════════════════════════════════════════════
// Fetch Outcomes
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Why a date ended without data.
 * `cancelled` is only produced when the shutdown signal aborts an attempt.
 */
export type FetchFailureReason =
  | 'network' // DNS, connection reset, TLS, etc.
  | 'timeout' // Attempt exceeded requestTimeoutMs
  | 'http_status' // Non-2xx response
  | 'invalid_body' // Body was not JSON or not an array
  | 'cancelled'

/**
 * Terminal result for one date. Never thrown; always returned.
 */
export type FetchOutcome =
  | {
      status: 'ok'
      date: IsoDate
      records: LocationRecord[]
      attempts: number
      /** Entries in the response that did not match the location shape */
      skippedEntries: number
    }
  | {
      status: 'failed'
      date: IsoDate
      reason: FetchFailureReason
      error: string
      statusCode?: number
      attempts: number
    }

export type FailedOutcome = Extract<FetchOutcome, { status: 'failed' }>

/** Anything that can turn a date into a terminal outcome. */
export interface DateFetcher {
  fetch(date: IsoDate, signal?: AbortSignal): Promise<FetchOutcome>
}

// ═══════════════════════════════════════════════════════════════════════════════
// Aggregation
// ═══════════════════════════════════════════════════════════════════════════════

export interface DateFailure {
  date: IsoDate
  reason: FetchFailureReason
  error: string
  attempts: number
}

/**
 * Merged result of one cycle.
 *
 * `entries` are ordered by search date, then by position in the upstream response.
 */
export interface AggregatedResult {
  range: DateRange
  entries: readonly DatedLocation[]
  failures: readonly DateFailure[]
  /** Dates never dispatched because the cycle was cancelled */
  skippedDates: readonly IsoDate[]
  /** Dates that reached a successful outcome (possibly with zero entries) */
  succeededDates: readonly IsoDate[]
  cancelled: boolean
}

/** Accepted region codes. Matching is case-sensitive. */
export interface FilterCriteria {
  regions: ReadonlySet<string>
}

// ═══════════════════════════════════════════════════════════════════════════════
// Rate Limiting and Retry
// ═══════════════════════════════════════════════════════════════════════════════

export interface RateLimiter {
  /**
   * Resolves true once the caller may issue its request, or false when
   * `signal` aborted first (no grant is consumed). Never rejects.
   */
  acquire(signal?: AbortSignal): Promise<boolean>
}

export interface RetryPolicy {
  /** Retries after the initial attempt; total attempts = maxRetries + 1 */
  maxRetries: number
  initialDelayMs: number
  backoffMultiplier: number
  maxDelayMs: number
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxRetries: 3,
  initialDelayMs: 1000,
  backoffMultiplier: 2,
  maxDelayMs: 30_000,
}

export const DEFAULT_REQUEST_TIMEOUT_MS = 30_000

export const DEFAULT_FETCH_HEADERS: Record<string, string> = {
  Accept: 'application/json',
  'User-Agent': 'slotwatch/0.1 (+appointment availability poller)',
}
